import { Currency } from './entities/currency.entity';
import { CurrenciesService } from './currencies.service';
import { createTestDatabase, TestDatabase } from '../../../test/support/test-database';

describe('CurrenciesService', () => {
  let database: TestDatabase;
  let service: CurrenciesService;

  beforeEach(async () => {
    database = await createTestDatabase();
    service = new CurrenciesService();
  });

  afterEach(async () => {
    await database.close();
  });

  it('stores the code upper-cased', async () => {
    const result = await database.run((s) => service.create(s, { code: 'usd', name: 'US Dollar', symbol: '$' }));

    expect(result.kind).toBe('ok');
    if (result.kind !== 'ok') return;
    expect(result.value).toMatchObject({ code: 'USD', name: 'US Dollar', symbol: '$' });
    expect(result.value.id).toEqual(expect.any(Number));
  });

  it('reports a duplicate code as a conflict and keeps the first row', async () => {
    await database.run((s) => service.create(s, { code: 'USD', name: 'US Dollar', symbol: '$' }));

    const result = await database.run((s) => service.create(s, { code: 'usd', name: 'Dollar again', symbol: 'US$' }));

    expect(result).toEqual({
      kind: 'conflict',
      field: 'code',
      message: 'Currency with code USD already exists',
    });
    const rows = await database.dataSource.getRepository(Currency).find();
    expect(rows).toHaveLength(1);
    expect(rows[0].name).toBe('US Dollar');
  });

  it('looks codes up case-insensitively', async () => {
    await database.run((s) => service.create(s, { code: 'EUR', name: 'Euro', symbol: '€' }));

    const result = await database.run((s) => service.findByCode(s, 'eur'));

    expect(result.kind === 'ok' && result.value.name).toBe('Euro');
  });

  test('findByCode returns not_found for an unknown code', async () => {
    const result = await database.run((s) => service.findByCode(s, 'EUR'));

    expect(result).toEqual({ kind: 'not_found', message: 'Currency with code EUR not found' });
  });

  test('findAll orders by code', async () => {
    await database.run((s) => service.create(s, { code: 'USD', name: 'US Dollar', symbol: '$' }));
    await database.run((s) => service.create(s, { code: 'EUR', name: 'Euro', symbol: '€' }));

    const result = await database.run((s) => service.findAll(s));

    expect(result.kind === 'ok' && result.value.map((c) => c.code)).toEqual(['EUR', 'USD']);
  });
});
