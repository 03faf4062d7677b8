import { createTestDatabase, TestDatabase } from '../../../test/support/test-database';
import { seedOwner } from '../../../test/support/fixtures';
import { Transaction, TransactionType } from '../transactions/entities/transaction.entity';
import { AccountsService } from './accounts.service';

describe('AccountsService', () => {
  let database: TestDatabase;
  let service: AccountsService;
  let owner: Awaited<ReturnType<typeof seedOwner>>;

  beforeEach(async () => {
    database = await createTestDatabase();
    service = new AccountsService();
    owner = await seedOwner(database.dataSource);
  });

  afterEach(async () => {
    await database.close();
  });

  it('creates an account with a zero balance by default', async () => {
    const result = await database.run((s) =>
      service.create(s, { userId: owner.user.id, name: 'Wallet', type: 'cash', currencyId: owner.currency.id }),
    );

    expect(result.kind).toBe('ok');
    if (result.kind !== 'ok') return;
    expect(result.value).toMatchObject({ userId: owner.user.id, name: 'Wallet', type: 'cash', balance: 0 });
  });

  it('reports a missing currency as invalid data', async () => {
    const result = await database.run((s) =>
      service.create(s, { userId: owner.user.id, name: 'Wallet', type: 'cash', currencyId: 99 }),
    );

    expect(result).toEqual({ kind: 'invalid', reason: 'Invalid account data. Check userId and currencyId exist.' });
  });

  it('lists the accounts of a user', async () => {
    await database.run((s) =>
      service.create(s, { userId: owner.user.id, name: 'Wallet', type: 'cash', currencyId: owner.currency.id }),
    );

    const result = await database.run((s) => service.findByUser(s, owner.user.id));

    expect(result.kind === 'ok' && result.value.map((a) => a.name)).toEqual(['Checking', 'Wallet']);
  });

  it('applies a partial update', async () => {
    const result = await database.run((s) => service.update(s, owner.account.id, { balance: 250.5 }));

    expect(result.kind === 'ok' && result.value).toMatchObject({ name: 'Checking', balance: 250.5 });
  });

  it('refuses to delete an account that transactions still use', async () => {
    await database.dataSource.getRepository(Transaction).save({
      accountId: owner.account.id,
      categoryId: owner.category.id,
      amount: 20,
      description: null,
      date: '2024-05-01',
      type: TransactionType.EXPENSE,
    });

    const result = await database.run((s) => service.remove(s, owner.account.id));

    expect(result).toEqual({
      kind: 'invalid',
      reason: 'Account is still used by transactions, expenses or recurring transactions',
    });
    expect(await database.run((s) => service.findOne(s, owner.account.id))).toMatchObject({ kind: 'ok' });
  });

  it('returns not_found when deleting a missing account', async () => {
    expect(await database.run((s) => service.remove(s, 500))).toEqual({
      kind: 'not_found',
      message: 'Account with ID 500 not found',
    });
  });
});
