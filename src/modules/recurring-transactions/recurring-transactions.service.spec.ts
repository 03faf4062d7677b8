import { createTestDatabase, TestDatabase } from '../../../test/support/test-database';
import { seedOwner } from '../../../test/support/fixtures';
import { RecurringTransactionDto } from './dto/recurring-transaction.dto';
import { RecurringFrequency } from './entities/recurring-transaction.entity';
import { RecurringTransactionsService } from './recurring-transactions.service';

describe('RecurringTransactionsService', () => {
  let database: TestDatabase;
  let service: RecurringTransactionsService;
  let owner: Awaited<ReturnType<typeof seedOwner>>;

  const rent = (overrides: Partial<RecurringTransactionDto> = {}): RecurringTransactionDto => ({
    accountId: owner.account.id,
    categoryId: owner.category.id,
    amount: 900,
    description: 'Rent',
    startDate: '2024-01-01',
    endDate: '2024-12-31',
    frequency: RecurringFrequency.MONTHLY,
    ...overrides,
  });

  beforeEach(async () => {
    database = await createTestDatabase();
    service = new RecurringTransactionsService();
    owner = await seedOwner(database.dataSource);
  });

  afterEach(async () => {
    await database.close();
  });

  it('creates an open-ended schedule when endDate is omitted', async () => {
    const result = await database.run((s) => service.create(s, rent({ endDate: undefined })));

    expect(result.kind === 'ok' && result.value).toMatchObject({ endDate: null, frequency: RecurringFrequency.MONTHLY });
  });

  it('replaces every field on update', async () => {
    const created = await database.run((s) => service.create(s, rent()));
    if (created.kind !== 'ok') throw new Error('recurring transaction not created');

    const result = await database.run((s) =>
      service.replace(s, created.value.id, {
        accountId: owner.account.id,
        categoryId: owner.category.id,
        amount: 15,
        startDate: '2024-06-01',
        frequency: RecurringFrequency.WEEKLY,
      }),
    );

    expect(result.kind === 'ok' && result.value).toMatchObject({
      amount: 15,
      description: null,
      startDate: '2024-06-01',
      endDate: null,
      frequency: RecurringFrequency.WEEKLY,
    });
  });

  it('lets the database refuse an end before the start', async () => {
    const result = await database.run((s) => service.create(s, rent({ startDate: '2024-06-01', endDate: '2024-05-01' })));

    expect(result).toEqual({
      kind: 'invalid',
      reason: 'Invalid recurring transaction data. Check accountId and categoryId exist.',
    });
  });

  it('finds schedules through the account owner', async () => {
    await database.run((s) => service.create(s, rent()));

    const result = await database.run((s) => service.findByUser(s, owner.user.id));

    expect(result.kind === 'ok' && result.value.map((r) => r.description)).toEqual(['Rent']);
  });

  it('returns not_found when replacing a missing schedule', async () => {
    expect(await database.run((s) => service.replace(s, 8, rent()))).toEqual({
      kind: 'not_found',
      message: 'Recurring transaction with ID 8 not found',
    });
  });
});
