import { Injectable, Logger } from '@nestjs/common';
import { DbSession, contextFor } from '../../database/db-session';
import { ServiceResult, notFound, ok } from '../../common/service-result';
import { RecurringTransactionDto } from './dto/recurring-transaction.dto';
import { RecurringTransaction } from './entities/recurring-transaction.entity';

const INVALID_DATA = 'Invalid recurring transaction data. Check accountId and categoryId exist.';
const missing = (id: number) => notFound(`Recurring transaction with ID ${id} not found`);

function fieldsFrom(dto: RecurringTransactionDto) {
  return {
    accountId: dto.accountId,
    categoryId: dto.categoryId,
    amount: dto.amount,
    description: dto.description ?? null,
    startDate: dto.startDate,
    endDate: dto.endDate ?? null,
    frequency: dto.frequency,
  };
}

@Injectable()
export class RecurringTransactionsService {
  private readonly logger = new Logger(RecurringTransactionsService.name);
  private readonly context = contextFor(RecurringTransactionsService.name);

  create(session: DbSession, dto: RecurringTransactionDto): Promise<ServiceResult<RecurringTransaction>> {
    return session.unitOfWork(
      this.context('creating recurring transaction', `account ${dto.accountId}`, { invalid: INVALID_DATA }),
      async (manager) => {
        const saved = await manager.save(manager.create(RecurringTransaction, fieldsFrom(dto)));
        this.logger.log(`Created ${dto.frequency} recurring transaction ${saved.id}`);
        return ok(await manager.findOneByOrFail(RecurringTransaction, { id: saved.id }));
      },
    );
  }

  findOne(session: DbSession, id: number): Promise<ServiceResult<RecurringTransaction>> {
    return session.read(this.context('fetching recurring transaction', id), async (manager) => {
      const recurring = await manager.findOneBy(RecurringTransaction, { id });
      return recurring ? ok(recurring) : missing(id);
    });
  }

  findByAccount(session: DbSession, accountId: number): Promise<ServiceResult<RecurringTransaction[]>> {
    return session.read(this.context('listing recurring transactions for account', accountId), async (manager) =>
      ok(await manager.find(RecurringTransaction, { where: { accountId }, order: { id: 'ASC' } })),
    );
  }

  findByUser(session: DbSession, userId: number): Promise<ServiceResult<RecurringTransaction[]>> {
    return session.read(this.context('listing recurring transactions for user', userId), async (manager) =>
      ok(await manager.find(RecurringTransaction, { where: { account: { userId } }, order: { id: 'ASC' } })),
    );
  }

  /** Every field is overwritten; an omitted endDate clears it. */
  replace(session: DbSession, id: number, dto: RecurringTransactionDto): Promise<ServiceResult<RecurringTransaction>> {
    return session.unitOfWork(
      this.context('updating recurring transaction', id, { invalid: INVALID_DATA }),
      async (manager) => {
        if (!(await manager.existsBy(RecurringTransaction, { id }))) return missing(id);

        await manager.update(RecurringTransaction, { id }, fieldsFrom(dto));
        return ok(await manager.findOneByOrFail(RecurringTransaction, { id }));
      },
    );
  }

  remove(session: DbSession, id: number): Promise<ServiceResult<void>> {
    return session.unitOfWork(this.context('deleting recurring transaction', id), async (manager) => {
      if (!(await manager.existsBy(RecurringTransaction, { id }))) return missing(id);

      await manager.delete(RecurringTransaction, { id });
      this.logger.log(`Deleted recurring transaction ${id}`);
      return ok(undefined);
    });
  }
}
