import { Injectable, Logger } from '@nestjs/common';
import { Between } from 'typeorm';
import { DbSession, contextFor } from '../../database/db-session';
import { ServiceResult, notFound, ok } from '../../common/service-result';
import { CreateTransactionDto } from './dto/create-transaction.dto';
import { DateRangeQueryDto } from './dto/date-range-query.dto';
import { UpdateTransactionDto } from './dto/update-transaction.dto';
import { Transaction } from './entities/transaction.entity';

const INVALID_REFERENCE = 'Invalid transaction data. Check accountId and categoryId exist.';
const missing = (id: number) => notFound(`Transaction with ID ${id} not found`);

@Injectable()
export class TransactionsService {
  private readonly logger = new Logger(TransactionsService.name);
  private readonly context = contextFor(TransactionsService.name);

  create(session: DbSession, dto: CreateTransactionDto): Promise<ServiceResult<Transaction>> {
    return session.unitOfWork(
      this.context('creating transaction', `account ${dto.accountId}`, { invalid: INVALID_REFERENCE }),
      async (manager) => {
        const saved = await manager.save(
          manager.create(Transaction, {
            accountId: dto.accountId,
            categoryId: dto.categoryId,
            amount: dto.amount,
            description: dto.description ?? null,
            date: dto.date,
            type: dto.type,
          }),
        );
        this.logger.log(`Created ${dto.type} transaction ${saved.id} on account ${dto.accountId}`);
        return ok(await manager.findOneByOrFail(Transaction, { id: saved.id }));
      },
    );
  }

  findOne(session: DbSession, id: number): Promise<ServiceResult<Transaction>> {
    return session.read(this.context('fetching transaction', id), async (manager) => {
      const transaction = await manager.findOneBy(Transaction, { id });
      return transaction ? ok(transaction) : missing(id);
    });
  }

  findByAccount(session: DbSession, accountId: number): Promise<ServiceResult<Transaction[]>> {
    return session.read(this.context('listing transactions for account', accountId), async (manager) =>
      ok(await manager.find(Transaction, { where: { accountId }, order: { date: 'ASC', id: 'ASC' } })),
    );
  }

  /** Transactions on every account the user owns. */
  findByUser(session: DbSession, userId: number): Promise<ServiceResult<Transaction[]>> {
    return session.read(this.context('listing transactions for user', userId), async (manager) =>
      ok(
        await manager.find(Transaction, {
          where: { account: { userId } },
          order: { date: 'ASC', id: 'ASC' },
        }),
      ),
    );
  }

  /** Inclusive on both ends. */
  findByDateRange(session: DbSession, query: DateRangeQueryDto): Promise<ServiceResult<Transaction[]>> {
    const range = Between(query.startDate, query.endDate);
    return session.read(
      this.context('listing transactions by date', `${query.startDate}..${query.endDate}`),
      async (manager) =>
        ok(
          await manager.find(Transaction, {
            where: query.accountId === undefined ? { date: range } : { date: range, accountId: query.accountId },
            order: { date: 'ASC', id: 'ASC' },
          }),
        ),
    );
  }

  update(session: DbSession, id: number, dto: UpdateTransactionDto): Promise<ServiceResult<Transaction>> {
    return session.unitOfWork(
      this.context('updating transaction', id, { invalid: INVALID_REFERENCE }),
      async (manager) => {
        const transaction = await manager.findOneBy(Transaction, { id });
        if (!transaction) return missing(id);

        if (dto.accountId !== undefined) transaction.accountId = dto.accountId;
        if (dto.categoryId !== undefined) transaction.categoryId = dto.categoryId;
        if (dto.amount !== undefined) transaction.amount = dto.amount;
        if (dto.description !== undefined) transaction.description = dto.description;
        if (dto.date !== undefined) transaction.date = dto.date;
        if (dto.type !== undefined) transaction.type = dto.type;
        await manager.save(transaction);
        return ok(await manager.findOneByOrFail(Transaction, { id }));
      },
    );
  }

  remove(session: DbSession, id: number): Promise<ServiceResult<void>> {
    return session.unitOfWork(this.context('deleting transaction', id), async (manager) => {
      if (!(await manager.existsBy(Transaction, { id }))) return missing(id);

      await manager.delete(Transaction, { id });
      this.logger.log(`Deleted transaction ${id}`);
      return ok(undefined);
    });
  }
}
