import { Injectable, Logger } from '@nestjs/common';
import { Between, FindOperator, LessThanOrEqual, MoreThanOrEqual } from 'typeorm';
import { DbSession, contextFor } from '../../database/db-session';
import { ServiceResult, notFound, ok } from '../../common/service-result';
import { CreateExpenseDto } from './dto/create-expense.dto';
import { ExpensePeriodQueryDto } from './dto/expense-period-query.dto';
import { UpdateExpenseDto } from './dto/update-expense.dto';
import { Expense } from './entities/expense.entity';

const INVALID_REFERENCE = 'Invalid expense data. Check userId, accountId and categoryId exist.';
const missing = (id: number) => notFound(`Expense with ID ${id} not found`);

function periodFilter({ startDate, endDate }: ExpensePeriodQueryDto): FindOperator<string> | undefined {
  if (startDate && endDate) return Between(startDate, endDate);
  if (startDate) return MoreThanOrEqual(startDate);
  if (endDate) return LessThanOrEqual(endDate);
  return undefined;
}

@Injectable()
export class ExpensesService {
  private readonly logger = new Logger(ExpensesService.name);
  private readonly context = contextFor(ExpensesService.name);

  create(session: DbSession, dto: CreateExpenseDto): Promise<ServiceResult<Expense>> {
    return session.unitOfWork(
      this.context('creating expense', `user ${dto.userId}`, { invalid: INVALID_REFERENCE }),
      async (manager) => {
        const saved = await manager.save(
          manager.create(Expense, {
            userId: dto.userId,
            categoryId: dto.categoryId,
            accountId: dto.accountId,
            amount: dto.amount,
            description: dto.description ?? null,
            date: dto.date,
          }),
        );
        this.logger.log(`Created expense ${saved.id} for user ${dto.userId}`);
        return ok(await manager.findOneByOrFail(Expense, { id: saved.id }));
      },
    );
  }

  findOne(session: DbSession, id: number): Promise<ServiceResult<Expense>> {
    return session.read(this.context('fetching expense', id), async (manager) => {
      const expense = await manager.findOneBy(Expense, { id });
      return expense ? ok(expense) : missing(id);
    });
  }

  /** Optionally narrowed to an inclusive date window. */
  findByUser(session: DbSession, userId: number, period: ExpensePeriodQueryDto = {}): Promise<ServiceResult<Expense[]>> {
    const date = periodFilter(period);
    return session.read(this.context('listing expenses for user', userId), async (manager) =>
      ok(
        await manager.find(Expense, {
          where: date ? { userId, date } : { userId },
          order: { date: 'ASC', id: 'ASC' },
        }),
      ),
    );
  }

  findByAccount(session: DbSession, accountId: number): Promise<ServiceResult<Expense[]>> {
    return session.read(this.context('listing expenses for account', accountId), async (manager) =>
      ok(await manager.find(Expense, { where: { accountId }, order: { date: 'ASC', id: 'ASC' } })),
    );
  }

  findByCategory(session: DbSession, categoryId: number): Promise<ServiceResult<Expense[]>> {
    return session.read(this.context('listing expenses for category', categoryId), async (manager) =>
      ok(await manager.find(Expense, { where: { categoryId }, order: { date: 'ASC', id: 'ASC' } })),
    );
  }

  update(session: DbSession, id: number, dto: UpdateExpenseDto): Promise<ServiceResult<Expense>> {
    return session.unitOfWork(
      this.context('updating expense', id, { invalid: INVALID_REFERENCE }),
      async (manager) => {
        const expense = await manager.findOneBy(Expense, { id });
        if (!expense) return missing(id);

        if (dto.categoryId !== undefined) expense.categoryId = dto.categoryId;
        if (dto.accountId !== undefined) expense.accountId = dto.accountId;
        if (dto.amount !== undefined) expense.amount = dto.amount;
        if (dto.description !== undefined) expense.description = dto.description;
        if (dto.date !== undefined) expense.date = dto.date;
        await manager.save(expense);
        return ok(await manager.findOneByOrFail(Expense, { id }));
      },
    );
  }

  remove(session: DbSession, id: number): Promise<ServiceResult<void>> {
    return session.unitOfWork(this.context('deleting expense', id), async (manager) => {
      if (!(await manager.existsBy(Expense, { id }))) return missing(id);

      await manager.delete(Expense, { id });
      this.logger.log(`Deleted expense ${id}`);
      return ok(undefined);
    });
  }
}
