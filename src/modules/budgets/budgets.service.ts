import { Injectable, Logger } from '@nestjs/common';
import { isBeforeDate } from '../../common/dates';
import { DbSession, contextFor } from '../../database/db-session';
import { ServiceResult, invalid, notFound, ok } from '../../common/service-result';
import { CreateBudgetDto } from './dto/create-budget.dto';
import { UpdateBudgetDto } from './dto/update-budget.dto';
import { Budget } from './entities/budget.entity';

const INVALID_REFERENCE = 'Invalid budget data. Check userId and categoryId exist.';
const missing = (id: number) => notFound(`Budget with ID ${id} not found`);

@Injectable()
export class BudgetsService {
  private readonly logger = new Logger(BudgetsService.name);
  private readonly context = contextFor(BudgetsService.name);

  create(session: DbSession, dto: CreateBudgetDto): Promise<ServiceResult<Budget>> {
    return session.unitOfWork(
      this.context('creating budget', `user ${dto.userId}`, { invalid: INVALID_REFERENCE }),
      async (manager) => {
        const saved = await manager.save(
          manager.create(Budget, {
            userId: dto.userId,
            categoryId: dto.categoryId,
            amount: dto.amount,
            startDate: dto.startDate,
            endDate: dto.endDate,
          }),
        );
        this.logger.log(`Created budget ${saved.id} for user ${dto.userId}`);
        return ok(await manager.findOneByOrFail(Budget, { id: saved.id }));
      },
    );
  }

  findOne(session: DbSession, id: number): Promise<ServiceResult<Budget>> {
    return session.read(this.context('fetching budget', id), async (manager) => {
      const budget = await manager.findOneBy(Budget, { id });
      return budget ? ok(budget) : missing(id);
    });
  }

  findByUser(session: DbSession, userId: number): Promise<ServiceResult<Budget[]>> {
    return session.read(this.context('listing budgets for user', userId), async (manager) =>
      ok(await manager.find(Budget, { where: { userId }, order: { startDate: 'ASC', id: 'ASC' } })),
    );
  }

  findByCategory(session: DbSession, categoryId: number): Promise<ServiceResult<Budget[]>> {
    return session.read(this.context('listing budgets for category', categoryId), async (manager) =>
      ok(await manager.find(Budget, { where: { categoryId }, order: { startDate: 'ASC', id: 'ASC' } })),
    );
  }

  /** Partial; the period is checked again after merging with the stored row. */
  update(session: DbSession, id: number, dto: UpdateBudgetDto): Promise<ServiceResult<Budget>> {
    return session.unitOfWork(
      this.context('updating budget', id, { invalid: INVALID_REFERENCE }),
      async (manager) => {
        const budget = await manager.findOneBy(Budget, { id });
        if (!budget) return missing(id);

        if (dto.categoryId !== undefined) budget.categoryId = dto.categoryId;
        if (dto.amount !== undefined) budget.amount = dto.amount;
        if (dto.startDate !== undefined) budget.startDate = dto.startDate;
        if (dto.endDate !== undefined) budget.endDate = dto.endDate;
        if (isBeforeDate(budget.endDate, budget.startDate)) {
          return invalid('endDate must be on or after startDate');
        }

        await manager.save(budget);
        return ok(await manager.findOneByOrFail(Budget, { id }));
      },
    );
  }

  remove(session: DbSession, id: number): Promise<ServiceResult<void>> {
    return session.unitOfWork(this.context('deleting budget', id), async (manager) => {
      if (!(await manager.existsBy(Budget, { id }))) return missing(id);

      await manager.delete(Budget, { id });
      this.logger.log(`Deleted budget ${id}`);
      return ok(undefined);
    });
  }
}
