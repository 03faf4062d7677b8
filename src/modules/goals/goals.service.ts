import { Injectable, Logger } from '@nestjs/common';
import { isBeforeDate } from '../../common/dates';
import { DbSession, contextFor } from '../../database/db-session';
import { ServiceResult, invalid, notFound, ok } from '../../common/service-result';
import { CreateGoalDto } from './dto/create-goal.dto';
import { UpdateGoalDto } from './dto/update-goal.dto';
import { Goal, GoalStatus } from './entities/goal.entity';
import { statusForProgress } from './goal-status';

const missing = (id: number) => notFound(`Goal with ID ${id} not found`);

@Injectable()
export class GoalsService {
  private readonly logger = new Logger(GoalsService.name);
  private readonly context = contextFor(GoalsService.name);

  create(session: DbSession, dto: CreateGoalDto): Promise<ServiceResult<Goal>> {
    const currentAmount = dto.currentAmount ?? 0;
    if (currentAmount > dto.targetAmount) {
      return Promise.resolve(invalid('currentAmount cannot exceed targetAmount'));
    }

    return session.unitOfWork(
      this.context('creating goal', dto.name, { invalid: 'Invalid goal data. Check userId exists.' }),
      async (manager) => {
        const saved = await manager.save(
          manager.create(Goal, {
            userId: dto.userId,
            name: dto.name,
            description: dto.description ?? null,
            targetAmount: dto.targetAmount,
            currentAmount,
            startDate: dto.startDate,
            endDate: dto.endDate,
            status: dto.status ?? statusForProgress(GoalStatus.IN_PROGRESS, currentAmount, dto.targetAmount),
          }),
        );
        this.logger.log(`Created goal ${saved.id} for user ${dto.userId}`);
        return ok(await manager.findOneByOrFail(Goal, { id: saved.id }));
      },
    );
  }

  findByUser(session: DbSession, userId: number, status?: GoalStatus): Promise<ServiceResult<Goal[]>> {
    return session.read(this.context('listing goals for user', userId), async (manager) =>
      ok(
        await manager.find(Goal, {
          where: status ? { userId, status } : { userId },
          order: { id: 'ASC' },
        }),
      ),
    );
  }

  findOne(session: DbSession, id: number): Promise<ServiceResult<Goal>> {
    return session.read(this.context('fetching goal', id), async (manager) => {
      const goal = await manager.findOneBy(Goal, { id });
      return goal ? ok(goal) : missing(id);
    });
  }

  /** Sets the saved amount, which must stay within [0, targetAmount]. */
  updateProgress(session: DbSession, id: number, currentAmount: number): Promise<ServiceResult<Goal>> {
    return session.unitOfWork(
      this.context('updating goal progress', id, { internal: 'Error updating goal progress' }),
      async (manager) => {
        const goal = await manager.findOneBy(Goal, { id });
        if (!goal) return missing(id);

        if (currentAmount < 0 || currentAmount > goal.targetAmount) {
          this.logger.warn(`Rejected progress ${currentAmount} for goal ${id} (target ${goal.targetAmount})`);
          return invalid(`currentAmount must be between 0 and ${goal.targetAmount}`);
        }

        goal.currentAmount = currentAmount;
        goal.status = statusForProgress(goal.status, currentAmount, goal.targetAmount);
        await manager.save(goal);
        return ok(await manager.findOneByOrFail(Goal, { id }));
      },
    );
  }

  /** Partial; an explicit status wins over the one derived from the amounts. */
  update(session: DbSession, id: number, dto: UpdateGoalDto): Promise<ServiceResult<Goal>> {
    return session.unitOfWork(
      this.context('updating goal', id, { invalid: 'Invalid goal data' }),
      async (manager) => {
        const goal = await manager.findOneBy(Goal, { id });
        if (!goal) return missing(id);

        if (dto.name !== undefined) goal.name = dto.name;
        if (dto.description !== undefined) goal.description = dto.description;
        if (dto.targetAmount !== undefined) goal.targetAmount = dto.targetAmount;
        if (dto.currentAmount !== undefined) goal.currentAmount = dto.currentAmount;
        if (dto.startDate !== undefined) goal.startDate = dto.startDate;
        if (dto.endDate !== undefined) goal.endDate = dto.endDate;

        if (goal.currentAmount > goal.targetAmount) {
          return invalid('currentAmount cannot exceed targetAmount');
        }
        if (isBeforeDate(goal.endDate, goal.startDate)) {
          return invalid('endDate must be on or after startDate');
        }

        if (dto.status !== undefined) {
          goal.status = dto.status;
        } else if (dto.currentAmount !== undefined || dto.targetAmount !== undefined) {
          goal.status = statusForProgress(goal.status, goal.currentAmount, goal.targetAmount);
        }

        await manager.save(goal);
        return ok(await manager.findOneByOrFail(Goal, { id }));
      },
    );
  }

  remove(session: DbSession, id: number): Promise<ServiceResult<void>> {
    return session.unitOfWork(this.context('deleting goal', id), async (manager) => {
      if (!(await manager.existsBy(Goal, { id }))) return missing(id);

      await manager.delete(Goal, { id });
      this.logger.log(`Deleted goal ${id}`);
      return ok(undefined);
    });
  }
}
