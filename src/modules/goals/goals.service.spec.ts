import { createTestDatabase, TestDatabase } from '../../../test/support/test-database';
import { seedOwner } from '../../../test/support/fixtures';
import { CreateGoalDto } from './dto/create-goal.dto';
import { Goal, GoalStatus } from './entities/goal.entity';
import { GoalsService } from './goals.service';

describe('GoalsService', () => {
  let database: TestDatabase;
  let service: GoalsService;
  let userId: number;

  const goalFor = (overrides: Partial<CreateGoalDto> = {}): CreateGoalDto => ({
    userId,
    name: 'Emergency fund',
    targetAmount: 1000,
    startDate: '2024-01-01',
    endDate: '2024-12-31',
    ...overrides,
  });

  async function createGoal(overrides: Partial<CreateGoalDto> = {}): Promise<Goal> {
    const result = await database.run((s) => service.create(s, goalFor(overrides)));
    if (result.kind !== 'ok') throw new Error(`goal not created: ${result.kind}`);
    return result.value;
  }

  beforeEach(async () => {
    database = await createTestDatabase();
    service = new GoalsService();
    const owner = await seedOwner(database.dataSource);
    userId = owner.user.id;
  });

  afterEach(async () => {
    await database.close();
  });

  describe('create', () => {
    it('defaults currentAmount to 0 and status to in_progress', async () => {
      const goal = await createGoal();

      expect(goal).toMatchObject({
        userId,
        name: 'Emergency fund',
        description: null,
        targetAmount: 1000,
        currentAmount: 0,
        startDate: '2024-01-01',
        endDate: '2024-12-31',
        status: GoalStatus.IN_PROGRESS,
      });
    });

    it('reports an unknown user as invalid data', async () => {
      const result = await database.run((s) => service.create(s, goalFor({ userId: 999 })));

      expect(result).toEqual({ kind: 'invalid', reason: 'Invalid goal data. Check userId exists.' });
      expect(await database.dataSource.getRepository(Goal).count()).toBe(0);
    });

    it('rejects a current amount above the target', async () => {
      const result = await database.run((s) => service.create(s, goalFor({ currentAmount: 1200 })));

      expect(result).toEqual({ kind: 'invalid', reason: 'currentAmount cannot exceed targetAmount' });
    });
  });

  describe('updateProgress', () => {
    it('accepts an amount within the target and rejects one above it', async () => {
      const goal = await createGoal();

      const accepted = await database.run((s) => service.updateProgress(s, goal.id, 500));
      expect(accepted.kind === 'ok' && accepted.value.currentAmount).toBe(500);

      const rejected = await database.run((s) => service.updateProgress(s, goal.id, 1500));
      expect(rejected).toEqual({ kind: 'invalid', reason: 'currentAmount must be between 0 and 1000' });

      const stored = await database.run((s) => service.findOne(s, goal.id));
      expect(stored.kind === 'ok' && stored.value.currentAmount).toBe(500);
    });

    it('moves the status with the amount', async () => {
      const goal = await createGoal();

      const reached = await database.run((s) => service.updateProgress(s, goal.id, 1000));
      expect(reached.kind === 'ok' && reached.value.status).toBe(GoalStatus.ACHIEVED);

      const dropped = await database.run((s) => service.updateProgress(s, goal.id, 400));
      expect(dropped.kind === 'ok' && dropped.value.status).toBe(GoalStatus.IN_PROGRESS);
    });

    it('keeps an abandoned goal abandoned', async () => {
      const goal = await createGoal({ status: GoalStatus.ABANDONED });

      const result = await database.run((s) => service.updateProgress(s, goal.id, 1000));

      expect(result.kind === 'ok' && result.value.status).toBe(GoalStatus.ABANDONED);
    });

    it('returns not_found for a missing goal', async () => {
      const result = await database.run((s) => service.updateProgress(s, 42, 10));

      expect(result).toEqual({ kind: 'not_found', message: 'Goal with ID 42 not found' });
    });
  });

  describe('update', () => {
    it('checks the merged amounts', async () => {
      const goal = await createGoal({ currentAmount: 800 });

      const result = await database.run((s) => service.update(s, goal.id, { targetAmount: 500 }));

      expect(result).toEqual({ kind: 'invalid', reason: 'currentAmount cannot exceed targetAmount' });
    });

    it('checks the merged dates', async () => {
      const goal = await createGoal();

      const result = await database.run((s) => service.update(s, goal.id, { endDate: '2023-06-30' }));

      expect(result).toEqual({ kind: 'invalid', reason: 'endDate must be on or after startDate' });
    });

    it('lets an explicit status win over the derived one', async () => {
      const goal = await createGoal();

      const result = await database.run((s) =>
        service.update(s, goal.id, { currentAmount: 1000, status: GoalStatus.ABANDONED }),
      );

      expect(result.kind === 'ok' && result.value.status).toBe(GoalStatus.ABANDONED);
    });

    it('derives the status when only amounts change', async () => {
      const goal = await createGoal({ currentAmount: 600 });

      const result = await database.run((s) => service.update(s, goal.id, { targetAmount: 600 }));

      expect(result.kind === 'ok' && result.value.status).toBe(GoalStatus.ACHIEVED);
    });
  });

  describe('findByUser', () => {
    it('filters by status when given', async () => {
      await createGoal({ name: 'Holiday' });
      await createGoal({ name: 'Bike', currentAmount: 1000 });

      const all = await database.run((s) => service.findByUser(s, userId));
      const achieved = await database.run((s) => service.findByUser(s, userId, GoalStatus.ACHIEVED));

      expect(all.kind === 'ok' && all.value.map((g) => g.name)).toEqual(['Holiday', 'Bike']);
      expect(achieved.kind === 'ok' && achieved.value.map((g) => g.name)).toEqual(['Bike']);
    });
  });

  describe('remove', () => {
    it('deletes the goal', async () => {
      const goal = await createGoal();

      expect(await database.run((s) => service.remove(s, goal.id))).toEqual({ kind: 'ok', value: undefined });
      expect(await database.run((s) => service.findOne(s, goal.id))).toEqual({
        kind: 'not_found',
        message: `Goal with ID ${goal.id} not found`,
      });
    });

    it('returns not_found for a missing goal', async () => {
      expect(await database.run((s) => service.remove(s, 7))).toEqual({
        kind: 'not_found',
        message: 'Goal with ID 7 not found',
      });
    });
  });
});
