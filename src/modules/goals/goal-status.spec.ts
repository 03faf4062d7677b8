import { GoalStatus } from './entities/goal.entity';
import { statusForProgress } from './goal-status';

describe('statusForProgress', () => {
  test('reaching the target completes an in-progress goal', () => {
    expect(statusForProgress(GoalStatus.IN_PROGRESS, 1000, 1000)).toBe(GoalStatus.ACHIEVED);
  });

  test('an in-progress goal below target stays in progress', () => {
    expect(statusForProgress(GoalStatus.IN_PROGRESS, 999.99, 1000)).toBe(GoalStatus.IN_PROGRESS);
  });

  test('an achieved goal that drops below target is reopened', () => {
    expect(statusForProgress(GoalStatus.ACHIEVED, 400, 1000)).toBe(GoalStatus.IN_PROGRESS);
  });

  test('an abandoned goal is left alone', () => {
    expect(statusForProgress(GoalStatus.ABANDONED, 1000, 1000)).toBe(GoalStatus.ABANDONED);
    expect(statusForProgress(GoalStatus.ABANDONED, 0, 1000)).toBe(GoalStatus.ABANDONED);
  });
});
