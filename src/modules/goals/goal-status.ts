import { GoalStatus } from './entities/goal.entity';

/**
 * Status after the saved amount changes. Reaching the target completes an
 * in-progress goal and dropping below it reopens an achieved one; an
 * abandoned goal keeps its status.
 */
export function statusForProgress(current: GoalStatus, currentAmount: number, targetAmount: number): GoalStatus {
  if (current === GoalStatus.ABANDONED) return current;
  return currentAmount >= targetAmount ? GoalStatus.ACHIEVED : GoalStatus.IN_PROGRESS;
}
