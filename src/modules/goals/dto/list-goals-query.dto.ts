import { IsEnum, IsOptional } from 'class-validator';
import { GoalStatus } from '../entities/goal.entity';

export class ListGoalsQueryDto {
  @IsEnum(GoalStatus)
  @IsOptional()
  status?: GoalStatus;
}
