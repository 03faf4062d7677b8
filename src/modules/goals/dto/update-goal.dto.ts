import {
  IsEnum,
  IsNumber,
  IsOptional,
  IsPositive,
  IsString,
  Max,
  MaxLength,
  Min,
  MinLength,
} from 'class-validator';
import { IsCalendarDate } from '../../../common/validators/compare-field.validator';
import { IsOmittable, MAX_AMOUNT } from '../../../common/validators/field-rules';
import { GoalStatus } from '../entities/goal.entity';

// Cross-field rules are checked against the merged row in GoalsService.update.
export class UpdateGoalDto {
  @IsString()
  @MinLength(1)
  @MaxLength(255)
  @IsOmittable()
  name?: string;

  @IsString()
  @MaxLength(255)
  @IsOptional()
  description?: string | null;

  @IsNumber({ maxDecimalPlaces: 2 })
  @Max(MAX_AMOUNT)
  @IsPositive()
  @IsOmittable()
  targetAmount?: number;

  @IsNumber({ maxDecimalPlaces: 2 })
  @Max(MAX_AMOUNT)
  @Min(0)
  @IsOmittable()
  currentAmount?: number;

  @IsCalendarDate()
  @IsOmittable()
  startDate?: string;

  @IsCalendarDate()
  @IsOmittable()
  endDate?: string;

  @IsEnum(GoalStatus)
  @IsOmittable()
  status?: GoalStatus;
}
