import {
  IsEnum,
  IsInt,
  IsNumber,
  IsOptional,
  IsPositive,
  IsString,
  Max,
  MaxLength,
  Min,
  MinLength,
} from 'class-validator';
import {
  IsCalendarDate,
  IsNotGreaterThan,
  IsOnOrAfter,
} from '../../../common/validators/compare-field.validator';
import { IsOmittable, MAX_AMOUNT } from '../../../common/validators/field-rules';
import { GoalStatus } from '../entities/goal.entity';

export class CreateGoalDto {
  @IsInt()
  @Min(1)
  userId!: number;

  @IsString()
  @MinLength(1)
  @MaxLength(255)
  name!: string;

  @IsString()
  @MaxLength(255)
  @IsOptional()
  description?: string;

  @IsNumber({ maxDecimalPlaces: 2 })
  @Max(MAX_AMOUNT)
  @IsPositive()
  targetAmount!: number;

  @IsNumber({ maxDecimalPlaces: 2 })
  @Max(MAX_AMOUNT)
  @Min(0)
  @IsNotGreaterThan('targetAmount')
  @IsOmittable()
  currentAmount?: number;

  @IsCalendarDate()
  startDate!: string;

  @IsCalendarDate()
  @IsOnOrAfter('startDate')
  endDate!: string;

  @IsEnum(GoalStatus)
  @IsOmittable()
  status?: GoalStatus;
}
