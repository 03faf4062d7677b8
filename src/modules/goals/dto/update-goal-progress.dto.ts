import { IsNumber, Max, Min } from 'class-validator';
import { MAX_AMOUNT } from '../../../common/validators/field-rules';

export class UpdateGoalProgressDto {
  @IsNumber({ maxDecimalPlaces: 2 })
  @Max(MAX_AMOUNT)
  @Min(0)
  currentAmount!: number;
}
