import { IsInt, IsNumber, IsPositive, Max, Min } from 'class-validator';
import { IsCalendarDate, IsOnOrAfter } from '../../../common/validators/compare-field.validator';
import { MAX_AMOUNT } from '../../../common/validators/field-rules';

export class CreateBudgetDto {
  @IsInt()
  @Min(1)
  userId!: number;

  @IsInt()
  @Min(1)
  categoryId!: number;

  @IsNumber({ maxDecimalPlaces: 2 })
  @Max(MAX_AMOUNT)
  @IsPositive()
  amount!: number;

  @IsCalendarDate()
  startDate!: string;

  @IsCalendarDate()
  @IsOnOrAfter('startDate')
  endDate!: string;
}
