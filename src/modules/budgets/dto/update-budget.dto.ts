import { IsInt, IsNumber, Max, Min } from 'class-validator';
import { IsCalendarDate, IsOnOrAfter } from '../../../common/validators/compare-field.validator';
import { IsOmittable, MAX_AMOUNT } from '../../../common/validators/field-rules';

export class UpdateBudgetDto {
  @IsInt()
  @Min(1)
  @IsOmittable()
  categoryId?: number;

  @IsNumber({ maxDecimalPlaces: 2 })
  @Max(MAX_AMOUNT)
  @Min(0)
  @IsOmittable()
  amount?: number;

  @IsCalendarDate()
  @IsOmittable()
  startDate?: string;

  @IsCalendarDate()
  @IsOnOrAfter('startDate')
  @IsOmittable()
  endDate?: string;
}
