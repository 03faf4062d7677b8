import { IsInt, IsNumber, IsOptional, IsPositive, IsString, Max, MaxLength, Min } from 'class-validator';
import { IsCalendarDate } from '../../../common/validators/compare-field.validator';
import { IsOmittable, MAX_AMOUNT } from '../../../common/validators/field-rules';

export class UpdateExpenseDto {
  @IsInt()
  @Min(1)
  @IsOmittable()
  categoryId?: number;

  @IsInt()
  @Min(1)
  @IsOmittable()
  accountId?: number;

  @IsNumber({ maxDecimalPlaces: 2 })
  @Max(MAX_AMOUNT)
  @IsPositive()
  @IsOmittable()
  amount?: number;

  @IsString()
  @MaxLength(255)
  @IsOptional()
  description?: string | null;

  @IsCalendarDate()
  @IsOmittable()
  date?: string;
}
