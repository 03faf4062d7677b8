import { IsInt, IsNumber, IsOptional, IsPositive, IsString, Max, MaxLength, Min } from 'class-validator';
import { IsCalendarDate } from '../../../common/validators/compare-field.validator';
import { MAX_AMOUNT } from '../../../common/validators/field-rules';

export class CreateExpenseDto {
  @IsInt()
  @Min(1)
  userId!: number;

  @IsInt()
  @Min(1)
  categoryId!: number;

  @IsInt()
  @Min(1)
  accountId!: number;

  @IsNumber({ maxDecimalPlaces: 2 })
  @Max(MAX_AMOUNT)
  @IsPositive()
  amount!: number;

  @IsString()
  @MaxLength(255)
  @IsOptional()
  description?: string;

  @IsCalendarDate()
  date!: string;
}
