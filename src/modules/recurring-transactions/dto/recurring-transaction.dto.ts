import { IsEnum, IsInt, IsNumber, IsOptional, IsString, Max, MaxLength, Min } from 'class-validator';
import { IsCalendarDate, IsOnOrAfter } from '../../../common/validators/compare-field.validator';
import { MAX_AMOUNT } from '../../../common/validators/field-rules';
import { RecurringFrequency } from '../entities/recurring-transaction.entity';

/** Body for both creation and full replacement. */
export class RecurringTransactionDto {
  @IsInt()
  @Min(1)
  accountId!: number;

  @IsInt()
  @Min(1)
  categoryId!: number;

  @IsNumber({ maxDecimalPlaces: 2 })
  @Max(MAX_AMOUNT)
  @Min(0)
  amount!: number;

  @IsString()
  @MaxLength(255)
  @IsOptional()
  description?: string;

  @IsCalendarDate()
  startDate!: string;

  // open-ended when omitted
  @IsCalendarDate()
  @IsOnOrAfter('startDate')
  @IsOptional()
  endDate?: string;

  @IsEnum(RecurringFrequency)
  frequency!: RecurringFrequency;
}
