import { IsEnum, IsInt, IsNumber, IsOptional, IsString, Max, MaxLength, Min } from 'class-validator';
import { IsCalendarDate } from '../../../common/validators/compare-field.validator';
import { IsOmittable, MAX_AMOUNT } from '../../../common/validators/field-rules';
import { TransactionType } from '../entities/transaction.entity';

export class UpdateTransactionDto {
  @IsInt()
  @Min(1)
  @IsOmittable()
  accountId?: number;

  @IsInt()
  @Min(1)
  @IsOmittable()
  categoryId?: number;

  @IsNumber({ maxDecimalPlaces: 2 })
  @Max(MAX_AMOUNT)
  @Min(0)
  @IsOmittable()
  amount?: number;

  @IsString()
  @MaxLength(255)
  @IsOptional()
  description?: string | null;

  @IsCalendarDate()
  @IsOmittable()
  date?: string;

  @IsEnum(TransactionType)
  @IsOmittable()
  type?: TransactionType;
}
