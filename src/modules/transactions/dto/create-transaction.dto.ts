import { IsEnum, IsInt, IsNumber, IsOptional, IsString, Max, MaxLength, Min } from 'class-validator';
import { IsCalendarDate } from '../../../common/validators/compare-field.validator';
import { MAX_AMOUNT } from '../../../common/validators/field-rules';
import { TransactionType } from '../entities/transaction.entity';

export class CreateTransactionDto {
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
  date!: string;

  @IsEnum(TransactionType)
  type!: TransactionType;
}
