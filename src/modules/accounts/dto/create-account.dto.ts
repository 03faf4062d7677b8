import { IsInt, IsNumber, IsString, Max, MaxLength, Min, MinLength } from 'class-validator';
import { IsOmittable, MAX_AMOUNT } from '../../../common/validators/field-rules';

export class CreateAccountDto {
  @IsInt()
  @Min(1)
  userId!: number;

  @IsString()
  @MinLength(3)
  @MaxLength(255)
  name!: string;

  // e.g. "checking", "savings", "credit"
  @IsString()
  @MinLength(1)
  @MaxLength(255)
  type!: string;

  @IsNumber({ maxDecimalPlaces: 2 })
  @Max(MAX_AMOUNT)
  @Min(0)
  @IsOmittable()
  balance?: number;

  @IsInt()
  @Min(1)
  currencyId!: number;
}
