import { IsInt, IsNumber, IsString, Max, MaxLength, Min, MinLength } from 'class-validator';
import { IsOmittable, MAX_AMOUNT } from '../../../common/validators/field-rules';

export class UpdateAccountDto {
  @IsString()
  @MinLength(3)
  @MaxLength(255)
  @IsOmittable()
  name?: string;

  @IsString()
  @MinLength(1)
  @MaxLength(255)
  @IsOmittable()
  type?: string;

  @IsNumber({ maxDecimalPlaces: 2 })
  @Max(MAX_AMOUNT)
  @Min(0)
  @IsOmittable()
  balance?: number;

  @IsInt()
  @Min(1)
  @IsOmittable()
  currencyId?: number;
}
