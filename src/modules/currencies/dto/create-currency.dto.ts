import { IsString, Matches, MaxLength, MinLength } from 'class-validator';

export class CreateCurrencyDto {
  // ISO 4217; stored upper-case
  @IsString()
  @Matches(/^[A-Za-z]{3}$/, { message: 'code must be a three-letter currency code' })
  code!: string;

  @IsString()
  @MinLength(1)
  @MaxLength(255)
  name!: string;

  @IsString()
  @MinLength(1)
  @MaxLength(10)
  symbol!: string;
}
