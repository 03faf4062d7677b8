import { IsEmail, IsOptional, IsString, MaxLength, MinLength } from 'class-validator';
import { IsOmittable } from '../../../common/validators/field-rules';

export class UpdateUserDto {
  @IsOmittable()
  @IsEmail()
  @MaxLength(254)
  email?: string;

  @IsOmittable()
  @IsString()
  @MinLength(3)
  @MaxLength(50)
  username?: string;

  @IsOmittable()
  @IsString()
  @MinLength(1)
  @MaxLength(255)
  firstName?: string;

  @IsOmittable()
  @IsString()
  @MinLength(1)
  @MaxLength(255)
  lastName?: string;

  @IsOptional()
  @IsString()
  @MaxLength(255)
  avatar?: string | null;
}
