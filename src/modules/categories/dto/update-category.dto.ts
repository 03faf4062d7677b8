import { IsOptional, IsString, MaxLength, MinLength } from 'class-validator';
import { IsOmittable } from '../../../common/validators/field-rules';

export class UpdateCategoryDto {
  @IsString()
  @MinLength(3)
  @MaxLength(50)
  @IsOmittable()
  name?: string;

  @IsString()
  @MaxLength(255)
  @IsOptional()
  description?: string | null;
}
