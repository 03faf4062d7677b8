import { IsBoolean, IsEnum, IsString, MaxLength, MinLength } from 'class-validator';
import { IsCalendarDate } from '../../../common/validators/compare-field.validator';
import { IsOmittable } from '../../../common/validators/field-rules';
import { AlertType } from '../entities/alert.entity';

export class UpdateAlertDto {
  @IsString()
  @MinLength(1)
  @MaxLength(255)
  @IsOmittable()
  message?: string;

  @IsEnum(AlertType)
  @IsOmittable()
  type?: AlertType;

  @IsCalendarDate()
  @IsOmittable()
  triggerDate?: string;

  @IsBoolean()
  @IsOmittable()
  isRead?: boolean;
}
