import { IsBoolean, IsEnum, IsInt, IsString, MaxLength, Min, MinLength } from 'class-validator';
import { IsCalendarDate } from '../../../common/validators/compare-field.validator';
import { IsOmittable } from '../../../common/validators/field-rules';
import { AlertType } from '../entities/alert.entity';

export class CreateAlertDto {
  @IsInt()
  @Min(1)
  userId!: number;

  @IsString()
  @MinLength(1)
  @MaxLength(255)
  message!: string;

  @IsEnum(AlertType)
  type!: AlertType;

  @IsCalendarDate()
  triggerDate!: string;

  @IsBoolean()
  @IsOmittable()
  isRead?: boolean;
}
