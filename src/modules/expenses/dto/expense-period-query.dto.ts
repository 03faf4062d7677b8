import { IsOptional } from 'class-validator';
import { IsCalendarDate, IsOnOrAfter } from '../../../common/validators/compare-field.validator';

export class ExpensePeriodQueryDto {
  @IsCalendarDate()
  @IsOptional()
  startDate?: string;

  @IsCalendarDate()
  @IsOnOrAfter('startDate')
  @IsOptional()
  endDate?: string;
}
