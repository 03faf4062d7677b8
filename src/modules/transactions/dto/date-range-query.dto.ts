import { Type } from 'class-transformer';
import { IsInt, IsOptional, Min } from 'class-validator';
import { IsCalendarDate, IsOnOrAfter } from '../../../common/validators/compare-field.validator';

export class DateRangeQueryDto {
  @IsCalendarDate()
  startDate!: string;

  @IsCalendarDate()
  @IsOnOrAfter('startDate')
  endDate!: string;

  @Type(() => Number)
  @IsInt()
  @Min(1)
  @IsOptional()
  accountId?: number;
}
