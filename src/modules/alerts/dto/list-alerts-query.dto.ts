import { Transform } from 'class-transformer';
import { IsBoolean, IsOptional } from 'class-validator';

export class ListAlertsQueryDto {
  // Reads the raw query value: implicit conversion would turn "false" into true.
  @Transform(({ obj, key }) => {
    const raw: unknown = Reflect.get(obj, key);
    return raw === true || raw === 'true';
  })
  @IsBoolean()
  @IsOptional()
  unreadOnly?: boolean;
}
