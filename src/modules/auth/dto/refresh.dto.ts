import { IsOptional, IsString, MinLength } from 'class-validator';

// Read by JwtRefreshStrategy, which falls back to the Bearer header when absent.
export class RefreshDto {
  @IsString()
  @MinLength(1)
  @IsOptional()
  refreshToken?: string;
}
