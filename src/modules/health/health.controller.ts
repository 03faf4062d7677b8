import { Controller, Get } from '@nestjs/common';
import { SkipThrottle } from '@nestjs/throttler';
import { DatabaseService } from '../../database/database.service';

export type HealthStatus = {
  status: 'ok';
  database: 'up' | 'down';
};

@Controller('health')
@SkipThrottle()
export class HealthController {
  constructor(private readonly db: DatabaseService) {}

  /** Liveness plus a `SELECT 1` round trip; a down database does not fail the probe. */
  @Get()
  async health(): Promise<HealthStatus> {
    const up = await this.db.ping();
    return { status: 'ok', database: up ? 'up' : 'down' };
  }
}
