import { Controller, Get, ServiceUnavailableException } from '@nestjs/common';
import { SkipThrottle } from '@nestjs/throttler';
import { DatabaseService } from '../../database/database.service';

/**
 * HealthController - liveness probe including database connectivity
 * GET /api/health
 */
@Controller('health')
@SkipThrottle()
export class HealthController {
  constructor(private readonly databaseService: DatabaseService) {}

  @Get()
  async check() {
    const database = await this.databaseService.isHealthy();
    if (!database) {
      throw new ServiceUnavailableException({ status: 'unavailable', database });
    }
    return { status: 'ok', database };
  }
}
