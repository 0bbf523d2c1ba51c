import { Controller, Get } from '@nestjs/common';
import { LoggerService } from '../../common/logger/logger.service';
import { DatabaseHealthService, DatabaseStatus } from '../../database/database-health.service';

@Controller('health')
export class HealthController {
  constructor(
    private readonly db: DatabaseHealthService,
    private readonly logger: LoggerService,
  ) {}

  @Get()
  async getHealth(): Promise<{ status: 'ok' | 'degraded'; database: DatabaseStatus }> {
    this.logger.debug('Health check ping', HealthController.name);
    const database = await this.db.status();
    return { status: database.connected ? 'ok' : 'degraded', database };
  }
}
