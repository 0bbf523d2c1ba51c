// src/module/retention/retention.controller.ts
import { Controller, HttpCode, HttpStatus, Post, Query } from '@nestjs/common';
import { RetentionService } from './retention.service';
import { PurgeQueryDto } from './dto/purge.dto';

@Controller('retention')
export class RetentionController {
  constructor(private readonly retention: RetentionService) {}

  @Post('purge')
  @HttpCode(HttpStatus.OK)
  async purge(@Query() q: PurgeQueryDto) {
    const days = q.days ?? this.retention.defaultDays;
    const { cutoff, deleted } = await this.retention.purgeOlderThan(days);
    return {
      data: { days, cutoff: cutoff.toISOString(), deleted },
      message: `Deleted ${deleted} document(s) older than ${days} days`,
    };
  }
}
