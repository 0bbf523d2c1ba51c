// src/module/retention/retention.service.ts
import { Inject, Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Cron, CronExpression } from '@nestjs/schedule';
import { subHours } from 'date-fns';
import { LoggerService } from '../../common/logger/logger.service';
import { ConfigurationError } from '../../common/errors/telemetry.errors';
import { READINGS_STORE, ReadingsStore } from '../readings/readings.store';

export const DEFAULT_RETENTION_DAYS = 30;

export interface PurgeResult {
  cutoff: Date;
  deleted: number;
}

/** `now − ageInDays`, computed on the clock rather than the calendar. */
export function retentionCutoff(ageInDays: number, now: Date): Date {
  return subHours(now, ageInDays * 24);
}

@Injectable()
export class RetentionService {
  private readonly retentionDays: number;

  constructor(
    @Inject(READINGS_STORE) private readonly store: ReadingsStore,
    private readonly logger: LoggerService,
    config: ConfigService,
  ) {
    this.retentionDays =
      config.get<number>('retention.days') ?? DEFAULT_RETENTION_DAYS;
  }

  get defaultDays(): number {
    return this.retentionDays;
  }

  /**
   * Deletes every document (health-status included) older than the
   * window. Running it again with no new old data deletes nothing.
   */
  async purgeOlderThan(
    ageInDays: number = this.retentionDays,
    now: Date = new Date(),
  ): Promise<PurgeResult> {
    if (!Number.isFinite(ageInDays) || ageInDays <= 0) {
      throw new ConfigurationError([
        `Retention age must be a positive number of days, got ${ageInDays}`,
      ]);
    }

    const cutoff = retentionCutoff(ageInDays, now);
    const deleted = await this.store.deleteWhere({ before: cutoff });

    this.logger.log(
      `🧹 Cleaned up ${deleted} old documents (older than ${ageInDays} days, cutoff ${cutoff.toISOString()})`,
      RetentionService.name,
    );
    return { cutoff, deleted };
  }

  /** Daily purge; a failure waits for the next day. */
  @Cron(CronExpression.EVERY_DAY_AT_MIDNIGHT, { name: 'retention-purge' })
  async handleScheduledPurge(): Promise<void> {
    try {
      await this.purgeOlderThan();
    } catch (err) {
      this.logger.failure('❌ Scheduled retention purge failed', err, RetentionService.name);
    }
  }
}
