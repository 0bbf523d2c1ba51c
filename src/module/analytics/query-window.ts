// src/module/analytics/query-window.ts
import type { FilterQuery, PipelineStage } from 'mongoose';
import { subHours } from 'date-fns';
import { InvalidQueryWindowError } from '../../common/errors/telemetry.errors';
import { metadataMatch } from '../readings/readings.filters';
import type { Reading } from '../readings/readings.schema';
import type { MetadataFilter } from '../readings/readings.types';

const MS_PER_DAY = 86_400_000;

const isValidDate = (d: Date) => d instanceof Date && !Number.isNaN(d.getTime());

/**
 * Inclusive `[start, end]` time range plus optional metadata filters.
 * Every analytics operation builds its `$match` stage from one of these.
 */
export class QueryWindow {
  private constructor(
    readonly start: Date,
    readonly end: Date,
    readonly filters: Readonly<MetadataFilter>,
  ) {}

  static between(start: Date, end: Date, filters: MetadataFilter = {}): QueryWindow {
    if (!isValidDate(start) || !isValidDate(end)) {
      throw new InvalidQueryWindowError('Query window bounds must be valid dates');
    }
    if (start.getTime() >= end.getTime()) {
      throw new InvalidQueryWindowError(
        `Query window start ${start.toISOString()} must be before end ${end.toISOString()}`,
      );
    }
    return new QueryWindow(start, end, { ...filters });
  }

  static lastHours(hours: number, filters: MetadataFilter = {}, now: Date = new Date()): QueryWindow {
    if (!Number.isFinite(hours) || hours <= 0) {
      throw new InvalidQueryWindowError(`Window length must be positive, got ${hours} hours`);
    }
    return QueryWindow.between(subHours(now, hours), now, filters);
  }

  static lastDays(days: number, filters: MetadataFilter = {}, now: Date = new Date()): QueryWindow {
    if (!Number.isFinite(days) || days <= 0) {
      throw new InvalidQueryWindowError(`Window length must be positive, got ${days} days`);
    }
    return QueryWindow.lastHours(days * 24, filters, now);
  }

  get durationDays(): number {
    return (this.end.getTime() - this.start.getTime()) / MS_PER_DAY;
  }

  withFilters(filters: MetadataFilter): QueryWindow {
    return new QueryWindow(this.start, this.end, { ...this.filters, ...filters });
  }

  /** Time range and metadata clauses, plus any operation-specific ones. */
  match(extra: FilterQuery<Reading> = {}): FilterQuery<Reading> {
    return {
      timestamp: { $gte: this.start, $lte: this.end },
      ...metadataMatch(this.filters),
      ...extra,
    };
  }

  matchStage(extra?: FilterQuery<Reading>): PipelineStage.Match {
    return { $match: this.match(extra) };
  }

  describe(): string {
    const scope = Object.entries(this.filters)
      .filter(([, v]) => v)
      .map(([k, v]) => `${k}=${v}`)
      .join(', ');
    const range = `${this.start.toISOString()} → ${this.end.toISOString()}`;
    return scope ? `${range} [${scope}]` : range;
  }
}
