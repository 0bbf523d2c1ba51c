// src/module/analytics/analytics.controller.ts
import {
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  Post,
  Query,
  ServiceUnavailableException,
} from '@nestjs/common';
import { toPlain } from '../readings/readings.mapper';
import { AnalyticsService } from './analytics.service';
import { ExportService } from './export.service';
import { QueryWindow } from './query-window';
import {
  DaysQuery,
  ExportBody,
  RangeQuery,
  RecentQuery,
  SearchQuery,
  TrendParams,
  toMetadataFilter,
} from './dto/analytics.dto';

@Controller('analytics')
export class AnalyticsController {
  constructor(
    private readonly svc: AnalyticsService,
    private readonly exporter: ExportService,
  ) {}

  @Get('recent')
  async recent(@Query() q: RecentQuery) {
    const window = QueryWindow.lastHours(q.hours, toMetadataFilter(q));
    const rows = await this.svc.recent(window, q.limit);
    return { data: rows.map(toPlain) };
  }

  @Get('alerts')
  async alerts(@Query() q: DaysQuery) {
    const rows = await this.svc.alertSummary(QueryWindow.lastDays(q.days, toMetadataFilter(q)));
    return { data: rows };
  }

  @Get('trends/:metric')
  async trend(@Param() p: TrendParams, @Query() q: DaysQuery) {
    const rows = await this.svc.trend(p.metric, QueryWindow.lastDays(q.days, toMetadataFilter(q)));
    return { data: rows };
  }

  @Get('optimal')
  async optimal(@Query() q: DaysQuery) {
    const rows = await this.svc.optimalPeriods(QueryWindow.lastDays(q.days, toMetadataFilter(q)));
    return { data: rows.map(toPlain) };
  }

  @Get('metrics')
  async metrics(@Query() q: RangeQuery) {
    const window = QueryWindow.between(new Date(q.from), new Date(q.to), toMetadataFilter(q));
    const summary = await this.svc.aggregatedMetrics(window);
    return summary
      ? { data: summary }
      : { data: null, message: 'No readings in the requested window' };
  }

  @Get('quality')
  async quality(@Query() q: DaysQuery) {
    const report = await this.svc.dataQuality(QueryWindow.lastDays(q.days, toMetadataFilter(q)));
    return { data: report };
  }

  @Get('stats')
  async stats() {
    return { data: await this.svc.collectionStats() };
  }

  @Get('search')
  async search(@Query() q: SearchQuery) {
    const rows = await this.svc.searchByMetadata(toMetadataFilter(q), q.limit);
    return { data: rows.map(toPlain) };
  }

  @Get('range')
  async range(@Query() q: RangeQuery) {
    const window = QueryWindow.between(new Date(q.from), new Date(q.to), toMetadataFilter(q));
    const rows = await this.svc.timeRange(window, q.limit);
    return { data: rows.map(toPlain) };
  }

  @Post('export')
  @HttpCode(HttpStatus.OK)
  async export(@Body() body: ExportBody) {
    const result = await this.exporter.exportWindow(QueryWindow.lastDays(body.days), body.filename);
    if (!result) {
      throw new ServiceUnavailableException('Export failed: readings could not be read');
    }
    return { data: result, message: `Exported ${result.documents} documents` };
  }
}
