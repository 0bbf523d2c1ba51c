// src/module/analytics/export.service.ts
import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { mkdir, writeFile } from 'fs/promises';
import { basename, join, resolve } from 'path';
import { LoggerService } from '../../common/logger/logger.service';
import { toPlain } from '../readings/readings.mapper';
import { AnalyticsService } from './analytics.service';
import { QueryWindow } from './query-window';

export interface ExportResult {
  path: string;
  documents: number;
}

/** One-shot dump of a window to a JSON file under EXPORT_DIR. */
@Injectable()
export class ExportService {
  private readonly exportDir: string;

  constructor(
    private readonly analytics: AnalyticsService,
    private readonly logger: LoggerService,
    config: ConfigService,
  ) {
    this.exportDir = resolve(config.get<string>('exportDir') ?? './exports');
  }

  async exportWindow(window: QueryWindow, filename: string): Promise<ExportResult | null> {
    const readings = await this.analytics.exportRange(window);
    if (readings === null) {
      this.logger.error(`❌ Export to ${filename} skipped: read failed`, undefined, ExportService.name);
      return null;
    }

    // never write outside the export directory
    const path = join(this.exportDir, basename(filename));
    try {
      await mkdir(this.exportDir, { recursive: true });
      await writeFile(path, JSON.stringify(readings.map(toPlain), null, 2), 'utf8');
    } catch (err) {
      this.logger.failure(`❌ Export to ${path} failed`, err, ExportService.name);
      return null;
    }

    this.logger.log(`✅ Exported ${readings.length} documents to ${path}`, ExportService.name);
    return { path, documents: readings.length };
  }
}
