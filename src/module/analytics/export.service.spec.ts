import { ConfigService } from '@nestjs/config';
import { mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { InMemoryReadingsStore } from '../../../test/support/in-memory-readings.store';
import { silentLogger } from '../../../test/support/logger';
import { reading } from '../../../test/support/fixtures';
import { AnalyticsService } from './analytics.service';
import { ExportService } from './export.service';
import { QueryWindow } from './query-window';

describe('ExportService', () => {
  const now = new Date('2025-03-10T12:00:00.000Z');
  const window = QueryWindow.lastDays(1, {}, now);

  let dir: string;
  let analytics: AnalyticsService;
  let service: ExportService;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'telemetry-export-'));
    analytics = new AnalyticsService(new InMemoryReadingsStore(), silentLogger());
    service = new ExportService(analytics, silentLogger(), new ConfigService({ exportDir: dir }));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('writes the window as pretty JSON with ISO timestamps', async () => {
    jest
      .spyOn(analytics, 'exportRange')
      .mockResolvedValue([reading(new Date('2025-03-10T10:00:00.000Z'), { temperature: 70 })]);

    const result = await service.exportWindow(window, 'dump.json');

    expect(result).toEqual({ path: join(dir, 'dump.json'), documents: 1 });
    const written: unknown = JSON.parse(await readFile(join(dir, 'dump.json'), 'utf8'));
    expect(written).toEqual([
      expect.objectContaining({
        kind: 'reading',
        timestamp: '2025-03-10T10:00:00.000Z',
        metrics: { temperature: 70 },
      }),
    ]);
  });

  it('keeps the file inside the export directory', async () => {
    jest.spyOn(analytics, 'exportRange').mockResolvedValue([]);

    const result = await service.exportWindow(window, '../../outside.json');
    expect(result?.path).toBe(join(dir, 'outside.json'));
  });

  it('writes nothing when the read fails', async () => {
    jest.spyOn(analytics, 'exportRange').mockResolvedValue(null);

    await expect(service.exportWindow(window, 'dump.json')).resolves.toBeNull();
    await expect(readFile(join(dir, 'dump.json'), 'utf8')).rejects.toThrow();
  });

  it('reports a directory it cannot create instead of throwing', async () => {
    const blocker = join(dir, 'not-a-dir');
    await writeFile(blocker, '', 'utf8');
    const logger = silentLogger();
    const failure = jest.spyOn(logger, 'failure');
    service = new ExportService(analytics, logger, new ConfigService({ exportDir: blocker }));
    jest.spyOn(analytics, 'exportRange').mockResolvedValue([]);

    await expect(service.exportWindow(window, 'dump.json')).resolves.toBeNull();
    expect(failure).toHaveBeenCalledWith(
      `❌ Export to ${join(blocker, 'dump.json')} failed`,
      expect.any(Error),
      'ExportService',
    );
  });
});
