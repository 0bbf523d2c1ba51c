// src/module/ingestion/ingestion.service.ts
import {
  BeforeApplicationShutdown,
  Inject,
  Injectable,
  OnApplicationBootstrap,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Cron, CronExpression } from '@nestjs/schedule';
import { LoggerService } from '../../common/logger/logger.service';
import { VerificationMismatchError } from '../../common/errors/telemetry.errors';
import { READINGS_STORE, ReadingsStore } from '../readings/readings.store';
import { StoredReading } from '../readings/readings.types';
import { ThresholdsService } from '../thresholds/thresholds.service';
import { AlertReporterService } from '../thresholds/alert-reporter.service';
import { evaluateReading, healthStatusAlert } from '../thresholds/threshold-evaluator';
import { SensorSimulatorService } from './sensor-simulator.service';

export type IngestOutcome =
  | { status: 'stored'; id: string; reading: StoredReading }
  | { status: 'write_failed'; reason: string }
  | { status: 'unverified'; id: string; reason: string };

export interface IngestionStatus {
  running: boolean;
  intervalMs: number;
  cycles: number;
  lastCycleAt: Date | null;
  lastOutcome: IngestOutcome['status'] | null;
}

const reasonOf = (err: unknown) => (err instanceof Error ? err.message : String(err));

/**
 * Drives the write path: evaluate → insert → read back, one reading at a
 * time. The next tick is only scheduled once the current cycle settles,
 * so a slow store delays the cadence instead of queueing work.
 */
@Injectable()
export class IngestionService implements OnApplicationBootstrap, BeforeApplicationShutdown {
  private readonly intervalMs: number;
  private readonly simulationEnabled: boolean;

  private running = false;
  private timer: NodeJS.Timeout | null = null;
  private inFlight: Promise<IngestOutcome> | null = null;
  /** every ingest() not yet settled, loop and cron alike */
  private readonly pending = new Set<Promise<IngestOutcome>>();
  private cycles = 0;
  private lastCycleAt: Date | null = null;
  private lastOutcome: IngestOutcome['status'] | null = null;

  constructor(
    @Inject(READINGS_STORE) private readonly store: ReadingsStore,
    private readonly thresholds: ThresholdsService,
    private readonly reporter: AlertReporterService,
    private readonly simulator: SensorSimulatorService,
    private readonly logger: LoggerService,
    config: ConfigService,
  ) {
    this.intervalMs = config.get<number>('ingestion.intervalMs') ?? 60_000;
    this.simulationEnabled = config.get<boolean>('ingestion.simulationEnabled') ?? true;
  }

  onApplicationBootstrap(): void {
    if (this.simulationEnabled) this.start();
  }

  async beforeApplicationShutdown(): Promise<void> {
    await this.stop();
  }

  /** Attaches the alerts a reading must carry when it is written. */
  annotate(reading: StoredReading): StoredReading {
    if (reading.kind === 'health_status') {
      return { ...reading, alerts: [healthStatusAlert(reading.message)] };
    }
    return { ...reading, alerts: evaluateReading(reading.metrics, this.thresholds.get()) };
  }

  /**
   * One reading through the pipeline. Write and verification failures
   * are logged and reported in the outcome; the reading is not retried.
   * stop() waits for every call still running.
   */
  ingest(reading: StoredReading): Promise<IngestOutcome> {
    const write = this.write(reading);
    this.pending.add(write);
    return write.finally(() => this.pending.delete(write));
  }

  private async write(reading: StoredReading): Promise<IngestOutcome> {
    const annotated = this.annotate(reading);
    if (annotated.kind === 'reading' && annotated.alerts.length > 0) {
      this.reporter.logAlerts(annotated.alerts);
    }

    let id: string;
    try {
      id = await this.store.insert(annotated);
    } catch (err) {
      this.logger.failure('❌ Failed to insert sensor data', err, IngestionService.name);
      return { status: 'write_failed', reason: reasonOf(err) };
    }

    try {
      const saved = await this.store.findById(id);
      if (!saved) throw new VerificationMismatchError(id);
    } catch (err) {
      this.logger.failure('❌ Data insertion verification failed', err, IngestionService.name);
      return { status: 'unverified', id, reason: reasonOf(err) };
    }

    this.logger.log(this.describe(annotated), IngestionService.name);
    return { status: 'stored', id, reading: { ...annotated, id } };
  }

  /** Generate one simulated reading and ingest it. Never throws. */
  async runCycle(now: Date = new Date()): Promise<IngestOutcome> {
    let outcome: IngestOutcome;
    try {
      outcome = await this.ingest(this.simulator.generateReading(now));
    } catch (err) {
      this.logger.failure('❌ Error in simulation cycle', err, IngestionService.name);
      outcome = { status: 'write_failed', reason: reasonOf(err) };
    }

    this.cycles += 1;
    this.lastCycleAt = now;
    this.lastOutcome = outcome.status;
    return outcome;
  }

  @Cron(CronExpression.EVERY_DAY_AT_1AM, { name: 'health-status' })
  async emitHealthStatus(): Promise<IngestOutcome | null> {
    if (!this.simulationEnabled) return null;

    try {
      return await this.ingest(this.simulator.generateHealthStatus());
    } catch (err) {
      this.logger.failure('❌ Error emitting health status', err, IngestionService.name);
      return null;
    }
  }

  start(): void {
    // a stopping loop still owns its last tick
    if (this.running || this.inFlight) return;
    this.running = true;
    this.logger.log(
      `▶️  Ingestion loop started (every ${this.intervalMs} ms)`,
      IngestionService.name,
    );
    this.schedule(0);
  }

  /**
   * Stops scheduling and waits for every write still in flight, the
   * loop's cycle and any health-status insert included.
   */
  async stop(): Promise<void> {
    const wasRunning = this.running;
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }

    const outstanding: Promise<unknown>[] = [...this.pending];
    if (this.inFlight) outstanding.push(this.inFlight);
    if (outstanding.length > 0) {
      this.logger.log(
        `⏳ Waiting for ${this.pending.size} in-flight write(s) to finish`,
        IngestionService.name,
      );
      await Promise.allSettled(outstanding);
    }

    if (wasRunning) this.logger.log('⏹️  Ingestion loop stopped', IngestionService.name);
  }

  status(): IngestionStatus {
    return {
      running: this.running,
      intervalMs: this.intervalMs,
      cycles: this.cycles,
      lastCycleAt: this.lastCycleAt,
      lastOutcome: this.lastOutcome,
    };
  }

  private schedule(delayMs: number): void {
    this.timer = setTimeout(() => void this.tick(), delayMs);
  }

  private async tick(): Promise<void> {
    this.timer = null;
    this.inFlight = this.runCycle();
    try {
      await this.inFlight;
    } finally {
      this.inFlight = null;
      if (this.running) this.schedule(this.intervalMs);
    }
  }

  private describe(reading: StoredReading): string {
    const at = reading.timestamp.toISOString();
    if (reading.kind === 'health_status') {
      return `[${at}] Health status: ${reading.status} - ${reading.message}`;
    }

    const { temperature, humidity } = reading.metrics;
    const line = `[${at}] Temp: ${temperature ?? 'N/A'}°F, Humidity: ${humidity ?? 'N/A'}%`;
    return reading.alerts.length ? `${line} - ALERTS: ${reading.alerts.length}` : line;
  }
}
