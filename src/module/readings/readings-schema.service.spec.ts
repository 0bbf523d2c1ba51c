import { SchemaSetupError } from '../../common/errors/telemetry.errors';
import { InMemoryReadingsStore } from '../../../test/support/in-memory-readings.store';
import { silentLogger } from '../../../test/support/logger';
import { isAlertArrayIndex, ReadingsSchemaService } from './readings-schema.service';

const REQUIRED_NAMES = [
  'timestamp_-1',
  'metadata.location_1',
  'metadata.building_1',
  'metadata.room_1',
  'timestamp_-1_metadata.location_1_metadata.building_1',
];

describe('ReadingsSchemaService', () => {
  let store: InMemoryReadingsStore;
  let service: ReadingsSchemaService;

  beforeEach(() => {
    store = new InMemoryReadingsStore();
    service = new ReadingsSchemaService(store, silentLogger());
  });

  it('creates the time-series collection and every required index', async () => {
    const report = await service.ensureSchema();

    expect(report).toEqual({
      collectionCreated: true,
      droppedIndexes: [],
      createdIndexes: REQUIRED_NAMES,
    });
    expect(store.createdWith).toEqual({
      timeField: 'timestamp',
      metaField: 'metadata',
      granularity: 'minutes',
    });
  });

  it('does nothing on a second run', async () => {
    await service.ensureSchema();
    const second = await service.ensureSchema();

    expect(second).toEqual({ collectionCreated: false, droppedIndexes: [], createdIndexes: [] });
    expect(store.indexes.map((idx) => idx.name)).toEqual(REQUIRED_NAMES);
  });

  it('only adds the indexes that are missing', async () => {
    store.exists = true;
    store.seedIndex({ timestamp: -1 });

    const report = await service.ensureSchema();
    expect(report.createdIndexes).toEqual(REQUIRED_NAMES.slice(1));
  });

  it('treats losing the create race as success', async () => {
    store.raceOnCreate = true;

    const report = await service.ensureSchema();
    expect(report.collectionCreated).toBe(false);
    expect(report.createdIndexes).toEqual(REQUIRED_NAMES);
  });

  it('drops indexes on the per-alert arrays', async () => {
    store.exists = true;
    const legacy = store.seedIndex({ alert_type: 1 });
    store.seedIndex({ timestamp: -1, severity: 1 });

    const report = await service.ensureSchema();

    expect(report.droppedIndexes).toEqual([legacy, 'timestamp_-1_severity_1']);
    expect(store.indexes.some(isAlertArrayIndex)).toBe(false);
  });

  it('keeps going when a legacy index cannot be dropped', async () => {
    store.exists = true;
    const stuck = store.seedIndex({ alert_message: 1 });
    store.undroppable.add(stuck);
    const logger = silentLogger();
    const warn = jest.spyOn(logger, 'warn');
    service = new ReadingsSchemaService(store, logger);

    const report = await service.ensureSchema();

    expect(report.droppedIndexes).toEqual([]);
    expect(report.createdIndexes).toEqual(REQUIRED_NAMES);
    expect(warn).toHaveBeenCalledWith(
      'Could not drop index alert_message_1: index not found with name',
      'ReadingsSchemaService',
    );
  });

  it('fails when the collection cannot be created', async () => {
    store.failCreate = true;
    await expect(service.ensureSchema()).rejects.toBeInstanceOf(SchemaSetupError);
  });

  it('wraps unexpected failures', async () => {
    store.exists = true;
    jest.spyOn(store, 'listIndexes').mockRejectedValue(new Error('socket closed'));

    await expect(service.ensureSchema()).rejects.toThrow('Schema setup for "serverRoomLogs" failed');
  });
});
