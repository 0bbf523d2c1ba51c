import { getConnectionToken } from '@nestjs/mongoose';
import { Test } from '@nestjs/testing';
import { ConnectionError } from '../common/errors/telemetry.errors';
import { LoggerService } from '../common/logger/logger.service';
import { silentLogger } from '../../test/support/logger';
import { DatabaseHealthService, HEALTH_COLLECTION } from './database-health.service';

/** Just enough of a mongoose Connection for the probes. */
const fakeConnection = (opts: { open?: boolean; pingFails?: boolean; echo?: boolean } = {}) => {
  const { open = true, pingFails = false, echo = true } = opts;
  const probes = {
    insertOne: jest.fn().mockResolvedValue({ insertedId: 'probe-1' }),
    findOne: jest.fn().mockResolvedValue(echo ? { _id: 'probe-1', test: 'health_check' } : null),
    deleteOne: jest.fn().mockResolvedValue({ deletedCount: 1 }),
  };
  const ping = pingFails
    ? jest.fn().mockRejectedValue(new Error('connection refused'))
    : jest.fn().mockResolvedValue({ ok: 1 });
  const collection = jest.fn().mockReturnValue(probes);

  return {
    probes,
    collection,
    conn: {
      readyState: open ? 1 : 0,
      db: open ? { admin: () => ({ ping }), collection } : undefined,
    },
  };
};

describe('DatabaseHealthService', () => {
  const build = async (conn: unknown) => {
    const moduleRef = await Test.createTestingModule({
      providers: [
        { provide: getConnectionToken(), useValue: conn },
        { provide: LoggerService, useValue: silentLogger() },
        DatabaseHealthService,
      ],
    }).compile();
    return moduleRef.get(DatabaseHealthService);
  };

  it('round-trips a probe document through the scratch collection', async () => {
    const fake = fakeConnection();
    const health = await build(fake.conn);

    await expect(health.checkHealth()).resolves.toBeUndefined();
    expect(fake.collection).toHaveBeenCalledWith(HEALTH_COLLECTION);
    expect(fake.probes.deleteOne).toHaveBeenCalledWith({ _id: 'probe-1' });
  });

  it('fails when the ping is refused', async () => {
    const health = await build(fakeConnection({ pingFails: true }).conn);
    await expect(health.checkHealth()).rejects.toBeInstanceOf(ConnectionError);
  });

  it('fails when the probe cannot be read back', async () => {
    const fake = fakeConnection({ echo: false });
    const health = await build(fake.conn);

    await expect(health.checkHealth()).rejects.toThrow('Database health check failed');
    expect(fake.probes.deleteOne).toHaveBeenCalled();
  });

  it('fails when the connection never opened', async () => {
    const health = await build(fakeConnection({ open: false }).conn);
    await expect(health.checkHealth()).rejects.toThrow('MongoDB connection is not open');
  });

  it('reports status without throwing', async () => {
    await expect((await build(fakeConnection().conn)).status()).resolves.toEqual({
      connected: true,
      readyState: 1,
    });
    await expect((await build(fakeConnection({ pingFails: true }).conn)).status()).resolves.toEqual({
      connected: false,
      readyState: 1,
    });
    await expect((await build(fakeConnection({ open: false }).conn)).status()).resolves.toEqual({
      connected: false,
      readyState: 0,
    });
  });
});
