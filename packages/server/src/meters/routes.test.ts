import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import express from 'express';
import type { Server } from 'http';
import { createTechemRegistry } from '../techem/index.js';
import type { Logger } from '../logger.js';
import { createWMBusRouter } from './routes.js';
import { WMBusMeterService } from './service.js';

const COLD_WATER = '2F446850122320417472A2069F23B301D016B50000000609090908080C09080A0A0A0A09080907080609090707060707000000';

function quietLogger(): Logger {
  const logger: Logger = {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    child: () => logger,
  };
  return logger;
}

describe('WMBus routes', () => {
  let server: Server;
  let service: WMBusMeterService;
  let baseUrl: string;

  beforeEach(async () => {
    const registry = createTechemRegistry(quietLogger());
    service = new WMBusMeterService(registry, { logger: quietLogger(), demoIntervalMs: 60_000 });
    const app = express();
    app.use(express.json());
    app.use('/api', createWMBusRouter(service, registry));
    server = await new Promise<Server>(resolve => {
      const s = app.listen(0, '127.0.0.1', () => resolve(s));
    });
    const address = server.address();
    if (typeof address !== 'object' || address === null) throw new Error('server has no port');
    baseUrl = `http://127.0.0.1:${address.port}/api/wmbus`;
  });

  afterEach(async () => {
    service.stopDemo();
    await new Promise<void>((resolve, reject) => server.close(err => (err ? reject(err) : resolve())));
  });

  function post(path: string, body: unknown): Promise<Response> {
    return fetch(`${baseUrl}${path}`, {
      method: 'POST',
      headers: { 'content-type': 'application/json' },
      body: JSON.stringify(body),
    });
  }

  describe('POST /frames', () => {
    it('decodes a frame and stores the meter', async () => {
      const res = await post('/frames', { hex: COLD_WATER, rssi: 10 });
      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({
        status: 'decoded',
        meterId: 'TCH-41202312',
        decoder: 'techem-mk3-cold-water',
        channels: {
          current_volume: 181,
          current_reading_date: '2018-11-13',
          past_volume: 435,
          past_reading_date: '2017-12-31',
          rssi: 10,
        },
      });

      const meter = await fetch(`${baseUrl}/meters/tch-41202312`);
      expect(meter.status).toBe(200);
      expect(await meter.json()).toMatchObject({ id: 'TCH-41202312', medium: 'cold_water' });
    });

    it('answers 400 with the error code for bad hex', async () => {
      const res = await post('/frames', { hex: 'zz', rssi: 1 });
      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ error: 'Frame is not a valid hex string', code: 'invalid_frame' });
    });

    it('answers 400 when rssi is missing', async () => {
      const res = await post('/frames', { hex: COLD_WATER });
      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ error: 'hex (string) and rssi (number) required' });
    });
  });

  describe('meters', () => {
    it('answers 404 for an unknown meter', async () => {
      const res = await fetch(`${baseUrl}/meters/TCH-00000000`);
      expect(res.status).toBe(404);
      expect(await res.json()).toEqual({ error: 'Meter not found' });
    });

    it('lists nothing before any frame arrives', async () => {
      const res = await fetch(`${baseUrl}/meters`);
      expect(await res.json()).toEqual([]);
    });
  });

  describe('config', () => {
    it.each([
      [{ meterIds: [1] }, 'meterIds must be an array of strings'],
      [{ meterIds: 'TCH-41202312' }, 'meterIds must be an array of strings'],
      [{ maxReadings: 0 }, 'maxReadings must be a positive integer'],
      [{ maxReadings: 2.5 }, 'maxReadings must be a positive integer'],
      [{ demo: 'yes' }, 'demo must be a boolean'],
    ])('rejects %j', async (body, error) => {
      const res = await post('/config', body);
      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ error });
    });

    it('applies a valid patch', async () => {
      const res = await post('/config', { meterIds: ['tch-41202312'], maxReadings: 10 });
      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({ meterIds: ['TCH-41202312'], maxReadings: 10, demo: false });
      expect(await (await fetch(`${baseUrl}/config`)).json()).toEqual({
        meterIds: ['TCH-41202312'],
        maxReadings: 10,
        demo: false,
      });
    });
  });

  it('toggles demo mode', async () => {
    const started = await post('/demo/start', {});
    expect(await started.json()).toEqual({ ok: true, config: { meterIds: [], maxReadings: 500, demo: true } });
    expect(service.getConfig().demo).toBe(true);

    const stopped = await post('/demo/stop', {});
    expect(await stopped.json()).toEqual({ ok: true, config: { meterIds: [], maxReadings: 500, demo: false } });
  });

  it('lists decoders and stats', async () => {
    const decoders = await (await fetch(`${baseUrl}/decoders`)).json();
    expect(Array.isArray(decoders) ? decoders.length : 0).toBe(6);

    await post('/frames', { hex: COLD_WATER, rssi: 10 });
    expect(await (await fetch(`${baseUrl}/stats`)).json()).toMatchObject({ totalMeters: 1, decoded: 1 });
  });
});
