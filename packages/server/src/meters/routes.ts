/**
 * Wireless M-Bus REST API Routes
 */
import { Router } from 'express';
import type { WMBusConfig } from '@meterbus/shared';
import { isDecodingError } from '../wmbus/errors.js';
import type { DecoderRegistry } from '../wmbus/registry.js';
import type { WMBusMeterService } from './service.js';

function parseConfigPatch(body: unknown): Partial<WMBusConfig> | string {
  if (typeof body !== 'object' || body === null) return 'JSON object body required';
  const patch: Partial<WMBusConfig> = {};
  if ('meterIds' in body) {
    const ids = body.meterIds;
    if (!Array.isArray(ids) || !ids.every((id): id is string => typeof id === 'string')) {
      return 'meterIds must be an array of strings';
    }
    patch.meterIds = ids;
  }
  if ('maxReadings' in body) {
    if (typeof body.maxReadings !== 'number' || !Number.isInteger(body.maxReadings) || body.maxReadings < 1) {
      return 'maxReadings must be a positive integer';
    }
    patch.maxReadings = body.maxReadings;
  }
  if ('demo' in body) {
    if (typeof body.demo !== 'boolean') return 'demo must be a boolean';
    patch.demo = body.demo;
  }
  return patch;
}

export function createWMBusRouter(service: WMBusMeterService, registry: DecoderRegistry): Router {
  const router = Router();

  router.get('/wmbus/meters', (_req, res) => {
    res.json(service.getMeters());
  });

  router.get('/wmbus/meters/:id', (req, res) => {
    const meter = service.getMeter(req.params.id);
    if (!meter) return res.status(404).json({ error: 'Meter not found' });
    res.json(meter);
  });

  router.get('/wmbus/stats', (_req, res) => {
    res.json(service.getStats());
  });

  router.get('/wmbus/decoders', (_req, res) => {
    res.json(registry.list());
  });

  router.get('/wmbus/config', (_req, res) => {
    res.json(service.getConfig());
  });

  router.post('/wmbus/config', (req, res) => {
    const patch = parseConfigPatch(req.body);
    if (typeof patch === 'string') return res.status(400).json({ error: patch });
    res.json(service.updateConfig(patch));
  });

  router.post('/wmbus/frames', (req, res) => {
    const { hex, rssi } = req.body ?? {};
    if (typeof hex !== 'string' || typeof rssi !== 'number') {
      return res.status(400).json({ error: 'hex (string) and rssi (number) required' });
    }
    try {
      res.json(service.processHex(hex, rssi));
    } catch (err) {
      if (!isDecodingError(err)) throw err;
      res.status(400).json({ error: err.message, code: err.code });
    }
  });

  router.post('/wmbus/demo/start', (_req, res) => {
    service.startDemo();
    res.json({ ok: true, config: service.getConfig() });
  });

  router.post('/wmbus/demo/stop', (_req, res) => {
    service.stopDemo();
    res.json({ ok: true, config: service.getConfig() });
  });

  return router;
}
