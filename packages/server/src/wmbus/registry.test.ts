import { describe, it, expect, vi } from 'vitest';
import type { DeviceSignature, WMBusFrame } from '@meterbus/shared';
import { DecoderRegistry, signatureKey, type FrameDecoder } from './registry.js';
import { DecodingError } from './errors.js';
import { MeterRecord } from './record.js';
import { parseFrame } from './frame.js';
import { createTechemRegistry } from '../techem/index.js';
import type { Logger } from '../logger.js';

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

function stubDecoder(name: string, signature: DeviceSignature, decode: FrameDecoder['decode']): FrameDecoder {
  return {
    name,
    signature,
    reportsTemperature: false,
    describe: () => ({ name, medium: 'cold_water', signature, reportsTemperature: false, codings: [] }),
    decode: vi.fn(decode),
  };
}

const SIG_A: DeviceSignature = { manufacturer: 'TCH', version: 0x74, deviceType: 0x72 };
const SIG_B: DeviceSignature = { manufacturer: 'TCH', version: 0x69, deviceType: 0x80 };

describe('signatureKey', () => {
  it('formats manufacturer, version and type', () => {
    expect(signatureKey(SIG_A)).toBe('TCH:74:72');
    expect(signatureKey({ manufacturer: 'KAM', version: 0x1b, deviceType: 0x06 })).toBe('KAM:1B:06');
  });
});

describe('DecoderRegistry', () => {
  const frame: WMBusFrame = parseFrame(COLD_WATER, 10);

  it('reports an unknown device without calling any decoder', () => {
    const a = stubDecoder('a', { ...SIG_A, version: 0x01 }, () => null);
    const b = stubDecoder('b', SIG_B, () => null);
    const registry = new DecoderRegistry([a, b], { logger: quietLogger() });

    const result = registry.dispatch(frame);

    expect(result).toEqual({ status: 'unknown_device', signature: SIG_A });
    expect(a.decode).not.toHaveBeenCalled();
    expect(b.decode).not.toHaveBeenCalled();
  });

  it('tries decoders in registration order until one applies', () => {
    const first = stubDecoder('first', SIG_A, () => null);
    const second = stubDecoder('second', SIG_A, f => [new MeterRecord('rssi', f.rssi)]);
    const third = stubDecoder('third', SIG_A, () => []);
    const registry = new DecoderRegistry([first, second, third], { logger: quietLogger() });

    const result = registry.dispatch(frame);

    expect(result.status).toBe('decoded');
    if (result.status !== 'decoded') return;
    expect(result.decoder.name).toBe('second');
    expect(result.records.map(r => r.toString())).toEqual(['rssi=10']);
    expect(Object.isFrozen(result.records)).toBe(true);
    expect(first.decode).toHaveBeenCalledTimes(1);
    expect(third.decode).not.toHaveBeenCalled();
  });

  it('reports unrecognized when every matching decoder declines', () => {
    const registry = new DecoderRegistry([stubDecoder('a', SIG_A, () => null)], { logger: quietLogger() });
    expect(registry.dispatch(frame)).toEqual({ status: 'unrecognized', signature: SIG_A });
  });

  it('reports a decoding failure and stops', () => {
    const error = new DecodingError('invalid_field', 'bad date', 12);
    const failing = stubDecoder('failing', SIG_A, () => { throw error; });
    const next = stubDecoder('next', SIG_A, () => []);
    const registry = new DecoderRegistry([failing, next], { logger: quietLogger() });

    const result = registry.dispatch(frame);

    expect(result).toMatchObject({ status: 'failed', error });
    expect(next.decode).not.toHaveBeenCalled();
  });

  it('lets programming errors propagate', () => {
    const broken = stubDecoder('broken', SIG_A, () => { throw new TypeError('boom'); });
    const registry = new DecoderRegistry([broken], { logger: quietLogger() });
    expect(() => registry.dispatch(frame)).toThrow(TypeError);
  });

  it('traces through the injected logger', () => {
    const logger = quietLogger();
    new DecoderRegistry([], { logger }).dispatch(frame);
    expect(logger.debug).toHaveBeenCalledWith('no decoder for TCH:74:72');
  });

  it('refuses registrations once sealed', () => {
    const registry = new DecoderRegistry([], { logger: quietLogger() }).seal();
    expect(() => registry.register(stubDecoder('late', SIG_A, () => null))).toThrow(/sealed/);
  });

  it('looks up by signature', () => {
    const a = stubDecoder('a', SIG_A, () => null);
    const registry = new DecoderRegistry([a], { logger: quietLogger() });
    expect(registry.lookup(SIG_A)).toEqual([a]);
    expect(registry.lookup(SIG_B)).toEqual([]);
  });
});

describe('createTechemRegistry', () => {
  it('decodes the cold water frame end to end', () => {
    const registry = createTechemRegistry(quietLogger());
    const result = registry.dispatch(parseFrame(COLD_WATER, 10));
    expect(result.status).toBe('decoded');
    if (result.status !== 'decoded') return;
    expect(result.decoder.name).toBe('techem-mk3-cold-water');
    expect(result.records.map(r => r.kind)).toEqual([
      'current_volume',
      'current_reading_date',
      'past_volume',
      'past_reading_date',
      'rssi',
    ]);
  });

  it('lists all six variants', () => {
    expect(createTechemRegistry(quietLogger()).list().map(d => d.name)).toEqual([
      'techem-hkv-94',
      'techem-hkv-100',
      'techem-hkv-105',
      'techem-hkv-118',
      'techem-mk3-cold-water',
      'techem-mk3-warm-water',
    ]);
  });
});
