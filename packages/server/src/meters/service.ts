// ============================================================================
// Meterbus: Wireless M-Bus Meter Service
// ============================================================================
import { EventEmitter } from 'events';
import type {
  DeviceMedium,
  DeviceSignature,
  WMBusChannels,
  WMBusConfig,
  WMBusFrame,
  WMBusFrameResult,
  WMBusMeter,
  WMBusReading,
  WMBusStats,
} from '@meterbus/shared';
import { createLogger, type Logger } from '../logger.js';
import { bytesToHex, meterIdOf, parseFrame } from '../wmbus/frame.js';
import { formatDate, isRecordOf, type MeterRecord } from '../wmbus/record.js';
import { signatureKey, type DecoderRegistry } from '../wmbus/registry.js';
import { encodeTechemFrame, TECHEM_VARIANTS, type TechemVariant } from '../techem/index.js';

export interface WMBusMeterServiceOptions {
  config?: Partial<WMBusConfig>;
  logger?: Logger;
  demoIntervalMs?: number;
}

export interface WMBusReadingEvent {
  meter: WMBusMeter;
  reading: WMBusReading;
}

export interface WMBusUnknownDeviceEvent {
  meterId: string;
  signature: DeviceSignature;
}

export function recordsToChannels(records: readonly MeterRecord[]): WMBusChannels {
  const channels: WMBusChannels = {};
  for (const r of records) {
    if (isRecordOf(r, 'current_volume')) channels.current_volume = r.value;
    else if (isRecordOf(r, 'past_volume')) channels.past_volume = r.value;
    else if (isRecordOf(r, 'current_reading_date')) channels.current_reading_date = formatDate(r.value);
    else if (isRecordOf(r, 'past_reading_date')) channels.past_reading_date = formatDate(r.value);
    else if (isRecordOf(r, 'room_temperature')) channels.room_temperature = r.value.value;
    else if (isRecordOf(r, 'radiator_temperature')) channels.radiator_temperature = r.value.value;
    else if (isRecordOf(r, 'rssi')) channels.rssi = r.value;
  }
  return channels;
}

export class WMBusMeterService extends EventEmitter {
  private meters = new Map<string, WMBusMeter>();
  private config: WMBusConfig = { meterIds: [], maxReadings: 500, demo: false };
  private counters = { framesReceived: 0, decoded: 0, unrecognized: 0, unknownDevice: 0, failed: 0, filtered: 0 };
  private demoInterval: ReturnType<typeof setInterval> | null = null;
  private demoTick = 0;
  private log: Logger;
  private demoIntervalMs: number;

  constructor(private registry: DecoderRegistry, options: WMBusMeterServiceOptions = {}) {
    super();
    this.log = options.logger ?? createLogger('WMBus');
    this.demoIntervalMs = options.demoIntervalMs ?? 5000;
    this.updateConfig(options.config ?? {});
  }

  getMeters(): WMBusMeter[] { return Array.from(this.meters.values()); }
  getMeter(id: string): WMBusMeter | undefined { return this.meters.get(id.toUpperCase()); }
  getConfig(): WMBusConfig { return { ...this.config, meterIds: [...this.config.meterIds] }; }

  updateConfig(cfg: Partial<WMBusConfig>): WMBusConfig {
    if (cfg.meterIds) this.config.meterIds = cfg.meterIds.map(id => id.trim().toUpperCase()).filter(Boolean);
    if (cfg.maxReadings !== undefined) {
      if (!Number.isInteger(cfg.maxReadings) || cfg.maxReadings < 1) {
        throw new RangeError(`maxReadings must be a positive integer, got ${cfg.maxReadings}`);
      }
      this.config.maxReadings = cfg.maxReadings;
    }
    if (cfg.demo === true) this.startDemo();
    if (cfg.demo === false) this.stopDemo();
    return this.getConfig();
  }

  getStats(): WMBusStats {
    const byMedium: Record<DeviceMedium, number> = { heat_cost_allocator: 0, cold_water: 0, warm_water: 0 };
    for (const m of this.meters.values()) byMedium[m.medium]++;
    return { totalMeters: this.meters.size, ...this.counters, byMedium };
  }

  processHex(hex: string, rssi: number): WMBusFrameResult {
    return this.processFrame(parseFrame(hex, rssi));
  }

  processFrame(frame: WMBusFrame): WMBusFrameResult {
    const meterId = meterIdOf(frame.address);
    this.counters.framesReceived++;

    if (this.config.meterIds.length > 0 && !this.config.meterIds.includes(meterId)) {
      this.counters.filtered++;
      return { status: 'filtered', meterId };
    }

    const result = this.registry.dispatch(frame);
    switch (result.status) {
      case 'unknown_device':
        this.counters.unknownDevice++;
        this.emit('unknown_device', { meterId, signature: result.signature } satisfies WMBusUnknownDeviceEvent);
        return { status: result.status, meterId };

      case 'unrecognized':
        this.counters.unrecognized++;
        this.log.debug(`${meterId}: frame layout not handled by ${signatureKey(result.signature)} decoders`);
        return { status: result.status, meterId };

      case 'failed':
        this.counters.failed++;
        this.log.debug(`${meterId}: could not decode frame ${bytesToHex(frame.bytes)}`, result.error.message);
        this.emit('decode_error', { meterId, decoder: result.decoder.name, error: result.error });
        return { status: result.status, meterId, decoder: result.decoder.name, error: result.error.message };

      case 'decoded': {
        this.counters.decoded++;
        const reading: WMBusReading = {
          timestamp: frame.receivedAt,
          decoder: result.decoder.name,
          channels: recordsToChannels(result.records),
        };
        const meter = this.upsertMeter(meterId, frame, result.decoder.describe().medium, result.decoder.name);
        meter.lastReading = reading;
        meter.readings.push(reading);
        if (meter.readings.length > this.config.maxReadings) {
          meter.readings = meter.readings.slice(-this.config.maxReadings);
        }
        this.emit('reading', { meter, reading } satisfies WMBusReadingEvent);
        return { status: result.status, meterId, decoder: result.decoder.name, channels: reading.channels };
      }
    }
  }

  private upsertMeter(id: string, frame: WMBusFrame, medium: DeviceMedium, decoder: string): WMBusMeter {
    const { address } = frame;
    let meter = this.meters.get(id);
    if (!meter) {
      meter = {
        id, manufacturer: address.manufacturer, identNumber: address.identNumber,
        version: address.version, deviceType: address.deviceType, medium, decoder,
        firstSeen: frame.receivedAt, lastSeen: frame.receivedAt, rssi: frame.rssi,
        readings: [], lastReading: null,
      };
      this.meters.set(id, meter);
      this.log.info(`🔥 New meter ${id} (${decoder})`);
    }
    meter.lastSeen = frame.receivedAt;
    meter.rssi = frame.rssi;
    meter.decoder = decoder;
    return meter;
  }

  /** One synthetic frame per known variant, round robin. */
  demoFrame(tick: number, now = new Date()): WMBusFrame {
    const variant: TechemVariant = TECHEM_VARIANTS[tick % TECHEM_VARIANTS.length];
    const year = now.getFullYear();
    const month = now.getMonth() + 1;
    const day = now.getDate();
    // the billing date must not fall after today within the current year
    const billingYear = month === 12 && day === 31 ? year : year - 1;
    const bytes = encodeTechemFrame(variant, {
      identNumber: String(10000000 + (tick % TECHEM_VARIANTS.length) * 1111).padStart(8, '0'),
      pastDate: { year: billingYear, month: 12, day: 31 },
      pastValue: 400 + (tick % 97),
      currentDate: { year, month, day },
      currentValue: (10 + tick) % 60000,
      roomTemperature: 2000 + (tick % 300),
      radiatorTemperature: 3500 + (tick % 1500),
    });
    return parseFrame(bytes, -60 - (tick % 30), now.getTime());
  }

  startDemo() {
    this.config.demo = true;
    if (this.demoInterval) return;
    this.log.info('🔥 Demo frames enabled');
    this.demoInterval = setInterval(() => {
      this.demoTick++;
      this.processFrame(this.demoFrame(this.demoTick));
    }, this.demoIntervalMs);
  }

  stopDemo() {
    if (this.demoInterval) { clearInterval(this.demoInterval); this.demoInterval = null; }
    this.config.demo = false;
  }
}
