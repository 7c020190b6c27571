// ============================================================================
// Meterbus: Decoder registry
// Selects frame decoders by device signature (manufacturer, version, type).
// ============================================================================
import type { DecoderInfo, DeviceSignature, WMBusFrame } from '@meterbus/shared';
import { createLogger, type Logger } from '../logger.js';
import { DecodingError } from './errors.js';
import type { MeterRecord } from './record.js';

export interface FrameDecoder {
  readonly name: string;
  readonly signature: DeviceSignature;
  readonly reportsTemperature: boolean;
  describe(): DecoderInfo;
  /**
   * Full record list, or null when the frame is a layout this decoder does not
   * handle. Throws DecodingError when the frame is broken.
   */
  decode(frame: WMBusFrame): MeterRecord[] | null;
}

export type DispatchResult =
  | { status: 'decoded'; signature: DeviceSignature; decoder: FrameDecoder; records: readonly MeterRecord[] }
  | { status: 'unrecognized'; signature: DeviceSignature }
  | { status: 'unknown_device'; signature: DeviceSignature }
  | { status: 'failed'; signature: DeviceSignature; decoder: FrameDecoder; error: DecodingError };

const hex2 = (n: number) => n.toString(16).toUpperCase().padStart(2, '0');

export function signatureKey(sig: DeviceSignature): string {
  return `${sig.manufacturer}:${hex2(sig.version)}:${hex2(sig.deviceType)}`;
}

export function signatureOf(frame: WMBusFrame): DeviceSignature {
  const { manufacturer, version, deviceType } = frame.address;
  return { manufacturer, version, deviceType };
}

export interface DecoderRegistryOptions {
  logger?: Logger;
}

export class DecoderRegistry {
  private decoders = new Map<string, FrameDecoder[]>();
  private sealed = false;
  private log: Logger;

  constructor(decoders: FrameDecoder[] = [], options: DecoderRegistryOptions = {}) {
    this.log = options.logger ?? createLogger('Registry');
    for (const d of decoders) this.register(d);
  }

  register(decoder: FrameDecoder): this {
    if (this.sealed) throw new Error(`Registry is sealed, cannot add ${decoder.name}`);
    const key = signatureKey(decoder.signature);
    const list = this.decoders.get(key) ?? [];
    list.push(decoder);
    this.decoders.set(key, list);
    this.log.debug(`registered ${decoder.name} for ${key}`);
    return this;
  }

  /** Stop accepting registrations; lookups are read-only from here on. */
  seal(): this {
    this.sealed = true;
    return this;
  }

  lookup(signature: DeviceSignature): readonly FrameDecoder[] {
    return this.decoders.get(signatureKey(signature)) ?? [];
  }

  list(): DecoderInfo[] {
    return Array.from(this.decoders.values()).flat().map(d => d.describe());
  }

  dispatch(frame: WMBusFrame): DispatchResult {
    const signature = signatureOf(frame);
    const candidates = this.lookup(signature);
    if (candidates.length === 0) {
      this.log.debug(`no decoder for ${signatureKey(signature)}`);
      return { status: 'unknown_device', signature };
    }

    for (const decoder of candidates) {
      let records: MeterRecord[] | null;
      try {
        records = decoder.decode(frame);
      } catch (err) {
        if (!(err instanceof DecodingError)) throw err;
        this.log.debug(`${decoder.name} could not decode frame: ${err.message}`);
        return { status: 'failed', signature, decoder, error: err };
      }
      if (records) {
        return { status: 'decoded', signature, decoder, records: Object.freeze(records) };
      }
    }

    this.log.debug(`no layout of ${signatureKey(signature)} matched the frame`);
    return { status: 'unrecognized', signature };
  }
}
