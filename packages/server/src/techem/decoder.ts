// ============================================================================
// Meterbus: Techem frame decoder
// One instance per device variant; the coding byte picks the layout.
// ============================================================================
import type { DecoderInfo, DeviceSignature, WMBusFrame } from '@meterbus/shared';
import { MeterRecord } from '../wmbus/record.js';
import type { FrameDecoder } from '../wmbus/registry.js';
import { LINK_HEADER_LENGTH } from '../wmbus/frame.js';
import { DecodingError } from '../wmbus/errors.js';
import {
  MAX_FIELD_WIDTH,
  parseCurrentDate,
  parsePastDate,
  parseTemperature,
  readUIntLE,
} from './codecs.js';
import { TECHEM, TECHEM_VARIANTS, type TechemLayout, type TechemVariant } from './variants.js';

interface FieldSpan {
  name: string;
  offset: number;
  width: number;
}

function fieldSpans(layout: TechemLayout): FieldSpan[] {
  const spans: FieldSpan[] = [
    { name: 'coding', offset: 0, width: 1 },
    { name: 'pastDate', offset: layout.pastDate, width: 2 },
    { name: 'pastValue', offset: layout.pastValue, width: layout.valueWidth },
    { name: 'currentDate', offset: layout.currentDate, width: 2 },
    { name: 'currentValue', offset: layout.currentValue, width: layout.valueWidth },
  ];
  if (layout.temperatures) {
    spans.push({ name: 'roomTemperature', offset: layout.temperatures.room, width: 2 });
    spans.push({ name: 'radiatorTemperature', offset: layout.temperatures.radiator, width: 2 });
  }
  return spans;
}

/** Throws on a layout whose fields overlap or have impossible offsets or widths. */
export function validateLayout(name: string, layout: TechemLayout): number {
  if (!Number.isInteger(layout.valueWidth) || layout.valueWidth < 1 || layout.valueWidth > MAX_FIELD_WIDTH) {
    throw new Error(`${name}: value width ${layout.valueWidth} out of range`);
  }
  if (layout.temperatures && !(layout.temperatures.divisor > 0)) {
    throw new Error(`${name}: temperature divisor must be positive`);
  }
  const spans = fieldSpans(layout);
  for (const span of spans) {
    if (!Number.isInteger(span.offset) || span.offset < 0) {
      throw new Error(`${name}: ${span.name} offset ${span.offset} invalid`);
    }
  }
  spans.sort((a, b) => a.offset - b.offset);
  for (let i = 1; i < spans.length; i++) {
    const prev = spans[i - 1];
    if (spans[i].offset < prev.offset + prev.width) {
      throw new Error(`${name}: ${spans[i].name} overlaps ${prev.name}`);
    }
  }
  const last = spans[spans.length - 1];
  return last.offset + last.width;
}

export class TechemFrameDecoder implements FrameDecoder {
  readonly name: string;
  readonly signature: DeviceSignature;
  readonly reportsTemperature: boolean;
  /** Payload bytes needed after the coding byte offset. */
  readonly payloadLength: number;
  private codings: ReadonlySet<number>;

  constructor(private variant: TechemVariant) {
    this.payloadLength = validateLayout(variant.name, variant.layout);
    this.name = variant.name;
    this.signature = { manufacturer: TECHEM, version: variant.version, deviceType: variant.deviceType };
    this.reportsTemperature = variant.layout.temperatures !== undefined;
    this.codings = new Set(variant.codings);
  }

  describe(): DecoderInfo {
    return {
      name: this.name,
      medium: this.variant.medium,
      signature: { ...this.signature },
      reportsTemperature: this.reportsTemperature,
      codings: [...this.codings],
    };
  }

  decode(frame: WMBusFrame): MeterRecord[] | null {
    const buffer = frame.bytes;
    const offset = frame.address.byteLength + LINK_HEADER_LENGTH;
    if (offset >= buffer.length) {
      throw new DecodingError('buffer_too_short', 'Frame ends before the coding byte', offset);
    }

    const coding = buffer[offset];
    if (!this.codings.has(coding)) return null;
    if (offset + this.payloadLength > buffer.length) {
      throw new DecodingError(
        'buffer_too_short',
        `${this.name} needs ${this.payloadLength} payload bytes, frame has ${buffer.length - offset}`,
        offset,
      );
    }

    const { layout } = this.variant;
    const pastDate = parsePastDate(buffer, offset + layout.pastDate);
    const pastValue = readUIntLE(buffer, offset + layout.pastValue, layout.valueWidth);
    const currentDate = parseCurrentDate(buffer, offset + layout.currentDate, pastDate);
    const currentValue = readUIntLE(buffer, offset + layout.currentValue, layout.valueWidth);

    const records: MeterRecord[] = [
      new MeterRecord('current_volume', currentValue),
      new MeterRecord('current_reading_date', currentDate),
      new MeterRecord('past_volume', pastValue),
      new MeterRecord('past_reading_date', pastDate),
      new MeterRecord('rssi', Math.round(frame.rssi)),
    ];

    if (layout.temperatures) {
      const { room, radiator, divisor } = layout.temperatures;
      records.push(new MeterRecord('room_temperature', parseTemperature(buffer, offset + room, divisor)));
      records.push(new MeterRecord('radiator_temperature', parseTemperature(buffer, offset + radiator, divisor)));
    }

    return records;
  }
}

export function createTechemDecoders(variants: readonly TechemVariant[] = TECHEM_VARIANTS): TechemFrameDecoder[] {
  return variants.map(v => new TechemFrameDecoder(v));
}
