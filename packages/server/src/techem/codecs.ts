// ============================================================================
// Meterbus: Techem field codecs
// Counters, temperatures and the two bit-packed reading dates.
// ============================================================================
import type { CalendarDate, Quantity, TemperatureUnit } from '@meterbus/shared';
import { DecodingError } from '../wmbus/errors.js';

export const DATE_BASE_YEAR = 2000;
export const MAX_FIELD_WIDTH = 6; // stays inside Number.MAX_SAFE_INTEGER

function checkRange(buffer: Uint8Array, offset: number, width: number): void {
  if (!Number.isInteger(width) || width < 1 || width > MAX_FIELD_WIDTH) {
    throw new RangeError(`Field width must be 1-${MAX_FIELD_WIDTH}, got ${width}`);
  }
  if (offset < 0 || offset + width > buffer.length) {
    throw new DecodingError('buffer_too_short', `Field of ${width} bytes outside ${buffer.length}-byte frame`, offset);
  }
}

export function readUIntBE(buffer: Uint8Array, offset: number, width: number): number {
  checkRange(buffer, offset, width);
  let value = 0;
  for (let i = 0; i < width; i++) value = value * 256 + buffer[offset + i];
  return value;
}

export function readUIntLE(buffer: Uint8Array, offset: number, width: number): number {
  checkRange(buffer, offset, width);
  let value = 0;
  for (let i = width - 1; i >= 0; i--) value = value * 256 + buffer[offset + i];
  return value;
}

export function writeUIntLE(buffer: Uint8Array, offset: number, width: number, value: number): void {
  checkRange(buffer, offset, width);
  if (!Number.isInteger(value) || value < 0 || value >= 256 ** width) {
    throw new RangeError(`${value} does not fit in ${width} bytes`);
  }
  let rest = value;
  for (let i = 0; i < width; i++) {
    buffer[offset + i] = rest % 256;
    rest = Math.floor(rest / 256);
  }
}

/** Unsigned 16-bit raw value divided by `divisor` (100 = hundredths of a degree). */
export function parseTemperature(buffer: Uint8Array, offset: number, divisor: number): Quantity<TemperatureUnit> {
  const raw = readUIntLE(buffer, offset, 2);
  return { value: raw / divisor, unit: '°C' };
}

function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

function calendarDate(year: number, month: number, day: number, offset: number, field: string): CalendarDate {
  if (month < 1 || month > 12) {
    throw new DecodingError('invalid_field', `${field}: month ${month} out of range`, offset);
  }
  if (day < 1 || day > daysInMonth(year, month)) {
    throw new DecodingError('invalid_field', `${field}: day ${day} invalid for ${year}-${month}`, offset);
  }
  return { year, month, day };
}

// Past date word:    yyyyyyym mmmddddd
// Current date word: ---mmmmd dddd----   (no year on the wire)

export function parsePastDate(buffer: Uint8Array, offset: number): CalendarDate {
  const word = readUIntLE(buffer, offset, 2);
  const day = word & 0x1f;
  const month = (word >> 5) & 0x0f;
  const year = DATE_BASE_YEAR + ((word >> 9) & 0x7f);
  return calendarDate(year, month, day, offset, 'past reading date');
}

/**
 * The current reading is taken after the past (billing) reading, so its year
 * is the past year, or the next one when the day of year has wrapped.
 */
export function parseCurrentDate(buffer: Uint8Array, offset: number, pastDate: CalendarDate): CalendarDate {
  const word = readUIntLE(buffer, offset, 2);
  const day = (word >> 4) & 0x1f;
  const month = (word >> 9) & 0x0f;
  const sameYear = month > pastDate.month || (month === pastDate.month && day >= pastDate.day);
  const year = sameYear ? pastDate.year : pastDate.year + 1;
  return calendarDate(year, month, day, offset, 'current reading date');
}

export function encodePastDate(date: CalendarDate): number {
  const yearOffset = date.year - DATE_BASE_YEAR;
  if (yearOffset < 0 || yearOffset > 0x7f) throw new RangeError(`Year ${date.year} not encodable`);
  return (yearOffset << 9) | ((date.month & 0x0f) << 5) | (date.day & 0x1f);
}

export function encodeCurrentDate(date: CalendarDate): number {
  return ((date.month & 0x0f) << 9) | ((date.day & 0x1f) << 4);
}
