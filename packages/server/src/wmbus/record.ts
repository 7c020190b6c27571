import type { CalendarDate, DecodedRecord, Quantity, RecordKind, RecordValueMap, TemperatureUnit } from '@meterbus/shared';

type RecordValue = RecordValueMap[RecordKind];

/** One typed measurement taken from a frame. Frozen on construction. */
export class MeterRecord<K extends RecordKind = RecordKind> implements DecodedRecord<K> {
  readonly kind: K;
  readonly value: RecordValueMap[K];

  constructor(kind: K, value: RecordValueMap[K]) {
    this.kind = kind;
    const copy = structuredClone(value);
    if (typeof copy === 'object') Object.freeze(copy);
    this.value = copy;
    Object.freeze(this);
  }

  toString(): string {
    return `${this.kind}=${formatValue(this.value)}`;
  }
}

export function isRecordOf<K extends RecordKind>(record: MeterRecord, kind: K): record is MeterRecord<K> {
  return record.kind === kind;
}

export function formatDate(date: CalendarDate): string {
  const mm = String(date.month).padStart(2, '0');
  const dd = String(date.day).padStart(2, '0');
  return `${date.year}-${mm}-${dd}`;
}

function isQuantity(value: RecordValue): value is Quantity<TemperatureUnit> {
  return typeof value === 'object' && 'unit' in value;
}

function formatValue(value: RecordValue): string {
  if (typeof value === 'number') return String(value);
  if (isQuantity(value)) return `${value.value} ${value.unit}`;
  return formatDate(value);
}
