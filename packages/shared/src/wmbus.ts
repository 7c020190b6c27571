// Wireless M-Bus Meter Telemetry Types

// ── Records ─────────────────────────────────────────────────────────────────

export type RecordKind =
  | 'current_volume'
  | 'current_reading_date'
  | 'past_volume'
  | 'past_reading_date'
  | 'room_temperature'
  | 'radiator_temperature'
  | 'rssi';

/** Calendar day as printed on the meter. No timezone is implied. */
export interface CalendarDate {
  year: number;
  month: number; // 1-12
  day: number;   // 1-31
}

export type TemperatureUnit = '°C';

export interface Quantity<U extends string = string> {
  value: number;
  unit: U;
}

export interface RecordValueMap {
  current_volume: number;
  current_reading_date: CalendarDate;
  past_volume: number;
  past_reading_date: CalendarDate;
  room_temperature: Quantity<TemperatureUnit>;
  radiator_temperature: Quantity<TemperatureUnit>;
  rssi: number;
}

export interface DecodedRecord<K extends RecordKind = RecordKind> {
  readonly kind: K;
  readonly value: RecordValueMap[K];
}

// ── Frames ──────────────────────────────────────────────────────────────────

export interface SecondaryAddress {
  manufacturer: string;   // three-letter flag, e.g. TCH
  manufacturerId: number; // raw 16-bit field
  identNumber: string;    // 8 BCD digits
  version: number;
  deviceType: number;
  byteLength: number;     // serialized length inside the frame
}

export interface WMBusFrame {
  address: SecondaryAddress;
  rssi: number;
  bytes: Uint8Array;
  receivedAt: number;
}

export interface DeviceSignature {
  manufacturer: string;
  version: number;
  deviceType: number;
}

export type DeviceMedium = 'heat_cost_allocator' | 'cold_water' | 'warm_water';

export type DispatchStatus = 'decoded' | 'unrecognized' | 'unknown_device' | 'failed';

export interface DecoderInfo {
  name: string;
  medium: DeviceMedium;
  signature: DeviceSignature;
  reportsTemperature: boolean;
  codings: number[];
}

// ── Meter service ───────────────────────────────────────────────────────────

export interface WMBusChannels {
  current_volume?: number;
  current_reading_date?: string; // YYYY-MM-DD
  past_volume?: number;
  past_reading_date?: string;
  room_temperature?: number;     // °C
  radiator_temperature?: number; // °C
  rssi?: number;
}

export interface WMBusReading {
  timestamp: number;
  decoder: string;
  channels: WMBusChannels;
}

export interface WMBusMeter {
  id: string;
  manufacturer: string;
  identNumber: string;
  version: number;
  deviceType: number;
  medium: DeviceMedium;
  decoder: string;
  firstSeen: number;
  lastSeen: number;
  rssi: number;
  readings: WMBusReading[];
  lastReading: WMBusReading | null;
}

export interface WMBusConfig {
  meterIds: string[];
  maxReadings: number;
  demo: boolean;
}

export interface WMBusStats {
  totalMeters: number;
  framesReceived: number;
  decoded: number;
  unrecognized: number;
  unknownDevice: number;
  failed: number;
  filtered: number;
  byMedium: Record<DeviceMedium, number>;
}

export interface WMBusFrameResult {
  status: DispatchStatus | 'filtered';
  meterId: string;
  decoder?: string;
  channels?: WMBusChannels;
  error?: string;
}
