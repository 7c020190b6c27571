// ============================================================================
// Meterbus: Wireless M-Bus link-layer header parsing
// ============================================================================
import type { SecondaryAddress, WMBusFrame } from '@meterbus/shared';
import { DecodingError } from './errors.js';

// L-field, C-field, then the 8-byte secondary address
export const LINK_HEADER_LENGTH = 2;
export const SECONDARY_ADDRESS_LENGTH = 8;

export function hexToBytes(hex: string): Buffer {
  const clean = hex.replace(/\s+/g, '');
  if (clean.length % 2 !== 0 || !/^[0-9a-fA-F]*$/.test(clean)) {
    throw new DecodingError('invalid_frame', 'Frame is not a valid hex string');
  }
  return Buffer.from(clean, 'hex');
}

export function bytesToHex(bytes: Uint8Array): string {
  return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString('hex').toUpperCase();
}

/** 0x5068 -> "TCH" (three 5-bit letters offset from '@') */
export function decodeManufacturer(id: number): string {
  return String.fromCharCode(
    ((id >> 10) & 0x1f) + 64,
    ((id >> 5) & 0x1f) + 64,
    (id & 0x1f) + 64,
  );
}

export function encodeManufacturer(code: string): number {
  if (!/^[A-Z]{3}$/.test(code)) throw new Error(`Invalid manufacturer code: ${code}`);
  return ((code.charCodeAt(0) - 64) << 10) | ((code.charCodeAt(1) - 64) << 5) | (code.charCodeAt(2) - 64);
}

function decodeBcd(bytes: Uint8Array, offset: number, length: number): string {
  let digits = '';
  // least significant byte first on the wire
  for (let i = offset + length - 1; i >= offset; i--) {
    const hi = bytes[i] >> 4;
    const lo = bytes[i] & 0x0f;
    if (hi > 9 || lo > 9) {
      throw new DecodingError('invalid_frame', 'Ident number is not BCD', i);
    }
    digits += `${hi}${lo}`;
  }
  return digits;
}

export function parseSecondaryAddress(bytes: Uint8Array, offset: number): SecondaryAddress {
  if (bytes.length < offset + SECONDARY_ADDRESS_LENGTH) {
    throw new DecodingError('buffer_too_short', 'Frame too short for secondary address', offset);
  }
  const manufacturerId = bytes[offset] | (bytes[offset + 1] << 8);
  return {
    manufacturer: decodeManufacturer(manufacturerId),
    manufacturerId,
    identNumber: decodeBcd(bytes, offset + 2, 4),
    version: bytes[offset + 6],
    deviceType: bytes[offset + 7],
    byteLength: SECONDARY_ADDRESS_LENGTH,
  };
}

/** Serialized form, as it appears in the frame. */
export function secondaryAddressBytes(address: SecondaryAddress): Uint8Array {
  const out = new Uint8Array(SECONDARY_ADDRESS_LENGTH);
  out[0] = address.manufacturerId & 0xff;
  out[1] = address.manufacturerId >> 8;
  const id = address.identNumber.padStart(8, '0');
  for (let i = 0; i < 4; i++) {
    out[2 + i] = parseInt(id.slice(6 - i * 2, 8 - i * 2), 16);
  }
  out[6] = address.version;
  out[7] = address.deviceType;
  return out;
}

/**
 * Wrap a raw frame (L-field first, as delivered by the receiver) with its
 * address and signal quality.
 */
export function parseFrame(input: Uint8Array | string, rssi: number, receivedAt = Date.now()): WMBusFrame {
  const bytes = typeof input === 'string' ? hexToBytes(input) : input;
  if (bytes.length < LINK_HEADER_LENGTH + SECONDARY_ADDRESS_LENGTH) {
    throw new DecodingError('buffer_too_short', `Frame of ${bytes.length} bytes has no complete header`);
  }
  const lField = bytes[0];
  if (bytes.length < lField + 1) {
    throw new DecodingError('buffer_too_short', `L-field announces ${lField} bytes, got ${bytes.length - 1}`);
  }
  return {
    address: parseSecondaryAddress(bytes, LINK_HEADER_LENGTH),
    rssi,
    bytes,
    receivedAt,
  };
}

export function meterIdOf(address: SecondaryAddress): string {
  return `${address.manufacturer}-${address.identNumber}`;
}
