import type { CalendarDate } from '@meterbus/shared';
import { encodeManufacturer, LINK_HEADER_LENGTH, SECONDARY_ADDRESS_LENGTH, secondaryAddressBytes } from '../wmbus/frame.js';
import { encodeCurrentDate, encodePastDate, writeUIntLE } from './codecs.js';
import { validateLayout } from './decoder.js';
import { TECHEM, type TechemVariant } from './variants.js';

export interface TechemFrameFields {
  identNumber: string;
  pastDate: CalendarDate;
  pastValue: number;
  currentDate: CalendarDate;
  currentValue: number;
  /** raw units, e.g. 2152 = 21.52 °C at divisor 100 */
  roomTemperature?: number;
  radiatorTemperature?: number;
  coding?: number;
}

const C_FIELD_SND_NR = 0x44;

/** Builds a link-layer frame in the layout `variant` decodes. */
export function encodeTechemFrame(variant: TechemVariant, fields: TechemFrameFields): Uint8Array {
  const { layout } = variant;
  const payloadLength = validateLayout(variant.name, layout);
  const offset = LINK_HEADER_LENGTH + SECONDARY_ADDRESS_LENGTH;
  const frame = new Uint8Array(offset + payloadLength);

  frame[0] = frame.length - 1;
  frame[1] = C_FIELD_SND_NR;
  frame.set(
    secondaryAddressBytes({
      manufacturer: TECHEM,
      manufacturerId: encodeManufacturer(TECHEM),
      identNumber: fields.identNumber,
      version: variant.version,
      deviceType: variant.deviceType,
      byteLength: SECONDARY_ADDRESS_LENGTH,
    }),
    LINK_HEADER_LENGTH,
  );

  frame[offset] = fields.coding ?? variant.codings[0];
  writeUIntLE(frame, offset + layout.pastDate, 2, encodePastDate(fields.pastDate));
  writeUIntLE(frame, offset + layout.pastValue, layout.valueWidth, fields.pastValue);
  writeUIntLE(frame, offset + layout.currentDate, 2, encodeCurrentDate(fields.currentDate));
  writeUIntLE(frame, offset + layout.currentValue, layout.valueWidth, fields.currentValue);
  if (layout.temperatures) {
    writeUIntLE(frame, offset + layout.temperatures.room, 2, fields.roomTemperature ?? 0);
    writeUIntLE(frame, offset + layout.temperatures.radiator, 2, fields.radiatorTemperature ?? 0);
  }
  return frame;
}
