import type { DeviceMedium } from '@meterbus/shared';

export const TECHEM = 'TCH';

/** Offsets are relative to the byte after the secondary address and C/L fields. */
export interface TechemLayout {
  pastDate: number;
  pastValue: number;
  currentDate: number;
  currentValue: number;
  valueWidth: number;
  temperatures?: {
    room: number;
    radiator: number;
    divisor: number;
  };
}

export interface TechemVariant {
  name: string;
  medium: DeviceMedium;
  version: number;
  deviceType: number;
  codings: number[];
  layout: TechemLayout;
}

const SHORT_LAYOUT: TechemLayout = {
  pastDate: 2,
  pastValue: 4,
  currentDate: 6,
  currentValue: 8,
  valueWidth: 2,
};

export const TECHEM_VARIANTS: readonly TechemVariant[] = [
  {
    name: 'techem-hkv-94',
    medium: 'heat_cost_allocator',
    version: 0x94,
    deviceType: 0x80,
    codings: [0xa2],
    layout: {
      pastDate: 2,
      pastValue: 4,
      currentDate: 6,
      currentValue: 9,
      valueWidth: 2,
      temperatures: { room: 11, radiator: 13, divisor: 100 },
    },
  },
  {
    name: 'techem-hkv-100',
    medium: 'heat_cost_allocator',
    version: 0x64,
    deviceType: 0x80,
    codings: [0xa0],
    layout: SHORT_LAYOUT,
  },
  {
    name: 'techem-hkv-105',
    medium: 'heat_cost_allocator',
    version: 0x69,
    deviceType: 0x80,
    codings: [0xa0],
    layout: { ...SHORT_LAYOUT, temperatures: { room: 10, radiator: 12, divisor: 100 } },
  },
  {
    name: 'techem-hkv-118',
    medium: 'heat_cost_allocator',
    version: 0x76,
    deviceType: 0xf0,
    codings: [0xa0],
    layout: {
      pastDate: 2,
      pastValue: 4,
      currentDate: 7,
      currentValue: 9,
      valueWidth: 3,
    },
  },
  {
    name: 'techem-mk3-cold-water',
    medium: 'cold_water',
    version: 0x74,
    deviceType: 0x72,
    codings: [0xa2],
    layout: SHORT_LAYOUT,
  },
  {
    name: 'techem-mk3-warm-water',
    medium: 'warm_water',
    version: 0x74,
    deviceType: 0x62,
    codings: [0xa2],
    layout: SHORT_LAYOUT,
  },
];
