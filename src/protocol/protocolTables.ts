import { ZONES_PER_DEVICE } from '../types/panel';

export type ProtocolVersion = 'aabbcc' | 'packed16';

export type ZoneBitEntry = {
  zoneInDevice: number;
  alarmMask: number;
  troubleMask: number;
};

export type ProtocolTable = {
  version: ProtocolVersion;
  description: string;
  addressRadix: 10 | 16;
  statusHexLength: number;
  zones: ZoneBitEntry[];
  // Set when the device's bell/sounder output is reported in the status field.
  bellMask: number | null;
  // Device-level bits that mark every zone of the device as active.
  activeMask: number | null;
};

const buildZones = (alarmBit: (zone: number) => number, troubleBit: (zone: number) => number): ZoneBitEntry[] => {
  const zones: ZoneBitEntry[] = [];
  for (let zone = 1; zone <= ZONES_PER_DEVICE; zone++) {
    zones.push({
      zoneInDevice: zone,
      alarmMask: 1 << alarmBit(zone),
      troubleMask: 1 << troubleBit(zone)
    });
  }
  return zones;
};

/**
 * Status field layouts per panel firmware.
 *
 * aabbcc   "AA BB CC": AA = decimal device address, BB = trouble byte,
 *          CC = alarm byte. Zone n uses bit n-1 of each byte; bit 5 of the
 *          alarm byte is the device bell output.
 * packed16 hex device address followed by a 16-bit word where zone n alarm
 *          is bit 2(n-1) and zone n trouble is bit 2(n-1)+1.
 */
const PROTOCOL_TABLES: Record<ProtocolVersion, ProtocolTable> = {
  aabbcc: {
    version: 'aabbcc',
    description: 'Decimal address, trouble byte, alarm byte (bell on alarm bit 5)',
    addressRadix: 10,
    statusHexLength: 4,
    zones: buildZones((zone) => zone - 1, (zone) => zone - 1 + 8),
    bellMask: 0x20,
    activeMask: 0x20
  },
  packed16: {
    version: 'packed16',
    description: 'Hex address, alarm/trouble bit pairs in one 16-bit word',
    addressRadix: 16,
    statusHexLength: 4,
    zones: buildZones((zone) => 2 * (zone - 1), (zone) => 2 * (zone - 1) + 1),
    bellMask: null,
    activeMask: null
  }
};

export function isProtocolVersion(value: string): value is ProtocolVersion {
  return Object.prototype.hasOwnProperty.call(PROTOCOL_TABLES, value);
}

export function getProtocolTable(version: ProtocolVersion): ProtocolTable {
  return PROTOCOL_TABLES[version];
}
