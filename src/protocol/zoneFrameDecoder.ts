import {
  DeviceRecord,
  MAX_DEVICES,
  ZONES_PER_DEVICE,
  ZoneCondition,
  ZoneStatus
} from '../types/panel';
import { ProtocolTable } from './protocolTables';

export interface IgnoredRecord {
  deviceAddress: number;
  recordText: string;
  reason: string;
}

export type ZoneDecodeResult =
  | { ok: true; records: DeviceRecord[]; zones: ZoneStatus[]; ignored: IgnoredRecord[] }
  | { ok: false; kind: 'integrity_violation'; reason: string };

export interface ZoneDecodeOptions {
  table: ProtocolTable;
  deviceCount: number;
  timestamp?: number;
  describe?: (zoneNumber: number) => string | undefined;
}

const KNOWN_CONDITIONS = new Set<string>(Object.values(ZoneCondition));

export const absoluteZoneNumber = (deviceAddress: number, zoneInDevice: number): number =>
  (deviceAddress - 1) * ZONES_PER_DEVICE + zoneInDevice;

export const deviceOfZone = (zoneNumber: number): number =>
  Math.floor((zoneNumber - 1) / ZONES_PER_DEVICE) + 1;

export function classifyZone(hasAlarm: boolean, hasTrouble: boolean, isActive: boolean): ZoneCondition {
  if (hasAlarm) return ZoneCondition.ALARM;
  if (hasTrouble) return ZoneCondition.TROUBLE;
  if (isActive) return ZoneCondition.ACTIVE;
  return ZoneCondition.NORMAL;
}

export class ZoneFrameDecoder {
  /**
   * Decode device records into zone statuses. Out-of-range addresses are
   * dropped per record; anything that breaks batch integrity rejects the
   * whole telegram so the cache never holds a half-applied snapshot.
   */
  static decode(recordTexts: string[], options: ZoneDecodeOptions): ZoneDecodeResult {
    const { table, deviceCount } = options;
    const timestamp = options.timestamp ?? Date.now();
    const addressPattern = table.addressRadix === 10 ? /^\d{2}$/ : /^[0-9A-Fa-f]{2}$/;

    if (recordTexts.length > MAX_DEVICES) {
      return { ok: false, kind: 'integrity_violation', reason: `${recordTexts.length} records exceed ${MAX_DEVICES} devices` };
    }

    const seen = new Map<number, string>();
    const records: DeviceRecord[] = [];
    const ignored: IgnoredRecord[] = [];

    for (const recordText of recordTexts) {
      const addressText = recordText.slice(0, 2);
      const statusText = recordText.slice(2).toUpperCase();

      if (addressText.length === 0 || !addressPattern.test(addressText)) {
        return { ok: false, kind: 'integrity_violation', reason: `invalid device address "${addressText}"` };
      }
      if (statusText.length !== table.statusHexLength || !/^[0-9A-F]+$/.test(statusText)) {
        return { ok: false, kind: 'integrity_violation', reason: `invalid status field "${statusText}" for device ${addressText}` };
      }

      const deviceAddress = parseInt(addressText, table.addressRadix);
      if (deviceAddress < 1 || deviceAddress > deviceCount || deviceAddress > MAX_DEVICES) {
        ignored.push({ deviceAddress, recordText, reason: `address ${deviceAddress} outside 1..${deviceCount}` });
        continue;
      }

      const previous = seen.get(deviceAddress);
      if (previous !== undefined) {
        if (previous !== statusText) {
          return {
            ok: false,
            kind: 'integrity_violation',
            reason: `device ${deviceAddress} reported twice with conflicting status (${previous} / ${statusText})`
          };
        }
        continue;
      }
      seen.set(deviceAddress, statusText);

      records.push(this.decodeRecord(deviceAddress, addressText, statusText, options, timestamp));
    }

    const zones = records.flatMap((record) => record.zones);
    const violation = this.validateBatch(zones, deviceCount);
    if (violation) {
      return { ok: false, kind: 'integrity_violation', reason: violation };
    }

    return { ok: true, records, zones, ignored };
  }

  private static decodeRecord(
    deviceAddress: number,
    addressText: string,
    statusText: string,
    options: ZoneDecodeOptions,
    timestamp: number
  ): DeviceRecord {
    const { table } = options;
    const statusValue = parseInt(statusText, 16);
    const bellActive = table.bellMask !== null && (statusValue & table.bellMask) !== 0;
    const deviceActive = table.activeMask !== null && (statusValue & table.activeMask) !== 0;

    const zones: ZoneStatus[] = table.zones.map((entry) => {
      const zoneNumber = absoluteZoneNumber(deviceAddress, entry.zoneInDevice);
      const hasAlarm = (statusValue & entry.alarmMask) !== 0;
      const hasTrouble = (statusValue & entry.troubleMask) !== 0;
      return {
        zoneNumber,
        deviceAddress,
        zoneInDevice: entry.zoneInDevice,
        hasAlarm,
        hasTrouble,
        isActive: deviceActive,
        condition: classifyZone(hasAlarm, hasTrouble, deviceActive),
        description: options.describe?.(zoneNumber) ?? `Device ${addressText} Zone ${entry.zoneInDevice}`,
        updatedAt: timestamp
      };
    });

    return { deviceAddress, addressText, statusText, bellActive, zones };
  }

  private static validateBatch(zones: ZoneStatus[], deviceCount: number): string | null {
    if (zones.length === 0) return null;

    const maxZone = deviceCount * ZONES_PER_DEVICE;
    if (zones.length > maxZone) {
      return `${zones.length} zones exceed configured maximum ${maxZone}`;
    }

    for (const zone of zones) {
      if (zone.zoneInDevice < 1 || zone.zoneInDevice > ZONES_PER_DEVICE) {
        return `zone ${zone.zoneNumber} has zone-in-device ${zone.zoneInDevice}`;
      }
      if (zone.zoneNumber < 1 || zone.zoneNumber > maxZone) {
        return `zone ${zone.zoneNumber} outside 1..${maxZone}`;
      }
      if (!KNOWN_CONDITIONS.has(zone.condition)) {
        return `zone ${zone.zoneNumber} has unknown condition ${zone.condition}`;
      }
    }
    return null;
  }
}
