import { BellConfirmation, DeviceRecord, MAX_DEVICES } from '../types/panel';

const BELL_ON = '85';
const CONFIRMATION = /\$8([45])(\d{2})?(?![0-9A-Fa-f])/g;
const ANY_ADDRESS = /\d{2}/;

/**
 * Bell confirmations: "$85" = bell ON, "$84" = bell OFF, immediately followed
 * by the 2-digit device address. A token without its own address is attributed to
 * the first device address of the telegram.
 */
export class BellConfirmationDecoder {
  static scan(text: string, records: DeviceRecord[], timestamp: number = Date.now()): BellConfirmation[] {
    const confirmations: BellConfirmation[] = [];
    const explicit = new Set<number>();
    const fallbackAddress = this.fallbackAddress(text, records);

    for (const match of text.matchAll(CONFIRMATION)) {
      const addressText = match[2] ?? fallbackAddress;
      if (addressText === null) {
        console.warn(`[BELL] ${match[0]} without device address, ignored`);
        continue;
      }

      const deviceAddress = parseInt(addressText, 10);
      if (deviceAddress < 1 || deviceAddress > MAX_DEVICES) {
        console.warn(`[BELL] ${match[0]} for out-of-range device ${addressText}, ignored`);
        continue;
      }

      explicit.add(deviceAddress);
      confirmations.push({
        deviceAddress,
        isActive: `8${match[1]}` === BELL_ON,
        timestamp,
        rawToken: match[0]
      });
    }

    // Secondary signal: bell output bit of a device record, only where no token spoke for the device.
    // A clear bit is not reported; activity lapses through the tracker's active window.
    for (const record of records) {
      if (!record.bellActive || explicit.has(record.deviceAddress)) continue;
      confirmations.push({
        deviceAddress: record.deviceAddress,
        isActive: true,
        timestamp,
        rawToken: `bit5:${record.addressText}${record.statusText}`
      });
    }

    return confirmations;
  }

  private static fallbackAddress(text: string, records: DeviceRecord[]): string | null {
    if (records.length > 0) {
      return String(records[0].deviceAddress).padStart(2, '0');
    }
    const stripped = text.replace(/\$8[45]/g, ' ');
    const match = ANY_ADDRESS.exec(stripped);
    return match ? match[0] : null;
  }
}
