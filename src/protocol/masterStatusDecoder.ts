import { MASTER_FLAGS, MasterFlag, MasterStatus } from '../types/panel';

const MASTER_WORD = /^[0-9A-Fa-f]{4}$/;

// Bit 6 down to bit 0 of the status byte. A CLEAR bit means the LED is lit.
const FLAG_BITS: ReadonlyArray<[MasterFlag, number]> = [
  [MasterFlag.AC_POWER, 0x40],
  [MasterFlag.DC_POWER, 0x20],
  [MasterFlag.ALARM, 0x10],
  [MasterFlag.TROUBLE, 0x08],
  [MasterFlag.DRILL, 0x04],
  [MasterFlag.SILENCED, 0x02],
  [MasterFlag.DISABLED, 0x01]
];

export class MasterStatusDecoder {
  static decode(word: string, timestamp: number = Date.now()): MasterStatus | null {
    const trimmed = word.trim();
    if (!MASTER_WORD.test(trimmed)) {
      return null;
    }

    const header = parseInt(trimmed.slice(0, 2), 16);
    const statusByte = parseInt(trimmed.slice(2), 16);

    const status: MasterStatus = {
      acPower: false,
      dcPower: false,
      alarm: false,
      trouble: false,
      drill: false,
      silenced: false,
      disabled: false,
      header,
      statusByte,
      rawWord: trimmed.toUpperCase(),
      timestamp
    };

    for (const [flag, mask] of FLAG_BITS) {
      status[flag] = (statusByte & mask) === 0;
    }

    return status;
  }

  static getFlag(status: MasterStatus, flag: MasterFlag): boolean {
    switch (flag) {
      case MasterFlag.AC_POWER:
        return status.acPower;
      case MasterFlag.DC_POWER:
        return status.dcPower;
      case MasterFlag.ALARM:
        return status.alarm;
      case MasterFlag.TROUBLE:
        return status.trouble;
      case MasterFlag.DRILL:
        return status.drill;
      case MasterFlag.SILENCED:
        return status.silenced;
      case MasterFlag.DISABLED:
        return status.disabled;
    }
  }
}

const FLAG_BY_NAME = new Map<string, MasterFlag>(MASTER_FLAGS.map((flag) => [flag.toLowerCase(), flag]));

// Closed lookup for flag names arriving as text (REST path parameters)
export function parseMasterFlag(name: string): MasterFlag | null {
  return FLAG_BY_NAME.get(name.trim().toLowerCase()) ?? null;
}
