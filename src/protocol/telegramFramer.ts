import { ProtocolTable } from './protocolTables';

export const STX = '\x02';
export const ETX = '\x03';

const MASTER_WORD = /^[0-9A-Fa-f]{4}$/;
const HEX_RUN = /^[0-9A-Fa-f]+$/;
// Bell confirmation tokens carry their own device address and are not part of any record.
// The address must touch the token; digits after whitespace belong to the next record.
const BELL_TOKEN = /\$8[45](?:\d{2})?(?![0-9A-Fa-f])/g;
const DATA_FIELD = /"data"\s*:\s*"((?:[^"\\]|\\.)*)"/s;

export interface FramedTelegram {
  text: string;              // normalized text, markers as control characters
  masterWord: string | null;
  recordTexts: string[];     // address + status field, one per device
  framed: boolean;
  hasBellTokens: boolean;
}

export type FrameResult =
  | { ok: true; telegram: FramedTelegram }
  | { ok: false; reason: string };

export class TelegramFramer {
  // Gateways forward either the bare telegram or a JSON envelope { "data": "..." }
  static unwrapEnvelope(raw: string): string {
    const trimmed = raw.trim();
    if (!trimmed.startsWith('{') || !trimmed.includes('"data"')) {
      return raw;
    }

    try {
      const parsed: unknown = JSON.parse(trimmed);
      if (parsed && typeof parsed === 'object' && 'data' in parsed && typeof parsed.data === 'string') {
        return parsed.data;
      }
    } catch {
      // Raw control characters inside the string make JSON.parse fail; fall back to the field pattern.
      const match = DATA_FIELD.exec(trimmed);
      if (match) {
        return match[1]
          .replace(/\\u0002/g, STX)
          .replace(/\\u0003/g, ETX)
          .replace(/\\n/g, '\n')
          .replace(/\\t/g, '\t')
          .replace(/\\"/g, '"')
          .replace(/\\\\/g, '\\');
      }
    }
    return raw;
  }

  static normalizeMarkers(text: string): string {
    return text.replace(/<STX>/gi, STX).replace(/<ETX>/gi, ETX);
  }

  /**
   * Split a telegram into its master word and device record texts.
   *
   * Accepted shapes:
   *   "41FF"                                  standalone master word
   *   "41DF <STX>010000<STX>020004<ETX>"      master prefix + framed records
   *   "<STX>010000020000...<ETX>"             records concatenated in one frame
   *   "41DF 010000 020004"                    unframed, whitespace separated
   */
  static frame(raw: string, table: ProtocolTable): FrameResult {
    const text = this.normalizeMarkers(this.unwrapEnvelope(raw));
    if (text.trim().length === 0) {
      return { ok: false, reason: 'empty telegram' };
    }

    const recordLength = 2 + table.statusHexLength;
    const etxIndex = text.indexOf(ETX);
    const body = etxIndex === -1 ? text : text.slice(0, etxIndex);
    const stxIndex = body.indexOf(STX);

    let masterWord: string | null = null;
    const segments: string[] = [];

    if (stxIndex !== -1) {
      const prefix = body.slice(0, stxIndex).replace(BELL_TOKEN, '').trim();
      if (prefix.length > 0) {
        if (!MASTER_WORD.test(prefix)) {
          return { ok: false, reason: `invalid master word "${prefix}"` };
        }
        masterWord = prefix;
      }
      segments.push(...body.slice(stxIndex + 1).split(STX));
    } else {
      const tokens = body.replace(BELL_TOKEN, ' ').trim().split(/\s+/).filter((t) => t.length > 0);
      if (tokens.length > 0 && MASTER_WORD.test(tokens[0])) {
        masterWord = tokens.shift() ?? null;
      }
      segments.push(...tokens);
    }

    const recordTexts: string[] = [];
    for (const segment of segments) {
      const compact = segment.replace(BELL_TOKEN, '').replace(/\s+/g, '');
      if (compact.length === 0) continue;

      if (!HEX_RUN.test(compact)) {
        return { ok: false, reason: `non-hex record data "${compact.slice(0, 32)}"` };
      }
      if (compact.length % recordLength !== 0) {
        return { ok: false, reason: `record length ${compact.length} is not a multiple of ${recordLength}` };
      }
      for (let i = 0; i < compact.length; i += recordLength) {
        recordTexts.push(compact.slice(i, i + recordLength));
      }
    }

    const hasBellTokens = /\$8[45]/.test(text);
    if (masterWord === null && recordTexts.length === 0 && !hasBellTokens) {
      return { ok: false, reason: 'no master word or device records' };
    }

    return {
      ok: true,
      telegram: { text, masterWord, recordTexts, framed: stxIndex !== -1, hasBellTokens }
    };
  }
}
