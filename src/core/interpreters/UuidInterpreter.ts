import { textItem, type InterpretItem, type InterpretResult, type Interpreter } from './types.js';

const HYPHENATED = '[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}';
const UUID_FORMS: readonly RegExp[] = [
  new RegExp(`^(${HYPHENATED})$`, 'i'),
  /^([0-9a-f]{32})$/i,
  new RegExp(`^urn:uuid:(${HYPHENATED})$`, 'i'),
  new RegExp(`^\\{(${HYPHENATED})\\}$`, 'i'),
];

// 100ns intervals between 1582-10-15 (Gregorian reform) and the Unix epoch.
const GREGORIAN_TO_UNIX_100NS = 0x01b21dd213814000n;

export type UuidVariant = 'NCS' | 'RFC 4122' | 'Microsoft' | 'Future';

/** Returns the 32 lowercase hex digits of a UUID in any accepted textual form, or null. */
export function parseUuid(text: string): string | null {
  for (const form of UUID_FORMS) {
    const match = form.exec(text);
    if (match?.[1]) {
      return match[1].replace(/-/g, '').toLowerCase();
    }
  }
  return null;
}

function nibble(hex: string, index: number): number {
  return parseInt(hex.charAt(index), 16);
}

export function uuidVersion(hex: string): number | null {
  const version = nibble(hex, 12);
  return version >= 1 && version <= 5 ? version : null;
}

export function uuidVariant(hex: string): UuidVariant {
  const bits = nibble(hex, 16);
  if (bits < 0b1000) return 'NCS';
  if (bits < 0b1100) return 'RFC 4122';
  if (bits < 0b1110) return 'Microsoft';
  return 'Future';
}

export function toHyphenated(hex: string): string {
  return [hex.slice(0, 8), hex.slice(8, 12), hex.slice(12, 16), hex.slice(16, 20), hex.slice(20)].join('-');
}

/** Unix time of a version 1 UUID as `seconds.nanoseconds`, or null before the epoch. */
export function v1Timestamp(hex: string): string | null {
  const timeLow = BigInt(`0x${hex.slice(0, 8)}`);
  const timeMid = BigInt(`0x${hex.slice(8, 12)}`);
  const timeHigh = BigInt(`0x${hex.slice(13, 16)}`);
  const ticks = (timeHigh << 48n) | (timeMid << 32n) | timeLow;
  const sinceEpoch = ticks - GREGORIAN_TO_UNIX_100NS;
  if (sinceEpoch < 0n) return null;

  const seconds = sinceEpoch / 10_000_000n;
  const nanos = (sinceEpoch % 10_000_000n) * 100n;
  return `${seconds}.${nanos.toString().padStart(9, '0')}`;
}

export class UuidInterpreter implements Interpreter {
  readonly name = 'UUID';

  interpret(content: string): InterpretResult | null {
    const hex = parseUuid(content.trim());
    if (!hex) return null;

    const version = uuidVersion(hex);
    const hyphenated = toHyphenated(hex);
    const items: InterpretItem[] = [
      textItem('Version', version === null ? 'unknown' : String(version)),
      textItem('Variant', uuidVariant(hex)),
      textItem('Hyphenated', hyphenated),
      textItem('Simple', hex),
      textItem('URN', `urn:uuid:${hyphenated}`),
      textItem('Braced', `{${hyphenated}}`),
    ];

    if (version === 1) {
      const timestamp = v1Timestamp(hex);
      if (timestamp) items.push(textItem('Timestamp (Unix)', timestamp));
    }

    return { items };
  }
}
