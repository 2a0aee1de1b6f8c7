import { colorItem, textItem, type InterpretResult, type Interpreter, type Rgba } from './types.js';

const HEX_DIGITS = /^[0-9a-f]+$/i;
const CHANNEL = /^\d{1,3}$/;
const ALPHA = /^(\d+(\.\d*)?|\.\d+)$/;

export interface Hsl {
  /** Degrees, 0–360. */
  h: number;
  /** Fraction, 0–1. */
  s: number;
  /** Fraction, 0–1. */
  l: number;
}

function expandNibble(digit: string): number {
  return parseInt(digit, 16) * 17;
}

function parseHexColor(hex: string): Rgba | null {
  if (!HEX_DIGITS.test(hex)) return null;
  const byte = (start: number) => parseInt(hex.slice(start, start + 2), 16);

  switch (hex.length) {
    case 3:
    case 4: {
      const [r, g, b, a] = Array.from(hex, expandNibble);
      if (r === undefined || g === undefined || b === undefined) return null;
      return [r, g, b, a ?? 255];
    }
    case 6:
      return [byte(0), byte(2), byte(4), 255];
    case 8:
      return [byte(0), byte(2), byte(4), byte(6)];
    default:
      return null;
  }
}

function parseChannel(raw: string): number | null {
  const text = raw.trim();
  if (!CHANNEL.test(text)) return null;
  const value = Number(text);
  return value <= 255 ? value : null;
}

function parseAlpha(raw: string): number | null {
  const text = raw.trim();
  if (!ALPHA.test(text)) return null;
  const fraction = Math.min(1, Math.max(0, Number(text)));
  return Math.round(fraction * 255);
}

function parseRgbFunction(inner: string, withAlpha: boolean): Rgba | null {
  const parts = inner.split(',');
  if (parts.length !== (withAlpha ? 4 : 3)) return null;

  const [r, g, b] = parts.slice(0, 3).map(parseChannel);
  if (r == null || g == null || b == null) return null;
  if (!withAlpha) return [r, g, b, 255];

  const a = parseAlpha(parts[3] ?? '');
  return a === null ? null : [r, g, b, a];
}

/** Parses `#rgb`, `#rgba`, `#rrggbb`, `#rrggbbaa`, `rgb(r, g, b)` or `rgba(r, g, b, a)`. */
export function parseColor(text: string): Rgba | null {
  if (text.startsWith('#')) {
    return parseHexColor(text.slice(1));
  }
  const lower = text.toLowerCase();
  if (lower.startsWith('rgb(') && lower.endsWith(')')) {
    return parseRgbFunction(lower.slice(4, -1), false);
  }
  if (lower.startsWith('rgba(') && lower.endsWith(')')) {
    return parseRgbFunction(lower.slice(5, -1), true);
  }
  return null;
}

export function rgbToHsl(red: number, green: number, blue: number): Hsl {
  const r = red / 255;
  const g = green / 255;
  const b = blue / 255;
  const max = Math.max(r, g, b);
  const min = Math.min(r, g, b);
  const l = (max + min) / 2;

  const d = max - min;
  if (d === 0) return { h: 0, s: 0, l };

  const s = l > 0.5 ? d / (2 - max - min) : d / (max + min);
  let h: number;
  if (max === r) {
    h = (g - b) / d + (g < b ? 6 : 0);
  } else if (max === g) {
    h = (b - r) / d + 2;
  } else {
    h = (r - g) / d + 4;
  }
  return { h: h * 60, s, l };
}

function hexByte(value: number): string {
  return value.toString(16).padStart(2, '0');
}

export class ColorInterpreter implements Interpreter {
  readonly name = 'Color Code';

  interpret(content: string): InterpretResult | null {
    const rgba = parseColor(content.trim());
    if (!rgba) return null;

    const [r, g, b, a] = rgba;
    const hex6 = `#${hexByte(r)}${hexByte(g)}${hexByte(b)}`;
    const hsl = rgbToHsl(r, g, b);
    const alphaPercent = ((a / 255) * 100).toFixed(1);

    return {
      items: [
        colorItem('Preview', hex6, rgba),
        textItem('Hex (RGB)', hex6),
        textItem('Hex (RGBA)', `${hex6}${hexByte(a)}`),
        textItem('R', String(r)),
        textItem('G', String(g)),
        textItem('B', String(b)),
        textItem('A', `${a} (${alphaPercent}%)`),
        textItem(
          'HSL',
          `hsl(${hsl.h.toFixed(0)}°, ${(hsl.s * 100).toFixed(1)}%, ${(hsl.l * 100).toFixed(1)}%)`
        ),
      ],
    };
  }
}
