import { textItem, type InterpretResult, type Interpreter } from './types.js';

const BYTES_PER_LINE = 16;
const HEX_COLUMN_WIDTH = BYTES_PER_LINE * 3 - 1;

function toHex(byte: number): string {
  return byte.toString(16).padStart(2, '0');
}

function printable(byte: number): string {
  return byte >= 0x20 && byte < 0x7f ? String.fromCharCode(byte) : '.';
}

export function formatHexDump(bytes: Uint8Array): string {
  const lines: string[] = [];
  for (let offset = 0; offset < bytes.length; offset += BYTES_PER_LINE) {
    const chunk = Array.from(bytes.subarray(offset, offset + BYTES_PER_LINE));
    const hex = chunk.map(toHex).join(' ');
    const ascii = chunk.map(printable).join('');
    lines.push(`${offset.toString(16).padStart(4, '0')}  ${hex.padEnd(HEX_COLUMN_WIDTH)}  ${ascii}`);
  }
  return lines.join('\n');
}

/** Shows the UTF-8 bytes behind any text. Always applicable. */
export class HexInterpreter implements Interpreter {
  readonly name = 'Hex Dump';

  interpret(content: string): InterpretResult {
    const bytes = Buffer.from(content, 'utf8');
    const hexBytes = Array.from(bytes, toHex);

    return {
      items: [
        textItem('Length', String(bytes.length)),
        textItem('Characters', String(Array.from(content).length)),
        textItem('Hex', hexBytes.join(' ')),
        textItem('Compact hex', hexBytes.join('')),
        textItem('Hex dump', formatHexDump(bytes)),
      ],
    };
  }
}
