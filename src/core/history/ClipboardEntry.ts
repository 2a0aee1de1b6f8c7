const WHITESPACE_BREAKS = /[\n\r\t]/g;

function pad2(value: number): string {
  return value.toString().padStart(2, '0');
}

/** A single captured clipboard snapshot. Never mutated after capture. */
export class ClipboardEntry {
  readonly content: string;
  private readonly capturedAtMs: number;

  constructor(content: string, capturedAt: Date = new Date()) {
    this.content = content;
    this.capturedAtMs = capturedAt.getTime();
    Object.freeze(this);
  }

  get capturedAt(): Date {
    return new Date(this.capturedAtMs);
  }

  /** Single-line preview for list rendering, truncated to `maxChars` code points. */
  preview(maxChars: number): string {
    const singleLine = this.content.trim().replace(WHITESPACE_BREAKS, ' ');
    const chars = Array.from(singleLine);
    if (chars.length > maxChars) {
      return `${chars.slice(0, maxChars).join('')}…`;
    }
    return singleLine;
  }

  /** Capture time as local `HH:MM:SS`. */
  timestampLabel(): string {
    const date = this.capturedAt;
    if (Number.isNaN(date.getTime())) return '??:??:??';
    return `${pad2(date.getHours())}:${pad2(date.getMinutes())}:${pad2(date.getSeconds())}`;
  }
}
