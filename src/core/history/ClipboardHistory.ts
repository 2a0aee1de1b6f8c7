import { HistoryError } from '../../utils/errors.js';
import { ClipboardEntry } from './ClipboardEntry.js';

export const DEFAULT_HISTORY_SIZE = 50;

/**
 * Bounded, newest-first store of clipboard snapshots.
 *
 * Only immediately repeated content is suppressed: text that reappears further back in
 * history is stored again.
 */
export class ClipboardHistory {
  private readonly items: ClipboardEntry[] = [];

  constructor(readonly maxSize: number = DEFAULT_HISTORY_SIZE) {
    if (!Number.isInteger(maxSize) || maxSize < 1) {
      throw new HistoryError(`History capacity must be a positive integer, got ${maxSize}`);
    }
  }

  /** Stores `content` at the front. Returns the new entry, or null when nothing was stored. */
  push(content: string, at: Date = new Date()): ClipboardEntry | null {
    if (content.length === 0) return null;
    if (this.items[0]?.content === content) return null;

    // Evict before inserting so the length never exceeds capacity.
    while (this.items.length >= this.maxSize) {
      this.items.pop();
    }
    const entry = new ClipboardEntry(content, at);
    this.items.unshift(entry);
    return entry;
  }

  get(index: number): ClipboardEntry | undefined {
    if (!Number.isInteger(index)) return undefined;
    return this.items[index];
  }

  remove(index: number): boolean {
    if (!Number.isInteger(index) || index < 0 || index >= this.items.length) return false;
    this.items.splice(index, 1);
    return true;
  }

  clear(): void {
    this.items.length = 0;
  }

  entries(): readonly ClipboardEntry[] {
    return [...this.items];
  }

  get size(): number {
    return this.items.length;
  }

  get isEmpty(): boolean {
    return this.items.length === 0;
  }
}
