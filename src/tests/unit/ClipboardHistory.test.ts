import { describe, it, expect } from 'vitest';
import { ClipboardHistory, DEFAULT_HISTORY_SIZE } from '../../core/history/ClipboardHistory.js';
import { ClipboardEntry } from '../../core/history/ClipboardEntry.js';
import { HistoryError } from '../../utils/errors.js';

function contents(history: ClipboardHistory): string[] {
  return history.entries().map((entry) => entry.content);
}

describe('ClipboardHistory', () => {
  it('defaults to 50 entries of capacity', () => {
    expect(new ClipboardHistory().maxSize).toBe(DEFAULT_HISTORY_SIZE);
    expect(DEFAULT_HISTORY_SIZE).toBe(50);
  });

  it('rejects capacities that are not positive integers', () => {
    expect(() => new ClipboardHistory(0)).toThrow(HistoryError);
    expect(() => new ClipboardHistory(-3)).toThrow(HistoryError);
    expect(() => new ClipboardHistory(2.5)).toThrow(HistoryError);
  });

  it('stores entries newest-first with their capture time', () => {
    const history = new ClipboardHistory(5);
    const first = new Date('2024-03-01T10:00:00Z');
    const second = new Date('2024-03-01T10:00:05Z');

    history.push('first', first);
    history.push('second', second);

    expect(contents(history)).toEqual(['second', 'first']);
    expect(history.get(0)?.capturedAt.getTime()).toBe(second.getTime());
    expect(history.get(1)?.capturedAt.getTime()).toBe(first.getTime());
  });

  it('ignores empty content', () => {
    const history = new ClipboardHistory(5);
    expect(history.push('')).toBeNull();
    expect(history.isEmpty).toBe(true);
  });

  it('suppresses a push identical to the newest entry', () => {
    const history = new ClipboardHistory(5);
    const stored = history.push('same');

    expect(stored).toBeInstanceOf(ClipboardEntry);
    expect(history.push('same')).toBeNull();
    expect(history.size).toBe(1);
  });

  it('stores content again when it is not the newest entry', () => {
    const history = new ClipboardHistory(5);
    history.push('a');
    history.push('b');
    history.push('a');

    expect(contents(history)).toEqual(['a', 'b', 'a']);
  });

  it('keeps the most recent maxSize entries, evicting the oldest first', () => {
    const history = new ClipboardHistory(3);
    for (const text of ['one', 'two', 'three', 'four', 'five']) {
      history.push(text);
      expect(history.size).toBeLessThanOrEqual(3);
    }

    expect(contents(history)).toEqual(['five', 'four', 'three']);
  });

  it('never exceeds capacity for a long mixed sequence of pushes', () => {
    const history = new ClipboardHistory(4);
    for (let i = 0; i < 200; i++) {
      history.push(i % 7 === 0 ? '' : `item-${i % 11}`);
      expect(history.size).toBeLessThanOrEqual(4);
    }
    expect(history.size).toBe(4);
  });

  it('returns a fresh copy from entries()', () => {
    const history = new ClipboardHistory(5);
    history.push('a');
    const snapshot = history.entries();

    history.push('b');

    expect(snapshot.map((entry) => entry.content)).toEqual(['a']);
    expect(contents(history)).toEqual(['b', 'a']);
  });

  it('clears every entry', () => {
    const history = new ClipboardHistory(5);
    history.push('a');
    history.push('b');
    history.clear();

    expect(history.size).toBe(0);
    expect(history.entries()).toEqual([]);
  });

  it('removes a single entry by index', () => {
    const history = new ClipboardHistory(5);
    history.push('a');
    history.push('b');
    history.push('c');

    expect(history.remove(1)).toBe(true);
    expect(contents(history)).toEqual(['c', 'a']);
    expect(history.remove(5)).toBe(false);
    expect(history.remove(-1)).toBe(false);
    expect(history.size).toBe(2);
  });

  it('returns undefined for indexes outside the history', () => {
    const history = new ClipboardHistory(5);
    history.push('a');

    expect(history.get(1)).toBeUndefined();
    expect(history.get(-1)).toBeUndefined();
    expect(history.get(0.5)).toBeUndefined();
  });
});

describe('ClipboardEntry', () => {
  it('collapses line breaks and tabs in the preview', () => {
    const entry = new ClipboardEntry('  line one\nline two\tend\r\n');
    expect(entry.preview(45)).toBe('line one line two end');
  });

  it('truncates long previews with an ellipsis', () => {
    const entry = new ClipboardEntry('abcdefgh');
    expect(entry.preview(3)).toBe('abc…');
    expect(entry.preview(8)).toBe('abcdefgh');
  });

  it('counts code points, not UTF-16 units, when truncating', () => {
    const entry = new ClipboardEntry('😀😀😀');
    expect(entry.preview(2)).toBe('😀😀…');
  });

  it('formats the capture time as local HH:MM:SS', () => {
    const entry = new ClipboardEntry('x', new Date(2024, 0, 1, 9, 5, 7));
    expect(entry.timestampLabel()).toBe('09:05:07');
  });

  it('cannot be changed through its capture time', () => {
    const at = new Date(2024, 0, 1, 9, 5, 7);
    const entry = new ClipboardEntry('x', at);

    entry.capturedAt.setFullYear(1999);
    at.setFullYear(1999);

    expect(entry.capturedAt.getFullYear()).toBe(2024);
    expect(Object.isFrozen(entry)).toBe(true);
  });
});
