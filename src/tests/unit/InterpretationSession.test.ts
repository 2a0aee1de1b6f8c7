import { describe, it, expect, vi, beforeEach } from 'vitest';
import { ClipboardHistory } from '../../core/history/ClipboardHistory.js';
import { createDefaultRegistry, type InterpreterRegistry } from '../../core/interpreters/InterpreterRegistry.js';
import { InterpretationSession } from '../../core/session/InterpretationSession.js';
import type { FileSystemPort } from '../../ports/FileSystemPort.js';

describe('InterpretationSession', () => {
  const fileSystem: FileSystemPort = { inspect: vi.fn().mockReturnValue(null) };
  let history: ClipboardHistory;
  let registry: InterpreterRegistry;
  let session: InterpretationSession;

  beforeEach(() => {
    history = new ClipboardHistory(10);
    registry = createDefaultRegistry({ homeDir: '/home/test', fileSystem });
    session = new InterpretationSession(history, registry);
  });

  it('has no interpretations until something is selected', () => {
    history.push('#fff');

    expect(session.selectedIndex).toBeNull();
    expect(session.interpretations()).toBeNull();
  });

  it('refuses to select an index outside the history', () => {
    history.push('a');

    expect(session.select(1)).toBe(false);
    expect(session.selectedIndex).toBeNull();
  });

  it('runs every interpreter over the selected entry', () => {
    history.push('550e8400-e29b-41d4-a716-446655440000');
    history.push('#fff');

    expect(session.select(1)).toBe(true);
    const interpretation = session.interpretations();

    expect(interpretation?.index).toBe(1);
    expect(interpretation?.entry.content).toBe('550e8400-e29b-41d4-a716-446655440000');
    expect(interpretation?.outputs.map((output) => [output.name, output.result !== null])).toEqual([
      ['Hex Dump', true],
      ['UUID', true],
      ['Color Code', false],
      ['File Path', false],
    ]);
  });

  it('recomputes interpretations on every call', () => {
    const runAll = vi.spyOn(registry, 'runAll');
    history.push('a');
    session.select(0);

    session.interpretations();
    session.interpretations();

    expect(runAll).toHaveBeenCalledTimes(2);
  });

  it('selects the newest entry after a capture that found text', () => {
    history.push('a');
    const entry = history.push('b');
    session.select(1);

    if (!entry) throw new Error('expected an entry');
    session.handleCapture({ status: 'captured', entry });
    expect(session.selectedIndex).toBe(0);

    session.select(1);
    session.handleCapture({ status: 'duplicate' });
    expect(session.selectedIndex).toBe(0);

    session.select(1);
    session.handleCapture({ status: 'empty' });
    session.handleCapture({ status: 'failed', message: 'no tool' });
    expect(session.selectedIndex).toBe(1);
  });

  it('keeps the selection on the same entry when an earlier one is removed', () => {
    history.push('a');
    history.push('b');
    history.push('c');
    session.select(2);

    history.remove(0);
    session.handleRemoved(0);

    expect(session.selectedIndex).toBe(1);
    expect(session.selectedEntry()?.content).toBe('a');
  });

  it('drops the selection when the selected entry is removed or history is cleared', () => {
    history.push('a');
    history.push('b');
    session.select(0);

    session.handleRemoved(1);
    expect(session.selectedIndex).toBe(0);

    session.handleRemoved(0);
    expect(session.selectedIndex).toBeNull();

    session.select(0);
    session.handleCleared();
    expect(session.selectedIndex).toBeNull();
  });
});
