import type { CaptureOutcome } from '../capture/types.js';
import type { ClipboardEntry } from '../history/ClipboardEntry.js';
import type { ClipboardHistory } from '../history/ClipboardHistory.js';
import type { InterpreterOutput } from '../interpreters/types.js';
import type { InterpreterRegistry } from '../interpreters/InterpreterRegistry.js';

export interface Interpretation {
  index: number;
  entry: ClipboardEntry;
  outputs: InterpreterOutput[];
}

/** Selection state over the history, plus the readings for the selected entry. */
export class InterpretationSession {
  private selected: number | null = null;

  constructor(
    private readonly history: ClipboardHistory,
    private readonly registry: InterpreterRegistry
  ) {}

  get selectedIndex(): number | null {
    return this.selected;
  }

  select(index: number): boolean {
    if (!this.history.get(index)) return false;
    this.selected = index;
    return true;
  }

  clearSelection(): void {
    this.selected = null;
  }

  selectedEntry(): ClipboardEntry | undefined {
    return this.selected === null ? undefined : this.history.get(this.selected);
  }

  /** Recomputed on every call; nothing is cached between selections. */
  interpretations(): Interpretation | null {
    const index = this.selected;
    if (index === null) return null;
    const entry = this.history.get(index);
    if (!entry) return null;
    return { index, entry, outputs: this.registry.runAll(entry.content) };
  }

  /** The newest snapshot becomes the selection after every capture attempt that found text. */
  handleCapture(outcome: CaptureOutcome): void {
    if ((outcome.status === 'captured' || outcome.status === 'duplicate') && !this.history.isEmpty) {
      this.selected = 0;
    }
  }

  handleRemoved(index: number): void {
    if (this.selected === null) return;
    if (this.selected === index) {
      this.selected = null;
    } else if (this.selected > index) {
      this.selected -= 1;
    }
  }

  handleCleared(): void {
    this.selected = null;
  }
}
