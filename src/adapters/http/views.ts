import type { CaptureOutcome } from '../../core/capture/types.js';
import type { ClipboardEntry } from '../../core/history/ClipboardEntry.js';
import type { InterpretItem } from '../../core/interpreters/types.js';
import type { Interpretation } from '../../core/session/InterpretationSession.js';

export interface EntryView {
  index: number;
  content: string;
  preview: string;
  capturedAt: string;
  time: string;
}

export type InterpreterView =
  | { name: string; applicable: true; items: InterpretItem[] }
  | { name: string; applicable: false };

export interface SelectionView {
  entry: EntryView;
  interpretations: InterpreterView[];
}

export function toEntryView(entry: ClipboardEntry, index: number, previewLength: number): EntryView {
  return {
    index,
    content: entry.content,
    preview: entry.preview(previewLength),
    capturedAt: entry.capturedAt.toISOString(),
    time: entry.timestampLabel(),
  };
}

export function toSelectionView(interpretation: Interpretation, previewLength: number): SelectionView {
  return {
    entry: toEntryView(interpretation.entry, interpretation.index, previewLength),
    interpretations: interpretation.outputs.map(({ name, result }) =>
      result ? { name, applicable: true, items: result.items } : { name, applicable: false }
    ),
  };
}

export function toOutcomeView(outcome: CaptureOutcome, previewLength: number): Record<string, unknown> {
  switch (outcome.status) {
    case 'captured':
      return { status: outcome.status, entry: toEntryView(outcome.entry, 0, previewLength) };
    case 'failed':
      return { status: outcome.status, message: outcome.message };
    default:
      return { status: outcome.status };
  }
}
