import type { ClipboardEntry } from '../history/ClipboardEntry.js';

export type CaptureOutcome =
  | {
      status: 'captured';
      entry: ClipboardEntry;
    }
  | {
      status: 'duplicate';
    }
  | {
      status: 'empty';
    }
  | {
      status: 'failed';
      message: string;
    };

export type CaptureHandler = (outcome: CaptureOutcome) => void;

/** Anything that can ask for a capture: hotkeys, trigger files, API calls. */
export interface CaptureSignalSink {
  send(): void;
}
