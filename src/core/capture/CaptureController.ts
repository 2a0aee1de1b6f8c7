import type { ClipboardPort } from '../../ports/ClipboardPort.js';
import { createLogger } from '../../utils/logger.js';
import type { ClipboardHistory } from '../history/ClipboardHistory.js';
import type { SignalChannel } from './SignalChannel.js';
import type { CaptureHandler, CaptureOutcome } from './types.js';

/**
 * Owns every history mutation. Signal sources only enqueue requests on the channel; the
 * capture loop turns each one into a clipboard read and a history push.
 */
export class CaptureController {
  private readonly logger = createLogger({ service: 'CaptureController' });
  private readonly handlers: CaptureHandler[] = [];
  private queue: Promise<unknown> = Promise.resolve();

  constructor(
    private readonly history: ClipboardHistory,
    private readonly clipboard: ClipboardPort,
    private readonly signals: SignalChannel
  ) {}

  onCapture(handler: CaptureHandler): void {
    this.handlers.push(handler);
  }

  /** Asks for a capture on the next loop iteration. */
  requestCapture(): void {
    this.signals.send();
  }

  /** Handles every pending signal, one clipboard read and push each. */
  processPending(): Promise<CaptureOutcome[]> {
    return this.serialize(async () => {
      const count = this.signals.drain();
      const outcomes: CaptureOutcome[] = [];
      for (let i = 0; i < count; i++) {
        outcomes.push(await this.capture());
      }
      return outcomes;
    });
  }

  captureNow(): Promise<CaptureOutcome> {
    return this.serialize(() => this.capture());
  }

  clearHistory(): Promise<void> {
    return this.serialize(async () => {
      this.history.clear();
      this.logger.info('History cleared');
    });
  }

  removeEntry(index: number): Promise<boolean> {
    return this.serialize(async () => {
      const removed = this.history.remove(index);
      if (removed) this.logger.info({ index }, 'History entry removed');
      return removed;
    });
  }

  private serialize<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(task);
    this.queue = run.catch(() => undefined);
    return run;
  }

  private async capture(): Promise<CaptureOutcome> {
    const logger = this.logger.child({ method: 'capture' });
    let outcome: CaptureOutcome;

    try {
      const text = await this.clipboard.readText();
      if (!text) {
        logger.debug('Clipboard has no text; nothing captured');
        outcome = { status: 'empty' };
      } else {
        const entry = this.history.push(text);
        if (entry) {
          logger.info({ length: text.length, historySize: this.history.size }, 'Captured clipboard text');
          outcome = { status: 'captured', entry };
        } else {
          logger.debug('Clipboard unchanged since last capture');
          outcome = { status: 'duplicate' };
        }
      }
    } catch (error) {
      logger.warn({ error }, 'Clipboard read failed');
      outcome = { status: 'failed', message: error instanceof Error ? error.message : String(error) };
    }

    this.notify(outcome);
    return outcome;
  }

  private notify(outcome: CaptureOutcome): void {
    for (const handler of this.handlers) {
      try {
        handler(outcome);
      } catch (error) {
        this.logger.error({ error, status: outcome.status }, 'Capture handler failed');
      }
    }
  }
}
