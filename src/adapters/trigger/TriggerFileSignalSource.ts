import { unlink } from 'node:fs/promises';
import type { CaptureSignalSink } from '../../core/capture/types.js';
import { createLogger } from '../../utils/logger.js';

/**
 * Sends a capture signal whenever the trigger file appears, then deletes it.
 *
 * Lets compositors without a global key hook bind a hotkey to `touch <trigger file>`.
 */
export class TriggerFileSignalSource {
  private readonly logger = createLogger({ adapter: 'TriggerFileSignalSource' });
  private timer: NodeJS.Timeout | null = null;
  private checking = false;
  private lastErrorCode: string | undefined;

  constructor(
    private readonly triggerPath: string,
    private readonly sink: CaptureSignalSink,
    private readonly pollIntervalMs: number
  ) {}

  start(): void {
    if (this.timer) return;
    this.logger.info({ triggerPath: this.triggerPath }, 'Watching capture trigger file');
    this.timer = setInterval(() => {
      if (this.checking) return;
      this.checking = true;
      this.checkNow()
        .catch((error) => {
          this.logger.error({ error }, 'Trigger file check failed');
        })
        .finally(() => {
          this.checking = false;
        });
    }, this.pollIntervalMs);
  }

  stop(): void {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = null;
  }

  /** Consumes the trigger file if present. Returns whether a signal was sent. */
  async checkNow(): Promise<boolean> {
    try {
      await unlink(this.triggerPath);
    } catch (error) {
      const code = error instanceof Error && 'code' in error ? String(error.code) : undefined;
      if (code !== 'ENOENT' && code !== this.lastErrorCode) {
        this.logger.warn({ error, triggerPath: this.triggerPath }, 'Cannot consume trigger file');
      }
      this.lastErrorCode = code;
      return false;
    }
    this.lastErrorCode = undefined;
    this.sink.send();
    return true;
  }
}
