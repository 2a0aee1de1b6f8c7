import type { CaptureSignalSink } from './types.js';

/**
 * Unbounded queue of zero-payload "capture requested" signals.
 *
 * Producers only call `send`; the capture loop takes everything pending with `drain`.
 */
export class SignalChannel implements CaptureSignalSink {
  private pendingCount = 0;

  send(): void {
    this.pendingCount += 1;
  }

  /** Takes every pending signal without waiting and returns how many there were. */
  drain(): number {
    const count = this.pendingCount;
    this.pendingCount = 0;
    return count;
  }

  get pending(): number {
    return this.pendingCount;
  }
}
