import type { CaptureController } from '../core/capture/CaptureController.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger({ component: 'scheduler' });

/** Drains pending capture signals every `intervalMs`. Returns a function that stops the loop. */
export function startCaptureLoop(controller: CaptureController, intervalMs: number): () => void {
  if (!Number.isInteger(intervalMs) || intervalMs <= 0) {
    throw new Error(`Invalid capture loop interval: ${intervalMs}`);
  }

  logger.info({ intervalMs }, 'Starting capture loop');
  let running = false;
  const timer = setInterval(() => {
    if (running) return;
    running = true;
    controller
      .processPending()
      .catch((error) => {
        logger.error({ error }, 'Capture loop iteration failed');
      })
      .finally(() => {
        running = false;
      });
  }, intervalMs);

  return () => {
    clearInterval(timer);
    logger.info('Capture loop stopped');
  };
}
