// Load environment variables first
import 'dotenv/config';

import { loadConfig } from './config/index.js';
import { createLogger } from './utils/logger.js';
import { ClipboardHistory } from './core/history/ClipboardHistory.js';
import { SignalChannel } from './core/capture/SignalChannel.js';
import { CaptureController } from './core/capture/CaptureController.js';
import { createDefaultRegistry } from './core/interpreters/InterpreterRegistry.js';
import { InterpretationSession } from './core/session/InterpretationSession.js';
import { CommandClipboardAdapter } from './adapters/clipboard/CommandClipboardAdapter.js';
import { TriggerFileSignalSource } from './adapters/trigger/TriggerFileSignalSource.js';
import { formatHotkey, parseHotkey } from './adapters/hotkey/hotkeyBinding.js';
import { HotkeySignalSource } from './adapters/hotkey/HotkeySignalSource.js';
import {
  loadUiohookKeyEvents,
  type UiohookKeyEventAdapter,
} from './adapters/hotkey/UiohookKeyEventAdapter.js';
import { startCaptureLoop } from './scheduler/index.js';
import { startServer } from './server.js';

const logger = createLogger({ component: 'index' });

/** Starts the global hotkey, or returns null when this host has no usable keyboard hook. */
async function startHotkey(
  hotkey: string,
  signals: SignalChannel
): Promise<UiohookKeyEventAdapter | null> {
  try {
    const keyEvents = await loadUiohookKeyEvents();
    new HotkeySignalSource(parseHotkey(hotkey), keyEvents, signals).start();
    keyEvents.start();
    return keyEvents;
  } catch (error) {
    logger.warn({ error }, 'Global hotkey unavailable; use the trigger file or HTTP API to capture');
    return null;
  }
}

async function main(): Promise<void> {
  const config = loadConfig();
  logger.info('Starting cliplens');

  try {
    const history = new ClipboardHistory(config.historySize);
    const signals = new SignalChannel();
    const controller = new CaptureController(history, new CommandClipboardAdapter(), signals);
    const session = new InterpretationSession(history, createDefaultRegistry());
    controller.onCapture((outcome) => session.handleCapture(outcome));

    // Background signal sources only enqueue; the loop below performs the captures
    const triggerSource = new TriggerFileSignalSource(config.triggerFile, signals, config.pollIntervalMs);
    triggerSource.start();
    const keyEvents = await startHotkey(config.captureHotkey, signals);
    const stopLoop = startCaptureLoop(controller, config.pollIntervalMs);

    const server = await startServer(
      { history, controller, session, previewLength: config.previewLength },
      config.port,
      config.host
    );

    const hotkey = keyEvents ? formatHotkey(parseHotkey(config.captureHotkey)) : null;
    logger.info(
      {
        hotkey,
        triggerFile: config.triggerFile,
        historySize: config.historySize,
      },
      hotkey
        ? `Ready. Press ${hotkey} or touch ${config.triggerFile} to capture`
        : `Ready. Bind your hotkey to: touch ${config.triggerFile}`
    );

    const shutdown = (signal: string): void => {
      logger.info({ signal }, 'Shutting down');
      triggerSource.stop();
      keyEvents?.stop();
      stopLoop();
      server.close();
    };
    process.once('SIGINT', () => shutdown('SIGINT'));
    process.once('SIGTERM', () => shutdown('SIGTERM'));
  } catch (error) {
    logger.error({ error }, 'Failed to start application');
    process.exit(1);
  }
}

main().catch((error) => {
  console.error('Unhandled error:', error);
  process.exit(1);
});
