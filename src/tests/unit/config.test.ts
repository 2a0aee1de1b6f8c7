import { describe, it, expect } from 'vitest';
import { parseConfig } from '../../config/index.js';
import { ConfigError } from '../../utils/errors.js';

describe('parseConfig', () => {
  it('falls back to defaults', () => {
    expect(parseConfig({})).toEqual({
      historySize: 50,
      previewLength: 45,
      captureHotkey: 'Ctrl+Shift+H',
      triggerFile: '/tmp/cliplens-trigger',
      pollIntervalMs: 50,
      logLevel: 'info',
      host: '127.0.0.1',
      port: 4750,
    });
  });

  it('reads and coerces environment values', () => {
    const config = parseConfig({
      HISTORY_SIZE: '10',
      CAPTURE_HOTKEY: 'Alt+F5',
      POLL_INTERVAL_MS: '250',
      PORT: '8080',
      LOG_LEVEL: 'debug',
    });

    expect(config.historySize).toBe(10);
    expect(config.captureHotkey).toBe('Alt+F5');
    expect(config.pollIntervalMs).toBe(250);
    expect(config.port).toBe(8080);
    expect(config.logLevel).toBe('debug');
  });

  it('treats empty values as unset', () => {
    expect(parseConfig({ HISTORY_SIZE: '', CAPTURE_HOTKEY: '' }).historySize).toBe(50);
  });

  it('rejects a non-positive history size', () => {
    expect(() => parseConfig({ HISTORY_SIZE: '0' })).toThrow(ConfigError);
    expect(() => parseConfig({ HISTORY_SIZE: 'many' })).toThrow(/historySize/);
  });

  it('rejects an unparseable hotkey', () => {
    expect(() => parseConfig({ CAPTURE_HOTKEY: 'Ctrl+Shift' })).toThrow(
      /captureHotkey: Invalid hotkey "Ctrl\+Shift": no key besides modifiers/
    );
  });
});
