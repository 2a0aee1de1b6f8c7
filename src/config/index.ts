import { z } from 'zod';
import { DEFAULT_HOTKEY, parseHotkey } from '../adapters/hotkey/hotkeyBinding.js';
import { ConfigError, HotkeyError } from '../utils/errors.js';

const hotkeySchema = z
  .string()
  .default(DEFAULT_HOTKEY)
  .superRefine((value, ctx) => {
    try {
      parseHotkey(value);
    } catch (error) {
      if (!(error instanceof HotkeyError)) throw error;
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: error.message });
    }
  });

const configSchema = z.object({
  // History
  historySize: z.coerce.number().int().positive().default(50),
  previewLength: z.coerce.number().int().positive().default(45),

  // Capture triggers
  captureHotkey: hotkeySchema,
  triggerFile: z.string().min(1).default('/tmp/cliplens-trigger'),
  pollIntervalMs: z.coerce.number().int().positive().default(50),

  // App
  logLevel: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info'),
  host: z.string().default('127.0.0.1'),
  port: z.coerce.number().int().positive().default(4750),
});

export type Config = z.infer<typeof configSchema>;

export function parseConfig(env: NodeJS.ProcessEnv): Config {
  // Helper to convert empty strings to undefined
  const read = (key: string): string | undefined => {
    const value = env[key];
    return value === '' ? undefined : value;
  };

  const raw = {
    historySize: read('HISTORY_SIZE'),
    previewLength: read('PREVIEW_LENGTH'),
    captureHotkey: read('CAPTURE_HOTKEY'),
    triggerFile: read('TRIGGER_FILE'),
    pollIntervalMs: read('POLL_INTERVAL_MS'),
    logLevel: read('LOG_LEVEL'),
    host: read('HOST'),
    port: read('PORT'),
  };

  const result = configSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Configuration validation failed:\n${issues.join('\n')}`);
  }
  return result.data;
}

export function loadConfig(): Config {
  return parseConfig(process.env);
}
