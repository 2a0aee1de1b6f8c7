export class CliplensError extends Error {
  public readonly code: string;

  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'CliplensError';
    this.code = code;
    Error.captureStackTrace(this, this.constructor);
  }
}

export class AdapterError extends CliplensError {
  constructor(adapter: string, message: string, options?: ErrorOptions) {
    super(message, `ADAPTER_${adapter.toUpperCase()}`, options);
    this.name = 'AdapterError';
  }
}

export class ClipboardError extends AdapterError {
  constructor(message: string, options?: ErrorOptions) {
    super('CLIPBOARD', message, options);
    this.name = 'ClipboardError';
  }
}

export class HotkeyError extends CliplensError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'HOTKEY_ERROR', options);
    this.name = 'HotkeyError';
  }
}

export class HistoryError extends CliplensError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'HISTORY_ERROR', options);
    this.name = 'HistoryError';
  }
}

export class ConfigError extends CliplensError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'CONFIG_ERROR', options);
    this.name = 'ConfigError';
  }
}
