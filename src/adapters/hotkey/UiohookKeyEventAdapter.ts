import type { KeyEvent, KeyEventPort } from '../../ports/KeyEventPort.js';
import { HotkeyError } from '../../utils/errors.js';
import { createLogger } from '../../utils/logger.js';

/** The slice of a native keyboard hook this adapter drives. */
export interface KeyHook {
  onKeyDown(listener: (keycode: number) => void): void;
  onKeyUp(listener: (keycode: number) => void): void;
  start(): void;
  stop(): void;
}

/** Inverts a `name -> keycode` table. The first name listed for a code wins. */
export function keyNamesByCode(table: Readonly<Record<string, number>>): Map<number, string> {
  const names = new Map<number, string>();
  for (const [name, code] of Object.entries(table)) {
    if (!names.has(code)) names.set(code, name);
  }
  return names;
}

/**
 * Global key events from an OS-level hook, translated from keycodes to key names
 * (`H`, `F5`, `Ctrl`, `ShiftRight`). Codes without a name are dropped.
 */
export class UiohookKeyEventAdapter implements KeyEventPort {
  private readonly logger = createLogger({ adapter: 'UiohookKeyEventAdapter' });
  private readonly handlers: Array<(event: KeyEvent) => void> = [];
  private running = false;

  constructor(
    private readonly hook: KeyHook,
    private readonly keyNames: ReadonlyMap<number, string>
  ) {
    hook.onKeyDown((keycode) => this.emit('press', keycode));
    hook.onKeyUp((keycode) => this.emit('release', keycode));
  }

  onKeyEvent(handler: (event: KeyEvent) => void): void {
    this.handlers.push(handler);
  }

  start(): void {
    if (this.running) return;
    try {
      this.hook.start();
    } catch (error) {
      throw new HotkeyError('Failed to start the global keyboard hook', { cause: error });
    }
    this.running = true;
    this.logger.debug('Keyboard hook started');
  }

  stop(): void {
    if (!this.running) return;
    this.running = false;
    this.hook.stop();
  }

  private emit(type: KeyEvent['type'], keycode: number): void {
    const key = this.keyNames.get(keycode);
    if (key === undefined) return;
    for (const handler of this.handlers) {
      handler({ type, key });
    }
  }
}

/**
 * Loads the native hook from `uiohook-napi`. Throws `HotkeyError` when the module cannot be
 * loaded on this host (no display server, missing system libraries).
 */
export async function loadUiohookKeyEvents(): Promise<UiohookKeyEventAdapter> {
  let hookModule: typeof import('uiohook-napi');
  try {
    hookModule = await import('uiohook-napi');
  } catch (error) {
    throw new HotkeyError('Global keyboard hook is not available on this host', { cause: error });
  }
  const { uIOhook, UiohookKey } = hookModule;

  const hook: KeyHook = {
    onKeyDown: (listener) => {
      uIOhook.on('keydown', (event) => listener(event.keycode));
    },
    onKeyUp: (listener) => {
      uIOhook.on('keyup', (event) => listener(event.keycode));
    },
    start: () => uIOhook.start(),
    stop: () => uIOhook.stop(),
  };
  return new UiohookKeyEventAdapter(hook, keyNamesByCode(UiohookKey));
}
