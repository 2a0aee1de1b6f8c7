import type { CaptureSignalSink } from '../../core/capture/types.js';
import type { KeyEvent, KeyEventPort } from '../../ports/KeyEventPort.js';
import { createLogger } from '../../utils/logger.js';
import { normalizeKeyName, type HotkeyBinding } from './hotkeyBinding.js';

type Modifier = 'ctrl' | 'shift' | 'alt';

const MODIFIER_KEYS = new Map<string, Modifier>([
  ['control', 'ctrl'],
  ['controlleft', 'ctrl'],
  ['controlright', 'ctrl'],
  ['ctrl', 'ctrl'],
  ['ctrlleft', 'ctrl'],
  ['ctrlright', 'ctrl'],
  ['shift', 'shift'],
  ['shiftleft', 'shift'],
  ['shiftright', 'shift'],
  ['alt', 'alt'],
  ['altgr', 'alt'],
  ['altleft', 'alt'],
  ['altright', 'alt'],
]);

/**
 * Watches a global key event stream and sends one capture signal each time the binding's key
 * goes down while exactly the bound modifiers are held. Key repeat does not re-fire.
 */
export class HotkeySignalSource {
  private readonly logger = createLogger({ adapter: 'HotkeySignalSource' });
  private readonly modifiers: Record<Modifier, boolean> = { ctrl: false, shift: false, alt: false };
  private keyHeld = false;
  private started = false;

  constructor(
    private readonly binding: HotkeyBinding,
    private readonly keyEvents: KeyEventPort,
    private readonly sink: CaptureSignalSink
  ) {}

  start(): void {
    if (this.started) return;
    this.started = true;
    this.keyEvents.onKeyEvent((event) => this.handle(event));
    this.logger.info({ binding: this.binding }, 'Listening for capture hotkey');
  }

  private handle(event: KeyEvent): void {
    const pressed = event.type === 'press';
    const modifier = MODIFIER_KEYS.get(event.key.toLowerCase());
    if (modifier) {
      this.modifiers[modifier] = pressed;
      return;
    }
    if (normalizeKeyName(event.key) !== this.binding.key) return;

    if (!pressed) {
      this.keyHeld = false;
      return;
    }
    if (this.keyHeld) return;
    this.keyHeld = true;

    if (
      this.modifiers.ctrl === this.binding.ctrl &&
      this.modifiers.shift === this.binding.shift &&
      this.modifiers.alt === this.binding.alt
    ) {
      this.logger.debug('Capture hotkey pressed');
      this.sink.send();
    }
  }
}
