export interface KeyEvent {
  type: 'press' | 'release';
  /** Key name, e.g. `H`, `ControlLeft`, `ShiftRight`, `Alt`. */
  key: string;
}

/** A global keyboard event stream, typically backed by an OS-level input hook. */
export interface KeyEventPort {
  onKeyEvent(handler: (event: KeyEvent) => void): void;
}
