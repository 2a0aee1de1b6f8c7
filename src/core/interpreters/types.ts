export type Rgba = readonly [r: number, g: number, b: number, a: number];

/** A single labelled reading shown for a snapshot. */
export interface InterpretItem {
  label: string;
  value: string;
  /** Swatch color for items that describe a color. */
  color?: Rgba;
}

export interface InterpretResult {
  items: InterpretItem[];
}

/**
 * Maps clipboard text to at most one structured reading.
 *
 * `interpret` returns null when the content is not something this interpreter understands.
 * That is the normal outcome for most inputs, not an error. Implementations keep no state.
 */
export interface Interpreter {
  readonly name: string;
  interpret(content: string): InterpretResult | null;
}

export interface InterpreterOutput {
  name: string;
  result: InterpretResult | null;
}

export function textItem(label: string, value: string): InterpretItem {
  return { label, value };
}

export function colorItem(label: string, value: string, color: Rgba): InterpretItem {
  return { label, value, color };
}
