import { createLogger } from '../../utils/logger.js';
import { ColorInterpreter } from './ColorInterpreter.js';
import { FilePathInterpreter, type FilePathInterpreterOptions } from './FilePathInterpreter.js';
import { HexInterpreter } from './HexInterpreter.js';
import type { InterpretResult, Interpreter, InterpreterOutput } from './types.js';
import { UuidInterpreter } from './UuidInterpreter.js';

/** Fixed, ordered set of interpreters run side by side over one snapshot. */
export class InterpreterRegistry {
  private readonly logger = createLogger({ component: 'InterpreterRegistry' });
  private readonly interpreters: readonly Interpreter[];

  constructor(interpreters: readonly Interpreter[]) {
    this.interpreters = [...interpreters];
  }

  names(): string[] {
    return this.interpreters.map((interpreter) => interpreter.name);
  }

  /** Runs every interpreter in registry order; a throwing interpreter counts as a decline. */
  runAll(content: string): InterpreterOutput[] {
    return this.interpreters.map((interpreter) => ({
      name: interpreter.name,
      result: this.runOne(interpreter, content),
    }));
  }

  private runOne(interpreter: Interpreter, content: string): InterpretResult | null {
    try {
      return interpreter.interpret(content);
    } catch (error) {
      this.logger.warn(
        { error, interpreter: interpreter.name, contentLength: content.length },
        'Interpreter failed; treating as not applicable'
      );
      return null;
    }
  }
}

export type DefaultRegistryOptions = FilePathInterpreterOptions;

export function createDefaultRegistry(options: DefaultRegistryOptions = {}): InterpreterRegistry {
  return new InterpreterRegistry([
    new HexInterpreter(),
    new UuidInterpreter(),
    new ColorInterpreter(),
    new FilePathInterpreter(options),
  ]);
}
