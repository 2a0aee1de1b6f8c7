import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import type { ClipboardPort } from '../../ports/ClipboardPort.js';
import { ClipboardError } from '../../utils/errors.js';
import { createLogger } from '../../utils/logger.js';

const execFileAsync = promisify(execFile);

const MAX_CLIPBOARD_BYTES = 64 * 1024 * 1024;
const READ_TIMEOUT_MS = 2000;

export interface ClipboardCommand {
  program: string;
  args: string[];
}

export type CommandRunner = (program: string, args: string[]) => Promise<string>;

export interface CommandClipboardOptions {
  env?: NodeJS.ProcessEnv;
  platform?: NodeJS.Platform;
  run?: CommandRunner;
}

const runCommand: CommandRunner = async (program, args) => {
  const { stdout } = await execFileAsync(program, args, {
    encoding: 'utf8',
    maxBuffer: MAX_CLIPBOARD_BYTES,
    timeout: READ_TIMEOUT_MS,
  });
  return stdout;
};

/** Clipboard tools to try for the current desktop session, in preference order. */
export function clipboardCommands(env: NodeJS.ProcessEnv, platform: NodeJS.Platform): ClipboardCommand[] {
  const commands: ClipboardCommand[] = [];
  if (env.WAYLAND_DISPLAY) {
    commands.push({ program: 'wl-paste', args: ['--no-newline'] });
  }
  if (env.DISPLAY) {
    commands.push({ program: 'xclip', args: ['-selection', 'clipboard', '-out'] });
    commands.push({ program: 'xsel', args: ['--clipboard', '--output'] });
  }
  if (platform === 'darwin') {
    commands.push({ program: 'pbpaste', args: [] });
  }
  return commands;
}

function isMissingProgram(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/** Reads clipboard text through the platform's command-line clipboard tools. */
export class CommandClipboardAdapter implements ClipboardPort {
  private readonly logger = createLogger({ adapter: 'CommandClipboardAdapter' });
  private readonly commands: ClipboardCommand[];
  private readonly run: CommandRunner;

  constructor(options: CommandClipboardOptions = {}) {
    this.commands = clipboardCommands(options.env ?? process.env, options.platform ?? process.platform);
    this.run = options.run ?? runCommand;
  }

  async readText(): Promise<string | null> {
    let anyToolRan = false;

    for (const { program, args } of this.commands) {
      try {
        const text = await this.run(program, args);
        anyToolRan = true;
        if (text.length > 0) return text;
      } catch (error) {
        if (isMissingProgram(error)) {
          this.logger.debug({ program }, 'Clipboard tool not installed');
          continue;
        }
        // Most tools exit non-zero when the clipboard holds no text.
        anyToolRan = true;
        this.logger.debug({ program, error }, 'Clipboard tool returned no text');
      }
    }

    if (!anyToolRan) {
      throw new ClipboardError(
        'Could not read clipboard: no clipboard tool available (install wl-clipboard, xclip or xsel)'
      );
    }
    return null;
  }
}
