import { describe, it, expect, vi } from 'vitest';
import {
  CommandClipboardAdapter,
  clipboardCommands,
  type CommandRunner,
} from '../../adapters/clipboard/CommandClipboardAdapter.js';
import { ClipboardError } from '../../utils/errors.js';

function missing(program: string): Error {
  return Object.assign(new Error(`spawn ${program} ENOENT`), { code: 'ENOENT' });
}

describe('clipboardCommands', () => {
  it('prefers wl-paste on Wayland, then the X11 tools', () => {
    const commands = clipboardCommands({ WAYLAND_DISPLAY: 'wayland-0', DISPLAY: ':0' }, 'linux');
    expect(commands.map((command) => command.program)).toEqual(['wl-paste', 'xclip', 'xsel']);
    expect(commands[0]?.args).toEqual(['--no-newline']);
  });

  it('uses pbpaste on macOS', () => {
    expect(clipboardCommands({}, 'darwin')).toEqual([{ program: 'pbpaste', args: [] }]);
  });

  it('has nothing to try without a desktop session', () => {
    expect(clipboardCommands({}, 'linux')).toEqual([]);
  });
});

describe('CommandClipboardAdapter', () => {
  it('returns the first non-empty text', async () => {
    const run = vi.fn<CommandRunner>().mockResolvedValueOnce('').mockResolvedValueOnce('copied text');
    const adapter = new CommandClipboardAdapter({ env: { WAYLAND_DISPLAY: 'wayland-0', DISPLAY: ':0' }, platform: 'linux', run });

    await expect(adapter.readText()).resolves.toBe('copied text');
    expect(run).toHaveBeenNthCalledWith(1, 'wl-paste', ['--no-newline']);
    expect(run).toHaveBeenNthCalledWith(2, 'xclip', ['-selection', 'clipboard', '-out']);
    expect(run).toHaveBeenCalledTimes(2);
  });

  it('skips tools that are not installed', async () => {
    const run = vi.fn<CommandRunner>().mockRejectedValueOnce(missing('xclip')).mockResolvedValueOnce('from xsel');
    const adapter = new CommandClipboardAdapter({ env: { DISPLAY: ':0' }, platform: 'linux', run });

    await expect(adapter.readText()).resolves.toBe('from xsel');
  });

  it('returns null when the tools run but find no text', async () => {
    const run = vi
      .fn<CommandRunner>()
      .mockRejectedValueOnce(new Error('Error: target STRING not available'))
      .mockResolvedValueOnce('');
    const adapter = new CommandClipboardAdapter({ env: { DISPLAY: ':0' }, platform: 'linux', run });

    await expect(adapter.readText()).resolves.toBeNull();
  });

  it('fails when no clipboard tool could be started', async () => {
    const run = vi.fn<CommandRunner>().mockImplementation(async (program) => {
      throw missing(program);
    });
    const adapter = new CommandClipboardAdapter({ env: { DISPLAY: ':0' }, platform: 'linux', run });

    await expect(adapter.readText()).rejects.toBeInstanceOf(ClipboardError);
  });

  it('fails when the session offers no clipboard tool at all', async () => {
    const run = vi.fn<CommandRunner>();
    const adapter = new CommandClipboardAdapter({ env: {}, platform: 'linux', run });

    await expect(adapter.readText()).rejects.toThrow(/no clipboard tool available/);
    expect(run).not.toHaveBeenCalled();
  });
});
