import { homedir } from 'node:os';
import { basename, dirname } from 'node:path';
import type { FileSystemPort } from '../../ports/FileSystemPort.js';
import { NodeFileSystemAdapter } from '../../adapters/filesystem/NodeFileSystemAdapter.js';
import { textItem, type InterpretItem, type InterpretResult, type Interpreter } from './types.js';

const KB = 1024;
const MB = KB * 1024;
const GB = MB * 1024;

export interface FilePathInterpreterOptions {
  homeDir?: string;
  fileSystem?: FileSystemPort;
}

export function formatSize(bytes: number): string {
  if (bytes >= GB) return `${(bytes / GB).toFixed(2)} GB (${bytes} bytes)`;
  if (bytes >= MB) return `${(bytes / MB).toFixed(2)} MB (${bytes} bytes)`;
  if (bytes >= KB) return `${(bytes / KB).toFixed(2)} KB (${bytes} bytes)`;
  return `${bytes} bytes`;
}

/**
 * Expands a leading `~` and returns the absolute path, or null for anything that is not an
 * absolute or home-relative path.
 */
export function resolveAbsolutePath(text: string, homeDir: string): string | null {
  if (text === '~') return homeDir;
  if (text.startsWith('~/')) return `${homeDir.replace(/\/+$/, '')}${text.slice(1)}`;
  if (text.startsWith('/')) return text;
  return null;
}

function splitName(name: string): { stem: string; extension?: string } {
  const dot = name.lastIndexOf('.');
  if (dot <= 0) return { stem: name };
  return { stem: name.slice(0, dot), extension: name.slice(dot + 1) };
}

export class FilePathInterpreter implements Interpreter {
  readonly name = 'File Path';
  private readonly homeDir: string;
  private readonly fileSystem: FileSystemPort;

  constructor(options: FilePathInterpreterOptions = {}) {
    this.homeDir = options.homeDir ?? homedir();
    this.fileSystem = options.fileSystem ?? new NodeFileSystemAdapter();
  }

  interpret(content: string): InterpretResult | null {
    const trimmed = content.trim();
    const path = resolveAbsolutePath(trimmed, this.homeDir);
    if (path === null) return null;

    const info = this.fileSystem.inspect(path);
    // Existence follows links; the type does not.
    const exists = info !== null && info.dangling !== true;
    const items: InterpretItem[] = [
      textItem('Exists', String(exists)),
      textItem('Type', info?.kind ?? 'none'),
    ];
    if (path !== trimmed) {
      items.push(textItem('Expanded path', path));
    }

    const parent = dirname(path);
    if (parent !== path) items.push(textItem('Parent', parent));

    const name = basename(path);
    if (name) {
      const { stem, extension } = splitName(name);
      items.push(textItem('Filename', name), textItem('Stem', stem));
      if (extension) items.push(textItem('Extension', extension));
    }

    if (info?.size !== undefined) {
      items.push(textItem('Size', formatSize(info.size)));
    }
    if (info?.symlinkTarget !== undefined) {
      items.push(textItem('Symlink target', info.symlinkTarget));
    }

    return { items };
  }
}
