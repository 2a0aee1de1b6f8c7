import { lstatSync, readlinkSync, statSync, type Stats } from 'node:fs';
import type { FileSystemPort, PathInfo, PathKind } from '../../ports/FileSystemPort.js';

function kindOf(stats: Stats): PathKind {
  if (stats.isSymbolicLink()) return 'Symlink';
  if (stats.isFile()) return 'File';
  if (stats.isDirectory()) return 'Directory';
  return 'Other';
}

function tryStat(path: string): Stats | undefined {
  try {
    return statSync(path);
  } catch {
    return undefined;
  }
}

function tryReadlink(path: string): string | undefined {
  try {
    return readlinkSync(path);
  } catch {
    return undefined;
  }
}

export class NodeFileSystemAdapter implements FileSystemPort {
  inspect(path: string): PathInfo | null {
    let stats: Stats | undefined;
    try {
      stats = lstatSync(path, { throwIfNoEntry: false });
    } catch {
      // Permission and I/O errors read as "missing".
      return null;
    }
    if (!stats) return null;

    const kind = kindOf(stats);
    if (kind === 'File') {
      return { kind, size: stats.size };
    }
    if (kind === 'Symlink') {
      const target = tryStat(path);
      return {
        kind,
        size: target?.isFile() ? target.size : undefined,
        symlinkTarget: tryReadlink(path),
        dangling: target === undefined,
      };
    }
    return { kind };
  }
}
