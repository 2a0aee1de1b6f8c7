export type PathKind = 'File' | 'Directory' | 'Symlink' | 'Other';

export interface PathInfo {
  kind: PathKind;
  /** Byte size when the path (or a symlink's target) is a regular file. */
  size?: number;
  symlinkTarget?: string;
  /** Set on a symlink whose target does not resolve. */
  dangling?: boolean;
}

/** Read-only metadata lookups. Never creates, modifies or follows links destructively. */
export interface FileSystemPort {
  /** Returns null when the path does not exist or cannot be inspected. */
  inspect(path: string): PathInfo | null;
}
