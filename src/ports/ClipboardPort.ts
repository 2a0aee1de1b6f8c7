export interface ClipboardPort {
  /** Current clipboard text, or null when the clipboard is empty or holds non-text content. */
  readText(): Promise<string | null>;
}
