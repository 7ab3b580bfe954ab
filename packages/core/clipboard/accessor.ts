/**
 * Read/write access to a text clipboard. Implementations report failures by
 * returning "" (read) or doing nothing (write) rather than throwing, but callers
 * in the engine still guard against a throwing accessor.
 */
export interface ClipboardAccessor {
  read(): Promise<string>;
  write(text: string): Promise<void>;
}

export type ClipboardReadFn = () => Promise<string>;
export type ClipboardWriteFn = (text: string) => Promise<void>;

export function createClipboardAccessor(
  readText: ClipboardReadFn,
  writeText: ClipboardWriteFn = async () => {}
): ClipboardAccessor {
  return { read: readText, write: writeText };
}

/**
 * Clipboard that lives in process memory. Used when no OS clipboard is wanted
 * and as a stand-in in tests.
 */
export class MemoryClipboard implements ClipboardAccessor {
  constructor(private text = "") {}

  async read(): Promise<string> {
    return this.text;
  }

  async write(text: string): Promise<void> {
    this.text = text;
  }

  peek(): string {
    return this.text;
  }
}
