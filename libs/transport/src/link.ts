/**
 * Byte-stream connection to the device. Implementations own exactly one
 * handle at a time and are driven by one read loop and one write loop.
 */
export interface Link {
  readonly isOpen: boolean;
  /** Rejects with `ConnectionError` when the device cannot be opened or a handle is already open. */
  open(): Promise<void>;
  /** Safe to call when already closed. */
  close(): Promise<void>;
  /**
   * Resolves with the text received since the previous call, waiting at most
   * `timeoutMs`. Rejects with `ReadTimeoutError` when nothing arrived and
   * with `TransientIOError` on any other failure.
   */
  readAvailable(timeoutMs: number): Promise<string>;
  /** Appends the line terminator and transmits. Rejects with `WriteError`. */
  writeLine(command: string): Promise<void>;
}

export const LINE_TERMINATOR = "\n";
