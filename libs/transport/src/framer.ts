import { LINE_TERMINATOR } from "./link";

/**
 * Reassembles newline-terminated records from arbitrarily split chunks.
 * Holds at most one partial line between calls.
 */
export class LineFramer {
  private buffer = "";

  get pending(): string {
    return this.buffer;
  }

  push(chunk: string): string[] {
    this.buffer += chunk;
    const lines: string[] = [];
    let idx = this.buffer.indexOf(LINE_TERMINATOR);
    while (idx !== -1) {
      const line = this.buffer.slice(0, idx).trim();
      this.buffer = this.buffer.slice(idx + LINE_TERMINATOR.length);
      if (line) lines.push(line);
      idx = this.buffer.indexOf(LINE_TERMINATOR);
    }
    return lines;
  }

  reset(): void {
    this.buffer = "";
  }
}
