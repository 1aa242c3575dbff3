/**
 * Unbounded FIFO of outbound commands. Any number of callers enqueue; the
 * write worker is the only consumer.
 */
export class CommandQueue {
  private items: string[] = [];
  private head = 0;

  get size(): number {
    return this.items.length - this.head;
  }

  enqueue(command: string): void {
    this.items.push(command);
  }

  tryDequeue(): string | undefined {
    if (this.head >= this.items.length) return undefined;
    const command = this.items[this.head];
    this.head += 1;
    // compact once the consumed prefix dominates
    if (this.head > 1024 && this.head * 2 > this.items.length) {
      this.items = this.items.slice(this.head);
      this.head = 0;
    }
    return command;
  }
}
