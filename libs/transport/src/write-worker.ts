import type { BaseLogger } from "pino";
import type { CommandQueue } from "./command-queue";
import { describeError } from "./errors";
import type { Link } from "./link";
import type { WriteWorkerMetrics } from "./metrics";
import { sleep } from "./sleep";

export interface WriteWorkerOptions {
  link: Link;
  queue: CommandQueue;
  logger: BaseLogger;
  idleDelayMs: number;
}

/** Drains the command queue onto the link. Failed writes are dropped, never retried. */
export class WriteWorker {
  private readonly metrics: WriteWorkerMetrics = { commandsWritten: 0, writeErrors: 0 };

  constructor(private readonly options: WriteWorkerOptions) {}

  async run(signal: AbortSignal): Promise<void> {
    const { link, queue, logger, idleDelayMs } = this.options;
    while (!signal.aborted) {
      const command = queue.tryDequeue();
      if (command === undefined) {
        await sleep(idleDelayMs);
        continue;
      }
      try {
        await link.writeLine(command);
        this.metrics.commandsWritten += 1;
        this.metrics.lastWriteAt = new Date().toISOString();
      } catch (error) {
        this.metrics.writeErrors += 1;
        this.metrics.lastError = describeError(error);
        if (!signal.aborted) {
          logger.warn({ err: error, command }, "transport: dropped command after write failure");
        }
      }
    }
  }

  getMetrics(): WriteWorkerMetrics {
    return { ...this.metrics };
  }
}
