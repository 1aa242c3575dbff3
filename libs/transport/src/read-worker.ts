import type { BaseLogger } from "pino";
import { TimestampAnnotator } from "./annotator";
import { describeError, ReadTimeoutError } from "./errors";
import { LineFramer } from "./framer";
import type { Link } from "./link";
import type { ReadWorkerMetrics } from "./metrics";
import { sleep } from "./sleep";
import type { TelemetryCache } from "./telemetry-cache";

export interface ReadWorkerOptions {
  link: Link;
  cache: TelemetryCache;
  logger: BaseLogger;
  readTimeoutMs: number;
  idleDelayMs: number;
  timestampMarker?: string;
  ageMarker?: string;
}

export class ReadWorker {
  private readonly framer = new LineFramer();
  private readonly annotator: TimestampAnnotator;
  private readonly metrics: ReadWorkerMetrics = {
    linesFramed: 0,
    linesAnnotated: 0,
    readTimeouts: 0,
    readErrors: 0
  };
  /** Message of the error currently repeating; logged once until a read succeeds or times out. */
  private repeatingError: string | undefined;

  constructor(private readonly options: ReadWorkerOptions) {
    this.annotator = new TimestampAnnotator({
      timestampMarker: options.timestampMarker,
      ageMarker: options.ageMarker
    });
  }

  async run(signal: AbortSignal): Promise<void> {
    const { link, logger, readTimeoutMs, idleDelayMs } = this.options;
    while (!signal.aborted) {
      try {
        const chunk = await link.readAvailable(readTimeoutMs);
        this.repeatingError = undefined;
        this.ingest(chunk);
      } catch (error) {
        if (error instanceof ReadTimeoutError) {
          this.metrics.readTimeouts += 1;
          this.repeatingError = undefined;
        } else if (!signal.aborted) {
          const message = describeError(error);
          this.metrics.readErrors += 1;
          this.metrics.lastError = message;
          if (message !== this.repeatingError) {
            this.repeatingError = message;
            logger.warn({ err: error }, "transport: read loop error");
          }
        }
      }
      await sleep(idleDelayMs);
    }
  }

  /** Frames a chunk and publishes every complete record in arrival order. */
  ingest(chunk: string): void {
    for (const line of this.framer.push(chunk)) {
      const record = this.annotator.annotate(line);
      this.metrics.linesFramed += 1;
      if (record.ageMs !== undefined) {
        this.metrics.linesAnnotated += 1;
      }
      this.metrics.lastLineAt = new Date().toISOString();
      this.options.cache.publish(record.line);
    }
  }

  getMetrics(): ReadWorkerMetrics {
    return { ...this.metrics };
  }
}
