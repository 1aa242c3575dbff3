import pino, { type BaseLogger } from "pino";
import { CommandQueue } from "./command-queue";
import { TransportConfigSchema, type TransportConfig, type TransportConfigInput } from "./config";
import { ConnectionError, describeError, TransportStateError } from "./errors";
import type { Link } from "./link";
import type { ReadWorkerMetrics, TransportState, WriteWorkerMetrics } from "./metrics";
import { ReadWorker } from "./read-worker";
import { SerialPortLink } from "./serial-link";
import { TelemetryCache, type TelemetrySnapshot } from "./telemetry-cache";
import { WriteWorker } from "./write-worker";

export interface TransportManagerOptions {
  config: TransportConfigInput;
  /** Defaults to a `SerialPortLink` on `config.path`. */
  link?: Link;
  logger?: BaseLogger;
}

export interface TransportStatus {
  state: TransportState;
  path: string;
  baudRate: number;
  linkOpen: boolean;
  queueDepth: number;
  telemetry: TelemetrySnapshot;
  read?: ReadWorkerMetrics;
  write?: WriteWorkerMetrics;
}

interface Run {
  controller: AbortController;
  readWorker: ReadWorker;
  writeWorker: WriteWorker;
  loops: Promise<void>[];
}

/**
 * Owns the serial link and the two background loops that service it.
 *
 * STOPPED -> STARTING -> RUNNING -> STOPPING -> STOPPED
 */
export class TransportManager {
  readonly config: TransportConfig;
  private readonly link: Link;
  private readonly logger: BaseLogger;
  private readonly queue = new CommandQueue();
  private readonly cache = new TelemetryCache();
  private state: TransportState = "STOPPED";
  private startAbort: AbortController | null = null;
  private starting: Promise<void> | null = null;
  private stopping: Promise<void> | null = null;
  private run: Run | null = null;
  private lastRun: Pick<Run, "readWorker" | "writeWorker"> | null = null;

  constructor(options: TransportManagerOptions) {
    this.config = TransportConfigSchema.parse(options.config);
    this.link = options.link ?? new SerialPortLink({ path: this.config.path, baudRate: this.config.baudRate });
    this.logger = options.logger ?? pino({ level: "silent" });
  }

  getState(): TransportState {
    return this.state;
  }

  async start(): Promise<void> {
    if (this.state !== "STOPPED") {
      throw new TransportStateError(`Cannot start transport while ${this.state}`);
    }
    this.state = "STARTING";
    const startAbort = new AbortController();
    this.startAbort = startAbort;
    this.starting = this.openAndLaunch(startAbort.signal);
    try {
      await this.starting;
    } finally {
      this.starting = null;
      this.startAbort = null;
    }
  }

  async stop(): Promise<void> {
    if (!this.stopping) {
      this.stopping = this.shutdown().finally(() => {
        this.stopping = null;
      });
    }
    await this.stopping;
  }

  /** Never blocks; commands queued before `start()` are sent once running. */
  sendCommand(text: string): void {
    this.queue.enqueue(text);
  }

  latestTelemetry(): string {
    return this.cache.read();
  }

  latestSnapshot(): TelemetrySnapshot {
    return this.cache.snapshot();
  }

  getStatus(): TransportStatus {
    const workers = this.run ?? this.lastRun;
    return {
      state: this.state,
      path: this.config.path,
      baudRate: this.config.baudRate,
      linkOpen: this.link.isOpen,
      queueDepth: this.queue.size,
      telemetry: this.cache.snapshot(),
      read: workers?.readWorker.getMetrics(),
      write: workers?.writeWorker.getMetrics()
    };
  }

  private async openAndLaunch(signal: AbortSignal): Promise<void> {
    try {
      await this.link.open();
    } catch (error) {
      this.state = "STOPPED";
      if (error instanceof ConnectionError) throw error;
      throw new ConnectionError(`Failed to open ${this.config.path}: ${describeError(error)}`, { cause: error });
    }

    if (signal.aborted) {
      // stop() arrived while the link was opening
      await this.link.close();
      return;
    }

    const controller = new AbortController();
    const readWorker = new ReadWorker({
      link: this.link,
      cache: this.cache,
      logger: this.logger,
      readTimeoutMs: this.config.readTimeoutMs,
      idleDelayMs: this.config.idleDelayMs,
      timestampMarker: this.config.timestampMarker,
      ageMarker: this.config.ageMarker
    });
    const writeWorker = new WriteWorker({
      link: this.link,
      queue: this.queue,
      logger: this.logger,
      idleDelayMs: this.config.idleDelayMs
    });
    const loops = [
      this.supervise("read", readWorker.run(controller.signal)),
      this.supervise("write", writeWorker.run(controller.signal))
    ];
    this.run = { controller, readWorker, writeWorker, loops };
    this.state = "RUNNING";
    this.logger.info(
      { path: this.config.path, baudRate: this.config.baudRate },
      "transport: link open, workers running"
    );
  }

  private async shutdown(): Promise<void> {
    if (this.state === "STOPPED" && !this.run) {
      await this.link.close();
      return;
    }

    this.state = "STOPPING";
    this.startAbort?.abort();
    const run = this.run;
    run?.controller.abort();

    if (this.starting) {
      await Promise.allSettled([this.starting]);
    }
    await this.link.close();
    if (run) {
      await Promise.all(run.loops);
      this.lastRun = { readWorker: run.readWorker, writeWorker: run.writeWorker };
      this.run = null;
    }
    this.state = "STOPPED";
    this.logger.info({ path: this.config.path }, "transport: stopped");
  }

  private async supervise(name: "read" | "write", loop: Promise<void>): Promise<void> {
    try {
      await loop;
    } catch (error) {
      this.logger.error({ err: error }, `transport: ${name} loop exited unexpectedly`);
    }
  }
}
