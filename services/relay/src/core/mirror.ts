import type { BaseLogger } from "pino";
import type { TelemetrySnapshot } from "@serial-relay/transport";
import type { TelemetryPublisher } from "../mqtt/telemetry-publisher";

export interface TelemetrySource {
  latestSnapshot(): TelemetrySnapshot;
}

export interface MirrorStats {
  published: number;
  failures: number;
  lastSequence: number;
  lastPublishedAt?: string;
  lastError?: string;
}

interface MirrorDependencies {
  source: TelemetrySource;
  publisher: TelemetryPublisher;
  intervalMs: number;
  logger: BaseLogger;
}

/** Polls the telemetry cache and forwards each new record to MQTT. */
export class TelemetryMirror {
  private timer?: ReturnType<typeof setInterval>;
  private inFlight = false;
  private readonly stats: MirrorStats = { published: 0, failures: 0, lastSequence: 0 };

  constructor(private readonly deps: MirrorDependencies) {}

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => {
      void this.tick();
    }, this.deps.intervalMs);
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = undefined;
    }
  }

  async tick(): Promise<void> {
    if (this.inFlight) return;
    const snapshot = this.deps.source.latestSnapshot();
    if (snapshot.sequence === this.stats.lastSequence) return;

    this.inFlight = true;
    this.stats.lastSequence = snapshot.sequence;
    try {
      await this.deps.publisher.publishSnapshot(snapshot);
      this.stats.published += 1;
      this.stats.lastPublishedAt = new Date().toISOString();
    } catch (error) {
      this.stats.failures += 1;
      this.stats.lastError = error instanceof Error ? error.message : String(error);
      this.deps.logger.warn({ err: error, topic: this.deps.publisher.topic }, "serial-relay: failed to mirror telemetry");
    } finally {
      this.inFlight = false;
    }
  }

  getStats(): MirrorStats {
    return { ...this.stats };
  }
}
