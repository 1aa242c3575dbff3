import { collectDefaultMetrics, Gauge, type Registry } from "prom-client";
import type { TransportManager } from "@serial-relay/transport";

const PREFIX = "serial_relay";

/**
 * Transport gauges are sampled from `getStatus()` on every scrape. Worker
 * counts restart from zero with each transport run, so none of them are
 * exposed as counters.
 */
export function registerTransportMetrics(
  registry: Registry,
  manager: TransportManager,
  options: { collectDefaultMetrics?: boolean } = {}
): void {
  if (options.collectDefaultMetrics !== false) {
    collectDefaultMetrics({ register: registry, prefix: `${PREFIX}_` });
  }

  new Gauge({
    name: `${PREFIX}_transport_running`,
    help: "1 while the transport read and write loops are running",
    registers: [registry],
    collect() {
      this.set(manager.getState() === "RUNNING" ? 1 : 0);
    }
  });

  new Gauge({
    name: `${PREFIX}_command_queue_depth`,
    help: "Commands waiting to be written to the serial link",
    registers: [registry],
    collect() {
      this.set(manager.getStatus().queueDepth);
    }
  });

  new Gauge({
    name: `${PREFIX}_telemetry_sequence`,
    help: "Sequence number of the latest telemetry record in the cache",
    registers: [registry],
    collect() {
      this.set(manager.getStatus().telemetry.sequence);
    }
  });

  new Gauge({
    name: `${PREFIX}_link_io_errors`,
    help: "Recovered serial I/O errors by direction during the current or last run",
    labelNames: ["direction"],
    registers: [registry],
    collect() {
      const status = manager.getStatus();
      this.set({ direction: "read" }, status.read?.readErrors ?? 0);
      this.set({ direction: "write" }, status.write?.writeErrors ?? 0);
    }
  });

  new Gauge({
    name: `${PREFIX}_commands_written`,
    help: "Commands written to the serial link during the current or last run",
    registers: [registry],
    collect() {
      this.set(manager.getStatus().write?.commandsWritten ?? 0);
    }
  });
}
