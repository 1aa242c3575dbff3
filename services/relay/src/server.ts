import Fastify, { type FastifyInstance, type FastifyServerOptions } from "fastify";
import { Registry } from "prom-client";
import { TransportManager, type Link } from "@serial-relay/transport";
import { loadRelayConfig, type RelayConfig } from "./config";
import { registerTransportMetrics } from "./core/metrics";
import { TelemetryMirror } from "./core/mirror";
import { SequenceRunner } from "./core/sequences";
import { MqttTelemetryPublisher, type TelemetryPublisher } from "./mqtt/telemetry-publisher";
import { registerHealthRoutes } from "./routes/health";
import { registerMetricsRoute } from "./routes/metrics";
import { registerSequenceRoutes } from "./routes/sequences";
import { registerStatusRoute } from "./routes/status";
import { registerTelemetryRoutes } from "./routes/telemetry";

interface BuildServerOptions {
  logger?: FastifyServerOptions["logger"];
  config?: RelayConfig;
  /** Replaces the serial port, e.g. with an in-process fake. */
  link?: Link;
  manager?: TransportManager;
  telemetryPublisher?: TelemetryPublisher;
  registry?: Registry;
  collectDefaultMetrics?: boolean;
}

export async function buildServer(options: BuildServerOptions = {}): Promise<FastifyInstance> {
  const config = options.config ?? loadRelayConfig();
  const app = Fastify({ logger: options.logger ?? { level: config.logLevel } });

  const manager =
    options.manager ??
    new TransportManager({
      config: {
        path: config.serialPath,
        baudRate: config.baudRate,
        readTimeoutMs: config.readTimeoutMs,
        idleDelayMs: config.idleDelayMs
      },
      link: options.link,
      logger: app.log
    });
  const runner = new SequenceRunner(manager);
  const registry = options.registry ?? new Registry();
  registerTransportMetrics(registry, manager, { collectDefaultMetrics: options.collectDefaultMetrics });

  const publisher =
    options.telemetryPublisher ??
    (config.mqttUrl ? MqttTelemetryPublisher.connect(config.mqttUrl, config.mqttTopic) : undefined);
  const mirror = publisher
    ? new TelemetryMirror({
        source: manager,
        publisher,
        intervalMs: config.mirrorIntervalMs,
        logger: app.log
      })
    : undefined;

  registerHealthRoutes(app, { manager });
  registerTelemetryRoutes(app, { manager });
  registerSequenceRoutes(app, { runner });
  registerStatusRoute(app, { manager, mirror });
  registerMetricsRoute(app, { registry });

  // a ConnectionError here fails ready()/listen()
  app.addHook("onReady", async () => {
    if (manager.getState() === "STOPPED") {
      await manager.start();
    }
    mirror?.start();
  });

  app.addHook("onClose", async () => {
    mirror?.stop();
    await runner.stopAll();
    await manager.stop();
    if (publisher) {
      await publisher.disconnect().catch((error: unknown) => {
        app.log.error(error, "serial-relay: failed to disconnect MQTT publisher");
      });
    }
  });

  return app;
}
