import type { FastifyInstance } from "fastify";
import type { TransportManager } from "@serial-relay/transport";
import type { TelemetryMirror } from "../core/mirror";

interface StatusDeps {
  manager: TransportManager;
  mirror?: TelemetryMirror;
}

export function registerStatusRoute(app: FastifyInstance, deps: StatusDeps): void {
  const { manager, mirror } = deps;

  app.get("/transport/status", () => ({
    ...manager.getStatus(),
    mirror: mirror?.getStats()
  }));
}
