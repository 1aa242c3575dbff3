import type { FastifyInstance } from "fastify";
import type { TransportManager } from "@serial-relay/transport";

export function registerHealthRoutes(app: FastifyInstance, deps: { manager: TransportManager }): void {
  app.get("/health", () => ({ status: "ok", transport: deps.manager.getState() }));
}
