import type { FastifyInstance, FastifyReply } from "fastify";
import type { Registry } from "prom-client";

export function registerMetricsRoute(app: FastifyInstance, deps: { registry: Registry }): void {
  app.get("/metrics", async (_request, reply: FastifyReply) => {
    reply.header("content-type", deps.registry.contentType);
    return deps.registry.metrics();
  });
}
