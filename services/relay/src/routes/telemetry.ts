import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { z } from "zod";
import type { TransportManager } from "@serial-relay/transport";

// dashboard clients post PascalCase `Command`
const CommandBodySchema = z
  .object({ command: z.string().optional(), Command: z.string().optional() })
  .transform((body) => body.command ?? body.Command ?? "")
  .refine((command) => command.trim().length > 0);

interface TelemetryDeps {
  manager: TransportManager;
}

export function registerTelemetryRoutes(app: FastifyInstance, deps: TelemetryDeps): void {
  const { manager } = deps;

  app.get("/telemetry", () => ({ telemetry: manager.latestTelemetry() }));

  app.post(
    "/telemetry/command",
    (request: FastifyRequest<{ Body: unknown }>, reply: FastifyReply) => {
      const parsed = CommandBodySchema.safeParse(request.body);
      if (!parsed.success) {
        return reply.status(400).send({ error: "Command is required." });
      }

      manager.sendCommand(parsed.data);
      return { status: "Command sent", command: parsed.data };
    }
  );
}
