import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { z } from "zod";
import { buildPreciseSequence, buildSweepSequence, type SequenceRunner } from "../core/sequences";

const StopSchema = z.object({
  sequenceId: z.string()
});

interface SequenceDeps {
  runner: SequenceRunner;
}

export function registerSequenceRoutes(app: FastifyInstance, deps: SequenceDeps): void {
  const { runner } = deps;

  app.get("/telemetry/precise", () => {
    const session = runner.start("precise", buildPreciseSequence());
    return { status: "Precise command sequence started", sequenceId: session.id };
  });

  app.get("/telemetry/sequencer", () => {
    const session = runner.start("sequencer", buildSweepSequence());
    return { status: "Sequencer command started", sequenceId: session.id };
  });

  app.get("/sequences/status", () => {
    return runner.list().map((session) => ({
      id: session.id,
      name: session.name,
      startedAt: session.startedAt,
      sent: session.stats.sent,
      total: session.stats.total
    }));
  });

  app.post(
    "/sequences/stop",
    (request: FastifyRequest<{ Body: unknown }>, reply: FastifyReply) => {
      const parsed = StopSchema.safeParse(request.body);
      if (!parsed.success) {
        return reply.status(400).send({ error: "Invalid stop request" });
      }

      const stopped = runner.stop(parsed.data.sequenceId);
      if (!stopped) {
        return reply.status(404).send({ error: "Sequence not found" });
      }

      return { stopped: true };
    }
  );
}
