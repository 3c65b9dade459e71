import type { FastifyInstance } from "fastify";
import type { HealthRegistry } from "../agents/agent-health.js";

export interface HealthRouteDeps {
  health: HealthRegistry;
}

export async function registerHealthRoutes(
  app: FastifyInstance,
  deps: HealthRouteDeps,
): Promise<void> {
  const { health } = deps;

  // GET /health - Overall status and every agent's probe
  app.get("/health", async (_request, reply) => {
    const overall = health.overall();
    return reply.status(overall.status === "down" ? 503 : 200).send({
      ...overall,
      agents: health.all(),
    });
  });

  // GET /health/:agent - One agent's probe
  app.get<{ Params: { agent: string } }>("/health/:agent", async (request, reply) => {
    const report = health.get(request.params.agent);
    if (!report) {
      return reply.status(404).send({ error: "Unknown agent" });
    }
    return reply.send(report);
  });
}
