import type { FastifyInstance } from "fastify";
import type { CapabilityRegistry, RegistryError } from "../execution/capability-registry.js";

export interface ToolsRouteDeps {
  registry: CapabilityRegistry;
}

const STATUS_BY_CODE: Record<RegistryError["code"], number> = {
  INVALID: 400,
  NO_RUNNER: 400,
  DUPLICATE: 409,
  FULL: 409,
};

export async function registerToolsRoutes(
  app: FastifyInstance,
  deps: ToolsRouteDeps,
): Promise<void> {
  const { registry } = deps;

  // GET /tools - Registered tools and executors
  app.get("/tools", async (_request, reply) => {
    return reply.send({
      tools: registry.listTools(),
      executors: registry.listExecutors(),
    });
  });

  // POST /tools - Register a generated tool
  app.post("/tools", async (request, reply) => {
    const registered = registry.registerTool(request.body);
    if (registered.isErr()) {
      const error = registered.error;
      return reply.status(STATUS_BY_CODE[error.code]).send({
        error: error.message,
        code: error.code,
        details: error.issues,
      });
    }
    return reply.status(201).send(registered.value);
  });
}
