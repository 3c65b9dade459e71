import Fastify, { type FastifyInstance } from "fastify";
import cors from "@fastify/cors";
import { registerBasicAuth } from "./auth/basic-auth.js";
import type { AuthConfig } from "./config/schema.js";
import type { HealthRegistry } from "./agents/agent-health.js";
import type { CapabilityRegistry } from "./execution/capability-registry.js";
import type { GraphMemoryStore } from "./memory/graph-store.js";
import type { NotificationHub } from "./notifications/notification-hub.js";
import type { Orchestrator } from "./orchestrator/orchestrator.js";
import { registerEventsRoutes } from "./routes/events.js";
import { registerHealthRoutes } from "./routes/health.js";
import { registerMemoryRoutes } from "./routes/memory.js";
import { registerTasksRoutes } from "./routes/tasks.js";
import { registerToolsRoutes } from "./routes/tools.js";

export interface AppOptions {
  auth?: AuthConfig;
  cors?: boolean | string;
  logLevel?: string;
}

export interface AppDeps {
  orchestrator: Orchestrator;
  health: HealthRegistry;
  registry: CapabilityRegistry;
  memory?: GraphMemoryStore;
  notifications?: NotificationHub;
}

export async function buildApp(
  options: AppOptions,
  deps: AppDeps,
): Promise<FastifyInstance> {
  const app = Fastify({
    logger: {
      level: options.logLevel ?? "info",
    },
  });

  if (options.cors !== false) {
    await app.register(cors, { origin: options.cors ?? true });
  }

  // Basic Auth (skip for health probes)
  if (options.auth) {
    await registerBasicAuth(app, options.auth, ["/health"]);
  }

  // Routes
  await registerTasksRoutes(app, {
    orchestrator: deps.orchestrator,
    notifications: deps.notifications ?? null,
  });
  await registerToolsRoutes(app, { registry: deps.registry });
  await registerHealthRoutes(app, { health: deps.health });
  if (deps.memory) {
    await registerMemoryRoutes(app, { memory: deps.memory });
  }
  if (deps.notifications) {
    await registerEventsRoutes(app, { notifications: deps.notifications });
  }

  return app;
}
