import type { FastifyInstance } from "fastify";
import fastifyBasicAuth from "@fastify/basic-auth";
import type { AuthConfig } from "../config/schema.js";

/**
 * Register Basic Auth on every route except the excluded prefixes
 * (health probes).
 */
export async function registerBasicAuth(
  app: FastifyInstance,
  config: AuthConfig,
  excludePaths: string[] = [],
): Promise<void> {
  await app.register(fastifyBasicAuth, {
    validate: async (username, password) => {
      if (username !== config.username || password !== config.password) {
        throw new Error("Unauthorized");
      }
    },
    authenticate: { realm: "IntentFlow" },
  });

  app.addHook("onRequest", (request, reply, done) => {
    const url = request.url.split("?")[0];
    if (excludePaths.some((p) => url === p || url.startsWith(p + "/"))) {
      done();
      return;
    }
    app.basicAuth(request, reply, done);
  });
}
