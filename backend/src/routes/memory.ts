import type { FastifyInstance } from "fastify";
import {
  LinkMemoryNodesSchema,
  MemoryQuerySchema,
  UpsertMemoryNodeSchema,
} from "@intentflow/shared";
import type { GraphMemoryStore } from "../memory/graph-store.js";

export interface MemoryRouteDeps {
  memory: GraphMemoryStore;
}

export async function registerMemoryRoutes(
  app: FastifyInstance,
  deps: MemoryRouteDeps,
): Promise<void> {
  const { memory } = deps;

  // POST /memory/query - Ranked context for a role
  app.post("/memory/query", async (request, reply) => {
    const parseResult = MemoryQuerySchema.safeParse(request.body);
    if (!parseResult.success) {
      return reply.status(400).send({
        error: "Validation failed",
        details: parseResult.error.issues,
      });
    }

    const ranked = await memory.retrieveContext(parseResult.data);
    if (ranked.isErr()) {
      return reply.status(503).send({ error: ranked.error.message });
    }
    return reply.send(ranked.value);
  });

  // POST /memory/nodes - Add a node, or a new version of one
  app.post("/memory/nodes", async (request, reply) => {
    const parseResult = UpsertMemoryNodeSchema.safeParse(request.body);
    if (!parseResult.success) {
      return reply.status(400).send({
        error: "Validation failed",
        details: parseResult.error.issues,
      });
    }

    const node = await memory.upsertNode(parseResult.data);
    if (node.isErr()) {
      return reply.status(503).send({ error: node.error.message });
    }
    return reply.status(201).send(node.value);
  });

  // POST /memory/edges - Relate two nodes
  app.post("/memory/edges", async (request, reply) => {
    const parseResult = LinkMemoryNodesSchema.safeParse(request.body);
    if (!parseResult.success) {
      return reply.status(400).send({
        error: "Validation failed",
        details: parseResult.error.issues,
      });
    }

    const { from, to, type, confidence } = parseResult.data;
    const missing = [from, to].filter((id) => !memory.getNode(id));
    if (missing.length > 0) {
      return reply.status(404).send({ error: `Unknown node: ${missing.join(", ")}` });
    }

    const edge = await memory.link(from, to, type, confidence);
    if (edge.isErr()) {
      return reply.status(503).send({ error: edge.error.message });
    }
    return reply.status(201).send(edge.value);
  });

  // GET /memory/nodes/:id - Every version of a node, oldest first
  app.get<{ Params: { id: string } }>("/memory/nodes/:id", async (request, reply) => {
    const versions = memory.nodeHistory(request.params.id);
    if (versions.length === 0) {
      return reply.status(404).send({ error: "Node not found" });
    }
    return reply.send(versions);
  });
}
