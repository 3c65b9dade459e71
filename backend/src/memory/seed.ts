import * as fs from "node:fs";
import yaml from "js-yaml";
import { ok, err, Result } from "neverthrow";
import { z } from "zod";
import { LinkMemoryNodesSchema, UpsertMemoryNodeSchema } from "@intentflow/shared";
import { MemoryUnavailableError } from "../domain/errors.js";
import type { MemoryProvider } from "./provider.js";

const MemorySeedSchema = z.object({
  nodes: z.array(UpsertMemoryNodeSchema.extend({ id: z.string().min(1) })).default([]),
  edges: z.array(LinkMemoryNodesSchema).default([]),
});

export type MemorySeed = z.infer<typeof MemorySeedSchema>;

export function parseMemorySeed(raw: unknown): Result<MemorySeed, MemoryUnavailableError> {
  const parsed = MemorySeedSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    return err(
      new MemoryUnavailableError(
        `invalid seed: ${parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ")}`,
      ),
    );
  }
  return ok(parsed.data);
}

/**
 * Writes the seed's nodes, then its edges. Nodes already present get a
 * new version, so a seed can be applied on every start.
 */
export async function applyMemorySeed(
  memory: MemoryProvider,
  seed: MemorySeed,
): Promise<Result<number, MemoryUnavailableError>> {
  for (const node of seed.nodes) {
    const written = await memory.upsertNode(node);
    if (written.isErr()) return err(written.error);
  }
  for (const edge of seed.edges) {
    const linked = await memory.link(edge.from, edge.to, edge.type, edge.confidence);
    if (linked.isErr()) return err(linked.error);
  }
  return ok(seed.nodes.length + seed.edges.length);
}

export async function loadMemorySeed(
  memory: MemoryProvider,
  filePath: string,
): Promise<Result<number, MemoryUnavailableError>> {
  let raw: unknown;
  try {
    raw = yaml.load(await fs.promises.readFile(filePath, "utf-8"));
  } catch (e) {
    return err(new MemoryUnavailableError(`cannot load seed ${filePath}: ${String(e)}`));
  }
  const seed = parseMemorySeed(raw);
  if (seed.isErr()) return err(seed.error);
  return applyMemorySeed(memory, seed.value);
}
