import type {
  MemoryEdge,
  MemoryNode,
  MemoryQuery,
  RankedMemoryNode,
} from "@intentflow/shared";

export interface RankingWeights {
  relevance: number;
  recency: number;
  centrality: number;
  halfLifeMs: number;
}

function haystack(node: MemoryNode): string[] {
  const values: string[] = [node.name, node.type, ...node.keywords];
  for (const value of Object.values(node.properties)) {
    if (typeof value === "string" || typeof value === "number") {
      values.push(String(value));
    }
  }
  return values.map((v) => v.toLowerCase());
}

/** Fraction of query terms found in the node's name, type, keywords or properties. */
export function relevanceOf(node: MemoryNode, terms: readonly string[]): number {
  if (terms.length === 0) return 0;
  const fields = haystack(node);
  let matched = 0;
  for (const term of terms) {
    const t = term.toLowerCase();
    if (fields.some((f) => f.includes(t))) matched++;
  }
  return matched / terms.length;
}

export function recencyOf(node: MemoryNode, now: number, halfLifeMs: number): number {
  const elapsed = Math.max(0, now - new Date(node.updatedAt).getTime());
  return Math.exp((-Math.LN2 * elapsed) / halfLifeMs);
}

/**
 * Confidence-weighted count of live edges joining the node to the role
 * node or to anything the role node links to, squashed into [0, 1).
 */
export function centralityOf(
  nodeId: string,
  roleNodeId: string,
  edges: readonly MemoryEdge[],
): number {
  const neighbourhood = new Set<string>([roleNodeId]);
  for (const edge of edges) {
    if (edge.from === roleNodeId) neighbourhood.add(edge.to);
  }
  neighbourhood.delete(nodeId);

  let c = 0;
  for (const edge of edges) {
    if (
      (edge.from === nodeId && neighbourhood.has(edge.to)) ||
      (edge.to === nodeId && neighbourhood.has(edge.from))
    ) {
      c += edge.confidence;
    }
  }
  return c / (1 + c);
}

export function rankNodes(
  nodes: readonly MemoryNode[],
  edges: readonly MemoryEdge[],
  query: MemoryQuery,
  roleNodeId: string,
  weights: RankingWeights,
  now: number,
): RankedMemoryNode[] {
  const scored: RankedMemoryNode[] = [];
  for (const node of nodes) {
    if (node.id === roleNodeId) continue;
    const inScope =
      node.contextRoles.length === 0 || node.contextRoles.includes(query.roleScope);
    if (!inScope) continue;

    const relevance = relevanceOf(node, query.queryTerms);
    if (query.queryTerms.length > 0 && relevance === 0) continue;

    const recency = recencyOf(node, now, weights.halfLifeMs);
    const centrality = centralityOf(node.id, roleNodeId, edges);
    scored.push({
      entity: node,
      relevanceScore:
        weights.relevance * relevance +
        weights.recency * recency +
        weights.centrality * centrality,
      recency,
      sourceContext:
        node.contextRoles.length === 0 ? "shared" : `role:${query.roleScope}`,
    });
  }

  scored.sort((a, b) => {
    if (b.relevanceScore !== a.relevanceScore) {
      return b.relevanceScore - a.relevanceScore;
    }
    const updated =
      new Date(b.entity.updatedAt).getTime() - new Date(a.entity.updatedAt).getTime();
    if (updated !== 0) return updated;
    return a.entity.id.localeCompare(b.entity.id);
  });

  return scored.slice(0, query.limit);
}
