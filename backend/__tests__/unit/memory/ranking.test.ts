import { describe, it, expect } from "vitest";
import type { MemoryEdge, MemoryNode } from "@intentflow/shared";
import {
  centralityOf,
  rankNodes,
  recencyOf,
  relevanceOf,
  type RankingWeights,
} from "../../../src/memory/ranking.js";

const DAY = 24 * 60 * 60 * 1000;
const NOW = Date.parse("2026-01-08T00:00:00.000Z");

const weights: RankingWeights = {
  relevance: 0.6,
  recency: 0.25,
  centrality: 0.15,
  halfLifeMs: 7 * DAY,
};

function node(id: string, name: string, updatedAt: string, contextRoles: string[] = []): MemoryNode {
  return {
    id,
    type: "document",
    name,
    properties: {},
    keywords: [],
    contextRoles,
    confidence: 1,
    version: 1,
    createdAt: updatedAt,
    updatedAt,
  };
}

function edge(from: string, to: string, confidence = 1): MemoryEdge {
  return { id: `${from}>${to}`, from, to, type: "uses", confidence, createdAt: "2026-01-01T00:00:00.000Z" };
}

describe("memory ranking", () => {
  it("should measure relevance as the share of matching terms", () => {
    const n = { ...node("a", "quarterly report", "2026-01-01T00:00:00.000Z"), properties: { owner: "finance" } };
    expect(relevanceOf(n, ["quarterly", "finance"])).toBe(1);
    expect(relevanceOf(n, ["Report", "email"])).toBe(0.5);
    expect(relevanceOf(n, [])).toBe(0);
  });

  it("should halve recency every half-life", () => {
    const n = node("a", "x", "2026-01-01T00:00:00.000Z");
    expect(recencyOf(n, NOW, 7 * DAY)).toBeCloseTo(0.5);
    expect(recencyOf(n, Date.parse(n.updatedAt), 7 * DAY)).toBe(1);
  });

  it("should count edges into the role's neighbourhood", () => {
    const edges = [edge("role:analyst", "team"), edge("doc", "team", 0.5), edge("role:analyst", "doc")];
    // doc links to the role itself (1) and to team (0.5)
    expect(centralityOf("doc", "role:analyst", edges)).toBeCloseTo(1.5 / 2.5);
    expect(centralityOf("other", "role:analyst", edges)).toBe(0);
  });

  it("should rank the more recent node higher on equal relevance", () => {
    const older = node("old", "old report", "2026-01-01T00:00:00.000Z");
    const newer = node("new", "new report", "2026-01-08T00:00:00.000Z");

    const ranked = rankNodes(
      [older, newer],
      [],
      { roleScope: "analyst", queryTerms: ["report"], limit: 10 },
      "role:analyst",
      weights,
      NOW,
    );

    expect(ranked.map((r) => r.entity.id)).toEqual(["new", "old"]);
    expect(ranked[0]?.relevanceScore).toBeCloseTo(0.85);
    expect(ranked[1]?.relevanceScore).toBeCloseTo(0.725);
  });

  it("should break score ties by update time", () => {
    const older = node("old", "report", "2026-01-01T00:00:00.000Z");
    const newer = node("new", "report", "2026-01-02T00:00:00.000Z");

    const ranked = rankNodes(
      [older, newer],
      [],
      { roleScope: "analyst", queryTerms: ["report"], limit: 10 },
      "role:analyst",
      { ...weights, recency: 0 },
      NOW,
    );

    expect(ranked.map((r) => r.entity.id)).toEqual(["new", "old"]);
  });

  it("should only return nodes shared or scoped to the role", () => {
    const nodes = [
      node("shared", "report", "2026-01-08T00:00:00.000Z"),
      node("mine", "report", "2026-01-07T00:00:00.000Z", ["analyst"]),
      node("theirs", "report", "2026-01-08T00:00:00.000Z", ["hr"]),
      node("role:analyst", "report", "2026-01-08T00:00:00.000Z", ["analyst"]),
      node("unrelated", "memo", "2026-01-08T00:00:00.000Z"),
    ];

    const ranked = rankNodes(
      nodes,
      [],
      { roleScope: "analyst", queryTerms: ["report"], limit: 10 },
      "role:analyst",
      weights,
      NOW,
    );

    expect(ranked.map((r) => [r.entity.id, r.sourceContext])).toEqual([
      ["shared", "shared"],
      ["mine", "role:analyst"],
    ]);
  });

  it("should cap results at the query limit", () => {
    const nodes = ["a", "b", "c"].map((id) => node(id, "report", "2026-01-08T00:00:00.000Z"));
    const ranked = rankNodes(
      nodes,
      [],
      { roleScope: "analyst", queryTerms: [], limit: 2 },
      "role:analyst",
      weights,
      NOW,
    );
    expect(ranked.map((r) => r.entity.id)).toEqual(["a", "b"]);
  });
});
