import { ok, err, Result } from "neverthrow";
import { nanoid } from "nanoid";
import type {
  ActionCategory,
  ActionDescriptor,
  Plan,
  RankedMemoryNode,
  RetryPolicy,
  Sensitivity,
  Step,
  StepDraft,
  Task,
} from "@intentflow/shared";
import {
  DEFAULT_SENSITIVITY,
  RISK_LEVEL_ORDER,
  SensitivitySchema,
} from "@intentflow/shared";
import {
  MissingCompensationError,
  PlanCycleError,
  PlanValidationError,
  UnsupportedActionError,
  type PlanningError,
} from "../domain/errors.js";
import type { ActionRule, RuleIndex } from "./action-rules.js";
import {
  checkReferences,
  criticalPathMs,
  findCycle,
  topologicalOrder,
} from "./graph.js";

// ─── Collaborators ──────────────────────────────────────

export interface CapabilityResolver {
  canHandle(action: ActionDescriptor): boolean;
}

export interface DurationEstimator {
  /** Learned mean duration for a category, or null when nothing is known. */
  estimateDurationMs(category: ActionCategory): number | null;
}

export interface PlannerConfig {
  defaultRetry: RetryPolicy;
}

export interface BuildPlanOptions {
  contextDegraded: boolean;
  /** The plan being replaced when re-planning. */
  supersedes: Plan | null;
}

// ─── Clause Parsing ─────────────────────────────────────

const CLAUSE_SPLIT = /\s*(?:[,;]|\bthen\b|\band\b)\s*/i;

export function splitClauses(intent: string): string[] {
  return intent
    .split(CLAUSE_SPLIT)
    .map((c) => c.trim())
    .filter((c) => c.length > 0);
}

function words(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[^a-z0-9_-]+/)
    .filter((w) => w.length > 0);
}

function renderLabel(template: string, target: string): string {
  return template.replace("{target}", target).trim();
}

// ─── Planner ────────────────────────────────────────────

export class Planner {
  constructor(
    private readonly config: PlannerConfig,
    private readonly rules: RuleIndex,
    private readonly capabilities: CapabilityResolver,
    private readonly durations: DurationEstimator | null = null,
  ) {}

  /**
   * Turns free-text intent into step drafts. Clauses run in sequence;
   * consecutive read-only clauses share the same dependencies so they may
   * run side by side.
   */
  decompose(
    intent: string,
    context: readonly RankedMemoryNode[],
  ): Result<StepDraft[], PlanningError> {
    const clauses = splitClauses(intent);
    if (clauses.length === 0) {
      return err(new PlanValidationError("Intent contains no actionable clause"));
    }

    const drafts: StepDraft[] = [];
    let previousTarget: string | null = null;
    // Dependencies of the step that follows the current one.
    let frontier: string[] = [];
    // Dependencies shared by the current run of read-only steps.
    let readRunDeps: string[] | null = null;
    let readRun: string[] = [];

    for (const clause of clauses) {
      const tokens = words(clause);
      const verbAt = tokens.findIndex((t) => this.rules.forVerb(t) !== undefined);
      const rule = verbAt >= 0 ? this.rules.forVerb(tokens[verbAt] ?? "") : undefined;
      if (!rule) {
        return err(new PlanValidationError(`No action rule matches "${clause}"`));
      }

      let target = tokens
        .slice(verbAt + 1)
        .filter((t) => !this.rules.stopwords.has(t))
        .join(" ");

      for (const pre of rule.prerequisites) {
        if (!tokens.includes(pre.keyword)) continue;
        const preRule = this.rules.named(pre.rule);
        if (!preRule) continue;
        const preTarget = previousTarget ?? (target || pre.keyword);
        const draft = this.draftFor(preRule, preTarget, clause, drafts.length, frontier, context);
        drafts.push(draft);
        frontier = [draft.key];
        readRunDeps = null;
        readRun = [];
        if (target === pre.keyword && previousTarget) {
          target = `${pre.keyword} of ${previousTarget}`;
        }
      }

      if (target.length === 0) {
        target = previousTarget ?? clause;
      }

      const readOnly = rule.category === "read" && !rule.side_effects;
      const deps = readOnly && readRunDeps !== null ? readRunDeps : frontier;
      const draft = this.draftFor(rule, target, clause, drafts.length, deps, context);
      drafts.push(draft);

      if (readOnly) {
        if (readRunDeps === null) {
          readRunDeps = frontier;
          readRun = [];
        }
        readRun.push(draft.key);
        frontier = [...readRun];
      } else {
        frontier = [draft.key];
        readRunDeps = null;
        readRun = [];
      }
      previousTarget = target;
    }

    return ok(drafts);
  }

  /**
   * Validates drafts and freezes them into a PROPOSED plan. Risk scores are
   * left at zero for the security gate to fill in.
   */
  buildPlan(
    task: Pick<Task, "id" | "planVersion">,
    drafts: readonly StepDraft[],
    options: BuildPlanOptions,
  ): Result<Plan, PlanningError> {
    if (drafts.length === 0) {
      return err(new PlanValidationError("Plan has no steps"));
    }

    const refs = checkReferences(drafts);
    if (refs.isErr()) return err(refs.error);

    const cycle = findCycle(drafts);
    if (cycle) return err(new PlanCycleError(cycle));

    for (const draft of drafts) {
      for (const action of [draft.action, draft.compensatingAction]) {
        if (action && !this.capabilities.canHandle(action)) {
          return err(new UnsupportedActionError(action.name, action.category, draft.key));
        }
      }
    }

    for (const draft of drafts) {
      if (
        draft.sideEffects &&
        RISK_LEVEL_ORDER[draft.riskLevel] >= RISK_LEVEL_ORDER.MEDIUM &&
        draft.compensatingAction === null
      ) {
        return err(new MissingCompensationError(draft.key));
      }
    }

    const ordered = topologicalOrder(drafts);
    if (ordered.isErr()) return err(ordered.error);

    const planId = nanoid(12);
    const idOf = (key: string): string => `${planId}:${key}`;
    const steps: Step[] = ordered.value.map((draft, index) => ({
      id: idOf(draft.key),
      planId,
      sequenceIndex: index,
      dependsOn: draft.dependsOn.map(idOf),
      action: draft.action,
      riskLevel: draft.riskLevel,
      riskScore: 0,
      sideEffects: draft.sideEffects,
      compensatingAction: draft.compensatingAction,
      retryPolicy: { ...this.config.defaultRetry, ...draft.retryPolicy },
      parallelSafe: draft.parallelSafe,
      estimatedDurationMs:
        this.durations?.estimateDurationMs(draft.action.category) ??
        draft.estimatedDurationMs,
    }));

    const byKey = new Map<string, number>(
      ordered.value.map((d, i) => [d.key, steps[i]?.estimatedDurationMs ?? 0]),
    );

    return ok({
      id: planId,
      taskId: task.id,
      version: (options.supersedes?.version ?? task.planVersion) + 1,
      status: "PROPOSED",
      steps,
      estimatedDurationMs: criticalPathMs(ordered.value, (d) => byKey.get(d.key) ?? 0),
      aggregateRiskScore: 0,
      contextDegraded: options.contextDegraded,
      supersedes: options.supersedes?.id ?? null,
      createdAt: new Date().toISOString(),
    });
  }

  // ── Private Helpers ─────────────────────────────────

  private draftFor(
    rule: ActionRule,
    target: string,
    clause: string,
    index: number,
    dependsOn: readonly string[],
    context: readonly RankedMemoryNode[],
  ): StepDraft {
    const sensitivity = this.sensitivityOf(target, context);
    const action: ActionDescriptor = {
      name: rule.name,
      label: renderLabel(rule.label, target),
      category: rule.category,
      target,
      sensitivity,
      parameters: { clause },
    };
    return {
      key: `${index + 1}-${rule.name}`,
      dependsOn: [...dependsOn],
      action,
      riskLevel: rule.risk_level,
      sideEffects: rule.side_effects,
      compensatingAction: rule.compensation
        ? {
            name: rule.compensation.name,
            label: renderLabel(rule.compensation.label, target),
            category: rule.category,
            target,
            sensitivity,
            parameters: {},
          }
        : null,
      parallelSafe: rule.parallel_safe,
      estimatedDurationMs: rule.duration_ms,
    };
  }

  /** Classification of the best-ranked context node naming the target. */
  private sensitivityOf(
    target: string,
    context: readonly RankedMemoryNode[],
  ): Sensitivity {
    const wanted = target.toLowerCase();
    for (const ranked of context) {
      const name = ranked.entity.name.toLowerCase();
      if (name.length === 0) continue;
      if (wanted.includes(name) || name.includes(wanted)) {
        const parsed = SensitivitySchema.safeParse(
          ranked.entity.properties["classification"],
        );
        if (parsed.success) return parsed.data;
      }
    }
    return DEFAULT_SENSITIVITY;
  }
}
