import type {
  ActionCategory,
  RiskLevel,
  Sensitivity,
  TaskStatus,
} from "./types.js";

/**
 * Valid state transitions for Task status.
 * Key = current state, Value = set of allowed next states.
 */
export const TASK_TRANSITIONS: Record<TaskStatus, readonly TaskStatus[]> = {
  PENDING: ["PLANNING", "FAILED", "CANCELLED"],
  PLANNING: ["AWAITING_CONFIRMATION", "RUNNING", "FAILED", "CANCELLED"],
  AWAITING_CONFIRMATION: ["RUNNING", "FAILED", "CANCELLED"],
  RUNNING: [
    "RETRYING",
    "ROLLING_BACK",
    "PLANNING",
    "COMPLETED",
    "FAILED",
    "CANCELLED",
  ],
  RETRYING: ["RUNNING", "ROLLING_BACK", "FAILED", "CANCELLED"],
  ROLLING_BACK: ["PLANNING", "FAILED", "CANCELLED"],
  COMPLETED: [],
  FAILED: [],
  CANCELLED: [],
} as const;

/** Terminal states that cannot transition further. */
export const TERMINAL_TASK_STATUSES: readonly TaskStatus[] = [
  "COMPLETED",
  "FAILED",
  "CANCELLED",
] as const;

export const ACTION_CATEGORIES: readonly ActionCategory[] = [
  "read",
  "compute",
  "navigate",
  "write",
  "communicate",
  "delete",
  "system",
  "financial",
] as const;

export const SENSITIVITIES: readonly Sensitivity[] = [
  "public",
  "internal",
  "confidential",
  "restricted",
] as const;

export const RISK_LEVEL_ORDER: Record<RiskLevel, number> = {
  LOW: 0,
  MEDIUM: 1,
  HIGH: 2,
} as const;

/** Retry configuration defaults (milliseconds). */
export const RETRY_DEFAULTS = {
  maxAttempts: 3,
  backoffBaseMs: 500,
  backoffCapMs: 30_000,
} as const;

/** Risk gate defaults; every value is overridable through configuration. */
export const RISK_DEFAULTS = {
  lowThreshold: 0.35,
  highThreshold: 0.8,
  tieBreakWeight: 0.01,
  historyWeight: 0.3,
  categoryWeights: {
    read: 0.1,
    compute: 0.15,
    navigate: 0.1,
    write: 0.45,
    communicate: 0.5,
    delete: 0.65,
    system: 0.7,
    financial: 0.9,
  } satisfies Record<ActionCategory, number>,
  sensitivityMultipliers: {
    public: 0.8,
    internal: 1.0,
    confidential: 1.2,
    restricted: 1.4,
  } satisfies Record<Sensitivity, number>,
} as const;

export const DEFAULT_SENSITIVITY: Sensitivity = "internal";

/** Agent identifiers used as sender/receiver ids on the bus. */
export const AGENT_IDS = {
  api: "api",
  orchestrator: "orchestrator",
  planning: "planning-agent",
  security: "security-gate",
  execution: "execution-agent",
  memory: "memory-agent",
  learning: "learning-agent",
  user: "user",
} as const;
