/**
 * Core domain types for the IntentFlow task orchestration protocol.
 */

// ─── Task ───────────────────────────────────────────────

export type TaskStatus =
  | "PENDING"
  | "PLANNING"
  | "AWAITING_CONFIRMATION"
  | "RUNNING"
  | "RETRYING"
  | "ROLLING_BACK"
  | "COMPLETED"
  | "FAILED"
  | "CANCELLED";

/** 1 = critical … 5 = minimal. */
export type TaskPriority = 1 | 2 | 3 | 4 | 5;

export type ErrorCode =
  | "PlanCycleError"
  | "MissingCompensationError"
  | "PlanValidationError"
  | "UnsupportedActionError"
  | "RiskExceeded"
  | "ConfirmationTimeout"
  | "AuditIntegrityError"
  | "StepExecutionError"
  | "RollbackFailure"
  | "MemoryUnavailable"
  | "DuplicateMessageIgnored"
  | "Cancelled";

/** `not_required` when no step had succeeded before the failure. */
export type CompensationCompleteness = "complete" | "partial" | "not_required";

export interface CompensationFailure {
  stepId: string;
  error: string;
}

export interface TaskFailure {
  code: ErrorCode;
  message: string;
  stepId: string | null;
  completeness: CompensationCompleteness | null;
  compensationFailures: CompensationFailure[];
}

export interface TaskOutcome {
  status: "COMPLETED" | "FAILED" | "CANCELLED";
  completedSteps: string[];
  compensatedSteps: string[];
  finishedAt: string;
}

export interface Task {
  id: string;
  intent: string;
  roleScope: string;
  priority: TaskPriority;
  tags: string[];
  status: TaskStatus;
  createdAt: string;
  updatedAt: string;
  correlationId: string;
  planId: string | null;
  planVersion: number;
  replanCount: number;
  failure: TaskFailure | null;
  outcome: TaskOutcome | null;
}

// ─── Plan & Step ────────────────────────────────────────

export type ActionCategory =
  | "read"
  | "compute"
  | "navigate"
  | "write"
  | "communicate"
  | "delete"
  | "system"
  | "financial";

export type Sensitivity = "public" | "internal" | "confidential" | "restricted";

export type RiskLevel = "LOW" | "MEDIUM" | "HIGH";

export interface ActionDescriptor {
  name: string;
  label: string;
  category: ActionCategory;
  target: string;
  sensitivity: Sensitivity;
  parameters: Record<string, unknown>;
}

export interface RetryPolicy {
  maxAttempts: number;
  backoffBaseMs: number;
}

export interface Step {
  id: string;
  planId: string;
  sequenceIndex: number;
  dependsOn: string[];
  action: ActionDescriptor;
  riskLevel: RiskLevel;
  riskScore: number;
  sideEffects: boolean;
  compensatingAction: ActionDescriptor | null;
  retryPolicy: RetryPolicy;
  parallelSafe: boolean;
  estimatedDurationMs: number;
}

export type PlanStatus = "PROPOSED" | "ACCEPTED" | "SUPERSEDED" | "REJECTED";

export interface Plan {
  id: string;
  taskId: string;
  version: number;
  status: PlanStatus;
  steps: Step[];
  estimatedDurationMs: number;
  aggregateRiskScore: number;
  contextDegraded: boolean;
  supersedes: string | null;
  createdAt: string;
}

/**
 * A step before validation. `key` is local to the draft set and
 * `dependsOn` references other draft keys.
 */
export interface StepDraft {
  key: string;
  dependsOn: string[];
  action: ActionDescriptor;
  riskLevel: RiskLevel;
  sideEffects: boolean;
  compensatingAction: ActionDescriptor | null;
  retryPolicy?: Partial<RetryPolicy>;
  parallelSafe: boolean;
  estimatedDurationMs: number;
}

// ─── Execution ──────────────────────────────────────────

export type StepOutcome = "SUCCESS" | "FAILED" | "TIMEOUT";

export type StepResultKind = "action" | "compensation";

export interface StepResult {
  taskId: string;
  stepId: string;
  attempt: number;
  kind: StepResultKind;
  outcome: StepOutcome;
  output: Record<string, unknown>;
  error: string | null;
  retryable: boolean;
  category: ActionCategory;
  sensitivity: Sensitivity;
  durationMs: number;
  timestamp: string;
}

// ─── Security ───────────────────────────────────────────

export type AuditDecision = "AUTO_APPROVED" | "CONFIRMED" | "REJECTED";

export interface AuditEntry {
  id: string;
  taskId: string;
  sequence: number;
  stepId: string | null;
  actor: string;
  action: string;
  riskScore: number;
  decision: AuditDecision;
  timestamp: string;
  prevHash: string;
  hash: string;
}

export type GateDecision = "AUTO_APPROVED" | "CONFIRMATION_REQUIRED" | "REJECTED";

export interface StepRisk {
  stepId: string;
  baseScore: number;
  historySignal: number;
  score: number;
}

export interface PendingConfirmation {
  token: string;
  expiresAt: string;
}

export interface SecurityDecision {
  taskId: string;
  planId: string;
  decision: GateDecision;
  aggregateRiskScore: number;
  stepRisks: StepRisk[];
  reason: string | null;
  confirmation: PendingConfirmation | null;
}

// ─── Memory ─────────────────────────────────────────────

export interface MemoryNode {
  id: string;
  type: string;
  name: string;
  properties: Record<string, unknown>;
  keywords: string[];
  contextRoles: string[];
  confidence: number;
  version: number;
  createdAt: string;
  updatedAt: string;
}

export interface MemoryEdge {
  id: string;
  from: string;
  to: string;
  type: string;
  confidence: number;
  createdAt: string;
}

export interface MemoryQuery {
  roleScope: string;
  queryTerms: string[];
  limit: number;
}

export interface RankedMemoryNode {
  entity: MemoryNode;
  relevanceScore: number;
  recency: number;
  sourceContext: string;
}

// ─── Learning ───────────────────────────────────────────

export interface FeedbackRecord {
  taskId: string;
  humanRating: number;
  correctionNotes: string;
  timestamp: string;
}

// ─── Tools ──────────────────────────────────────────────

export type ToolKind = "script" | "automation" | "integration";

export type SandboxProfile = "isolated" | "restricted-network" | "trusted";

export interface ToolParameter {
  name: string;
  type: "string" | "number" | "boolean";
  required: boolean;
}

export interface ToolSpec {
  name: string;
  description: string;
  kind: ToolKind;
  sandboxProfile: SandboxProfile;
  categories: ActionCategory[];
  parameters: ToolParameter[];
}

// ─── Messaging ──────────────────────────────────────────

export type MessageType =
  | "TASK_REQUEST"
  | "PLAN_PROPOSED"
  | "SECURITY_DECISION"
  | "STEP_DISPATCH"
  | "STEP_RESULT"
  | "MEMORY_QUERY"
  | "MEMORY_RESULT"
  | "FEEDBACK"
  | "CANCEL";

export interface AgentMessage<P = unknown> {
  id: string;
  senderId: string;
  receiverId: string;
  messageType: MessageType;
  payload: P;
  priority: number;
  timestamp: string;
  correlationId: string;
}

// ─── Health ─────────────────────────────────────────────

export type HealthStatus = "ok" | "degraded" | "down";

export interface AgentHealthReport {
  agent: string;
  status: HealthStatus;
  lastProcessedAt: string | null;
  detail: string | null;
}

// ─── Trace ──────────────────────────────────────────────

export type TraceActor =
  | "api"
  | "orchestrator"
  | "planning-agent"
  | "security-gate"
  | "execution-agent"
  | "memory-agent"
  | "learning-agent"
  | "system";

export type TraceEventType =
  | "RECEIVED"
  | "PLANNED"
  | "PLAN_REJECTED"
  | "GATED"
  | "CONFIRMED"
  | "DISPATCHED"
  | "STEP_SUCCEEDED"
  | "STEP_FAILED"
  | "RETRY"
  | "ROLLBACK"
  | "COMPENSATED"
  | "ROLLBACK_INCOMPLETE"
  | "REPLANNED"
  | "COMPLETED"
  | "FAILED"
  | "CANCELLED"
  | "RECOVERED";

export interface TraceRefs {
  planId?: string;
  stepId?: string;
  attempt?: number;
}

export interface TraceEntry {
  timestamp: string;
  taskId: string;
  actor: TraceActor;
  eventType: TraceEventType;
  summary: string;
  refs: TraceRefs;
}

// ─── API Input/Output ───────────────────────────────────

export interface CreateTaskInput {
  intent: string;
  roleScope: string;
  priority?: TaskPriority;
  tags?: string[];
  steps?: StepDraft[];
}

export interface StepSummary {
  id: string;
  label: string;
  category: ActionCategory;
  riskLevel: RiskLevel;
  riskScore: number;
  dependsOn: string[];
}

export interface PlanSummary {
  planId: string;
  version: number;
  status: PlanStatus;
  aggregateRiskScore: number;
  estimatedDurationMs: number;
  contextDegraded: boolean;
  steps: StepSummary[];
}

export interface TaskView {
  taskId: string;
  status: TaskStatus;
  intent: string;
  roleScope: string;
  createdAt: string;
  updatedAt: string;
  plan: PlanSummary | null;
  lastStepResult: StepResult | null;
  failure: TaskFailure | null;
  outcome: TaskOutcome | null;
  awaitingConfirmation: { expiresAt: string } | null;
}
