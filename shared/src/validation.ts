import { z } from "zod";

// ─── Enum Schemas ───────────────────────────────────────

export const TaskStatusSchema = z.enum([
  "PENDING",
  "PLANNING",
  "AWAITING_CONFIRMATION",
  "RUNNING",
  "RETRYING",
  "ROLLING_BACK",
  "COMPLETED",
  "FAILED",
  "CANCELLED",
]);

export const ActionCategorySchema = z.enum([
  "read",
  "compute",
  "navigate",
  "write",
  "communicate",
  "delete",
  "system",
  "financial",
]);

export const SensitivitySchema = z.enum([
  "public",
  "internal",
  "confidential",
  "restricted",
]);

export const RiskLevelSchema = z.enum(["LOW", "MEDIUM", "HIGH"]);

export const StepOutcomeSchema = z.enum(["SUCCESS", "FAILED", "TIMEOUT"]);

export const MessageTypeSchema = z.enum([
  "TASK_REQUEST",
  "PLAN_PROPOSED",
  "SECURITY_DECISION",
  "STEP_DISPATCH",
  "STEP_RESULT",
  "MEMORY_QUERY",
  "MEMORY_RESULT",
  "FEEDBACK",
  "CANCEL",
]);

export const TaskPrioritySchema = z.union([
  z.literal(1),
  z.literal(2),
  z.literal(3),
  z.literal(4),
  z.literal(5),
]);

// ─── Plan Schemas ───────────────────────────────────────

export const ActionDescriptorSchema = z.object({
  name: z.string().min(1),
  label: z.string().min(1),
  category: ActionCategorySchema,
  target: z.string(),
  sensitivity: SensitivitySchema.default("internal"),
  parameters: z.record(z.unknown()).default({}),
});

export const RetryPolicySchema = z.object({
  maxAttempts: z.number().int().min(1).max(20),
  backoffBaseMs: z.number().int().min(0),
});

export const StepDraftSchema = z.object({
  key: z.string().min(1),
  dependsOn: z.array(z.string()).default([]),
  action: ActionDescriptorSchema,
  riskLevel: RiskLevelSchema,
  sideEffects: z.boolean(),
  compensatingAction: ActionDescriptorSchema.nullable().default(null),
  retryPolicy: RetryPolicySchema.partial().optional(),
  parallelSafe: z.boolean().default(false),
  estimatedDurationMs: z.number().int().min(0).default(1000),
});

export const StepSchema = z.object({
  id: z.string().min(1),
  planId: z.string().min(1),
  sequenceIndex: z.number().int().min(0),
  dependsOn: z.array(z.string()),
  action: ActionDescriptorSchema,
  riskLevel: RiskLevelSchema,
  riskScore: z.number().min(0).max(1),
  sideEffects: z.boolean(),
  compensatingAction: ActionDescriptorSchema.nullable(),
  retryPolicy: RetryPolicySchema,
  parallelSafe: z.boolean(),
  estimatedDurationMs: z.number().min(0),
});

export const PlanSchema = z.object({
  id: z.string().min(1),
  taskId: z.string().min(1),
  version: z.number().int().min(1),
  status: z.enum(["PROPOSED", "ACCEPTED", "SUPERSEDED", "REJECTED"]),
  steps: z.array(StepSchema).min(1),
  estimatedDurationMs: z.number().min(0),
  aggregateRiskScore: z.number().min(0).max(1),
  contextDegraded: z.boolean(),
  supersedes: z.string().nullable(),
  createdAt: z.string(),
});

// ─── API Input Schemas ──────────────────────────────────

export const CreateTaskInputSchema = z.object({
  intent: z.string().min(1, "intent is required").max(2000),
  roleScope: z.string().min(1, "roleScope is required"),
  priority: TaskPrioritySchema.default(3),
  tags: z.array(z.string()).max(10).default([]),
  steps: z.array(StepDraftSchema).min(1).optional(),
});

export const ConfirmTaskInputSchema = z.object({
  confirmationToken: z.string().min(1, "confirmationToken is required"),
});

export const FeedbackInputSchema = z.object({
  humanRating: z.number().int().min(1).max(5),
  correctionNotes: z.string().max(2000).default(""),
});

export const MemoryQuerySchema = z.object({
  roleScope: z.string().min(1),
  queryTerms: z.array(z.string()).default([]),
  limit: z.number().int().min(1).max(100).default(10),
});

export const UpsertMemoryNodeSchema = z.object({
  id: z.string().min(1).optional(),
  type: z.string().min(1),
  name: z.string().min(1),
  properties: z.record(z.unknown()).optional(),
  keywords: z.array(z.string()).optional(),
  contextRoles: z.array(z.string()).optional(),
  confidence: z.number().min(0).max(1).optional(),
});

export const LinkMemoryNodesSchema = z.object({
  from: z.string().min(1),
  to: z.string().min(1),
  type: z.string().min(1),
  confidence: z.number().min(0).max(1).optional(),
});

export const TaskListQuerySchema = z.object({
  status: TaskStatusSchema.optional(),
  limit: z.coerce.number().int().min(1).max(500).optional(),
  offset: z.coerce.number().int().min(0).optional(),
});

// ─── Tool Schemas ───────────────────────────────────────

export const ToolParameterSchema = z.object({
  name: z.string().regex(/^[a-zA-Z_][a-zA-Z0-9_]*$/),
  type: z.enum(["string", "number", "boolean"]),
  required: z.boolean().default(false),
});

export const ToolSpecSchema = z
  .object({
    name: z.string().regex(/^[a-z][a-z0-9_]{1,63}$/, "tool name must be snake_case"),
    description: z.string().min(1).max(500),
    kind: z.enum(["script", "automation", "integration"]),
    sandboxProfile: z.enum(["isolated", "restricted-network", "trusted"]),
    categories: z.array(ActionCategorySchema).min(1),
    parameters: z.array(ToolParameterSchema).max(32).default([]),
  })
  .refine(
    (spec) =>
      new Set(spec.parameters.map((p) => p.name)).size === spec.parameters.length,
    "parameter names must be unique",
  )
  .refine(
    (spec) => spec.kind !== "script" || spec.sandboxProfile !== "trusted",
    "script tools cannot run in the trusted sandbox profile",
  );

// ─── Execution Schemas ──────────────────────────────────

export const StepResultSchema = z.object({
  taskId: z.string(),
  stepId: z.string(),
  attempt: z.number().int().min(0),
  kind: z.enum(["action", "compensation"]),
  outcome: StepOutcomeSchema,
  output: z.record(z.unknown()),
  error: z.string().nullable(),
  retryable: z.boolean(),
  category: ActionCategorySchema,
  sensitivity: SensitivitySchema,
  durationMs: z.number().min(0),
  timestamp: z.string(),
});

export const FeedbackRecordSchema = z.object({
  taskId: z.string(),
  humanRating: z.number().int().min(1).max(5),
  correctionNotes: z.string(),
  timestamp: z.string(),
});

export const MemoryNodeSchema = z.object({
  id: z.string().min(1),
  type: z.string().min(1),
  name: z.string(),
  properties: z.record(z.unknown()),
  keywords: z.array(z.string()),
  contextRoles: z.array(z.string()),
  confidence: z.number().min(0).max(1),
  version: z.number().int().min(1),
  createdAt: z.string(),
  updatedAt: z.string(),
});

export const RankedMemoryNodeSchema = z.object({
  entity: MemoryNodeSchema,
  relevanceScore: z.number(),
  recency: z.number(),
  sourceContext: z.string(),
});

export const StepRiskSchema = z.object({
  stepId: z.string(),
  baseScore: z.number(),
  historySignal: z.number(),
  score: z.number(),
});

export const SecurityDecisionSchema = z.object({
  taskId: z.string(),
  planId: z.string(),
  decision: z.enum(["AUTO_APPROVED", "CONFIRMATION_REQUIRED", "REJECTED"]),
  aggregateRiskScore: z.number(),
  stepRisks: z.array(StepRiskSchema),
  reason: z.string().nullable(),
  confirmation: z
    .object({ token: z.string(), expiresAt: z.string() })
    .nullable(),
});

// ─── Message Envelope ───────────────────────────────────

export const AgentMessageSchema = z.object({
  id: z.string(),
  senderId: z.string().min(1),
  receiverId: z.string().min(1),
  messageType: MessageTypeSchema,
  payload: z.unknown(),
  priority: z.number().int().min(1).max(5),
  timestamp: z.string(),
  correlationId: z.string().min(1),
});
