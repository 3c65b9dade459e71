import { z } from "zod";
import {
  ActionDescriptorSchema,
  FeedbackRecordSchema,
  MemoryQuerySchema,
  PlanSchema,
  RankedMemoryNodeSchema,
  SecurityDecisionSchema,
  StepDraftSchema,
  StepResultSchema,
} from "@intentflow/shared";

// ─── Orchestrator Inbox ─────────────────────────────────

export const TaskRequestPayloadSchema = z.object({
  taskId: z.string().min(1),
  /** Caller-supplied steps that replace intent decomposition. */
  drafts: z.array(StepDraftSchema).nullable().default(null),
});

export const PlanProposedPayloadSchema = z.object({
  taskId: z.string().min(1),
  plan: PlanSchema.nullable(),
  error: z
    .object({
      code: z.string(),
      message: z.string(),
      stepId: z.string().nullable(),
    })
    .nullable(),
});

export const CancelPayloadSchema = z.object({
  taskId: z.string().min(1),
  reason: z.string().default("cancelled by caller"),
});

// ─── Planning ───────────────────────────────────────────

export const PlanRequestPayloadSchema = z.object({
  taskId: z.string().min(1),
  intent: z.string(),
  roleScope: z.string(),
  planVersion: z.number().int().min(0),
  drafts: z.array(StepDraftSchema).nullable(),
  supersedes: PlanSchema.nullable(),
});

// ─── Security ───────────────────────────────────────────

export const SecurityRequestPayloadSchema = z.object({
  plan: PlanSchema,
});

export const SecurityDecisionPayloadSchema = z.object({
  decision: SecurityDecisionSchema,
  plan: PlanSchema,
});

// ─── Execution ──────────────────────────────────────────

export const StepDispatchPayloadSchema = z.object({
  taskId: z.string().min(1),
  stepId: z.string().min(1),
  attempt: z.number().int().min(0),
  kind: z.enum(["action", "compensation"]),
  action: ActionDescriptorSchema,
  timeoutMs: z.number().int().positive(),
});

export { StepResultSchema as StepResultPayloadSchema };

// ─── Memory ─────────────────────────────────────────────

export const MemoryQueryPayloadSchema = z.object({
  requestId: z.string().min(1),
  query: MemoryQuerySchema,
});

export const MemoryResultPayloadSchema = z.object({
  requestId: z.string().min(1),
  nodes: z.array(RankedMemoryNodeSchema),
  error: z.string().nullable(),
});

// ─── Notifications ──────────────────────────────────────

/** Prompt for the human in the loop when a plan needs confirmation. */
export const ConfirmationNoticePayloadSchema = z.object({
  taskId: z.string().min(1),
  planId: z.string().min(1),
  token: z.string().min(1),
  expiresAt: z.string(),
  aggregateRiskScore: z.number(),
  reason: z.string().nullable(),
});

// ─── Learning ───────────────────────────────────────────

export { FeedbackRecordSchema as FeedbackPayloadSchema };

export type TaskRequestPayload = z.input<typeof TaskRequestPayloadSchema>;
export type PlanProposedPayload = z.infer<typeof PlanProposedPayloadSchema>;
export type CancelPayload = z.input<typeof CancelPayloadSchema>;
export type PlanRequestPayload = z.infer<typeof PlanRequestPayloadSchema>;
export type SecurityRequestPayload = z.infer<typeof SecurityRequestPayloadSchema>;
export type SecurityDecisionPayload = z.infer<typeof SecurityDecisionPayloadSchema>;
export type StepDispatchPayload = z.infer<typeof StepDispatchPayloadSchema>;
export type MemoryQueryPayload = z.input<typeof MemoryQueryPayloadSchema>;
export type MemoryResultPayload = z.infer<typeof MemoryResultPayloadSchema>;
export type ConfirmationNotice = z.infer<typeof ConfirmationNoticePayloadSchema>;
