import { z } from "zod";
import { ActionCategorySchema, RETRY_DEFAULTS, RISK_DEFAULTS } from "@intentflow/shared";

export const ServerConfigSchema = z.object({
  port: z.number().int().min(1).max(65535).default(3000),
  host: z.string().default("0.0.0.0"),
  cors_origin: z.union([z.boolean(), z.string()]).default(true),
});

export const AuthConfigSchema = z.object({
  username: z.string().min(1).default("admin"),
  password: z.string().min(1).default("changeme"),
});

export const OrchestratorConfigSchema = z.object({
  state_dir: z.string().default(".intentflow/state"),
  max_replans: z.number().int().min(0).default(0),
  lease_backend: z.enum(["file", "memory"]).default("file"),
  lease_dir: z.string().default(".intentflow/leases"),
  lease_ttl_ms: z.number().int().positive().default(30_000),
});

export const BusConfigSchema = z.object({
  partitions: z.number().int().min(1).max(256).default(8),
  redelivery_delay_ms: z.number().int().min(0).default(100),
  max_deliveries: z.number().int().min(1).default(5),
  /** Directory for the durable topic journal; null keeps messages in memory. */
  journal_dir: z.string().nullable().default(null),
});

export const ExecutorConfigSchema = z.object({
  name: z.string().min(1),
  url: z.string().url(),
  categories: z.array(ActionCategorySchema).min(1),
  actions: z.array(z.string()).default([]),
  headers: z.record(z.string()).default({}),
});

export const ExecutionConfigSchema = z.object({
  max_parallel_steps: z.number().int().min(1).default(4),
  backoff_cap_ms: z.number().int().positive().default(RETRY_DEFAULTS.backoffCapMs),
  step_timeout_ms: z.number().int().positive().default(30_000),
  result_timeout_ms: z.number().int().positive().default(45_000),
  /** Registers an executor that acknowledges every category without side effects. */
  dry_run: z.boolean().default(false),
  max_executors: z.number().int().min(1).default(32),
  max_tools: z.number().int().min(1).default(64),
  executors: z.array(ExecutorConfigSchema).default([]),
  tool_runners: z
    .object({
      script: z.string().url().optional(),
      automation: z.string().url().optional(),
      integration: z.string().url().optional(),
    })
    .default({}),
});

export const SecurityConfigSchema = z.object({
  low_threshold: z.number().min(0).max(1).default(RISK_DEFAULTS.lowThreshold),
  high_threshold: z.number().min(0).max(1).default(RISK_DEFAULTS.highThreshold),
  tie_break_weight: z.number().min(0).max(1).default(RISK_DEFAULTS.tieBreakWeight),
  history_weight: z.number().min(0).max(1).default(RISK_DEFAULTS.historyWeight),
  category_weights: z
    .object({
      read: z.number().min(0).max(1).default(RISK_DEFAULTS.categoryWeights.read),
      compute: z.number().min(0).max(1).default(RISK_DEFAULTS.categoryWeights.compute),
      navigate: z.number().min(0).max(1).default(RISK_DEFAULTS.categoryWeights.navigate),
      write: z.number().min(0).max(1).default(RISK_DEFAULTS.categoryWeights.write),
      communicate: z.number().min(0).max(1).default(RISK_DEFAULTS.categoryWeights.communicate),
      delete: z.number().min(0).max(1).default(RISK_DEFAULTS.categoryWeights.delete),
      system: z.number().min(0).max(1).default(RISK_DEFAULTS.categoryWeights.system),
      financial: z.number().min(0).max(1).default(RISK_DEFAULTS.categoryWeights.financial),
    })
    .default({}),
  sensitivity_multipliers: z
    .object({
      public: z.number().min(0).default(RISK_DEFAULTS.sensitivityMultipliers.public),
      internal: z.number().min(0).default(RISK_DEFAULTS.sensitivityMultipliers.internal),
      confidential: z.number().min(0).default(RISK_DEFAULTS.sensitivityMultipliers.confidential),
      restricted: z.number().min(0).default(RISK_DEFAULTS.sensitivityMultipliers.restricted),
    })
    .default({}),
  confirmation_ttl_ms: z.number().int().positive().default(300_000),
});

export const PlanningConfigSchema = z.object({
  rules_file: z.string().default("config/action-rules.yaml"),
  memory_timeout_ms: z.number().int().positive().default(2_000),
  context_limit: z.number().int().min(1).max(100).default(10),
  default_max_attempts: z.number().int().min(1).default(RETRY_DEFAULTS.maxAttempts),
  default_backoff_base_ms: z.number().int().min(0).default(RETRY_DEFAULTS.backoffBaseMs),
});

export const MemoryConfigSchema = z.object({
  journal_path: z.string().nullable().default(null),
  seed_file: z.string().nullable().default(null),
  relevance_weight: z.number().min(0).default(0.6),
  recency_weight: z.number().min(0).default(0.25),
  centrality_weight: z.number().min(0).default(0.15),
  half_life_ms: z.number().int().positive().default(7 * 24 * 60 * 60 * 1000),
});

export const LearningConfigSchema = z.object({
  alpha: z.number().gt(0).max(1).default(0.2),
  window_ms: z.number().int().min(0).default(60_000),
});

export const LoggingConfigSchema = z.object({
  level: z.enum(["debug", "info", "warn", "error"]).default("info"),
});

export const AppConfigSchema = z
  .object({
    server: ServerConfigSchema.default({}),
    auth: AuthConfigSchema.default({}),
    orchestrator: OrchestratorConfigSchema.default({}),
    bus: BusConfigSchema.default({}),
    execution: ExecutionConfigSchema.default({}),
    security: SecurityConfigSchema.default({}),
    planning: PlanningConfigSchema.default({}),
    memory: MemoryConfigSchema.default({}),
    learning: LearningConfigSchema.default({}),
    logging: LoggingConfigSchema.default({}),
  })
  .refine((c) => c.security.low_threshold < c.security.high_threshold, {
    message: "security.low_threshold must be below security.high_threshold",
    path: ["security", "low_threshold"],
  })
  .refine((c) => c.execution.result_timeout_ms >= c.execution.step_timeout_ms, {
    message: "execution.result_timeout_ms must not be shorter than execution.step_timeout_ms",
    path: ["execution", "result_timeout_ms"],
  });

export type AppConfig = z.infer<typeof AppConfigSchema>;
export type ServerConfig = z.infer<typeof ServerConfigSchema>;
export type AuthConfig = z.infer<typeof AuthConfigSchema>;
export type ExecutionConfig = z.infer<typeof ExecutionConfigSchema>;
export type SecurityConfig = z.infer<typeof SecurityConfigSchema>;
export type MemoryConfig = z.infer<typeof MemoryConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
