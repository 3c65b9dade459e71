import * as path from "node:path";
import { ACTION_CATEGORIES, AGENT_IDS } from "@intentflow/shared";
import type { ToolKind } from "@intentflow/shared";
import type { AppConfig } from "./config/schema.js";
import { HealthRegistry } from "./agents/agent-health.js";
import type { BusAgent } from "./agents/bus-agent.js";
import { MessageBus } from "./bus/message-bus.js";
import { CapabilityRegistry, type StepExecutor } from "./execution/capability-registry.js";
import { ExecutionAgent } from "./execution/execution-agent.js";
import { DryRunExecutor, HttpStepExecutor, HttpToolRunner } from "./execution/http-executor.js";
import { LearningAgent } from "./learning/learning-agent.js";
import { LearningModel } from "./learning/learning.js";
import { FileLeaseManager } from "./lease/file-lease.js";
import { InMemoryLeaseManager, type TaskLeaseManager } from "./lease/task-lease.js";
import { createLogger } from "./logger.js";
import { GraphMemoryStore } from "./memory/graph-store.js";
import { MemoryAgent } from "./memory/memory-agent.js";
import { BusMemoryClient } from "./memory/memory-client.js";
import { loadMemorySeed } from "./memory/seed.js";
import { NotificationHub } from "./notifications/notification-hub.js";
import { Orchestrator } from "./orchestrator/orchestrator.js";
import { loadActionRules, RuleIndex } from "./planning/action-rules.js";
import { Planner } from "./planning/planner.js";
import { PlanningAgent } from "./planning/planning-agent.js";
import { AuditLog } from "./security/audit-log.js";
import { ConfirmationTokens } from "./security/confirmation.js";
import type { RiskConfig } from "./security/risk.js";
import { SecurityAgent } from "./security/security-agent.js";
import { SecurityGate } from "./security/security-gate.js";
import { createStore } from "./store/index.js";
import type { IStateStore } from "./store/interface.js";

const log = createLogger("runtime");

/** Replacements for the pieces that touch disk or the network. */
export interface RuntimeOverrides {
  store?: IStateStore;
  leases?: TaskLeaseManager;
  executors?: StepExecutor[];
}

export interface Runtime {
  config: AppConfig;
  store: IStateStore;
  bus: MessageBus;
  health: HealthRegistry;
  registry: CapabilityRegistry;
  memory: GraphMemoryStore;
  learning: LearningModel;
  gate: SecurityGate;
  notifications: NotificationHub;
  orchestrator: Orchestrator;
  /** Recovers unfinished tasks, then starts consuming. */
  start(): Promise<void>;
  stop(): Promise<void>;
}

export function riskConfigOf(config: AppConfig): RiskConfig {
  const s = config.security;
  return {
    lowThreshold: s.low_threshold,
    highThreshold: s.high_threshold,
    tieBreakWeight: s.tie_break_weight,
    historyWeight: s.history_weight,
    categoryWeights: s.category_weights,
    sensitivityMultipliers: s.sensitivity_multipliers,
  };
}

function buildRegistry(config: AppConfig, extra: StepExecutor[]): CapabilityRegistry {
  const exec = config.execution;
  const registry = new CapabilityRegistry({
    maxExecutors: exec.max_executors,
    maxTools: exec.max_tools,
  });

  const executors: StepExecutor[] = [
    ...extra,
    ...exec.executors.map((e) => new HttpStepExecutor(e)),
  ];
  if (exec.dry_run) executors.push(new DryRunExecutor(ACTION_CATEGORIES));
  for (const executor of executors) {
    const registered = registry.registerExecutor(executor);
    if (registered.isErr()) throw registered.error;
  }

  const runners: Array<[ToolKind, string | undefined]> = [
    ["script", exec.tool_runners.script],
    ["automation", exec.tool_runners.automation],
    ["integration", exec.tool_runners.integration],
  ];
  for (const [kind, url] of runners) {
    if (url) registry.registerRunner(new HttpToolRunner(kind, url));
  }
  return registry;
}

/** Wires every component from configuration. Nothing consumes until start(). */
export async function createRuntime(
  config: AppConfig,
  overrides: RuntimeOverrides = {},
): Promise<Runtime> {
  // ─── State ──────────────────────────────────────────
  const store = overrides.store ?? createStore(config.orchestrator.state_dir);
  const initialized = await store.initialize();
  if (initialized.isErr()) throw initialized.error;

  const bus = new MessageBus({
    partitions: config.bus.partitions,
    redeliveryDelayMs: config.bus.redelivery_delay_ms,
    maxDeliveries: config.bus.max_deliveries,
    journalDir: config.bus.journal_dir,
  });
  const opened = await bus.open();
  if (opened.isErr()) throw opened.error;

  const leases =
    overrides.leases ??
    (config.orchestrator.lease_backend === "file"
      ? new FileLeaseManager({
          directory: config.orchestrator.lease_dir,
          ttlMs: config.orchestrator.lease_ttl_ms,
        })
      : new InMemoryLeaseManager({ ttlMs: config.orchestrator.lease_ttl_ms }));

  // ─── Memory & Learning ──────────────────────────────
  const memory = new GraphMemoryStore({
    weights: {
      relevance: config.memory.relevance_weight,
      recency: config.memory.recency_weight,
      centrality: config.memory.centrality_weight,
      halfLifeMs: config.memory.half_life_ms,
    },
    journalPath: config.memory.journal_path,
  });
  const memoryOpened = await memory.open();
  if (memoryOpened.isErr()) throw memoryOpened.error;
  if (config.memory.seed_file) {
    const seeded = await loadMemorySeed(memory, path.resolve(config.memory.seed_file));
    if (seeded.isErr()) throw seeded.error;
    log.info({ records: seeded.value }, "memory seeded");
  }

  const learning = new LearningModel({
    alpha: config.learning.alpha,
    windowMs: config.learning.window_ms,
  });

  // ─── Capabilities & Planning ────────────────────────
  const registry = buildRegistry(config, overrides.executors ?? []);

  const rules = loadActionRules(path.resolve(config.planning.rules_file));
  if (rules.isErr()) throw rules.error;
  const ruleIndex = new RuleIndex(rules.value);
  const planner = new Planner(
    {
      defaultRetry: {
        maxAttempts: config.planning.default_max_attempts,
        backoffBaseMs: config.planning.default_backoff_base_ms,
      },
    },
    ruleIndex,
    registry,
    learning,
  );

  // ─── Security ───────────────────────────────────────
  const audit = new AuditLog(store);
  const gate = new SecurityGate(
    riskConfigOf(config),
    audit,
    new ConfirmationTokens(config.security.confirmation_ttl_ms),
    learning,
  );

  // ─── Agents ─────────────────────────────────────────
  const health = new HealthRegistry();
  const memoryClient = new BusMemoryClient(bus, AGENT_IDS.planning, config.planning.memory_timeout_ms);
  const notifications = new NotificationHub(
    bus,
    health,
    (notice) => gate.pendingConfirmation(notice.taskId)?.planId === notice.planId,
  );
  const agents: BusAgent[] = [
    new MemoryAgent(bus, health, memory),
    new PlanningAgent(bus, health, planner, memoryClient, {
      contextLimit: config.planning.context_limit,
      stopwords: ruleIndex.stopwords,
    }),
    new SecurityAgent(bus, health, gate),
    new ExecutionAgent(bus, health, registry),
    new LearningAgent(bus, health, learning, store),
    notifications,
  ];

  const orchestrator = new Orchestrator(
    {
      maxReplans: config.orchestrator.max_replans,
      leaseRenewIntervalMs: Math.max(1, Math.floor(config.orchestrator.lease_ttl_ms / 3)),
      execution: {
        maxParallelSteps: config.execution.max_parallel_steps,
        backoffCapMs: config.execution.backoff_cap_ms,
        stepTimeoutMs: config.execution.step_timeout_ms,
        resultTimeoutMs: config.execution.result_timeout_ms,
      },
    },
    { store, bus, health, leases, gate, audit, memory },
  );

  return {
    config,
    store,
    bus,
    health,
    registry,
    memory,
    learning,
    gate,
    notifications,
    orchestrator,

    async start() {
      memoryClient.start();
      for (const agent of agents) agent.start();
      await orchestrator.recover();
      orchestrator.start();
      log.info(
        { executors: registry.listExecutors().map((e) => e.name), agents: agents.length + 1 },
        "runtime started",
      );
    },

    async stop() {
      await orchestrator.shutdown();
      for (const agent of agents) agent.stop();
      memoryClient.stop();
      await bus.close();
      log.info("runtime stopped");
    },
  };
}
