import type { AgentHealthReport, HealthStatus } from "@intentflow/shared";

/**
 * Liveness of one agent. `degraded` while the most recent handler call
 * failed, `down` when the agent is stopped.
 */
export class AgentHealth {
  private running = false;
  private lastProcessedAt: string | null = null;
  private lastError: string | null = null;

  constructor(readonly agent: string) {}

  markStarted(): void {
    this.running = true;
  }

  markStopped(): void {
    this.running = false;
  }

  markProcessed(now: Date = new Date()): void {
    this.lastProcessedAt = now.toISOString();
    this.lastError = null;
  }

  markError(detail: string): void {
    this.lastError = detail;
  }

  report(): AgentHealthReport {
    let status: HealthStatus = "ok";
    if (!this.running) status = "down";
    else if (this.lastError !== null) status = "degraded";
    return {
      agent: this.agent,
      status,
      lastProcessedAt: this.lastProcessedAt,
      detail: this.running ? this.lastError : "stopped",
    };
  }
}

export class HealthRegistry {
  private readonly agents = new Map<string, AgentHealth>();

  track(agent: string): AgentHealth {
    let health = this.agents.get(agent);
    if (!health) {
      health = new AgentHealth(agent);
      this.agents.set(agent, health);
    }
    return health;
  }

  get(agent: string): AgentHealthReport | undefined {
    return this.agents.get(agent)?.report();
  }

  all(): AgentHealthReport[] {
    return [...this.agents.values()].map((h) => h.report());
  }

  /** Worst status across agents, and the latest processing time seen. */
  overall(): { status: HealthStatus; lastProcessedAt: string | null } {
    const reports = this.all();
    let status: HealthStatus = "ok";
    let lastProcessedAt: string | null = null;
    for (const r of reports) {
      if (r.status === "down") status = "down";
      else if (r.status === "degraded" && status === "ok") status = "degraded";
      if (r.lastProcessedAt && (!lastProcessedAt || r.lastProcessedAt > lastProcessedAt)) {
        lastProcessedAt = r.lastProcessedAt;
      }
    }
    return { status, lastProcessedAt };
  }
}
