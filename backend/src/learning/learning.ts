import type {
  ActionCategory,
  FeedbackRecord,
  Sensitivity,
  StepResult,
} from "@intentflow/shared";
import type { DurationEstimator } from "../planning/planner.js";
import type { RiskSignalSource } from "../security/risk.js";

// ─── Types ──────────────────────────────────────────────

export interface LearningConfig {
  /** EMA smoothing factor in (0, 1]. */
  alpha: number;
  /** Minimum spacing between two revisions of the same weight. */
  windowMs: number;
}

export interface WeightSnapshot {
  key: string;
  weight: number;
  revisions: number;
  pending: number;
  revisedAt: string | null;
}

export interface LearningSnapshot {
  categories: WeightSnapshot[];
  sensitivities: WeightSnapshot[];
  durations: Array<{ category: ActionCategory; estimateMs: number; samples: number }>;
}

// ─── Rate-limited EMA ───────────────────────────────────

/**
 * An EMA bounded to 0..1 that changes at most once per window.
 * Observations inside the window wait in a buffer and are averaged into
 * the next revision.
 */
class WindowedWeight {
  private weight = 0;
  private revisions = 0;
  private revisedAt: number | null = null;
  private buffer: number[] = [];

  constructor(
    readonly key: string,
    private readonly config: LearningConfig,
  ) {}

  observe(value: number, now: number): void {
    this.buffer.push(Math.min(1, Math.max(0, value)));
    this.settle(now);
  }

  /** Revises if observations are waiting and the window has passed. */
  settle(now: number): void {
    if (this.buffer.length === 0) return;
    if (this.revisedAt !== null && now - this.revisedAt < this.config.windowMs) return;

    const mean = this.buffer.reduce((a, b) => a + b, 0) / this.buffer.length;
    this.weight = Math.min(1, Math.max(0, this.weight + this.config.alpha * (mean - this.weight)));
    this.buffer = [];
    this.revisions++;
    this.revisedAt = now;
  }

  value(now: number): number {
    this.settle(now);
    return this.weight;
  }

  snapshot(now: number): WeightSnapshot {
    this.settle(now);
    return {
      key: this.key,
      weight: this.weight,
      revisions: this.revisions,
      pending: this.buffer.length,
      revisedAt: this.revisedAt === null ? null : new Date(this.revisedAt).toISOString(),
    };
  }
}

// ─── Learning Model ─────────────────────────────────────

export class LearningModel implements RiskSignalSource, DurationEstimator {
  private readonly byCategory = new Map<ActionCategory, WindowedWeight>();
  private readonly bySensitivity = new Map<Sensitivity, WindowedWeight>();
  private readonly durations = new Map<ActionCategory, { estimateMs: number; samples: number }>();

  constructor(
    private readonly config: LearningConfig,
    private readonly now: () => number = Date.now,
  ) {}

  /** Failure or timeout counts 1, success 0. Compensations are not scored. */
  observeResult(result: StepResult): void {
    if (result.kind !== "action") return;
    const badness = result.outcome === "SUCCESS" ? 0 : 1;
    const now = this.now();
    this.weightFor(this.byCategory, result.category).observe(badness, now);
    this.weightFor(this.bySensitivity, result.sensitivity).observe(badness, now);
    if (result.outcome === "SUCCESS") {
      this.observeDuration(result.category, result.durationMs);
    }
  }

  /** A rating of 5 counts 0 and a rating of 1 counts 1, for each category the task used. */
  observeFeedback(record: FeedbackRecord, categories: Iterable<ActionCategory>): void {
    const badness = (5 - record.humanRating) / 4;
    const now = this.now();
    for (const category of new Set(categories)) {
      this.weightFor(this.byCategory, category).observe(badness, now);
    }
  }

  riskSignal(category: ActionCategory, sensitivity: Sensitivity): number {
    const now = this.now();
    const c = this.byCategory.get(category)?.value(now) ?? 0;
    const s = this.bySensitivity.get(sensitivity)?.value(now) ?? 0;
    return Math.max(c, s);
  }

  estimateDurationMs(category: ActionCategory): number | null {
    const d = this.durations.get(category);
    return d ? Math.round(d.estimateMs) : null;
  }

  snapshot(): LearningSnapshot {
    const now = this.now();
    return {
      categories: [...this.byCategory.values()].map((w) => w.snapshot(now)),
      sensitivities: [...this.bySensitivity.values()].map((w) => w.snapshot(now)),
      durations: [...this.durations].map(([category, d]) => ({
        category,
        estimateMs: Math.round(d.estimateMs),
        samples: d.samples,
      })),
    };
  }

  private observeDuration(category: ActionCategory, durationMs: number): void {
    const current = this.durations.get(category);
    if (!current) {
      this.durations.set(category, { estimateMs: durationMs, samples: 1 });
      return;
    }
    current.estimateMs += this.config.alpha * (durationMs - current.estimateMs);
    current.samples++;
  }

  private weightFor<K extends string>(table: Map<K, WindowedWeight>, key: K): WindowedWeight {
    let weight = table.get(key);
    if (!weight) {
      weight = new WindowedWeight(key, this.config);
      table.set(key, weight);
    }
    return weight;
  }
}
