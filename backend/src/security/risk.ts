import type {
  ActionCategory,
  Sensitivity,
  Step,
  StepRisk,
} from "@intentflow/shared";

export interface RiskConfig {
  lowThreshold: number;
  highThreshold: number;
  tieBreakWeight: number;
  historyWeight: number;
  categoryWeights: Record<ActionCategory, number>;
  sensitivityMultipliers: Record<Sensitivity, number>;
}

/** Learned failure tendency in [0, 1]; 0 when nothing is known. */
export interface RiskSignalSource {
  riskSignal(category: ActionCategory, sensitivity: Sensitivity): number;
}

export function clamp01(value: number): number {
  if (Number.isNaN(value)) return 0;
  return Math.min(1, Math.max(0, value));
}

export function scoreStep(
  step: Step,
  config: RiskConfig,
  signals: RiskSignalSource | null,
): StepRisk {
  const { category, sensitivity } = step.action;
  const baseScore =
    config.categoryWeights[category] * config.sensitivityMultipliers[sensitivity];
  // Negative signals are ignored: history may raise risk, never lower it.
  const historySignal = Math.max(0, signals?.riskSignal(category, sensitivity) ?? 0);
  return {
    stepId: step.id,
    baseScore,
    historySignal,
    score: clamp01(baseScore + config.historyWeight * historySignal),
  };
}

/** max + tieBreak × (sum − max), so extra risky steps nudge the total up. */
export function aggregateRisk(scores: readonly number[], tieBreakWeight: number): number {
  if (scores.length === 0) return 0;
  const max = Math.max(...scores);
  const sum = scores.reduce((a, b) => a + b, 0);
  return clamp01(max + tieBreakWeight * (sum - max));
}
