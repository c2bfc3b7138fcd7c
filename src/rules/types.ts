import type { MetricValue } from "../probes/types.js";

export type ThresholdDirection = "above" | "below";

export type ChangeKind = "state-change" | "absolute" | "delta";

export interface Rule {
  metric: string;
  deltaThreshold?: number;
  absoluteThreshold?: number;
  direction: ThresholdDirection;
  triggerOnStateChange: boolean;
  cooldownSeconds: number;
}

export interface RuleState {
  metric: string;
  lastValue: MetricValue;
  lastTriggeredAt: number;
  // State-change cooldowns are tracked per state entered
  stateTriggeredAt: Map<string, number>;
}

export interface ChangeEvent {
  metric: string;
  kind: ChangeKind;
  oldValue: MetricValue;
  newValue: MetricValue;
  timestamp: number;
}
