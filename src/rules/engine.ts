import type { RuleConfig } from "../config/loader.js";
import type { AggregatedStatus } from "../health/aggregator.js";
import type { MetricValue } from "../probes/types.js";
import type { ChangeEvent, ChangeKind, Rule, RuleState } from "./types.js";

/**
 * Flattens an aggregated status into `probe.metric` keys, a `probe.available`
 * key per probe, and the bare metric name when only one probe reports it.
 */
export function flattenStatus(status: AggregatedStatus): Record<string, MetricValue> {
  const flat: Record<string, MetricValue> = {};
  const bare = new Map<string, MetricValue[]>();

  for (const snapshot of Object.values(status.snapshots)) {
    flat[`${snapshot.probe}.available`] = snapshot.available;
    for (const [name, value] of Object.entries(snapshot.metrics)) {
      flat[`${snapshot.probe}.${name}`] = value;
      const seen = bare.get(name) ?? [];
      seen.push(value);
      bare.set(name, seen);
    }
  }

  for (const [name, values] of bare) {
    if (values.length === 1 && !(name in flat)) {
      flat[name] = values[0];
    }
  }

  return flat;
}

export function formatValue(value: MetricValue): string {
  return typeof value === "number" ? String(Math.round(value * 100) / 100) : String(value);
}

/** Human-readable summary of events, for prompts and the ops log. */
export function describeEvents(events: ChangeEvent[]): string {
  if (events.length === 0) return "No specific changes detected.";

  const lines = ["Detected changes:"];
  for (const event of events) {
    lines.push(`  - ${describeEvent(event)}`);
  }
  return lines.join("\n");
}

export function describeEvent(event: ChangeEvent): string {
  return `${event.metric}: ${formatValue(event.oldValue)} -> ${formatValue(event.newValue)} (${event.kind})`;
}

function isStateLike(value: MetricValue): value is boolean | string {
  return typeof value === "boolean" || typeof value === "string";
}

/**
 * Decides which metric changes are worth escalating. Probes flag values that
 * are bad right now; this engine flags values that are new: a state flip, a
 * threshold crossing, or a large jump, each held back by a cooldown.
 */
export class ChangeDetectionEngine {
  private rules: Map<string, Rule> = new Map();
  private states: Map<string, RuleState> = new Map();

  constructor(rules?: Record<string, RuleConfig>, defaultCooldownSeconds: number = 300) {
    if (rules) {
      this.loadRules(rules, defaultCooldownSeconds);
    }
  }

  loadRules(config: Record<string, RuleConfig>, defaultCooldownSeconds: number = 300): void {
    this.rules.clear();
    this.states.clear();

    for (const [metric, rule] of Object.entries(config)) {
      this.addRule({
        metric,
        deltaThreshold: rule.deltaThreshold,
        absoluteThreshold: rule.absoluteThreshold,
        direction: rule.direction ?? "above",
        triggerOnStateChange: rule.triggerOnStateChange ?? false,
        cooldownSeconds: rule.cooldownSeconds ?? defaultCooldownSeconds,
      });
    }

    console.log(`[Rules] Loaded ${this.rules.size} change-detection rules`);
  }

  addRule(rule: Rule): void {
    if (this.rules.has(rule.metric)) {
      console.warn(`[Rules] Replacing existing rule for ${rule.metric}`);
      this.states.delete(rule.metric);
    }
    this.rules.set(rule.metric, Object.freeze({ ...rule }));
  }

  getRules(): Rule[] {
    return [...this.rules.values()];
  }

  getState(metric: string): Readonly<RuleState> | undefined {
    return this.states.get(metric);
  }

  reset(): void {
    this.states.clear();
  }

  /**
   * Compares `current` against the last value seen for each rule's metric.
   * Passing `previous = null` starts a fresh baseline: every metric is treated
   * as observed for the first time and nothing fires.
   */
  evaluate(previous: AggregatedStatus | null, current: AggregatedStatus, now: number = Date.now()): ChangeEvent[] {
    const values = flattenStatus(current);
    const events: ChangeEvent[] = [];

    if (previous === null) {
      this.states.clear();
    }

    for (const rule of this.rules.values()) {
      if (!(rule.metric in values)) continue;
      const value = values[rule.metric];

      const state = this.states.get(rule.metric);
      if (!state) {
        this.states.set(rule.metric, {
          metric: rule.metric,
          lastValue: value,
          lastTriggeredAt: -Infinity,
          stateTriggeredAt: new Map(),
        });
        continue;
      }

      const kind = this.firingKind(rule, state.lastValue, value);
      if (kind && !this.inCooldown(rule, state, kind, value, now)) {
        events.push({
          metric: rule.metric,
          kind,
          oldValue: state.lastValue,
          newValue: value,
          timestamp: now,
        });
        state.lastTriggeredAt = now;
        if (kind === "state-change") {
          state.stateTriggeredAt.set(String(value), now);
        }
      }

      state.lastValue = value;
    }

    return events;
  }

  private firingKind(rule: Rule, last: MetricValue, value: MetricValue): ChangeKind | null {
    if (rule.triggerOnStateChange && isStateLike(value) && value !== last) {
      return "state-change";
    }

    if (typeof value !== "number") return null;

    const threshold = rule.absoluteThreshold;
    if (threshold !== undefined) {
      const beyond = (v: MetricValue) =>
        typeof v === "number" && (rule.direction === "below" ? v < threshold : v > threshold);
      if (beyond(value) && !beyond(last)) {
        return "absolute";
      }
    }

    if (rule.deltaThreshold !== undefined && rule.deltaThreshold > 0 && typeof last === "number") {
      if (Math.abs(value - last) >= rule.deltaThreshold) {
        return "delta";
      }
    }

    return null;
  }

  private inCooldown(rule: Rule, state: RuleState, kind: ChangeKind, value: MetricValue, now: number): boolean {
    const cooldownMs = rule.cooldownSeconds * 1000;
    const since =
      kind === "state-change" ? state.stateTriggeredAt.get(String(value)) ?? -Infinity : state.lastTriggeredAt;
    return now - since < cooldownMs;
  }
}
