import type { AgentInvoker, InvokeRequest, InvokeResult } from "../src/agent/runner.js";
import type { AggregatedStatus } from "../src/health/aggregator.js";
import { createSnapshot, unavailableSnapshot, type MetricValue, type ProbeAlert } from "../src/probes/types.js";
import { defaultConfig, mergeConfig, type Config, type PartialConfig } from "../src/config/loader.js";

/** Builds an aggregated status from `{ probeId: metrics }`; a string entry marks the probe unavailable. */
export function statusOf(
  probes: Record<string, Record<string, MetricValue> | string>,
  timestamp: number = 0,
  alerts: ProbeAlert[] = []
): AggregatedStatus {
  const snapshots: AggregatedStatus["snapshots"] = {};
  for (const [id, metrics] of Object.entries(probes)) {
    snapshots[id] =
      typeof metrics === "string" ? unavailableSnapshot(id, metrics, timestamp) : createSnapshot(id, metrics, timestamp);
  }
  return { timestamp, snapshots, alerts };
}

export function testConfig(overrides: PartialConfig = {}): Config {
  return mergeConfig(defaultConfig, overrides);
}

export type Reply = string | Error | ((request: InvokeRequest) => Promise<InvokeResult>);

/** Answers each call with the next scripted reply for its tier. */
export class ScriptedInvoker implements AgentInvoker {
  calls: InvokeRequest[] = [];
  private script: Record<string, Reply[]> = { observer: [], actor: [] };

  reply(tier: "observer" | "actor", ...replies: Reply[]): this {
    this.script[tier].push(...replies);
    return this;
  }

  tiers(): string[] {
    return this.calls.map((c) => c.tier);
  }

  async invoke(request: InvokeRequest): Promise<InvokeResult> {
    this.calls.push(request);
    const next = this.script[request.tier].shift();
    if (next === undefined) throw new Error(`unexpected ${request.tier} call`);
    if (next instanceof Error) throw next;
    if (typeof next === "function") return next(request);
    return { tier: request.tier, text: next, sessionId: `${request.tier}-session` };
  }
}
