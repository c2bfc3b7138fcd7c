import type { ProbesConfig } from "../config/loader.js";
import { AgentProcessProbe } from "./agent-process.js";
import { EngineProbe } from "./engine.js";
import { ResourceProbe } from "./resource.js";
import { StreamingProbe } from "./streaming.js";
import type { Probe } from "./types.js";

type ProbeFactories = {
  [K in keyof ProbesConfig]: (config: ProbesConfig[K]) => Probe;
};

/** The closed set of probe variants, keyed by their config section. */
export const PROBE_FACTORIES: ProbeFactories = {
  resource: (config) => new ResourceProbe(config),
  streaming: (config) => new StreamingProbe(config),
  agent: (config) => new AgentProcessProbe(config),
  engine: (config) => new EngineProbe(config),
};

// Fixed registration order; summaries and alerts follow it
export const PROBE_ORDER: ReadonlyArray<keyof ProbesConfig> = ["resource", "streaming", "agent", "engine"];

export function createProbes(config: ProbesConfig, factories: ProbeFactories = PROBE_FACTORIES): Probe[] {
  const probes: Probe[] = [];
  for (const name of PROBE_ORDER) {
    if (!config[name].enabled) continue;
    probes.push(createProbe(name, config, factories));
    console.log(`[Probes] Registered ${name} probe`);
  }
  return probes;
}

function createProbe<K extends keyof ProbesConfig>(
  name: K,
  config: ProbesConfig,
  factories: ProbeFactories
): Probe {
  return factories[name](config[name]);
}
