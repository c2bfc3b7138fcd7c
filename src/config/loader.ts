import { readFileSync, existsSync } from "fs";
import { resolve } from "path";
import yaml from "js-yaml";
import { ConfigError, errorMessage } from "../errors.js";

export interface HealthConfig {
  pollInterval: number;
  probeTimeoutMs: number;
}

export interface ResourceProbeConfig {
  enabled: boolean;
  diskMount: string;
  alerts: {
    cpuPctMax: number;
    memoryPctMax: number;
    diskPctMax: number;
    gpuTempMax: number;
    gpuUtilMax: number;
  };
}

export interface StreamingProbeConfig {
  enabled: boolean;
  host: string;
  port: number;
  password: string;
  requestTimeoutMs: number;
  alerts: {
    droppedFramesPct: number;
  };
}

export interface AgentProbeConfig {
  enabled: boolean;
  processName: string;
  logPath: string;
  logFile: string;
  alerts: {
    maxLogAgeSec: number;
    maxErrors: number;
  };
}

export interface EngineProbeConfig {
  enabled: boolean;
  host: string;
  port: number;
}

export interface ProbesConfig {
  resource: ResourceProbeConfig;
  streaming: StreamingProbeConfig;
  agent: AgentProbeConfig;
  engine: EngineProbeConfig;
}

export type RuleConfig = {
  deltaThreshold?: number;
  absoluteThreshold?: number;
  direction?: "above" | "below";
  triggerOnStateChange?: boolean;
  cooldownSeconds?: number;
};

export interface MonitoringConfig {
  enabled: boolean;
  deepCheckInterval: number;
  startupGracePeriod: number;
  defaultCooldownSeconds: number;
}

export interface MemoryConfig {
  directory: string;
  retentionHours: number;
  maxRecentEvents: number;
  maxRenderChars: number;
  /** Ask the actor to fold recent events into the history summary on each deep check. */
  compressHistory: boolean;
}

export interface TierConfig {
  model: string;
  allowedTools: string[];
  timeoutMs: number;
  maxTurns: number;
}

export interface AgentConfig {
  command: string;
  args: string[];
  workingDirectory: string;
  killGraceMs: number;
  observer: TierConfig;
  actor: TierConfig;
}

export interface EscalationConfig {
  marker: string;
  directActorToken: string;
  verifyAfterAction: boolean;
  analyzeCrashOnRecovery: boolean;
  autoRecoveryOnStartup: boolean;
}

export interface TransportConfig {
  enabled: boolean;
  signalCliPath: string;
  account: string;
  allowedGroups: string[];
  triggerToken: string;
  receiveInterval: number;
  receiveTimeoutMs: number;
  sendRetries: number;
  contextBufferSize: number;
  failureThreshold: number;
}

export interface DiscordConfig {
  enabled: boolean;
  webhookUrl: string;
  mirrorObserver: boolean;
}

export interface DashboardConfig {
  enabled: boolean;
  port: number;
}

export interface MaintenanceConfig {
  tempCleanupInterval: number;
  tempDirectory: string;
  tempMaxAgeHours: number;
}

export interface WatchdogConfig {
  baseDelayMs: number;
  maxDelayMs: number;
  maxAttempts: number;
  windowMs: number;
}

export interface LifecycleConfig {
  startupNotification: boolean;
  shutdownGraceMs: number;
  // Written by the watchdog; its tail goes into the crash analysis prompt
  logFile: string;
  watchdog: WatchdogConfig;
}

export interface Config {
  health: HealthConfig;
  probes: ProbesConfig;
  rules: Record<string, RuleConfig>;
  monitoring: MonitoringConfig;
  memory: MemoryConfig;
  agent: AgentConfig;
  escalation: EscalationConfig;
  transport: TransportConfig;
  discord: DiscordConfig;
  dashboard: DashboardConfig;
  maintenance: MaintenanceConfig;
  lifecycle: LifecycleConfig;
}

const READ_ONLY_TOOLS = ["Read", "Glob", "Grep"];
const FULL_TOOLS = ["Read", "Edit", "Write", "Bash", "Glob", "Grep"];

export const defaultConfig: Config = {
  health: {
    pollInterval: 10,
    probeTimeoutMs: 10000,
  },
  probes: {
    resource: {
      enabled: true,
      diskMount: "/",
      alerts: {
        cpuPctMax: 95,
        memoryPctMax: 90,
        diskPctMax: 85,
        gpuTempMax: 80,
        gpuUtilMax: 95,
      },
    },
    streaming: {
      enabled: false,
      host: "localhost",
      port: 4455,
      password: "",
      requestTimeoutMs: 5000,
      alerts: {
        droppedFramesPct: 1,
      },
    },
    agent: {
      enabled: false,
      processName: "",
      logPath: "./agent/logs",
      logFile: "agent.log",
      alerts: {
        maxLogAgeSec: 300,
        maxErrors: 10,
      },
    },
    engine: {
      enabled: false,
      host: "localhost",
      port: 9000,
    },
  },
  rules: {
    cpu_percent: { deltaThreshold: 25, absoluteThreshold: 90 },
    memory_percent: { deltaThreshold: 20, absoluteThreshold: 90 },
    disk_percent: { deltaThreshold: 10, absoluteThreshold: 85 },
    gpu_temp: { deltaThreshold: 10, absoluteThreshold: 80 },
    gpu_utilization: { deltaThreshold: 30, absoluteThreshold: 95 },
    streaming: { triggerOnStateChange: true },
    dropped_pct: { deltaThreshold: 0.5, absoluteThreshold: 1 },
    process_running: { triggerOnStateChange: true },
    last_log_age_sec: { absoluteThreshold: 300 },
    error_count_recent: { deltaThreshold: 5, absoluteThreshold: 10 },
  },
  monitoring: {
    enabled: true,
    deepCheckInterval: 1800,
    startupGracePeriod: 300,
    defaultCooldownSeconds: 300,
  },
  memory: {
    directory: "./data",
    retentionHours: 6,
    maxRecentEvents: 20,
    maxRenderChars: 6000,
    compressHistory: false,
  },
  agent: {
    command: "claude",
    args: [],
    workingDirectory: ".",
    killGraceMs: 5000,
    observer: {
      model: "haiku",
      allowedTools: READ_ONLY_TOOLS,
      timeoutMs: 60000,
      maxTurns: 5,
    },
    actor: {
      model: "opus",
      allowedTools: FULL_TOOLS,
      timeoutMs: 300000,
      maxTurns: 25,
    },
  },
  escalation: {
    marker: "ESCALATE:",
    directActorToken: "!act",
    verifyAfterAction: false,
    analyzeCrashOnRecovery: true,
    autoRecoveryOnStartup: false,
  },
  transport: {
    enabled: false,
    signalCliPath: "signal-cli",
    account: "",
    allowedGroups: [],
    triggerToken: "vigil",
    receiveInterval: 2,
    receiveTimeoutMs: 15000,
    sendRetries: 3,
    contextBufferSize: 30,
    failureThreshold: 10,
  },
  discord: {
    enabled: false,
    webhookUrl: "",
    mirrorObserver: true,
  },
  dashboard: {
    enabled: false,
    port: 3000,
  },
  maintenance: {
    tempCleanupInterval: 0,
    tempDirectory: "./tmp",
    tempMaxAgeHours: 24,
  },
  lifecycle: {
    startupNotification: true,
    shutdownGraceMs: 5000,
    logFile: "./logs/vigil.log",
    watchdog: {
      baseDelayMs: 1000,
      maxDelayMs: 60000,
      maxAttempts: 5,
      windowMs: 600000,
    },
  },
};

type DeepPartial<T> = {
  [K in keyof T]?: T[K] extends unknown[] ? T[K] : T[K] extends object ? DeepPartial<T[K]> : T[K];
};

export type PartialConfig = Omit<DeepPartial<Config>, "rules"> & {
  rules?: Record<string, RuleConfig | null>;
};

export function loadConfig(configPath?: string): Config {
  const paths = configPath
    ? [configPath]
    : [
        resolve(process.cwd(), "config/default.yaml"),
        resolve(process.cwd(), "config.yaml"),
        resolve(process.cwd(), "config/config.yaml"),
      ];

  let config = defaultConfig;
  let loadedFrom: string | null = null;

  for (const path of paths) {
    if (!existsSync(path)) continue;

    let loaded: unknown;
    try {
      loaded = yaml.load(readFileSync(path, "utf-8"));
    } catch (error) {
      throw new ConfigError([`${path}: ${errorMessage(error)}`]);
    }

    if (loaded !== undefined && loaded !== null && !isRecord(loaded)) {
      throw new ConfigError([`${path}: top level must be a mapping`]);
    }

    // Shape is checked field by field in validateConfig once merged
    config = mergeConfig(defaultConfig, (loaded ?? {}) as PartialConfig);
    loadedFrom = path;
    break;
  }

  if (configPath && !loadedFrom) {
    throw new ConfigError([`Config file not found: ${configPath}`]);
  }

  console.log(loadedFrom ? `Loaded configuration from ${loadedFrom}` : "Using default configuration");

  config = applyEnvOverrides(config, process.env);
  validateConfig(config);
  return config;
}

export function mergeConfig(defaults: Config, loaded: PartialConfig): Config {
  const probes: DeepPartial<ProbesConfig> = loaded.probes ?? {};
  const agent: DeepPartial<AgentConfig> = loaded.agent ?? {};

  return {
    health: { ...defaults.health, ...loaded.health },
    probes: {
      resource: {
        ...defaults.probes.resource,
        ...probes.resource,
        alerts: { ...defaults.probes.resource.alerts, ...probes.resource?.alerts },
      },
      streaming: {
        ...defaults.probes.streaming,
        ...probes.streaming,
        alerts: { ...defaults.probes.streaming.alerts, ...probes.streaming?.alerts },
      },
      agent: {
        ...defaults.probes.agent,
        ...probes.agent,
        alerts: { ...defaults.probes.agent.alerts, ...probes.agent?.alerts },
      },
      engine: { ...defaults.probes.engine, ...probes.engine },
    },
    // Rule overrides merge per metric so a config can tune one field of a default rule
    rules: mergeRules(defaults.rules, loaded.rules ?? {}),
    monitoring: { ...defaults.monitoring, ...loaded.monitoring },
    memory: { ...defaults.memory, ...loaded.memory },
    agent: {
      ...defaults.agent,
      ...agent,
      observer: { ...defaults.agent.observer, ...agent.observer },
      actor: { ...defaults.agent.actor, ...agent.actor },
    },
    escalation: { ...defaults.escalation, ...loaded.escalation },
    transport: { ...defaults.transport, ...loaded.transport },
    discord: { ...defaults.discord, ...loaded.discord },
    dashboard: { ...defaults.dashboard, ...loaded.dashboard },
    maintenance: { ...defaults.maintenance, ...loaded.maintenance },
    lifecycle: {
      ...defaults.lifecycle,
      ...loaded.lifecycle,
      watchdog: { ...defaults.lifecycle.watchdog, ...loaded.lifecycle?.watchdog },
    },
  };
}

function mergeRules(
  defaults: Record<string, RuleConfig>,
  loaded: Record<string, RuleConfig | null>
): Record<string, RuleConfig> {
  const merged: Record<string, RuleConfig> = { ...defaults };
  for (const [metric, rule] of Object.entries(loaded)) {
    if (rule === null) {
      // `metric: null` in YAML removes a default rule
      delete merged[metric];
      continue;
    }
    merged[metric] = { ...defaults[metric], ...rule };
  }
  return merged;
}

export function applyEnvOverrides(config: Config, env: NodeJS.ProcessEnv): Config {
  return {
    ...config,
    transport: {
      ...config.transport,
      account: env.SIGNAL_ACCOUNT || config.transport.account,
    },
    discord: {
      ...config.discord,
      webhookUrl: env.DISCORD_WEBHOOK_URL || config.discord.webhookUrl,
    },
    probes: {
      ...config.probes,
      streaming: {
        ...config.probes.streaming,
        password: env.OBS_PASSWORD || config.probes.streaming.password,
      },
    },
    agent: {
      ...config.agent,
      command: env.AGENT_COMMAND || config.agent.command,
    },
  };
}

export function validateConfig(config: Config): void {
  const problems: string[] = [];

  const nonNegative: Array<[string, number]> = [
    ["health.pollInterval", config.health.pollInterval],
    ["health.probeTimeoutMs", config.health.probeTimeoutMs],
    ["monitoring.deepCheckInterval", config.monitoring.deepCheckInterval],
    ["monitoring.startupGracePeriod", config.monitoring.startupGracePeriod],
    ["monitoring.defaultCooldownSeconds", config.monitoring.defaultCooldownSeconds],
    ["memory.retentionHours", config.memory.retentionHours],
    ["maintenance.tempCleanupInterval", config.maintenance.tempCleanupInterval],
    ["agent.observer.timeoutMs", config.agent.observer.timeoutMs],
    ["agent.actor.timeoutMs", config.agent.actor.timeoutMs],
    ["lifecycle.shutdownGraceMs", config.lifecycle.shutdownGraceMs],
    ["lifecycle.watchdog.baseDelayMs", config.lifecycle.watchdog.baseDelayMs],
    ["lifecycle.watchdog.maxDelayMs", config.lifecycle.watchdog.maxDelayMs],
    ["lifecycle.watchdog.windowMs", config.lifecycle.watchdog.windowMs],
  ];
  for (const [name, value] of nonNegative) {
    if (typeof value !== "number" || !Number.isFinite(value) || value < 0) {
      problems.push(`${name} must be a non-negative number`);
    }
  }

  if (config.health.pollInterval === 0) {
    problems.push("health.pollInterval must be greater than 0");
  }

  for (const tier of ["observer", "actor"] as const) {
    const maxTurns = config.agent[tier].maxTurns;
    if (!Number.isInteger(maxTurns) || maxTurns < 1) {
      problems.push(`agent.${tier}.maxTurns must be a positive integer`);
    }
  }

  for (const [metric, rule] of Object.entries(config.rules)) {
    if (!isRecord(rule)) {
      problems.push(`rules.${metric} must be a mapping`);
      continue;
    }
    const hasTrigger =
      (rule.deltaThreshold ?? 0) > 0 ||
      rule.absoluteThreshold !== undefined ||
      rule.triggerOnStateChange === true;
    if (!hasTrigger) {
      problems.push(`rules.${metric} needs deltaThreshold, absoluteThreshold or triggerOnStateChange`);
    }
    if (rule.cooldownSeconds !== undefined && rule.cooldownSeconds < 0) {
      problems.push(`rules.${metric}.cooldownSeconds must be non-negative`);
    }
    if (rule.direction !== undefined && rule.direction !== "above" && rule.direction !== "below") {
      problems.push(`rules.${metric}.direction must be "above" or "below"`);
    }
  }

  if (!config.escalation.marker.trim()) {
    problems.push("escalation.marker must not be empty");
  }

  if (config.transport.enabled) {
    if (!config.transport.account) {
      problems.push("transport.account (or SIGNAL_ACCOUNT) is required when the transport is enabled");
    }
    if (config.transport.allowedGroups.length === 0) {
      problems.push("transport.allowedGroups must list at least one group id");
    }
  }

  if (problems.length > 0) {
    throw new ConfigError(problems);
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
