import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { fileURLToPath } from "url";
import {
  applyEnvOverrides,
  defaultConfig,
  loadConfig,
  mergeConfig,
  validateConfig,
} from "../../src/config/loader.js";
import { ConfigError } from "../../src/errors.js";

function problemsOf(fn: () => unknown): string[] {
  try {
    fn();
  } catch (error) {
    if (error instanceof ConfigError) return error.problems;
    throw error;
  }
  throw new Error("expected a ConfigError");
}

const withChat = mergeConfig(defaultConfig, {
  transport: { enabled: true, account: "+10000000000", allowedGroups: ["group-a"] },
});

describe("mergeConfig", () => {
  it("merges nested sections over the defaults", () => {
    const config = mergeConfig(defaultConfig, {
      health: { pollInterval: 5 },
      probes: { resource: { alerts: { cpuPctMax: 80 } } },
      agent: { actor: { model: "sonnet" } },
      lifecycle: { watchdog: { maxAttempts: 2 } },
    });

    expect(config.health).toEqual({ pollInterval: 5, probeTimeoutMs: 10000 });
    expect(config.probes.resource.alerts.cpuPctMax).toBe(80);
    expect(config.probes.resource.alerts.memoryPctMax).toBe(90);
    expect(config.agent.actor.model).toBe("sonnet");
    expect(config.agent.actor.maxTurns).toBe(25);
    expect(config.agent.observer.model).toBe("haiku");
    expect(config.lifecycle.watchdog).toEqual({ ...defaultConfig.lifecycle.watchdog, maxAttempts: 2 });
  });

  it("merges rules per metric and drops the ones set to null", () => {
    const config = mergeConfig(defaultConfig, {
      rules: {
        cpu_percent: { absoluteThreshold: 80 },
        gpu_temp: null,
        viewer_count: { deltaThreshold: 50, cooldownSeconds: 60 },
      },
    });

    expect(config.rules.cpu_percent).toEqual({ deltaThreshold: 25, absoluteThreshold: 80 });
    expect(config.rules).not.toHaveProperty("gpu_temp");
    expect(config.rules.viewer_count).toEqual({ deltaThreshold: 50, cooldownSeconds: 60 });
    expect(defaultConfig.rules).toHaveProperty("gpu_temp");
  });
});

describe("applyEnvOverrides", () => {
  it("takes secrets from the environment", () => {
    const config = applyEnvOverrides(defaultConfig, {
      SIGNAL_ACCOUNT: "+10000000000",
      DISCORD_WEBHOOK_URL: "https://discord.example/webhook",
      OBS_PASSWORD: "test-secret",
    });

    expect(config.transport.account).toBe("+10000000000");
    expect(config.discord.webhookUrl).toBe("https://discord.example/webhook");
    expect(config.probes.streaming.password).toBe("test-secret");
    expect(config.agent.command).toBe("claude");
    expect(defaultConfig.transport.account).toBe("");
  });
});

describe("validateConfig", () => {
  it("accepts the defaults, with and without chat", () => {
    expect(() => validateConfig(defaultConfig)).not.toThrow();
    expect(() => validateConfig(withChat)).not.toThrow();
  });

  it("requires an account and groups while the transport is enabled", () => {
    expect(problemsOf(() => validateConfig(mergeConfig(defaultConfig, { transport: { enabled: true } })))).toEqual([
      "transport.account (or SIGNAL_ACCOUNT) is required when the transport is enabled",
      "transport.allowedGroups must list at least one group id",
    ]);
  });

  it("collects every problem", () => {
    const config = mergeConfig(withChat, {
      health: { pollInterval: 0 },
      agent: { observer: { maxTurns: 0 } },
      escalation: { marker: "  " },
      rules: { idle: {}, load: { deltaThreshold: 1, cooldownSeconds: -5 } },
    });

    expect(problemsOf(() => validateConfig(config))).toEqual([
      "health.pollInterval must be greater than 0",
      "agent.observer.maxTurns must be a positive integer",
      "rules.idle needs deltaThreshold, absoluteThreshold or triggerOnStateChange",
      "rules.load.cooldownSeconds must be non-negative",
      "escalation.marker must not be empty",
    ]);
  });
});

describe("loadConfig", () => {
  let dir: string;

  beforeEach(async () => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.stubEnv("SIGNAL_ACCOUNT", "");
    vi.stubEnv("DISCORD_WEBHOOK_URL", "");
    dir = await mkdtemp(join(tmpdir(), "vigil-config-"));
  });

  afterEach(async () => {
    vi.unstubAllEnvs();
    await rm(dir, { recursive: true, force: true });
  });

  const writeConfig = async (yaml: string): Promise<string> => {
    const path = join(dir, "config.yaml");
    await writeFile(path, yaml);
    return path;
  };

  it("reads YAML over the defaults", async () => {
    const path = await writeConfig(`
health:
  pollInterval: 5
transport:
  account: "+10000000000"
  allowedGroups: [group-a]
rules:
  gpu_temp: null
  cpu_percent:
    absoluteThreshold: 80
`);

    const config = loadConfig(path);

    expect(config.health.pollInterval).toBe(5);
    expect(config.transport.allowedGroups).toEqual(["group-a"]);
    expect(config.transport.triggerToken).toBe("vigil");
    expect(config.rules.cpu_percent).toEqual({ deltaThreshold: 25, absoluteThreshold: 80 });
    expect(config.rules).not.toHaveProperty("gpu_temp");
    expect(console.log).toHaveBeenCalledWith(`Loaded configuration from ${path}`);
  });

  it("applies environment overrides before validating", async () => {
    vi.stubEnv("SIGNAL_ACCOUNT", "+10000000001");
    const path = await writeConfig("transport:\n  allowedGroups: [group-a]\n");
    expect(loadConfig(path).transport.account).toBe("+10000000001");
  });

  it("loads the shipped config without any chat settings", () => {
    const config = loadConfig(fileURLToPath(new URL("../../config/default.yaml", import.meta.url)));
    expect(config.transport.enabled).toBe(false);
    expect(config.escalation.autoRecoveryOnStartup).toBe(false);
    expect(config.memory.compressHistory).toBe(false);
  });

  it("rejects a missing file it was pointed at", () => {
    const path = join(dir, "missing.yaml");
    expect(problemsOf(() => loadConfig(path))).toEqual([`Config file not found: ${path}`]);
  });

  it("rejects YAML that is not a mapping", async () => {
    const path = await writeConfig("- one\n- two\n");
    expect(problemsOf(() => loadConfig(path))).toEqual([`${path}: top level must be a mapping`]);
  });

  it("reports unparsable YAML with its path", async () => {
    const path = await writeConfig("health: [unclosed\n");
    const [problem] = problemsOf(() => loadConfig(path));
    expect(problem.startsWith(`${path}: `)).toBe(true);
  });

  it("rejects an unknown rule direction", async () => {
    const path = await writeConfig(`
transport:
  enabled: false
rules:
  cpu_percent:
    direction: sideways
`);
    expect(problemsOf(() => loadConfig(path))).toEqual(['rules.cpu_percent.direction must be "above" or "below"']);
  });
});
