import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, utimes, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { AgentProcessProbe, countErrorLines } from "../../src/probes/agent-process.js";
import { defaultConfig, type AgentProbeConfig } from "../../src/config/loader.js";

describe("countErrorLines", () => {
  it("counts lines containing an error keyword, case-insensitively", () => {
    const log = ["started", "ERROR: boom", "request failed", "all good", "Fatal crash"].join("\n");
    expect(countErrorLines(log)).toBe(3);
  });

  it("only scans the last lines", () => {
    const log = ["error", "error", "fine", "fine"].join("\n");
    expect(countErrorLines(log, 2)).toBe(0);
  });
});

describe("AgentProcessProbe", () => {
  let dir: string;

  const config = (overrides: Partial<AgentProbeConfig> = {}): AgentProbeConfig => ({
    ...defaultConfig.probes.agent,
    enabled: true,
    logPath: dir,
    ...overrides,
  });

  const ageFile = async (path: string, seconds: number) => {
    const when = new Date(Date.now() - seconds * 1000);
    await utimes(path, when, when);
  };

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "vigil-agent-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("reports log age and recent errors from the configured log", async () => {
    const logFile = join(dir, "agent.log");
    await writeFile(logFile, "booting\nERROR one\nfatal crash\n");
    await ageFile(logFile, 150);

    const probe = new AgentProcessProbe(config());
    const snapshot = await probe.status();

    expect(snapshot.metrics.process_running).toBe(true);
    expect(snapshot.metrics.error_count_recent).toBe(2);
    expect(snapshot.metrics.last_log_age_sec).toBeGreaterThanOrEqual(149);
    expect(snapshot.metrics.last_log_age_sec).toBeLessThan(170);
    expect(probe.summaryLine(snapshot)).toBe("Agent: last output 2m ago, 2 recent errors");
    expect(probe.alerts(snapshot)).toEqual([]);
  });

  it("falls back to the newest log file in the directory", async () => {
    await writeFile(join(dir, "old.log"), "error\nerror\n");
    await ageFile(join(dir, "old.log"), 1000);
    await writeFile(join(dir, "new.log"), "fine\n");

    const snapshot = await new AgentProcessProbe(config({ logFile: "missing.log" })).status();

    expect(snapshot.metrics.error_count_recent).toBe(0);
    expect(snapshot.metrics.last_log_age_sec).toBeLessThan(10);
  });

  it("alerts on a stopped process, stale logs and error bursts", async () => {
    const logFile = join(dir, "agent.log");
    await writeFile(logFile, "error\n".repeat(12));
    await ageFile(logFile, 600);

    const probe = new AgentProcessProbe(config({ processName: "content-agent" }), async () => false);
    const snapshot = await probe.status();
    const alerts = probe.alerts(snapshot);

    expect(alerts.map((a) => a.metric)).toEqual(["process_running", "last_log_age_sec", "error_count_recent"]);
    expect(alerts[0]).toEqual({
      metric: "process_running",
      severity: "critical",
      message: "Agent process 'content-agent' not running",
      source: "agent",
    });
    expect(alerts[1].message).toMatch(/^Agent logs stale \(60\d+s since last output\)$/);
    expect(alerts[2].message).toBe("Agent has 12 recent errors");
    expect(probe.summaryLine(snapshot)).toMatch(/^Agent: STOPPED, last output 10m ago, 12 recent errors$/);
  });

  it("reports no data when there is no log and no process to watch", async () => {
    const probe = new AgentProcessProbe(config({ logPath: join(dir, "absent") }));
    const snapshot = await probe.status();

    expect(snapshot.metrics).toEqual({ process_running: true, error_count_recent: 0 });
    expect(probe.summaryLine(snapshot)).toBe("Agent: No data");
  });
});
