import { readdir, readFile, stat } from "fs/promises";
import { join } from "path";
import si from "systeminformation";
import type { AgentProbeConfig } from "../config/loader.js";
import {
  booleanMetric,
  createSnapshot,
  numberMetric,
  type MetricValue,
  type Probe,
  type ProbeAlert,
  type Snapshot,
} from "./types.js";

const ERROR_KEYWORDS = ["error", "exception", "failed", "crash", "fatal"];
const SCANNED_LINES = 1000;

export type ProcessChecker = (processName: string) => Promise<boolean>;

export const isProcessRunning: ProcessChecker = async (processName) => {
  const { list } = await si.processes();
  const needle = processName.toLowerCase();
  return list.some(
    (p) => p.name.toLowerCase().includes(needle) || p.command.toLowerCase().includes(needle)
  );
};

export function countErrorLines(content: string, maxLines: number = SCANNED_LINES): number {
  const lines = content.split("\n").slice(-maxLines);
  let count = 0;
  for (const line of lines) {
    const lower = line.toLowerCase();
    if (ERROR_KEYWORDS.some((kw) => lower.includes(kw))) count++;
  }
  return count;
}

/** Watches the content agent: its process and the freshness and error rate of its log. */
export class AgentProcessProbe implements Probe {
  readonly id = "agent";
  private config: AgentProbeConfig;
  private checkProcess: ProcessChecker;

  constructor(config: AgentProbeConfig, checkProcess: ProcessChecker = isProcessRunning) {
    this.config = config;
    this.checkProcess = checkProcess;
  }

  /** Configured log file, or the most recently written *.log in the directory. */
  private async findLogFile(): Promise<string | null> {
    const configured = join(this.config.logPath, this.config.logFile);
    try {
      await stat(configured);
      return configured;
    } catch {
      // fall through to the newest *.log
    }

    let entries: string[];
    try {
      entries = await readdir(this.config.logPath);
    } catch {
      return null;
    }

    let newest: { path: string; mtime: number } | null = null;
    for (const name of entries.filter((e) => e.endsWith(".log"))) {
      const path = join(this.config.logPath, name);
      const info = await stat(path);
      if (!newest || info.mtimeMs > newest.mtime) {
        newest = { path, mtime: info.mtimeMs };
      }
    }
    return newest?.path ?? null;
  }

  async status(): Promise<Snapshot> {
    const now = Date.now();
    const metrics: Record<string, MetricValue> = {
      // No process name configured means there is nothing to check
      process_running: this.config.processName ? await this.checkProcess(this.config.processName) : true,
      error_count_recent: 0,
    };

    const logFile = await this.findLogFile();
    if (logFile) {
      const info = await stat(logFile);
      metrics.last_log_age_sec = Math.max(0, Math.floor((now - info.mtimeMs) / 1000));
      metrics.error_count_recent = countErrorLines(await readFile(logFile, "utf-8"));
    }

    return createSnapshot(this.id, metrics, now);
  }

  alerts(snapshot: Snapshot): ProbeAlert[] {
    const alerts: ProbeAlert[] = [];

    if (this.config.processName && booleanMetric(snapshot, "process_running") === false) {
      alerts.push({
        metric: "process_running",
        severity: "critical",
        message: `Agent process '${this.config.processName}' not running`,
        source: this.id,
      });
    }

    const logAge = numberMetric(snapshot, "last_log_age_sec");
    if (logAge !== undefined && logAge > this.config.alerts.maxLogAgeSec) {
      alerts.push({
        metric: "last_log_age_sec",
        severity: "warning",
        message: `Agent logs stale (${logAge}s since last output)`,
        source: this.id,
      });
    }

    const errors = numberMetric(snapshot, "error_count_recent") ?? 0;
    if (errors > this.config.alerts.maxErrors) {
      alerts.push({
        metric: "error_count_recent",
        severity: "warning",
        message: `Agent has ${errors} recent errors`,
        source: this.id,
      });
    }

    return alerts;
  }

  summaryLine(snapshot: Snapshot): string {
    const parts: string[] = [];

    if (this.config.processName) {
      parts.push(booleanMetric(snapshot, "process_running") ? "Running" : "STOPPED");
    }

    const logAge = numberMetric(snapshot, "last_log_age_sec");
    if (logAge !== undefined) {
      parts.push(logAge < 60 ? `last output ${logAge}s ago` : `last output ${Math.floor(logAge / 60)}m ago`);
    }

    const errors = numberMetric(snapshot, "error_count_recent") ?? 0;
    if (errors > 0) {
      parts.push(`${errors} recent errors`);
    }

    return parts.length > 0 ? `Agent: ${parts.join(", ")}` : "Agent: No data";
  }
}
