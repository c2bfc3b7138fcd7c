#!/usr/bin/env node
import "dotenv/config";
import { spawn } from "child_process";
import { createWriteStream, mkdirSync } from "fs";
import { dirname, resolve } from "path";
import { fileURLToPath, pathToFileURL } from "url";
import { loadConfig, type WatchdogConfig } from "../config/loader.js";
import { errorMessage } from "../errors.js";
import { sleep } from "../utils/timeout.js";

export interface ChildExit {
  code: number | null;
  signal: NodeJS.Signals | null;
}

export type RestartDecision = { action: "stop"; reason: string } | { action: "restart"; delayMs: number };

/** Backoff before the restart following `failures` recent failures (1-based). */
export function nextDelay(policy: WatchdogConfig, failures: number): number {
  const exponent = Math.max(0, failures - 1);
  return Math.min(policy.baseDelayMs * 2 ** exponent, policy.maxDelayMs);
}

/** Tracks child failures inside a sliding window and decides what to do next. */
export class RestartPolicy {
  private policy: WatchdogConfig;
  private failures: number[] = [];

  constructor(policy: WatchdogConfig) {
    this.policy = policy;
  }

  recentFailures(now: number): number {
    this.prune(now);
    return this.failures.length;
  }

  decide(exit: ChildExit, now: number = Date.now()): RestartDecision {
    if (exit.code === 0) {
      return { action: "stop", reason: "clean exit" };
    }

    this.failures.push(now);
    this.prune(now);

    if (this.failures.length > this.policy.maxAttempts) {
      return {
        action: "stop",
        reason: `${this.failures.length} failures within ${Math.round(this.policy.windowMs / 1000)}s, manual intervention required`,
      };
    }
    return { action: "restart", delayMs: nextDelay(this.policy, this.failures.length) };
  }

  private prune(now: number): void {
    const cutoff = now - this.policy.windowMs;
    this.failures = this.failures.filter((at) => at > cutoff);
  }
}

export type ChildLauncher = (signal: AbortSignal) => Promise<ChildExit>;

export interface WatchdogOptions {
  policy: WatchdogConfig;
  launch: ChildLauncher;
  signal?: AbortSignal;
  now?: () => number;
  wait?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

/** Runs the child until it exits cleanly, the policy gives up, or `signal` aborts. */
export async function runWatchdog(options: WatchdogOptions): Promise<Extract<RestartDecision, { action: "stop" }>> {
  const { launch, signal, now = Date.now, wait = sleep } = options;
  const policy = new RestartPolicy(options.policy);

  for (;;) {
    let exit: ChildExit;
    try {
      exit = await launch(signal ?? new AbortController().signal);
    } catch (error) {
      console.error(`[Watchdog] Failed to start child: ${errorMessage(error)}`);
      exit = { code: null, signal: null };
    }

    if (signal?.aborted) {
      return { action: "stop", reason: "watchdog stopped" };
    }

    const decision = policy.decide(exit, now());
    if (decision.action === "stop") {
      if (exit.code === 0) {
        console.log("[Watchdog] Child exited cleanly");
      } else {
        console.error(`[Watchdog] Giving up: ${decision.reason}`);
      }
      return decision;
    }

    const how = exit.signal ? `signal ${exit.signal}` : `code ${exit.code ?? "unknown"}`;
    console.warn(`[Watchdog] Child exited with ${how}, restarting in ${decision.delayMs}ms`);
    await wait(decision.delayMs, signal);
    if (signal?.aborted) {
      return { action: "stop", reason: "watchdog stopped" };
    }
  }
}

/** Spawns `node <entry>` and copies its output to the console and the log file. */
export function nodeLauncher(entry: string, log: LogSink | null): ChildLauncher {
  return (signal) =>
    new Promise<ChildExit>((resolvePromise, reject) => {
      const child = spawn(process.execPath, [entry], {
        env: process.env,
        stdio: ["ignore", "pipe", "pipe"],
        // Own process group, so a terminal Ctrl+C reaches the child only through the watchdog
        detached: true,
      });

      const forward = (chunk: Buffer, target: NodeJS.WriteStream) => {
        target.write(chunk);
        log?.write(chunk);
      };
      child.stdout.on("data", (chunk: Buffer) => forward(chunk, process.stdout));
      child.stderr.on("data", (chunk: Buffer) => forward(chunk, process.stderr));

      const onAbort = () => child.kill("SIGTERM");
      signal.addEventListener("abort", onAbort, { once: true });

      child.on("error", (error) => {
        signal.removeEventListener("abort", onAbort);
        reject(error);
      });
      child.on("close", (code, exitSignal) => {
        signal.removeEventListener("abort", onAbort);
        resolvePromise({ code, signal: exitSignal });
      });
    });
}

export interface LogSink {
  write(chunk: Buffer | string): void;
  end(): void;
  readonly failed: boolean;
}

/** Appends to `path`; an unwritable file is reported once and teeing stops. */
export function openLog(path: string): LogSink | null {
  if (!path) return null;
  try {
    mkdirSync(dirname(path), { recursive: true });
  } catch (error) {
    console.warn(`[Watchdog] Cannot open log file ${path}: ${errorMessage(error)}`);
    return null;
  }

  const stream = createWriteStream(path, { flags: "a" });
  let failed = false;
  // Open and write errors arrive as events, not exceptions
  stream.on("error", (error) => {
    if (failed) return;
    failed = true;
    console.warn(`[Watchdog] Log file ${path} unusable, no longer writing it: ${errorMessage(error)}`);
  });

  return {
    write(chunk) {
      if (!failed) stream.write(chunk);
    },
    end() {
      if (!failed) stream.end();
    },
    get failed() {
      return failed;
    },
  };
}

async function main(): Promise<void> {
  const config = loadConfig(process.env.VIGIL_CONFIG);
  const entry = process.argv[2]
    ? resolve(process.argv[2])
    : resolve(dirname(fileURLToPath(import.meta.url)), "../index.js");
  const log = openLog(config.lifecycle.logFile);

  // Signals go to the child; the watchdog stops once it exits
  const controller = new AbortController();
  const onSignal = () => controller.abort();
  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);

  console.log(`[Watchdog] Supervising ${entry}`);
  const decision = await runWatchdog({
    policy: config.lifecycle.watchdog,
    launch: nodeLauncher(entry, log),
    signal: controller.signal,
  });

  log?.end();
  process.exitCode = decision.reason === "clean exit" || decision.reason === "watchdog stopped" ? 0 : 1;
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  main().catch((error) => {
    console.error("Fatal error:", error);
    process.exit(1);
  });
}
