import { EventEmitter } from "events";
import { readFile } from "fs/promises";
import type { EscalationDispatcher } from "../agent/dispatcher.js";
import type { OutboundMessage, PromptContext, Trigger } from "../agent/types.js";
import type { Config } from "../config/loader.js";
import { errorMessage } from "../errors.js";
import type { AggregatedStatus, HealthAggregator } from "../health/aggregator.js";
import { formatEventStamp, type OpsLog } from "../memory/ops-log.js";
import type { DiscordNotifier } from "../notifications/discord.js";
import { formatOutbound } from "../notifications/format.js";
import type { ProbeAlert } from "../probes/types.js";
import { describeEvent, type ChangeDetectionEngine } from "../rules/engine.js";
import type { ChangeEvent } from "../rules/types.js";
import type { TriggerFilter } from "../transport/filter.js";
import type { InboundMessage, Transport } from "../transport/types.js";
import { debugLog } from "../utils/debug.js";
import { sleep } from "../utils/timeout.js";
import type { RunMarker } from "./run-marker.js";
import { cleanupTempFiles } from "./temp-cleanup.js";

export const PRODUCT_NAME = "VIGIL";
export const SHUTDOWN_MESSAGE = `${PRODUCT_NAME} offline (clean shutdown)`;

const CRASH_LOG_LINES = 50;

export type SupervisorState = "starting" | "running" | "stopping" | "stopped";

export interface StartupReport {
  crashRecovered: boolean;
  message: string;
  status: AggregatedStatus;
}

export interface ProbeLine {
  ok: boolean;
  line: string;
}

export function formatStartupMessage(crashRecovered: boolean, probes: ProbeLine[], alerts: ProbeAlert[]): string {
  const lines = [crashRecovered ? `${PRODUCT_NAME} back online (crash recovery)` : `${PRODUCT_NAME} online`, ""];
  for (const probe of probes) {
    lines.push(`${probe.ok ? "✓" : "✗"} ${probe.line}`);
  }
  if (alerts.length > 0) {
    lines.push("", "🚨 Issues detected:");
    for (const alert of alerts) {
      lines.push(`  - ${alert.message}`);
    }
  }
  return lines.join("\n");
}

function shorten(text: string, max: number): string {
  const flat = text.replace(/\s+/g, " ").trim();
  return flat.length > max ? `${flat.slice(0, max)}...` : flat;
}

export interface SupervisorDeps {
  config: Config;
  aggregator: HealthAggregator;
  engine: ChangeDetectionEngine;
  opsLog: OpsLog;
  dispatcher: EscalationDispatcher;
  filter: TriggerFilter;
  runMarker: RunMarker;
  transport?: Transport | null;
  discord?: DiscordNotifier | null;
  now?: () => number;
}

/**
 * Owns the process lifecycle: startup and crash detection, the monitor and
 * message loops, and orderly shutdown.
 *
 * Emits "status", "events", "message", "state" and "stopped".
 */
export class LifecycleSupervisor extends EventEmitter {
  private deps: SupervisorDeps;
  private config: Config;
  private now: () => number;
  private state: SupervisorState = "starting";
  private crashRecovered = false;
  private startedAt = 0;
  private lastCheckAt = 0;
  private previous: AggregatedStatus | null = null;
  private ticking = false;
  private timers: Array<ReturnType<typeof setInterval>> = [];
  private abortController = new AbortController();
  private messageLoop: Promise<void> | null = null;
  private deliveries: Set<Promise<void>> = new Set();
  private stopPromise: Promise<void> | null = null;
  private stopReason = "";

  constructor(deps: SupervisorDeps) {
    super();
    this.deps = deps;
    this.config = deps.config;
    this.now = deps.now ?? Date.now;
  }

  getState(): SupervisorState {
    return this.state;
  }

  isCrashRecovery(): boolean {
    return this.crashRecovered;
  }

  getStopReason(): string {
    return this.stopReason;
  }

  private setState(state: SupervisorState): void {
    this.state = state;
    this.emit("state", state);
    console.log(`[Supervisor] ${state}`);
  }

  async start(): Promise<StartupReport> {
    const { aggregator, engine, opsLog, runMarker, dispatcher } = this.deps;

    // An unusable ops log is fatal; let it propagate
    await opsLog.ensureExists();

    // The marker must be read before this run creates its own
    this.crashRecovered = await runMarker.exists();
    if (this.crashRecovered) {
      console.warn("[Supervisor] Run marker found: previous instance did not shut down cleanly");
    }

    this.startedAt = this.now();
    this.lastCheckAt = this.startedAt;

    const status = await aggregator.poll(this.startedAt);
    await this.applyStatus(status);
    engine.evaluate(null, status, this.startedAt);
    this.previous = status;

    const probeLines: ProbeLine[] = [];
    for (const probe of aggregator.getProbes()) {
      const snapshot = status.snapshots[probe.id];
      if (!snapshot) continue;
      probeLines.push({
        ok: snapshot.available && !status.alerts.some((a) => a.source === probe.id),
        line: aggregator.probeLine(probe, snapshot),
      });
    }
    const message = formatStartupMessage(this.crashRecovered, probeLines, status.alerts);

    if (this.config.lifecycle.startupNotification) {
      await this.deliver(this.systemMessage(message, status.alerts.length > 0));
    }

    await this.record(
      this.crashRecovered
        ? "CRASH RECOVERY - restarted after unexpected shutdown"
        : `System startup - ${PRODUCT_NAME} online`
    );

    if (this.crashRecovered && this.config.escalation.analyzeCrashOnRecovery) {
      const analysis = await dispatcher.handle(
        { type: "crash-recovery", logTail: await this.readLogTail() },
        () => this.promptContext()
      );
      await this.record(`Crash analysis: ${shorten(analysis.text, 250)}`);
      if (!analysis.failed && !/unknown/i.test(analysis.text)) {
        await this.remember(`Crash on ${formatEventStamp(new Date(this.startedAt)).slice(0, 5)}: ${shorten(analysis.text, 150)}`);
      }
    }

    if (status.alerts.length > 0 && this.config.escalation.autoRecoveryOnStartup && !this.stopPromise) {
      await this.recoverFromStartupAlerts(status.alerts);
    }

    // A signal during startup already ran the shutdown sequence
    if (!this.stopPromise) {
      await runMarker.create();
      this.setState("running");
    }
    return { crashRecovered: this.crashRecovered, message, status };
  }

  private async recoverFromStartupAlerts(alerts: ProbeAlert[]): Promise<void> {
    console.log(`[Supervisor] Attempting auto-recovery for ${alerts.length} startup alert(s)`);
    const outcome = await this.deps.dispatcher.handle(
      { type: "startup-recovery", alerts: alerts.map((a) => a.message) },
      () => this.promptContext()
    );
    if (outcome.failed) {
      await this.record(outcome.text);
      return;
    }
    await this.record(`Auto-recovery attempted: ${shorten(outcome.text, 200)}`);
    await this.deliver({ ...outcome, text: `🔧 Auto-recovery:\n${outcome.text}` });
  }

  /** Starts the loops. Resolves once the supervisor has stopped. */
  async run(): Promise<void> {
    if (this.state !== "running") {
      throw new Error(`Cannot run from state ${this.state}`);
    }

    const stopped = new Promise<void>((resolve) => this.once("stopped", resolve));

    this.every(this.config.health.pollInterval, () => this.monitorTick());
    if (this.config.maintenance.tempCleanupInterval > 0) {
      this.every(this.config.maintenance.tempCleanupInterval, async () => {
        await cleanupTempFiles(this.config.maintenance.tempDirectory, this.config.maintenance.tempMaxAgeHours);
      });
    }

    const transport = this.deps.transport;
    if (transport) {
      this.messageLoop = this.receiveLoop(transport, this.abortController.signal);
    }

    console.log(`[Supervisor] Monitoring every ${this.config.health.pollInterval}s`);
    await stopped;
  }

  private every(seconds: number, task: () => Promise<unknown>): void {
    const timer = setInterval(() => {
      task().catch((error: unknown) => {
        console.error("[Supervisor] Scheduled task failed:", errorMessage(error));
      });
    }, seconds * 1000);
    this.timers.push(timer);
  }

  /** One poll/evaluate/dispatch cycle. */
  async monitorTick(): Promise<ChangeEvent[]> {
    if (this.ticking || this.state !== "running") return [];
    this.ticking = true;

    try {
      const now = this.now();
      const status = await this.deps.aggregator.poll(now);
      await this.applyStatus(status);
      this.emit("status", status);

      const events = this.deps.engine.evaluate(this.previous, status, now);
      this.previous = status;
      if (events.length > 0) {
        this.emit("events", events);
      }

      this.checkTransport();
      if (this.state !== "running" || !this.config.monitoring.enabled) return events;

      if (now - this.startedAt < this.config.monitoring.startupGracePeriod * 1000) {
        if (events.length > 0) {
          console.log(`[Supervisor] Startup grace period, not escalating ${events.length} change(s)`);
        }
        return events;
      }

      if (events.length > 0) {
        for (const event of events) {
          await this.record(`Change: ${describeEvent(event)}`);
        }
        this.lastCheckAt = now;
        this.dispatch({ type: "events", events });
      } else if (
        this.config.monitoring.deepCheckInterval > 0 &&
        now - this.lastCheckAt >= this.config.monitoring.deepCheckInterval * 1000 &&
        !this.deps.dispatcher.busy
      ) {
        this.lastCheckAt = now;
        console.log("[Supervisor] Scheduled deep check");
        this.dispatch({ type: "heartbeat" });
        await this.maintainMemory(new Date(now));
      }

      return events;
    } finally {
      this.ticking = false;
    }
  }

  /** Drops expired events and, when enabled, asks the actor to fold the rest into history. */
  private async maintainMemory(now: Date): Promise<void> {
    const { opsLog } = this.deps;
    try {
      await opsLog.trimEvents(now);
      if (!this.config.memory.compressHistory) return;
      const request = await opsLog.compressionPrompt();
      if (request) {
        this.dispatch({ type: "history-compression", request });
      }
    } catch (error) {
      console.error("[Supervisor] Memory maintenance failed:", errorMessage(error));
    }
  }

  /** Routes one inbound chat message; returns whether it started a cycle. */
  handleInbound(message: InboundMessage): boolean {
    const decision = this.deps.filter.accept(message);
    if (!decision.accepted) {
      debugLog("Supervisor", `skipped message from ${message.sender} (${decision.reason})`);
      return false;
    }

    console.log(`[Supervisor] <- ${message.sender} (via ${decision.via}): ${shorten(message.text, 100)}`);
    this.dispatch({ type: "message", message }, message.group);
    return true;
  }

  private dispatch(trigger: Trigger, group?: string): void {
    const delivery = this.deps.dispatcher
      .handle(trigger, () => this.promptContext())
      .then(async (message) => {
        await this.recordOutcome(trigger, message);
        await this.deliver(message, group);
      })
      .catch((error: unknown) => {
        console.error("[Supervisor] Delivery failed:", errorMessage(error));
      });

    this.deliveries.add(delivery);
    void delivery.finally(() => this.deliveries.delete(delivery));
  }

  /** Resolves once every dispatched cycle has been recorded and delivered. */
  async settle(): Promise<void> {
    while (this.deliveries.size > 0) {
      await Promise.all([...this.deliveries]);
    }
  }

  private async receiveLoop(transport: Transport, signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      try {
        for await (const message of transport.receive(signal)) {
          this.handleInbound(message);
        }
      } catch (error) {
        console.error("[Supervisor] Receive loop error:", errorMessage(error));
      }
      this.checkTransport();
      // Restart the receive sequence after a short pause
      await sleep(1000, signal);
    }
  }

  private checkTransport(): void {
    const transport = this.deps.transport;
    if (!transport || this.state !== "running") return;

    const health = transport.health();
    if (!health.receiving && !health.sending) {
      console.error("[Supervisor] Transport cannot send or receive, shutting down");
      void this.stop("transport failure");
    }
  }

  async promptContext(): Promise<PromptContext> {
    return {
      opsLog: await this.deps.opsLog.render(this.config.memory.maxRenderChars),
      statusSummary: this.deps.aggregator.summaryLine(),
      conversation: this.deps.filter.recentContext(),
    };
  }

  private async applyStatus(status: AggregatedStatus): Promise<void> {
    const lines = this.deps.aggregator.statusLines(status);
    for (const alert of status.alerts) {
      lines.push(`[${alert.severity}] ${alert.message}`);
    }
    try {
      await this.deps.opsLog.applyStatus(lines, new Date(status.timestamp));
    } catch (error) {
      console.error("[Supervisor] Failed to update ops log status:", errorMessage(error));
    }
  }

  private async record(text: string): Promise<void> {
    try {
      await this.deps.opsLog.appendEvent(text, new Date(this.now()));
    } catch (error) {
      console.error("[Supervisor] Failed to record event:", errorMessage(error));
    }
  }

  private async remember(text: string): Promise<void> {
    try {
      await this.deps.opsLog.addToHistory(text);
    } catch (error) {
      console.error("[Supervisor] Failed to update history:", errorMessage(error));
    }
  }

  private async recordOutcome(trigger: Trigger, message: OutboundMessage): Promise<void> {
    // Housekeeping replies stay quiet, but their failures are still recorded
    if (message.silent && !message.failed) return;

    if (message.failed) {
      await this.record(message.text);
    } else if (trigger.type === "message") {
      await this.record(`Responded (${message.tier}) to: ${shorten(trigger.message.text, 50)}`);
    } else if (message.priority === "alert") {
      await this.record(`${message.tier} alert: ${shorten(message.text, 200)}`);
    } else {
      await this.record(`${message.tier} observation: ${shorten(message.text, 200)}`);
    }

    if (message.verification) {
      await this.record(`Verification: ${shorten(message.verification, 200)}`);
    }
  }

  private systemMessage(text: string, alert: boolean): OutboundMessage {
    return {
      text,
      tier: "system",
      trigger: "heartbeat",
      escalated: false,
      failed: false,
      silent: false,
      priority: alert ? "alert" : "normal",
      timestamp: this.now(),
    };
  }

  private async deliver(message: OutboundMessage, group?: string): Promise<void> {
    this.emit("message", message);
    if (message.silent) return;
    if (this.state === "stopping" && message.failed) {
      console.log(`[Supervisor] Not sending during shutdown: ${message.text}`);
      return;
    }

    const { transport, discord, filter } = this.deps;
    const text = formatOutbound(message);

    if (transport) {
      const result = await transport.send(text, group);
      if (!result.success) {
        console.error(`[Supervisor] Send failed after ${result.attempts} attempts: ${result.error ?? "unknown"}`);
      }
    }
    filter.recordReply(PRODUCT_NAME, message.text);

    if (discord) {
      await discord.sendOutbound(message);
    }
  }

  private async readLogTail(): Promise<string | undefined> {
    const logFile = this.config.lifecycle.logFile;
    if (!logFile) return undefined;
    try {
      const content = await readFile(logFile, "utf-8");
      return content.trimEnd().split("\n").slice(-CRASH_LOG_LINES).join("\n");
    } catch {
      return undefined;
    }
  }

  /**
   * Stops the loops, lets in-flight work finish within the grace period,
   * announces the shutdown and removes the run marker.
   */
  stop(reason: string = "signal"): Promise<void> {
    if (!this.stopPromise) {
      this.stopPromise = this.shutdown(reason);
    }
    return this.stopPromise;
  }

  private async shutdown(reason: string): Promise<void> {
    this.stopReason = reason;
    this.setState("stopping");
    console.log(`[Supervisor] Shutting down (${reason})`);

    for (const timer of this.timers) clearInterval(timer);
    this.timers = [];
    this.abortController.abort();
    this.deps.dispatcher.cancel();

    const drained = Promise.all([
      this.deps.dispatcher.idle(),
      this.messageLoop ?? Promise.resolve(),
      this.settle(),
    ]).then(() => true);
    const finished = await Promise.race([drained, sleep(this.config.lifecycle.shutdownGraceMs).then(() => false)]);
    if (!finished) {
      console.warn(`[Supervisor] In-flight work did not finish within ${this.config.lifecycle.shutdownGraceMs}ms`);
    }

    const { transport, discord, runMarker, aggregator } = this.deps;
    if (transport) {
      const result = await transport.send(SHUTDOWN_MESSAGE);
      if (!result.success) {
        console.error(`[Supervisor] Could not send shutdown notice: ${result.error ?? "unknown"}`);
      }
    }
    if (discord) {
      await discord.sendCustomMessage(PRODUCT_NAME, SHUTDOWN_MESSAGE);
    }

    await this.record(reason === "signal" ? "Clean shutdown" : `Shutdown: ${reason}`);
    await runMarker.remove();
    await aggregator.close();

    this.setState("stopped");
    this.emit("stopped");
  }
}
