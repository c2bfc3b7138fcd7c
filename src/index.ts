#!/usr/bin/env node
import "dotenv/config";
import { loadConfig } from "./config/loader.js";
import { createProbes } from "./probes/registry.js";
import { HealthAggregator } from "./health/aggregator.js";
import { ChangeDetectionEngine } from "./rules/engine.js";
import { OpsLog } from "./memory/ops-log.js";
import { SessionStore } from "./memory/sessions.js";
import { AgentRunner } from "./agent/runner.js";
import { EscalationDispatcher } from "./agent/dispatcher.js";
import { TriggerFilter } from "./transport/filter.js";
import { SignalCliTransport } from "./transport/signal.js";
import { DiscordNotifier } from "./notifications/discord.js";
import { RunMarker } from "./lifecycle/run-marker.js";
import { LifecycleSupervisor, PRODUCT_NAME } from "./lifecycle/supervisor.js";
import { DashboardServer } from "./dashboard/server.js";
import type { AggregatedStatus } from "./health/aggregator.js";

async function main() {
  console.log(`${PRODUCT_NAME} starting...\n`);

  const config = loadConfig(process.env.VIGIL_CONFIG);

  const probes = createProbes(config.probes);
  const aggregator = new HealthAggregator(probes, config.health.probeTimeoutMs);
  const engine = new ChangeDetectionEngine(config.rules, config.monitoring.defaultCooldownSeconds);

  const opsLog = new OpsLog(config.memory.directory, {
    retentionHours: config.memory.retentionHours,
    maxRecentEvents: config.memory.maxRecentEvents,
  });
  const sessions = new SessionStore(config.memory.directory);
  const dispatcher = new EscalationDispatcher(new AgentRunner(config.agent), sessions, config.escalation);

  const filter = new TriggerFilter({
    allowedGroups: config.transport.allowedGroups,
    triggerToken: config.transport.triggerToken,
    contextBufferSize: config.transport.contextBufferSize,
  });
  const transport = config.transport.enabled ? new SignalCliTransport(config.transport) : null;
  if (!transport) {
    console.log("[Signal] Transport disabled, running without chat");
  }

  const discord = new DiscordNotifier(config.discord);
  if (discord.isEnabled()) {
    console.log("Discord notifications enabled");
  }

  const supervisor = new LifecycleSupervisor({
    config,
    aggregator,
    engine,
    opsLog,
    dispatcher,
    filter,
    runMarker: new RunMarker(config.memory.directory),
    transport,
    discord: discord.isEnabled() ? discord : null,
  });

  // Probe alerts that newly appear go to Discord as they are seen
  let knownAlerts = new Set<string>();
  supervisor.on("status", (status: AggregatedStatus) => {
    const current = new Set(status.alerts.map((a) => `${a.source}:${a.message}`));
    const fresh = status.alerts.filter((a) => !knownAlerts.has(`${a.source}:${a.message}`));
    knownAlerts = current;
    if (fresh.length > 0) {
      void discord.sendProbeAlerts(fresh);
    }
  });

  let dashboard: DashboardServer | null = null;
  if (config.dashboard.enabled) {
    dashboard = new DashboardServer(config.dashboard.port, {
      getState: () => supervisor.getState(),
      getStatus: () => aggregator.getLatest(),
      getStatusLines: () => aggregator.statusLines(),
      readOpsLog: () => opsLog.read(),
    });
    dashboard.attach(supervisor);
    await dashboard.start();
  }

  let signals = 0;
  const onSignal = (name: NodeJS.Signals) => {
    signals++;
    if (signals > 1) {
      console.log(`\n${name} again, exiting immediately`);
      process.exit(130);
    }
    console.log(`\n${name} received, shutting down...`);
    void supervisor.stop("signal");
  };
  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);

  const report = await supervisor.start();
  console.log(report.message);
  console.log(`\n${PRODUCT_NAME} running. Press Ctrl+C to stop.\n`);

  if (supervisor.getState() === "running") {
    await supervisor.run();
  } else {
    await supervisor.stop();
  }

  if (dashboard) {
    await dashboard.stop();
  }

  process.exitCode = supervisor.getStopReason() === "transport failure" ? 1 : 0;
}

main().catch((error) => {
  console.error("Fatal error:", error);
  process.exit(1);
});
