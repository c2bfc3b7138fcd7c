import { EventEmitter } from "events";
import { ProbeFailure, errorMessage } from "../errors.js";
import type { CommandResult, Probe, ProbeAlert, Snapshot } from "../probes/types.js";
import { unavailableSnapshot } from "../probes/types.js";
import { debugLog } from "../utils/debug.js";
import { withTimeout } from "../utils/timeout.js";

export interface AggregatedStatus {
  timestamp: number;
  snapshots: Record<string, Snapshot>;
  alerts: ProbeAlert[];
}

/**
 * Polls every registered probe and merges the results. One failing or hung
 * probe degrades only its own entry.
 *
 * Emits "status" with each AggregatedStatus.
 */
export class HealthAggregator extends EventEmitter {
  private probes: Probe[];
  private probeTimeoutMs: number;
  private latest: AggregatedStatus | null = null;

  constructor(probes: Probe[], probeTimeoutMs: number = 10000) {
    super();
    this.probes = probes;
    this.probeTimeoutMs = probeTimeoutMs;
  }

  getProbes(): Probe[] {
    return [...this.probes];
  }

  getLatest(): AggregatedStatus | null {
    return this.latest;
  }

  async poll(now: number = Date.now()): Promise<AggregatedStatus> {
    const results = await Promise.all(this.probes.map((probe) => this.pollProbe(probe)));

    const snapshots: Record<string, Snapshot> = {};
    const alerts: ProbeAlert[] = [];

    this.probes.forEach((probe, i) => {
      const snapshot = results[i];
      snapshots[probe.id] = snapshot;
      if (!snapshot.available) return;

      try {
        alerts.push(...probe.alerts(snapshot));
      } catch (error) {
        console.error(`[Health] ${probe.id} alerts failed:`, errorMessage(error));
      }
    });

    const status: AggregatedStatus = { timestamp: now, snapshots, alerts };
    this.latest = status;

    debugLog("Health", `polled ${this.probes.length} probes, ${alerts.length} alerts`);
    this.emit("status", status);
    return status;
  }

  private async pollProbe(probe: Probe): Promise<Snapshot> {
    try {
      return await withTimeout(probe.status(), this.probeTimeoutMs, `${probe.id} probe`);
    } catch (error) {
      const failure = new ProbeFailure(probe.id, errorMessage(error), { cause: error });
      console.error(`[Health] Probe ${failure.probe} failed: ${failure.message}`);
      return unavailableSnapshot(probe.id, failure.message);
    }
  }

  statusLines(status: AggregatedStatus | null = this.latest): string[] {
    if (!status) return [];

    const lines: string[] = [];
    for (const probe of this.probes) {
      const snapshot = status.snapshots[probe.id];
      if (snapshot) lines.push(this.probeLine(probe, snapshot));
    }
    return lines;
  }

  probeLine(probe: Probe, snapshot: Snapshot): string {
    if (!snapshot.available) {
      return `${probe.id}: unavailable (${snapshot.error ?? "unknown error"})`;
    }
    try {
      return probe.summaryLine(snapshot);
    } catch (error) {
      return `${probe.id}: summary failed (${errorMessage(error)})`;
    }
  }

  /** One line per probe, in registration order, for inclusion in prompts. */
  summaryLine(status: AggregatedStatus | null = this.latest): string {
    const lines = this.statusLines(status);
    if (lines.length === 0) return "No status collected yet";
    return lines.map((line) => `- ${line}`).join("\n");
  }

  async executeCommand(probeId: string, command: string): Promise<CommandResult> {
    const probe = this.probes.find((p) => p.id === probeId);
    if (!probe) {
      return { success: false, message: `Unknown probe: ${probeId}` };
    }
    if (!probe.execute) {
      return { success: false, message: `Probe ${probeId} does not accept commands` };
    }

    try {
      return await probe.execute(command);
    } catch (error) {
      return { success: false, message: errorMessage(error) };
    }
  }

  async close(): Promise<void> {
    for (const probe of this.probes) {
      if (!probe.close) continue;
      try {
        await probe.close();
      } catch (error) {
        console.error(`[Health] Failed to close ${probe.id}:`, errorMessage(error));
      }
    }
  }
}
