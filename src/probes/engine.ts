import type { EngineProbeConfig } from "../config/loader.js";
import {
  createSnapshot,
  type CommandResult,
  type Probe,
  type ProbeAlert,
  type Snapshot,
} from "./types.js";

/**
 * Game engine probe. The engine exposes no metrics endpoint yet, so this only
 * reports that it is not configured.
 */
export class EngineProbe implements Probe {
  readonly id = "engine";
  private config: EngineProbeConfig;

  constructor(config: EngineProbeConfig) {
    this.config = config;
  }

  async status(): Promise<Snapshot> {
    return createSnapshot(this.id, {
      status: "not_configured",
      endpoint: `${this.config.host}:${this.config.port}`,
    });
  }

  alerts(_snapshot: Snapshot): ProbeAlert[] {
    return [];
  }

  summaryLine(_snapshot: Snapshot): string {
    return "Engine: Not configured";
  }

  async execute(command: string): Promise<CommandResult> {
    return { success: false, message: `Engine commands are not supported (${command})` };
  }
}
