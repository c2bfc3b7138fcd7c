import type { StreamingProbeConfig } from "../config/loader.js";
import { errorMessage } from "../errors.js";
import { ObsClient, type ObsRequester, type ObsResponseData } from "./obs-client.js";
import {
  booleanMetric,
  createSnapshot,
  numberMetric,
  type CommandResult,
  type Probe,
  type ProbeAlert,
  type Snapshot,
} from "./types.js";

const COMMANDS: Record<string, string> = {
  start_stream: "StartStream",
  stop_stream: "StopStream",
  toggle_stream: "ToggleStream",
  start_recording: "StartRecord",
  stop_recording: "StopRecord",
};

function num(data: ObsResponseData, key: string): number {
  const value = data[key];
  return typeof value === "number" && Number.isFinite(value) ? value : 0;
}

/** Live-stream health from OBS over obs-websocket v5. */
export class StreamingProbe implements Probe {
  readonly id = "streaming";
  private config: StreamingProbeConfig;
  private client: ObsRequester;

  constructor(config: StreamingProbeConfig, client?: ObsRequester) {
    this.config = config;
    this.client =
      client ?? new ObsClient(config.host, config.port, config.password, config.requestTimeoutMs);
  }

  private async ensureConnected(): Promise<void> {
    if (!this.client.connected) {
      await this.client.connect();
    }
  }

  async status(): Promise<Snapshot> {
    await this.ensureConnected();

    const [stream, stats] = await Promise.all([
      this.client.request("GetStreamStatus"),
      this.client.request("GetStats"),
    ]);

    const framesTotal = num(stats, "outputTotalFrames");
    const framesDropped = num(stats, "outputSkippedFrames");

    return createSnapshot(this.id, {
      streaming: stream.outputActive === true,
      duration_sec: Math.floor(num(stream, "outputDuration") / 1000),
      bytes_sent: num(stream, "outputBytes"),
      frames_dropped: framesDropped,
      frames_total: framesTotal,
      dropped_pct: framesTotal > 0 ? Math.round((framesDropped / framesTotal) * 10000) / 100 : 0,
      fps: Math.round(num(stats, "activeFps")),
      obs_cpu_percent: Math.round(num(stats, "cpuUsage") * 10) / 10,
      obs_memory_mb: Math.round(num(stats, "memoryUsage")),
    });
  }

  alerts(snapshot: Snapshot): ProbeAlert[] {
    if (booleanMetric(snapshot, "streaming") !== true) return [];

    const dropped = numberMetric(snapshot, "dropped_pct") ?? 0;
    if (dropped > this.config.alerts.droppedFramesPct) {
      return [
        {
          metric: "dropped_pct",
          severity: "warning",
          message: `OBS dropped frames: ${dropped}%`,
          source: this.id,
        },
      ];
    }
    return [];
  }

  summaryLine(snapshot: Snapshot): string {
    if (booleanMetric(snapshot, "streaming") !== true) {
      return "OBS: Offline";
    }

    const duration = numberMetric(snapshot, "duration_sec") ?? 0;
    const hours = Math.floor(duration / 3600);
    const minutes = Math.floor((duration % 3600) / 60);
    const dropped = numberMetric(snapshot, "dropped_pct") ?? 0;
    const fps = numberMetric(snapshot, "fps") ?? 0;

    return `OBS: LIVE ${hours}h${String(minutes).padStart(2, "0")}m, ${dropped}% dropped, ${fps} fps`;
  }

  async execute(command: string): Promise<CommandResult> {
    const requestType = COMMANDS[command];
    if (!requestType) {
      return { success: false, message: `Unknown command: ${command}` };
    }

    try {
      await this.ensureConnected();
      await this.client.request(requestType);
      return { success: true, message: `${command} executed` };
    } catch (error) {
      return { success: false, message: errorMessage(error) };
    }
  }

  async close(): Promise<void> {
    await this.client.close();
  }
}
