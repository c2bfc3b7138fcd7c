import { describe, it, expect, beforeEach } from "vitest";
import { StreamingProbe } from "../../src/probes/streaming.js";
import { computeObsAuth, type ObsRequester, type ObsResponseData } from "../../src/probes/obs-client.js";
import { defaultConfig } from "../../src/config/loader.js";

class FakeObs implements ObsRequester {
  connected = false;
  connects = 0;
  closed = false;
  requests: string[] = [];
  responses: Record<string, ObsResponseData> = {};
  failWith: Error | null = null;

  async connect(): Promise<void> {
    this.connects++;
    this.connected = true;
  }

  async request(requestType: string): Promise<ObsResponseData> {
    this.requests.push(requestType);
    if (this.failWith) throw this.failWith;
    return this.responses[requestType] ?? {};
  }

  async close(): Promise<void> {
    this.closed = true;
    this.connected = false;
  }
}

describe("StreamingProbe", () => {
  let obs: FakeObs;
  let probe: StreamingProbe;

  beforeEach(() => {
    obs = new FakeObs();
    probe = new StreamingProbe(defaultConfig.probes.streaming, obs);
  });

  it("derives stream metrics from OBS stats", async () => {
    obs.responses = {
      GetStreamStatus: { outputActive: true, outputDuration: 3_725_400, outputBytes: 1_000_000 },
      GetStats: {
        outputTotalFrames: 10_000,
        outputSkippedFrames: 150,
        activeFps: 59.94,
        cpuUsage: 12.345,
        memoryUsage: 512.6,
      },
    };

    const snapshot = await probe.status();

    expect(obs.connects).toBe(1);
    expect(snapshot.metrics).toEqual({
      streaming: true,
      duration_sec: 3725,
      bytes_sent: 1_000_000,
      frames_dropped: 150,
      frames_total: 10_000,
      dropped_pct: 1.5,
      fps: 60,
      obs_cpu_percent: 12.3,
      obs_memory_mb: 513,
    });
    expect(probe.summaryLine(snapshot)).toBe("OBS: LIVE 1h02m, 1.5% dropped, 60 fps");
    expect(probe.alerts(snapshot)).toEqual([
      { metric: "dropped_pct", severity: "warning", message: "OBS dropped frames: 1.5%", source: "streaming" },
    ]);
  });

  it("reports offline without alerts when not streaming", async () => {
    obs.responses = {
      GetStreamStatus: { outputActive: false },
      GetStats: { outputTotalFrames: 100, outputSkippedFrames: 50 },
    };

    const snapshot = await probe.status();

    expect(snapshot.metrics.streaming).toBe(false);
    expect(probe.summaryLine(snapshot)).toBe("OBS: Offline");
    expect(probe.alerts(snapshot)).toEqual([]);
  });

  it("propagates request failures to the caller", async () => {
    obs.failWith = new Error("socket closed");
    await expect(probe.status()).rejects.toThrow("socket closed");
  });

  it("maps commands to OBS requests", async () => {
    await expect(probe.execute("start_stream")).resolves.toEqual({
      success: true,
      message: "start_stream executed",
    });
    await expect(probe.execute("stop_recording")).resolves.toEqual({
      success: true,
      message: "stop_recording executed",
    });
    await expect(probe.execute("explode")).resolves.toEqual({
      success: false,
      message: "Unknown command: explode",
    });
    expect(obs.requests).toEqual(["StartStream", "StopRecord"]);
  });

  it("closes the client", async () => {
    await probe.close();
    expect(obs.closed).toBe(true);
  });
});

describe("computeObsAuth", () => {
  it("is deterministic and depends on every input", () => {
    const auth = computeObsAuth("test-secret", "salt", "challenge");

    expect(auth).toBe(computeObsAuth("test-secret", "salt", "challenge"));
    expect(auth).not.toBe(computeObsAuth("test-secret", "salt", "other"));
    expect(auth).not.toBe(computeObsAuth("other-secret", "salt", "challenge"));
    expect(auth).toMatch(/^[A-Za-z0-9+/]{43}=$/);
  });
});
