import si from "systeminformation";
import type { ResourceProbeConfig } from "../config/loader.js";
import {
  createSnapshot,
  numberMetric,
  type MetricValue,
  type Probe,
  type ProbeAlert,
  type Severity,
  type Snapshot,
} from "./types.js";

export interface GpuSample {
  utilization: number;
  temperature: number;
  memoryUsedMb?: number;
  memoryTotalMb?: number;
  powerWatts?: number;
}

export interface ResourceSample {
  cpuPercent: number;
  memoryPercent: number;
  diskPercent: number;
  gpu: GpuSample | null;
}

export type ResourceSampler = (diskMount: string) => Promise<ResourceSample>;

const round1 = (value: number): number => Math.round(value * 10) / 10;

export const sampleSystemResources: ResourceSampler = async (diskMount) => {
  const [load, mem, disks, graphics] = await Promise.all([
    si.currentLoad(),
    si.mem(),
    si.fsSize(),
    si.graphics().catch(() => null),
  ]);

  const disk = disks.find((d) => d.mount === diskMount) ?? disks[0];
  // GPU stats only come back for NVIDIA cards with nvidia-smi on PATH
  const controller = graphics?.controllers.find(
    (c) => typeof c.utilizationGpu === "number" && typeof c.temperatureGpu === "number"
  );
  const utilization = controller?.utilizationGpu;
  const temperature = controller?.temperatureGpu;

  return {
    cpuPercent: round1(load.currentLoad),
    memoryPercent: mem.total > 0 ? round1((mem.active / mem.total) * 100) : 0,
    diskPercent: disk ? round1(disk.use) : 0,
    gpu:
      typeof utilization === "number" && typeof temperature === "number"
        ? {
            utilization,
            temperature,
            memoryUsedMb: controller?.memoryUsed,
            memoryTotalMb: controller?.memoryTotal,
            powerWatts: controller?.powerDraw,
          }
        : null,
  };
};

/** CPU, memory, disk and GPU usage of the host this process runs on. */
export class ResourceProbe implements Probe {
  readonly id = "resource";
  private config: ResourceProbeConfig;
  private sampler: ResourceSampler;

  constructor(config: ResourceProbeConfig, sampler: ResourceSampler = sampleSystemResources) {
    this.config = config;
    this.sampler = sampler;
  }

  async status(): Promise<Snapshot> {
    const sample = await this.sampler(this.config.diskMount);

    const metrics: Record<string, MetricValue> = {
      cpu_percent: sample.cpuPercent,
      memory_percent: sample.memoryPercent,
      disk_percent: sample.diskPercent,
    };

    if (sample.gpu) {
      metrics.gpu_utilization = sample.gpu.utilization;
      metrics.gpu_temp = sample.gpu.temperature;
      if (sample.gpu.memoryUsedMb !== undefined) metrics.gpu_memory_used_mb = sample.gpu.memoryUsedMb;
      if (sample.gpu.memoryTotalMb !== undefined) metrics.gpu_memory_total_mb = sample.gpu.memoryTotalMb;
      if (sample.gpu.powerWatts !== undefined) metrics.gpu_power_watts = sample.gpu.powerWatts;
    }

    return createSnapshot(this.id, metrics);
  }

  alerts(snapshot: Snapshot): ProbeAlert[] {
    const limits = this.config.alerts;
    const checks: Array<[string, number, Severity, (v: number) => string]> = [
      ["cpu_percent", limits.cpuPctMax, "warning", (v) => `CPU high: ${v}%`],
      ["memory_percent", limits.memoryPctMax, "warning", (v) => `Memory high: ${v}%`],
      ["disk_percent", limits.diskPctMax, "critical", (v) => `Disk high: ${v}%`],
      ["gpu_temp", limits.gpuTempMax, "critical", (v) => `GPU temp high: ${v}C`],
      ["gpu_utilization", limits.gpuUtilMax, "warning", (v) => `GPU util high: ${v}%`],
    ];

    const alerts: ProbeAlert[] = [];
    for (const [metric, limit, severity, describe] of checks) {
      const value = numberMetric(snapshot, metric);
      if (value !== undefined && value > limit) {
        alerts.push({
          metric,
          severity,
          message: describe(value),
          source: this.id,
        });
      }
    }
    return alerts;
  }

  summaryLine(snapshot: Snapshot): string {
    const show = (name: string): string => {
      const value = numberMetric(snapshot, name);
      return value === undefined ? "?" : String(value);
    };

    const gpu =
      numberMetric(snapshot, "gpu_utilization") !== undefined
        ? `GPU ${show("gpu_utilization")}% @ ${show("gpu_temp")}C`
        : "GPU: N/A";

    return `VPS: CPU ${show("cpu_percent")}%, RAM ${show("memory_percent")}%, Disk ${show("disk_percent")}%, ${gpu}`;
  }
}
