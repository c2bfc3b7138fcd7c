import { describe, it, expect } from "vitest";
import { ResourceProbe, type ResourceSample } from "../../src/probes/resource.js";
import { defaultConfig } from "../../src/config/loader.js";

function probeWith(sample: ResourceSample): ResourceProbe {
  return new ResourceProbe(defaultConfig.probes.resource, async () => sample);
}

describe("ResourceProbe", () => {
  it("reports host usage with GPU metrics when a GPU is present", async () => {
    const probe = probeWith({
      cpuPercent: 42.5,
      memoryPercent: 61,
      diskPercent: 70,
      gpu: { utilization: 88, temperature: 72, memoryUsedMb: 4096 },
    });

    const snapshot = await probe.status();

    expect(snapshot.probe).toBe("resource");
    expect(snapshot.available).toBe(true);
    expect(snapshot.metrics).toEqual({
      cpu_percent: 42.5,
      memory_percent: 61,
      disk_percent: 70,
      gpu_utilization: 88,
      gpu_temp: 72,
      gpu_memory_used_mb: 4096,
    });
    expect(Object.isFrozen(snapshot)).toBe(true);
    expect(probe.summaryLine(snapshot)).toBe("VPS: CPU 42.5%, RAM 61%, Disk 70%, GPU 88% @ 72C");
    expect(probe.alerts(snapshot)).toEqual([]);
  });

  it("omits GPU metrics when none is available", async () => {
    const probe = probeWith({ cpuPercent: 5, memoryPercent: 10, diskPercent: 20, gpu: null });
    const snapshot = await probe.status();

    expect("gpu_temp" in snapshot.metrics).toBe(false);
    expect(probe.summaryLine(snapshot)).toBe("VPS: CPU 5%, RAM 10%, Disk 20%, GPU: N/A");
  });

  it("raises alerts above the configured limits", async () => {
    const probe = probeWith({
      cpuPercent: 96,
      memoryPercent: 50,
      diskPercent: 90,
      gpu: { utilization: 10, temperature: 85 },
    });
    const alerts = probe.alerts(await probe.status());

    expect(alerts).toEqual([
      { metric: "cpu_percent", severity: "warning", message: "CPU high: 96%", source: "resource" },
      { metric: "disk_percent", severity: "critical", message: "Disk high: 90%", source: "resource" },
      { metric: "gpu_temp", severity: "critical", message: "GPU temp high: 85C", source: "resource" },
    ]);
  });
});
