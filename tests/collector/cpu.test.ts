import { describe, it, expect, beforeEach, vi } from "vitest";

const si = vi.hoisted(() => ({
  cpu: vi.fn(),
  cpuTemperature: vi.fn(),
  currentLoad: vi.fn(),
  cpuCurrentSpeed: vi.fn(),
}));

vi.mock("systeminformation", () => ({ default: si }));

import { CpuCollector } from "../../src/collector/cpu.js";

describe("CpuCollector", () => {
  beforeEach(() => {
    si.cpu.mockReset().mockResolvedValue({ cores: 2 });
    si.cpuTemperature.mockReset();
    si.currentLoad.mockReset().mockResolvedValue({
      currentLoad: 12.34,
      cpus: [{ load: 10.04 }, { load: 14.66 }],
    });
    si.cpuCurrentSpeed.mockReset().mockResolvedValue({ avg: 1.8 });
  });

  it("should report usage, per-core load, temperature and frequency", async () => {
    si.cpuTemperature.mockResolvedValue({ main: 52.34 });
    const collector = new CpuCollector();
    await collector.initialize();

    const samples = await collector.collect();

    expect(samples).toEqual([
      { sensorId: "cpu_usage", value: 12.3 },
      { sensorId: "cpu_core_0_usage", value: 10 },
      { sensorId: "cpu_core_1_usage", value: 14.7 },
      { sensorId: "cpu_temperature", value: 52.3 },
      { sensorId: "cpu_frequency", value: 1800 },
    ]);
  });

  it("should leave out temperature when the startup probe found no sensor", async () => {
    si.cpuTemperature.mockResolvedValue({ main: null });
    const collector = new CpuCollector();
    await collector.initialize();
    si.cpuTemperature.mockClear();

    const samples = await collector.collect();

    expect(samples.map((s) => s.sensorId)).toEqual([
      "cpu_usage",
      "cpu_core_0_usage",
      "cpu_core_1_usage",
      "cpu_frequency",
    ]);
    expect(si.cpuTemperature).not.toHaveBeenCalled();
    expect(collector.sensorDescriptors().map((d) => d.sensorId)).not.toContain("cpu_temperature");
  });

  it("should treat a failing temperature probe as no sensor", async () => {
    si.cpuTemperature.mockRejectedValue(new Error("no thermal zone"));
    const collector = new CpuCollector();

    await collector.initialize();

    expect(collector.sensorDescriptors().map((d) => d.sensorId)).toEqual([
      "cpu_usage",
      "cpu_core_0_usage",
      "cpu_core_1_usage",
      "cpu_frequency",
    ]);
  });

  it("should omit frequency when the speed is unknown", async () => {
    si.cpuTemperature.mockResolvedValue({ main: null });
    si.cpuCurrentSpeed.mockResolvedValue({ avg: 0 });
    const collector = new CpuCollector();
    await collector.initialize();

    const samples = await collector.collect();

    expect(samples.map((s) => s.sensorId)).not.toContain("cpu_frequency");
  });
});
