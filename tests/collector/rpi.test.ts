import { describe, it, expect, beforeEach, vi } from "vitest";
import {
  RaspberryPiCollector,
  decodeThrottled,
  parseTemperatureOutput,
  parseThrottledOutput,
  parseVoltageOutput,
  type CommandRunner,
} from "../../src/collector/rpi.js";

function runner(outputs: Record<string, string | null>): CommandRunner {
  return async (args) => {
    const key = args.join(" ");
    return key in outputs ? outputs[key] : null;
  };
}

describe("vcgencmd parsers", () => {
  it("should parse throttled output as hex", () => {
    expect(parseThrottledOutput("throttled=0x50005")).toBe(0x50005);
    expect(parseThrottledOutput("throttled=0x0\n")).toBe(0);
    expect(parseThrottledOutput("garbage")).toBeNull();
  });

  it("should parse core voltage", () => {
    expect(parseVoltageOutput("volt=1.2000V")).toBe(1.2);
    expect(parseVoltageOutput("volt=V")).toBeNull();
  });

  it("should parse GPU temperature", () => {
    expect(parseTemperatureOutput("temp=42.8'C")).toBe(42.8);
    expect(parseTemperatureOutput("temp=unknown")).toBeNull();
  });

  it("should decode current and sticky throttle bits", () => {
    expect(decodeThrottled(0x50005)).toEqual({
      under_voltage: true,
      arm_frequency_capped: false,
      throttled: true,
      soft_temp_limit: false,
      under_voltage_occurred: true,
      arm_freq_capped_occurred: false,
      throttled_occurred: true,
      soft_temp_limit_occurred: false,
    });
  });
});

describe("RaspberryPiCollector", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  it("should be unavailable when vcgencmd is missing", async () => {
    const collector = new RaspberryPiCollector(runner({}));

    await collector.initialize();

    expect(collector.isAvailable()).toBe(false);
    expect(collector.sensorDescriptors()).toEqual([]);
  });

  it("should report binary flags, raw status, voltage and temperature", async () => {
    const collector = new RaspberryPiCollector(
      runner({
        version: "Aug 1 2024 12:00:00",
        get_throttled: "throttled=0xa",
        "measure_volts core": "volt=0.8563V",
        measure_temp: "temp=51.54'C",
      })
    );
    await collector.initialize();

    const samples = await collector.collect();

    expect(samples.map((s) => [s.sensorId, s.value])).toEqual([
      ["rpi_throttled", "off"],
      ["rpi_under_voltage", "off"],
      ["rpi_temp_limited", "on"],
      ["rpi_freq_capped", "on"],
      ["rpi_throttle_raw", "0xa"],
      ["rpi_core_voltage", 0.8563],
      ["rpi_gpu_temperature", 51.5],
    ]);
    expect(samples[4].attributes?.soft_temp_limit).toBe(true);
    expect(samples[4].attributes?.under_voltage).toBe(false);
  });

  it("should omit sensors whose command output cannot be parsed", async () => {
    const collector = new RaspberryPiCollector(
      runner({
        version: "ok",
        get_throttled: "error",
        measure_temp: "temp=40.0'C",
      })
    );
    await collector.initialize();

    const samples = await collector.collect();

    expect(samples).toEqual([{ sensorId: "rpi_gpu_temperature", value: 40 }]);
    expect(console.warn).toHaveBeenCalledWith("[Collector] Failed to parse throttle status: error");
  });

  it("should declare the flag sensors as binary", async () => {
    const collector = new RaspberryPiCollector(runner({ version: "ok" }));
    await collector.initialize();

    const binary = collector
      .sensorDescriptors()
      .filter((d) => d.isBinary)
      .map((d) => d.sensorId);

    expect(binary).toEqual(["rpi_throttled", "rpi_under_voltage", "rpi_temp_limited", "rpi_freq_capped"]);
  });
});
