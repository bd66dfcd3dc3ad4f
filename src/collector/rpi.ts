import { execFile } from "child_process";
import { promisify } from "util";
import { debug, describeError } from "../logging/logger.js";
import { BaseCollector, round, type MetricSample, type SensorDescriptor } from "./types.js";

const execFileAsync = promisify(execFile);

const VCGENCMD_TIMEOUT_MS = 5000;

// Bit positions reported by `vcgencmd get_throttled`
export const THROTTLED_FLAGS = {
  under_voltage: 0,
  arm_frequency_capped: 1,
  throttled: 2,
  soft_temp_limit: 3,
  under_voltage_occurred: 16,
  arm_freq_capped_occurred: 17,
  throttled_occurred: 18,
  soft_temp_limit_occurred: 19,
} as const;

export type ThrottledFlags = { [K in keyof typeof THROTTLED_FLAGS]: boolean };

export type CommandRunner = (args: string[]) => Promise<string | null>;

export async function runVcgencmd(args: string[]): Promise<string | null> {
  try {
    const { stdout } = await execFileAsync("vcgencmd", args, { timeout: VCGENCMD_TIMEOUT_MS });
    return stdout.trim();
  } catch (error) {
    debug(`[Collector] vcgencmd ${args.join(" ")} failed: ${describeError(error)}`);
    return null;
  }
}

export function decodeThrottled(value: number): ThrottledFlags {
  return {
    under_voltage: (value & (1 << THROTTLED_FLAGS.under_voltage)) !== 0,
    arm_frequency_capped: (value & (1 << THROTTLED_FLAGS.arm_frequency_capped)) !== 0,
    throttled: (value & (1 << THROTTLED_FLAGS.throttled)) !== 0,
    soft_temp_limit: (value & (1 << THROTTLED_FLAGS.soft_temp_limit)) !== 0,
    under_voltage_occurred: (value & (1 << THROTTLED_FLAGS.under_voltage_occurred)) !== 0,
    arm_freq_capped_occurred: (value & (1 << THROTTLED_FLAGS.arm_freq_capped_occurred)) !== 0,
    throttled_occurred: (value & (1 << THROTTLED_FLAGS.throttled_occurred)) !== 0,
    soft_temp_limit_occurred: (value & (1 << THROTTLED_FLAGS.soft_temp_limit_occurred)) !== 0,
  };
}

/** "throttled=0x50005" -> 0x50005 */
export function parseThrottledOutput(output: string): number | null {
  const match = /^throttled=(0x[0-9a-f]+)$/i.exec(output.trim());
  return match ? parseInt(match[1], 16) : null;
}

/** "volt=1.2000V" -> 1.2 */
export function parseVoltageOutput(output: string): number | null {
  const match = /^volt=([0-9.]+)V$/.exec(output.trim());
  return match ? parseFloat(match[1]) : null;
}

/** "temp=42.8'C" -> 42.8 */
export function parseTemperatureOutput(output: string): number | null {
  const match = /^temp=([0-9.]+)'C$/.exec(output.trim());
  return match ? parseFloat(match[1]) : null;
}

const onOff = (flag: boolean): string => (flag ? "on" : "off");

export class RaspberryPiCollector extends BaseCollector {
  readonly name = "rpi";
  private detected = false;

  constructor(private run: CommandRunner = runVcgencmd) {
    super();
  }

  async initialize(): Promise<void> {
    this.detected = (await this.run(["version"])) !== null;
    if (this.detected) {
      console.log("[Collector] Raspberry Pi detected - enabling RPi-specific sensors");
    }
  }

  isAvailable(): boolean {
    return this.detected;
  }

  async collect(): Promise<MetricSample[]> {
    if (!this.detected) return [];

    const [throttledOutput, voltageOutput, temperatureOutput] = await Promise.all([
      this.run(["get_throttled"]),
      this.run(["measure_volts", "core"]),
      this.run(["measure_temp"]),
    ]);

    const samples: MetricSample[] = [];

    if (throttledOutput !== null) {
      const value = parseThrottledOutput(throttledOutput);
      if (value === null) {
        console.warn(`[Collector] Failed to parse throttle status: ${throttledOutput}`);
      } else {
        const flags = decodeThrottled(value);
        samples.push(
          this.sample("rpi_throttled", onOff(flags.throttled)),
          this.sample("rpi_under_voltage", onOff(flags.under_voltage)),
          this.sample("rpi_temp_limited", onOff(flags.soft_temp_limit)),
          this.sample("rpi_freq_capped", onOff(flags.arm_frequency_capped)),
          this.sample("rpi_throttle_raw", `0x${value.toString(16)}`, { ...flags })
        );
      }
    }

    if (voltageOutput !== null) {
      const voltage = parseVoltageOutput(voltageOutput);
      if (voltage === null) debug(`[Collector] Failed to parse voltage: ${voltageOutput}`);
      else samples.push(this.sample("rpi_core_voltage", round(voltage, 4)));
    }

    if (temperatureOutput !== null) {
      const temperature = parseTemperatureOutput(temperatureOutput);
      if (temperature === null) debug(`[Collector] Failed to parse GPU temperature: ${temperatureOutput}`);
      else samples.push(this.sample("rpi_gpu_temperature", round(temperature, 1)));
    }

    return samples;
  }

  sensorDescriptors(): SensorDescriptor[] {
    if (!this.detected) return [];

    const flag = (sensorId: string, name: string, deviceClass: string, icon: string): SensorDescriptor => ({
      sensorId,
      name,
      isBinary: true,
      deviceClass,
      icon,
      entityCategory: "diagnostic",
    });

    return [
      flag("rpi_throttled", "RPi Throttled", "running", "mdi:speedometer-slow"),
      flag("rpi_under_voltage", "RPi Under Voltage", "problem", "mdi:flash-alert"),
      flag("rpi_temp_limited", "RPi Temperature Limited", "heat", "mdi:thermometer-alert"),
      flag("rpi_freq_capped", "RPi Frequency Capped", "running", "mdi:speedometer-slow"),
      {
        sensorId: "rpi_core_voltage",
        name: "RPi Core Voltage",
        isBinary: false,
        deviceClass: "voltage",
        stateClass: "measurement",
        unit: "V",
        entityCategory: "diagnostic",
        precision: 4,
      },
      {
        sensorId: "rpi_gpu_temperature",
        name: "RPi GPU Temperature",
        isBinary: false,
        deviceClass: "temperature",
        stateClass: "measurement",
        unit: "°C",
        precision: 1,
      },
      {
        sensorId: "rpi_throttle_raw",
        name: "RPi Throttle Status",
        isBinary: false,
        icon: "mdi:information",
        entityCategory: "diagnostic",
        hasAttributes: true,
      },
    ];
  }
}
