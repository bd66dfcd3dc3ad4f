import type { ThresholdsConfig } from "../config/loader.js";
import type { MetricValue } from "../collector/types.js";
import type { RuleMatch, ThresholdRule } from "./types.js";

export const THRESHOLD_RULES: Readonly<Record<string, ThresholdRule>> = {
  cpu_usage: { type: "greater_than", threshold: "cpu", displayName: "CPU Usage" },
  memory_usage: { type: "greater_than", threshold: "memory", displayName: "Memory Usage" },
  cpu_temperature: { type: "greater_than", threshold: "temperature", displayName: "CPU Temperature" },
  rpi_gpu_temperature: { type: "greater_than", threshold: "temperature", displayName: "GPU Temperature" },
  rpi_under_voltage: { type: "binary_on", displayName: "Under Voltage" },
  rpi_throttled: { type: "binary_on", displayName: "Thermal Throttling" },
  rpi_temp_limited: { type: "binary_on", displayName: "Temperature Limited" },
};

const DISK_PREFIX = "disk_";
const DISK_USAGE_SUFFIX = "_usage";

export function isDiskUsageSensor(sensorId: string): boolean {
  return sensorId.startsWith(DISK_PREFIX) && sensorId.endsWith(DISK_USAGE_SUFFIX);
}

/**
 * Maps sensor ids to alert rules. Exact ids win over the disk usage pattern;
 * ids matching neither are not threshold-checked.
 */
export class ThresholdPolicy {
  private readonly rules: Map<string, RuleMatch>;
  private readonly diskThreshold: number | null;

  constructor(
    thresholds: ThresholdsConfig,
    rules: Readonly<Record<string, ThresholdRule>> = THRESHOLD_RULES
  ) {
    this.diskThreshold = limitOf(thresholds.disk);
    this.rules = new Map();

    for (const [sensorId, rule] of Object.entries(rules)) {
      this.rules.set(
        sensorId,
        rule.type === "binary_on"
          ? { type: "binary_on", threshold: null, displayName: rule.displayName }
          : {
              type: "greater_than",
              threshold: limitOf(thresholds[rule.threshold]),
              displayName: rule.displayName,
            }
      );
    }
  }

  resolve(sensorId: string): RuleMatch | null {
    const exact = this.rules.get(sensorId);
    if (exact) return exact;

    if (isDiskUsageSensor(sensorId)) {
      return {
        type: "greater_than",
        threshold: this.diskThreshold,
        displayName: `Disk Usage (${sensorId})`,
      };
    }

    return null;
  }
}

function limitOf(value: number | undefined): number | null {
  return typeof value === "number" && Number.isFinite(value) ? value : null;
}

const DIGITS = "\\d(?:_?\\d)*";
const DECIMAL_PATTERN = new RegExp(
  `^[+-]?(?:${DIGITS}(?:\\.(?:${DIGITS})?)?|\\.${DIGITS})(?:[eE][+-]?${DIGITS})?$`
);
const SPECIAL_PATTERN = /^([+-]?)(inf|infinity|nan)$/i;

/**
 * Numeric view of a sample value for greater-than comparison. Accepts decimal
 * notation only (optional sign, fraction, exponent and single underscores
 * between digits) plus inf/infinity/nan. Returns null when the value has no
 * numeric reading ("N/A", "", "on", "0x10"). NaN is returned as NaN and
 * compares false against any threshold.
 */
export function parseNumericValue(value: MetricValue): number | null {
  if (typeof value === "number") return value;

  const trimmed = value.trim();
  const special = SPECIAL_PATTERN.exec(trimmed);
  if (special) {
    if (special[2].toLowerCase() === "nan") return Number.NaN;
    return special[1] === "-" ? -Infinity : Infinity;
  }
  if (!DECIMAL_PATTERN.test(trimmed)) return null;
  return Number(trimmed.replace(/_/g, ""));
}
