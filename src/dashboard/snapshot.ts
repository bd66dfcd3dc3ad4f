import type { MetricValue, MetricSample, SensorAttributes } from "../collector/types.js";

export type MetricsSnapshot = Record<string, { value: MetricValue; attributes: Readonly<SensorAttributes> }>;

/**
 * Latest reading per sensor. Each tick replaces the whole snapshot.
 */
export class SnapshotStore {
  private snapshot: MetricsSnapshot = {};
  private lastTick: number | null = null;

  update(samples: readonly MetricSample[], at: number = Date.now()): MetricsSnapshot {
    const next: MetricsSnapshot = {};
    for (const sample of samples) {
      next[sample.sensorId] = { value: sample.value, attributes: sample.attributes ?? {} };
    }
    this.snapshot = next;
    this.lastTick = at;
    return next;
  }

  getSnapshot(): MetricsSnapshot {
    return this.snapshot;
  }

  getLastTick(): number | null {
    return this.lastTick;
  }
}
