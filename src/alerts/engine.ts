import { EventEmitter } from "events";
import type { MetricSample } from "../collector/types.js";
import type { ThresholdPolicy } from "../rules/policy.js";
import { parseNumericValue } from "../rules/policy.js";
import { debug, describeError } from "../logging/logger.js";
import type { AlertEvent, AlertSink, AlertState } from "./types.js";

export interface AlertEngineOptions {
  enabled: boolean;
  /** Seconds. */
  cooldown: number;
  maxHistory?: number;
  now?: () => number;
}

/**
 * Per-sensor two-state machine (inactive/active). A rising edge always
 * notifies; a standing violation re-notifies once the cooldown has elapsed;
 * returning to normal is silent.
 */
export class AlertEngine extends EventEmitter {
  private states: Map<string, AlertState> = new Map();
  private history: AlertEvent[] = [];
  private sinks: AlertSink[] = [];
  private enabled: boolean;
  private cooldownMs: number;
  private maxHistory: number;
  private now: () => number;

  constructor(private policy: ThresholdPolicy, options: AlertEngineOptions) {
    super();
    this.enabled = options.enabled;
    this.cooldownMs = options.cooldown * 1000;
    this.maxHistory = options.maxHistory ?? 100;
    this.now = options.now ?? Date.now;
  }

  addSink(sink: AlertSink): void {
    this.sinks.push(sink);
  }

  evaluate(batch: readonly MetricSample[]): AlertEvent[] {
    if (!this.enabled) return [];

    const now = this.now();
    const events: AlertEvent[] = [];

    for (const sample of batch) {
      const rule = this.policy.resolve(sample.sensorId);
      if (!rule) continue;

      let conditionMet = false;
      if (rule.type === "binary_on") {
        conditionMet = sample.value === "on";
      } else if (rule.threshold !== null) {
        const value = parseNumericValue(sample.value);
        // No decision this tick; state stays as it was
        if (value === null) continue;
        conditionMet = value > rule.threshold;
      }

      const state = this.states.get(sample.sensorId) ?? { isActive: false, lastNotifiedAt: null };
      const wasActive = state.isActive;
      state.isActive = conditionMet;
      this.states.set(sample.sensorId, state);

      if (!conditionMet) {
        if (wasActive) debug(`[Alert] ${rule.displayName} back to normal (${sample.value})`);
        continue;
      }

      const cooledDown =
        state.lastNotifiedAt === null || now - state.lastNotifiedAt >= this.cooldownMs;
      if (wasActive && !cooledDown) continue;

      state.lastNotifiedAt = now;
      const event: AlertEvent = {
        sensorId: sample.sensorId,
        displayName: rule.displayName,
        value: sample.value,
        threshold: rule.threshold,
        timestamp: now,
      };
      events.push(event);
      this.dispatch(event);
    }

    return events;
  }

  private dispatch(event: AlertEvent): void {
    if (event.threshold !== null) {
      console.warn(`[Alert] ${event.displayName} = ${event.value} (threshold: ${event.threshold})`);
    } else {
      console.warn(`[Alert] ${event.displayName} is active`);
    }

    this.addToHistory(event);
    this.emit("alert", event);

    for (const sink of this.sinks) {
      try {
        sink.notify(event);
      } catch (error) {
        console.error(`[Alert] Sink failed for ${event.sensorId}: ${describeError(error)}`);
      }
    }
  }

  private addToHistory(event: AlertEvent): void {
    this.history.push(event);
    if (this.history.length > this.maxHistory) {
      this.history.shift();
    }
  }

  getState(sensorId: string): Readonly<AlertState> | undefined {
    const state = this.states.get(sensorId);
    return state ? { ...state } : undefined;
  }

  getActiveSensors(): string[] {
    return Array.from(this.states.entries())
      .filter(([, state]) => state.isActive)
      .map(([sensorId]) => sensorId);
  }

  getRecentAlerts(): AlertEvent[] {
    return [...this.history];
  }
}
