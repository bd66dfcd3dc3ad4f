import type { MetricValue } from "../collector/types.js";

export interface AlertEvent {
  sensorId: string;
  displayName: string;
  value: MetricValue;
  threshold: number | null;
  timestamp: number;
}

export interface AlertState {
  isActive: boolean;
  lastNotifiedAt: number | null;
}

/**
 * Receives alert notifications. Fire-and-forget: implementations log their
 * own delivery failures and must not block the tick.
 */
export interface AlertSink {
  notify(event: AlertEvent): void;
}
