export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type SensorAttributes = Record<string, JsonValue>;

/** Numeric reading, or the literal "on"/"off" for binary conditions. */
export type MetricValue = number | string;

export interface MetricSample {
  readonly sensorId: string;
  readonly value: MetricValue;
  readonly attributes?: Readonly<SensorAttributes>;
}

export type StateClass = "measurement" | "total_increasing";
export type EntityCategory = "config" | "diagnostic";

/**
 * Static shape of a sensor, published once at startup for discovery.
 */
export interface SensorDescriptor {
  sensorId: string;
  name: string;
  isBinary: boolean;
  unit?: string;
  deviceClass?: string;
  stateClass?: StateClass;
  icon?: string;
  entityCategory?: EntityCategory;
  precision?: number;
  hasAttributes?: boolean;
}

export interface Collector {
  readonly name: string;
  /** One-time probe of the host. May fail; the collector is then dropped. */
  initialize(): Promise<void>;
  isAvailable(): boolean;
  collect(): Promise<MetricSample[]>;
  /** Must not fail. Called once, after initialize(). */
  sensorDescriptors(): SensorDescriptor[];
}

export abstract class BaseCollector implements Collector {
  abstract readonly name: string;

  async initialize(): Promise<void> {}

  isAvailable(): boolean {
    return true;
  }

  abstract collect(): Promise<MetricSample[]>;

  abstract sensorDescriptors(): SensorDescriptor[];

  protected sample(
    sensorId: string,
    value: MetricValue,
    attributes?: SensorAttributes
  ): MetricSample {
    return attributes ? { sensorId, value, attributes } : { sensorId, value };
  }
}

export function round(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

export const GIB = 1024 ** 3;
