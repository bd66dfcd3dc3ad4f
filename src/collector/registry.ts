import { CollectorTimeoutError } from "../errors.js";
import { debug, describeError } from "../logging/logger.js";
import type { Collector, MetricSample, SensorDescriptor } from "./types.js";

export interface CollectorRegistryOptions {
  /** Budget for one collector's initialize() or collect() call, in milliseconds. */
  timeout: number;
}

/**
 * Fans a tick out to every registered collector and merges what comes back.
 * One collector failing or timing out only removes its own samples.
 */
export class CollectorRegistry {
  private registered: Collector[];
  private active: Collector[] = [];
  private initialized = false;
  private timeout: number;

  constructor(collectors: Collector[], options: CollectorRegistryOptions) {
    this.registered = [...collectors];
    this.timeout = options.timeout;
  }

  async initialize(): Promise<void> {
    const active: Collector[] = [];

    for (const collector of this.registered) {
      try {
        await this.withTimeout(collector, () => collector.initialize());
        if (collector.isAvailable()) {
          active.push(collector);
          console.log(`[Collector] Initialized ${collector.name}`);
        } else {
          debug(`[Collector] ${collector.name} not available on this host`);
        }
      } catch (error) {
        console.warn(`[Collector] Failed to initialize ${collector.name}: ${describeError(error)}`);
      }
    }

    this.active = active;
    this.initialized = true;
    console.log(`[Collector] Active collectors: ${active.length}`);
  }

  getCollectors(): Collector[] {
    return this.initialized ? [...this.active] : [...this.registered];
  }

  /**
   * Union of every collector's descriptors. A sensor id declared twice keeps
   * the last declaration.
   */
  getSensorDescriptors(): SensorDescriptor[] {
    const byId = new Map<string, SensorDescriptor>();
    for (const collector of this.getCollectors()) {
      try {
        for (const descriptor of collector.sensorDescriptors()) {
          byId.set(descriptor.sensorId, descriptor);
        }
      } catch (error) {
        console.error(`[Collector] Failed to get sensor descriptors from ${collector.name}: ${describeError(error)}`);
      }
    }
    return Array.from(byId.values());
  }

  /**
   * Collects from all collectors concurrently. Output order is registration
   * order, then each collector's own emission order.
   */
  async collectAll(): Promise<MetricSample[]> {
    const collectors = this.getCollectors();
    const results = await Promise.allSettled(
      collectors.map((collector) => this.collectWithTimeout(collector))
    );

    const samples: MetricSample[] = [];
    results.forEach((result, index) => {
      if (result.status === "fulfilled") {
        samples.push(...result.value);
      } else {
        console.error(`[Collector] ${collectors[index].name} failed: ${describeError(result.reason)}`);
      }
    });

    return samples;
  }

  private collectWithTimeout(collector: Collector): Promise<MetricSample[]> {
    return this.withTimeout(collector, () => collector.collect());
  }

  private withTimeout<T>(collector: Collector, call: () => Promise<T>): Promise<T> {
    return new Promise((resolve, reject) => {
      const timer = setTimeout(
        () => reject(new CollectorTimeoutError(collector.name, this.timeout)),
        this.timeout
      );

      let pending: Promise<T>;
      try {
        pending = call();
      } catch (error) {
        clearTimeout(timer);
        reject(error);
        return;
      }

      pending.then(
        (value) => {
          clearTimeout(timer);
          resolve(value);
        },
        (error: unknown) => {
          clearTimeout(timer);
          reject(error);
        }
      );
    });
  }
}
