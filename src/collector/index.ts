import type { Config } from "../config/loader.js";
import { CpuCollector } from "./cpu.js";
import { DiskCollector } from "./disk.js";
import { MemoryCollector } from "./memory.js";
import { NetworkCollector } from "./network.js";
import { RaspberryPiCollector } from "./rpi.js";
import { CollectorRegistry } from "./registry.js";
import { SecurityCollector } from "./security.js";
import { SupervisorCollector } from "./supervisor.js";
import { SystemCollector } from "./system.js";
import type { Collector } from "./types.js";

export { CollectorRegistry } from "./registry.js";
export type { Collector, MetricSample, SensorDescriptor } from "./types.js";

/**
 * Builds the collector list in publication order, honouring feature toggles.
 */
export function createCollectors(config: Config): Collector[] {
  const collectors: Collector[] = [
    new CpuCollector(),
    new MemoryCollector(),
    new DiskCollector(config.disks.monitored),
    new NetworkCollector(),
    new SystemCollector(),
  ];

  if (config.features.securityMonitoring) {
    collectors.push(new SecurityCollector());
  }
  if (config.features.rpiMonitoring) {
    collectors.push(new RaspberryPiCollector());
  }
  if (config.supervisor.token) {
    collectors.push(new SupervisorCollector(config.supervisor.url, config.supervisor.token));
  }

  return collectors;
}

export function createRegistry(config: Config): CollectorRegistry {
  return new CollectorRegistry(createCollectors(config), { timeout: config.collector.timeout });
}
