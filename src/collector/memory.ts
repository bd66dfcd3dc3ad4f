import si from "systeminformation";
import { BaseCollector, GIB, round, type MetricSample, type SensorDescriptor } from "./types.js";

export class MemoryCollector extends BaseCollector {
  readonly name = "memory";
  private hasSwap = false;

  async initialize(): Promise<void> {
    const mem = await si.mem();
    this.hasSwap = mem.swaptotal > 0;
  }

  async collect(): Promise<MetricSample[]> {
    const mem = await si.mem();
    const available = mem.available || mem.free;
    const used = mem.total - available;

    const samples: MetricSample[] = [
      this.sample("memory_usage", mem.total > 0 ? round((used / mem.total) * 100, 1) : 0),
      this.sample("memory_total", round(mem.total / GIB, 2)),
      this.sample("memory_used", round(used / GIB, 2)),
      this.sample("memory_available", round(available / GIB, 2)),
    ];

    if (this.hasSwap) {
      const swapPercent = mem.swaptotal > 0 ? (mem.swapused / mem.swaptotal) * 100 : 0;
      samples.push(
        this.sample("swap_usage", round(swapPercent, 1)),
        this.sample("swap_used", round(mem.swapused / GIB, 2)),
        this.sample("swap_total", round(mem.swaptotal / GIB, 2))
      );
    }

    return samples;
  }

  sensorDescriptors(): SensorDescriptor[] {
    const gigabytes = (sensorId: string, name: string, diagnostic = false): SensorDescriptor => ({
      sensorId,
      name,
      isBinary: false,
      deviceClass: "data_size",
      stateClass: "measurement",
      unit: "GB",
      icon: sensorId.startsWith("swap") ? "mdi:harddisk" : "mdi:memory",
      entityCategory: diagnostic ? "diagnostic" : undefined,
      precision: 2,
    });

    const descriptors: SensorDescriptor[] = [
      {
        sensorId: "memory_usage",
        name: "Memory Usage",
        isBinary: false,
        stateClass: "measurement",
        unit: "%",
        icon: "mdi:memory",
        precision: 1,
      },
      gigabytes("memory_total", "Memory Total", true),
      gigabytes("memory_used", "Memory Used"),
      gigabytes("memory_available", "Memory Available"),
    ];

    if (this.hasSwap) {
      descriptors.push(
        {
          sensorId: "swap_usage",
          name: "Swap Usage",
          isBinary: false,
          stateClass: "measurement",
          unit: "%",
          icon: "mdi:harddisk",
          entityCategory: "diagnostic",
          precision: 1,
        },
        gigabytes("swap_used", "Swap Used", true),
        gigabytes("swap_total", "Swap Total", true)
      );
    }

    return descriptors;
  }
}
