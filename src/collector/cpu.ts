import si from "systeminformation";
import { debug } from "../logging/logger.js";
import { BaseCollector, round, type MetricSample, type SensorDescriptor } from "./types.js";

export class CpuCollector extends BaseCollector {
  readonly name = "cpu";
  private coreCount = 1;
  private hasTemperature = false;

  async initialize(): Promise<void> {
    const cpu = await si.cpu();
    this.coreCount = cpu.cores || 1;
    this.hasTemperature = readTemperature(await si.cpuTemperature().catch(() => null)) !== null;
    debug(`[Collector] cpu: ${this.coreCount} cores, temperature ${this.hasTemperature ? "available" : "unavailable"}`);
  }

  async collect(): Promise<MetricSample[]> {
    const [load, speed, temperature] = await Promise.all([
      si.currentLoad(),
      si.cpuCurrentSpeed(),
      this.hasTemperature ? si.cpuTemperature().catch(() => null) : Promise.resolve(null),
    ]);

    const samples: MetricSample[] = [this.sample("cpu_usage", round(load.currentLoad, 1))];

    load.cpus.forEach((core, index) => {
      samples.push(this.sample(`cpu_core_${index}_usage`, round(core.load, 1)));
    });

    const celsius = readTemperature(temperature);
    if (celsius !== null) {
      samples.push(this.sample("cpu_temperature", round(celsius, 1)));
    }

    if (speed.avg > 0) {
      // systeminformation reports GHz
      samples.push(this.sample("cpu_frequency", Math.round(speed.avg * 1000)));
    }

    return samples;
  }

  sensorDescriptors(): SensorDescriptor[] {
    const descriptors: SensorDescriptor[] = [
      {
        sensorId: "cpu_usage",
        name: "CPU Usage",
        isBinary: false,
        stateClass: "measurement",
        unit: "%",
        icon: "mdi:cpu-64-bit",
        precision: 1,
      },
    ];

    for (let i = 0; i < this.coreCount; i++) {
      descriptors.push({
        sensorId: `cpu_core_${i}_usage`,
        name: `CPU Core ${i} Usage`,
        isBinary: false,
        stateClass: "measurement",
        unit: "%",
        icon: "mdi:chip",
        entityCategory: "diagnostic",
        precision: 1,
      });
    }

    if (this.hasTemperature) {
      descriptors.push({
        sensorId: "cpu_temperature",
        name: "CPU Temperature",
        isBinary: false,
        deviceClass: "temperature",
        stateClass: "measurement",
        unit: "°C",
        precision: 1,
      });
    }

    descriptors.push({
      sensorId: "cpu_frequency",
      name: "CPU Frequency",
      isBinary: false,
      deviceClass: "frequency",
      stateClass: "measurement",
      unit: "MHz",
      icon: "mdi:speedometer",
    });

    return descriptors;
  }
}

function readTemperature(data: { main: number | null } | null): number | null {
  if (!data || data.main === null) return null;
  return Number.isFinite(data.main) && data.main > 0 ? data.main : null;
}
