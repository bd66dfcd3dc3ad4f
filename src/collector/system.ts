import { loadavg } from "os";
import si from "systeminformation";
import { BaseCollector, round, type MetricSample, type SensorDescriptor } from "./types.js";

export type StaticSystemInfo = {
  os: string;
  os_version: string;
  kernel: string;
  architecture: string;
  hostname: string;
  cpu_model: string;
  runtime_version: string;
};

export class SystemCollector extends BaseCollector {
  readonly name = "system";
  private info: StaticSystemInfo | null = null;

  async initialize(): Promise<void> {
    const [os, cpu] = await Promise.all([si.osInfo(), si.cpu()]);
    this.info = {
      os: os.platform,
      os_version: [os.distro, os.release].filter(Boolean).join(" ") || `${os.platform} ${os.kernel}`,
      kernel: os.kernel,
      architecture: os.arch,
      hostname: os.hostname,
      cpu_model: [cpu.manufacturer, cpu.brand].filter(Boolean).join(" ") || "Unknown",
      runtime_version: process.version,
    };
  }

  async collect(): Promise<MetricSample[]> {
    const processes = await si.processes();
    const time = si.time();
    const [load1, load5, load15] = loadavg();

    const samples: MetricSample[] = [
      this.sample("uptime", Math.floor(time.uptime)),
      this.sample("process_count", processes.all),
      this.sample("load_1m", round(load1, 2)),
      this.sample("load_5m", round(load5, 2)),
      this.sample("load_15m", round(load15, 2)),
    ];

    if (this.info) {
      samples.push(this.sample("system_info", this.info.os_version, { ...this.info }));
    }

    return samples;
  }

  sensorDescriptors(): SensorDescriptor[] {
    const load = (sensorId: string, name: string, diagnostic: boolean): SensorDescriptor => ({
      sensorId,
      name,
      isBinary: false,
      stateClass: "measurement",
      icon: "mdi:gauge",
      entityCategory: diagnostic ? "diagnostic" : undefined,
      precision: 2,
    });

    return [
      {
        sensorId: "uptime",
        name: "System Uptime",
        isBinary: false,
        deviceClass: "duration",
        stateClass: "total_increasing",
        unit: "s",
        icon: "mdi:clock-outline",
      },
      {
        sensorId: "process_count",
        name: "Process Count",
        isBinary: false,
        stateClass: "measurement",
        icon: "mdi:format-list-numbered",
        entityCategory: "diagnostic",
      },
      load("load_1m", "Load Average 1m", false),
      load("load_5m", "Load Average 5m", true),
      load("load_15m", "Load Average 15m", true),
      {
        sensorId: "system_info",
        name: "System Info",
        isBinary: false,
        icon: "mdi:information",
        entityCategory: "diagnostic",
        hasAttributes: true,
      },
    ];
  }
}
