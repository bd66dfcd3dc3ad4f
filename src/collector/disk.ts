import si from "systeminformation";
import { debug } from "../logging/logger.js";
import { BaseCollector, GIB, round, type MetricSample, type SensorDescriptor } from "./types.js";

// Virtual and pseudo filesystems never reported as disks
export const EXCLUDED_FSTYPES = new Set([
  "squashfs", "tmpfs", "devtmpfs", "overlay", "aufs",
  "proc", "sysfs", "devpts", "cgroup", "cgroup2",
  "securityfs", "debugfs", "tracefs", "configfs",
  "fusectl", "mqueue", "hugetlbfs", "pstore",
  "binfmt_misc", "rpc_pipefs", "nfsd", "autofs",
]);

export interface DiskPartition {
  device: string;
  mount: string;
  fsType: string;
  /** Base sensor id, e.g. disk_root or disk_mnt_data. */
  sensorId: string;
}

/**
 * Deterministic sensor-id fragment for a mount point.
 */
export function sanitizeMountPoint(mount: string): string {
  if (mount === "/") return "root";
  const sanitized = mount
    .replace(/^\/+/, "")
    .replace(/[/-]/g, "_")
    .replace(/[^a-zA-Z0-9_]/g, "");
  return sanitized || "disk";
}

export class DiskCollector extends BaseCollector {
  readonly name = "disk";
  private partitions: DiskPartition[] = [];
  private monitored: Set<string>;

  constructor(monitoredDisks: string[] = []) {
    super();
    this.monitored = new Set(monitoredDisks);
  }

  async initialize(): Promise<void> {
    const filesystems = await si.fsSize();
    const partitions: DiskPartition[] = [];

    for (const fs of filesystems) {
      if (EXCLUDED_FSTYPES.has(fs.type)) continue;
      if (this.monitored.size > 0 && !this.monitored.has(fs.mount)) continue;
      if (!(fs.size > 0)) {
        debug(`[Collector] Skipping empty or inaccessible partition ${fs.mount}`);
        continue;
      }
      if (partitions.some((p) => p.mount === fs.mount)) continue;

      partitions.push({
        device: fs.fs,
        mount: fs.mount,
        fsType: fs.type,
        sensorId: `disk_${sanitizeMountPoint(fs.mount)}`,
      });
    }

    this.partitions = partitions;
    console.log(`[Collector] Monitoring ${partitions.length} disk partitions`);
  }

  getPartitions(): DiskPartition[] {
    return [...this.partitions];
  }

  async collect(): Promise<MetricSample[]> {
    const filesystems = await si.fsSize();
    const byMount = new Map(filesystems.map((fs) => [fs.mount, fs]));
    const samples: MetricSample[] = [];

    for (const partition of this.partitions) {
      const usage = byMount.get(partition.mount);
      if (!usage || !(usage.size > 0)) {
        debug(`[Collector] Failed to read disk ${partition.mount}`);
        continue;
      }

      samples.push(
        this.sample(`${partition.sensorId}_usage`, round(usage.use, 1)),
        this.sample(`${partition.sensorId}_free`, round(usage.available / GIB, 2)),
        this.sample(`${partition.sensorId}_total`, round(usage.size / GIB, 2))
      );
    }

    return samples;
  }

  sensorDescriptors(): SensorDescriptor[] {
    return this.partitions.flatMap((partition): SensorDescriptor[] => {
      const label = partition.mount !== "/" ? partition.mount : "Root";
      return [
        {
          sensorId: `${partition.sensorId}_usage`,
          name: `Disk Usage ${label}`,
          isBinary: false,
          stateClass: "measurement",
          unit: "%",
          icon: "mdi:harddisk",
          precision: 1,
        },
        {
          sensorId: `${partition.sensorId}_free`,
          name: `Disk Free ${label}`,
          isBinary: false,
          deviceClass: "data_size",
          stateClass: "measurement",
          unit: "GB",
          icon: "mdi:harddisk",
          entityCategory: "diagnostic",
          precision: 2,
        },
        {
          sensorId: `${partition.sensorId}_total`,
          name: `Disk Total ${label}`,
          isBinary: false,
          deviceClass: "data_size",
          stateClass: "measurement",
          unit: "GB",
          icon: "mdi:harddisk",
          entityCategory: "diagnostic",
          precision: 2,
        },
      ];
    });
  }
}
