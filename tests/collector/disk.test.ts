import { describe, it, expect, beforeEach, vi } from "vitest";

const { fsSize } = vi.hoisted(() => ({ fsSize: vi.fn() }));

vi.mock("systeminformation", () => ({
  default: { fsSize },
}));

import { DiskCollector, sanitizeMountPoint } from "../../src/collector/disk.js";

const GIB = 1024 ** 3;

function fs(mount: string, type: string, size: number, use = 50, available = size / 2) {
  return { fs: `/dev/${mount.replace(/\//g, "") || "root"}`, mount, type, size, used: size - available, available, use, rw: true };
}

describe("sanitizeMountPoint", () => {
  it("should map the root mount to root", () => {
    expect(sanitizeMountPoint("/")).toBe("root");
  });

  it("should strip leading slashes and replace separators", () => {
    expect(sanitizeMountPoint("/mnt/data")).toBe("mnt_data");
    expect(sanitizeMountPoint("/media/usb-drive")).toBe("media_usb_drive");
    expect(sanitizeMountPoint("//srv")).toBe("srv");
  });

  it("should drop characters outside the id alphabet", () => {
    expect(sanitizeMountPoint("/mnt/my disk.1")).toBe("mnt_mydisk1");
  });

  it("should fall back to disk when nothing is left", () => {
    expect(sanitizeMountPoint("/.$")).toBe("disk");
  });
});

describe("DiskCollector", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    fsSize.mockReset();
  });

  it("should skip virtual, empty and duplicate filesystems", async () => {
    fsSize.mockResolvedValue([
      fs("/", "ext4", 100 * GIB),
      fs("/dev/shm", "tmpfs", 2 * GIB),
      fs("/snap/core", "squashfs", GIB),
      fs("/mnt/empty", "ext4", 0),
      fs("/", "ext4", 100 * GIB),
      fs("/mnt/data", "xfs", 500 * GIB),
    ]);
    const collector = new DiskCollector();

    await collector.initialize();

    expect(collector.getPartitions().map((p) => p.sensorId)).toEqual(["disk_root", "disk_mnt_data"]);
  });

  it("should restrict to monitored mount points when given", async () => {
    fsSize.mockResolvedValue([fs("/", "ext4", 100 * GIB), fs("/mnt/data", "xfs", 500 * GIB)]);
    const collector = new DiskCollector(["/mnt/data"]);

    await collector.initialize();

    expect(collector.getPartitions().map((p) => p.mount)).toEqual(["/mnt/data"]);
  });

  it("should emit usage, free and total per partition", async () => {
    fsSize.mockResolvedValue([fs("/", "ext4", 100 * GIB, 72.345, 27.5 * GIB)]);
    const collector = new DiskCollector();
    await collector.initialize();

    const samples = await collector.collect();

    expect(samples).toEqual([
      { sensorId: "disk_root_usage", value: 72.3 },
      { sensorId: "disk_root_free", value: 27.5 },
      { sensorId: "disk_root_total", value: 100 },
    ]);
  });

  it("should skip partitions that disappeared since startup", async () => {
    fsSize.mockResolvedValueOnce([fs("/", "ext4", 100 * GIB), fs("/mnt/usb", "vfat", 8 * GIB)]);
    const collector = new DiskCollector();
    await collector.initialize();

    fsSize.mockResolvedValueOnce([fs("/", "ext4", 100 * GIB, 10)]);
    const samples = await collector.collect();

    expect(samples.map((s) => s.sensorId)).toEqual(["disk_root_usage", "disk_root_free", "disk_root_total"]);
  });

  it("should describe each partition with its mount label", async () => {
    fsSize.mockResolvedValue([fs("/", "ext4", 100 * GIB), fs("/mnt/data", "xfs", 500 * GIB)]);
    const collector = new DiskCollector();
    await collector.initialize();

    const names = collector.sensorDescriptors().map((d) => d.name);

    expect(names).toEqual([
      "Disk Usage Root",
      "Disk Free Root",
      "Disk Total Root",
      "Disk Usage /mnt/data",
      "Disk Free /mnt/data",
      "Disk Total /mnt/data",
    ]);
  });
});
