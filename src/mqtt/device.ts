import { readFileSync } from "fs";
import { arch, platform, release } from "os";
import si from "systeminformation";
import type { Config } from "../config/loader.js";
import { getUniqueIdPrefix } from "../config/loader.js";
import { debug, describeError } from "../logging/logger.js";
import { VERSION } from "../version.js";
import type { DeviceInfo } from "./discovery.js";

const DEVICE_TREE_MODEL = "/proc/device-tree/model";

export function readHardwareModel(modelPath = DEVICE_TREE_MODEL): string {
  try {
    // The device tree string is NUL-terminated
    const model = readFileSync(modelPath, "utf-8").replace(/\0/g, "").trim();
    if (model) return model;
  } catch (error) {
    debug(`[MQTT] No device tree model: ${describeError(error)}`);
  }
  return `${platform()} ${arch()}`;
}

export async function readOsVersion(): Promise<string> {
  try {
    const os = await si.osInfo();
    const pretty = [os.distro, os.release].filter(Boolean).join(" ");
    if (pretty) return pretty;
  } catch (error) {
    debug(`[MQTT] Could not read OS info: ${describeError(error)}`);
  }
  return `${platform()} ${release()}`;
}

export async function buildDeviceInfo(config: Pick<Config, "hostname">): Promise<DeviceInfo> {
  const device: DeviceInfo = {
    identifiers: [getUniqueIdPrefix(config)],
    name: `System Monitor (${config.hostname})`,
    model: readHardwareModel(),
    manufacturer: "sysmon-bridge",
    sw_version: VERSION,
    hw_version: await readOsVersion(),
  };

  console.log(`[MQTT] Device registered: ${device.name} (${device.model}, ${device.hw_version})`);
  return device;
}
