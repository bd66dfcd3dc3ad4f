import si from "systeminformation";
import { BaseCollector, GIB, round, type MetricSample, type SensorDescriptor } from "./types.js";

const EXCLUDED_INTERFACES = new Set(["lo", "localhost"]);

export type InterfaceAddresses = {
  ipv4: string | null;
  ipv6: string | null;
  mac: string | null;
};

interface InterfaceInfo {
  iface: string;
  ip4: string;
  ip6: string;
  mac: string;
  internal: boolean;
  operstate: string;
}

/**
 * Addressed, non-loopback interfaces that are not down. Link-local IPv6 is
 * not reported.
 */
export function selectInterfaces(interfaces: InterfaceInfo[]): Record<string, InterfaceAddresses> {
  const selected: Record<string, InterfaceAddresses> = {};

  for (const iface of interfaces) {
    if (EXCLUDED_INTERFACES.has(iface.iface.toLowerCase()) || iface.internal) continue;
    if (iface.operstate === "down") continue;

    const ipv4 = iface.ip4 || null;
    const ipv6 = iface.ip6 && !iface.ip6.toLowerCase().startsWith("fe80") ? iface.ip6 : null;
    if (!ipv4 && !ipv6) continue;

    selected[iface.iface] = { ipv4, ipv6, mac: iface.mac || null };
  }

  return selected;
}

export function primaryIpv4(interfaces: Record<string, InterfaceAddresses>): string {
  for (const info of Object.values(interfaces)) {
    if (info.ipv4 && !info.ipv4.startsWith("127.")) return info.ipv4;
  }
  return "unknown";
}

export class NetworkCollector extends BaseCollector {
  readonly name = "network";
  private interfaces: Record<string, InterfaceAddresses> = {};

  async initialize(): Promise<void> {
    const result = await si.networkInterfaces();
    this.interfaces = selectInterfaces(Array.isArray(result) ? result : [result]);
    console.log(`[Collector] Monitoring ${Object.keys(this.interfaces).length} network interfaces`);
  }

  async collect(): Promise<MetricSample[]> {
    const stats = await si.networkStats("*");
    const counted = stats.filter((s) => !EXCLUDED_INTERFACES.has(s.iface.toLowerCase()));

    const sum = (pick: (s: (typeof counted)[number]) => number) =>
      counted.reduce((total, s) => total + (pick(s) || 0), 0);

    return [
      this.sample("network_bytes_sent", round(sum((s) => s.tx_bytes) / GIB, 3)),
      this.sample("network_bytes_recv", round(sum((s) => s.rx_bytes) / GIB, 3)),
      this.sample("network_errors", sum((s) => s.rx_errors) + sum((s) => s.tx_errors)),
      this.sample("network_drops", sum((s) => s.rx_dropped) + sum((s) => s.tx_dropped)),
      this.sample("network_ip_address", primaryIpv4(this.interfaces), {
        interfaces: { ...this.interfaces },
      }),
    ];
  }

  sensorDescriptors(): SensorDescriptor[] {
    return [
      {
        sensorId: "network_bytes_sent",
        name: "Network Bytes Sent",
        isBinary: false,
        deviceClass: "data_size",
        stateClass: "total_increasing",
        unit: "GB",
        icon: "mdi:upload-network",
        precision: 3,
      },
      {
        sensorId: "network_bytes_recv",
        name: "Network Bytes Received",
        isBinary: false,
        deviceClass: "data_size",
        stateClass: "total_increasing",
        unit: "GB",
        icon: "mdi:download-network",
        precision: 3,
      },
      {
        sensorId: "network_errors",
        name: "Network Errors",
        isBinary: false,
        stateClass: "total_increasing",
        icon: "mdi:alert-circle",
        entityCategory: "diagnostic",
      },
      {
        sensorId: "network_drops",
        name: "Network Drops",
        isBinary: false,
        stateClass: "total_increasing",
        icon: "mdi:alert-circle",
        entityCategory: "diagnostic",
      },
      {
        sensorId: "network_ip_address",
        name: "IP Address",
        isBinary: false,
        icon: "mdi:ip-network",
        hasAttributes: true,
      },
    ];
  }
}
