import si from "systeminformation";
import { BaseCollector, type MetricSample, type SensorDescriptor } from "./types.js";

const MAX_REPORTED_PORTS = 50;

export type ListeningPort = {
  port: number;
  protocol: string;
  address: string;
  service: string;
  pid: number | null;
};

interface Connection {
  protocol: string;
  localAddress: string;
  localPort: string;
  state: string;
  pid: number;
  process: string;
}

export function listeningPorts(connections: Connection[]): ListeningPort[] {
  return connections
    .filter((c) => c.state === "LISTEN")
    .map((c) => ({
      port: parseInt(c.localPort, 10),
      protocol: c.protocol.startsWith("udp") ? "udp" : "tcp",
      address: c.localAddress,
      service: c.process || "unknown",
      pid: c.pid > 0 ? c.pid : null,
    }))
    .filter((p) => !Number.isNaN(p.port))
    .sort((a, b) => a.port - b.port);
}

export function connectionStates(connections: Connection[]): Record<string, number> {
  const counts: Record<string, number> = {};
  for (const connection of connections) {
    const state = connection.state || "NONE";
    counts[state] = (counts[state] ?? 0) + 1;
  }
  return counts;
}

export class SecurityCollector extends BaseCollector {
  readonly name = "security";

  async collect(): Promise<MetricSample[]> {
    const connections = await si.networkConnections();
    const ports = listeningPorts(connections);
    const states = connectionStates(connections);
    const total = Object.values(states).reduce((sum, n) => sum + n, 0);

    return [
      this.sample("open_ports", ports.length, { ports: ports.slice(0, MAX_REPORTED_PORTS) }),
      this.sample("active_connections", states.ESTABLISHED ?? 0, { ...states }),
      this.sample("total_connections", total),
      this.sample("listening_sockets", states.LISTEN ?? 0),
    ];
  }

  sensorDescriptors(): SensorDescriptor[] {
    return [
      {
        sensorId: "open_ports",
        name: "Open Ports",
        isBinary: false,
        stateClass: "measurement",
        icon: "mdi:lan-connect",
        hasAttributes: true,
      },
      {
        sensorId: "active_connections",
        name: "Active Connections",
        isBinary: false,
        stateClass: "measurement",
        icon: "mdi:lan-pending",
        hasAttributes: true,
      },
      {
        sensorId: "total_connections",
        name: "Total Connections",
        isBinary: false,
        stateClass: "measurement",
        icon: "mdi:lan",
        entityCategory: "diagnostic",
      },
      {
        sensorId: "listening_sockets",
        name: "Listening Sockets",
        isBinary: false,
        stateClass: "measurement",
        icon: "mdi:server-network",
        entityCategory: "diagnostic",
      },
    ];
  }
}
