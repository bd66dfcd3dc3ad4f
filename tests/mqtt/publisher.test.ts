import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { EventEmitter } from "events";

class FakeClient extends EventEmitter {
  publish = vi.fn(
    (_topic: string, _payload: string, _opts: unknown, callback?: (error?: Error) => void) => {
      callback?.();
      return this;
    }
  );
  end = vi.fn();
  endAsync = vi.fn(async () => {});
}

const { connect, clients } = vi.hoisted(() => {
  const clients: FakeClient[] = [];
  return { clients, connect: vi.fn() };
});

vi.mock("mqtt", () => ({ connect }));

import { MqttPublisher } from "../../src/mqtt/publisher.js";
import { BusConnectionError } from "../../src/errors.js";
import type { MqttConfig } from "../../src/config/loader.js";
import type { DeviceInfo } from "../../src/mqtt/discovery.js";

const config: MqttConfig = {
  host: "broker.local",
  port: 1883,
  username: "monitor",
  password: "test-secret",
  topicPrefix: "sysmon_bridge",
  discoveryPrefix: "homeassistant",
};

const device: DeviceInfo = {
  identifiers: ["sysmon_bridge_pi"],
  name: "System Monitor (pi)",
  model: "Linux x64",
  manufacturer: "sysmon-bridge",
  sw_version: "0.3.0",
  hw_version: "Debian 12",
};

function lastClient(): FakeClient {
  const client = clients[clients.length - 1];
  if (!client) throw new Error("no client created");
  return client;
}

async function connected(): Promise<{ publisher: MqttPublisher; client: FakeClient }> {
  const publisher = new MqttPublisher(config, { uniqueIdPrefix: "sysmon_bridge_pi" });
  const pending = publisher.connect();
  const client = lastClient();
  client.emit("connect");
  await pending;
  client.publish.mockClear();
  return { publisher, client };
}

describe("MqttPublisher", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
    clients.length = 0;
    connect.mockImplementation(() => {
      const client = new FakeClient();
      clients.push(client);
      return client;
    });
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("should connect with credentials and a retained offline will", async () => {
    const publisher = new MqttPublisher(config, { uniqueIdPrefix: "sysmon_bridge_pi" });
    const pending = publisher.connect();
    const client = lastClient();
    client.emit("connect");
    await pending;

    expect(connect).toHaveBeenCalledWith(
      "mqtt://broker.local:1883",
      expect.objectContaining({
        clientId: "sysmon_bridge_pi",
        username: "monitor",
        password: "test-secret",
        will: { topic: "sysmon_bridge/status", payload: "offline", retain: true, qos: 0 },
      })
    );
    expect(client.publish).toHaveBeenCalledWith(
      "sysmon_bridge/status",
      "online",
      { retain: true, qos: 0 },
      expect.any(Function)
    );
    expect(publisher.isConnected()).toBe(true);
  });

  it("should fail with BusConnectionError when the broker does not answer in time", async () => {
    vi.useFakeTimers();
    const publisher = new MqttPublisher(config, { uniqueIdPrefix: "sysmon_bridge_pi", connectTimeoutMs: 30_000 });

    const pending = publisher.connect();
    const assertion = expect(pending).rejects.toBeInstanceOf(BusConnectionError);
    await vi.advanceTimersByTimeAsync(30_000);

    await assertion;
    await expect(pending).rejects.toThrow("Failed to connect to MQTT broker within 30 seconds");
    expect(lastClient().end).toHaveBeenCalledWith(true);
  });

  it("should publish retained discovery per sensor", async () => {
    const { publisher, client } = await connected();

    publisher.publishDiscovery(device, [
      { sensorId: "cpu_usage", name: "CPU Usage", isBinary: false, unit: "%" },
      { sensorId: "rpi_throttled", name: "RPi Throttled", isBinary: true },
    ]);

    const calls = client.publish.mock.calls.map(([topic, payload, opts]) => ({
      topic,
      payload: JSON.parse(payload),
      opts,
    }));
    expect(calls.map((c) => c.topic)).toEqual([
      "homeassistant/sensor/sysmon_bridge_pi_cpu_usage/config",
      "homeassistant/binary_sensor/sysmon_bridge_pi_rpi_throttled/config",
    ]);
    expect(calls[0].opts).toEqual({ retain: true, qos: 0 });
    expect(calls[0].payload.unit_of_measurement).toBe("%");
    expect(calls[1].payload.payload_on).toBe("on");
  });

  it("should publish states and attributes without retain", async () => {
    const { publisher, client } = await connected();

    publisher.publishStates([
      { sensorId: "cpu_usage", value: 12.5 },
      { sensorId: "network_ip_address", value: "192.168.1.20", attributes: { interfaces: {} } },
    ]);

    expect(client.publish.mock.calls.map(([topic, payload, opts]) => [topic, payload, opts])).toEqual([
      ["sysmon_bridge/sensor/cpu_usage/state", "12.5", { retain: false, qos: 0 }],
      ["sysmon_bridge/sensor/network_ip_address/state", "192.168.1.20", { retain: false, qos: 0 }],
      ["sysmon_bridge/sensor/network_ip_address/attributes", '{"interfaces":{}}', { retain: false, qos: 0 }],
    ]);
  });

  it("should publish alert events as JSON", async () => {
    const { publisher, client } = await connected();

    publisher.notify({
      sensorId: "cpu_usage",
      displayName: "CPU Usage",
      value: 95,
      threshold: 90,
      timestamp: 0,
    });

    expect(client.publish).toHaveBeenCalledWith(
      "sysmon_bridge/alerts",
      '{"sensor":"cpu_usage","name":"CPU Usage","value":95,"threshold":90}',
      { retain: false, qos: 0 },
      expect.any(Function)
    );
  });

  it("should log publish failures instead of throwing", async () => {
    const { publisher, client } = await connected();
    client.publish.mockImplementationOnce((_topic, _payload, _opts, callback) => {
      callback?.(new Error("client disconnecting"));
      return client;
    });

    publisher.publishStates([{ sensorId: "uptime", value: 10 }]);

    expect(console.error).toHaveBeenCalledWith(
      "[MQTT] Publish to sysmon_bridge/sensor/uptime/state failed: client disconnecting"
    );
  });

  it("should publish offline before closing", async () => {
    const { publisher, client } = await connected();

    await publisher.disconnect();

    expect(client.publish).toHaveBeenCalledWith(
      "sysmon_bridge/status",
      "offline",
      { retain: true, qos: 0 },
      expect.any(Function)
    );
    expect(client.endAsync).toHaveBeenCalledTimes(1);
    expect(publisher.isConnected()).toBe(false);
  });
});
