import { connect, type IClientOptions, type MqttClient } from "mqtt";
import type { AlertEvent, AlertSink } from "../alerts/types.js";
import type { MetricSample, SensorDescriptor } from "../collector/types.js";
import type { MqttConfig } from "../config/loader.js";
import { BusConnectionError } from "../errors.js";
import { debug, describeError } from "../logging/logger.js";
import { buildDiscoveryPayload, uniqueIdFor, type DeviceInfo } from "./discovery.js";
import { alertsTopic, attributesTopic, availabilityTopic, discoveryTopic, stateTopic } from "./topics.js";

const DEFAULT_CONNECT_TIMEOUT_MS = 30_000;

export interface MqttPublisherOptions {
  uniqueIdPrefix: string;
  connectTimeoutMs?: number;
}

export class MqttPublisher implements AlertSink {
  private client: MqttClient | null = null;
  private connected = false;
  private availability: string;
  private connectTimeoutMs: number;
  private uniqueIdPrefix: string;

  constructor(private config: MqttConfig, options: MqttPublisherOptions) {
    this.availability = availabilityTopic(config.topicPrefix);
    this.connectTimeoutMs = options.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS;
    this.uniqueIdPrefix = options.uniqueIdPrefix;
  }

  /**
   * Resolves once the broker accepts the session. Rejects with
   * BusConnectionError when that does not happen within the timeout.
   */
  connect(): Promise<void> {
    const options: IClientOptions = {
      clientId: this.uniqueIdPrefix,
      connectTimeout: this.connectTimeoutMs,
      reconnectPeriod: 5000,
      will: { topic: this.availability, payload: "offline", retain: true, qos: 0 },
    };
    if (this.config.username && this.config.password) {
      options.username = this.config.username;
      options.password = this.config.password;
    }

    console.log(`[MQTT] Connecting to broker at ${this.config.host}:${this.config.port}`);
    const client = connect(`mqtt://${this.config.host}:${this.config.port}`, options);
    this.client = client;

    client.on("connect", () => {
      this.connected = true;
      console.log("[MQTT] Connected to broker");
      this.publish(this.availability, "online", true);
    });
    client.on("close", () => {
      if (this.connected) console.warn("[MQTT] Disconnected from broker");
      this.connected = false;
    });
    client.on("error", (error) => {
      console.error(`[MQTT] Connection error: ${error.message}`);
    });

    return new Promise((resolve, reject) => {
      const timer = setTimeout(() => {
        client.removeListener("connect", onConnect);
        client.end(true);
        this.client = null;
        reject(
          new BusConnectionError(
            `Failed to connect to MQTT broker within ${Math.round(this.connectTimeoutMs / 1000)} seconds`
          )
        );
      }, this.connectTimeoutMs);

      const onConnect = () => {
        clearTimeout(timer);
        resolve();
      };
      client.once("connect", onConnect);
    });
  }

  isConnected(): boolean {
    return this.connected;
  }

  publishDiscovery(device: DeviceInfo, descriptors: SensorDescriptor[]): void {
    console.log(`[MQTT] Publishing discovery for ${descriptors.length} sensors`);

    for (const descriptor of descriptors) {
      const payload = buildDiscoveryPayload(descriptor, {
        topicPrefix: this.config.topicPrefix,
        uniqueIdPrefix: this.uniqueIdPrefix,
        device,
      });
      const topic = discoveryTopic(
        this.config.discoveryPrefix,
        descriptor.isBinary,
        uniqueIdFor(this.uniqueIdPrefix, descriptor.sensorId)
      );
      this.publish(topic, JSON.stringify(payload), true);
      debug(`[MQTT] Published discovery for ${descriptor.name}`);
    }
  }

  publishStates(samples: readonly MetricSample[]): void {
    for (const sample of samples) {
      this.publish(stateTopic(this.config.topicPrefix, sample.sensorId), String(sample.value), false);
      if (sample.attributes) {
        this.publish(
          attributesTopic(this.config.topicPrefix, sample.sensorId),
          JSON.stringify(sample.attributes),
          false
        );
      }
    }
  }

  notify(event: AlertEvent): void {
    const message = {
      sensor: event.sensorId,
      name: event.displayName,
      value: event.value,
      threshold: event.threshold,
    };
    this.publish(alertsTopic(this.config.topicPrefix), JSON.stringify(message), false);
  }

  async disconnect(): Promise<void> {
    const client = this.client;
    if (!client) return;

    this.publish(this.availability, "offline", true);
    this.client = null;
    this.connected = false;
    await client.endAsync();
    console.log("[MQTT] Disconnected from broker");
  }

  private publish(topic: string, payload: string, retain: boolean): void {
    if (!this.client) {
      debug(`[MQTT] Not connected, dropping message for ${topic}`);
      return;
    }
    this.client.publish(topic, payload, { retain, qos: 0 }, (error) => {
      if (error) console.error(`[MQTT] Publish to ${topic} failed: ${describeError(error)}`);
    });
  }
}
