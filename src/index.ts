#!/usr/bin/env node
import "dotenv/config";
import { getUniqueIdPrefix, loadConfig } from "./config/loader.js";
import { createRegistry } from "./collector/index.js";
import { ThresholdPolicy } from "./rules/policy.js";
import { AlertEngine } from "./alerts/engine.js";
import type { AlertEvent } from "./alerts/types.js";
import { MqttPublisher } from "./mqtt/publisher.js";
import { buildDeviceInfo } from "./mqtt/device.js";
import { DashboardServer } from "./dashboard/server.js";
import { SnapshotStore } from "./dashboard/snapshot.js";
import { DiscordNotifier } from "./notifications/discord.js";
import { MonitorLoop } from "./scheduler/loop.js";
import { BusConnectionError } from "./errors.js";
import { VERSION } from "./version.js";

async function main() {
  console.log(`sysmon-bridge v${VERSION} starting...\n`);

  const config = loadConfig(process.env.SYSMON_CONFIG);
  const uniqueIdPrefix = getUniqueIdPrefix(config);
  console.log(`[Config] Hostname: ${config.hostname}, interval: ${config.collector.interval}s`);

  // The broker is the one dependency the service cannot run without
  const publisher = new MqttPublisher(config.mqtt, { uniqueIdPrefix });
  await publisher.connect();

  const registry = createRegistry(config);
  await registry.initialize();

  const descriptors = registry.getSensorDescriptors();
  const device = await buildDeviceInfo(config);
  publisher.publishDiscovery(device, descriptors);

  const engine = new AlertEngine(new ThresholdPolicy(config.thresholds), {
    enabled: config.alerts.enabled,
    cooldown: config.alerts.cooldown,
    maxHistory: config.alerts.maxHistory,
  });
  engine.addSink(publisher);

  const discord = new DiscordNotifier(config.discord.webhookUrl, config.discord.enabled);
  if (discord.isEnabled()) {
    engine.addSink(discord);
    console.log("Discord notifications enabled");
  }

  const store = new SnapshotStore();

  let dashboard: DashboardServer | null = null;
  if (config.dashboard.enabled) {
    dashboard = new DashboardServer(
      { port: config.dashboard.port, ingressPath: config.dashboard.ingressPath },
      {
        getSnapshot: () => store.getSnapshot(),
        getLastTick: () => store.getLastTick(),
        getSensors: () => descriptors,
        getActiveAlerts: () => engine.getActiveSensors(),
        getRecentAlerts: () => engine.getRecentAlerts(),
      }
    );
    await dashboard.start();

    const server = dashboard;
    engine.on("alert", (event: AlertEvent) => server.broadcastAlert(event));
  }

  const loop = new MonitorLoop(
    {
      collect: () => registry.collectAll(),
      evaluate: (samples) => engine.evaluate(samples),
      publish: (samples) => publisher.publishStates(samples),
      onSnapshot: (samples) => {
        const snapshot = store.update(samples);
        dashboard?.broadcastMetrics(snapshot);
      },
    },
    { interval: config.collector.interval }
  );

  const running = loop.run();
  console.log("\nsysmon-bridge running. Press Ctrl+C to stop.\n");

  let stopping = false;
  const shutdown = async () => {
    if (stopping) return;
    stopping = true;
    console.log("\nShutting down...");

    loop.stop();
    await running;

    if (dashboard) {
      await dashboard.stop();
    }
    await publisher.disconnect();

    process.exit(0);
  };

  const onSignal = () => {
    shutdown().catch((error) => {
      console.error("Error during shutdown:", error);
      process.exit(1);
    });
  };
  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);
}

main().catch((error) => {
  if (error instanceof BusConnectionError) {
    console.error(`[MQTT] ${error.message}`);
  } else {
    console.error("Fatal error:", error);
  }
  process.exit(1);
});
