import { readFileSync, existsSync } from "fs";
import { hostname } from "os";
import { resolve } from "path";
import yaml from "js-yaml";

export interface CollectorConfig {
  /** Seconds between ticks. */
  interval: number;
  /** Per-collector budget for one collect() call, in milliseconds. */
  timeout: number;
}

export interface ThresholdsConfig {
  cpu?: number;
  memory?: number;
  disk?: number;
  temperature?: number;
}

export interface AlertsConfig {
  enabled: boolean;
  /** Seconds between repeat notifications for a standing condition. */
  cooldown: number;
  maxHistory: number;
}

export interface FeaturesConfig {
  securityMonitoring: boolean;
  rpiMonitoring: boolean;
}

export interface DisksConfig {
  /** Mount points to watch; empty means every real filesystem. */
  monitored: string[];
}

export interface MqttConfig {
  host: string;
  port: number;
  username?: string;
  password?: string;
  topicPrefix: string;
  discoveryPrefix: string;
}

export interface SupervisorConfig {
  url: string;
  token: string;
}

export interface DashboardConfig {
  enabled: boolean;
  port: number;
  ingressPath: string;
}

export interface DiscordConfig {
  enabled: boolean;
  webhookUrl: string;
}

export interface Config {
  hostname: string;
  collector: CollectorConfig;
  thresholds: ThresholdsConfig;
  alerts: AlertsConfig;
  features: FeaturesConfig;
  disks: DisksConfig;
  mqtt: MqttConfig;
  supervisor: SupervisorConfig;
  dashboard: DashboardConfig;
  discord: DiscordConfig;
}

export type PartialConfig = {
  [K in keyof Config]?: Config[K] extends object ? Partial<Config[K]> : Config[K];
};

export const ADDON_OPTIONS_PATH = "/data/options.json";

export const defaultConfig: Config = {
  hostname: hostname() || "unknown",
  collector: {
    interval: 60,
    timeout: 9000,
  },
  thresholds: {
    cpu: 90,
    memory: 85,
    disk: 85,
    temperature: 80,
  },
  alerts: {
    enabled: true,
    cooldown: 300,
    maxHistory: 100,
  },
  features: {
    securityMonitoring: true,
    rpiMonitoring: true,
  },
  disks: {
    monitored: [],
  },
  mqtt: {
    host: "core-mosquitto",
    port: 1883,
    topicPrefix: "sysmon_bridge",
    discoveryPrefix: "homeassistant",
  },
  supervisor: {
    url: "http://supervisor",
    token: "",
  },
  dashboard: {
    enabled: true,
    port: 8099,
    ingressPath: "",
  },
  discord: {
    enabled: false,
    webhookUrl: "",
  },
};

export function loadConfig(
  configPath?: string,
  env: NodeJS.ProcessEnv = process.env
): Config {
  const paths = configPath
    ? [configPath]
    : [
        ADDON_OPTIONS_PATH,
        resolve(process.cwd(), "config/default.yaml"),
        resolve(process.cwd(), "config.yaml"),
      ];

  let loaded: PartialConfig = {};
  for (const path of paths) {
    if (!existsSync(path)) continue;
    try {
      const content = readFileSync(path, "utf-8");
      loaded = toPartialConfig(yaml.load(content));
      console.log(`[Config] Loaded configuration from ${path}`);
      break;
    } catch (error) {
      console.error(`[Config] Error loading config from ${path}:`, error);
    }
  }

  if (Object.keys(loaded).length === 0) {
    console.log("[Config] Using default configuration");
  }

  return normalizeConfig(applyEnv(mergeConfig(defaultConfig, loaded), env));
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

const ADDON_KEYS = [
  "update_interval",
  "cpu_threshold",
  "memory_threshold",
  "disk_threshold",
  "temp_threshold",
  "enable_security_monitoring",
  "enable_rpi_monitoring",
  "enable_alerts",
  "monitored_disks",
  "mqtt_topic_prefix",
  "alert_cooldown",
];

/**
 * Accepts either the nested YAML layout or the flat add-on options.json.
 */
export function toPartialConfig(raw: unknown): PartialConfig {
  if (!isRecord(raw)) return {};
  if (ADDON_KEYS.some((key) => key in raw)) {
    return fromAddonOptions(raw);
  }
  return raw as PartialConfig;
}

export function fromAddonOptions(options: Record<string, unknown>): PartialConfig {
  const num = (key: string): number | undefined => {
    const value = options[key];
    return typeof value === "number" ? value : undefined;
  };
  const bool = (key: string): boolean | undefined => {
    const value = options[key];
    return typeof value === "boolean" ? value : undefined;
  };

  const collector: Partial<CollectorConfig> = {};
  const thresholds: ThresholdsConfig = {};
  const alerts: Partial<AlertsConfig> = {};
  const features: Partial<FeaturesConfig> = {};
  const result: PartialConfig = { collector, thresholds, alerts, features };

  const interval = num("update_interval");
  if (interval !== undefined) collector.interval = interval;

  const cpu = num("cpu_threshold");
  if (cpu !== undefined) thresholds.cpu = cpu;
  const memory = num("memory_threshold");
  if (memory !== undefined) thresholds.memory = memory;
  const disk = num("disk_threshold");
  if (disk !== undefined) thresholds.disk = disk;
  const temperature = num("temp_threshold");
  if (temperature !== undefined) thresholds.temperature = temperature;

  const enabled = bool("enable_alerts");
  if (enabled !== undefined) alerts.enabled = enabled;
  const cooldown = num("alert_cooldown");
  if (cooldown !== undefined) alerts.cooldown = cooldown;

  const security = bool("enable_security_monitoring");
  if (security !== undefined) features.securityMonitoring = security;
  const rpi = bool("enable_rpi_monitoring");
  if (rpi !== undefined) features.rpiMonitoring = rpi;

  const monitored = options.monitored_disks;
  if (Array.isArray(monitored)) {
    result.disks = {
      monitored: monitored.filter((d): d is string => typeof d === "string"),
    };
  }

  const prefix = options.mqtt_topic_prefix;
  if (typeof prefix === "string" && prefix) {
    result.mqtt = { topicPrefix: prefix };
  }

  return result;
}

export function mergeConfig(defaults: Config, loaded: PartialConfig): Config {
  return {
    hostname: loaded.hostname ?? defaults.hostname,
    collector: { ...defaults.collector, ...loaded.collector },
    thresholds: { ...defaults.thresholds, ...loaded.thresholds },
    alerts: { ...defaults.alerts, ...loaded.alerts },
    features: { ...defaults.features, ...loaded.features },
    disks: { ...defaults.disks, ...loaded.disks },
    mqtt: { ...defaults.mqtt, ...loaded.mqtt },
    supervisor: { ...defaults.supervisor, ...loaded.supervisor },
    dashboard: { ...defaults.dashboard, ...loaded.dashboard },
    discord: { ...defaults.discord, ...loaded.discord },
  };
}

export function applyEnv(config: Config, env: NodeJS.ProcessEnv): Config {
  const port = env.MQTT_PORT ? parseInt(env.MQTT_PORT, 10) : NaN;
  const webhookUrl = env.DISCORD_WEBHOOK_URL || config.discord.webhookUrl;

  return {
    ...config,
    hostname: env.SYSTEM_HOSTNAME || env.HOSTNAME || config.hostname,
    mqtt: {
      ...config.mqtt,
      host: env.MQTT_HOST || config.mqtt.host,
      port: Number.isNaN(port) ? config.mqtt.port : port,
      username: env.MQTT_USERNAME || config.mqtt.username,
      password: env.MQTT_PASSWORD || config.mqtt.password,
    },
    supervisor: {
      ...config.supervisor,
      token: env.SUPERVISOR_TOKEN || config.supervisor.token,
    },
    dashboard: {
      ...config.dashboard,
      ingressPath: env.INGRESS_PATH ?? config.dashboard.ingressPath,
    },
    discord: {
      ...config.discord,
      enabled: config.discord.enabled || Boolean(env.DISCORD_WEBHOOK_URL),
      webhookUrl,
    },
  };
}

function finiteOrUndefined(value: unknown): number | undefined {
  return typeof value === "number" && Number.isFinite(value) ? value : undefined;
}

export function normalizeConfig(config: Config): Config {
  const interval = finiteOrUndefined(config.collector.interval);
  const cooldown = finiteOrUndefined(config.alerts.cooldown);
  const timeout = finiteOrUndefined(config.collector.timeout);

  return {
    ...config,
    collector: {
      interval: interval === undefined ? defaultConfig.collector.interval : Math.max(1, Math.floor(interval)),
      timeout: timeout === undefined || timeout <= 0 ? defaultConfig.collector.timeout : timeout,
    },
    thresholds: {
      cpu: finiteOrUndefined(config.thresholds.cpu),
      memory: finiteOrUndefined(config.thresholds.memory),
      disk: finiteOrUndefined(config.thresholds.disk),
      temperature: finiteOrUndefined(config.thresholds.temperature),
    },
    alerts: {
      ...config.alerts,
      cooldown: cooldown === undefined ? defaultConfig.alerts.cooldown : Math.max(0, Math.floor(cooldown)),
    },
    dashboard: {
      ...config.dashboard,
      ingressPath: config.dashboard.ingressPath.replace(/\/+$/, ""),
    },
  };
}

/** Sanitized hostname-scoped prefix for discovery unique ids. */
export function getUniqueIdPrefix(config: Pick<Config, "hostname">): string {
  const safeHostname = config.hostname.replace(/[-.]/g, "_").toLowerCase();
  return `sysmon_bridge_${safeHostname}`;
}
