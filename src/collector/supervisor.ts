import { debug } from "../logging/logger.js";
import { BaseCollector, type JsonValue, type MetricSample, type SensorDescriptor } from "./types.js";

const REQUEST_TIMEOUT_MS = 5000;
const RUNNING_STATES = new Set(["started", "running"]);

type AddonSummary = {
  name: string;
  slug: string;
  version: string;
  state: string;
  installed: boolean;
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function text(record: Record<string, unknown>, key: string, fallback = ""): string {
  const value = record[key];
  return typeof value === "string" ? value : fallback;
}

export function toAddonSummary(raw: unknown): AddonSummary | null {
  if (!isRecord(raw)) return null;
  return {
    name: text(raw, "name", "Unknown"),
    slug: text(raw, "slug"),
    version: text(raw, "version"),
    state: text(raw, "state", "unknown"),
    // The list endpoint only returns installed add-ons unless told otherwise
    installed: raw.installed === undefined ? true : raw.installed === true,
  };
}

export function countEntitiesByDomain(states: unknown[], domain: string): number {
  return states.filter((state) => isRecord(state) && text(state, "entity_id").startsWith(`${domain}.`)).length;
}

/**
 * Reads add-on, core and entity information from the Home Assistant
 * supervisor API. Only available inside an add-on, where a token is issued.
 */
export class SupervisorCollector extends BaseCollector {
  readonly name = "homeassistant";

  constructor(
    private baseUrl: string,
    private token: string
  ) {
    super();
  }

  isAvailable(): boolean {
    return this.token.length > 0;
  }

  private async get(path: string): Promise<unknown> {
    const response = await fetch(`${this.baseUrl}${path}`, {
      headers: {
        Authorization: `Bearer ${this.token}`,
        "Content-Type": "application/json",
      },
      signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS),
    });

    if (response.status !== 200) {
      console.warn(`[Collector] Supervisor API returned ${response.status} for ${path}`);
      await response.body?.cancel();
      return null;
    }
    return response.json();
  }

  /** Supervisor endpoints wrap their payload as `{ result, data }`. */
  private async getData(path: string): Promise<Record<string, unknown> | null> {
    const body = await this.get(path);
    return isRecord(body) && isRecord(body.data) ? body.data : null;
  }

  async collect(): Promise<MetricSample[]> {
    const [addonData, coreInfo, states] = await Promise.all([
      this.getData("/addons"),
      this.getData("/core/info"),
      this.get("/core/api/states"),
    ]);

    const samples: MetricSample[] = [];

    const rawAddons = addonData && Array.isArray(addonData.addons) ? addonData.addons : [];
    const addons = rawAddons.map(toAddonSummary).filter((a): a is AddonSummary => a !== null);
    const running = addons.filter((a) => RUNNING_STATES.has(a.state));
    const shown = running.length > 0 ? running : addons;
    const installed = shown.filter((a) => a.installed);

    debug(`[Collector] Found ${addons.length} add-ons, ${running.length} running`);

    samples.push(
      this.sample("ha_addons_running", shown.length, {
        addons: installed.map((a): JsonValue => ({ ...a })),
        total_installed: addons.filter((a) => a.installed).length,
      })
    );

    if (coreInfo) {
      samples.push(
        this.sample("ha_core_version", text(coreInfo, "version", "unknown"), {
          arch: text(coreInfo, "arch"),
          machine: text(coreInfo, "machine"),
          image: text(coreInfo, "image"),
        })
      );
    }

    const entityStates = Array.isArray(states) ? states : [];
    if (entityStates.length > 0) {
      samples.push(this.sample("ha_entities", entityStates.length));
    }
    samples.push(
      this.sample("ha_automations", countEntitiesByDomain(entityStates, "automation")),
      this.sample("ha_scripts", countEntitiesByDomain(entityStates, "script"))
    );

    return samples;
  }

  sensorDescriptors(): SensorDescriptor[] {
    return [
      {
        sensorId: "ha_addons_running",
        name: "HA Running Add-ons",
        isBinary: false,
        stateClass: "measurement",
        icon: "mdi:puzzle",
        hasAttributes: true,
      },
      {
        sensorId: "ha_core_version",
        name: "HA Core Version",
        isBinary: false,
        icon: "mdi:home-assistant",
        hasAttributes: true,
      },
      {
        sensorId: "ha_entities",
        name: "HA Entity Count",
        isBinary: false,
        stateClass: "measurement",
        icon: "mdi:format-list-bulleted",
      },
      {
        sensorId: "ha_automations",
        name: "HA Automations",
        isBinary: false,
        stateClass: "measurement",
        icon: "mdi:robot",
      },
      {
        sensorId: "ha_scripts",
        name: "HA Scripts",
        isBinary: false,
        stateClass: "measurement",
        icon: "mdi:script-text",
      },
    ];
  }
}
