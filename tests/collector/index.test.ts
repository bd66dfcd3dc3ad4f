import { describe, it, expect } from "vitest";
import { createCollectors, createRegistry } from "../../src/collector/index.js";
import { defaultConfig, type Config } from "../../src/config/loader.js";

function config(overrides: {
  securityMonitoring?: boolean;
  rpiMonitoring?: boolean;
  token?: string;
}): Config {
  return {
    ...defaultConfig,
    features: {
      securityMonitoring: overrides.securityMonitoring ?? true,
      rpiMonitoring: overrides.rpiMonitoring ?? true,
    },
    supervisor: { ...defaultConfig.supervisor, token: overrides.token ?? "" },
  };
}

const names = (cfg: Config) => createCollectors(cfg).map((c) => c.name);

describe("createCollectors", () => {
  it("should build the core collectors in publication order", () => {
    expect(names(config({ securityMonitoring: false, rpiMonitoring: false }))).toEqual([
      "cpu",
      "memory",
      "disk",
      "network",
      "system",
    ]);
  });

  it("should add security and Raspberry Pi collectors when enabled", () => {
    expect(names(config({}))).toEqual(["cpu", "memory", "disk", "network", "system", "security", "rpi"]);
  });

  it("should add the supervisor collector only with a token", () => {
    expect(names(config({ rpiMonitoring: false, token: "test-secret" }))).toEqual([
      "cpu",
      "memory",
      "disk",
      "network",
      "system",
      "security",
      "homeassistant",
    ]);
  });

  it("should hand every collector to the registry", () => {
    const registry = createRegistry(config({ token: "test-secret" }));
    expect(registry.getCollectors()).toHaveLength(8);
  });
});
