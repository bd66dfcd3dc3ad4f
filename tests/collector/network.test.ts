import { describe, it, expect } from "vitest";
import { primaryIpv4, selectInterfaces } from "../../src/collector/network.js";

const iface = (name: string, overrides: Partial<{ ip4: string; ip6: string; mac: string; internal: boolean; operstate: string }> = {}) => ({
  iface: name,
  ip4: "",
  ip6: "",
  mac: "",
  internal: false,
  operstate: "up",
  ...overrides,
});

describe("selectInterfaces", () => {
  it("should keep addressed interfaces that are up", () => {
    const selected = selectInterfaces([
      iface("lo", { ip4: "127.0.0.1" }),
      iface("eth0", { ip4: "192.168.1.20", ip6: "2001:db8::20", mac: "aa:bb:cc:dd:ee:ff" }),
      iface("docker0", { ip4: "172.17.0.1", operstate: "down" }),
      iface("wlan0", { ip6: "fe80::1" }),
      iface("veth1", { ip4: "10.0.0.2", internal: true }),
    ]);

    expect(selected).toEqual({
      eth0: { ipv4: "192.168.1.20", ipv6: "2001:db8::20", mac: "aa:bb:cc:dd:ee:ff" },
    });
  });

  it("should report link-local IPv6 as null when an IPv4 address exists", () => {
    const selected = selectInterfaces([iface("eth0", { ip4: "10.1.1.1", ip6: "fe80::abcd" })]);
    expect(selected.eth0).toEqual({ ipv4: "10.1.1.1", ipv6: null, mac: null });
  });
});

describe("primaryIpv4", () => {
  it("should return the first non-loopback IPv4 address", () => {
    expect(
      primaryIpv4({
        tun0: { ipv4: "127.0.0.2", ipv6: null, mac: null },
        eth0: { ipv4: "192.168.1.20", ipv6: null, mac: null },
      })
    ).toBe("192.168.1.20");
  });

  it("should fall back to unknown", () => {
    expect(primaryIpv4({})).toBe("unknown");
    expect(primaryIpv4({ eth0: { ipv4: null, ipv6: "2001:db8::1", mac: null } })).toBe("unknown");
  });
});
