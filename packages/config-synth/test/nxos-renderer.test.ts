import { describe, expect, it } from "vitest";

import { validationIssuesOf, type ChangeRequest, type ValidationIssue } from "@fabricops/contracts";

import { createNxosRenderer, formatVlanList, parseVlanList, validateChangeRequest } from "../src/index.js";

const clock = { now: () => new Date("2024-05-01T10:00:00.000Z") };
const renderer = createNxosRenderer({ clock });

const expectIssues = (input: unknown): ReadonlyArray<ValidationIssue> => {
  const result = validateChangeRequest(input);
  if (result.ok) {
    throw new Error("expected validation to fail");
  }
  expect(result.error.code).toBe("validation_error");
  return validationIssuesOf(result.error) ?? [];
};

describe("nxos renderer", () => {
  it("renders an access port in the fixed command order", () => {
    const result = renderer.render({
      device: "leaf-01",
      interface: "Eth1/1",
      mode: "access",
      vlan: 10,
      description: "Server Link",
    });

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.lines).toEqual([
      "interface Eth1/1",
      "  description Server Link",
      "  switchport",
      "  switchport mode access",
      "  switchport access vlan 10",
      "  no shutdown",
    ]);
    expect(result.value.text).toBe(result.value.lines.join("\n"));
    expect(result.value.synthesizedAt).toBe("2024-05-01T10:00:00.000Z");
    expect(result.value.device).toBe("leaf-01");
  });

  it("renders trunk, VXLAN and VRF blocks", () => {
    const result = renderer.render({
      device: "leaf-02",
      interface: "Eth1/49",
      mode: "trunk",
      vlan: 100,
      allowedVlans: [22, 20, 21, 100, 300],
      vni: 10100,
      vrf: "tenant-a",
    });

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.lines).toEqual([
      "interface Eth1/49",
      "  switchport",
      "  switchport mode trunk",
      "  switchport trunk allowed vlan 20-22,100,300",
      "  vxlan",
      "    vni 10100",
      "  vrf member tenant-a",
      "  no shutdown",
    ]);
  });

  it("omits the access vlan line when no VLAN is requested", () => {
    const result = renderer.render({ device: "leaf-01", interface: "Eth1/2", mode: "access" });

    expect(result.ok && result.value.lines).toEqual([
      "interface Eth1/2",
      "  switchport",
      "  switchport mode access",
      "  no shutdown",
    ]);
  });

  it("renders a VXLAN block for a VNI without a VLAN", () => {
    const result = renderer.render({ device: "leaf-01", interface: "Ethernet1/1", mode: "access", vni: 10010 });

    expect(result.ok && result.value.lines).toEqual([
      "interface Ethernet1/1",
      "  switchport",
      "  switchport mode access",
      "  vxlan",
      "    vni 10010",
      "  no shutdown",
    ]);
  });

  it("rejects malformed requests with a validation error", () => {
    const request: ChangeRequest = {
      device: "leaf-01",
      interface: "Eth1/1",
      mode: "trunk",
      vlan: 5000,
    };
    const result = renderer.render(request);

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.code).toBe("validation_error");
    expect(result.error.details?.issues).toEqual([{ path: "vlan", message: "VLAN must be between 1 and 4094" }]);
  });
});

describe("change request validation", () => {
  it("defaults the mode to access and freezes the request", () => {
    const result = validateChangeRequest({ device: "leaf-01", interface: " Eth1/1 ", vlan: 10 });

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.mode).toBe("access");
    expect(result.value.interface).toBe("Eth1/1");
    expect(Object.isFrozen(result.value)).toBe(true);
  });

  it("rejects VLANs outside 1-4094", () => {
    expect(expectIssues({ device: "leaf-01", interface: "Eth1/1", vlan: 4095 })).toEqual([
      { path: "vlan", message: "VLAN must be between 1 and 4094" },
    ]);
    expect(expectIssues({ device: "leaf-01", interface: "Eth1/1", vlan: 0 })).toEqual([
      { path: "vlan", message: "VLAN must be between 1 and 4094" },
    ]);
  });

  it("rejects an allowed VLAN set on an access port", () => {
    expect(expectIssues({ device: "leaf-01", interface: "Eth1/1", mode: "access", allowedVlans: [10, 20] })).toEqual([
      { path: "allowedVlans", message: "access ports carry at most one VLAN" },
    ]);
  });

  it("rejects unknown modes and multi-line descriptions", () => {
    const issues = expectIssues({
      device: "leaf-01",
      interface: "Eth1/1",
      mode: "routed",
      description: "line one\nshutdown",
    });

    expect(issues.map((issue) => issue.path)).toEqual(["mode", "description"]);
    expect(issues[1].message).toBe("description must be a single line of printable text");
  });

  it("accepts a VNI on its own", () => {
    const result = validateChangeRequest({ device: "leaf-01", interface: "Ethernet1/1", mode: "access", vni: 10010 });

    expect(result).toEqual({
      ok: true,
      value: { device: "leaf-01", interface: "Ethernet1/1", mode: "access", vni: 10010 },
    });
  });

  it("treats an empty description as absent", () => {
    const result = validateChangeRequest({ device: "leaf-01", interface: "Eth1/1", vlan: 10, description: "" });

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect("description" in result.value).toBe(false);
    const rendered = renderer.render(result.value);
    expect(rendered.ok && rendered.value.lines).toEqual([
      "interface Eth1/1",
      "  switchport",
      "  switchport mode access",
      "  switchport access vlan 10",
      "  no shutdown",
    ]);
  });

  it("rejects non-positive VNIs", () => {
    expect(expectIssues({ device: "leaf-01", interface: "Eth1/1", vlan: 10, vni: 0 })).toEqual([
      { path: "vni", message: "VNI must be a positive integer" },
    ]);
  });
});

describe("vlan lists", () => {
  it("compresses consecutive ids into ranges", () => {
    expect(formatVlanList([30, 10, 11, 12, 20, 11])).toBe("10-12,20,30");
    expect(formatVlanList([5])).toBe("5");
  });

  it("expands ranges back into ids", () => {
    expect(parseVlanList("10-12,20, 30")).toEqual([10, 11, 12, 20, 30]);
    expect(parseVlanList("none")).toEqual([]);
  });
});
