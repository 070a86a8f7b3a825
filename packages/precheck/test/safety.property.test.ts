import fc from "fast-check";
import { describe, expect, it } from "vitest";

import { assemblePreCheck, evaluateSafety, type PortVlanState } from "../src/index.js";

const vlanArb = fc.integer({ min: 1, max: 4094 });

const macArb = fc
  .array(fc.integer({ min: 0, max: 255 }), { minLength: 6, maxLength: 6 })
  .map((octets) => octets.map((octet) => octet.toString(16).padStart(2, "0")).join(":"));

const stateArb: fc.Arbitrary<PortVlanState> = fc.oneof(
  vlanArb.map((vlan) => ({ mode: "access" as const, vlans: [vlan] })),
  fc.uniqueArray(vlanArb, { minLength: 1, maxLength: 6 }).map((vlans) => ({ mode: "trunk" as const, vlans })),
);

const snapshotOf = (state: PortVlanState): Record<string, string> =>
  state.mode === "access"
    ? { mode: "access", vlan: String(state.vlans[0]) }
    : { mode: "trunk", allowedVlans: [...state.vlans].sort((a, b) => a - b).join(",") };

const sameState = (a: PortVlanState, b: PortVlanState): boolean =>
  a.mode === b.mode &&
  [...new Set(a.vlans)].sort((x, y) => x - y).join(",") ===
    [...new Set(b.vlans)].sort((x, y) => x - y).join(",");

describe("safety gate", () => {
  it("never clears a mode or VLAN change on a port with learned MACs", () => {
    fc.assert(
      fc.property(
        stateArb,
        stateArb,
        fc.array(macArb, { minLength: 1, maxLength: 4 }),
        (current, desired, macs) => {
          fc.pre(!sameState(current, desired));
          expect(
            evaluateSafety({
              portExists: true,
              currentConfig: snapshotOf(current),
              learnedMacAddresses: macs,
              desired,
            }),
          ).toBe(false);
        },
      ),
    );
  });

  it("never clears a port that does not exist", () => {
    fc.assert(
      fc.property(
        fc.option(stateArb, { nil: undefined }),
        fc.array(macArb, { maxLength: 4 }),
        (desired, macs) => {
          expect(
            evaluateSafety({ portExists: false, currentConfig: {}, learnedMacAddresses: macs, desired }),
          ).toBe(false);
        },
      ),
    );
  });

  it("keeps the verdict independent of link state", () => {
    const statusArb = fc.constantFrom("up", "down", "Administratively down", "sfp-missing", undefined);
    fc.assert(
      fc.property(statusArb, statusArb, vlanArb, vlanArb, (adminState, operState, currentVlan, desiredVlan) => {
        const result = assemblePreCheck(
          "leaf-01",
          "Eth1/1",
          {
            exists: true,
            adminState,
            operState,
            runningConfig: ["interface Eth1/1", `  switchport access vlan ${currentVlan}`],
            macAddresses: ["aabb.ccdd.eeff"],
          },
          new Date(0),
          { mode: "access", vlan: desiredVlan },
        );
        expect(result.isSafe).toBe(currentVlan === desiredVlan);
      }),
    );
  });
});
