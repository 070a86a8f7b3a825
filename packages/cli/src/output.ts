import { InvalidArgumentError } from "commander";
import { stringify as stringifyYaml } from "yaml";

import { MAX_VLAN_ID, parseVlanList } from "@fabricops/config-synth";

export const OUTPUT_FORMATS = ["json", "yaml"] as const;
export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export const ensureFormat = (value: string): OutputFormat => {
  const format = OUTPUT_FORMATS.find((candidate) => candidate === value);
  if (!format) {
    throw new InvalidArgumentError(`Unsupported output format ${value}. Expected one of: ${OUTPUT_FORMATS.join(", ")}`);
  }
  return format;
};

export const formatOutput = (value: unknown, format: OutputFormat): string =>
  format === "json" ? JSON.stringify(value, null, 2) : stringifyYaml(value);

const VLAN_TOKEN = /^(\d+)(?:-(\d+))?$/;

/** Parses `10,20-22` into VLAN ids, refusing anything past the VLAN range. */
export const parseAllowedVlans = (value: string): number[] => {
  for (const part of value.split(",")) {
    const token = VLAN_TOKEN.exec(part.trim());
    if (!token) {
      throw new InvalidArgumentError(`Invalid VLAN list entry "${part.trim()}".`);
    }
    const last = Number.parseInt(token[2] ?? token[1], 10);
    if (last > MAX_VLAN_ID) {
      throw new InvalidArgumentError(`VLAN ${last} is outside 1-${MAX_VLAN_ID}.`);
    }
  }
  return parseVlanList(value);
};

export const parseInteger =
  (label: string) =>
  (value: string): number => {
    const parsed = Number(value);
    if (!Number.isInteger(parsed)) {
      throw new InvalidArgumentError(`${label} must be an integer.`);
    }
    return parsed;
  };
