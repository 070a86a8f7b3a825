import { readFile } from "node:fs/promises";

import { parse as parseYaml } from "yaml";
import type { ZodTypeAny, z } from "zod";

import {
  createValidationError,
  err,
  ok,
  type DeviceDescriptor,
  type FabricError,
  type InventorySourcePort,
  type Result,
  type ValidationIssue,
} from "@fabricops/contracts";

import { resolveHost } from "./resolve.js";
import { defaultsDocumentSchema, groupsDocumentSchema, hostsDocumentSchema } from "./schema.js";
import { createStaticInventory } from "./static-inventory.js";

export interface YamlInventoryFiles {
  readonly hostsFile: string;
  readonly groupsFile?: string;
  readonly defaultsFile?: string;
}

export interface InventoryDocuments {
  readonly hosts: string;
  readonly groups?: string;
  readonly defaults?: string;
}

const parseDocument = <TSchema extends ZodTypeAny>(
  label: string,
  schema: TSchema,
  text: string | undefined,
): Result<z.infer<TSchema>, FabricError> => {
  let raw: unknown;
  try {
    raw = text === undefined ? {} : (parseYaml(text) ?? {});
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return err(createValidationError(`Inventory ${label} file is not valid YAML.`, [{ path: label, message }]));
  }

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const issues: ValidationIssue[] = parsed.error.issues.map((issue) => ({
      path: [label, ...issue.path].join("."),
      message: issue.message,
    }));
    return err(createValidationError(`Inventory ${label} file is invalid.`, issues));
  }
  return ok(parsed.data);
};

/**
 * Resolves hosts/groups/defaults documents into device descriptors, in the
 * layout of a Nornir SimpleInventory.
 */
export const parseInventoryDocuments = (
  documents: InventoryDocuments,
): Result<DeviceDescriptor[], FabricError> => {
  const hosts = parseDocument("hosts", hostsDocumentSchema, documents.hosts);
  if (!hosts.ok) {
    return hosts;
  }
  const groups = parseDocument("groups", groupsDocumentSchema, documents.groups);
  if (!groups.ok) {
    return groups;
  }
  const defaults = parseDocument("defaults", defaultsDocumentSchema, documents.defaults);
  if (!defaults.ok) {
    return defaults;
  }

  const unknownGroups: ValidationIssue[] = [];
  for (const [name, host] of Object.entries(hosts.value)) {
    for (const group of host.groups) {
      if (!(group in groups.value)) {
        unknownGroups.push({ path: `hosts.${name}.groups`, message: `unknown group ${group}` });
      }
    }
  }
  if (unknownGroups.length > 0) {
    return err(createValidationError("Inventory references unknown groups.", unknownGroups));
  }

  return ok(
    Object.entries(hosts.value).map(([name, host]) => resolveHost(name, host, groups.value, defaults.value)),
  );
};

const readOptional = async (path: string | undefined): Promise<string | undefined> =>
  path === undefined ? undefined : readFile(path, "utf8");

export const loadYamlInventory = async (
  files: YamlInventoryFiles,
): Promise<Result<DeviceDescriptor[], FabricError>> => {
  let documents: InventoryDocuments;
  try {
    documents = {
      hosts: await readFile(files.hostsFile, "utf8"),
      groups: await readOptional(files.groupsFile),
      defaults: await readOptional(files.defaultsFile),
    };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return err(createValidationError("Inventory files could not be read.", [{ path: "inventory", message }]));
  }
  return parseInventoryDocuments(documents);
};

/**
 * Inventory backed by YAML files. Files are read on first use and again
 * after `reload()`.
 */
export class YamlInventory implements InventorySourcePort {
  private loaded: Promise<Result<InventorySourcePort, FabricError>> | null = null;

  constructor(private readonly files: YamlInventoryFiles) {}

  reload(): void {
    this.loaded = null;
  }

  async resolve(name: string): Promise<Result<DeviceDescriptor, FabricError>> {
    const source = await this.source();
    return source.ok ? source.value.resolve(name) : source;
  }

  async list(): Promise<Result<ReadonlyArray<DeviceDescriptor>, FabricError>> {
    const source = await this.source();
    return source.ok ? source.value.list() : source;
  }

  private source(): Promise<Result<InventorySourcePort, FabricError>> {
    this.loaded ??= loadYamlInventory(this.files).then((devices) =>
      devices.ok ? ok(createStaticInventory(devices.value)) : devices,
    );
    return this.loaded;
  }
}

export const createYamlInventory = (files: YamlInventoryFiles): YamlInventory => new YamlInventory(files);
