import { readFile } from "node:fs/promises";
import { dirname, resolve } from "node:path";

import { parse as parseYaml } from "yaml";
import { z } from "zod";

import { toValidationIssues } from "@fabricops/config-synth";
import { createValidationError, err, ok, type FabricError, type Result } from "@fabricops/contracts";
import { LOG_LEVELS } from "@fabricops/telemetry";

const booleanish = z.union([
  z.boolean(),
  z.enum(["true", "false", "1", "0"]).transform((value) => value === "true" || value === "1"),
]);

const portNumber = z.coerce.number().int().min(0).max(65_535);

const milliseconds = z.coerce.number().int().min(1).max(600_000);

const logLevelSchema = z.enum(LOG_LEVELS);

export const fabricConfigSchema = z
  .object({
    listen: z
      .object({
        host: z.string().min(1).default("127.0.0.1"),
        port: portNumber.default(8080),
      })
      .default({}),
    audit: z.object({ root: z.string().min(1).default("./fabric-audit") }).default({}),
    inventory: z
      .object({
        hostsFile: z.string().min(1).optional(),
        groupsFile: z.string().min(1).optional(),
        defaultsFile: z.string().min(1).optional(),
      })
      .default({}),
    executor: z
      .object({
        kind: z.enum(["nxapi", "simulated"]).default("nxapi"),
        nxapi: z
          .object({
            transport: z.enum(["https", "http"]).default("https"),
            port: portNumber.optional(),
            username: z.string().min(1).optional(),
            password: z.string().min(1).optional(),
            saveConfig: booleanish.default(false),
          })
          .default({}),
        simulated: z
          .object({
            devices: z.array(z.string().min(1)).min(1).default(["leaf-01", "leaf-02"]),
            portCount: z.coerce.number().int().min(1).max(512).default(48),
          })
          .default({}),
      })
      .default({}),
    timeouts: z
      .object({
        precheckMs: milliseconds.default(10_000),
        applyMs: milliseconds.default(30_000),
      })
      .default({}),
    pool: z
      .object({
        size: z.coerce.number().int().min(1).max(1_024).default(16),
        perChangeLimit: z.coerce.number().int().min(1).optional(),
      })
      .default({}),
    log: z.object({ level: logLevelSchema.default("info") }).default({}),
  })
  .superRefine((config, ctx) => {
    if (config.executor.kind === "nxapi" && config.inventory.hostsFile === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["inventory", "hostsFile"],
        message: "the nxapi executor needs an inventory hosts file",
      });
    }
  });

export type FabricConfig = z.output<typeof fabricConfigSchema>;

interface EnvBinding {
  readonly variable: string;
  readonly path: ReadonlyArray<string>;
}

export const ENV_BINDINGS: ReadonlyArray<EnvBinding> = [
  { variable: "FABRIC_LISTEN_HOST", path: ["listen", "host"] },
  { variable: "FABRIC_LISTEN_PORT", path: ["listen", "port"] },
  { variable: "FABRIC_AUDIT_ROOT", path: ["audit", "root"] },
  { variable: "FABRIC_INVENTORY_HOSTS", path: ["inventory", "hostsFile"] },
  { variable: "FABRIC_INVENTORY_GROUPS", path: ["inventory", "groupsFile"] },
  { variable: "FABRIC_INVENTORY_DEFAULTS", path: ["inventory", "defaultsFile"] },
  { variable: "FABRIC_EXECUTOR", path: ["executor", "kind"] },
  { variable: "FABRIC_NXAPI_TRANSPORT", path: ["executor", "nxapi", "transport"] },
  { variable: "FABRIC_NXAPI_PORT", path: ["executor", "nxapi", "port"] },
  { variable: "FABRIC_NXAPI_USERNAME", path: ["executor", "nxapi", "username"] },
  { variable: "FABRIC_NXAPI_PASSWORD", path: ["executor", "nxapi", "password"] },
  { variable: "FABRIC_NXAPI_SAVE_CONFIG", path: ["executor", "nxapi", "saveConfig"] },
  { variable: "FABRIC_PRECHECK_TIMEOUT_MS", path: ["timeouts", "precheckMs"] },
  { variable: "FABRIC_APPLY_TIMEOUT_MS", path: ["timeouts", "applyMs"] },
  { variable: "FABRIC_POOL_SIZE", path: ["pool", "size"] },
  { variable: "FABRIC_LOG_LEVEL", path: ["log", "level"] },
];

// Relative paths in a config file are relative to the file.
const FILE_PATH_FIELDS: ReadonlyArray<ReadonlyArray<string>> = [
  ["audit", "root"],
  ["inventory", "hostsFile"],
  ["inventory", "groupsFile"],
  ["inventory", "defaultsFile"],
];

type Environment = Readonly<Record<string, string | undefined>>;

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const cloneTree = (value: Record<string, unknown>): Record<string, unknown> =>
  Object.fromEntries(
    Object.entries(value).map(([key, entry]) => [key, isRecord(entry) ? cloneTree(entry) : entry]),
  );

const getPath = (tree: Record<string, unknown>, path: ReadonlyArray<string>): unknown => {
  let cursor: unknown = tree;
  for (const key of path) {
    if (!isRecord(cursor)) {
      return undefined;
    }
    cursor = cursor[key];
  }
  return cursor;
};

const setPath = (tree: Record<string, unknown>, path: ReadonlyArray<string>, value: unknown): void => {
  let cursor = tree;
  for (const key of path.slice(0, -1)) {
    const next = cursor[key];
    if (isRecord(next)) {
      cursor = next;
    } else {
      const created: Record<string, unknown> = {};
      cursor[key] = created;
      cursor = created;
    }
  }
  const leaf = path.at(-1);
  if (leaf !== undefined) {
    cursor[leaf] = value;
  }
};

/**
 * Validates a raw config document after applying `FABRIC_*` overrides.
 */
export const parseFabricConfig = (raw: unknown, env: Environment = {}): Result<FabricConfig, FabricError> => {
  if (raw !== undefined && raw !== null && !isRecord(raw)) {
    return err(createValidationError("Configuration must be a mapping.", [{ path: "(root)", message: "expected a mapping" }]));
  }
  const tree = isRecord(raw) ? cloneTree(raw) : {};

  for (const binding of ENV_BINDINGS) {
    const value = env[binding.variable];
    if (value !== undefined && value.trim().length > 0) {
      setPath(tree, binding.path, value.trim());
    }
  }

  const parsed = fabricConfigSchema.safeParse(tree);
  if (!parsed.success) {
    return err(createValidationError("Configuration failed validation.", toValidationIssues(parsed.error)));
  }
  return ok(parsed.data);
};

export interface LoadFabricConfigOptions {
  readonly configPath?: string;
  readonly env?: Environment;
  readonly cwd?: string;
}

export const loadFabricConfig = async (
  options: LoadFabricConfigOptions = {},
): Promise<Result<FabricConfig, FabricError>> => {
  const env = options.env ?? process.env;
  const cwd = options.cwd ?? process.cwd();
  const configPath = options.configPath ?? env.FABRIC_CONFIG;

  let raw: unknown = {};
  if (configPath) {
    const absolute = resolve(cwd, configPath);
    try {
      raw = parseYaml(await readFile(absolute, "utf8"));
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return err(createValidationError(`Configuration file ${absolute} could not be read.`, [{ path: "(file)", message }]));
    }
    if (isRecord(raw)) {
      const tree = cloneTree(raw);
      for (const field of FILE_PATH_FIELDS) {
        const value = getPath(tree, field);
        if (typeof value === "string") {
          setPath(tree, field, resolve(dirname(absolute), value));
        }
      }
      raw = tree;
    }
  }

  const parsed = parseFabricConfig(raw, env);
  if (!parsed.ok) {
    return parsed;
  }
  const config = parsed.value;
  return ok({
    ...config,
    audit: { root: resolve(cwd, config.audit.root) },
    inventory: {
      hostsFile: config.inventory.hostsFile && resolve(cwd, config.inventory.hostsFile),
      groupsFile: config.inventory.groupsFile && resolve(cwd, config.inventory.groupsFile),
      defaultsFile: config.inventory.defaultsFile && resolve(cwd, config.inventory.defaultsFile),
    },
  });
};
