import { createFabricServer, type FetchHandler } from "@fabricops/api";
import { createNodeFsPersistence, openFileAuditStore } from "@fabricops/audit-store";
import { createNxosRenderer } from "@fabricops/config-synth";
import { ok, type DeviceExecutorPort, type FabricError, type InventorySourcePort, type Result } from "@fabricops/contracts";
import { createSimulatedFleet, type SimulatedFleet } from "@fabricops/device-memory";
import { createDeviceFleetExecutor } from "@fabricops/fleet-executor";
import { createStaticInventory, createYamlInventory } from "@fabricops/inventory";
import { createNxapiExecutor } from "@fabricops/nxapi-executor";
import { createChangeOrchestrator, type ChangeOrchestrator } from "@fabricops/orchestrator";
import { createPreCheckEngine } from "@fabricops/precheck";
import { createFabricLogger, type FabricLogger } from "@fabricops/telemetry";

import type { FabricConfig } from "./config.js";

export interface FabricRuntime {
  readonly config: FabricConfig;
  readonly logger: FabricLogger;
  readonly orchestrator: ChangeOrchestrator;
  readonly handler: FetchHandler;
  /** Present when the runtime drives simulated devices. */
  readonly simulatedFleet?: SimulatedFleet;
}

export interface FabricRuntimeOptions {
  readonly logger?: FabricLogger;
}

const createInventory = (config: FabricConfig): InventorySourcePort => {
  const { hostsFile, groupsFile, defaultsFile } = config.inventory;
  if (hostsFile) {
    return createYamlInventory({ hostsFile, groupsFile, defaultsFile });
  }
  return createStaticInventory(
    config.executor.simulated.devices.map((name) => ({ name, hostname: name, data: { role: "simulated" } })),
  );
};

const createSimulatedExecutor = async (
  config: FabricConfig,
  inventory: InventorySourcePort,
  logger: FabricLogger,
): Promise<Result<SimulatedFleet, FabricError>> => {
  const devices = await inventory.list();
  if (!devices.ok) {
    return devices;
  }
  return ok(
    createSimulatedFleet({
      devices: devices.value.map((device) => ({
        name: device.name,
        portCount: config.executor.simulated.portCount,
      })),
      logger,
    }),
  );
};

/**
 * Wires stores, device transport and the orchestrator from configuration.
 */
export const createFabricRuntime = async (
  config: FabricConfig,
  options: FabricRuntimeOptions = {},
): Promise<Result<FabricRuntime, FabricError>> => {
  const logger = options.logger ?? createFabricLogger({ name: "fabricctl", level: config.log.level });

  const store = await openFileAuditStore({
    persistence: createNodeFsPersistence(config.audit.root),
    logger: logger.child({ component: "audit-store" }),
  });
  if (!store.ok) {
    return store;
  }

  const inventory = createInventory(config);

  let executor: DeviceExecutorPort;
  let simulatedFleet: SimulatedFleet | undefined;
  if (config.executor.kind === "simulated") {
    const simulated = await createSimulatedExecutor(config, inventory, logger.child({ component: "device-memory" }));
    if (!simulated.ok) {
      return simulated;
    }
    simulatedFleet = simulated.value;
    executor = simulated.value;
  } else {
    const nxapi = config.executor.nxapi;
    executor = createNxapiExecutor({
      inventory,
      transport: nxapi.transport,
      defaultPort: nxapi.port,
      username: nxapi.username,
      password: nxapi.password,
      saveConfig: nxapi.saveConfig,
      logger: logger.child({ component: "nxapi" }),
    });
  }

  const orchestrator = createChangeOrchestrator(
    {
      precheck: createPreCheckEngine({
        executor,
        defaultTimeoutMs: config.timeouts.precheckMs,
        logger: logger.child({ component: "precheck" }),
      }),
      renderer: createNxosRenderer(),
      store: store.value,
      fleet: createDeviceFleetExecutor({
        executor,
        poolSize: config.pool.size,
        defaultTimeoutMs: config.timeouts.applyMs,
        telemetry: { logger: logger.child({ component: "fleet" }) },
      }),
      inventory,
    },
    {
      apply: { concurrencyLimit: config.pool.perChangeLimit },
      telemetry: { logger: logger.child({ component: "orchestrator" }) },
    },
  );

  const handler = createFabricServer({ orchestrator, logger: logger.child({ component: "api" }) });

  logger.info("fabricctl.runtime.ready", {
    executor: config.executor.kind,
    auditRoot: config.audit.root,
    inventory: config.inventory.hostsFile ?? "static",
  });

  return ok({ config, logger, orchestrator, handler, simulatedFleet });
};
