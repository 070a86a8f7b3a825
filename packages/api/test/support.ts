import { createFileAuditStore, createMemoryPersistence } from "@fabricops/audit-store";
import { createNxosRenderer } from "@fabricops/config-synth";
import type { Clock } from "@fabricops/contracts";
import { createSimulatedFleet } from "@fabricops/device-memory";
import { createDeviceFleetExecutor } from "@fabricops/fleet-executor";
import { createStaticInventory } from "@fabricops/inventory";
import { createChangeOrchestrator } from "@fabricops/orchestrator";
import { createPreCheckEngine } from "@fabricops/precheck";
import { createSilentLogger } from "@fabricops/telemetry";

export const FIXED_TIME = "2026-03-01T10:00:00.000Z";

const clock: Clock = { now: () => new Date(FIXED_TIME) };

export const createTestFabric = () => {
  const logger = createSilentLogger();
  const devices = createSimulatedFleet({ devices: [{ name: "leaf-01", portCount: 4 }], logger });
  const store = createFileAuditStore({ persistence: createMemoryPersistence(), clock, logger });
  const orchestrator = createChangeOrchestrator(
    {
      precheck: createPreCheckEngine({ executor: devices, clock, logger }),
      renderer: createNxosRenderer({ clock }),
      store,
      fleet: createDeviceFleetExecutor({ executor: devices, telemetry: { logger } }),
      inventory: createStaticInventory([{ name: "leaf-01", hostname: "192.0.2.11", data: { role: "leaf" } }]),
    },
    { clock, telemetry: { logger } },
  );
  return { devices, store, orchestrator, logger };
};

export const postJson = (path: string, body: unknown): Request =>
  new Request(`http://localhost${path}`, {
    method: "POST",
    headers: { "content-type": "application/json" },
    body: JSON.stringify(body),
  });
