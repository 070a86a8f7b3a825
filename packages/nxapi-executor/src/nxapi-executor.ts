import {
  createDeviceRejectedError,
  createDeviceUnreachableError,
  err,
  ok,
  runWithDeadline,
  type DeviceCallOptions,
  type DeviceDescriptor,
  type DeviceExecutorPort,
  type FabricError,
  type InventorySourcePort,
  type RawPortState,
  type Result,
} from "@fabricops/contracts";
import { createFabricLogger, type FabricLogger } from "@fabricops/telemetry";

import { defaultHttpClient, type HttpClient } from "./http-client.js";
import {
  buildRpcBatch,
  describeRpcError,
  macTableBodySchema,
  rpcBatchResponseSchema,
  showInterfaceBodySchema,
  type NxapiCommand,
  type RpcResponse,
} from "./jsonrpc.js";

export type NxapiTransport = "https" | "http";

export interface NxapiExecutorOptions {
  readonly inventory: InventorySourcePort;
  readonly httpClient?: HttpClient;
  readonly transport?: NxapiTransport;
  /** Used when the inventory entry carries no port. */
  readonly defaultPort?: number;
  readonly username?: string;
  readonly password?: string;
  /** Appends `copy running-config startup-config` to every applied batch. */
  readonly saveConfig?: boolean;
  readonly logger?: FabricLogger;
}

const MISSING_INTERFACE = /invalid (interface|range)|does not exist|no such interface/i;

const RUNNING_CONFIG_NOISE = /^!(Command|Running configuration|Time)/;

class NxapiTransportError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "NxapiTransportError";
  }
}

const basicAuth = (username: string, password: string): string =>
  `Basic ${Buffer.from(`${username}:${password}`, "utf8").toString("base64")}`;

const responseFor = (responses: ReadonlyArray<RpcResponse>, id: number): RpcResponse | undefined =>
  responses.find((response) => response.id === id);

const parseRunningConfigText = (text: string | undefined): string[] =>
  (text ?? "")
    .split(/\r?\n/)
    .map((line) => line.replace(/\s+$/, ""))
    .filter((line) => line.trim().length > 0 && !RUNNING_CONFIG_NOISE.test(line));

/**
 * Device transport over NX-API JSON-RPC. Devices are looked up in the
 * inventory for address and credentials.
 */
export class NxapiExecutor implements DeviceExecutorPort {
  private readonly inventory: InventorySourcePort;
  private readonly httpClient: HttpClient;
  private readonly transport: NxapiTransport;
  private readonly defaultPort: number | undefined;
  private readonly username: string | undefined;
  private readonly password: string | undefined;
  private readonly saveConfig: boolean;
  private readonly logger: FabricLogger;

  constructor(options: NxapiExecutorOptions) {
    this.inventory = options.inventory;
    this.httpClient = options.httpClient ?? defaultHttpClient;
    this.transport = options.transport ?? "https";
    this.defaultPort = options.defaultPort;
    this.username = options.username;
    this.password = options.password;
    this.saveConfig = options.saveConfig ?? false;
    this.logger = options.logger ?? createFabricLogger({ name: "nxapi-executor" });
  }

  async readState(
    device: string,
    iface: string,
    options: DeviceCallOptions,
  ): Promise<Result<RawPortState, FabricError>> {
    const responses = await this.call(device, options, [
      { method: "cli", cmd: `show interface ${iface}` },
      { method: "cli_ascii", cmd: `show running-config interface ${iface}` },
      { method: "cli", cmd: `show mac address-table interface ${iface}` },
    ]);
    if (!responses.ok) {
      return responses;
    }

    const showInterface = responseFor(responses.value, 1);
    const interfaceError = showInterface ? describeRpcError(showInterface) : "no response to show interface";
    if (interfaceError !== null) {
      if (MISSING_INTERFACE.test(interfaceError)) {
        return ok({ exists: false });
      }
      return err(createDeviceRejectedError(device, interfaceError));
    }

    const parsedInterface = showInterfaceBodySchema.safeParse(showInterface?.result?.body);
    if (!parsedInterface.success) {
      return err(createDeviceRejectedError(device, "unexpected show interface response"));
    }
    const row = parsedInterface.data.TABLE_interface.ROW_interface[0];

    const runningConfig = responseFor(responses.value, 2);
    const macTable = responseFor(responses.value, 3);
    const parsedMacs = macTableBodySchema.safeParse(macTable?.result?.body);

    return ok({
      exists: true,
      adminState: row?.admin_state,
      operState: row?.state,
      runningConfig: parseRunningConfigText(runningConfig?.result?.msg),
      // NX-API returns an empty body when the table has no entries.
      macAddresses: parsedMacs.success
        ? parsedMacs.data.TABLE_mac_address.ROW_mac_address.map((entry) => entry.disp_mac_addr)
        : [],
    });
  }

  async applyCommands(
    device: string,
    lines: ReadonlyArray<string>,
    options: DeviceCallOptions,
  ): Promise<Result<void, FabricError>> {
    const commands: NxapiCommand[] = lines
      .map((line) => line.trim())
      .filter((line) => line.length > 0)
      .map((cmd) => ({ method: "cli" as const, cmd }));
    if (this.saveConfig) {
      commands.push({ method: "cli", cmd: "copy running-config startup-config" });
    }

    const responses = await this.call(device, options, commands);
    if (!responses.ok) {
      return responses;
    }

    for (const [index, command] of commands.entries()) {
      const response = responseFor(responses.value, index + 1);
      const failure = response ? describeRpcError(response) : "no response";
      if (failure !== null) {
        this.logger.warn("nxapi.apply.rejected", { device, command: command.cmd, reason: failure });
        return err(createDeviceRejectedError(device, `${command.cmd}: ${failure}`));
      }
    }
    this.logger.info("nxapi.apply.accepted", { device, commands: commands.length });
    return ok(undefined);
  }

  private async call(
    device: string,
    options: DeviceCallOptions,
    commands: ReadonlyArray<NxapiCommand>,
  ): Promise<Result<RpcResponse[], FabricError>> {
    const descriptor = await this.inventory.resolve(device);
    if (!descriptor.ok) {
      return err(createDeviceUnreachableError(device, descriptor.error.message));
    }

    return runWithDeadline(
      { device, timeoutMs: options.timeoutMs, signal: options.signal, stage: "device" },
      (signal) => this.post(descriptor.value, commands, signal),
    );
  }

  private async post(
    descriptor: DeviceDescriptor,
    commands: ReadonlyArray<NxapiCommand>,
    signal: AbortSignal,
  ): Promise<Result<RpcResponse[], FabricError>> {
    const port = descriptor.port ?? this.defaultPort;
    const url = `${this.transport}://${descriptor.hostname}${port === undefined ? "" : `:${port}`}/ins`;
    const username = descriptor.username ?? this.username ?? "";
    const password = descriptor.password ?? this.password ?? "";

    const response = await this.httpClient.execute({
      url,
      method: "POST",
      headers: {
        "content-type": "application/json-rpc",
        authorization: basicAuth(username, password),
      },
      body: JSON.stringify(buildRpcBatch(commands)),
      signal,
    });

    if (response.status === 401 || response.status === 403) {
      return err(createDeviceRejectedError(descriptor.name, `authentication failed (HTTP ${response.status})`));
    }

    let raw: unknown;
    try {
      raw = JSON.parse(response.body);
    } catch {
      if (response.status >= 500) {
        throw new NxapiTransportError(`HTTP ${response.status} from ${url}`);
      }
      return err(createDeviceRejectedError(descriptor.name, `unexpected HTTP ${response.status} response`));
    }

    const parsed = rpcBatchResponseSchema.safeParse(raw);
    if (!parsed.success) {
      return err(createDeviceRejectedError(descriptor.name, "malformed JSON-RPC response"));
    }
    return ok(parsed.data);
  }
}

export const createNxapiExecutor = (options: NxapiExecutorOptions): NxapiExecutor => new NxapiExecutor(options);
