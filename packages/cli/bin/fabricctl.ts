#!/usr/bin/env node
import { Command, Option } from "commander";

import { createFabricExpressApp } from "@fabricops/api";
import { validateChangeRequest } from "@fabricops/config-synth";
import type { FabricError, Result } from "@fabricops/contracts";
import type { ChangeReport } from "@fabricops/orchestrator";
import { createFabricLogger, type FabricLogSink } from "@fabricops/telemetry";

import { loadFabricConfig } from "../src/config.js";
import { ensureFormat, formatOutput, parseAllowedVlans, parseInteger, type OutputFormat } from "../src/output.js";
import { createFabricRuntime, type FabricRuntime } from "../src/runtime.js";

const program = new Command();

interface GlobalOptions {
  readonly config?: string;
  readonly simulate?: boolean;
  readonly logLevel?: string;
}

interface FormatOptions {
  readonly format: OutputFormat;
}

class FabricCliError extends Error {
  constructor(readonly error: FabricError) {
    super(error.message);
    this.name = "FabricCliError";
  }
}

// Logs go to stderr so stdout carries only command output.
const stderrSink: FabricLogSink = (_level, line) => {
  process.stderr.write(`${line}\n`);
};

const unwrap = <T>(result: Result<T, FabricError>): T => {
  if (!result.ok) {
    throw new FabricCliError(result.error);
  }
  return result.value;
};

const bootstrap = async (
  mode: "serve" | "command",
  overrides: Readonly<Record<string, string | undefined>> = {},
): Promise<FabricRuntime> => {
  const globals = program.opts<GlobalOptions>();
  const env = {
    ...process.env,
    ...(globals.simulate ? { FABRIC_EXECUTOR: "simulated" } : {}),
    ...(globals.logLevel ? { FABRIC_LOG_LEVEL: globals.logLevel } : {}),
    ...Object.fromEntries(Object.entries(overrides).filter(([, value]) => value !== undefined)),
  };
  const config = unwrap(await loadFabricConfig({ configPath: globals.config, env }));
  const logger =
    mode === "command"
      ? createFabricLogger({ name: "fabricctl", level: config.log.level, sink: stderrSink })
      : undefined;
  return unwrap(await createFabricRuntime(config, { logger }));
};

const printResult = (value: unknown, format: OutputFormat): void => {
  console.log(formatOutput(value, format));
};

const printReport = (report: ChangeReport, format: OutputFormat): void => {
  printResult(
    {
      changeId: report.changeId,
      kind: report.kind,
      state: report.state,
      commitId: report.commit?.commitId,
      failure: report.failure,
      results: report.results,
      recommendations: report.precheck?.recommendations,
      config: report.artifact?.text,
    },
    format,
  );
  if (report.state !== "succeeded" && report.state !== "committed") {
    process.exitCode = 1;
  }
};

/** Aborts on Ctrl-C; a second Ctrl-C is left to Node. */
const interruptSignal = (): AbortSignal => {
  const controller = new AbortController();
  process.once("SIGINT", () => {
    console.error("Interrupted; waiting for in-flight applies to be recorded.");
    controller.abort();
  });
  return controller.signal;
};

const withRuntime = async (task: (runtime: FabricRuntime) => Promise<void>): Promise<void> => {
  const runtime = await bootstrap("command");
  try {
    await task(runtime);
  } finally {
    await runtime.orchestrator.drain();
  }
};

const formatOption = () =>
  new Option("--format <format>", "Output format (json|yaml)").argParser(ensureFormat).default("yaml");

program
  .name("fabricctl")
  .description("Pre-checked, audited and reversible switch-port changes")
  .option("--config <path>", "YAML configuration file (defaults to $FABRIC_CONFIG)")
  .option("--simulate", "Drive simulated devices instead of NX-API")
  .option("--log-level <level>", "debug | info | warn | error");

program
  .command("serve")
  .description("Serve the HTTP API")
  .option("--host <host>", "Listen address")
  .option("--port <port>", "Listen port", parseInteger("port"))
  .action(async (options: { host?: string; port?: number }) => {
    const runtime = await bootstrap("serve", {
      FABRIC_LISTEN_HOST: options.host,
      FABRIC_LISTEN_PORT: options.port === undefined ? undefined : String(options.port),
    });
    const { host, port } = runtime.config.listen;
    const app = createFabricExpressApp(runtime.handler, { logger: runtime.logger });
    const server = app.listen(port, host, () => {
      runtime.logger.info("fabricctl.serve.listening", { host, port });
    });

    const shutdown = (signal: string) => {
      runtime.logger.info("fabricctl.serve.stopping", { signal, pendingApplies: runtime.orchestrator.pendingApplies });
      server.close();
      void runtime.orchestrator.drain().then(() => {
        runtime.logger.info("fabricctl.serve.drained");
      });
    };
    process.once("SIGINT", () => shutdown("SIGINT"));
    process.once("SIGTERM", () => shutdown("SIGTERM"));
  });

program
  .command("precheck")
  .description("Read a port and report whether it is safe to reconfigure")
  .argument("<device>", "Device name from the inventory")
  .argument("<interface>", "Interface name, e.g. Eth1/1")
  .addOption(formatOption())
  .action(async (device: string, iface: string, options: FormatOptions) => {
    await withRuntime(async (runtime) => {
      const result = unwrap(await runtime.orchestrator.precheck(device, iface, { signal: interruptSignal() }));
      printResult(result, options.format);
      if (!result.isSafe) {
        process.exitCode = 1;
      }
    });
  });

interface ConfigureCommandOptions extends FormatOptions {
  readonly mode: string;
  readonly vlan?: number;
  readonly allowedVlans?: number[];
  readonly description?: string;
  readonly vni?: number;
  readonly vrf?: string;
  readonly author?: string;
}

program
  .command("configure")
  .description("Pre-check, commit and apply a port change")
  .argument("<device>", "Device name from the inventory")
  .argument("<interface>", "Interface name, e.g. Eth1/1")
  .addOption(new Option("--mode <mode>", "Switchport mode").choices(["access", "trunk"]).default("access"))
  .option("--vlan <id>", "Access VLAN, or a trunk member", parseInteger("vlan"))
  .option("--allowed-vlans <list>", "Trunk allowed VLANs, e.g. 10,20-22", parseAllowedVlans)
  .option("--description <text>", "Interface description")
  .option("--vni <vni>", "VXLAN network identifier", parseInteger("vni"))
  .option("--vrf <name>", "VRF membership")
  .option("--author <name>", "Recorded as the change author")
  .addOption(formatOption())
  .action(async (device: string, iface: string, options: ConfigureCommandOptions) => {
    const { format, ...fields } = options;
    const request = unwrap(validateChangeRequest({ device, interface: iface, ...fields }));
    await withRuntime(async (runtime) => {
      printReport(await runtime.orchestrator.configure(request, { signal: interruptSignal() }), format);
    });
  });

program
  .command("history")
  .description("List audited changes, newest first")
  .option("--device <name>", "Only this device")
  .option("--interface <name>", "Only this interface")
  .option("--limit <count>", "Maximum entries", parseInteger("limit"))
  .addOption(formatOption())
  .action(async (options: FormatOptions & { device?: string; interface?: string; limit?: number }) => {
    await withRuntime(async (runtime) => {
      const history = unwrap(
        await runtime.orchestrator.history({ device: options.device, interface: options.interface, limit: options.limit }),
      );
      printResult({ history }, options.format);
    });
  });

program
  .command("rollback")
  .description("Re-apply the configuration recorded by an earlier commit")
  .argument("<commitId>", "Commit to restore")
  .option("--author <name>", "Recorded as the rollback author")
  .option("--no-apply", "Record the rollback without pushing it to the device")
  .addOption(formatOption())
  .action(async (commitId: string, options: FormatOptions & { author?: string; apply: boolean }) => {
    await withRuntime(async (runtime) => {
      const report = await runtime.orchestrator.rollback(commitId, {
        author: options.author,
        apply: options.apply,
        signal: interruptSignal(),
      });
      printReport(report, options.format);
    });
  });

program
  .command("devices")
  .description("List inventory devices")
  .addOption(formatOption())
  .action(async (options: FormatOptions) => {
    await withRuntime(async (runtime) => {
      printResult({ devices: unwrap(await runtime.orchestrator.listDevices()) }, options.format);
    });
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  if (error instanceof FabricCliError) {
    console.error(formatOutput({ error: error.error }, "yaml"));
  } else {
    console.error(error instanceof Error ? error.message : error);
  }
  process.exitCode = 1;
});
