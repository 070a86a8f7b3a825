import { z } from "zod";

export type NxapiMethod = "cli" | "cli_ascii";

export interface NxapiCommand {
  readonly method: NxapiMethod;
  readonly cmd: string;
}

export const buildRpcBatch = (commands: ReadonlyArray<NxapiCommand>) =>
  commands.map((command, index) => ({
    jsonrpc: "2.0",
    method: command.method,
    params: { cmd: command.cmd, version: 1 },
    id: index + 1,
  }));

const rpcErrorSchema = z.object({
  code: z.number(),
  message: z.string(),
  data: z.object({ msg: z.string().optional() }).passthrough().optional(),
});

const rpcResponseSchema = z.object({
  id: z.number(),
  result: z
    .object({
      body: z.unknown().optional(),
      msg: z.string().optional(),
    })
    .passthrough()
    .nullable()
    .optional(),
  error: rpcErrorSchema.optional(),
});

export type RpcResponse = z.infer<typeof rpcResponseSchema>;

// A batch of one comes back as a bare object.
export const rpcBatchResponseSchema = z.union([
  z.array(rpcResponseSchema),
  rpcResponseSchema.transform((response) => [response]),
]);

export const describeRpcError = (response: RpcResponse): string | null => {
  if (!response.error) {
    return null;
  }
  return response.error.data?.msg?.trim() || response.error.message;
};

const rowsOf = <TRow extends z.ZodTypeAny>(row: TRow) =>
  z.union([z.array(row), row.transform((single) => [single])]);

export const showInterfaceBodySchema = z.object({
  TABLE_interface: z.object({
    ROW_interface: rowsOf(
      z
        .object({
          interface: z.string().optional(),
          state: z.string().optional(),
          admin_state: z.string().optional(),
        })
        .passthrough(),
    ),
  }),
});

export const macTableBodySchema = z.object({
  TABLE_mac_address: z.object({
    ROW_mac_address: rowsOf(z.object({ disp_mac_addr: z.string() }).passthrough()),
  }),
});
