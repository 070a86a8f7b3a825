import { z } from "zod";

import {
  createValidationError,
  err,
  ok,
  type ChangeRequest,
  type FabricError,
  type Result,
  type ValidationIssue,
} from "@fabricops/contracts";

export const MIN_VLAN_ID = 1;
export const MAX_VLAN_ID = 4094;
export const MAX_VNI = 16_777_215;
export const MAX_DESCRIPTION_LENGTH = 254;

const PRINTABLE = /^[^\u0000-\u001f\u007f]+$/;
const VRF_NAME = /^[A-Za-z0-9_.:-]{1,32}$/;

export const vlanIdSchema = z
  .number({ invalid_type_error: "VLAN must be a number" })
  .int("VLAN must be an integer")
  .min(MIN_VLAN_ID, `VLAN must be between ${MIN_VLAN_ID} and ${MAX_VLAN_ID}`)
  .max(MAX_VLAN_ID, `VLAN must be between ${MIN_VLAN_ID} and ${MAX_VLAN_ID}`);

const identifierSchema = (label: string, maxLength: number) =>
  z
    .string({ required_error: `${label} is required` })
    .trim()
    .min(1, `${label} is required`)
    .max(maxLength, `${label} must be at most ${maxLength} characters`)
    .regex(PRINTABLE, `${label} must not contain control characters`);

export const switchportModeSchema = z.enum(["access", "trunk"]);

export const changeRequestSchema = z
  .object({
    device: identifierSchema("device", 253),
    interface: identifierSchema("interface", 64),
    mode: switchportModeSchema.default("access"),
    vlan: vlanIdSchema.optional(),
    allowedVlans: z.array(vlanIdSchema).min(1).max(MAX_VLAN_ID).optional(),
    description: z
      .union([
        z.literal("").transform(() => undefined),
        z
          .string()
          .max(MAX_DESCRIPTION_LENGTH, `description must be at most ${MAX_DESCRIPTION_LENGTH} characters`)
          .regex(PRINTABLE, "description must be a single line of printable text"),
      ])
      .optional(),
    vni: z
      .number({ invalid_type_error: "VNI must be a number" })
      .int("VNI must be an integer")
      .min(1, "VNI must be a positive integer")
      .max(MAX_VNI, `VNI must be at most ${MAX_VNI}`)
      .optional(),
    vrf: z.string().regex(VRF_NAME, "VRF name must be 1-32 characters of [A-Za-z0-9_.:-]").optional(),
    author: identifierSchema("author", 128).optional(),
  })
  .superRefine((value, ctx) => {
    if (value.mode === "access" && value.allowedVlans !== undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["allowedVlans"],
        message: "access ports carry at most one VLAN",
      });
    }
  });

export type ChangeRequestInput = z.input<typeof changeRequestSchema>;

export const toValidationIssues = (error: z.ZodError): ValidationIssue[] =>
  error.issues.map((issue) => ({
    path: issue.path.length > 0 ? issue.path.join(".") : "(root)",
    message: issue.message,
  }));

const freezeRequest = (request: z.output<typeof changeRequestSchema>): ChangeRequest => {
  const { allowedVlans, description, ...rest } = request;
  const withDescription = description === undefined ? rest : { ...rest, description };
  const frozen: ChangeRequest =
    allowedVlans === undefined
      ? withDescription
      : { ...withDescription, allowedVlans: Object.freeze([...allowedVlans]) };
  return Object.freeze(frozen);
};

/**
 * Parses untrusted input into an immutable ChangeRequest.
 */
export const validateChangeRequest = (input: unknown): Result<ChangeRequest, FabricError> => {
  const parsed = changeRequestSchema.safeParse(input);
  if (!parsed.success) {
    return err(createValidationError("Change request failed validation.", toValidationIssues(parsed.error)));
  }
  return ok(freezeRequest(parsed.data));
};
