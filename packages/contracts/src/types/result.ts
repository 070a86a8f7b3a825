import type { FabricError } from "./domain-error.js";

export type Result<TValue, TError extends FabricError = FabricError> =
  | { readonly ok: true; readonly value: TValue }
  | { readonly ok: false; readonly error: TError };

export const ok = <TValue>(value: TValue): Result<TValue, never> => ({ ok: true as const, value });

export const err = <TError extends FabricError>(error: TError): Result<never, TError> => ({
  ok: false as const,
  error,
});
