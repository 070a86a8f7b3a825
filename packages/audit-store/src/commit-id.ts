import { createHash } from "node:crypto";

type JsonValue = null | boolean | number | string | JsonValue[] | { readonly [key: string]: JsonValue };

const normalize = (value: unknown): JsonValue => {
  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
    return value;
  }
  if (Array.isArray(value)) {
    return value.map((item) => normalize(item));
  }
  if (typeof value !== "object") {
    return String(value);
  }
  const entries = Object.entries(value)
    .filter(([, inner]) => inner !== undefined)
    .map(([key, inner]) => [key, normalize(inner)] as const)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  return Object.fromEntries(entries);
};

export const stableStringify = (value: unknown): string => JSON.stringify(normalize(value));

export const COMMIT_ID_LENGTH = 12;

export const COMMIT_ID_PATTERN = /^[0-9a-f]{12}(?:-\d+)?$/;

export interface CommitDigestInput {
  readonly device: string;
  readonly interface: string;
  readonly lines: ReadonlyArray<string>;
  readonly author: string;
  readonly committedAt: string;
  readonly sequence: number;
  readonly parentCommitId: string | null;
  readonly kind: string;
}

/**
 * Short content digest. Sequence and timestamp are part of the input, so
 * identical content committed twice still yields distinct ids.
 */
export const computeCommitId = (input: CommitDigestInput): string =>
  createHash("sha256").update(stableStringify(input)).digest("hex").slice(0, COMMIT_ID_LENGTH);

export const withCollisionSuffix = (base: string, attempt: number): string =>
  attempt === 0 ? base : `${base}-${attempt}`;
