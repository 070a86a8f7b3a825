import { randomUUID } from "node:crypto";
import { mkdir, readdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import { dirname, join } from "node:path";

/**
 * Filesystem-like substrate under the audit store. Paths are relative and
 * `/`-separated. Operations throw on I/O failure; absence is not a failure.
 */
export interface AuditPersistence {
  readText(path: string): Promise<string | null>;
  /** Replaces the file so readers see either the old or the new contents. */
  writeAtomic(path: string, contents: string): Promise<void>;
  /** Resolves false when the path already exists. */
  createExclusive(path: string, contents: string): Promise<boolean>;
  list(directory: string): Promise<string[]>;
  remove(path: string): Promise<void>;
}

const TEMP_SUFFIX = ".tmp";

const hasErrorCode = (error: unknown, code: string): boolean =>
  typeof error === "object" && error !== null && "code" in error && error.code === code;

export const createNodeFsPersistence = (root: string): AuditPersistence => {
  const resolvePath = (path: string): string => join(root, ...path.split("/"));

  return {
    async readText(path) {
      try {
        return await readFile(resolvePath(path), "utf8");
      } catch (error) {
        if (hasErrorCode(error, "ENOENT")) {
          return null;
        }
        throw error;
      }
    },
    async writeAtomic(path, contents) {
      const target = resolvePath(path);
      await mkdir(dirname(target), { recursive: true });
      const temp = `${target}.${randomUUID()}${TEMP_SUFFIX}`;
      await writeFile(temp, contents, "utf8");
      await rename(temp, target);
    },
    async createExclusive(path, contents) {
      const target = resolvePath(path);
      await mkdir(dirname(target), { recursive: true });
      try {
        await writeFile(target, contents, { encoding: "utf8", flag: "wx" });
        return true;
      } catch (error) {
        if (hasErrorCode(error, "EEXIST")) {
          return false;
        }
        throw error;
      }
    },
    async list(directory) {
      try {
        const entries = await readdir(resolvePath(directory));
        return entries.filter((entry) => !entry.endsWith(TEMP_SUFFIX)).sort();
      } catch (error) {
        if (hasErrorCode(error, "ENOENT")) {
          return [];
        }
        throw error;
      }
    },
    async remove(path) {
      await rm(resolvePath(path), { force: true });
    },
  };
};
