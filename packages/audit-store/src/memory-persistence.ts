import type { AuditPersistence } from "./persistence.js";

export interface MemoryAuditPersistence extends AuditPersistence {
  readonly files: ReadonlyMap<string, string>;
}

export const createMemoryPersistence = (): MemoryAuditPersistence => {
  const files = new Map<string, string>();

  return {
    files,
    async readText(path) {
      return files.get(path) ?? null;
    },
    async writeAtomic(path, contents) {
      files.set(path, contents);
    },
    async createExclusive(path, contents) {
      if (files.has(path)) {
        return false;
      }
      files.set(path, contents);
      return true;
    },
    async list(directory) {
      const prefix = `${directory}/`;
      const names = new Set<string>();
      for (const path of files.keys()) {
        if (path.startsWith(prefix)) {
          names.add(path.slice(prefix.length).split("/")[0]);
        }
      }
      return [...names].sort();
    },
    async remove(path) {
      files.delete(path);
    },
  };
};
