export type FabricLogLevel = "debug" | "info" | "warn" | "error";

export type FabricLogSink = (level: FabricLogLevel, line: string) => void;

/**
 * Context attached to a log line. The named fields are the ones operators
 * search by; anything else is carried as-is.
 */
export interface FabricLogContext {
  readonly changeId?: string;
  readonly commitId?: string;
  readonly device?: string;
  readonly interface?: string;
  readonly stage?: string;
  readonly code?: string;
  readonly [field: string]: unknown;
}

export interface FabricLoggerOptions {
  readonly name?: string;
  readonly level?: FabricLogLevel;
  readonly fields?: FabricLogContext;
  readonly sink?: FabricLogSink;
  readonly now?: () => Date;
}

export interface FabricLogger {
  debug(message: string, context?: FabricLogContext): void;
  info(message: string, context?: FabricLogContext): void;
  warn(message: string, context?: FabricLogContext): void;
  error(message: string, context?: FabricLogContext): void;
  child(context: FabricLogContext): FabricLogger;
}

export interface ChangeLogScope {
  readonly changeId: string;
  readonly kind?: string;
  readonly device?: string;
  readonly interface?: string;
}

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const satisfies ReadonlyArray<FabricLogLevel>;

const LOG_LEVEL_PRIORITY: Record<FabricLogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const consoleSink: FabricLogSink = (level, line) => {
  if (level === "error") {
    console.error(line);
  } else if (level === "warn") {
    console.warn(line);
  } else {
    console.log(line);
  }
};

// Device credentials travel in inventory descriptors and NX-API headers.
const REDACTED_FIELDS = new Set(["password", "authorization", "secret", "token"]);

const errorCode = (error: Error): string | undefined =>
  "code" in error && typeof error.code === "string" ? error.code : undefined;

const replaceValue = (key: string, value: unknown): unknown => {
  if (REDACTED_FIELDS.has(key.toLowerCase()) && value !== undefined && value !== null) {
    return "[redacted]";
  }
  if (value instanceof Error) {
    const code = errorCode(value);
    return code === undefined
      ? { name: value.name, message: value.message }
      : { name: value.name, message: value.message, code };
  }
  return value;
};

export const createFabricLogger = (options: FabricLoggerOptions = {}): FabricLogger => {
  const name = options.name ?? "fabricops";
  const threshold = LOG_LEVEL_PRIORITY[options.level ?? "info"];
  const sink = options.sink ?? consoleSink;
  const now = options.now ?? (() => new Date());
  const baseFields = {
    service: name,
    ...options.fields,
  } satisfies Record<string, unknown>;

  const createInstance = (contextFields: FabricLogContext): FabricLogger => {
    const write = (level: FabricLogLevel, message: string, context?: FabricLogContext) => {
      if (LOG_LEVEL_PRIORITY[level] < threshold) {
        return;
      }

      const payload = {
        timestamp: now().toISOString(),
        level,
        message,
        ...contextFields,
        ...context,
      } satisfies Record<string, unknown>;

      sink(level, JSON.stringify(payload, replaceValue));
    };

    return {
      debug(message, context) {
        write("debug", message, context);
      },
      info(message, context) {
        write("info", message, context);
      },
      warn(message, context) {
        write("warn", message, context);
      },
      error(message, context) {
        write("error", message, context);
      },
      child(additionalFields) {
        return createInstance({ ...contextFields, ...additionalFields });
      },
    } satisfies FabricLogger;
  };

  return createInstance(baseFields);
};

export const createSilentLogger = (): FabricLogger => createFabricLogger({ sink: () => undefined });

/** Binds one change's identity so every line it logs can be correlated. */
export const changeLogger = (logger: FabricLogger, scope: ChangeLogScope): FabricLogger =>
  logger.child(
    Object.fromEntries(Object.entries(scope).filter(([, value]) => value !== undefined)),
  );
