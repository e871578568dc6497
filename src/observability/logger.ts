export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogContext {
  requestId?: string | null;
}

export type LogFields = Record<string, unknown>;

const SERVICE_NAME = "events-knowledge-assistant";

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

const SINKS: Record<LogLevel, (line: string) => void> = {
  debug: (line) => console.debug(line),
  info: (line) => console.info(line),
  warn: (line) => console.warn(line),
  error: (line) => console.error(line)
};

const isLogLevel = (value: string): value is LogLevel => Object.hasOwn(LEVEL_RANK, value);

export const parseLogLevel = (value: string | undefined): LogLevel => {
  const normalized = value?.trim().toLowerCase() ?? "";
  return isLogLevel(normalized) ? normalized : "info";
};

export const isLogLevelEnabled = (level: LogLevel): boolean =>
  LEVEL_RANK[level] >= LEVEL_RANK[parseLogLevel(process.env.LOG_LEVEL)];

/**
 * Writes one JSON line per event. Context and fields are flattened into the entry;
 * fields never override the fixed keys.
 */
const write = (level: LogLevel, event: string, context: LogContext, fields: LogFields): void => {
  if (!isLogLevelEnabled(level)) {
    return;
  }
  const entry = {
    ...fields,
    ts: new Date().toISOString(),
    level,
    service: SERVICE_NAME,
    event,
    request_id: context.requestId ?? null
  };
  SINKS[level](JSON.stringify(entry));
};

export const logDebug = (event: string, context: LogContext, fields: LogFields = {}): void =>
  write("debug", event, context, fields);

export const logInfo = (event: string, context: LogContext, fields: LogFields = {}): void =>
  write("info", event, context, fields);

export const logWarn = (event: string, context: LogContext, fields: LogFields = {}): void =>
  write("warn", event, context, fields);

export const logError = (event: string, context: LogContext, fields: LogFields = {}): void =>
  write("error", event, context, fields);

export const errorMessage = (error: unknown, fallback = "unknown error"): string => {
  if (error instanceof Error && error.message.trim().length > 0) {
    return error.message;
  }
  if (typeof error === "string" && error.trim().length > 0) {
    return error;
  }
  return fallback;
};

export const serializeError = (error: unknown): LogFields => {
  if (!(error instanceof Error)) {
    return { error_raw: String(error) };
  }

  const cause: unknown = error.cause;
  return {
    error_name: error.name,
    error_message: error.message,
    ...(error.stack ? { error_stack: error.stack } : {}),
    ...(cause instanceof Error
      ? { error_cause: { name: cause.name, message: cause.message } }
      : cause !== undefined
        ? { error_cause: cause }
        : {})
  };
};
