import { inspect } from "node:util";

export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

export interface LogEntry {
  level: LogLevel;
  message: string;
  component?: string;
  requestId?: string;
  meta?: unknown;
  timestamp?: string;
}

let minimumLevel: LogLevel = parseLevel(process.env.GUARDIAN_LOG_LEVEL) ?? "info";

export function parseLevel(value: string | undefined): LogLevel | undefined {
  const normalized = value?.trim().toLowerCase();
  return LOG_LEVELS.find((level) => level === normalized);
}

export function setLogLevel(level: LogLevel): void {
  minimumLevel = level;
}

export function getLogLevel(): LogLevel {
  return minimumLevel;
}

function isEnabled(level: LogLevel): boolean {
  return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(minimumLevel);
}

function normalizeMeta(meta: unknown): unknown {
  if (meta === undefined) {
    return undefined;
  }

  if (meta instanceof Error) {
    return { name: meta.name, message: meta.message };
  }

  try {
    JSON.stringify(meta);
    return meta;
  } catch {
    return inspect(meta, { depth: 3, breakLength: 80 });
  }
}

export function log(entry: LogEntry): void {
  if (!isEnabled(entry.level)) {
    return;
  }

  const payload: Record<string, unknown> = {
    level: entry.level,
    message: entry.message,
    timestamp: entry.timestamp ?? new Date().toISOString(),
  };

  if (entry.component) {
    payload.component = entry.component;
  }

  if (entry.requestId) {
    payload.requestId = entry.requestId;
  }

  const normalizedMeta = normalizeMeta(entry.meta);
  if (normalizedMeta !== undefined) {
    payload.meta = normalizedMeta;
  }

  // stdout belongs to the MCP transport and to CLI summaries
  console.error(JSON.stringify(payload));
}

export interface ComponentLogger {
  debug(message: string, meta?: unknown): void;
  info(message: string, meta?: unknown): void;
  warn(message: string, meta?: unknown): void;
  error(message: string, meta?: unknown): void;
}

export function componentLogger(component: string, requestId?: string): ComponentLogger {
  return {
    debug: (message, meta) => log({ level: "debug", message, component, requestId, meta }),
    info: (message, meta) => log({ level: "info", message, component, requestId, meta }),
    warn: (message, meta) => log({ level: "warn", message, component, requestId, meta }),
    error: (message, meta) => log({ level: "error", message, component, requestId, meta }),
  };
}

export const logger = {
  debug(message: string, component?: string, meta?: unknown): void {
    log({ level: "debug", message, component, meta });
  },
  info(message: string, component?: string, meta?: unknown): void {
    log({ level: "info", message, component, meta });
  },
  warn(message: string, component?: string, meta?: unknown): void {
    log({ level: "warn", message, component, meta });
  },
  error(message: string, component?: string, meta?: unknown): void {
    log({ level: "error", message, component, meta });
  },
};
