/*
 * Structured logger with run correlation and timing spans.
 */
import { randomUUID } from "node:crypto";
import { AsyncLocalStorage } from "node:async_hooks";

export type LogLevel = "debug" | "info" | "warn" | "error";

interface LogContext {
  runId?: string;
  source?: string;
  [key: string]: unknown;
}

const levelPriority: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

// Quiet unless the host raises the level with setLogLevel
let threshold = levelPriority.warn;

const asyncLocalStorage = new AsyncLocalStorage<LogContext>();

const log = (level: LogLevel, message: string, meta?: Record<string, unknown>): void => {
  if (levelPriority[level] < threshold) {
    return;
  }

  const context = asyncLocalStorage.getStore() || {};

  const payload = {
    timestamp: new Date().toISOString(),
    level,
    message,
    ...context,
    ...meta,
  };

  console.log(JSON.stringify(payload));
};

export const setLogLevel = (level: LogLevel): void => {
  threshold = levelPriority[level];
};

export const getRunContext = (): LogContext => {
  return asyncLocalStorage.getStore() || {};
};

/**
 * Run function with run context (id, source name) attached to every log line it emits
 */
export const runWithContext = <T>(context: LogContext, fn: () => T): T => {
  return asyncLocalStorage.run({ ...getRunContext(), ...context }, fn);
};

export const generateRunId = (): string => {
  return randomUUID();
};

/**
 * Start a timing span; `end` logs the elapsed milliseconds at debug level
 */
export const startSpan = (name: string): { end: (meta?: Record<string, unknown>) => void } => {
  const spanId = randomUUID();
  const startTime = Date.now();

  log("debug", `Span started: ${name}`, { span: name, spanId });

  return {
    end: (meta?: Record<string, unknown>) => {
      log("debug", `Span ended: ${name}`, {
        span: name,
        spanId,
        durationMs: Date.now() - startTime,
        ...meta,
      });
    },
  };
};

export const logger = {
  debug: (message: string, meta?: Record<string, unknown>) => log("debug", message, meta),
  info: (message: string, meta?: Record<string, unknown>) => log("info", message, meta),
  warn: (message: string, meta?: Record<string, unknown>) => log("warn", message, meta),
  error: (message: string, meta?: Record<string, unknown>) => log("error", message, meta),
};
