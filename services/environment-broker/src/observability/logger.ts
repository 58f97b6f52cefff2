import pino, { type DestinationStream, stdTimeFunctions, type Logger as PinoLogger } from "pino";

import { resolveEnv } from "../utils/env.js";

export type AppLogger = PinoLogger;

export type NormalizedError = {
  message: string;
  name?: string;
  stack?: string;
  code?: string | number;
  cause?: unknown;
  details?: Record<string, unknown>;
};

type CreateLoggerOptions = {
  level?: string;
  bindings?: Record<string, unknown>;
  destination?: DestinationStream;
};

/**
 * JSON logger tagged with SERVICE_NAME. Lines go to stderr unless a
 * destination is given: stdout carries tool-protocol frames when hosted over stdio.
 */
export function createLogger({ level, bindings, destination }: CreateLoggerOptions = {}): AppLogger {
  const logger = pino(
    {
      level: level ?? resolveEnv("LOG_LEVEL", "info"),
      base: { service: resolveEnv("SERVICE_NAME", "environment-broker") },
      timestamp: stdTimeFunctions.isoTime,
      formatters: {
        level(label: string) {
          return { level: label };
        },
      },
    },
    destination ?? pino.destination(2),
  );
  return bindings ? logger.child(bindings) : logger;
}

export const appLogger: AppLogger = createLogger({ bindings: { subsystem: "environments" } });
export default appLogger;

function extractCode(error: unknown): string | number | undefined {
  if (typeof error === "object" && error !== null && "code" in error) {
    const candidate = error.code;
    if (typeof candidate === "string" || typeof candidate === "number") {
      return candidate;
    }
  }
  return undefined;
}

function extractDetails(error: object): Record<string, unknown> | undefined {
  const details: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(error)) {
    if (key === "message" || key === "name" || key === "stack" || key === "code" || key === "cause") {
      continue;
    }
    details[key] = value;
  }
  return Object.keys(details).length > 0 ? details : undefined;
}

export function normalizeError(error: unknown): NormalizedError {
  if (error instanceof Error) {
    const normalized: NormalizedError = {
      message: error.message,
      name: error.name,
    };
    if (error.stack) {
      normalized.stack = error.stack;
    }
    const code = extractCode(error);
    if (code !== undefined) {
      normalized.code = code;
    }
    const cause = readCause(error);
    if (cause !== undefined) {
      normalized.cause = cause instanceof Error ? normalizeError(cause) : cause;
    }
    const details = extractDetails(error);
    if (details) {
      normalized.details = details;
    }
    return normalized;
  }

  if (typeof error === "string") {
    return { message: error };
  }

  if (typeof error === "object" && error !== null) {
    const message =
      "message" in error && typeof error.message === "string" && error.message.trim().length > 0
        ? error.message
        : safeStringify(error) ?? "Unknown error";
    const normalized: NormalizedError = { message };
    if ("name" in error && typeof error.name === "string") {
      normalized.name = error.name;
    }
    const code = extractCode(error);
    if (code !== undefined) {
      normalized.code = code;
    }
    return normalized;
  }

  return { message: safeStringify(error) ?? String(error) };
}

function safeStringify(value: unknown): string | undefined {
  try {
    return JSON.stringify(value);
  } catch {
    return undefined;
  }
}

function readCause(value: object): unknown | undefined {
  if ("cause" in value) {
    return value.cause;
  }
  return undefined;
}
