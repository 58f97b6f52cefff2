import auditLogger from "./logger.js";

export type AuditOutcome = "success" | "fallback" | "rejected" | "failure";

export type EnvironmentAuditAction =
  | "environment.activate"
  | "environment.switch"
  | "environment.reload"
  | "environment.fallback";

export type EnvironmentAuditEvent = {
  action: EnvironmentAuditAction;
  outcome: AuditOutcome;
  environment?: string;
  details?: Record<string, unknown>;
  error?: string;
};

const secretKeyPatterns = [
  /token/i,
  /secret/i,
  /password/i,
  /credential/i,
  /authorization/i,
  /api[_-]?key/i
];

function selectLevel(outcome: AuditOutcome): "info" | "warn" | "error" {
  switch (outcome) {
    case "failure":
      return "error";
    case "fallback":
    case "rejected":
      return "warn";
    default:
      return "info";
  }
}

function shouldMask(key?: string): boolean {
  if (!key) {
    return false;
  }
  return secretKeyPatterns.some((pattern) => pattern.test(key));
}

function sanitizeValue(value: unknown, key?: string): unknown {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value === "string" && shouldMask(key)) {
    return "[redacted]";
  }
  if (Array.isArray(value)) {
    const sanitizedArray = value
      .map((item) => sanitizeValue(item))
      .filter((item) => item !== undefined);
    return sanitizedArray.length > 0 ? sanitizedArray : undefined;
  }
  if (typeof value === "object") {
    const sanitizedObject: Record<string, unknown> = {};
    for (const [nestedKey, nestedValue] of Object.entries(value)) {
      const sanitized = sanitizeValue(nestedValue, nestedKey);
      if (sanitized !== undefined) {
        sanitizedObject[nestedKey] = sanitized;
      }
    }
    return Object.keys(sanitizedObject).length > 0
      ? sanitizedObject
      : undefined;
  }
  return value;
}

function sanitizeDetails(
  details?: Record<string, unknown>
): Record<string, unknown> | undefined {
  if (!details) {
    return undefined;
  }
  const sanitized: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(details)) {
    const sanitizedValue = sanitizeValue(value, key);
    if (sanitizedValue !== undefined) {
      sanitized[key] = sanitizedValue;
    }
  }
  return Object.keys(sanitized).length > 0 ? sanitized : undefined;
}

/**
 * Environment changes alter where outbound queries land, so every one of
 * them is written as a structured audit record. Fallbacks log at warn so
 * operators can alert on implicit endpoint changes. `level` and `service`
 * come from the logger itself.
 */
export function logEnvironmentAudit(event: EnvironmentAuditEvent): void {
  const level = selectLevel(event.outcome);
  const payload: Record<string, unknown> = {
    ts: new Date().toISOString(),
    audit: true,
    event: event.action,
    outcome: event.outcome,
    target: event.environment ?? "unspecified",
    redacted_details: sanitizeDetails(event.details) ?? {}
  };
  if (event.error) {
    payload.error = event.error;
  }

  try {
    auditLogger[level](payload);
  } catch (error) {
    auditLogger.error(
      { err: error instanceof Error ? error : new Error(String(error)) },
      "audit.log_failure"
    );
  }
}
