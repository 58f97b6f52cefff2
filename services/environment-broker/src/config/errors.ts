export type EnvironmentErrorCode =
  | "config_not_found"
  | "config_parse"
  | "config_validation"
  | "unknown_environment"
  | "precondition";

export abstract class EnvironmentConfigError extends Error {
  abstract readonly code: EnvironmentErrorCode;
}

/** Neither the structured nor the legacy source exists. */
export class ConfigNotFoundError extends EnvironmentConfigError {
  readonly code = "config_not_found";
  readonly paths: readonly string[];

  constructor(structuredPath: string, legacyPath: string) {
    super(
      "No configuration file found. Please create either:\n" +
        `  - ${structuredPath} (recommended for multiple environments)\n` +
        `  - ${legacyPath} (legacy single environment)`,
    );
    this.name = "ConfigNotFoundError";
    this.paths = [structuredPath, legacyPath];
  }
}

export class ConfigParseError extends EnvironmentConfigError {
  readonly code = "config_parse";
  readonly path: string;
  readonly cause: Error;

  constructor(path: string, cause: Error) {
    super(`Invalid YAML format in ${path}: ${cause.message}`);
    this.name = "ConfigParseError";
    this.path = path;
    this.cause = cause;
  }
}

export class ConfigValidationError extends EnvironmentConfigError {
  readonly code = "config_validation";
  readonly issues: readonly string[];
  readonly missing?: readonly string[];

  constructor(message: string, options: { issues?: string[]; missing?: string[] } = {}) {
    super(message);
    this.name = "ConfigValidationError";
    this.issues = options.issues ?? [message];
    this.missing = options.missing;
  }
}

export class UnknownEnvironmentError extends EnvironmentConfigError {
  readonly code = "unknown_environment";
  readonly requested: string;
  readonly available: readonly string[];

  constructor(requested: string, available: readonly string[]) {
    super(`Environment '${requested}' not found. Available environments: ${available.join(", ")}`);
    this.name = "UnknownEnvironmentError";
    this.requested = requested;
    this.available = [...available];
  }
}

/** An operation ran before `load` or before an environment was activated. */
export class PreconditionError extends EnvironmentConfigError {
  readonly code = "precondition";

  constructor(message: string) {
    super(message);
    this.name = "PreconditionError";
  }
}

export function isEnvironmentConfigError(value: unknown): value is EnvironmentConfigError {
  return value instanceof EnvironmentConfigError;
}
