import { access, readFile } from "node:fs/promises";
import { parse as parseDotenv } from "dotenv";
import YAML from "yaml";

import { checkCredentialsComplete, type CredentialField } from "../environments/credentials.js";
import { appLogger } from "../observability/logger.js";
import { ConfigNotFoundError, ConfigParseError, ConfigValidationError } from "./errors.js";
import { createEnvironmentsConfiguration, type EnvironmentsConfiguration } from "./schema.js";

const logger = appLogger.child({ component: "config-resolver" });

export const LEGACY_VARIABLES = {
  host: "DATABRICKS_HOST",
  token: "DATABRICKS_TOKEN",
  httpPath: "DATABRICKS_HTTP_PATH",
} as const;

const LEGACY_VARIABLE_FOR_FIELD: Record<CredentialField, string> = {
  host: LEGACY_VARIABLES.host,
  token: LEGACY_VARIABLES.token,
  http_path: LEGACY_VARIABLES.httpPath,
};

export const LEGACY_ENVIRONMENT_NAME = "default";

export type ConfigSourceKind = "structured" | "legacy";

export type ResolvedConfiguration = {
  source: ConfigSourceKind;
  path: string;
  configuration: EnvironmentsConfiguration;
};

async function fileExists(filePath: string): Promise<boolean> {
  try {
    await access(filePath);
    return true;
  } catch {
    return false;
  }
}

function asRecord(value: unknown): Record<string, unknown> | undefined {
  return typeof value === "object" && value !== null && !Array.isArray(value)
    ? (value as Record<string, unknown>)
    : undefined;
}

function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

/**
 * Parse the multi-environment YAML document. Map keys are copied into each
 * entry's `name` so the key/name invariant is checked without the file
 * repeating itself.
 */
export async function loadFromStructured(filePath: string): Promise<EnvironmentsConfiguration> {
  logger.info({ path: filePath }, "loading structured environment configuration");
  const raw = await readFile(filePath, "utf-8");

  let parsed: unknown;
  try {
    parsed = YAML.parse(raw);
  } catch (error) {
    throw new ConfigParseError(filePath, toError(error));
  }

  if (parsed === null || parsed === undefined) {
    throw new ConfigValidationError(`Configuration file is empty: ${filePath}`);
  }
  const doc = asRecord(parsed);
  if (!doc) {
    throw new ConfigParseError(filePath, new Error("top-level value must be a mapping"));
  }

  const entries = asRecord(doc.environments);
  const environments: Record<string, unknown> = {};
  if (entries) {
    for (const [name, entry] of Object.entries(entries)) {
      const record = asRecord(entry);
      environments[name] = record ? { ...record, name } : entry;
    }
  }

  const configuration = createEnvironmentsConfiguration({
    default: doc.default,
    environments: entries ? environments : doc.environments,
  });
  logger.info(
    { path: filePath, environments: configuration.environments.size },
    "structured environment configuration loaded",
  );
  return configuration;
}

/**
 * Build a single-environment configuration from a flat KEY=value file.
 * The file is parsed into a local record; process.env is never touched.
 */
export async function loadFromLegacy(filePath: string): Promise<EnvironmentsConfiguration> {
  logger.warn({ path: filePath }, "structured configuration not found, using legacy configuration");
  const values = parseDotenv(await readFile(filePath, "utf-8"));

  const read = (key: string): string | undefined => {
    const value = values[key]?.trim();
    return value && value.length > 0 ? value : undefined;
  };
  const host = read(LEGACY_VARIABLES.host);
  const token = read(LEGACY_VARIABLES.token);
  const httpPath = read(LEGACY_VARIABLES.httpPath);

  const completeness = checkCredentialsComplete({ host, token, httpPath });
  if (!completeness.complete) {
    const missing = completeness.missing.map(field => LEGACY_VARIABLE_FOR_FIELD[field]);
    throw new ConfigValidationError(
      `Missing required environment variables in ${filePath}: ${missing.join(", ")}`,
      { missing },
    );
  }

  const configuration = createEnvironmentsConfiguration({
    default: LEGACY_ENVIRONMENT_NAME,
    environments: {
      [LEGACY_ENVIRONMENT_NAME]: {
        name: LEGACY_ENVIRONMENT_NAME,
        host,
        token,
        http_path: httpPath,
        description: `Migrated from ${filePath}`,
      },
    },
  });
  logger.info({ path: filePath, environments: 1 }, "legacy configuration loaded (backward compatibility mode)");
  return configuration;
}

/**
 * Pick the configuration source by precedence: the structured file always
 * wins, the legacy file is the fallback, and having neither is fatal.
 */
export async function resolveConfiguration(
  structuredPath: string,
  legacyPath: string,
): Promise<ResolvedConfiguration> {
  const [hasStructured, hasLegacy] = await Promise.all([fileExists(structuredPath), fileExists(legacyPath)]);

  if (hasStructured) {
    if (hasLegacy) {
      logger.warn(
        { structuredPath, legacyPath },
        `Both ${structuredPath} and ${legacyPath} exist. Using ${structuredPath} (preferred). ` +
          `Consider removing ${legacyPath} if no longer needed.`,
      );
    }
    return {
      source: "structured",
      path: structuredPath,
      configuration: await loadFromStructured(structuredPath),
    };
  }

  if (hasLegacy) {
    return {
      source: "legacy",
      path: legacyPath,
      configuration: await loadFromLegacy(legacyPath),
    };
  }

  throw new ConfigNotFoundError(structuredPath, legacyPath);
}
