import path from "node:path";
import { z } from "zod";

import { resolveEnv, type EnvSource } from "../utils/env.js";
import { ConfigValidationError } from "./errors.js";
import { formatZodIssues } from "./schema.js";

export const DEFAULT_STRUCTURED_CONFIG = "environments.yaml";
export const DEFAULT_LEGACY_CONFIG = ".env";

function asBoolean(value: string | undefined): boolean | undefined {
  if (value === undefined) {
    return undefined;
  }
  const normalized = value.trim().toLowerCase();
  if (normalized === "true" || normalized === "1" || normalized === "yes" || normalized === "on") {
    return true;
  }
  if (normalized === "false" || normalized === "0" || normalized === "no" || normalized === "off") {
    return false;
  }
  return undefined;
}

export const BrokerSettingsSchema = z.object({
  structuredPath: z.string().min(1),
  legacyPath: z.string().min(1),
  watch: z.object({
    enabled: z.boolean().default(true),
    debounceMs: z.number().int().min(0).max(60_000).default(250),
  }).default({}),
});
export type BrokerSettings = z.infer<typeof BrokerSettingsSchema>;

/**
 * Resolve where the environment sources live and how hot reload behaves.
 * Relative paths are anchored at CONFIG_BASE_DIR (default: the working directory).
 */
export function loadBrokerSettings(env: EnvSource = process.env): BrokerSettings {
  const baseDir = resolveEnv("CONFIG_BASE_DIR", undefined, env) ?? process.cwd();
  const structured = resolveEnv("ENVIRONMENTS_CONFIG", DEFAULT_STRUCTURED_CONFIG, env) ?? DEFAULT_STRUCTURED_CONFIG;
  const legacy = resolveEnv("LEGACY_ENV_FILE", DEFAULT_LEGACY_CONFIG, env) ?? DEFAULT_LEGACY_CONFIG;
  const rawDebounce = resolveEnv("CONFIG_WATCH_DEBOUNCE_MS", undefined, env);

  const result = BrokerSettingsSchema.safeParse({
    structuredPath: path.resolve(baseDir, structured),
    legacyPath: path.resolve(baseDir, legacy),
    watch: {
      enabled: asBoolean(resolveEnv("CONFIG_WATCH", undefined, env)),
      debounceMs: rawDebounce === undefined ? undefined : Number(rawDebounce),
    },
  });
  if (!result.success) {
    const issues = formatZodIssues(result.error);
    throw new ConfigValidationError(`Invalid broker settings: ${issues.join("; ")}`, { issues });
  }
  return result.data;
}
