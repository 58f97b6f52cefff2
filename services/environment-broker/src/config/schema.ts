/**
 * Environment Configuration Schemas
 *
 * Zod schemas for a single warehouse environment and for the full
 * multi-environment document. Field-level rules live on the object schemas;
 * cross-field rules (auth exclusivity, key/name agreement, default presence)
 * are refinements, so a document that breaks any of them never parses.
 */

import { z, type ZodError } from "zod";

import { ConfigValidationError } from "./errors.js";

export const TOKEN_PREFIX = "dapi";

const IDENTIFIER_PATTERN = /^[A-Za-z0-9_-]+$/;
const HTTP_PATH_PATTERN = /^\/sql\/1\.0\/warehouses\/.+$/;

// ============================================================================
// Environment
// ============================================================================

// YAML writes a key with no value as null; treat it like an omitted key.
function absentAsUndefined<T>(value: T | null | undefined): T | undefined {
  return value ?? undefined;
}

export const EnvironmentNameSchema = z
  .string()
  .min(1)
  .max(50)
  .regex(IDENTIFIER_PATTERN, "Name must contain only alphanumeric characters, hyphens, and underscores");

export const TagSchema = z
  .string()
  .max(30, "Tag exceeds 30 character limit")
  .regex(IDENTIFIER_PATTERN, "Tag contains invalid characters");

export const EnvironmentConfigSchema = z
  .object({
    name: EnvironmentNameSchema,
    host: z
      .string()
      .trim()
      .min(1, "Host must not be blank")
      .refine(value => !value.startsWith("http://") && !value.startsWith("https://"), {
        message: "Host should not include protocol (http:// or https://)",
      }),
    token: z
      .string()
      .min(1)
      .refine(value => value.startsWith(TOKEN_PREFIX), { message: `Token should start with "${TOKEN_PREFIX}"` })
      .nullish()
      .transform(absentAsUndefined),
    profile: z
      .string()
      .min(1)
      .max(100)
      .regex(IDENTIFIER_PATTERN, "Profile name must contain only alphanumeric characters, hyphens, and underscores")
      .nullish()
      .transform(absentAsUndefined),
    http_path: z.string().regex(HTTP_PATH_PATTERN, "http_path must look like /sql/1.0/warehouses/<id>"),
    description: z.string().max(200).nullish().transform(absentAsUndefined),
    tags: z
      .array(TagSchema)
      .nullish()
      .transform(tags => tags ?? []),
  })
  .superRefine((env, ctx) => {
    const hasToken = env.token !== undefined;
    const hasProfile = env.profile !== undefined;
    if (!hasToken && !hasProfile) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Environment '${env.name}': Either 'token' or 'profile' must be specified`,
      });
    } else if (hasToken && hasProfile) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Environment '${env.name}': Cannot specify both 'token' and 'profile'. Choose one authentication method.`,
      });
    }
  });

export type EnvironmentConfigInput = z.input<typeof EnvironmentConfigSchema>;

type ParsedEnvironment = z.output<typeof EnvironmentConfigSchema>;

type EnvironmentBase = {
  readonly name: string;
  readonly host: string;
  readonly http_path: string;
  readonly description?: string;
  readonly tags: readonly string[];
};

export type TokenEnvironmentConfig = EnvironmentBase & { readonly token: string; readonly profile?: undefined };
export type ProfileEnvironmentConfig = EnvironmentBase & { readonly profile: string; readonly token?: undefined };

/** A validated environment: exactly one of `token` or `profile` is set. */
export type EnvironmentConfig = TokenEnvironmentConfig | ProfileEnvironmentConfig;

// ============================================================================
// Environments document
// ============================================================================

export const EnvironmentsDocumentSchema = z
  .object({
    default: EnvironmentNameSchema,
    environments: z
      .record(z.string(), EnvironmentConfigSchema)
      .refine(entries => Object.keys(entries).length > 0, { message: "At least one environment must be configured" }),
  })
  .superRefine((doc, ctx) => {
    for (const [key, env] of Object.entries(doc.environments)) {
      if (env.name !== key) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["environments", key, "name"],
          message: `Environment key "${key}" does not match environment name "${env.name}"`,
        });
      }
    }
    const names = Object.keys(doc.environments);
    if (names.length > 0 && !names.includes(doc.default)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["default"],
        message: `Default environment "${doc.default}" not found. Available environments: ${names.join(", ")}`,
      });
    }
  });

export type EnvironmentsDocumentInput = z.input<typeof EnvironmentsDocumentSchema>;

export interface EnvironmentsConfiguration {
  readonly default: string;
  readonly environments: ReadonlyMap<string, EnvironmentConfig>;
  getDefaultEnvironment(): EnvironmentConfig;
  getEnvironment(name: string): EnvironmentConfig | undefined;
  listEnvironmentNames(): string[];
}

// ============================================================================
// Construction
// ============================================================================

export function formatZodIssues(error: ZodError): string[] {
  return error.issues.map(issue => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message));
}

function freezeEnvironment(env: ParsedEnvironment): EnvironmentConfig {
  const base = {
    name: env.name,
    host: env.host,
    http_path: env.http_path,
    tags: Object.freeze([...env.tags]),
    ...(env.description !== undefined ? { description: env.description } : {}),
  };
  if (env.token !== undefined) {
    return Object.freeze({ ...base, token: env.token });
  }
  if (env.profile !== undefined) {
    return Object.freeze({ ...base, profile: env.profile });
  }
  // superRefine rejects this shape before it reaches here.
  throw new ConfigValidationError(`Environment '${env.name}': Either 'token' or 'profile' must be specified`);
}

/**
 * Validate one environment entry.
 * @throws ConfigValidationError listing every violated rule
 */
export function createEnvironmentConfig(input: unknown): EnvironmentConfig {
  const result = EnvironmentConfigSchema.safeParse(input);
  if (!result.success) {
    const issues = formatZodIssues(result.error);
    throw new ConfigValidationError(`Invalid environment configuration: ${issues.join("; ")}`, { issues });
  }
  return freezeEnvironment(result.data);
}

/**
 * Validate a full environments document and build the immutable aggregate.
 * @throws ConfigValidationError listing every violated rule
 */
export function createEnvironmentsConfiguration(input: unknown): EnvironmentsConfiguration {
  const result = EnvironmentsDocumentSchema.safeParse(input);
  if (!result.success) {
    const issues = formatZodIssues(result.error);
    throw new ConfigValidationError(`Invalid environments configuration: ${issues.join("; ")}`, { issues });
  }

  const environments = new Map<string, EnvironmentConfig>();
  for (const [key, env] of Object.entries(result.data.environments)) {
    environments.set(key, freezeEnvironment(env));
  }
  const defaultName = result.data.default;
  const defaultEnvironment = environments.get(defaultName);
  if (!defaultEnvironment) {
    throw new ConfigValidationError(`Default environment "${defaultName}" not found`);
  }

  return Object.freeze({
    default: defaultName,
    environments,
    getDefaultEnvironment: () => defaultEnvironment,
    getEnvironment: (name: string) => environments.get(name),
    listEnvironmentNames: () => Array.from(environments.keys()),
  });
}
