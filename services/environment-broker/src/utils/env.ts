import { readFileSync } from "node:fs";

/** `process.env`, or any record shaped like it. */
export type EnvSource = Record<string, string | undefined>;

function nonBlank(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

// `<NAME>_FILE` names a mounted file that holds the value; an unreadable file is treated as unset.
function readFromFile(name: string, env: EnvSource): string | undefined {
  const filePath = nonBlank(env[`${name}_FILE`]);
  if (!filePath) {
    return undefined;
  }
  try {
    return nonBlank(readFileSync(filePath, "utf-8"));
  } catch {
    return undefined;
  }
}

/**
 * Read one broker setting. `<NAME>_FILE` wins over `<NAME>`; blank values
 * count as unset and fall through to `fallback`.
 */
export function resolveEnv(name: string, fallback?: string, env: EnvSource = process.env): string | undefined {
  return readFromFile(name, env) ?? nonBlank(env[name]) ?? fallback;
}
