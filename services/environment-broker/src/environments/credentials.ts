import type { EnvironmentConfig } from "../config/schema.js";

export type TokenCredentialSet = {
  method: "token";
  host: string;
  httpPath: string;
  token: string;
};

export type ProfileCredentialSet = {
  method: "profile";
  host: string;
  httpPath: string;
  profile: string;
};

/** What an outbound SQL or REST client needs to authenticate against one warehouse. */
export type CredentialSet = TokenCredentialSet | ProfileCredentialSet;

export function toCredentialSet(config: EnvironmentConfig): CredentialSet {
  if (config.token !== undefined) {
    return { method: "token", host: config.host, httpPath: config.http_path, token: config.token };
  }
  return { method: "profile", host: config.host, httpPath: config.http_path, profile: config.profile };
}

export function maskToken(token: string | undefined | null): string {
  if (!token || token.length <= 8) {
    return "***";
  }
  return `${token.slice(0, 8)}...`;
}

/** Credential set with the token masked, for log lines. */
export function redactCredentials(credentials: CredentialSet): Record<string, string> {
  if (credentials.method === "token") {
    return {
      method: credentials.method,
      host: credentials.host,
      httpPath: credentials.httpPath,
      token: maskToken(credentials.token),
    };
  }
  return { ...credentials };
}

export type CredentialFields = {
  host?: string | null;
  token?: string | null;
  profile?: string | null;
  httpPath?: string | null;
};

export type CredentialField = "host" | "token" | "http_path";

export type CredentialCompleteness =
  | { complete: true }
  | { complete: false; missing: CredentialField[] };

function isBlank(value: string | null | undefined): boolean {
  return value === undefined || value === null || value.trim() === "";
}

/**
 * Check loosely typed connection fields for blanks before they reach a client.
 * Either `token` or `profile` satisfies the auth requirement; a missing auth
 * field is reported as `token`.
 */
export function checkCredentialsComplete(fields: CredentialFields): CredentialCompleteness {
  const missing: CredentialField[] = [];
  if (isBlank(fields.host)) {
    missing.push("host");
  }
  if (isBlank(fields.token) && isBlank(fields.profile)) {
    missing.push("token");
  }
  if (isBlank(fields.httpPath)) {
    missing.push("http_path");
  }
  return missing.length > 0 ? { complete: false, missing } : { complete: true };
}
