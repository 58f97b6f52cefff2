import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

const mocks = vi.hoisted(() => {
  const logger = {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
  return { logger };
});

vi.mock("../observability/logger", () => ({
  appLogger: {
    child: () => mocks.logger,
  },
}));

import { ConfigNotFoundError, ConfigParseError, ConfigValidationError } from "./errors.js";
import { loadFromLegacy, loadFromStructured, resolveConfiguration } from "./resolveConfig.js";

const STRUCTURED = `default: dev
environments:
  dev:
    host: dev.cloud.example.com
    profile: dev-profile
    http_path: /sql/1.0/warehouses/abc123
    description: Development
    tags: [development]
  prod:
    host: prod.cloud.example.com
    token: dapi-test-token
    http_path: /sql/1.0/warehouses/def456
`;

describe("resolveConfiguration", () => {
  let tmpDir: string;
  let structuredPath: string;
  let legacyPath: string;

  beforeEach(() => {
    vi.clearAllMocks();
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "env-resolver-"));
    structuredPath = path.join(tmpDir, "environments.yaml");
    legacyPath = path.join(tmpDir, ".env");
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("parses the structured source and injects names from keys", async () => {
    fs.writeFileSync(structuredPath, STRUCTURED);

    const resolved = await resolveConfiguration(structuredPath, legacyPath);

    expect(resolved.source).toBe("structured");
    expect(resolved.path).toBe(structuredPath);
    const { configuration } = resolved;
    expect(configuration.default).toBe("dev");
    expect(configuration.listEnvironmentNames()).toEqual(["dev", "prod"]);
    for (const [key, env] of configuration.environments) {
      expect(env.name).toBe(key);
    }
    expect(configuration.getEnvironment("dev")?.tags).toEqual(["development"]);
    expect(configuration.getEnvironment("prod")?.token).toBe("dapi-test-token");
  });

  it("treats keys left blank in YAML as absent", async () => {
    fs.writeFileSync(
      structuredPath,
      [
        "default: dev",
        "environments:",
        "  dev:",
        "    host: dev.cloud.example.com",
        "    token:",
        "    profile: dev-profile",
        "    http_path: /sql/1.0/warehouses/abc123",
        "    description:",
        "",
      ].join("\n"),
    );

    const { configuration } = await resolveConfiguration(structuredPath, legacyPath);

    expect(configuration.getDefaultEnvironment()).toEqual({
      name: "dev",
      host: "dev.cloud.example.com",
      profile: "dev-profile",
      http_path: "/sql/1.0/warehouses/abc123",
      tags: [],
    });
  });

  it("rejects a structured source with a blank host before it becomes a configuration", async () => {
    fs.writeFileSync(structuredPath, STRUCTURED.replace("host: dev.cloud.example.com", 'host: "   "'));

    const error = await resolveConfiguration(structuredPath, legacyPath).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ConfigValidationError);
    expect(error instanceof ConfigValidationError ? error.issues : []).toContain(
      "environments.dev.host: Host must not be blank",
    );
  });

  it("prefers the structured source and warns when the legacy file also exists", async () => {
    fs.writeFileSync(structuredPath, STRUCTURED);
    fs.writeFileSync(legacyPath, "DATABRICKS_HOST=legacy.example.com\n");

    const resolved = await resolveConfiguration(structuredPath, legacyPath);

    expect(resolved.source).toBe("structured");
    expect(resolved.configuration.environments.has("default")).toBe(false);
    expect(mocks.logger.warn).toHaveBeenCalledWith(
      { structuredPath, legacyPath },
      expect.stringContaining(`Both ${structuredPath} and ${legacyPath} exist.`),
    );
  });

  it("falls back to the legacy source", async () => {
    fs.writeFileSync(
      legacyPath,
      [
        "DATABRICKS_HOST=legacy.example.com",
        "DATABRICKS_TOKEN=dapi-test-token",
        "DATABRICKS_HTTP_PATH=/sql/1.0/warehouses/legacy",
      ].join("\n"),
    );

    const resolved = await resolveConfiguration(structuredPath, legacyPath);

    expect(resolved.source).toBe("legacy");
    const { configuration } = resolved;
    expect(configuration.default).toBe("default");
    expect(configuration.listEnvironmentNames()).toEqual(["default"]);
    expect(configuration.getDefaultEnvironment()).toEqual({
      name: "default",
      host: "legacy.example.com",
      token: "dapi-test-token",
      http_path: "/sql/1.0/warehouses/legacy",
      description: `Migrated from ${legacyPath}`,
      tags: [],
    });
  });

  it("does not write legacy values into process.env", async () => {
    delete process.env.DATABRICKS_HOST;
    fs.writeFileSync(
      legacyPath,
      "DATABRICKS_HOST=legacy.example.com\nDATABRICKS_TOKEN=dapi-test-token\nDATABRICKS_HTTP_PATH=/sql/1.0/warehouses/x\n",
    );

    await resolveConfiguration(structuredPath, legacyPath);

    expect(process.env.DATABRICKS_HOST).toBeUndefined();
  });

  it("names exactly the missing legacy variables", async () => {
    fs.writeFileSync(legacyPath, "DATABRICKS_HOST=legacy.example.com\nDATABRICKS_HTTP_PATH=/sql/1.0/warehouses/x\n");

    const error = await resolveConfiguration(structuredPath, legacyPath).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ConfigValidationError);
    expect(error instanceof ConfigValidationError ? error.missing : undefined).toEqual(["DATABRICKS_TOKEN"]);
    expect(error instanceof Error ? error.message : "").toBe(
      `Missing required environment variables in ${legacyPath}: DATABRICKS_TOKEN`,
    );
  });

  it("lists every missing legacy variable, treating blanks as missing", async () => {
    fs.writeFileSync(legacyPath, "DATABRICKS_HOST=\nDATABRICKS_TOKEN=   \n");

    await expect(loadFromLegacy(legacyPath)).rejects.toThrow(
      "DATABRICKS_HOST, DATABRICKS_TOKEN, DATABRICKS_HTTP_PATH",
    );
  });

  it("fails with both candidate paths when neither source exists", async () => {
    const error = await resolveConfiguration(structuredPath, legacyPath).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ConfigNotFoundError);
    const message = error instanceof Error ? error.message : "";
    expect(message).toContain(structuredPath);
    expect(message).toContain(legacyPath);
    expect(error instanceof ConfigNotFoundError ? error.paths : []).toEqual([structuredPath, legacyPath]);
  });

  it("reports malformed YAML as a parse error", async () => {
    fs.writeFileSync(structuredPath, "default: dev\nenvironments: [unclosed\n");

    await expect(loadFromStructured(structuredPath)).rejects.toBeInstanceOf(ConfigParseError);
  });

  it("reports a non-mapping document as a parse error", async () => {
    fs.writeFileSync(structuredPath, "- just\n- a list\n");

    await expect(loadFromStructured(structuredPath)).rejects.toBeInstanceOf(ConfigParseError);
  });

  it("treats an empty structured source as a validation error", async () => {
    fs.writeFileSync(structuredPath, "# nothing configured yet\n");

    await expect(resolveConfiguration(structuredPath, legacyPath)).rejects.toThrow(
      `Configuration file is empty: ${structuredPath}`,
    );
  });

  it("rejects a structured source whose default is not configured", async () => {
    fs.writeFileSync(structuredPath, STRUCTURED.replace("default: dev", "default: staging"));

    await expect(resolveConfiguration(structuredPath, legacyPath)).rejects.toBeInstanceOf(ConfigValidationError);
  });

  it("rejects a structured source without environments", async () => {
    fs.writeFileSync(structuredPath, "default: dev\n");

    await expect(resolveConfiguration(structuredPath, legacyPath)).rejects.toBeInstanceOf(ConfigValidationError);
  });
});
