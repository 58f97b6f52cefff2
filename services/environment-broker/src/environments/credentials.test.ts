import { describe, expect, it } from "vitest";

import { createEnvironmentConfig } from "../config/schema.js";
import {
  checkCredentialsComplete,
  maskToken,
  redactCredentials,
  toCredentialSet,
} from "./credentials.js";

describe("toCredentialSet", () => {
  it("returns token credentials for token environments", () => {
    const config = createEnvironmentConfig({
      name: "prod",
      host: "prod.cloud.example.com",
      token: "dapi-test-token",
      http_path: "/sql/1.0/warehouses/def456",
    });

    expect(toCredentialSet(config)).toEqual({
      method: "token",
      host: "prod.cloud.example.com",
      httpPath: "/sql/1.0/warehouses/def456",
      token: "dapi-test-token",
    });
  });

  it("returns profile credentials for profile environments", () => {
    const config = createEnvironmentConfig({
      name: "dev",
      host: "dev.cloud.example.com",
      profile: "dev-profile",
      http_path: "/sql/1.0/warehouses/abc123",
    });

    const credentials = toCredentialSet(config);

    expect(credentials).toEqual({
      method: "profile",
      host: "dev.cloud.example.com",
      httpPath: "/sql/1.0/warehouses/abc123",
      profile: "dev-profile",
    });
    expect("token" in credentials).toBe(false);
  });

  it("returns a fresh object on every call", () => {
    const config = createEnvironmentConfig({
      name: "dev",
      host: "dev.cloud.example.com",
      profile: "dev-profile",
      http_path: "/sql/1.0/warehouses/abc123",
    });

    expect(toCredentialSet(config)).not.toBe(toCredentialSet(config));
  });
});

describe("maskToken", () => {
  it("keeps the first eight characters", () => {
    expect(maskToken("dapi1234567890")).toBe("dapi1234...");
  });

  it("fully masks short or empty values", () => {
    expect(maskToken("short")).toBe("***");
    expect(maskToken("12345678")).toBe("***");
    expect(maskToken("")).toBe("***");
    expect(maskToken(undefined)).toBe("***");
  });
});

describe("redactCredentials", () => {
  it("masks tokens", () => {
    expect(
      redactCredentials({
        method: "token",
        host: "h.example.com",
        httpPath: "/sql/1.0/warehouses/x",
        token: "dapi1234567890",
      }),
    ).toEqual({
      method: "token",
      host: "h.example.com",
      httpPath: "/sql/1.0/warehouses/x",
      token: "dapi1234...",
    });
  });
});

describe("checkCredentialsComplete", () => {
  it("passes when every field has content", () => {
    expect(
      checkCredentialsComplete({
        host: "  dev.cloud.example.com  ",
        token: "dapi123456789",
        httpPath: "/sql/1.0/warehouses/abc123",
      }),
    ).toEqual({ complete: true });
  });

  it("accepts a profile in place of a token", () => {
    expect(
      checkCredentialsComplete({ host: "h", profile: "dev-profile", httpPath: "/sql/1.0/warehouses/abc123" }),
    ).toEqual({ complete: true });
  });

  it("reports missing fields in order", () => {
    expect(checkCredentialsComplete({ host: null, token: "   ", httpPath: "" })).toEqual({
      complete: false,
      missing: ["host", "token", "http_path"],
    });
  });

  it("reports only the blank field", () => {
    expect(checkCredentialsComplete({ host: "h", token: "dapi1", httpPath: " " })).toEqual({
      complete: false,
      missing: ["http_path"],
    });
  });
});
