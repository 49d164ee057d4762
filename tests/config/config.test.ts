/**
 * Environment configuration tests
 */

import os from "os";
import path from "path";
import { describe, it, expect } from "vitest";
import { expandHome, loadConfig, parsePlatform } from "../../src/config/index.js";
import { ConfigurationError } from "../../src/utils/errors.js";

describe("loadConfig", () => {
  it("should apply defaults", () => {
    expect(loadConfig({})).toEqual({
      platform: "live",
      profilePath: "~/.igdeal.yaml",
      requestTimeoutMs: 30_000,
      logLevel: "warn",
    });
  });

  it("should read IG_* variables", () => {
    const config = loadConfig({
      IG_PLATFORM: "demo",
      IG_API_KEY: "test-key",
      IG_USERNAME: "test-user",
      IG_PASSWORD: "test-secret",
      IG_CONFIG_FILE: "/etc/igdeal.yaml",
      IG_REQUEST_TIMEOUT_MS: "5000",
      LOG_LEVEL: "debug",
    });

    expect(config.platform).toBe("demo");
    expect(config.apiKey).toBe("test-key");
    expect(config.profilePath).toBe("/etc/igdeal.yaml");
    expect(config.requestTimeoutMs).toBe(5000);
    expect(config.logLevel).toBe("debug");
  });

  it("should reject an unknown platform", () => {
    expect(() => loadConfig({ IG_PLATFORM: "does_not_exist" })).toThrow(
      "Unknown platform type: does_not_exist (valid options: 'live', 'demo')"
    );
  });

  it("should report invalid values as ConfigurationError", () => {
    expect(() => loadConfig({ LOG_LEVEL: "chatty" })).toThrow(ConfigurationError);
    expect(() => loadConfig({ IG_REQUEST_TIMEOUT_MS: "-1" })).toThrow(ConfigurationError);
  });
});

describe("parsePlatform", () => {
  it("should accept known platforms", () => {
    expect(parsePlatform("live")).toBe("live");
    expect(parsePlatform("demo")).toBe("demo");
  });

  it("should not accept inherited property names", () => {
    expect(() => parsePlatform("toString")).toThrow(ConfigurationError);
  });
});

describe("expandHome", () => {
  it("should expand a leading tilde", () => {
    expect(expandHome("~/.igdeal.yaml")).toBe(path.join(os.homedir(), ".igdeal.yaml"));
    expect(expandHome("~")).toBe(os.homedir());
  });

  it("should leave other paths alone", () => {
    expect(expandHome("/tmp/~x.yaml")).toBe("/tmp/~x.yaml");
  });
});
