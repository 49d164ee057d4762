/**
 * YAML profile tests
 */

import os from "os";
import path from "path";
import { mkdtemp, rm, writeFile } from "fs/promises";
import { afterAll, beforeAll, describe, it, expect } from "vitest";
import { loadProfile, resolveProfile, type Profile } from "../../src/config/profile.js";
import { ConfigurationError } from "../../src/utils/errors.js";

let dir: string;

beforeAll(async () => {
  dir = await mkdtemp(path.join(os.tmpdir(), "igdeal-profile-"));
});

afterAll(async () => {
  await rm(dir, { recursive: true, force: true });
});

async function profileFile(name: string, content: string): Promise<string> {
  const file = path.join(dir, name);
  await writeFile(file, content, "utf-8");
  return file;
}

describe("loadProfile", () => {
  it("should return an empty profile when the file is missing", async () => {
    expect(await loadProfile(path.join(dir, "missing.yaml"))).toEqual({ platform: {}, auth: {} });
  });

  it("should treat an empty file as an empty profile", async () => {
    const file = await profileFile("empty.yaml", "");
    expect(await loadProfile(file)).toEqual({ platform: {}, auth: {} });
  });

  it("should parse platform and auth sections", async () => {
    const file = await profileFile(
      "full.yaml",
      [
        "platform:",
        "  default: demo",
        "auth:",
        "  demo:",
        "    api_key: test-key",
        "    username: test-user",
        "    password: test-secret",
        "",
      ].join("\n")
    );

    const profile = await loadProfile(file);

    expect(profile.platform.default).toBe("demo");
    expect(profile.auth.demo).toEqual({
      api_key: "test-key",
      username: "test-user",
      password: "test-secret",
    });
  });

  it("should reject malformed YAML", async () => {
    const file = await profileFile("broken.yaml", "auth: [unclosed\n");
    await expect(loadProfile(file)).rejects.toThrow(/^Failed to parse YAML from /);
  });

  it("should reject a profile with the wrong shape", async () => {
    const file = await profileFile("shape.yaml", "auth: 5\n");
    await expect(loadProfile(file)).rejects.toBeInstanceOf(ConfigurationError);
    await expect(loadProfile(file)).rejects.toThrow(/^Invalid profile .*: auth: /);
  });
});

describe("resolveProfile", () => {
  const profile: Profile = {
    platform: { default: "demo" },
    auth: {
      demo: { api_key: "demo-key", username: "demo-user", password: "demo-secret" },
      live: { api_key: "live-key", username: "live-user" },
    },
  };

  it("should use the file's default platform", () => {
    const resolved = resolveProfile(profile, {}, "live");
    expect(resolved).toEqual({
      platform: "demo",
      credentials: { apiKey: "demo-key", username: "demo-user", password: "demo-secret" },
    });
  });

  it("should let an explicit platform win", () => {
    const resolved = resolveProfile(profile, { IG_PASSWORD: "env-secret" }, "demo", "live");
    expect(resolved.platform).toBe("live");
    expect(resolved.credentials).toEqual({
      apiKey: "live-key",
      username: "live-user",
      password: "env-secret",
    });
  });

  it("should fall back to the environment platform and variables", () => {
    const resolved = resolveProfile(
      { platform: {}, auth: {} },
      { IG_API_KEY: "env-key", IG_USERNAME: "env-user", IG_PASSWORD: "env-secret" },
      "demo"
    );
    expect(resolved.platform).toBe("demo");
    expect(resolved.credentials.username).toBe("env-user");
  });

  it("should name the missing setting", () => {
    expect(() => resolveProfile(profile, {}, "demo", "live")).toThrow(
      "Required setting 'password' not found in auth.live or environment variable 'IG_PASSWORD'"
    );
  });

  it("should reject an unknown platform", () => {
    expect(() => resolveProfile(profile, {}, "demo", "paper")).toThrow(ConfigurationError);
  });
});
