/**
 * Centralized configuration loaded from environment variables.
 * Uses zod for runtime validation.
 */

import os from "os";
import path from "path";
import { z, ZodError } from "zod";
import dotenv from "dotenv";
import { ConfigurationError } from "../utils/errors.js";

dotenv.config();

/** Dealing platforms and their REST gateways */
export const PLATFORM_URLS = {
  live: "https://api.ig.com/gateway/deal",
  demo: "https://demo-api.ig.com/gateway/deal",
} as const;

export type Platform = keyof typeof PLATFORM_URLS;

export const PLATFORMS: readonly Platform[] = ["live", "demo"];

export function isPlatform(value: string): value is Platform {
  return Object.hasOwn(PLATFORM_URLS, value);
}

/** Narrow a free-form platform name, rejecting anything not in the table */
export function parsePlatform(value: string): Platform {
  if (!isPlatform(value)) {
    throw new ConfigurationError(
      `Unknown platform type: ${value} (valid options: ${PLATFORMS.map((p) => `'${p}'`).join(", ")})`
    );
  }
  return value;
}

const ConfigSchema = z.object({
  platform: z.string().default("live").transform(parsePlatform),

  // Credentials; the profile file can supply them instead
  apiKey: z.string().optional(),
  username: z.string().optional(),
  password: z.string().optional(),

  profilePath: z.string().default("~/.igdeal.yaml"),
  requestTimeoutMs: z.coerce.number().int().positive().default(30_000),

  logLevel: z.enum(["debug", "info", "warn", "error"]).default("warn"),
});

export type Config = z.infer<typeof ConfigSchema>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const raw = {
    platform: env.IG_PLATFORM,
    apiKey: env.IG_API_KEY,
    username: env.IG_USERNAME,
    password: env.IG_PASSWORD,
    profilePath: env.IG_CONFIG_FILE,
    requestTimeoutMs: env.IG_REQUEST_TIMEOUT_MS,
    logLevel: env.LOG_LEVEL,
  };

  try {
    return ConfigSchema.parse(raw);
  } catch (err) {
    if (err instanceof ZodError) {
      const issue = err.issues[0];
      throw new ConfigurationError(
        `Invalid environment configuration: ${issue.path.join(".")}: ${issue.message}`,
        { cause: err }
      );
    }
    throw err;
  }
}

/** Expand a leading `~` to the current user's home directory */
export function expandHome(p: string): string {
  if (p === "~") return os.homedir();
  if (p.startsWith("~/")) return path.join(os.homedir(), p.slice(2));
  return p;
}
