/**
 * YAML profile file — per-platform credentials and the default platform.
 *
 *   platform:
 *     default: demo
 *   auth:
 *     demo:
 *       api_key: ...
 *       username: ...
 *       password: ...
 *
 * A missing file is an empty profile. Values absent from the file fall back
 * to the IG_* environment variables.
 */

import { readFile } from "fs/promises";
import { parse } from "yaml";
import { z } from "zod";
import { ConfigurationError } from "../utils/errors.js";
import { componentLogger } from "../utils/logger.js";
import { expandHome, parsePlatform, type Platform } from "./index.js";
import type { Credentials } from "../api/ig/auth.js";

const log = componentLogger("config");

const AuthSectionSchema = z.object({
  api_key: z.string().optional(),
  username: z.string().optional(),
  password: z.string().optional(),
});

type AuthSection = z.infer<typeof AuthSectionSchema>;

export const ProfileSchema = z.object({
  platform: z
    .object({
      default: z.string().optional(),
    })
    .default({}),
  auth: z.record(AuthSectionSchema).default({}),
});

export type Profile = z.infer<typeof ProfileSchema>;

const EMPTY_PROFILE: Profile = { platform: {}, auth: {} };

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/**
 * Load and validate the profile file.
 *
 * @throws ConfigurationError if the file exists but is not valid YAML or has the wrong shape
 */
export async function loadProfile(profilePath: string): Promise<Profile> {
  const resolved = expandHome(profilePath);

  let content: string;
  try {
    content = await readFile(resolved, "utf-8");
  } catch (err) {
    if (isNotFound(err)) {
      log.debug(`No profile at ${resolved}, using environment only`);
      return { ...EMPTY_PROFILE };
    }
    throw new ConfigurationError(`Failed to read ${resolved}`, { cause: err });
  }

  let parsed: unknown;
  try {
    // An empty document parses to null
    parsed = parse(content) ?? {};
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigurationError(`Failed to parse YAML from ${resolved}: ${message}`, {
      cause: err,
    });
  }

  const result = ProfileSchema.safeParse(parsed);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new ConfigurationError(
      `Invalid profile ${resolved}: ${issue.path.join(".")}: ${issue.message}`
    );
  }
  return result.data;
}

/** Credentials plus the platform they belong to */
export interface ResolvedProfile {
  platform: Platform;
  credentials: Credentials;
}

/**
 * Pick the platform and its credentials.
 *
 * Platform precedence: explicit argument, `platform.default` in the file, then
 * the environment (`IG_PLATFORM`, already folded into `envPlatform`).
 * Each credential field comes from `auth.<platform>` first, then `IG_<FIELD>`.
 */
export function resolveProfile(
  profile: Profile,
  env: NodeJS.ProcessEnv,
  envPlatform: Platform,
  explicitPlatform?: string
): ResolvedProfile {
  const platform = parsePlatform(explicitPlatform ?? profile.platform.default ?? envPlatform);
  const section: AuthSection = profile.auth[platform] ?? {};

  const pick = (field: keyof AuthSection): string => {
    const envName = `IG_${field.toUpperCase()}`;
    const value = section[field] ?? env[envName];
    if (value === undefined || value === "") {
      throw new ConfigurationError(
        `Required setting '${field}' not found in auth.${platform} or environment variable '${envName}'`
      );
    }
    return value;
  };

  return {
    platform,
    credentials: {
      apiKey: pick("api_key"),
      username: pick("username"),
      password: pick("password"),
    },
  };
}
