/**
 * User credentials and the headers/body they turn into on login.
 */

import { ConfigurationError } from "../../utils/errors.js";

export interface Credentials {
  apiKey: string;
  username: string;
  password: string;
}

/** Body of POST /session */
export interface LoginBody {
  identifier: string;
  password: string;
  encryptedPassword: null;
}

const ENV_NAMES: Record<keyof Credentials, string> = {
  apiKey: "IG_API_KEY",
  username: "IG_USERNAME",
  password: "IG_PASSWORD",
};

export class UserAuth implements Credentials {
  readonly apiKey: string;
  readonly username: string;
  readonly password: string;

  constructor(credentials: Credentials) {
    this.apiKey = credentials.apiKey;
    this.username = credentials.username;
    this.password = credentials.password;
  }

  /**
   * Build credentials from IG_API_KEY, IG_USERNAME and IG_PASSWORD.
   * Explicit values win over the environment.
   */
  static fromEnv(
    overrides: Partial<Credentials> = {},
    env: NodeJS.ProcessEnv = process.env
  ): UserAuth {
    const pick = (key: keyof Credentials): string => {
      const value = overrides[key] ?? env[ENV_NAMES[key]];
      if (value === undefined || value === "") {
        throw new ConfigurationError(
          `Required argument '${key}' or environment variable '${ENV_NAMES[key]}' not set`
        );
      }
      return value;
    };
    return new UserAuth({
      apiKey: pick("apiKey"),
      username: pick("username"),
      password: pick("password"),
    });
  }

  /** Headers sent with every request, authenticated or not */
  get authHeaders(): Record<string, string> {
    return {
      "X-IG-API-KEY": this.apiKey,
      "Content-Type": "application/json",
      Accept: "application/json; charset=UTF-8",
    };
  }

  get authBody(): LoginBody {
    return {
      identifier: this.username,
      password: this.password,
      encryptedPassword: null,
    };
  }

  /** Keep the password out of logs and JSON dumps */
  toJSON(): Record<string, string> {
    return { apiKey: "***", username: this.username, password: "***" };
  }
}
