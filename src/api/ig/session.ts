/**
 * Session lifecycle: logged_out → logged_in → expired.
 *
 * Logging in (POST /session, v2) yields two tokens in the response headers,
 * `CST` and `X-SECURITY-TOKEN`, which must accompany every later request.
 * `Access-Control-Max-Age` tells us how long they stay valid.
 */

import { EventEmitter } from "eventemitter3";
import { componentLogger } from "../../utils/logger.js";
import { ApiError, AuthenticationError } from "../../utils/errors.js";
import type { UserAuth } from "./auth.js";
import type { ApiEndpoints } from "./endpoints.js";
import type { ApiResponse, HttpTransport } from "./transport.js";

const log = componentLogger("session");

export type SessionState = "logged_out" | "logged_in" | "expired";

/** Lifetime assumed when the login response carries no Access-Control-Max-Age */
export const DEFAULT_SESSION_TTL_MS = 6 * 60 * 60 * 1000;

interface SessionEvents {
  authenticated: (expiresAt: Date) => void;
  expired: () => void;
  loggedOut: () => void;
}

interface SessionTokens {
  cst: string;
  securityToken: string;
  /** Epoch milliseconds */
  expiresAt: number;
}

export interface SessionManagerOptions {
  /** Clock in epoch milliseconds */
  now?: () => number;
}

export class SessionManager extends EventEmitter<SessionEvents> {
  private tokens: SessionTokens | null = null;
  private stateValue: SessionState = "logged_out";
  private readonly now: () => number;

  constructor(
    private readonly auth: UserAuth,
    private readonly endpoints: ApiEndpoints,
    private readonly transport: HttpTransport,
    options: SessionManagerOptions = {}
  ) {
    super();
    this.now = options.now ?? Date.now;
  }

  /** Current state; a logged-in session past its expiry reads as `expired` */
  get state(): SessionState {
    if (this.stateValue === "logged_in" && !this.isValid) {
      this.markExpired();
    }
    return this.stateValue;
  }

  get isValid(): boolean {
    if (!this.tokens) return false;
    if (!this.tokens.cst || !this.tokens.securityToken) return false;
    return this.tokens.expiresAt > this.now();
  }

  get expiresAt(): Date | null {
    return this.tokens ? new Date(this.tokens.expiresAt) : null;
  }

  /**
   * Authenticate and store the session tokens.
   *
   * @throws AuthenticationError when the platform refuses the credentials or omits tokens
   */
  async login(): Promise<void> {
    log.info(`Logging in as ${this.auth.username} on ${this.endpoints.platform}`);

    let res: ApiResponse;
    try {
      res = await this.transport.request("POST", this.endpoints.sessionUrl, {
        headers: this.auth.authHeaders,
        body: this.auth.authBody,
        version: 2,
      });
    } catch (err) {
      if (err instanceof ApiError) {
        throw new AuthenticationError(
          `Login failed with HTTP ${err.status}` + (err.errorCode ? ` (${err.errorCode})` : ""),
          err.errorCode,
          { cause: err }
        );
      }
      throw err;
    }

    const cst = res.headers["cst"];
    const securityToken = res.headers["x-security-token"];
    if (!cst || !securityToken) {
      throw new AuthenticationError("Login response did not include CST and X-SECURITY-TOKEN");
    }

    const maxAge = Number(res.headers["access-control-max-age"]);
    const ttlMs = Number.isFinite(maxAge) && maxAge > 0 ? maxAge * 1000 : DEFAULT_SESSION_TTL_MS;

    this.tokens = { cst, securityToken, expiresAt: this.now() + ttlMs };
    this.stateValue = "logged_in";

    const expiresAt = new Date(this.tokens.expiresAt);
    log.info(`Session established, valid until ${expiresAt.toISOString()}`);
    this.emit("authenticated", expiresAt);
  }

  /** Log in unless the current tokens are still good */
  async ensure(): Promise<void> {
    if (this.isValid) return;
    if (this.stateValue === "logged_in") this.markExpired();
    await this.login();
  }

  /** Headers for an authenticated request */
  headers(): Record<string, string> {
    if (!this.tokens) {
      throw new AuthenticationError("Not logged in");
    }
    return {
      ...this.auth.authHeaders,
      CST: this.tokens.cst,
      "X-SECURITY-TOKEN": this.tokens.securityToken,
    };
  }

  /** Mark the session as no longer usable, e.g. after a 401 */
  invalidate(): void {
    if (this.tokens) {
      this.tokens = { ...this.tokens, expiresAt: 0 };
    }
    if (this.stateValue === "logged_in") this.markExpired();
  }

  /** End the session on the platform (if any) and drop the tokens */
  async logout(): Promise<void> {
    try {
      if (this.isValid) {
        await this.transport.request("DELETE", this.endpoints.sessionUrl, {
          headers: this.headers(),
          version: 1,
        });
      }
    } finally {
      this.tokens = null;
      this.stateValue = "logged_out";
      log.info("Logged out");
      this.emit("loggedOut");
    }
  }

  private markExpired(): void {
    if (this.stateValue === "expired") return;
    this.stateValue = "expired";
    log.info("Session expired");
    this.emit("expired");
  }
}
