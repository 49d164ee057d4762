/**
 * Error hierarchy shared by the client and the CLI.
 */

import type { ZodIssue } from "zod";

/** Base class for every error raised by this package */
export class DealingError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Missing or invalid configuration (credentials, platform, profile file) */
export class ConfigurationError extends DealingError {}

/** The request never produced an HTTP response (DNS, connection reset, timeout) */
export class TransportError extends DealingError {
  constructor(
    readonly method: string,
    readonly url: string,
    cause: unknown
  ) {
    super(`${method} ${url} failed: ${cause instanceof Error ? cause.message : String(cause)}`, {
      cause,
    });
  }
}

/** The API answered with a non-2xx status */
export class ApiError extends DealingError {
  constructor(
    readonly status: number,
    readonly errorCode: string | null,
    readonly method: string,
    readonly url: string
  ) {
    super(
      `${method} ${url} returned HTTP ${status}` + (errorCode ? ` (${errorCode})` : "")
    );
  }

  get isUnauthorized(): boolean {
    return this.status === 401;
  }
}

/** Login was refused, or the session response carried no tokens */
export class AuthenticationError extends DealingError {
  constructor(
    message: string,
    readonly errorCode: string | null = null,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

function describeIssue(issue: ZodIssue | undefined): string {
  if (!issue) return "unknown";
  return `${issue.path.join(".") || "(root)"}: ${issue.message}`;
}

/** A response body did not have the shape the model layer expects */
export class ResponseFormatError extends DealingError {
  constructor(
    readonly resource: string,
    readonly issues: ZodIssue[]
  ) {
    super(`Unexpected ${resource} payload: ${describeIssue(issues[0])}`);
  }
}

/** Caller-supplied parameters failed validation before anything was sent */
export class InvalidRequestError extends DealingError {
  constructor(
    message: string,
    readonly issues: ZodIssue[] = []
  ) {
    super(message);
  }
}
