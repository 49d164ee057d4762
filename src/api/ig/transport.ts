/**
 * HTTP transport for the dealing REST API.
 *
 * Thin wrapper around fetch that:
 *   - adds the API `Version` header per endpoint
 *   - tunnels DELETE-with-body through POST + `_method: DELETE`
 *   - decodes JSON bodies (empty body → `{}`)
 *   - turns non-2xx responses into ApiError and network failures into TransportError
 */

import { componentLogger } from "../../utils/logger.js";
import { ApiError, ResponseFormatError, TransportError } from "../../utils/errors.js";

const log = componentLogger("http");

export type HttpMethod = "GET" | "POST" | "PUT" | "DELETE";

export type FetchFn = typeof fetch;

export type QueryValue = string | number | boolean | undefined;

export interface RequestOptions {
  headers?: Record<string, string>;
  body?: unknown;
  query?: Record<string, QueryValue>;
  /** Value of the API `Version` header */
  version?: number;
}

export interface ApiResponse {
  status: number;
  data: unknown;
  /** Header names are lower-cased */
  headers: Record<string, string>;
}

export interface TransportOptions {
  fetch?: FetchFn;
  timeoutMs?: number;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function buildUrl(url: string, query?: Record<string, QueryValue>): string {
  if (!query) return url;
  const params = new URLSearchParams();
  for (const [key, value] of Object.entries(query)) {
    if (value !== undefined) params.append(key, String(value));
  }
  const qs = params.toString();
  return qs ? `${url}?${qs}` : url;
}

export class HttpTransport {
  private readonly fetchFn: FetchFn;
  private readonly timeoutMs: number;

  constructor(options: TransportOptions = {}) {
    this.fetchFn = options.fetch ?? fetch;
    this.timeoutMs = options.timeoutMs ?? 30_000;
  }

  async request(
    method: HttpMethod,
    url: string,
    options: RequestOptions = {}
  ): Promise<ApiResponse> {
    const headers: Record<string, string> = { ...options.headers };
    if (options.version !== undefined) {
      headers["Version"] = String(options.version);
    }

    let wireMethod: HttpMethod = method;
    if (method === "DELETE" && options.body !== undefined) {
      wireMethod = "POST";
      headers["_method"] = "DELETE";
    }

    const target = buildUrl(url, options.query);
    log.debug(`${method} ${target}`);

    // The timeout covers reading the body as well as the response headers
    let res: Response;
    let text: string;
    try {
      res = await this.fetchFn(target, {
        method: wireMethod,
        headers,
        body: options.body === undefined ? undefined : JSON.stringify(options.body),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      text = await res.text();
    } catch (err) {
      log.error(`${method} ${target} failed`, { error: String(err) });
      throw new TransportError(method, target, err);
    }

    const responseHeaders: Record<string, string> = {};
    res.headers.forEach((value, key) => {
      responseHeaders[key.toLowerCase()] = value;
    });

    const data = decodeBody(text);

    log.debug(`${method} ${target} → ${res.status}`);

    if (!res.ok) {
      const errorCode =
        isRecord(data) && typeof data.errorCode === "string" ? data.errorCode : null;
      log.warn(`${method} ${target} returned HTTP ${res.status}`, { errorCode });
      throw new ApiError(res.status, errorCode, method, target);
    }

    if (data === undefined) {
      throw new ResponseFormatError(target, [
        { code: "custom", path: [], message: "response body is not JSON" },
      ]);
    }

    return { status: res.status, data, headers: responseHeaders };
  }
}

/** `{}` for an empty body, the parsed JSON, or `undefined` when the body is not JSON */
function decodeBody(text: string): unknown {
  if (text.trim() === "") return {};
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch {
    return undefined;
  }
}
