/**
 * In-process stand-in for the dealing REST API.
 *
 * Routes are keyed by "METHOD /path" (relative to the demo gateway, query
 * string excluded). A route given as an array answers successive calls with
 * successive entries; the last entry repeats.
 */

import { vi } from "vitest";
import type { FetchFn } from "../../src/api/ig/transport.js";

export const DEMO_BASE = "https://demo-api.ig.com/gateway/deal";

export interface RecordedCall {
  /** Effective method (`_method` tunnelling undone) */
  method: string;
  wireMethod: string;
  path: string;
  query: URLSearchParams;
  headers: Record<string, string>;
  body: unknown;
}

export type Route = (call: RecordedCall) => Response;

export function jsonResponse(
  status: number,
  body?: unknown,
  headers: Record<string, string> = {}
): Response {
  return new Response(body === undefined ? null : JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json", ...headers },
  });
}

export function loginResponse(n = 1, maxAgeSeconds = 21600): Response {
  return jsonResponse(
    200,
    { accountType: "CFD", currentAccountId: "ABC12" },
    {
      CST: `cst-${n}`,
      "X-SECURITY-TOKEN": `xst-${n}`,
      "Access-Control-Max-Age": String(maxAgeSeconds),
    }
  );
}

export function createFakeApi(routes: Record<string, Route | Route[]>) {
  const calls: RecordedCall[] = [];
  const counters = new Map<string, number>();

  const impl: FetchFn = async (input, init) => {
    const url = new URL(input instanceof Request ? input.url : input.toString());
    const headers: Record<string, string> = {};
    new Headers(init?.headers).forEach((value, key) => {
      headers[key] = value;
    });
    const wireMethod = init?.method ?? "GET";
    const method = headers["_method"] ?? wireMethod;
    const rawBody = typeof init?.body === "string" ? init.body : undefined;
    const call: RecordedCall = {
      method,
      wireMethod,
      path: url.pathname.replace("/gateway/deal", ""),
      query: url.searchParams,
      headers,
      body: rawBody === undefined ? undefined : JSON.parse(rawBody),
    };
    calls.push(call);

    const key = `${call.method} ${call.path}`;
    const route = routes[key];
    if (!route) {
      return jsonResponse(404, { errorCode: `test.no-route ${key}` });
    }
    if (Array.isArray(route)) {
      const i = counters.get(key) ?? 0;
      counters.set(key, i + 1);
      return route[Math.min(i, route.length - 1)](call);
    }
    return route(call);
  };

  const fetch = vi.fn(impl);
  const callsTo = (key: string) => calls.filter((c) => `${c.method} ${c.path}` === key);

  return { fetch, calls, callsTo };
}
