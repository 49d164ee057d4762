/**
 * Dealing REST API client.
 *
 * Every call goes through the session manager: the session is created on
 * first use, and a 401 (token expired or revoked upstream) triggers exactly one
 * re-login and retry of the original request before the error surfaces.
 *
 * Usage:
 *   const client = new DealingClient({ auth: UserAuth.fromEnv(), platform: "demo" });
 *   const accounts = await client.getAccounts();
 */

import { componentLogger } from "../../utils/logger.js";
import { ApiError, InvalidRequestError } from "../../utils/errors.js";
import { formatApiTimestamp } from "../../utils/time.js";
import { DealIdSchema, EpicSchema, validateClosePosition, validateOpenPosition } from "../../utils/validation.js";
import { ApiEndpoints } from "./endpoints.js";
import { HttpTransport, type ApiResponse, type FetchFn, type HttpMethod, type RequestOptions } from "./transport.js";
import { SessionManager } from "./session.js";
import {
  AccountsResponseSchema,
  DealConfirmationSchema,
  DealReferenceSchema,
  InstrumentResponseSchema,
  MarketSearchResponseSchema,
  OpenPositionSchema,
  PositionsResponseSchema,
  PricesResponseSchema,
  SessionDetailsSchema,
  parseResponse,
} from "./models.js";
import type { UserAuth } from "./auth.js";
import type { Account, SessionDetails } from "../../types/account.js";
import {
  PriceResolution,
  type InstrumentDetails,
  type MarketSummary,
  type PriceHistory,
  type PriceQuery,
} from "../../types/market.js";
import {
  oppositeDirection,
  type ClosePositionRequest,
  type DealConfirmation,
  type OpenPosition,
  type OpenPositionRequest,
} from "../../types/position.js";

const log = componentLogger("client");

/** Data points requested when neither a range nor a count is given */
export const DEFAULT_PRICE_POINTS = 10;

export interface DealingClientOptions {
  auth: UserAuth;
  /** `live` (default) or `demo`; ignored when `endpoints` is given */
  platform?: string;
  endpoints?: ApiEndpoints;
  fetch?: FetchFn;
  timeoutMs?: number;
  /** Clock in epoch milliseconds, for session expiry */
  now?: () => number;
}

export class DealingClient {
  readonly endpoints: ApiEndpoints;
  readonly session: SessionManager;
  private readonly transport: HttpTransport;

  constructor(options: DealingClientOptions) {
    this.endpoints = options.endpoints ?? new ApiEndpoints(options.platform);
    this.transport = new HttpTransport({ fetch: options.fetch, timeoutMs: options.timeoutMs });
    this.session = new SessionManager(options.auth, this.endpoints, this.transport, {
      now: options.now,
    });
  }

  // ─── Session & Accounts ───────────────────────────────────

  async getSessionDetails(): Promise<SessionDetails> {
    const res = await this.authenticatedRequest("GET", this.endpoints.sessionUrl);
    return parseResponse(SessionDetailsSchema, res.data, "session");
  }

  async getAccounts(): Promise<Account[]> {
    const res = await this.authenticatedRequest("GET", this.endpoints.accountsUrl);
    return parseResponse(AccountsResponseSchema, res.data, "accounts");
  }

  async logout(): Promise<void> {
    await this.session.logout();
  }

  // ─── Markets ──────────────────────────────────────────────

  async searchMarkets(term: string): Promise<MarketSummary[]> {
    const res = await this.authenticatedRequest("GET", this.endpoints.marketsUrl, {
      query: { searchTerm: term },
    });
    const markets = parseResponse(MarketSearchResponseSchema, res.data, "market search");
    log.info(`Search '${term}' matched ${markets.length} markets`);
    return markets;
  }

  async getInstrument(epic: string): Promise<InstrumentDetails> {
    this.checkEpic(epic);
    const res = await this.authenticatedRequest("GET", this.endpoints.marketUrl(epic), {
      version: 3,
    });
    return parseResponse(InstrumentResponseSchema, res.data, "instrument");
  }

  /**
   * Historical prices for an instrument.
   * With `from`/`to` the whole range is returned and `max` is ignored;
   * otherwise the latest `max` points (default 10).
   */
  async getPrices(epic: string, query: PriceQuery = {}): Promise<PriceHistory> {
    this.checkEpic(epic);
    const resolution = query.resolution ?? PriceResolution.MINUTE;
    const ranged = query.from !== undefined || query.to !== undefined;

    if (query.from && query.to && query.from > query.to) {
      throw new InvalidRequestError("Price range start is after its end");
    }
    if (!ranged && query.max !== undefined && (!Number.isInteger(query.max) || query.max < 1)) {
      throw new InvalidRequestError(`Invalid max number of points: ${query.max}`);
    }

    const res = await this.authenticatedRequest("GET", this.endpoints.pricesUrl(epic), {
      version: 3,
      query: {
        resolution,
        from: query.from ? formatApiTimestamp(query.from) : undefined,
        to: query.to ? formatApiTimestamp(query.to) : undefined,
        max: ranged ? undefined : (query.max ?? DEFAULT_PRICE_POINTS),
        pageSize: query.pageSize ?? 0,
      },
    });

    const parsed = parseResponse(PricesResponseSchema, res.data, "prices");
    if (parsed.allowance) {
      log.info(
        `Historical data allowance: ${parsed.allowance.remaining}/${parsed.allowance.total} remaining`
      );
    }
    return { epic, resolution, ...parsed };
  }

  // ─── Positions ────────────────────────────────────────────

  async getPositions(): Promise<OpenPosition[]> {
    const res = await this.authenticatedRequest("GET", this.endpoints.positionsUrl, {
      version: 2,
    });
    return parseResponse(PositionsResponseSchema, res.data, "positions");
  }

  async getPosition(dealId: string): Promise<OpenPosition> {
    this.checkDealId(dealId);
    const res = await this.authenticatedRequest("GET", this.endpoints.positionUrl(dealId), {
      version: 2,
    });
    return parseResponse(OpenPositionSchema, res.data, "position");
  }

  /**
   * Open an OTC position and wait for the deal confirmation.
   * A rejected deal is returned, not thrown; check `dealStatus`.
   */
  async openPosition(request: OpenPositionRequest): Promise<DealConfirmation> {
    const params = validateOpenPosition(request);
    log.info(
      `Opening position: ${params.direction} ${params.size} ${params.epic} @ ${params.orderType}` +
        (params.level !== undefined ? ` ${params.level}` : "")
    );

    const res = await this.authenticatedRequest("POST", this.endpoints.otcPositionsUrl, {
      version: 2,
      body: params,
    });
    const dealReference = parseResponse(DealReferenceSchema, res.data, "deal reference");
    return this.getDealConfirmation(dealReference);
  }

  /**
   * Close (all or part of) a position with an opposite market order.
   */
  async closePosition(request: ClosePositionRequest): Promise<DealConfirmation> {
    const params = validateClosePosition(request);
    const { position } = await this.getPosition(params.dealId);

    const size = params.size ?? position.size;
    if (size > position.size) {
      throw new InvalidRequestError(
        `Cannot close ${size} of position ${position.dealId}: only ${position.size} open`
      );
    }

    log.info(`Closing position ${position.dealId}: ${size} of ${position.size}`);
    const res = await this.authenticatedRequest("DELETE", this.endpoints.otcPositionsUrl, {
      version: 1,
      body: {
        dealId: position.dealId,
        direction: oppositeDirection(position.direction),
        size,
        orderType: "MARKET",
      },
    });
    const dealReference = parseResponse(DealReferenceSchema, res.data, "deal reference");
    return this.getDealConfirmation(dealReference);
  }

  async getDealConfirmation(dealReference: string): Promise<DealConfirmation> {
    const res = await this.authenticatedRequest("GET", this.endpoints.confirmUrl(dealReference), {
      version: 1,
    });
    const confirmation = parseResponse(DealConfirmationSchema, res.data, "deal confirmation");
    if (confirmation.dealStatus === "REJECTED") {
      log.warn(`Deal ${dealReference} rejected: ${confirmation.reason}`);
    } else {
      log.info(`Deal ${dealReference} accepted (dealId ${confirmation.dealId ?? "n/a"})`);
    }
    return confirmation;
  }

  // ─── Internals ────────────────────────────────────────────

  private checkDealId(dealId: string): void {
    const result = DealIdSchema.safeParse(dealId);
    if (!result.success) {
      throw new InvalidRequestError(
        `Invalid deal ID '${dealId}': ${result.error.issues[0].message}`,
        result.error.issues
      );
    }
  }

  private checkEpic(epic: string): void {
    const result = EpicSchema.safeParse(epic);
    if (!result.success) {
      throw new InvalidRequestError(
        `Invalid epic '${epic}': ${result.error.issues[0].message}`,
        result.error.issues
      );
    }
  }

  /**
   * Send a request with session headers. On 401 the session is dropped,
   * re-established once and the request retried once.
   */
  private async authenticatedRequest(
    method: HttpMethod,
    url: string,
    options: RequestOptions = {}
  ): Promise<ApiResponse> {
    await this.session.ensure();
    try {
      return await this.send(method, url, options);
    } catch (err) {
      if (!(err instanceof ApiError) || !err.isUnauthorized) throw err;

      log.warn(`${method} ${url} unauthorized (${err.errorCode ?? "no code"}), re-authenticating`);
      this.session.invalidate();
      await this.session.login();
      return this.send(method, url, options);
    }
  }

  private send(method: HttpMethod, url: string, options: RequestOptions): Promise<ApiResponse> {
    return this.transport.request(method, url, {
      ...options,
      headers: { ...options.headers, ...this.session.headers() },
    });
  }
}
