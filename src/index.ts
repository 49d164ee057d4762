/**
 * Typed client for the IG dealing REST API.
 *
 *   import { DealingClient, UserAuth } from "igdeal";
 *
 *   const client = new DealingClient({ auth: UserAuth.fromEnv(), platform: "demo" });
 *   const positions = await client.getPositions();
 */

export { DealingClient, DEFAULT_PRICE_POINTS, type DealingClientOptions } from "./api/ig/client.js";
export { UserAuth, type Credentials } from "./api/ig/auth.js";
export { ApiEndpoints } from "./api/ig/endpoints.js";
export { HttpTransport, type ApiResponse, type FetchFn } from "./api/ig/transport.js";
export { SessionManager, type SessionState } from "./api/ig/session.js";
export { loadConfig, PLATFORM_URLS, type Config, type Platform } from "./config/index.js";
export { loadProfile, resolveProfile, type Profile } from "./config/profile.js";
export {
  DealingError,
  ConfigurationError,
  TransportError,
  ApiError,
  AuthenticationError,
  ResponseFormatError,
  InvalidRequestError,
} from "./utils/errors.js";
export { logger, componentLogger } from "./utils/logger.js";

export type * from "./types/account.js";
export type * from "./types/position.js";
export {
  PriceResolution,
  PRICE_RESOLUTION_LABELS,
  type MarketStatus,
  type MarketSummary,
  type InstrumentDetails,
  type PriceHistory,
  type PricePoint,
  type PriceQuery,
  type Quote,
} from "./types/market.js";
export { oppositeDirection } from "./types/position.js";
