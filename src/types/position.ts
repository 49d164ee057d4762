/**
 * Position and dealing type definitions.
 */

import type { MarketSummary } from "./market.js";

export type Direction = "BUY" | "SELL";
export type DealOrderType = "MARKET" | "LIMIT";
export type DealStatus = "ACCEPTED" | "REJECTED";

/** An open trade held by the account */
export interface Position {
  dealId: string;
  dealReference: string | null;
  direction: Direction;
  size: number;
  contractSize: number | null;
  /** Entry level */
  openLevel: number;
  currency: string;
  limitLevel: number | null;
  stopLevel: number | null;
  trailingStep: number | null;
  trailingStopDistance: number | null;
  controlledRisk: boolean;
  createdAt: Date | null;
}

export interface OpenPosition {
  position: Position;
  market: MarketSummary;
}

/** Parameters for opening an OTC position */
export interface OpenPositionRequest {
  epic: string;
  direction: Direction;
  size: number;
  currencyCode: string;
  expiry?: string;
  orderType?: DealOrderType;
  /** Required for LIMIT orders */
  level?: number;
  stopDistance?: number;
  limitDistance?: number;
  guaranteedStop?: boolean;
  forceOpen?: boolean;
}

export interface ClosePositionRequest {
  dealId: string;
  /** Partial close; defaults to the whole position */
  size?: number;
}

/** Outcome of a deal, fetched from /confirms */
export interface DealConfirmation {
  dealReference: string;
  dealId: string | null;
  dealStatus: DealStatus;
  /** Position status after the deal, e.g. OPEN, DELETED, AMENDED */
  status: string | null;
  reason: string;
  epic: string | null;
  direction: Direction | null;
  size: number | null;
  level: number | null;
  date: Date | null;
}

export function oppositeDirection(direction: Direction): Direction {
  return direction === "BUY" ? "SELL" : "BUY";
}
