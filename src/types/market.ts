/**
 * Market data type definitions.
 * Covers market search results, instrument details and historical prices.
 */

export type MarketStatus =
  | "CLOSED"
  | "EDITS_ONLY"
  | "OFFLINE"
  | "ON_AUCTION"
  | "ON_AUCTION_NO_EDITS"
  | "SUSPENDED"
  | "TRADEABLE";

/** Market row as returned by search and attached to positions */
export interface MarketSummary {
  epic: string;
  instrumentName: string;
  instrumentType: string;
  expiry: string;
  bid: number | null;
  offer: number | null;
  high: number | null;
  low: number | null;
  netChange: number | null;
  percentageChange: number | null;
  updateTime: string | null;
  delayTime: number;
  streamingPricesAvailable: boolean;
  marketStatus: MarketStatus;
  scalingFactor: number | null;
}

export interface InstrumentCurrency {
  code: string;
  symbol: string | null;
  isDefault: boolean;
}

/** Size or distance with its unit (POINTS or PERCENTAGE) */
export interface DealingRule {
  unit: string;
  value: number;
}

export interface InstrumentDetails {
  instrument: {
    epic: string;
    name: string;
    type: string;
    expiry: string;
    lotSize: number | null;
    currencies: InstrumentCurrency[];
    marginFactor: number | null;
    marginFactorUnit: string | null;
    streamingPricesAvailable: boolean;
  };
  dealingRules: {
    minDealSize: DealingRule | null;
    minStepDistance: DealingRule | null;
    minNormalStopOrLimitDistance: DealingRule | null;
    maxStopOrLimitDistance: DealingRule | null;
  };
  snapshot: {
    marketStatus: MarketStatus;
    bid: number | null;
    offer: number | null;
    high: number | null;
    low: number | null;
    netChange: number | null;
    percentageChange: number | null;
    updateTime: string | null;
    scalingFactor: number | null;
  };
}

/** Aggregation period of historical prices */
export enum PriceResolution {
  SECOND = "SECOND",
  MINUTE = "MINUTE",
  MINUTE_2 = "MINUTE_2",
  MINUTE_3 = "MINUTE_3",
  MINUTE_5 = "MINUTE_5",
  MINUTE_10 = "MINUTE_10",
  MINUTE_15 = "MINUTE_15",
  MINUTE_30 = "MINUTE_30",
  HOUR = "HOUR",
  HOUR_2 = "HOUR_2",
  HOUR_3 = "HOUR_3",
  HOUR_4 = "HOUR_4",
  DAY = "DAY",
  WEEK = "WEEK",
  MONTH = "MONTH",
}

export const PRICE_RESOLUTION_LABELS: Record<PriceResolution, string> = {
  [PriceResolution.SECOND]: "1 second",
  [PriceResolution.MINUTE]: "1 minute",
  [PriceResolution.MINUTE_2]: "2 minutes",
  [PriceResolution.MINUTE_3]: "3 minutes",
  [PriceResolution.MINUTE_5]: "5 minutes",
  [PriceResolution.MINUTE_10]: "10 minutes",
  [PriceResolution.MINUTE_15]: "15 minutes",
  [PriceResolution.MINUTE_30]: "30 minutes",
  [PriceResolution.HOUR]: "1 hour",
  [PriceResolution.HOUR_2]: "2 hours",
  [PriceResolution.HOUR_3]: "3 hours",
  [PriceResolution.HOUR_4]: "4 hours",
  [PriceResolution.DAY]: "1 day",
  [PriceResolution.WEEK]: "1 week",
  [PriceResolution.MONTH]: "1 month",
};

/** Bid/ask pair, plus last traded for exchange-traded instruments */
export interface Quote {
  bid: number | null;
  ask: number | null;
  lastTraded: number | null;
}

/** One aggregated price bar */
export interface PricePoint {
  time: Date;
  open: Quote;
  close: Quote;
  high: Quote;
  low: Quote;
  volume: number | null;
}

/** Historical data quota left on the API key */
export interface PriceAllowance {
  remaining: number;
  total: number;
  /** Seconds until the allowance resets */
  expirySeconds: number;
}

export interface PriceHistory {
  epic: string;
  resolution: PriceResolution;
  instrumentType: string;
  prices: PricePoint[];
  allowance: PriceAllowance | null;
}

export interface PriceQuery {
  resolution?: PriceResolution;
  from?: Date;
  to?: Date;
  /** Number of points; ignored when a range is given */
  max?: number;
  pageSize?: number;
}
