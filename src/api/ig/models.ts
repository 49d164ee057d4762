/**
 * Response schemas — raw JSON payloads → typed records.
 *
 * Each schema validates what the platform sends and transforms it into the
 * shapes in src/types. Fields the platform may omit or null out come back as
 * `null`, never `undefined`.
 */

import { z } from "zod";
import { ResponseFormatError } from "../../utils/errors.js";
import { parseSlashTimestamp, parseUtcTimestamp } from "../../utils/time.js";
import type { Account } from "../../types/account.js";
import type {
  InstrumentDetails,
  MarketSummary,
  PricePoint,
  PriceAllowance,
  Quote,
} from "../../types/market.js";
import type { DealConfirmation, OpenPosition } from "../../types/position.js";

const nullableNumber = z
  .number()
  .nullish()
  .transform((v) => v ?? null);

const nullableString = z
  .string()
  .nullish()
  .transform((v) => v ?? null);

const DirectionSchema = z.enum(["BUY", "SELL"]);

const MarketStatusSchema = z.enum([
  "CLOSED",
  "EDITS_ONLY",
  "OFFLINE",
  "ON_AUCTION",
  "ON_AUCTION_NO_EDITS",
  "SUSPENDED",
  "TRADEABLE",
]);

// ── Session & accounts ──────────────────────────────────────

export const SessionDetailsSchema = z.object({
  clientId: z.string(),
  accountId: z.string(),
  timezoneOffset: z.number(),
  locale: z.string(),
  currency: z.string(),
  lightstreamerEndpoint: z.string(),
});

const AccountSchema = z.object({
  accountId: z.string(),
  accountName: z.string(),
  accountAlias: nullableString,
  accountType: z.enum(["CFD", "PHYSICAL", "SPREADBET"]),
  status: z.enum(["DISABLED", "ENABLED", "SUSPENDED_FROM_DEALING"]),
  preferred: z.boolean(),
  currency: z.string(),
  balance: z.object({
    balance: z.number(),
    deposit: z.number(),
    profitLoss: z.number(),
    available: z.number(),
  }),
  canTransferFrom: z.boolean(),
  canTransferTo: z.boolean(),
});

export const AccountsResponseSchema = z
  .object({ accounts: z.array(AccountSchema) })
  .transform((raw): Account[] => raw.accounts);

// ── Markets ─────────────────────────────────────────────────

const MarketSchema = z
  .object({
    epic: z.string(),
    instrumentName: z.string(),
    instrumentType: z.string(),
    expiry: z.string(),
    bid: nullableNumber,
    offer: nullableNumber,
    high: nullableNumber,
    low: nullableNumber,
    netChange: nullableNumber,
    percentageChange: nullableNumber,
    updateTime: nullableString,
    delayTime: z.number().default(0),
    streamingPricesAvailable: z.boolean().default(false),
    marketStatus: MarketStatusSchema,
    scalingFactor: nullableNumber,
  })
  .transform((raw): MarketSummary => raw);

export const MarketSearchResponseSchema = z
  .object({ markets: z.array(MarketSchema).nullable() })
  .transform((raw): MarketSummary[] => raw.markets ?? []);

const DealingRuleSchema = z
  .object({ unit: z.string(), value: z.number() })
  .nullish()
  .transform((v) => v ?? null);

export const InstrumentResponseSchema = z
  .object({
    instrument: z.object({
      epic: z.string(),
      name: z.string(),
      type: z.string(),
      expiry: z.string(),
      lotSize: nullableNumber,
      currencies: z
        .array(
          z.object({
            code: z.string(),
            symbol: nullableString,
            isDefault: z.boolean().default(false),
          })
        )
        .nullish()
        .transform((v) => v ?? []),
      marginFactor: nullableNumber,
      marginFactorUnit: nullableString,
      streamingPricesAvailable: z.boolean().default(false),
    }),
    dealingRules: z
      .object({
        minDealSize: DealingRuleSchema,
        minStepDistance: DealingRuleSchema,
        minNormalStopOrLimitDistance: DealingRuleSchema,
        maxStopOrLimitDistance: DealingRuleSchema,
      })
      .nullish()
      .transform(
        (v) =>
          v ?? {
            minDealSize: null,
            minStepDistance: null,
            minNormalStopOrLimitDistance: null,
            maxStopOrLimitDistance: null,
          }
      ),
    snapshot: z.object({
      marketStatus: MarketStatusSchema,
      bid: nullableNumber,
      offer: nullableNumber,
      high: nullableNumber,
      low: nullableNumber,
      netChange: nullableNumber,
      percentageChange: nullableNumber,
      updateTime: nullableString,
      scalingFactor: nullableNumber,
    }),
  })
  .transform((raw): InstrumentDetails => raw);

// ── Prices ──────────────────────────────────────────────────

const QuoteSchema = z
  .object({
    bid: nullableNumber,
    ask: nullableNumber,
    lastTraded: nullableNumber,
  })
  .nullish()
  .transform((v): Quote => v ?? { bid: null, ask: null, lastTraded: null });

const PricePointSchema = z
  .object({
    snapshotTime: z.string().optional(),
    snapshotTimeUTC: z.string().optional(),
    openPrice: QuoteSchema,
    closePrice: QuoteSchema,
    highPrice: QuoteSchema,
    lowPrice: QuoteSchema,
    lastTradedVolume: nullableNumber,
  })
  .transform((raw, ctx): PricePoint => {
    const time =
      (raw.snapshotTimeUTC ? parseUtcTimestamp(raw.snapshotTimeUTC) : null) ??
      (raw.snapshotTime ? parseSlashTimestamp(raw.snapshotTime) : null);
    if (!time) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "price point has no usable timestamp" });
      return z.NEVER;
    }
    return {
      time,
      open: raw.openPrice,
      close: raw.closePrice,
      high: raw.highPrice,
      low: raw.lowPrice,
      volume: raw.lastTradedVolume,
    };
  });

export const PricesResponseSchema = z
  .object({
    instrumentType: z.string(),
    prices: z.array(PricePointSchema),
    metadata: z
      .object({
        allowance: z
          .object({
            remainingAllowance: z.number(),
            totalAllowance: z.number(),
            allowanceExpiry: z.number(),
          })
          .optional(),
      })
      .optional(),
  })
  .transform((raw) => {
    const allowance = raw.metadata?.allowance;
    return {
      instrumentType: raw.instrumentType,
      prices: raw.prices,
      allowance: allowance
        ? ({
            remaining: allowance.remainingAllowance,
            total: allowance.totalAllowance,
            expirySeconds: allowance.allowanceExpiry,
          } satisfies PriceAllowance)
        : null,
    };
  });

// ── Positions & deals ───────────────────────────────────────

// v1 payloads use dealSize/openLevel, v2 uses size/level
const PositionSchema = z.object({
  dealId: z.string(),
  dealReference: nullableString,
  direction: DirectionSchema,
  size: z.number().optional(),
  dealSize: z.number().optional(),
  level: z.number().optional(),
  openLevel: z.number().optional(),
  contractSize: nullableNumber,
  currency: z.string(),
  limitLevel: nullableNumber,
  stopLevel: nullableNumber,
  trailingStep: nullableNumber,
  trailingStopDistance: nullableNumber,
  controlledRisk: z.boolean().default(false),
  createdDate: z.string().optional(),
  createdDateUTC: z.string().optional(),
});

export const OpenPositionSchema = z
  .object({ position: PositionSchema, market: MarketSchema })
  .transform((raw, ctx): OpenPosition => {
    const p = raw.position;
    const size = p.size ?? p.dealSize;
    const openLevel = p.level ?? p.openLevel;
    if (size === undefined || openLevel === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["position"],
        message: "position has no size or opening level",
      });
      return z.NEVER;
    }
    const createdAt =
      (p.createdDateUTC ? parseUtcTimestamp(p.createdDateUTC) : null) ??
      (p.createdDate ? parseSlashTimestamp(p.createdDate) : null);

    return {
      position: {
        dealId: p.dealId,
        dealReference: p.dealReference,
        direction: p.direction,
        size,
        contractSize: p.contractSize,
        openLevel,
        currency: p.currency,
        limitLevel: p.limitLevel,
        stopLevel: p.stopLevel,
        trailingStep: p.trailingStep,
        trailingStopDistance: p.trailingStopDistance,
        controlledRisk: p.controlledRisk,
        createdAt,
      },
      market: raw.market,
    };
  });

export const PositionsResponseSchema = z
  .object({ positions: z.array(OpenPositionSchema) })
  .transform((raw): OpenPosition[] => raw.positions);

export const DealReferenceSchema = z
  .object({ dealReference: z.string() })
  .transform((raw) => raw.dealReference);

export const DealConfirmationSchema = z
  .object({
    dealReference: z.string(),
    dealId: nullableString,
    dealStatus: z.enum(["ACCEPTED", "REJECTED"]),
    status: nullableString,
    reason: z.string().default("UNKNOWN"),
    epic: nullableString,
    direction: DirectionSchema.nullish().transform((v) => v ?? null),
    size: nullableNumber,
    level: nullableNumber,
    date: nullableString,
  })
  .transform(
    (raw): DealConfirmation => ({
      ...raw,
      date: raw.date ? parseUtcTimestamp(raw.date) : null,
    })
  );

/**
 * Validate and transform a payload.
 *
 * @throws ResponseFormatError naming the resource and the first offending field
 */
export function parseResponse<T extends z.ZodTypeAny>(
  schema: T,
  data: unknown,
  resource: string
): z.output<T> {
  const result = schema.safeParse(data);
  if (!result.success) {
    throw new ResponseFormatError(resource, result.error.issues);
  }
  return result.data;
}
