/**
 * Output rendering for the CLI: JSON or plain-text tables.
 */

import { PRICE_RESOLUTION_LABELS } from "../types/market.js";
import type { Account, SessionDetails } from "../types/account.js";
import type { InstrumentDetails, MarketSummary, PriceHistory } from "../types/market.js";
import type { DealConfirmation, OpenPosition } from "../types/position.js";

export type OutputFormat = "json" | "text";

export interface Column<T> {
  header: string;
  value: (row: T) => string;
  align?: "left" | "right";
}

/** Recursively rebuild plain objects with their keys sorted */
function sortKeys(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(sortKeys);
  if (typeof value === "object" && value !== null && !(value instanceof Date)) {
    const sorted: Record<string, unknown> = {};
    for (const key of Object.keys(value).sort()) {
      sorted[key] = sortKeys(Reflect.get(value, key));
    }
    return sorted;
  }
  return value;
}

/** Stable JSON: sorted keys, 4-space indent, Dates as ISO strings */
export function toJson(data: unknown): string {
  return JSON.stringify(sortKeys(data), null, 4);
}

export function num(value: number | null | undefined, digits?: number): string {
  if (value === null || value === undefined) return "-";
  return digits === undefined ? String(value) : value.toFixed(digits);
}

export function renderTable<T>(columns: Column<T>[], rows: T[]): string {
  const cells = rows.map((row) => columns.map((c) => c.value(row)));
  const widths = columns.map((c, i) =>
    Math.max(c.header.length, ...cells.map((r) => r[i].length))
  );

  const line = (values: string[]) =>
    values
      .map((v, i) => (columns[i].align === "right" ? v.padStart(widths[i]) : v.padEnd(widths[i])))
      .join("  ")
      .trimEnd();

  return [
    line(columns.map((c) => c.header)),
    line(widths.map((w) => "-".repeat(w))),
    ...cells.map(line),
  ].join("\n");
}

// ── Views ───────────────────────────────────────────────────

export function formatAccounts(accounts: Account[], session: SessionDetails): string {
  const header = [
    `Client ${session.clientId}, current account ${session.accountId}`,
    `Locale ${session.locale}, currency ${session.currency}, UTC offset ${session.timezoneOffset}h`,
    "",
  ];
  const table = renderTable<Account>(
    [
      { header: "ID", value: (a) => a.accountId + (a.preferred ? " *" : "") },
      { header: "NAME", value: (a) => a.accountName },
      { header: "TYPE", value: (a) => a.accountType },
      { header: "STATUS", value: (a) => a.status },
      { header: "CCY", value: (a) => a.currency },
      { header: "BALANCE", value: (a) => num(a.balance.balance, 2), align: "right" },
      { header: "AVAILABLE", value: (a) => num(a.balance.available, 2), align: "right" },
      { header: "P&L", value: (a) => num(a.balance.profitLoss, 2), align: "right" },
    ],
    accounts
  );
  return [...header, table].join("\n");
}

const MARKET_COLUMNS: Column<MarketSummary>[] = [
  { header: "EPIC", value: (m) => m.epic },
  { header: "NAME", value: (m) => m.instrumentName },
  { header: "TYPE", value: (m) => m.instrumentType },
  { header: "EXPIRY", value: (m) => m.expiry },
  { header: "BID", value: (m) => num(m.bid), align: "right" },
  { header: "OFFER", value: (m) => num(m.offer), align: "right" },
  { header: "STATUS", value: (m) => m.marketStatus },
];

export function formatMarkets(markets: MarketSummary[]): string {
  if (markets.length === 0) return "No markets found";
  return renderTable(MARKET_COLUMNS, markets);
}

export function formatInstrument(details: InstrumentDetails, prices: PriceHistory | null): string {
  const { instrument, snapshot, dealingRules } = details;
  const lines = [
    `${instrument.name} (${instrument.epic})`,
    `  Type:        ${instrument.type}`,
    `  Expiry:      ${instrument.expiry}`,
    `  Status:      ${snapshot.marketStatus}`,
    `  Bid/Offer:   ${num(snapshot.bid)} / ${num(snapshot.offer)}`,
    `  High/Low:    ${num(snapshot.high)} / ${num(snapshot.low)}`,
    `  Change:      ${num(snapshot.netChange)} (${num(snapshot.percentageChange)}%)`,
    `  Currencies:  ${instrument.currencies.map((c) => c.code).join(", ") || "-"}`,
  ];
  if (dealingRules.minDealSize) {
    lines.push(`  Min size:    ${dealingRules.minDealSize.value} ${dealingRules.minDealSize.unit}`);
  }

  if (prices) {
    lines.push(
      "",
      `Prices (${PRICE_RESOLUTION_LABELS[prices.resolution]}, ${prices.prices.length} points)`,
      renderTable(
        [
          { header: "TIME (UTC)", value: (p) => p.time.toISOString().slice(0, 19).replace("T", " ") },
          { header: "OPEN", value: (p) => num(p.open.bid), align: "right" },
          { header: "HIGH", value: (p) => num(p.high.bid), align: "right" },
          { header: "LOW", value: (p) => num(p.low.bid), align: "right" },
          { header: "CLOSE", value: (p) => num(p.close.bid), align: "right" },
          { header: "VOLUME", value: (p) => num(p.volume), align: "right" },
        ],
        prices.prices
      )
    );
  }
  return lines.join("\n");
}

export function formatPositions(positions: OpenPosition[]): string {
  if (positions.length === 0) return "No open positions";
  return renderTable<OpenPosition>(
    [
      { header: "DEAL ID", value: (p) => p.position.dealId },
      { header: "MARKET", value: (p) => p.market.instrumentName },
      { header: "DIR", value: (p) => p.position.direction },
      { header: "SIZE", value: (p) => num(p.position.size), align: "right" },
      { header: "OPEN", value: (p) => num(p.position.openLevel), align: "right" },
      {
        header: "CURRENT",
        value: (p) => num(p.position.direction === "BUY" ? p.market.bid : p.market.offer),
        align: "right",
      },
      { header: "STOP", value: (p) => num(p.position.stopLevel), align: "right" },
      { header: "LIMIT", value: (p) => num(p.position.limitLevel), align: "right" },
      { header: "CCY", value: (p) => p.position.currency },
    ],
    positions
  );
}

export function formatDeal(deal: DealConfirmation): string {
  const lines = [
    `Deal ${deal.dealReference}: ${deal.dealStatus} (${deal.reason})`,
  ];
  if (deal.dealId) lines.push(`  Deal ID:  ${deal.dealId}`);
  if (deal.epic) lines.push(`  Market:   ${deal.epic}`);
  if (deal.direction) lines.push(`  Order:    ${deal.direction} ${num(deal.size)} @ ${num(deal.level)}`);
  if (deal.status) lines.push(`  Position: ${deal.status}`);
  return lines.join("\n");
}
