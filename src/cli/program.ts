/**
 * Command-line program: `igdeal <object> <action> [args]`.
 *
 *   igdeal account get
 *   igdeal instrument search <term>
 *   igdeal instrument get <epic> [--prices] [--range <from> <to> | --max-num <n>] [--resolution <res>]
 *   igdeal positions get
 *   igdeal positions open <epic> <BUY|SELL> <size> --currency <code>
 *   igdeal positions close <dealId> [--size <n>]
 *
 * Global: --format <json|text>, --platform <live|demo>, --verbose
 */

import { Command, InvalidArgumentError, Option } from "commander";
import { loadConfig } from "../config/index.js";
import { loadProfile, resolveProfile } from "../config/profile.js";
import { DealingClient } from "../api/ig/client.js";
import { UserAuth } from "../api/ig/auth.js";
import { setLogLevel } from "../utils/logger.js";
import { parseDateExpression } from "../utils/time.js";
import { PriceResolution } from "../types/market.js";
import type { Direction, DealOrderType } from "../types/position.js";
import {
  formatAccounts,
  formatDeal,
  formatInstrument,
  formatMarkets,
  formatPositions,
  toJson,
  type OutputFormat,
} from "./format.js";

export const VERSION = "0.3.0";

export interface GlobalOptions {
  format: OutputFormat;
  platform?: string;
  verbose?: boolean;
}

export interface CliDeps {
  /** Build an authenticated client for the chosen platform */
  createClient(platform?: string): Promise<DealingClient>;
  write(text: string): void;
  now(): Date;
}

/** Production wiring: environment + YAML profile → client */
export async function createClientFromConfig(platform?: string): Promise<DealingClient> {
  const config = loadConfig();
  const profile = await loadProfile(config.profilePath);
  const resolved = resolveProfile(profile, process.env, config.platform, platform);
  return new DealingClient({
    auth: new UserAuth(resolved.credentials),
    platform: resolved.platform,
    timeoutMs: config.requestTimeoutMs,
  });
}

const defaultDeps: CliDeps = {
  createClient: createClientFromConfig,
  write: (text) => process.stdout.write(`${text}\n`),
  now: () => new Date(),
};

// ── Argument parsers ────────────────────────────────────────

function parsePositiveNumber(value: string): number {
  const n = Number(value);
  if (!Number.isFinite(n) || n <= 0) {
    throw new InvalidArgumentError("Must be a positive number.");
  }
  return n;
}

function parsePositiveInt(value: string): number {
  const n = parsePositiveNumber(value);
  if (!Number.isInteger(n)) {
    throw new InvalidArgumentError("Must be a whole number.");
  }
  return n;
}

function parseDirection(value: string): Direction {
  const upper = value.toUpperCase();
  if (upper !== "BUY" && upper !== "SELL") {
    throw new InvalidArgumentError("Direction must be BUY or SELL.");
  }
  return upper;
}

function parseOrderType(value: string): DealOrderType {
  const upper = value.toUpperCase();
  if (upper !== "MARKET" && upper !== "LIMIT") {
    throw new InvalidArgumentError("Order type must be MARKET or LIMIT.");
  }
  return upper;
}

const RESOLUTIONS: string[] = Object.values(PriceResolution);

function isResolution(value: string): value is PriceResolution {
  return RESOLUTIONS.includes(value);
}

export function buildProgram(deps: CliDeps = defaultDeps): Command {
  const program: Command = new Command();
  program
    .name("igdeal")
    .description("Command line utility to interact with the IG dealing platform")
    .version(VERSION)
    .addOption(
      new Option("--format <format>", "Output format type").choices(["json", "text"]).default("text")
    )
    .addOption(new Option("--platform <platform>", "Platform to use").choices(["live", "demo"]))
    .option("-v, --verbose", "Log requests and session activity to stderr")
    .hook("preAction", () => {
      if (program.opts<GlobalOptions>().verbose) setLogLevel("debug");
    });

  const globals = () => program.opts<GlobalOptions>();

  const display = (data: unknown, text: () => string) => {
    deps.write(globals().format === "json" ? toJson(data) : text());
  };

  const withClient = async <T>(fn: (client: DealingClient) => Promise<T>): Promise<T> => {
    const client = await deps.createClient(globals().platform);
    return fn(client);
  };

  const toDate = (expr: string): Date => {
    const d = parseDateExpression(expr, deps.now());
    if (!d) {
      program.error(`Do not know how to parse datetime: ${expr}`, { exitCode: 2 });
    }
    return d;
  };

  // ── account ───────────────────────────────────────────────
  const account = program.command("account").description("Query account details");

  account
    .command("get")
    .description("Get account information")
    .action(async () => {
      const { accounts, session } = await withClient(async (client) => ({
        accounts: await client.getAccounts(),
        session: await client.getSessionDetails(),
      }));
      display({ accounts, session }, () => formatAccounts(accounts, session));
    });

  // ── instrument ────────────────────────────────────────────
  const instrument = program.command("instrument").description("Instruments");

  instrument
    .command("search")
    .description("Search for instrument")
    .argument("<term>", "Search term")
    .action(async (term: string) => {
      const markets = await withClient((client) => client.searchMarkets(term));
      display(markets, () => formatMarkets(markets));
    });

  instrument
    .command("get")
    .description("Get instrument details")
    .argument("<epic>", "Instrument epic")
    .option("-p, --prices", "Retrieve price data")
    .addOption(
      new Option("-r, --range <dates...>", "Date time range (FROM TO) to retrieve price data").conflicts(
        "maxNum"
      )
    )
    .addOption(
      new Option("-m, --max-num <n>", "Max number of data points to retrieve").argParser(
        parsePositiveInt
      )
    )
    .addOption(
      new Option("-n, --resolution <resolution>", "Resolution of the requested prices")
        .choices(RESOLUTIONS)
        .default(PriceResolution.MINUTE)
    )
    .action(
      async (
        epic: string,
        opts: { prices?: boolean; range?: string[]; maxNum?: number; resolution: string }
      ) => {
        if (opts.range && opts.range.length !== 2) {
          program.error("--range takes exactly two values: FROM TO", { exitCode: 2 });
        }
        const resolution = isResolution(opts.resolution) ? opts.resolution : PriceResolution.MINUTE;
        const range = opts.range ? { from: toDate(opts.range[0]), to: toDate(opts.range[1]) } : {};

        const { details, prices } = await withClient(async (client) => ({
          details: await client.getInstrument(epic),
          prices: opts.prices
            ? await client.getPrices(epic, { resolution, max: opts.maxNum, ...range })
            : null,
        }));
        display({ data: details, prices }, () => formatInstrument(details, prices));
      }
    );

  // ── positions ─────────────────────────────────────────────
  const positions = program.command("positions").description("Manage positions");

  positions
    .command("get")
    .description("Get all positions")
    .action(async () => {
      const open = await withClient((client) => client.getPositions());
      display(open, () => formatPositions(open));
    });

  positions
    .command("open")
    .description("Open a position")
    .argument("<epic>", "Instrument epic")
    .argument("<direction>", "BUY or SELL", parseDirection)
    .argument("<size>", "Deal size", parsePositiveNumber)
    .requiredOption("-c, --currency <code>", "Currency code, e.g. GBP")
    .option("-e, --expiry <expiry>", "Expiry (e.g. DFB, -, or a month like DEC-26)", "-")
    .option("-t, --order-type <type>", "MARKET or LIMIT", parseOrderType, "MARKET")
    .option("-l, --level <level>", "Deal level, required for LIMIT", parsePositiveNumber)
    .option("--stop-distance <points>", "Stop distance in points", parsePositiveNumber)
    .option("--limit-distance <points>", "Limit distance in points", parsePositiveNumber)
    .option("--guaranteed-stop", "Use a guaranteed stop")
    .action(
      async (
        epic: string,
        direction: Direction,
        size: number,
        opts: {
          currency: string;
          expiry: string;
          orderType: DealOrderType;
          level?: number;
          stopDistance?: number;
          limitDistance?: number;
          guaranteedStop?: boolean;
        }
      ) => {
        const deal = await withClient((client) =>
          client.openPosition({
            epic,
            direction,
            size,
            currencyCode: opts.currency.toUpperCase(),
            expiry: opts.expiry,
            orderType: opts.orderType,
            level: opts.level,
            stopDistance: opts.stopDistance,
            limitDistance: opts.limitDistance,
            guaranteedStop: opts.guaranteedStop ?? false,
          })
        );
        display(deal, () => formatDeal(deal));
      }
    );

  positions
    .command("close")
    .description("Close a position")
    .argument("<dealId>", "Deal ID of the position")
    .option("-s, --size <size>", "Size to close (default: whole position)", parsePositiveNumber)
    .action(async (dealId: string, opts: { size?: number }) => {
      const deal = await withClient((client) => client.closePosition({ dealId, size: opts.size }));
      display(deal, () => formatDeal(deal));
    });

  return program;
}
