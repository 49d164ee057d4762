/**
 * Output formatting tests
 */

import { describe, it, expect } from "vitest";
import {
  formatDeal,
  formatMarkets,
  formatPositions,
  num,
  renderTable,
  toJson,
} from "../../src/cli/format.js";
import type { DealConfirmation } from "../../src/types/position.js";

describe("renderTable", () => {
  it("should pad columns and right-align numbers", () => {
    const table = renderTable<{ a: string; n: string }>(
      [
        { header: "A", value: (r) => r.a },
        { header: "NUM", value: (r) => r.n, align: "right" },
      ],
      [
        { a: "xx", n: "1" },
        { a: "y", n: "100" },
      ]
    );

    expect(table.split("\n")).toEqual(["A   NUM", "--  ---", "xx    1", "y   100"]);
  });
});

describe("toJson", () => {
  it("should sort keys, indent by four and serialize dates", () => {
    const json = toJson({ b: 1, a: { d: new Date(Date.UTC(2021, 0, 1)), c: [{ z: 1, y: 2 }] } });

    expect(json).toBe(
      [
        "{",
        '    "a": {',
        '        "c": [',
        "            {",
        '                "y": 2,',
        '                "z": 1',
        "            }",
        "        ],",
        '        "d": "2021-01-01T00:00:00.000Z"',
        "    },",
        '    "b": 1',
        "}",
      ].join("\n")
    );
  });
});

describe("num", () => {
  it("should render missing values as a dash", () => {
    expect(num(null)).toBe("-");
    expect(num(undefined)).toBe("-");
    expect(num(1.5, 2)).toBe("1.50");
    expect(num(0)).toBe("0");
  });
});

describe("views", () => {
  it("should say when there is nothing to show", () => {
    expect(formatMarkets([])).toBe("No markets found");
    expect(formatPositions([])).toBe("No open positions");
  });

  it("should describe a deal", () => {
    const deal: DealConfirmation = {
      dealReference: "REF001",
      dealId: "DIAAAANEWDEAL1",
      dealStatus: "ACCEPTED",
      status: "OPEN",
      reason: "SUCCESS",
      epic: "UA.D.AAPL.DAILY.IP",
      direction: "BUY",
      size: 1,
      level: 13423,
      date: null,
    };

    expect(formatDeal(deal).split("\n")).toEqual([
      "Deal REF001: ACCEPTED (SUCCESS)",
      "  Deal ID:  DIAAAANEWDEAL1",
      "  Market:   UA.D.AAPL.DAILY.IP",
      "  Order:    BUY 1 @ 13423",
      "  Position: OPEN",
    ]);
  });

  it("should keep only the reference line of a bare rejection", () => {
    const deal: DealConfirmation = {
      dealReference: "REF009",
      dealId: null,
      dealStatus: "REJECTED",
      status: null,
      reason: "MARKET_CLOSED",
      epic: null,
      direction: null,
      size: null,
      level: null,
      date: null,
    };

    expect(formatDeal(deal)).toBe("Deal REF009: REJECTED (MARKET_CLOSED)");
  });
});
