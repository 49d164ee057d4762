import { describe, it, expect } from "vitest";
import {
  EpicSchema,
  validateClosePosition,
  validateOpenPosition,
} from "../../src/utils/validation.js";
import { InvalidRequestError } from "../../src/utils/errors.js";

const base = {
  epic: "CS.D.EURUSD.MINI.IP",
  direction: "SELL" as const,
  size: 2,
  currencyCode: "USD",
};

describe("validateOpenPosition", () => {
  it("should fill in defaults", () => {
    expect(validateOpenPosition(base)).toEqual({
      ...base,
      expiry: "-",
      orderType: "MARKET",
      guaranteedStop: false,
      forceOpen: true,
    });
  });

  it("should require a level for LIMIT orders", () => {
    expect(() => validateOpenPosition({ ...base, orderType: "LIMIT" })).toThrow(
      "Invalid open position request: level: A LIMIT order needs a level"
    );
  });

  it("should refuse a level on MARKET orders", () => {
    expect(() => validateOpenPosition({ ...base, level: 1.1 })).toThrow(
      "Invalid open position request: level: A MARKET order must not set a level"
    );
  });

  it("should require a stop distance for a guaranteed stop", () => {
    expect(() => validateOpenPosition({ ...base, guaranteedStop: true })).toThrow(
      "Invalid open position request: stopDistance: A guaranteed stop needs a stop distance"
    );
  });

  it("should carry the issues on the error", () => {
    try {
      validateOpenPosition({ ...base, size: 0, currencyCode: "usd" });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(InvalidRequestError);
      if (err instanceof InvalidRequestError) {
        expect(err.issues.map((i) => i.path.join("."))).toEqual(["size", "currencyCode"]);
      }
    }
  });
});

describe("validateClosePosition", () => {
  it("should reject a non-positive size", () => {
    expect(() => validateClosePosition({ dealId: "DIAAAAGB25EY6AN", size: -1 })).toThrow(
      /^Invalid close position request: size: /
    );
  });
});

describe("EpicSchema", () => {
  it("should reject characters outside the epic alphabet", () => {
    expect(EpicSchema.safeParse("UA.D.AAPL.DAILY.IP").success).toBe(true);
    expect(EpicSchema.safeParse("UA/D").success).toBe(false);
  });
});
