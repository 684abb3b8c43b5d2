import { describe, it, expect } from "vitest";
import { HyperliquidInfoError } from "../../client/types.js";
import {
  accountParams,
  candlesParams,
  coinFundingParams,
  metadataParams,
  orderByCloidParams,
  orderByOidParams,
  parseParams,
  toEpochMillis,
  userStateParams,
} from "../params.js";

const ADDRESS = "0xcd5051944f780a621ee62e39e493c489668acf4d";

function validationMessage(run: () => unknown): string {
  try {
    run();
  } catch (error) {
    expect(error).toBeInstanceOf(HyperliquidInfoError);
    expect((error as HyperliquidInfoError).code).toBe("invalid_params");
    return (error as HyperliquidInfoError).message;
  }
  throw new Error("expected a validation error");
}

describe("toEpochMillis()", () => {
  it("converts a UTC ISO 8601 date-time", () => {
    expect(toEpochMillis("2025-01-01T00:00:00Z", "start_time")).toBe(1735689600000);
  });

  it("honours fractional seconds", () => {
    expect(toEpochMillis("2025-01-01T00:00:00.250Z", "start_time")).toBe(1735689600250);
  });

  it("applies a numeric offset", () => {
    expect(toEpochMillis("2025-01-01T08:00:00+08:00", "start_time")).toBe(1735689600000);
  });

  it("reads a date-time without offset as UTC", () => {
    expect(toEpochMillis("2025-01-01T00:00:00", "start_time")).toBe(1735689600000);
  });

  it("reads a bare date as UTC midnight", () => {
    expect(toEpochMillis("2025-01-02", "end_time")).toBe(1735776000000);
  });

  it("passes epoch milliseconds through", () => {
    expect(toEpochMillis(1735689600000, "start_time")).toBe(1735689600000);
    expect(toEpochMillis("1735689600000", "start_time")).toBe(1735689600000);
  });

  it.each([
    ["2025-01-01T08:00:00+08", 1735689600000],
    ["2025-01-01T08:00:00+0800", 1735689600000],
    ["2024-12-31T19:00-05:00", 1735689600000],
    ["20250101T000000Z", 1735689600000],
    ["2025-01-01t00:00:00z", 1735689600000],
    ["2025-01-01 00:00:00Z", 1735689600000],
    ["2025-01-01T00:00:00,5Z", 1735689600500],
    ["2024-02-29", 1709164800000],
  ])("converts %j", (value, expected) => {
    expect(toEpochMillis(value, "start_time")).toBe(expected);
  });

  it("returns 0 for negative zero", () => {
    expect(toEpochMillis(-0, "start_time")).toBe(0);
  });

  it.each([
    "yesterday",
    "2025-13-01T00:00:00Z",
    "01/01/2025",
    "",
    "2025-01-01T25:00:00Z",
    "2025-02-29",
    "2025-01-01T08:00:00+24",
    "1969-12-31T23:59:59Z",
  ])("rejects %j", (value) => {
    expect(validationMessage(() => toEpochMillis(value, "start_time"))).toBe(
      `start_time must be an ISO 8601 date-time (e.g. '2025-01-01T00:00:00Z') or epoch milliseconds, got '${value}'`
    );
  });

  it("rejects negative and fractional numbers", () => {
    expect(() => toEpochMillis(-1, "start_time")).toThrow(HyperliquidInfoError);
    expect(() => toEpochMillis(1.5, "start_time")).toThrow(HyperliquidInfoError);
  });

  it("rejects non-string, non-number values", () => {
    expect(validationMessage(() => toEpochMillis(true, "end_time"))).toBe(
      "end_time must be an ISO 8601 date-time (e.g. '2025-01-01T00:00:00Z') or epoch milliseconds, got true"
    );
  });
});

describe("parseParams()", () => {
  describe("account address", () => {
    it("accepts a 40-hex-digit address and trims whitespace", () => {
      expect(parseParams(accountParams, { account_address: ` ${ADDRESS} ` })).toEqual({
        account_address: ADDRESS,
      });
    });

    it("rejects a missing address", () => {
      expect(validationMessage(() => parseParams(accountParams, undefined))).toBe(
        "account_address is required"
      );
    });

    it.each(["", "0x123", "cd5051944f780a621ee62e39e493c489668acf4d", "0xZZ5051944f780a621ee62e39e493c489668acf4d"])(
      "rejects malformed address %j",
      (account_address) => {
        expect(validationMessage(() => parseParams(accountParams, { account_address }))).toBe(
          "account_address must be a 0x-prefixed 40-hex-digit address"
        );
      }
    );

    it("rejects a non-string address", () => {
      expect(validationMessage(() => parseParams(accountParams, { account_address: 42 }))).toBe(
        "account_address must be a string"
      );
    });
  });

  it("defaults check_spot to false", () => {
    expect(parseParams(userStateParams, { account_address: ADDRESS })).toEqual({
      account_address: ADDRESS,
      check_spot: false,
    });
  });

  it("rejects a non-boolean check_spot", () => {
    expect(
      validationMessage(() => parseParams(userStateParams, { account_address: ADDRESS, check_spot: "yes" }))
    ).toBe("check_spot must be a boolean");
  });

  describe("candles", () => {
    it("normalizes both ends of the range", () => {
      expect(
        parseParams(candlesParams, {
          coin_name: "BTC",
          interval: "1h",
          start_time: "2025-01-01T00:00:00Z",
          end_time: "2025-01-02T00:00:00Z",
        })
      ).toEqual({
        coin_name: "BTC",
        interval: "1h",
        start_time: 1735689600000,
        end_time: 1735776000000,
      });
    });

    it("rejects an unknown interval", () => {
      expect(
        validationMessage(() =>
          parseParams(candlesParams, {
            coin_name: "BTC",
            interval: "7m",
            start_time: "2025-01-01T00:00:00Z",
            end_time: "2025-01-02T00:00:00Z",
          })
        )
      ).toBe("interval must be one of 1m, 3m, 5m, 15m, 30m, 1h, 2h, 4h, 8h, 12h, 1d, 3d, 1w, 1M");
    });

    it("rejects a range whose start is after its end", () => {
      expect(
        validationMessage(() =>
          parseParams(candlesParams, {
            coin_name: "BTC",
            interval: "1d",
            start_time: "2025-01-02T00:00:00Z",
            end_time: "2025-01-01T00:00:00Z",
          })
        )
      ).toBe("start_time must not be after end_time");
    });

    it("requires end_time", () => {
      expect(
        validationMessage(() =>
          parseParams(candlesParams, { coin_name: "BTC", interval: "1d", start_time: "2025-01-01T00:00:00Z" })
        )
      ).toBe(
        "end_time must be an ISO 8601 date-time (e.g. '2025-01-01T00:00:00Z') or epoch milliseconds, got nothing"
      );
    });
  });

  describe("funding history", () => {
    it("leaves end_time open when omitted", () => {
      expect(parseParams(coinFundingParams, { coin_name: "ETH", start_time: "2025-01-01T00:00:00Z" })).toEqual({
        coin_name: "ETH",
        start_time: 1735689600000,
        end_time: undefined,
      });
    });

    it("reports only the unreadable time, not a range error", () => {
      expect(
        validationMessage(() =>
          parseParams(coinFundingParams, { coin_name: "ETH", start_time: "soon", end_time: "2025-01-01" })
        )
      ).toBe(
        "start_time must be an ISO 8601 date-time (e.g. '2025-01-01T00:00:00Z') or epoch milliseconds, got 'soon'"
      );
    });

    it("rejects an empty coin", () => {
      expect(
        validationMessage(() => parseParams(coinFundingParams, { coin_name: "  ", start_time: 0 }))
      ).toBe("coin_name must not be empty");
    });
  });

  describe("order lookups", () => {
    it("accepts a numeric or digit-string oid", () => {
      expect(parseParams(orderByOidParams, { account_address: ADDRESS, oid: 91490942 }).oid).toBe(91490942);
      expect(parseParams(orderByOidParams, { account_address: ADDRESS, oid: "91490942" }).oid).toBe(91490942);
    });

    it("rejects a digit-string oid beyond the safe integer range", () => {
      expect(
        validationMessage(() =>
          parseParams(orderByOidParams, { account_address: ADDRESS, oid: "18446744073709551615" })
        )
      ).toBe("oid must be a non-negative integer order id, got '18446744073709551615'");
    });

    it("rejects a negative oid", () => {
      expect(validationMessage(() => parseParams(orderByOidParams, { account_address: ADDRESS, oid: -5 }))).toBe(
        "oid must be a non-negative integer order id, got -5"
      );
    });

    it("accepts a 32-hex-digit cloid", () => {
      const cloid = "0x1234567890abcdef1234567890abcdef";
      expect(parseParams(orderByCloidParams, { account_address: ADDRESS, cloid })).toEqual({
        account_address: ADDRESS,
        cloid,
      });
    });

    it("rejects a malformed cloid", () => {
      expect(
        validationMessage(() => parseParams(orderByCloidParams, { account_address: ADDRESS, cloid: "order-1" }))
      ).toBe("cloid must be a 0x-prefixed 32-hex-digit client order id");
    });
  });

  it("defaults include_asset_ctxs to false", () => {
    expect(parseParams(metadataParams, {})).toEqual({ include_asset_ctxs: false });
  });

  it("joins several problems into one message", () => {
    expect(
      validationMessage(() => parseParams(orderByCloidParams, { account_address: "0x1", cloid: "x" }))
    ).toBe(
      "account_address must be a 0x-prefixed 40-hex-digit address; cloid must be a 0x-prefixed 32-hex-digit client order id"
    );
  });
});
