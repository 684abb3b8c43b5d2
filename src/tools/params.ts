import { z } from "zod";
import { CANDLE_INTERVALS, HyperliquidInfoError } from "../client/types.js";

// ============================================================================
// TIME NORMALIZATION
// ============================================================================

// Calendar date, then an optional time and offset, in extended
// (`2025-01-01T08:00:00+08:00`) or basic (`20250101T080000+0800`) format
const ISO_8601 =
  /^(\d{4})-?(\d{2})-?(\d{2})(?:[T ](\d{2})(?::?(\d{2})(?::?(\d{2})(?:[.,](\d+))?)?)?(Z|[+-]\d{2}(?::?\d{2})?)?)?$/i;
const OFFSET = /^([+-])(\d{2}):?(\d{2})?$/;
const DIGITS = /^\d+$/;

/**
 * Convert an agent-supplied time value to epoch milliseconds.
 *
 * Accepts an ISO 8601 date (`2025-01-01`) or date-time in extended or basic
 * format (`2025-01-01T08:00:00+08:00`, `2025-01-01 08:00+08`,
 * `20250101T000000Z`), an epoch-millisecond number, or a string of digits
 * holding one. Date-times without an offset are read as UTC.
 *
 * @param field - Parameter name used in the error message
 * @throws {HyperliquidInfoError} `invalid_params` when the value cannot be read
 *
 * @example
 * ```typescript
 * toEpochMillis("2025-01-01T00:00:00Z", "start_time"); // 1735689600000
 * ```
 */
export function toEpochMillis(value: unknown, field: string): number {
  const millis = readEpochMillis(value);
  if (millis === undefined) {
    throw new HyperliquidInfoError(
      `${field} must be an ISO 8601 date-time (e.g. '2025-01-01T00:00:00Z') or epoch milliseconds, got ${describe(value)}`,
      "invalid_params"
    );
  }
  return millis;
}

function readEpochMillis(value: unknown): number | undefined {
  if (typeof value === "number") {
    // `+ 0` turns -0 into 0
    return Number.isSafeInteger(value) && value >= 0 ? value + 0 : undefined;
  }
  if (typeof value !== "string") return undefined;

  const text = value.trim();
  if (DIGITS.test(text)) {
    const millis = Number(text);
    return Number.isSafeInteger(millis) ? millis : undefined;
  }

  const millis = parseIso8601(text);
  return millis !== undefined && millis >= 0 ? millis : undefined;
}

function parseIso8601(text: string): number | undefined {
  const match = ISO_8601.exec(text);
  if (!match) return undefined;

  const [, year, month, day, hour = "0", minute = "0", second = "0", fraction = "", zone] = match;
  const y = Number(year);
  const mo = Number(month);
  const d = Number(day);
  const h = Number(hour);
  const mi = Number(minute);
  const sec = Number(second);

  if (mo < 1 || mo > 12 || d < 1 || d > daysInMonth(y, mo)) return undefined;
  if (h > 23 || mi > 59 || sec > 59) return undefined;

  let offsetMinutes = 0;
  if (zone !== undefined && zone.toUpperCase() !== "Z") {
    const offset = OFFSET.exec(zone);
    if (!offset) return undefined;
    const [, sign, offsetHours, offsetMins = "0"] = offset;
    if (Number(offsetHours) > 23 || Number(offsetMins) > 59) return undefined;
    offsetMinutes = (sign === "-" ? -1 : 1) * (Number(offsetHours) * 60 + Number(offsetMins));
  }

  const ms = Number(fraction.slice(0, 3).padEnd(3, "0"));
  const date = new Date(0);
  date.setUTCFullYear(y, mo - 1, d);
  date.setUTCHours(h, mi, sec, ms);
  return date.getTime() - offsetMinutes * 60_000;
}

function daysInMonth(year: number, month: number): number {
  const last = new Date(0);
  last.setUTCFullYear(year, month, 0);
  return last.getUTCDate();
}

function describe(value: unknown): string {
  if (value === undefined) return "nothing";
  if (typeof value === "string") return `'${value}'`;
  return JSON.stringify(value) ?? String(value);
}

// ============================================================================
// PARAMETER SCHEMAS
// ============================================================================

const ADDRESS_PATTERN = /^0x[0-9a-fA-F]{40}$/;
const CLOID_PATTERN = /^0x[0-9a-fA-F]{32}$/;

const accountAddress = z
  .string({
    required_error: "account_address is required",
    invalid_type_error: "account_address must be a string",
  })
  .trim()
  .regex(ADDRESS_PATTERN, "account_address must be a 0x-prefixed 40-hex-digit address");

const coinName = z
  .string({
    required_error: "coin_name is required",
    invalid_type_error: "coin_name must be a string",
  })
  .trim()
  .min(1, "coin_name must not be empty");

const includeAssetCtxs = z
  .boolean({ invalid_type_error: "include_asset_ctxs must be a boolean" })
  .default(false);

function timeValue(field: string) {
  return z.unknown().transform((value, ctx) => {
    try {
      return toEpochMillis(value, field);
    } catch (error) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: error instanceof Error ? error.message : `${field} is invalid`,
      });
      return z.NEVER;
    }
  });
}

function optionalTimeValue(field: string) {
  return z.unknown().transform((value, ctx) => {
    if (value === undefined || value === null || value === "") return undefined;
    try {
      return toEpochMillis(value, field);
    } catch (error) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: error instanceof Error ? error.message : `${field} is invalid`,
      });
      return z.NEVER;
    }
  });
}

function startNotAfterEnd(range: { start_time: unknown; end_time?: unknown }): boolean {
  const { start_time: start, end_time: end } = range;
  return typeof start !== "number" || typeof end !== "number" || start <= end;
}

const rangeMessage = { message: "start_time must not be after end_time" };

export const noParams = z.object({});

export const accountParams = z.object({
  account_address: accountAddress,
});

export const userStateParams = z.object({
  account_address: accountAddress,
  check_spot: z
    .boolean({ invalid_type_error: "check_spot must be a boolean" })
    .default(false),
});

export const coinParams = z.object({
  coin_name: coinName,
});

export const coinFundingParams = z
  .object({
    coin_name: coinName,
    start_time: timeValue("start_time"),
    end_time: optionalTimeValue("end_time"),
  })
  .refine(startNotAfterEnd, rangeMessage);

export const userFundingParams = z
  .object({
    account_address: accountAddress,
    start_time: timeValue("start_time"),
    end_time: optionalTimeValue("end_time"),
  })
  .refine(startNotAfterEnd, rangeMessage);

export const candlesParams = z
  .object({
    coin_name: coinName,
    interval: z.enum(CANDLE_INTERVALS, {
      errorMap: () => ({
        message: `interval must be one of ${CANDLE_INTERVALS.join(", ")}`,
      }),
    }),
    start_time: timeValue("start_time"),
    end_time: timeValue("end_time"),
  })
  .refine(startNotAfterEnd, rangeMessage);

export const orderByOidParams = z.object({
  account_address: accountAddress,
  oid: z.unknown().transform((value, ctx) => {
    if (typeof value === "number" && Number.isSafeInteger(value) && value >= 0) return value;
    if (typeof value === "string" && DIGITS.test(value.trim())) {
      const oid = Number(value.trim());
      if (Number.isSafeInteger(oid)) return oid;
    }
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `oid must be a non-negative integer order id, got ${describe(value)}`,
    });
    return z.NEVER;
  }),
});

export const orderByCloidParams = z.object({
  account_address: accountAddress,
  cloid: z
    .string({
      required_error: "cloid is required",
      invalid_type_error: "cloid must be a string",
    })
    .trim()
    .regex(CLOID_PATTERN, "cloid must be a 0x-prefixed 32-hex-digit client order id"),
});

export const metadataParams = z.object({
  include_asset_ctxs: includeAssetCtxs,
});

/**
 * Validate raw tool arguments against `schema`. Runs before any network call.
 *
 * @throws {HyperliquidInfoError} `invalid_params` listing every problem found
 */
export function parseParams<S extends z.ZodTypeAny>(
  schema: S,
  args: Record<string, unknown> | undefined
): z.output<S> {
  const result = schema.safeParse(args ?? {});
  if (!result.success) {
    const message = result.error.issues.map((issue) => issue.message).join("; ");
    throw new HyperliquidInfoError(message, "invalid_params");
  }
  return result.data;
}
