import type { HyperliquidInfoClientOptions, InfoRequest, RequestOptions } from "./types.js";
import { HYPERLIQUID_API_URLS, HyperliquidInfoError } from "./types.js";
import { Account } from "./resources/account.js";
import { Market } from "./resources/market.js";

const DEFAULT_TIMEOUT_MS = 10_000;

/**
 * Read-only client for the Hyperliquid `info` endpoint.
 *
 * One instance is shared by every MCP session. It only holds connection
 * settings, so concurrent calls need no coordination.
 *
 * @example
 * ```typescript
 * import { HyperliquidInfoClient } from "hyperliquid-info-mcp";
 *
 * const client = new HyperliquidInfoClient({ network: "testnet" });
 *
 * const mids = await client.market.allMids();
 * const state = await client.account.userState("0x0000000000000000000000000000000000000001");
 * ```
 */
export class HyperliquidInfoClient {
  public readonly baseUrl: string;
  public readonly timeoutMs: number;

  /**
   * Queries scoped to a single account address
   */
  public readonly account: Account;

  /**
   * Exchange-wide market data queries
   */
  public readonly market: Market;

  constructor(options: HyperliquidInfoClientOptions = {}) {
    const network = options.network ?? "mainnet";
    this.baseUrl = (options.baseUrl ?? HYPERLIQUID_API_URLS[network]).replace(/\/$/, "");
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;

    this.account = new Account(this);
    this.market = new Market(this);
  }

  /**
   * POST one query to `${baseUrl}/info` and return the parsed JSON.
   *
   * @throws {HyperliquidInfoError} `upstream_error` on a non-2xx status,
   * `timeout` when `timeoutMs` elapses, `cancelled` when `options.signal`
   * aborts, `network_error` when the request cannot be sent and
   * `invalid_response` when the body is not JSON.
   *
   * @internal
   */
  async post<T>(body: InfoRequest, options: RequestOptions = {}): Promise<T> {
    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.timeoutMs);

    const onCallerAbort = () => controller.abort();
    options.signal?.addEventListener("abort", onCallerAbort, { once: true });
    if (options.signal?.aborted) controller.abort();

    // Aborting the controller also stops a body that stalls after the headers arrive
    const abortFailure = (): HyperliquidInfoError | undefined => {
      if (timedOut) {
        return new HyperliquidInfoError(
          `Hyperliquid API request timed out after ${this.timeoutMs}ms`,
          "timeout"
        );
      }
      if (options.signal?.aborted) {
        return new HyperliquidInfoError("Hyperliquid API request was cancelled", "cancelled");
      }
      return undefined;
    };

    try {
      let response: Response;
      try {
        response = await fetch(`${this.baseUrl}/info`, {
          method: "POST",
          headers: { "Content-Type": "application/json" },
          body: JSON.stringify(body),
          signal: controller.signal,
        });
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        throw (
          abortFailure() ??
          new HyperliquidInfoError(`Hyperliquid API request failed: ${reason}`, "network_error")
        );
      }

      if (!response.ok) {
        let text: string;
        try {
          text = await response.text();
        } catch (error) {
          const failure = abortFailure();
          if (failure) throw failure;
          text = error instanceof Error ? error.message : String(error);
        }
        throw new HyperliquidInfoError(
          `Hyperliquid API error (${response.status}): ${text.slice(0, 200)}`,
          "upstream_error",
          response.status
        );
      }

      try {
        return (await response.json()) as T;
      } catch {
        throw (
          abortFailure() ??
          new HyperliquidInfoError(
            "Hyperliquid API returned a body that is not valid JSON",
            "invalid_response",
            response.status
          )
        );
      }
    } finally {
      clearTimeout(timer);
      options.signal?.removeEventListener("abort", onCallerAbort);
    }
  }
}
