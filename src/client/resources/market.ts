import type {
  AllMidsResponse,
  Candle,
  CandleInterval,
  FundingHistoryEntry,
  L2BookResponse,
  MetaAndAssetCtxsResponse,
  MetaResponse,
  RequestOptions,
  SpotMetaAndAssetCtxsResponse,
  SpotMetaResponse,
} from "../types.js";
import type { HyperliquidInfoClient } from "../client.js";

/**
 * Market resource: exchange-wide data that needs no account address
 */
export class Market {
  constructor(private client: HyperliquidInfoClient) {}

  /**
   * Mid price of every coin with a live book
   *
   * @example
   * ```typescript
   * const mids = await client.market.allMids();
   * console.log(mids.BTC); // "97000.5"
   * ```
   */
  async allMids(options?: RequestOptions): Promise<AllMidsResponse> {
    return this.client.post({ type: "allMids" }, options);
  }

  /**
   * Level 2 book snapshot (up to 20 levels per side)
   */
  async l2Snapshot(coin: string, options?: RequestOptions): Promise<L2BookResponse> {
    return this.client.post({ type: "l2Book", coin }, options);
  }

  /**
   * Candles for `coin` between `startTime` and `endTime` (epoch ms)
   */
  async candleSnapshot(
    coin: string,
    interval: CandleInterval,
    startTime: number,
    endTime: number,
    options?: RequestOptions
  ): Promise<Candle[]> {
    return this.client.post(
      { type: "candleSnapshot", req: { coin, interval, startTime, endTime } },
      options
    );
  }

  /**
   * Hourly funding rates for `coin`. A missing `endTime` means now.
   */
  async fundingHistory(
    coin: string,
    startTime: number,
    endTime?: number,
    options?: RequestOptions
  ): Promise<FundingHistoryEntry[]> {
    return this.client.post(
      endTime === undefined
        ? { type: "fundingHistory", coin, startTime }
        : { type: "fundingHistory", coin, startTime, endTime },
      options
    );
  }

  async meta(options?: RequestOptions): Promise<MetaResponse> {
    return this.client.post({ type: "meta" }, options);
  }

  /**
   * Perpetuals metadata paired with per-asset context (funding, OI, mark price)
   */
  async metaAndAssetCtxs(options?: RequestOptions): Promise<MetaAndAssetCtxsResponse> {
    return this.client.post({ type: "metaAndAssetCtxs" }, options);
  }

  async spotMeta(options?: RequestOptions): Promise<SpotMetaResponse> {
    return this.client.post({ type: "spotMeta" }, options);
  }

  async spotMetaAndAssetCtxs(options?: RequestOptions): Promise<SpotMetaAndAssetCtxsResponse> {
    return this.client.post({ type: "spotMetaAndAssetCtxs" }, options);
  }
}
