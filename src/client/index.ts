/**
 * Client module for the Hyperliquid `info` endpoint.
 *
 * @packageDocumentation
 */

// Main client export
export { HyperliquidInfoClient } from "./client.js";

// Resource exports
export { Account } from "./resources/account.js";
export { Market } from "./resources/market.js";

// Type exports
export type {
  HyperliquidInfoClientOptions,
  HyperliquidNetwork,
  RequestOptions,
  InfoRequest,
  CandleInterval,
  AllMidsResponse,
  L2Level,
  L2BookResponse,
  Candle,
  FundingHistoryEntry,
  PerpAssetInfo,
  MetaResponse,
  PerpAssetCtx,
  MetaAndAssetCtxsResponse,
  SpotToken,
  SpotPair,
  SpotMetaResponse,
  SpotAssetCtx,
  SpotMetaAndAssetCtxsResponse,
  AccountResponse,
  HyperliquidInfoErrorCode,
} from "./types.js";

export { CANDLE_INTERVALS, HYPERLIQUID_API_URLS, HyperliquidInfoError } from "./types.js";
