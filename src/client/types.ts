/**
 * Configuration options for initializing the HyperliquidInfoClient
 */
export interface HyperliquidInfoClientOptions {
  /**
   * Which Hyperliquid network to query
   * @default "mainnet"
   */
  network?: HyperliquidNetwork;

  /**
   * Base URL override. The client posts to `${baseUrl}/info`.
   * @example "https://api.hyperliquid.xyz"
   */
  baseUrl?: string;

  /**
   * Abort requests that take longer than this many milliseconds
   * @default 10000
   */
  timeoutMs?: number;
}

export type HyperliquidNetwork = "mainnet" | "testnet";

export const HYPERLIQUID_API_URLS: Record<HyperliquidNetwork, string> = {
  mainnet: "https://api.hyperliquid.xyz",
  testnet: "https://api.hyperliquid-testnet.xyz",
};

/**
 * Per-request options
 */
export interface RequestOptions {
  /** Aborts the request when the caller cancels (e.g. an MCP cancellation) */
  signal?: AbortSignal;
}

// ---------------------------------------------------------------------------
// Request bodies
// ---------------------------------------------------------------------------

/**
 * Body of a POST to the `info` endpoint. Every query is discriminated by `type`.
 */
export type InfoRequest =
  | { type: "clearinghouseState"; user: string }
  | { type: "spotClearinghouseState"; user: string }
  | { type: "openOrders"; user: string }
  | { type: "userFills"; user: string }
  | { type: "userFunding"; user: string; startTime: number; endTime?: number }
  | { type: "userFees"; user: string }
  | { type: "delegatorSummary"; user: string }
  | { type: "delegatorRewards"; user: string }
  | { type: "orderStatus"; user: string; oid: number | string }
  | { type: "subAccounts"; user: string }
  | { type: "allMids" }
  | { type: "l2Book"; coin: string }
  | {
      type: "candleSnapshot";
      req: { coin: string; interval: CandleInterval; startTime: number; endTime: number };
    }
  | { type: "fundingHistory"; coin: string; startTime: number; endTime?: number }
  | { type: "meta" }
  | { type: "metaAndAssetCtxs" }
  | { type: "spotMeta" }
  | { type: "spotMetaAndAssetCtxs" };

/**
 * Candle intervals accepted by `candleSnapshot`
 */
export const CANDLE_INTERVALS = [
  "1m",
  "3m",
  "5m",
  "15m",
  "30m",
  "1h",
  "2h",
  "4h",
  "8h",
  "12h",
  "1d",
  "3d",
  "1w",
  "1M",
] as const;

export type CandleInterval = (typeof CANDLE_INTERVALS)[number];

// ---------------------------------------------------------------------------
// Response types
//
// Only the fields callers commonly read are spelled out; the exchange may add
// more and the server passes them through untouched.
// ---------------------------------------------------------------------------

/** Mid price per coin, as decimal strings */
export type AllMidsResponse = Record<string, string>;

export interface L2Level {
  px: string;
  sz: string;
  n: number;
}

export interface L2BookResponse {
  coin: string;
  time: number;
  /** [bids, asks] */
  levels: [L2Level[], L2Level[]];
}

export interface Candle {
  /** Open time (ms) */
  t: number;
  /** Close time (ms) */
  T: number;
  s: string;
  i: string;
  o: string;
  c: string;
  h: string;
  l: string;
  v: string;
  n: number;
}

export interface FundingHistoryEntry {
  coin: string;
  fundingRate: string;
  premium: string;
  time: number;
}

export interface PerpAssetInfo {
  name: string;
  szDecimals: number;
  maxLeverage: number;
  onlyIsolated?: boolean;
  isDelisted?: boolean;
}

export interface MetaResponse {
  universe: PerpAssetInfo[];
  [key: string]: unknown;
}

export interface PerpAssetCtx {
  funding: string;
  openInterest: string;
  prevDayPx: string;
  dayNtlVlm: string;
  premium: string | null;
  oraclePx: string;
  markPx: string;
  midPx: string | null;
  impactPxs: string[] | null;
}

export type MetaAndAssetCtxsResponse = [MetaResponse, PerpAssetCtx[]];

export interface SpotToken {
  name: string;
  szDecimals: number;
  weiDecimals: number;
  index: number;
  tokenId: string;
  isCanonical: boolean;
}

export interface SpotPair {
  name: string;
  tokens: [number, number];
  index: number;
  isCanonical: boolean;
}

export interface SpotMetaResponse {
  tokens: SpotToken[];
  universe: SpotPair[];
  [key: string]: unknown;
}

export interface SpotAssetCtx {
  coin: string;
  dayNtlVlm: string;
  markPx: string;
  midPx: string | null;
  prevDayPx: string;
  circulatingSupply?: string;
}

export type SpotMetaAndAssetCtxsResponse = [SpotMetaResponse, SpotAssetCtx[]];

/**
 * Account-scoped responses are passed through untouched, so they stay loosely
 * typed: the exchange versions their shapes independently of this server.
 */
export type AccountResponse = Record<string, unknown> | unknown[] | null;

// ---------------------------------------------------------------------------
// Error types
// ---------------------------------------------------------------------------

/**
 * Error codes raised while serving a query
 */
export type HyperliquidInfoErrorCode =
  | "invalid_params"
  | "upstream_error"
  | "timeout"
  | "cancelled"
  | "network_error"
  | "invalid_response";

/**
 * Error thrown by the info client and the parameter normalizer
 */
export class HyperliquidInfoError extends Error {
  constructor(
    message: string,
    public readonly code: HyperliquidInfoErrorCode,
    public readonly statusCode?: number
  ) {
    super(message);
    this.name = "HyperliquidInfoError";
    Object.setPrototypeOf(this, HyperliquidInfoError.prototype);
  }
}
