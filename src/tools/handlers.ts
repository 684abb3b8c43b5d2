import type { CallToolResult, GetPromptResult } from "@modelcontextprotocol/sdk/types.js";
import type { HyperliquidInfoClient } from "../client/client.js";
import { HyperliquidInfoError } from "../client/types.js";
import { SERVER_INFO } from "./definitions.js";
import {
  accountParams,
  candlesParams,
  coinFundingParams,
  coinParams,
  metadataParams,
  noParams,
  orderByCloidParams,
  orderByOidParams,
  parseParams,
  userFundingParams,
  userStateParams,
} from "./params.js";
import { shapeMetadata, toStructuredContent } from "./shape.js";

type ToolArgs = Record<string, unknown> | undefined;

export interface ToolContext {
  client: HyperliquidInfoClient;
  /** Cancellation signal of the MCP request */
  signal?: AbortSignal;
}

/**
 * What each tool fetches, used in upstream failure messages
 */
const FETCH_LABELS: Record<string, string> = {
  get_user_state: "user state",
  get_user_open_orders: "user open orders",
  get_user_trade_history: "user fills",
  get_user_funding_history: "user funding history",
  get_user_fees: "user fees",
  get_user_staking_summary: "user staking summary",
  get_user_staking_rewards: "user staking rewards",
  get_user_order_by_oid: "user order by oid",
  get_user_order_by_cloid: "user order by cloid",
  get_user_sub_accounts: "user sub accounts",
  get_all_mids: "all mids",
  get_l2_snapshot: "L2 snapshot",
  get_candles_snapshot: "candles snapshot",
  get_coin_funding_history: "coin funding history",
  get_perp_dexs: "perpetual DEXs",
  get_perp_metadata: "perpetual metadata",
  get_spot_metadata: "spot metadata",
};

// ============================================================================
// DISPATCH
// ============================================================================

/**
 * Run one tool call. Never throws: validation failures, upstream failures and
 * unexpected errors all come back as an error result.
 */
export async function callTool(name: string, args: ToolArgs, ctx: ToolContext): Promise<CallToolResult> {
  try {
    switch (name) {
      case "get_user_state":
        return await handleGetUserState(args, ctx);
      case "get_user_open_orders":
        return await handleGetUserOpenOrders(args, ctx);
      case "get_user_trade_history":
        return await handleGetUserTradeHistory(args, ctx);
      case "get_user_funding_history":
        return await handleGetUserFundingHistory(args, ctx);
      case "get_user_fees":
        return await handleGetUserFees(args, ctx);
      case "get_user_staking_summary":
        return await handleGetUserStakingSummary(args, ctx);
      case "get_user_staking_rewards":
        return await handleGetUserStakingRewards(args, ctx);
      case "get_user_order_by_oid":
        return await handleGetUserOrderByOid(args, ctx);
      case "get_user_order_by_cloid":
        return await handleGetUserOrderByCloid(args, ctx);
      case "get_user_sub_accounts":
        return await handleGetUserSubAccounts(args, ctx);
      case "get_all_mids":
        return await handleGetAllMids(args, ctx);
      case "get_l2_snapshot":
        return await handleGetL2Snapshot(args, ctx);
      case "get_candles_snapshot":
        return await handleGetCandlesSnapshot(args, ctx);
      case "get_coin_funding_history":
        return await handleGetCoinFundingHistory(args, ctx);
      case "get_perp_dexs":
        return await handleGetPerpDexs(args, ctx);
      case "get_perp_metadata":
        return await handleGetPerpMetadata(args, ctx);
      case "get_spot_metadata":
        return await handleGetSpotMetadata(args, ctx);
      case "health_check":
        return handleHealthCheck();
      default:
        return errorResult(`Unknown tool: ${name}`);
    }
  } catch (error) {
    const message = describeFailure(name, error);
    console.error(`[tools] ${name} failed: ${message}`);
    return errorResult(message);
  }
}

function describeFailure(name: string, error: unknown): string {
  const reason = error instanceof Error ? error.message : "Unknown error";
  if (error instanceof HyperliquidInfoError && error.code === "invalid_params") {
    return `Invalid parameters: ${reason}`;
  }
  const label = FETCH_LABELS[name];
  return label ? `Failed to fetch ${label}: ${reason}` : reason;
}

// ============================================================================
// RESPONSE HELPERS
// ============================================================================

export function errorResult(message: string): CallToolResult {
  return {
    content: [{ type: "text", text: JSON.stringify({ error: message }) }],
    isError: true,
  };
}

export function successResult(data: unknown): CallToolResult {
  return {
    content: [{ type: "text", text: JSON.stringify(data ?? null) }],
    structuredContent: toStructuredContent(data),
  };
}

// ============================================================================
// ACCOUNT HANDLERS
// ============================================================================

async function handleGetUserState(args: ToolArgs, { client, signal }: ToolContext): Promise<CallToolResult> {
  const { account_address, check_spot } = parseParams(userStateParams, args);
  const state = check_spot
    ? await client.account.spotUserState(account_address, { signal })
    : await client.account.userState(account_address, { signal });
  return successResult(state);
}

async function handleGetUserOpenOrders(args: ToolArgs, { client, signal }: ToolContext): Promise<CallToolResult> {
  const { account_address } = parseParams(accountParams, args);
  return successResult(await client.account.openOrders(account_address, { signal }));
}

async function handleGetUserTradeHistory(args: ToolArgs, { client, signal }: ToolContext): Promise<CallToolResult> {
  const { account_address } = parseParams(accountParams, args);
  return successResult(await client.account.userFills(account_address, { signal }));
}

async function handleGetUserFundingHistory(args: ToolArgs, { client, signal }: ToolContext): Promise<CallToolResult> {
  const { account_address, start_time, end_time } = parseParams(userFundingParams, args);
  return successResult(await client.account.userFunding(account_address, start_time, end_time, { signal }));
}

async function handleGetUserFees(args: ToolArgs, { client, signal }: ToolContext): Promise<CallToolResult> {
  const { account_address } = parseParams(accountParams, args);
  return successResult(await client.account.userFees(account_address, { signal }));
}

async function handleGetUserStakingSummary(args: ToolArgs, { client, signal }: ToolContext): Promise<CallToolResult> {
  const { account_address } = parseParams(accountParams, args);
  return successResult(await client.account.stakingSummary(account_address, { signal }));
}

async function handleGetUserStakingRewards(args: ToolArgs, { client, signal }: ToolContext): Promise<CallToolResult> {
  const { account_address } = parseParams(accountParams, args);
  return successResult(await client.account.stakingRewards(account_address, { signal }));
}

async function handleGetUserOrderByOid(args: ToolArgs, { client, signal }: ToolContext): Promise<CallToolResult> {
  const { account_address, oid } = parseParams(orderByOidParams, args);
  return successResult(await client.account.orderByOid(account_address, oid, { signal }));
}

async function handleGetUserOrderByCloid(args: ToolArgs, { client, signal }: ToolContext): Promise<CallToolResult> {
  const { account_address, cloid } = parseParams(orderByCloidParams, args);
  return successResult(await client.account.orderByCloid(account_address, cloid, { signal }));
}

async function handleGetUserSubAccounts(args: ToolArgs, { client, signal }: ToolContext): Promise<CallToolResult> {
  const { account_address } = parseParams(accountParams, args);
  return successResult(await client.account.subAccounts(account_address, { signal }));
}

// ============================================================================
// MARKET HANDLERS
// ============================================================================

async function handleGetAllMids(args: ToolArgs, { client, signal }: ToolContext): Promise<CallToolResult> {
  parseParams(noParams, args);
  return successResult(await client.market.allMids({ signal }));
}

async function handleGetL2Snapshot(args: ToolArgs, { client, signal }: ToolContext): Promise<CallToolResult> {
  const { coin_name } = parseParams(coinParams, args);
  return successResult(await client.market.l2Snapshot(coin_name, { signal }));
}

async function handleGetCandlesSnapshot(args: ToolArgs, { client, signal }: ToolContext): Promise<CallToolResult> {
  const { coin_name, interval, start_time, end_time } = parseParams(candlesParams, args);
  return successResult(
    await client.market.candleSnapshot(coin_name, interval, start_time, end_time, { signal })
  );
}

async function handleGetCoinFundingHistory(args: ToolArgs, { client, signal }: ToolContext): Promise<CallToolResult> {
  const { coin_name, start_time, end_time } = parseParams(coinFundingParams, args);
  return successResult(await client.market.fundingHistory(coin_name, start_time, end_time, { signal }));
}

async function handleGetPerpDexs(args: ToolArgs, { client, signal }: ToolContext): Promise<CallToolResult> {
  parseParams(noParams, args);
  return successResult(await client.market.meta({ signal }));
}

async function handleGetPerpMetadata(args: ToolArgs, { client, signal }: ToolContext): Promise<CallToolResult> {
  const { include_asset_ctxs } = parseParams(metadataParams, args);
  const payload = include_asset_ctxs
    ? await client.market.metaAndAssetCtxs({ signal })
    : await client.market.meta({ signal });
  return successResult(shapeMetadata(payload, include_asset_ctxs));
}

async function handleGetSpotMetadata(args: ToolArgs, { client, signal }: ToolContext): Promise<CallToolResult> {
  const { include_asset_ctxs } = parseParams(metadataParams, args);
  const payload = include_asset_ctxs
    ? await client.market.spotMetaAndAssetCtxs({ signal })
    : await client.market.spotMeta({ signal });
  return successResult(shapeMetadata(payload, include_asset_ctxs));
}

// ============================================================================
// SERVER HANDLERS
// ============================================================================

function handleHealthCheck(): CallToolResult {
  return successResult({
    status: "healthy",
    timestamp: new Date().toISOString(),
    server: SERVER_INFO.name,
    version: SERVER_INFO.version,
  });
}

// ============================================================================
// PROMPTS
// ============================================================================

/**
 * Render a prompt by name.
 *
 * @throws {HyperliquidInfoError} `invalid_params` for an unknown prompt or a bad argument
 */
export function getPrompt(name: string, args: Record<string, string> | undefined): GetPromptResult {
  if (name !== "analyze_positions") {
    throw new HyperliquidInfoError(`Unknown prompt: ${name}`, "invalid_params");
  }

  const { account_address } = parseParams(accountParams, args);
  return {
    description: "Analyze an account's trading positions and recent trading activity.",
    messages: [
      {
        role: "user",
        content: { type: "text", text: `Please analyze the trading positions for account ${account_address}:` },
      },
      {
        role: "user",
        content: {
          type: "text",
          text: "Use the get_user_state, get_user_open_orders, get_user_trade_history, get_user_funding_history, and get_user_fees tools to fetch data.",
        },
      },
      {
        role: "assistant",
        content: {
          type: "text",
          text: "I'll analyze the positions, open orders, trade history, funding payments and fees of this account to give insights on risk and performance.",
        },
      },
    ],
  };
}
