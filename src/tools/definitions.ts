import type { Prompt, Tool } from "@modelcontextprotocol/sdk/types.js";
import { CANDLE_INTERVALS } from "../client/types.js";

export const SERVER_INFO = { name: "hyperliquid-info", version: "1.0.0" } as const;

// ============================================================================
// SHARED PARAMETER SCHEMAS
// ============================================================================

const ACCOUNT_ADDRESS = {
  type: "string",
  description: "Hyperliquid account address (e.g. '0xcd5051944f780a621ee62e39e493c489668acf4d')",
  pattern: "^0x[0-9a-fA-F]{40}$",
} as const;

const COIN_NAME = {
  type: "string",
  description: "Trading symbol (e.g. 'BTC', 'ETH'); spot pairs use their exchange name (e.g. 'PURR/USDC', '@107')",
  minLength: 1,
} as const;

const TIME_VALUE = {
  type: ["string", "integer"],
  description: "ISO 8601 date-time (e.g. '2025-01-01T00:00:00Z') or epoch milliseconds",
} as const;

const INCLUDE_ASSET_CTXS = {
  type: "boolean",
  description: "Also return per-asset context (funding, open interest, mark price). Defaults to false.",
  default: false,
} as const;

function accountOnly(): Tool["inputSchema"] {
  return {
    type: "object",
    properties: { account_address: ACCOUNT_ADDRESS },
    required: ["account_address"],
  };
}

// ============================================================================
// TOOL DEFINITIONS
//
// Every tool is a read-only query against the Hyperliquid info endpoint.
// Results are the exchange's JSON; arrays arrive as { result: [...] } in
// structuredContent.
// ============================================================================

export const TOOLS: Tool[] = [
  // ==================== ACCOUNT ====================
  {
    name: "get_user_state",
    description:
      "Query an account's state: open positions (size, entry price, unrealized PnL), margin summary and withdrawable balance. Set check_spot to get spot token balances instead of the perpetuals state.",
    inputSchema: {
      type: "object",
      properties: {
        account_address: ACCOUNT_ADDRESS,
        check_spot: {
          type: "boolean",
          description: "Query the spot clearinghouse instead of perpetuals. Defaults to false.",
          default: false,
        },
      },
      required: ["account_address"],
    },
  },
  {
    name: "get_user_open_orders",
    description: "List every open order of an account with order id, coin, side, size and limit price.",
    inputSchema: accountOnly(),
  },
  {
    name: "get_user_trade_history",
    description: "Fetch an account's trade fills with coin, size, price, fee, closed PnL and timestamp.",
    inputSchema: accountOnly(),
  },
  {
    name: "get_user_funding_history",
    description:
      "Fetch the funding payments an account paid or received between start_time and end_time.",
    inputSchema: {
      type: "object",
      properties: {
        account_address: ACCOUNT_ADDRESS,
        start_time: TIME_VALUE,
        end_time: { ...TIME_VALUE, description: `${TIME_VALUE.description}. Defaults to now.` },
      },
      required: ["account_address", "start_time"],
    },
  },
  {
    name: "get_user_fees",
    description: "Fetch an account's fee schedule: maker and taker rates, volume tiers and discounts.",
    inputSchema: accountOnly(),
  },
  {
    name: "get_user_staking_summary",
    description: "Fetch an account's staking summary: delegated, undelegated and pending-withdrawal amounts.",
    inputSchema: accountOnly(),
  },
  {
    name: "get_user_staking_rewards",
    description: "Fetch an account's staking reward history with amount and timestamp per reward.",
    inputSchema: accountOnly(),
  },
  {
    name: "get_user_order_by_oid",
    description: "Look up one order of an account by its exchange-assigned order id.",
    inputSchema: {
      type: "object",
      properties: {
        account_address: ACCOUNT_ADDRESS,
        oid: { type: "integer", minimum: 0, description: "Order id assigned by the exchange" },
      },
      required: ["account_address", "oid"],
    },
  },
  {
    name: "get_user_order_by_cloid",
    description: "Look up one order of an account by the client order id it was placed with.",
    inputSchema: {
      type: "object",
      properties: {
        account_address: ACCOUNT_ADDRESS,
        cloid: {
          type: "string",
          description: "Client order id: 0x followed by 32 hex digits",
          pattern: "^0x[0-9a-fA-F]{32}$",
        },
      },
      required: ["account_address", "cloid"],
    },
  },
  {
    name: "get_user_sub_accounts",
    description: "List the sub-accounts of an account with their names, addresses and clearinghouse state.",
    inputSchema: accountOnly(),
  },

  // ==================== MARKET DATA ====================
  {
    name: "get_all_mids",
    description: "Retrieve the mid price of every trading pair on the exchange, keyed by coin.",
    inputSchema: { type: "object", properties: {} },
  },
  {
    name: "get_l2_snapshot",
    description: "Fetch the Level 2 order book snapshot of a coin: bid and ask levels with price, size and order count.",
    inputSchema: {
      type: "object",
      properties: { coin_name: COIN_NAME },
      required: ["coin_name"],
    },
  },
  {
    name: "get_candles_snapshot",
    description:
      "Fetch OHLCV candles of a coin between start_time and end_time at the given interval.",
    inputSchema: {
      type: "object",
      properties: {
        coin_name: COIN_NAME,
        interval: {
          type: "string",
          enum: [...CANDLE_INTERVALS],
          description: "Candle interval (e.g. '1m', '1h', '1d')",
        },
        start_time: TIME_VALUE,
        end_time: TIME_VALUE,
      },
      required: ["coin_name", "interval", "start_time", "end_time"],
    },
  },
  {
    name: "get_coin_funding_history",
    description: "Fetch the hourly funding rate and premium history of a coin between start_time and end_time.",
    inputSchema: {
      type: "object",
      properties: {
        coin_name: COIN_NAME,
        start_time: TIME_VALUE,
        end_time: { ...TIME_VALUE, description: `${TIME_VALUE.description}. Defaults to now.` },
      },
      required: ["coin_name", "start_time"],
    },
  },
  {
    name: "get_perp_dexs",
    description:
      "Retrieve the perpetual markets listed on the exchange with contract details (size decimals, max leverage).",
    inputSchema: { type: "object", properties: {} },
  },
  {
    name: "get_perp_metadata",
    description:
      "Fetch perpetual market metadata (universe of coins, size decimals, max leverage), optionally with per-asset contexts.",
    inputSchema: {
      type: "object",
      properties: { include_asset_ctxs: INCLUDE_ASSET_CTXS },
    },
  },
  {
    name: "get_spot_metadata",
    description:
      "Fetch spot market metadata (tokens and trading pairs), optionally with per-asset contexts.",
    inputSchema: {
      type: "object",
      properties: { include_asset_ctxs: INCLUDE_ASSET_CTXS },
    },
  },

  // ==================== SERVER ====================
  {
    name: "health_check",
    description: "Verify the server is running. Makes no exchange request.",
    inputSchema: { type: "object", properties: {} },
    outputSchema: {
      type: "object",
      properties: {
        status: { type: "string" },
        timestamp: { type: "string" },
        server: { type: "string" },
        version: { type: "string" },
      },
      required: ["status", "timestamp", "server"],
    },
  },
];

// ============================================================================
// PROMPTS
// ============================================================================

export const PROMPTS: Prompt[] = [
  {
    name: "analyze_positions",
    description: "Analyze an account's trading positions and recent trading activity.",
    arguments: [
      {
        name: "account_address",
        description: "Hyperliquid account address (e.g. '0xcd5051944f780a621ee62e39e493c489668acf4d')",
        required: true,
      },
    ],
  },
];
