import type { AccountResponse, RequestOptions } from "../types.js";
import type { HyperliquidInfoClient } from "../client.js";

/**
 * Account resource: queries scoped to one account address.
 *
 * Addresses and ids are forwarded as given; callers validate them first.
 */
export class Account {
  constructor(private client: HyperliquidInfoClient) {}

  /**
   * Perpetuals clearinghouse state: positions, margin summary and withdrawable balance
   *
   * @example
   * ```typescript
   * const state = await client.account.userState("0x0000000000000000000000000000000000000001");
   * ```
   */
  async userState(user: string, options?: RequestOptions): Promise<AccountResponse> {
    return this.client.post({ type: "clearinghouseState", user }, options);
  }

  /**
   * Spot clearinghouse state: token balances
   */
  async spotUserState(user: string, options?: RequestOptions): Promise<AccountResponse> {
    return this.client.post({ type: "spotClearinghouseState", user }, options);
  }

  async openOrders(user: string, options?: RequestOptions): Promise<AccountResponse> {
    return this.client.post({ type: "openOrders", user }, options);
  }

  /**
   * Trade fills, most recent first
   */
  async userFills(user: string, options?: RequestOptions): Promise<AccountResponse> {
    return this.client.post({ type: "userFills", user }, options);
  }

  /**
   * Funding payments between `startTime` and `endTime` (epoch ms). The
   * exchange treats a missing `endTime` as now.
   */
  async userFunding(
    user: string,
    startTime: number,
    endTime?: number,
    options?: RequestOptions
  ): Promise<AccountResponse> {
    return this.client.post(
      endTime === undefined
        ? { type: "userFunding", user, startTime }
        : { type: "userFunding", user, startTime, endTime },
      options
    );
  }

  async userFees(user: string, options?: RequestOptions): Promise<AccountResponse> {
    return this.client.post({ type: "userFees", user }, options);
  }

  async stakingSummary(user: string, options?: RequestOptions): Promise<AccountResponse> {
    return this.client.post({ type: "delegatorSummary", user }, options);
  }

  async stakingRewards(user: string, options?: RequestOptions): Promise<AccountResponse> {
    return this.client.post({ type: "delegatorRewards", user }, options);
  }

  /**
   * Order status by exchange-assigned order id
   */
  async orderByOid(user: string, oid: number, options?: RequestOptions): Promise<AccountResponse> {
    return this.client.post({ type: "orderStatus", user, oid }, options);
  }

  /**
   * Order status by client order id. The exchange takes the raw 16-byte hex
   * string in the same `oid` field.
   */
  async orderByCloid(user: string, cloid: string, options?: RequestOptions): Promise<AccountResponse> {
    return this.client.post({ type: "orderStatus", user, oid: cloid }, options);
  }

  async subAccounts(user: string, options?: RequestOptions): Promise<AccountResponse> {
    return this.client.post({ type: "subAccounts", user }, options);
  }
}
