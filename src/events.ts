/**
 * Event log entries emitted by exchanges and registries.
 *
 * `args` keeps the field order consumers index by, e.g.
 * `const [buyer, nativeSold, tokensBought] = log.args`.
 */

import type { Address } from "./types";

interface LogBase {
  /** Emitting contract */
  address: Address;
  blockNumber: bigint;
}

export interface TokenPurchaseLog extends LogBase {
  event: "TokenPurchase";
  args: readonly [buyer: Address, nativeSold: bigint, tokensBought: bigint];
}

export interface EthPurchaseLog extends LogBase {
  event: "EthPurchase";
  args: readonly [buyer: Address, tokensSold: bigint, nativeBought: bigint];
}

export interface AddLiquidityLog extends LogBase {
  event: "AddLiquidity";
  args: readonly [provider: Address, nativeAmount: bigint, tokenAmount: bigint];
}

export interface RemoveLiquidityLog extends LogBase {
  event: "RemoveLiquidity";
  args: readonly [provider: Address, nativeAmount: bigint, tokenAmount: bigint];
}

/** Pool-share movement; mint has `from` = zero address, burn has `to` = zero address */
export interface TransferLog extends LogBase {
  event: "Transfer";
  args: readonly [from: Address, to: Address, value: bigint];
}

export interface ApprovalLog extends LogBase {
  event: "Approval";
  args: readonly [owner: Address, spender: Address, value: bigint];
}

export interface NewExchangeLog extends LogBase {
  event: "NewExchange";
  args: readonly [token: Address, exchange: Address];
}

export type ChainLog =
  | TokenPurchaseLog
  | EthPurchaseLog
  | AddLiquidityLog
  | RemoveLiquidityLog
  | TransferLog
  | ApprovalLog
  | NewExchangeLog;

export type EventName = ChainLog["event"];

type DistributiveOmit<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never;

/** Log without the fields the chain stamps on emission */
export type PendingLog = DistributiveOmit<ChainLog, "blockNumber">;

export function filterLogs<N extends EventName>(
  logs: readonly ChainLog[],
  name: N
): Extract<ChainLog, { event: N }>[] {
  return logs.filter((log): log is Extract<ChainLog, { event: N }> => log.event === name);
}
