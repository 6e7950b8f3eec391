export * from "./constants";
export { ExchangeError, isExchangeError, type ExchangeErrorKind } from "./errors";
export type { Address, CallContext, ExchangeHandle, RegistryHandle, Reserves, TokenLedger } from "./types";
export { ZERO_ADDRESS, isZeroAddress, sameAddress, tryNormalizeAddress } from "./address";
export { assertUint256 } from "./uint256";
export {
  priceForExactInput,
  priceForExactOutput,
  getInvariant,
  getSpotPrice,
  getEffectivePrice,
  getPriceImpact,
  quoteSwap,
  calculateMinOut,
  parseSlippageBps,
  getAmountOut,
  getAmountIn,
  quoteRoutedInput,
  quoteRoutedOutput,
  type SwapQuote,
} from "./pricing";
export {
  calcLiquidityDeposit,
  calcLiquidityWithdrawal,
  ShareLedger,
  type DepositQuote,
  type WithdrawalQuote,
} from "./liquidity";
export { Chain, type ChainOptions, type NativeReceiver } from "./chain";
export { filterLogs, type ChainLog, type EventName, type PendingLog } from "./events";
export type {
  TokenPurchaseLog,
  EthPurchaseLog,
  AddLiquidityLog,
  RemoveLiquidityLog,
  TransferLog,
  ApprovalLog,
  NewExchangeLog,
} from "./events";
export { InMemoryToken, type TokenMetadata } from "./token";
export { Exchange, type ExchangeOptions } from "./exchange";
export { ExchangeRegistry } from "./registry";
export { loadConfig, getConfig, resetConfig, type AmmConfig, type LogLevel } from "./config";
export { createLogger, type Logger } from "./logger";
