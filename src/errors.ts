/**
 * Failure taxonomy for exchange, registry and environment operations.
 *
 * Every rejected operation throws an ExchangeError; the `kind` is the
 * machine-readable reason and the message reads `exchange:<operation> <reason>`.
 */

export type ExchangeErrorKind =
  | "NotConfigured"
  | "AlreadyConfigured"
  | "InvalidParameters"
  | "Expired"
  | "InvalidReserve"
  | "InsufficientLiquidity"
  | "SlippageExceeded"
  | "InvalidRecipient"
  | "InvalidExchange"
  | "AssetTransferFailed"
  | "ArithmeticOverflow"
  | "ReentrantCall";

export class ExchangeError extends Error {
  readonly kind: ExchangeErrorKind;

  constructor(kind: ExchangeErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ExchangeError";
    this.kind = kind;
  }
}

export function isExchangeError(error: unknown, kind?: ExchangeErrorKind): error is ExchangeError {
  return error instanceof ExchangeError && (kind === undefined || error.kind === kind);
}
