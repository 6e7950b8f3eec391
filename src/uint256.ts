/**
 * Checked unsigned 256-bit arithmetic.
 *
 * bigint never wraps, so these helpers enforce the word width explicitly:
 * a result above MAX_UINT256 or below zero is an ArithmeticOverflow.
 */

import { MAX_UINT256 } from "./constants";
import { ExchangeError } from "./errors";

/**
 * Assert that a caller-supplied amount fits an unsigned 256-bit word
 * @throws ExchangeError(InvalidParameters) for negative or oversized values
 */
export function assertUint256(value: bigint, label: string): bigint {
  if (value < 0n || value > MAX_UINT256) {
    throw new ExchangeError(
      "InvalidParameters",
      `exchange:${label} must be an unsigned 256-bit integer (got ${value})`
    );
  }
  return value;
}

function checked(result: bigint, op: string): bigint {
  if (result < 0n || result > MAX_UINT256) {
    throw new ExchangeError("ArithmeticOverflow", `exchange:uint256 ${op} out of range`);
  }
  return result;
}

export function add(a: bigint, b: bigint): bigint {
  return checked(a + b, "add");
}

export function sub(a: bigint, b: bigint): bigint {
  return checked(a - b, "sub");
}

export function mul(a: bigint, b: bigint): bigint {
  return checked(a * b, "mul");
}

/** Floor division; a zero divisor is treated as an arithmetic fault */
export function div(a: bigint, b: bigint): bigint {
  if (b === 0n) {
    throw new ExchangeError("ArithmeticOverflow", "exchange:uint256 division by zero");
  }
  return checked(a / b, "div");
}
