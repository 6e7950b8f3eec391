/**
 * Constant-Product Pricing
 *
 * Pure functions over explicit reserve snapshots for the x*y=k curve with a
 * 0.3% input fee. All arithmetic is checked to 256 bits.
 *
 * Rounding: output amounts round DOWN and required inputs round UP, so the
 * product of reserves never decreases from rounding.
 */

// Re-export constants from shared module for convenience
export {
  FEE_MULTIPLIER,
  FEE_DENOMINATOR,
  PRICE_PRECISION,
  BPS_DENOMINATOR,
  DEFAULT_SLIPPAGE_BPS,
  MIN_SLIPPAGE_BPS,
  MAX_SLIPPAGE_BPS,
} from "./constants";

import {
  BPS_DENOMINATOR,
  DEFAULT_SLIPPAGE_BPS,
  FEE_DENOMINATOR,
  FEE_MULTIPLIER,
  MAX_SLIPPAGE_BPS,
  MIN_SLIPPAGE_BPS,
  PRICE_PRECISION,
} from "./constants";
import { ExchangeError } from "./errors";
import type { Reserves } from "./types";
import { add, assertUint256, div, mul, sub } from "./uint256";

function assertReserves(inputReserve: bigint, outputReserve: bigint, label: string): void {
  if (inputReserve <= 0n || outputReserve <= 0n) {
    throw new ExchangeError(
      "InvalidReserve",
      `exchange:${label} reserves must be positive (input=${inputReserve}, output=${outputReserve})`
    );
  }
}

/**
 * Output received for selling exactly `inputAmount`
 *
 * outputAmount = floor(inputAmount*997*outputReserve / (inputReserve*1000 + inputAmount*997))
 *
 * @throws ExchangeError(InvalidReserve) if either reserve is zero
 */
export function priceForExactInput(
  inputAmount: bigint,
  inputReserve: bigint,
  outputReserve: bigint
): bigint {
  assertUint256(inputAmount, "priceForExactInput inputAmount");
  assertReserves(inputReserve, outputReserve, "priceForExactInput");

  const inputWithFee = mul(inputAmount, FEE_MULTIPLIER);
  const numerator = mul(inputWithFee, outputReserve);
  const denominator = add(mul(inputReserve, FEE_DENOMINATOR), inputWithFee);
  return div(numerator, denominator);
}

/**
 * Input required to receive exactly `outputAmount`
 *
 * inputAmount = floor(inputReserve*outputAmount*1000 / ((outputReserve-outputAmount)*997)) + 1
 *
 * @throws ExchangeError(InvalidReserve) if either reserve is zero
 * @throws ExchangeError(InsufficientLiquidity) if outputAmount >= outputReserve
 */
export function priceForExactOutput(
  outputAmount: bigint,
  inputReserve: bigint,
  outputReserve: bigint
): bigint {
  assertUint256(outputAmount, "priceForExactOutput outputAmount");
  assertReserves(inputReserve, outputReserve, "priceForExactOutput");
  if (outputAmount >= outputReserve) {
    throw new ExchangeError(
      "InsufficientLiquidity",
      `exchange:priceForExactOutput requested ${outputAmount} but reserve holds ${outputReserve}`
    );
  }

  const numerator = mul(mul(inputReserve, outputAmount), FEE_DENOMINATOR);
  const denominator = mul(sub(outputReserve, outputAmount), FEE_MULTIPLIER);
  return add(div(numerator, denominator), 1n);
}

/** Constant product k = native * token */
export function getInvariant(reserves: Reserves): bigint {
  return reserves.native * reserves.token;
}

// ============================================
// Price Analysis
// ============================================

/**
 * Marginal price before any trade: output per unit of input, 1e18 precision.
 * Excludes the fee.
 */
export function getSpotPrice(inputReserve: bigint, outputReserve: bigint): bigint {
  if (inputReserve === 0n) return 0n;
  return (outputReserve * PRICE_PRECISION) / inputReserve;
}

/** Realized price of a trade (amountOut per amountIn, 1e18 precision) */
export function getEffectivePrice(amountIn: bigint, amountOut: bigint): bigint {
  if (amountIn === 0n) return 0n;
  return (amountOut * PRICE_PRECISION) / amountIn;
}

/**
 * Price impact in basis points, fee included
 * @returns 0 when the spot price is undefined
 */
export function getPriceImpact(amountIn: bigint, inputReserve: bigint, outputReserve: bigint): bigint {
  const spotPrice = getSpotPrice(inputReserve, outputReserve);
  if (spotPrice === 0n || amountIn === 0n) return 0n;

  const amountOut = priceForExactInput(amountIn, inputReserve, outputReserve);
  const effectivePrice = getEffectivePrice(amountIn, amountOut);
  const impact = ((spotPrice - effectivePrice) * BPS_DENOMINATOR) / spotPrice;
  return impact > 0n ? impact : 0n;
}

// ============================================
// Quotes
// ============================================

/**
 * Full swap quote with all relevant information
 */
export interface SwapQuote {
  /** Output amount after fees */
  amountOut: bigint;
  /** Output withheld by the fee (fee-free output minus amountOut) */
  fee: bigint;
  /** Price impact in basis points */
  priceImpact: bigint;
  /** Effective price (amountOut/amountIn, 1e18 precision) */
  effectivePrice: bigint;
  /** Spot price before swap */
  spotPrice: bigint;
}

/**
 * Get complete swap quote for an exact-input trade
 */
export function quoteSwap(amountIn: bigint, inputReserve: bigint, outputReserve: bigint): SwapQuote {
  const amountOut = priceForExactInput(amountIn, inputReserve, outputReserve);

  // Same curve with no fee taken
  const noFeeOut = (amountIn * outputReserve) / (inputReserve + amountIn);
  const fee = noFeeOut - amountOut;

  return {
    amountOut,
    fee: fee > 0n ? fee : 0n,
    priceImpact: getPriceImpact(amountIn, inputReserve, outputReserve),
    effectivePrice: getEffectivePrice(amountIn, amountOut),
    spotPrice: getSpotPrice(inputReserve, outputReserve),
  };
}

function assertSlippageBps(slippageBps: number, label: string): bigint {
  if (!Number.isInteger(slippageBps) || slippageBps < 0 || slippageBps > Number(BPS_DENOMINATOR)) {
    throw new ExchangeError(
      "InvalidParameters",
      `exchange:${label} slippageBps must be an integer between 0 and ${BPS_DENOMINATOR} (got ${slippageBps})`
    );
  }
  return BigInt(slippageBps);
}

/**
 * Calculate min output with slippage tolerance
 * @param expectedOutput - Expected output from priceForExactInput
 * @param slippageBps - Slippage in basis points (100 = 1%)
 */
export function calculateMinOut(expectedOutput: bigint, slippageBps: number): bigint {
  const bps = assertSlippageBps(slippageBps, "calculateMinOut");
  return div(mul(expectedOutput, BPS_DENOMINATOR - bps), BPS_DENOMINATOR);
}

/**
 * Parse a user-supplied slippage setting (e.g. a CLI flag or env value)
 * @returns Basis points, DEFAULT_SLIPPAGE_BPS when unset
 * @throws ExchangeError(InvalidParameters) unless a whole number within MIN_SLIPPAGE_BPS..MAX_SLIPPAGE_BPS
 */
export function parseSlippageBps(raw: string | undefined): number {
  if (raw === undefined) return DEFAULT_SLIPPAGE_BPS;
  const bps = /^\d+$/.test(raw.trim()) ? Number(raw.trim()) : NaN;
  if (!(bps >= MIN_SLIPPAGE_BPS && bps <= MAX_SLIPPAGE_BPS)) {
    throw new ExchangeError(
      "InvalidParameters",
      `exchange:parseSlippageBps slippage must be ${MIN_SLIPPAGE_BPS}-${MAX_SLIPPAGE_BPS} bps (got ${raw})`
    );
  }
  return bps;
}

/**
 * Get output amount with slippage applied
 * @returns [amountOut, minAmountOut]
 */
export function getAmountOut(
  amountIn: bigint,
  inputReserve: bigint,
  outputReserve: bigint,
  slippageBps: number
): [bigint, bigint] {
  assertSlippageBps(slippageBps, "getAmountOut");
  const amountOut = priceForExactInput(amountIn, inputReserve, outputReserve);
  return [amountOut, calculateMinOut(amountOut, slippageBps)];
}

/**
 * Get input amount with slippage applied
 * @returns [amountIn, maxAmountIn]
 */
export function getAmountIn(
  amountOut: bigint,
  inputReserve: bigint,
  outputReserve: bigint,
  slippageBps: number
): [bigint, bigint] {
  const bps = assertSlippageBps(slippageBps, "getAmountIn");
  const amountIn = priceForExactOutput(amountOut, inputReserve, outputReserve);
  const maxAmountIn = div(mul(amountIn, add(BPS_DENOMINATOR, bps)), BPS_DENOMINATOR);
  return [amountIn, maxAmountIn];
}

// ============================================
// Two-Pool Routes
// ============================================

/**
 * Token -> native -> token with an exact input.
 * `source` is the pool the input token is sold into, `target` the pool
 * the native currency buys from.
 */
export function quoteRoutedInput(
  tokensSold: bigint,
  source: Reserves,
  target: Reserves
): { nativeBought: bigint; tokensBought: bigint } {
  const nativeBought = priceForExactInput(tokensSold, source.token, source.native);
  const tokensBought = priceForExactInput(nativeBought, target.native, target.token);
  return { nativeBought, tokensBought };
}

/**
 * Token -> native -> token with an exact output, solved back to front.
 */
export function quoteRoutedOutput(
  tokensBought: bigint,
  source: Reserves,
  target: Reserves
): { nativeSold: bigint; tokensSold: bigint } {
  const nativeSold = priceForExactOutput(tokensBought, target.native, target.token);
  const tokensSold = priceForExactOutput(nativeSold, source.token, source.native);
  return { nativeSold, tokensSold };
}
