/**
 * Shared constants for the constant-product exchange.
 *
 * Amounts are raw integer units (wei-style); nothing here is decimal-scaled
 * except where a constant says so.
 */

// ============================================
// Arithmetic Bounds
// ============================================

/** Largest value representable in an unsigned 256-bit word */
export const MAX_UINT256 = 2n ** 256n - 1n;

/** Scale for spot/effective prices (1e18) */
export const PRICE_PRECISION = 10n ** 18n;

// ============================================
// Trading Fee
// ============================================

/** Share of the input that reaches the curve (997/1000, i.e. a 0.3% fee) */
export const FEE_MULTIPLIER = 997n;

/** Denominator for FEE_MULTIPLIER */
export const FEE_DENOMINATOR = 1000n;

// ============================================
// Liquidity
// ============================================

/** Default minimum native deposit that may initialize an empty pool (1 gwei) */
export const MIN_INITIAL_LIQUIDITY = 1_000_000_000n;

/** Pool-share token metadata */
export const SHARE_NAME = "Pool Share";
export const SHARE_SYMBOL = "SHARE";
export const SHARE_DECIMALS = 18;

// ============================================
// Basis Points
// ============================================

/** Basis points denominator (10000 = 100%) */
export const BPS_DENOMINATOR = 10000n;

/** Default slippage in basis points (100 = 1%) */
export const DEFAULT_SLIPPAGE_BPS = 100;

/** Minimum allowed slippage in basis points (10 = 0.1%) */
export const MIN_SLIPPAGE_BPS = 10;

/** Maximum allowed slippage in basis points (5000 = 50%) */
export const MAX_SLIPPAGE_BPS = 5000;
