/**
 * Constant-product exchange between native currency and one token.
 *
 * Each instance owns its reserves and pool-share ledger. Public operations
 * run inside a Chain transaction behind a per-instance guard: they either
 * settle completely (reserves, transfers, shares and logs) or throw an
 * ExchangeError and leave no trace. Token-to-token routes call into a
 * second exchange synchronously; a failure there unwinds both legs.
 *
 * Deadlines: swaps accept `deadline >= blockNumber`; liquidity operations
 * require `deadline > blockNumber`.
 */

import { ZERO_ADDRESS, isZeroAddress, sameAddress, tryNormalizeAddress } from "./address";
import type { Chain } from "./chain";
import { getConfig } from "./config";
import { SHARE_DECIMALS, SHARE_NAME, SHARE_SYMBOL } from "./constants";
import { ExchangeError, isExchangeError } from "./errors";
import { calcLiquidityDeposit, calcLiquidityWithdrawal, ShareLedger } from "./liquidity";
import { createLogger, type Logger } from "./logger";
import { priceForExactInput, priceForExactOutput } from "./pricing";
import type {
  Address,
  CallContext,
  ExchangeHandle,
  RegistryHandle,
  Reserves,
  TokenLedger,
} from "./types";
import { add, assertUint256, sub } from "./uint256";

export interface ExchangeOptions {
  /** Minimum native deposit that may initialize an empty pool */
  minInitialLiquidity?: bigint;
  logger?: Logger;
}

interface Configured {
  token: TokenLedger;
  registry: RegistryHandle;
}

const reported = new WeakSet<ExchangeError>();

export class Exchange implements ExchangeHandle {
  readonly address: Address;
  readonly name = SHARE_NAME;
  readonly symbol = SHARE_SYMBOL;
  readonly decimals = SHARE_DECIMALS;

  private token: TokenLedger | undefined;
  private registry: RegistryHandle | undefined;
  private reserves: Reserves = { native: 0n, token: 0n };
  private readonly shares: ShareLedger;
  private readonly minInitialLiquidity: bigint;
  private readonly log: Logger;
  private locked = false;

  constructor(
    private readonly chain: Chain,
    address: Address,
    options: ExchangeOptions = {}
  ) {
    const normalized = tryNormalizeAddress(address);
    if (!normalized || isZeroAddress(normalized)) {
      throw new ExchangeError("InvalidParameters", `exchange: invalid instance address ${address}`);
    }
    this.address = normalized;
    this.shares = new ShareLedger(chain);
    const minInitialLiquidity = options.minInitialLiquidity ?? getConfig().minInitialLiquidity;
    if (minInitialLiquidity <= 0n) {
      throw new ExchangeError(
        "InvalidParameters",
        `exchange: minInitialLiquidity must be greater than 0 (got ${minInitialLiquidity})`
      );
    }
    this.minInitialLiquidity = minInitialLiquidity;
    this.log = (options.logger ?? createLogger("exchange")).child({ exchange: normalized });
  }

  // ============================================
  // Setup & Views
  // ============================================

  /**
   * Bind the paired token and the owning registry. Callable once.
   * @throws ExchangeError(AlreadyConfigured) on a second call
   */
  setup(registry: RegistryHandle, token: TokenLedger): void {
    if (this.token || this.registry) {
      throw new ExchangeError("AlreadyConfigured", "exchange:setup already configured");
    }
    const tokenAddress = tryNormalizeAddress(token.address);
    if (!tokenAddress || isZeroAddress(tokenAddress)) {
      throw new ExchangeError("InvalidParameters", `exchange:setup invalid token address ${token.address}`);
    }

    this.chain.atomic(() => {
      this.token = token;
      this.registry = registry;
      this.chain.record(() => {
        this.token = undefined;
        this.registry = undefined;
      });
    });
    this.log.info({ token: tokenAddress, registry: registry.address }, "exchange configured");
  }

  get isConfigured(): boolean {
    return this.token !== undefined && this.registry !== undefined;
  }

  tokenAddress(): Address | undefined {
    return this.token?.address;
  }

  registryAddress(): Address | undefined {
    return this.registry?.address;
  }

  getReserves(): Reserves {
    return { ...this.reserves };
  }

  /** Native currency received for selling exactly `tokensSold` */
  getTokenToNativeInputPrice(tokensSold: bigint): bigint {
    this.configured("getTokenToNativeInputPrice");
    requirePositive(tokensSold, "getTokenToNativeInputPrice", "tokensSold");
    return priceForExactInput(tokensSold, this.reserves.token, this.reserves.native);
  }

  /** Tokens required to receive exactly `nativeBought` */
  getTokenToNativeOutputPrice(nativeBought: bigint): bigint {
    this.configured("getTokenToNativeOutputPrice");
    requirePositive(nativeBought, "getTokenToNativeOutputPrice", "nativeBought");
    return priceForExactOutput(nativeBought, this.reserves.token, this.reserves.native);
  }

  /** Tokens received for selling exactly `nativeSold` */
  getNativeToTokenInputPrice(nativeSold: bigint): bigint {
    this.configured("getNativeToTokenInputPrice");
    requirePositive(nativeSold, "getNativeToTokenInputPrice", "nativeSold");
    return priceForExactInput(nativeSold, this.reserves.native, this.reserves.token);
  }

  /** Native currency required to receive exactly `tokensBought` */
  getNativeToTokenOutputPrice(tokensBought: bigint): bigint {
    this.configured("getNativeToTokenOutputPrice");
    requirePositive(tokensBought, "getNativeToTokenOutputPrice", "tokensBought");
    return priceForExactOutput(tokensBought, this.reserves.native, this.reserves.token);
  }

  // ============================================
  // Liquidity
  // ============================================

  /**
   * Deposit the attached native currency plus a matching token amount.
   * The first deposit sets the price: exactly `maxTokens` are pulled and
   * shares are minted 1:1 with the native amount.
   *
   * @returns Shares minted
   */
  addLiquidity(ctx: CallContext, minShares: bigint, maxTokens: bigint, deadline: bigint): bigint {
    const op = "addLiquidity";
    const { token } = this.configured(op);
    const value = ctx.value ?? 0n;
    this.requireLiquidityDeadline(op, deadline);
    assertUint256(minShares, `${op} minShares`);
    if (maxTokens <= 0n || value <= 0n) {
      throw new ExchangeError("InvalidParameters", `exchange:${op} invalid parameters`);
    }

    return this.guarded(op, () => {
      const provider = this.callerOf(ctx);
      this.chain.sendNative(provider, this.address, value);
      const totalShares = this.shares.totalSupply;

      if (totalShares > 0n) {
        if (minShares === 0n) {
          throw new ExchangeError("InvalidParameters", `exchange:${op} minShares must be greater than 0`);
        }
        const { tokenAmount, sharesMinted } = calcLiquidityDeposit(value, this.reserves, totalShares);
        if (tokenAmount > maxTokens || sharesMinted < minShares) {
          throw new ExchangeError(
            "SlippageExceeded",
            `exchange:${op} maxTokens or minShares exceeded (tokens ${tokenAmount} > ${maxTokens} or shares ${sharesMinted} < ${minShares})`
          );
        }
        this.pullTokens(token, op, provider, tokenAmount);
        this.mintShares(provider, sharesMinted);
        this.setReserves({
          native: add(this.reserves.native, value),
          token: add(this.reserves.token, tokenAmount),
        });
        this.chain.emit({ address: this.address, event: "AddLiquidity", args: [provider, value, tokenAmount] });
        this.log.debug({ provider, native: value, tokens: tokenAmount, shares: sharesMinted }, "liquidity added");
        return sharesMinted;
      }

      if (value < this.minInitialLiquidity) {
        throw new ExchangeError(
          "InvalidParameters",
          `exchange:${op} initial deposit below minimum (${value} < ${this.minInitialLiquidity})`
        );
      }
      this.pullTokens(token, op, provider, maxTokens);
      this.mintShares(provider, value);
      this.setReserves({ native: value, token: maxTokens });
      this.chain.emit({ address: this.address, event: "AddLiquidity", args: [provider, value, maxTokens] });
      this.log.debug({ provider, native: value, tokens: maxTokens, shares: value }, "pool initialized");
      return value;
    });
  }

  /**
   * Burn `shares` for a pro-rata slice of both reserves
   * @returns [nativeAmount, tokenAmount] paid out
   */
  removeLiquidity(
    ctx: CallContext,
    shares: bigint,
    minNative: bigint,
    minTokens: bigint,
    deadline: bigint
  ): [bigint, bigint] {
    const op = "removeLiquidity";
    const { token } = this.configured(op);
    this.requireNoValue(ctx, op);
    this.requireLiquidityDeadline(op, deadline);
    if (shares <= 0n || minNative <= 0n || minTokens <= 0n) {
      throw new ExchangeError("InvalidParameters", `exchange:${op} invalid parameters`);
    }

    return this.guarded(op, () => {
      const provider = this.callerOf(ctx);
      const totalShares = this.shares.totalSupply;
      if (totalShares === 0n) {
        throw new ExchangeError("InsufficientLiquidity", `exchange:${op} total shares must be greater than 0`);
      }

      const { nativeAmount, tokenAmount } = calcLiquidityWithdrawal(shares, this.reserves, totalShares);
      if (nativeAmount < minNative || tokenAmount < minTokens) {
        throw new ExchangeError(
          "SlippageExceeded",
          `exchange:${op} minNative or minTokens not met (native ${nativeAmount} < ${minNative} or tokens ${tokenAmount} < ${minTokens})`
        );
      }

      this.burnShares(provider, shares);
      this.setReserves({
        native: sub(this.reserves.native, nativeAmount),
        token: sub(this.reserves.token, tokenAmount),
      });
      this.payNative(op, provider, nativeAmount);
      this.pushTokens(token, op, provider, tokenAmount);
      this.chain.emit({
        address: this.address,
        event: "RemoveLiquidity",
        args: [provider, nativeAmount, tokenAmount],
      });
      this.log.debug({ provider, native: nativeAmount, tokens: tokenAmount, shares }, "liquidity removed");
      return [nativeAmount, tokenAmount];
    });
  }

  // ============================================
  // Native -> Token
  // ============================================

  /** Fallback: sell all attached native currency, any nonzero output, due this block */
  receive(ctx: CallContext): bigint {
    const op = "receive";
    this.configured(op);
    const value = ctx.value ?? 0n;
    return this.guarded(op, () => {
      const buyer = this.callerOf(ctx);
      this.collectNative(buyer, value);
      return this.nativeToTokenInput(op, value, 1n, this.chain.blockNumber, buyer, buyer);
    });
  }

  /** Sell the attached native currency; tokens go to the caller */
  nativeToTokenSwapInput(ctx: CallContext, minTokens: bigint, deadline: bigint): bigint {
    const op = "nativeToTokenSwapInput";
    this.configured(op);
    const value = ctx.value ?? 0n;
    return this.guarded(op, () => {
      const buyer = this.callerOf(ctx);
      this.collectNative(buyer, value);
      return this.nativeToTokenInput(op, value, minTokens, deadline, buyer, buyer);
    });
  }

  /** Sell the attached native currency; tokens go to `recipient` */
  nativeToTokenTransferInput(ctx: CallContext, minTokens: bigint, deadline: bigint, recipient: Address): bigint {
    const op = "nativeToTokenTransferInput";
    this.configured(op);
    const to = this.recipientOf(op, recipient);
    const value = ctx.value ?? 0n;
    return this.guarded(op, () => {
      const buyer = this.callerOf(ctx);
      this.collectNative(buyer, value);
      return this.nativeToTokenInput(op, value, minTokens, deadline, buyer, to);
    });
  }

  /**
   * Buy exactly `tokensBought`, spending at most the attached native currency;
   * the unspent remainder is refunded to the caller.
   * @returns Native currency spent
   */
  nativeToTokenSwapOutput(ctx: CallContext, tokensBought: bigint, deadline: bigint): bigint {
    const op = "nativeToTokenSwapOutput";
    this.configured(op);
    const value = ctx.value ?? 0n;
    return this.guarded(op, () => {
      const buyer = this.callerOf(ctx);
      this.collectNative(buyer, value);
      return this.nativeToTokenOutput(op, tokensBought, value, deadline, buyer, buyer);
    });
  }

  nativeToTokenTransferOutput(ctx: CallContext, tokensBought: bigint, deadline: bigint, recipient: Address): bigint {
    const op = "nativeToTokenTransferOutput";
    this.configured(op);
    const to = this.recipientOf(op, recipient);
    const value = ctx.value ?? 0n;
    return this.guarded(op, () => {
      const buyer = this.callerOf(ctx);
      this.collectNative(buyer, value);
      return this.nativeToTokenOutput(op, tokensBought, value, deadline, buyer, to);
    });
  }

  // ============================================
  // Token -> Native
  // ============================================

  /** Sell exactly `tokensSold`; native currency goes to the caller */
  tokenToNativeSwapInput(ctx: CallContext, tokensSold: bigint, minNative: bigint, deadline: bigint): bigint {
    const op = "tokenToNativeSwapInput";
    this.configured(op);
    this.requireNoValue(ctx, op);
    return this.guarded(op, () => {
      const buyer = this.callerOf(ctx);
      return this.tokenToNativeInput(op, tokensSold, minNative, deadline, buyer, buyer);
    });
  }

  tokenToNativeTransferInput(
    ctx: CallContext,
    tokensSold: bigint,
    minNative: bigint,
    deadline: bigint,
    recipient: Address
  ): bigint {
    const op = "tokenToNativeTransferInput";
    this.configured(op);
    this.requireNoValue(ctx, op);
    const to = this.recipientOf(op, recipient);
    return this.guarded(op, () => {
      const buyer = this.callerOf(ctx);
      return this.tokenToNativeInput(op, tokensSold, minNative, deadline, buyer, to);
    });
  }

  /**
   * Buy exactly `nativeBought`, selling at most `maxTokens`
   * @returns Tokens sold
   */
  tokenToNativeSwapOutput(ctx: CallContext, nativeBought: bigint, maxTokens: bigint, deadline: bigint): bigint {
    const op = "tokenToNativeSwapOutput";
    this.configured(op);
    this.requireNoValue(ctx, op);
    return this.guarded(op, () => {
      const buyer = this.callerOf(ctx);
      return this.tokenToNativeOutput(op, nativeBought, maxTokens, deadline, buyer, buyer);
    });
  }

  tokenToNativeTransferOutput(
    ctx: CallContext,
    nativeBought: bigint,
    maxTokens: bigint,
    deadline: bigint,
    recipient: Address
  ): bigint {
    const op = "tokenToNativeTransferOutput";
    this.configured(op);
    this.requireNoValue(ctx, op);
    const to = this.recipientOf(op, recipient);
    return this.guarded(op, () => {
      const buyer = this.callerOf(ctx);
      return this.tokenToNativeOutput(op, nativeBought, maxTokens, deadline, buyer, to);
    });
  }

  // ============================================
  // Token -> Token (registry lookup)
  // ============================================

  /**
   * Sell exactly `tokensSold` of this exchange's token for the token at
   * `tokenAddress`, routed through native currency.
   * @returns Output tokens bought
   */
  tokenToTokenSwapInput(
    ctx: CallContext,
    tokensSold: bigint,
    minTokensBought: bigint,
    minNativeBought: bigint,
    deadline: bigint,
    tokenAddress: Address
  ): bigint {
    const op = "tokenToTokenSwapInput";
    const { registry } = this.configured(op);
    this.requireNoValue(ctx, op);
    return this.guarded(op, () => {
      const buyer = this.callerOf(ctx);
      const target = this.lookupExchange(op, registry, tokenAddress);
      return this.tokenToTokenInput(op, tokensSold, minTokensBought, minNativeBought, deadline, buyer, buyer, target);
    });
  }

  tokenToTokenTransferInput(
    ctx: CallContext,
    tokensSold: bigint,
    minTokensBought: bigint,
    minNativeBought: bigint,
    deadline: bigint,
    recipient: Address,
    tokenAddress: Address
  ): bigint {
    const op = "tokenToTokenTransferInput";
    const { registry } = this.configured(op);
    this.requireNoValue(ctx, op);
    const to = this.recipientOf(op, recipient);
    return this.guarded(op, () => {
      const buyer = this.callerOf(ctx);
      const target = this.lookupExchange(op, registry, tokenAddress);
      return this.tokenToTokenInput(op, tokensSold, minTokensBought, minNativeBought, deadline, buyer, to, target);
    });
  }

  /**
   * Buy exactly `tokensBought` of the token at `tokenAddress`
   * @returns Input tokens sold
   */
  tokenToTokenSwapOutput(
    ctx: CallContext,
    tokensBought: bigint,
    maxTokensSold: bigint,
    maxNativeSold: bigint,
    deadline: bigint,
    tokenAddress: Address
  ): bigint {
    const op = "tokenToTokenSwapOutput";
    const { registry } = this.configured(op);
    this.requireNoValue(ctx, op);
    return this.guarded(op, () => {
      const buyer = this.callerOf(ctx);
      const target = this.lookupExchange(op, registry, tokenAddress);
      return this.tokenToTokenOutput(op, tokensBought, maxTokensSold, maxNativeSold, deadline, buyer, buyer, target);
    });
  }

  tokenToTokenTransferOutput(
    ctx: CallContext,
    tokensBought: bigint,
    maxTokensSold: bigint,
    maxNativeSold: bigint,
    deadline: bigint,
    recipient: Address,
    tokenAddress: Address
  ): bigint {
    const op = "tokenToTokenTransferOutput";
    const { registry } = this.configured(op);
    this.requireNoValue(ctx, op);
    const to = this.recipientOf(op, recipient);
    return this.guarded(op, () => {
      const buyer = this.callerOf(ctx);
      const target = this.lookupExchange(op, registry, tokenAddress);
      return this.tokenToTokenOutput(op, tokensBought, maxTokensSold, maxNativeSold, deadline, buyer, to, target);
    });
  }

  // ============================================
  // Token -> Exchange (explicit destination)
  // ============================================

  tokenToExchangeSwapInput(
    ctx: CallContext,
    tokensSold: bigint,
    minTokensBought: bigint,
    minNativeBought: bigint,
    deadline: bigint,
    exchange: ExchangeHandle
  ): bigint {
    const op = "tokenToExchangeSwapInput";
    this.configured(op);
    this.requireNoValue(ctx, op);
    return this.guarded(op, () => {
      const buyer = this.callerOf(ctx);
      return this.tokenToTokenInput(op, tokensSold, minTokensBought, minNativeBought, deadline, buyer, buyer, exchange);
    });
  }

  tokenToExchangeTransferInput(
    ctx: CallContext,
    tokensSold: bigint,
    minTokensBought: bigint,
    minNativeBought: bigint,
    deadline: bigint,
    recipient: Address,
    exchange: ExchangeHandle
  ): bigint {
    const op = "tokenToExchangeTransferInput";
    this.configured(op);
    this.requireNoValue(ctx, op);
    const to = this.recipientOf(op, recipient);
    return this.guarded(op, () => {
      const buyer = this.callerOf(ctx);
      return this.tokenToTokenInput(op, tokensSold, minTokensBought, minNativeBought, deadline, buyer, to, exchange);
    });
  }

  tokenToExchangeSwapOutput(
    ctx: CallContext,
    tokensBought: bigint,
    maxTokensSold: bigint,
    maxNativeSold: bigint,
    deadline: bigint,
    exchange: ExchangeHandle
  ): bigint {
    const op = "tokenToExchangeSwapOutput";
    this.configured(op);
    this.requireNoValue(ctx, op);
    return this.guarded(op, () => {
      const buyer = this.callerOf(ctx);
      return this.tokenToTokenOutput(op, tokensBought, maxTokensSold, maxNativeSold, deadline, buyer, buyer, exchange);
    });
  }

  tokenToExchangeTransferOutput(
    ctx: CallContext,
    tokensBought: bigint,
    maxTokensSold: bigint,
    maxNativeSold: bigint,
    deadline: bigint,
    recipient: Address,
    exchange: ExchangeHandle
  ): bigint {
    const op = "tokenToExchangeTransferOutput";
    this.configured(op);
    this.requireNoValue(ctx, op);
    const to = this.recipientOf(op, recipient);
    return this.guarded(op, () => {
      const buyer = this.callerOf(ctx);
      return this.tokenToTokenOutput(op, tokensBought, maxTokensSold, maxNativeSold, deadline, buyer, to, exchange);
    });
  }

  // ============================================
  // Pool-Share Token
  // ============================================

  totalSupply(): bigint {
    return this.shares.totalSupply;
  }

  balanceOf(owner: Address): bigint {
    const key = tryNormalizeAddress(owner);
    return key ? this.shares.balanceOf(key) : 0n;
  }

  allowance(owner: Address, spender: Address): bigint {
    const a = tryNormalizeAddress(owner);
    const b = tryNormalizeAddress(spender);
    return a && b ? this.shares.allowance(a, b) : 0n;
  }

  transfer(ctx: CallContext, to: Address, value: bigint): boolean {
    const op = "transfer";
    this.requireNoValue(ctx, op);
    assertUint256(value, `${op} value`);
    return this.guarded(op, () => {
      const from = this.callerOf(ctx);
      const target = this.addressOf(op, to);
      this.shares.transfer(from, target, value);
      this.chain.emit({ address: this.address, event: "Transfer", args: [from, target, value] });
      return true;
    });
  }

  transferFrom(ctx: CallContext, from: Address, to: Address, value: bigint): boolean {
    const op = "transferFrom";
    this.requireNoValue(ctx, op);
    assertUint256(value, `${op} value`);
    return this.guarded(op, () => {
      const spender = this.callerOf(ctx);
      const owner = this.addressOf(op, from);
      const target = this.addressOf(op, to);
      this.shares.spendAllowance(owner, spender, value);
      this.shares.transfer(owner, target, value);
      this.chain.emit({ address: this.address, event: "Transfer", args: [owner, target, value] });
      return true;
    });
  }

  approve(ctx: CallContext, spender: Address, value: bigint): boolean {
    const op = "approve";
    this.requireNoValue(ctx, op);
    assertUint256(value, `${op} value`);
    return this.guarded(op, () => {
      const owner = this.callerOf(ctx);
      const target = this.addressOf(op, spender);
      this.shares.approve(owner, target, value);
      this.chain.emit({ address: this.address, event: "Approval", args: [owner, target, value] });
      return true;
    });
  }

  // ============================================
  // Settlement
  // ============================================

  /** Native currency already collected from `buyer` is the exact input */
  private nativeToTokenInput(
    op: string,
    nativeSold: bigint,
    minTokens: bigint,
    deadline: bigint,
    buyer: Address,
    recipient: Address
  ): bigint {
    const { token } = this.configured(op);
    this.requireSwapDeadline(op, deadline);
    if (nativeSold <= 0n || minTokens <= 0n) {
      throw new ExchangeError("InvalidParameters", `exchange:${op} invalid parameters`);
    }

    const tokensBought = priceForExactInput(nativeSold, this.reserves.native, this.reserves.token);
    if (tokensBought < minTokens) {
      throw new ExchangeError(
        "SlippageExceeded",
        `exchange:${op} tokens bought below minimum (${tokensBought} < ${minTokens})`
      );
    }

    this.setReserves({
      native: add(this.reserves.native, nativeSold),
      token: sub(this.reserves.token, tokensBought),
    });
    this.pushTokens(token, op, recipient, tokensBought);
    this.chain.emit({ address: this.address, event: "TokenPurchase", args: [buyer, nativeSold, tokensBought] });
    this.log.debug({ op, buyer, recipient, nativeSold, tokensBought }, "token purchase");
    return tokensBought;
  }

  /** Native currency already collected from `buyer` is the maximum input */
  private nativeToTokenOutput(
    op: string,
    tokensBought: bigint,
    maxNative: bigint,
    deadline: bigint,
    buyer: Address,
    recipient: Address
  ): bigint {
    const { token } = this.configured(op);
    this.requireSwapDeadline(op, deadline);
    if (tokensBought <= 0n || maxNative <= 0n) {
      throw new ExchangeError("InvalidParameters", `exchange:${op} invalid parameters`);
    }

    const nativeSold = priceForExactOutput(tokensBought, this.reserves.native, this.reserves.token);
    if (nativeSold > maxNative) {
      throw new ExchangeError(
        "SlippageExceeded",
        `exchange:${op} native required above maximum (${nativeSold} > ${maxNative})`
      );
    }

    this.setReserves({
      native: add(this.reserves.native, nativeSold),
      token: sub(this.reserves.token, tokensBought),
    });
    const refund = maxNative - nativeSold;
    if (refund > 0n) {
      this.payNative(op, buyer, refund);
    }
    this.pushTokens(token, op, recipient, tokensBought);
    this.chain.emit({ address: this.address, event: "TokenPurchase", args: [buyer, nativeSold, tokensBought] });
    this.log.debug({ op, buyer, recipient, nativeSold, tokensBought, refund }, "token purchase");
    return nativeSold;
  }

  private tokenToNativeInput(
    op: string,
    tokensSold: bigint,
    minNative: bigint,
    deadline: bigint,
    buyer: Address,
    recipient: Address
  ): bigint {
    const { token } = this.configured(op);
    this.requireSwapDeadline(op, deadline);
    if (tokensSold <= 0n || minNative <= 0n) {
      throw new ExchangeError("InvalidParameters", `exchange:${op} invalid parameters`);
    }

    const nativeBought = priceForExactInput(tokensSold, this.reserves.token, this.reserves.native);
    if (nativeBought < minNative) {
      throw new ExchangeError(
        "SlippageExceeded",
        `exchange:${op} native bought below minimum (${nativeBought} < ${minNative})`
      );
    }

    this.setReserves({
      native: sub(this.reserves.native, nativeBought),
      token: add(this.reserves.token, tokensSold),
    });
    this.payNative(op, recipient, nativeBought);
    this.pullTokens(token, op, buyer, tokensSold);
    this.chain.emit({ address: this.address, event: "EthPurchase", args: [buyer, tokensSold, nativeBought] });
    this.log.debug({ op, buyer, recipient, tokensSold, nativeBought }, "native purchase");
    return nativeBought;
  }

  private tokenToNativeOutput(
    op: string,
    nativeBought: bigint,
    maxTokens: bigint,
    deadline: bigint,
    buyer: Address,
    recipient: Address
  ): bigint {
    const { token } = this.configured(op);
    this.requireSwapDeadline(op, deadline);
    if (nativeBought <= 0n) {
      throw new ExchangeError("InvalidParameters", `exchange:${op} invalid parameters`);
    }
    assertUint256(maxTokens, `${op} maxTokens`);

    const tokensSold = priceForExactOutput(nativeBought, this.reserves.token, this.reserves.native);
    if (tokensSold > maxTokens) {
      throw new ExchangeError(
        "SlippageExceeded",
        `exchange:${op} tokens required above maximum (${tokensSold} > ${maxTokens})`
      );
    }

    this.setReserves({
      native: sub(this.reserves.native, nativeBought),
      token: add(this.reserves.token, tokensSold),
    });
    this.payNative(op, recipient, nativeBought);
    this.pullTokens(token, op, buyer, tokensSold);
    this.chain.emit({ address: this.address, event: "EthPurchase", args: [buyer, tokensSold, nativeBought] });
    this.log.debug({ op, buyer, recipient, tokensSold, nativeBought }, "native purchase");
    return tokensSold;
  }

  /**
   * Leg 1 sells tokens here for native currency; leg 2 spends it on the
   * destination exchange, which delivers straight to `recipient`.
   */
  private tokenToTokenInput(
    op: string,
    tokensSold: bigint,
    minTokensBought: bigint,
    minNativeBought: bigint,
    deadline: bigint,
    buyer: Address,
    recipient: Address,
    target: ExchangeHandle
  ): bigint {
    const { token } = this.configured(op);
    this.requireSwapDeadline(op, deadline);
    if (tokensSold <= 0n || minTokensBought <= 0n || minNativeBought <= 0n) {
      throw new ExchangeError("InvalidParameters", `exchange:${op} invalid parameters`);
    }
    this.requireRoutable(op, target);

    const nativeBought = priceForExactInput(tokensSold, this.reserves.token, this.reserves.native);
    if (nativeBought < minNativeBought) {
      throw new ExchangeError(
        "SlippageExceeded",
        `exchange:${op} intermediate native below minimum (${nativeBought} < ${minNativeBought})`
      );
    }

    this.setReserves({
      native: sub(this.reserves.native, nativeBought),
      token: add(this.reserves.token, tokensSold),
    });
    this.pullTokens(token, op, buyer, tokensSold);
    const [tokensBought, nativeSpent] = this.measureNativeOutflow(() =>
      target.nativeToTokenTransferInput({ sender: this.address, value: nativeBought }, minTokensBought, deadline, recipient)
    );
    if (nativeSpent !== nativeBought) {
      throw new ExchangeError(
        "AssetTransferFailed",
        `exchange:${op} destination collected ${nativeSpent} native, expected ${nativeBought}`
      );
    }
    this.chain.emit({ address: this.address, event: "EthPurchase", args: [buyer, tokensSold, nativeBought] });
    this.log.debug({ op, buyer, recipient, target: target.address, tokensSold, nativeBought, tokensBought }, "routed swap");
    return tokensBought;
  }

  /**
   * Exact-output route: the destination's quote fixes the native amount,
   * which in turn fixes the tokens sold here.
   */
  private tokenToTokenOutput(
    op: string,
    tokensBought: bigint,
    maxTokensSold: bigint,
    maxNativeSold: bigint,
    deadline: bigint,
    buyer: Address,
    recipient: Address,
    target: ExchangeHandle
  ): bigint {
    const { token } = this.configured(op);
    this.requireSwapDeadline(op, deadline);
    if (tokensBought <= 0n || maxNativeSold <= 0n) {
      throw new ExchangeError("InvalidParameters", `exchange:${op} invalid parameters`);
    }
    assertUint256(maxTokensSold, `${op} maxTokensSold`);
    this.requireRoutable(op, target);

    const nativeBought = target.getNativeToTokenOutputPrice(tokensBought);
    const tokensSold = priceForExactOutput(nativeBought, this.reserves.token, this.reserves.native);
    if (tokensSold > maxTokensSold || nativeBought > maxNativeSold) {
      throw new ExchangeError(
        "SlippageExceeded",
        `exchange:${op} maxTokensSold or maxNativeSold exceeded (tokens ${tokensSold} > ${maxTokensSold} or native ${nativeBought} > ${maxNativeSold})`
      );
    }

    this.setReserves({
      native: sub(this.reserves.native, nativeBought),
      token: add(this.reserves.token, tokensSold),
    });
    this.pullTokens(token, op, buyer, tokensSold);
    // Debit what actually left this exchange
    const [, nativeSpent] = this.measureNativeOutflow(() =>
      target.nativeToTokenTransferOutput({ sender: this.address, value: nativeBought }, tokensBought, deadline, recipient)
    );
    if (nativeSpent > nativeBought) {
      throw new ExchangeError(
        "AssetTransferFailed",
        `exchange:${op} destination collected ${nativeSpent} native, quoted ${nativeBought}`
      );
    }
    if (nativeSpent < nativeBought) {
      this.setReserves({ ...this.reserves, native: add(this.reserves.native, nativeBought - nativeSpent) });
    }
    this.chain.emit({ address: this.address, event: "EthPurchase", args: [buyer, tokensSold, nativeBought] });
    this.log.debug({ op, buyer, recipient, target: target.address, tokensSold, nativeBought, tokensBought }, "routed swap");
    return tokensSold;
  }

  // ============================================
  // Internals
  // ============================================

  /**
   * Exclusive, all-or-nothing execution of one public operation.
   * Re-entering this instance while it is busy is rejected.
   */
  private guarded<T>(op: string, fn: () => T): T {
    if (this.locked) {
      throw new ExchangeError("ReentrantCall", `exchange:${op} re-entered while another operation is running`);
    }
    this.locked = true;
    try {
      return this.chain.atomic(fn);
    } catch (error) {
      if (
        (isExchangeError(error, "SlippageExceeded") || isExchangeError(error, "AssetTransferFailed")) &&
        !reported.has(error)
      ) {
        // Logged once, by the exchange where the failure started
        reported.add(error);
        this.log.warn({ op, kind: error.kind }, error.message);
      }
      throw error;
    } finally {
      this.locked = false;
    }
  }

  /** Run `call` and report how much native currency left this exchange during it */
  private measureNativeOutflow<T>(call: () => T): [T, bigint] {
    const before = this.chain.nativeBalanceOf(this.address);
    const result = call();
    return [result, before - this.chain.nativeBalanceOf(this.address)];
  }

  private configured(op: string): Configured {
    if (!this.token || !this.registry) {
      throw new ExchangeError("NotConfigured", `exchange:${op} exchange is not configured`);
    }
    return { token: this.token, registry: this.registry };
  }

  private setReserves(next: Reserves): void {
    const previous = this.reserves;
    this.reserves = next;
    this.chain.record(() => {
      this.reserves = previous;
    });
  }

  private mintShares(to: Address, amount: bigint): void {
    this.shares.mint(to, amount);
    this.chain.emit({ address: this.address, event: "Transfer", args: [ZERO_ADDRESS, to, amount] });
  }

  private burnShares(from: Address, amount: bigint): void {
    this.shares.burn(from, amount);
    this.chain.emit({ address: this.address, event: "Transfer", args: [from, ZERO_ADDRESS, amount] });
  }

  private collectNative(from: Address, amount: bigint): void {
    if (amount > 0n) {
      this.chain.sendNative(from, this.address, amount);
    }
  }

  private payNative(op: string, to: Address, amount: bigint): void {
    try {
      this.chain.sendNative(this.address, to, amount);
    } catch (error) {
      if (isExchangeError(error) && error.kind !== "ReentrantCall") {
        throw new ExchangeError("AssetTransferFailed", `exchange:${op} native payout failed: ${error.message}`, {
          cause: error,
        });
      }
      throw error;
    }
  }

  private pullTokens(token: TokenLedger, op: string, from: Address, amount: bigint): void {
    this.callToken(op, "transferFrom", () => token.transferFrom(this.address, from, this.address, amount));
  }

  private pushTokens(token: TokenLedger, op: string, to: Address, amount: bigint): void {
    this.callToken(op, "transfer", () => token.transfer(this.address, to, amount));
  }

  private callToken(op: string, method: string, call: () => boolean): void {
    let ok: boolean;
    try {
      ok = call();
    } catch (error) {
      if (isExchangeError(error, "ReentrantCall")) throw error;
      throw new ExchangeError("AssetTransferFailed", `exchange:${op} token ${method} threw`, { cause: error });
    }
    if (!ok) {
      throw new ExchangeError("AssetTransferFailed", `exchange:${op} token ${method} returned false`);
    }
  }

  private requireSwapDeadline(op: string, deadline: bigint): void {
    if (deadline < this.chain.blockNumber) {
      throw new ExchangeError("Expired", `exchange:${op} deadline ${deadline} has passed (block ${this.chain.blockNumber})`);
    }
  }

  private requireLiquidityDeadline(op: string, deadline: bigint): void {
    if (deadline <= this.chain.blockNumber) {
      throw new ExchangeError("Expired", `exchange:${op} deadline ${deadline} has passed (block ${this.chain.blockNumber})`);
    }
  }

  private requireNoValue(ctx: CallContext, op: string): void {
    if ((ctx.value ?? 0n) !== 0n) {
      throw new ExchangeError("InvalidParameters", `exchange:${op} does not accept native currency`);
    }
  }

  private callerOf(ctx: CallContext): Address {
    const sender = tryNormalizeAddress(ctx.sender);
    if (!sender) {
      throw new ExchangeError("InvalidParameters", `exchange: malformed sender ${ctx.sender}`);
    }
    if (sameAddress(sender, this.address)) {
      throw new ExchangeError("InvalidParameters", "exchange: an exchange cannot call itself");
    }
    return sender;
  }

  private addressOf(op: string, value: Address): Address {
    const address = tryNormalizeAddress(value);
    if (!address) {
      throw new ExchangeError("InvalidParameters", `exchange:${op} malformed address ${value}`);
    }
    return address;
  }

  private recipientOf(op: string, recipient: Address): Address {
    const address = tryNormalizeAddress(recipient);
    if (!address || isZeroAddress(address) || sameAddress(address, this.address)) {
      throw new ExchangeError("InvalidRecipient", `exchange:${op} invalid recipient address ${recipient}`);
    }
    return address;
  }

  private lookupExchange(op: string, registry: RegistryHandle, tokenAddress: Address): ExchangeHandle {
    const target = registry.getExchange(tokenAddress);
    if (!target) {
      throw new ExchangeError("InvalidExchange", `exchange:${op} no exchange registered for token ${tokenAddress}`);
    }
    return target;
  }

  private requireRoutable(op: string, target: ExchangeHandle): void {
    const address = tryNormalizeAddress(target.address);
    if (!address || isZeroAddress(address) || sameAddress(address, this.address)) {
      throw new ExchangeError("InvalidExchange", `exchange:${op} invalid destination exchange ${target.address}`);
    }
  }
}

function requirePositive(value: bigint, op: string, label: string): void {
  if (value <= 0n) {
    throw new ExchangeError("InvalidParameters", `exchange:${op} ${label} must be greater than 0`);
  }
}
