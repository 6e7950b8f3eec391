/**
 * Pool-share accounting.
 *
 * Deposit/withdrawal math is pure; ShareLedger holds the balances and
 * allowances of the share unit and journals every write on the Chain.
 */

import { ZERO_ADDRESS } from "./address";
import type { Chain } from "./chain";
import { ExchangeError } from "./errors";
import type { Address, Reserves } from "./types";
import { add, div, mul, sub } from "./uint256";

export interface DepositQuote {
  /** Tokens the depositor must supply alongside the native amount */
  tokenAmount: bigint;
  /** Shares minted for the deposit */
  sharesMinted: bigint;
}

export interface WithdrawalQuote {
  nativeAmount: bigint;
  tokenAmount: bigint;
}

/**
 * Proportional deposit into a non-empty pool
 *
 * `reserves` are the pool's holdings before the deposit arrives:
 *   tokenAmount  = floor(native * reserves.token / reserves.native) + 1
 *   sharesMinted = floor(native * totalShares / reserves.native)
 *
 * The +1 rounds the token side in the pool's favor.
 */
export function calcLiquidityDeposit(
  nativeAmount: bigint,
  reserves: Reserves,
  totalShares: bigint
): DepositQuote {
  if (reserves.native === 0n || reserves.token === 0n || totalShares === 0n) {
    throw new ExchangeError("InvalidReserve", "exchange:addLiquidity pool has no reserves");
  }
  return {
    tokenAmount: add(div(mul(nativeAmount, reserves.token), reserves.native), 1n),
    sharesMinted: div(mul(nativeAmount, totalShares), reserves.native),
  };
}

/**
 * Pro-rata withdrawal for burning `shares` (both sides round down)
 */
export function calcLiquidityWithdrawal(
  shares: bigint,
  reserves: Reserves,
  totalShares: bigint
): WithdrawalQuote {
  if (totalShares === 0n) {
    throw new ExchangeError("InsufficientLiquidity", "exchange:removeLiquidity pool is empty");
  }
  return {
    nativeAmount: div(mul(shares, reserves.native), totalShares),
    tokenAmount: div(mul(shares, reserves.token), totalShares),
  };
}

/**
 * Balances and allowances of the pool-share unit.
 *
 * Addresses passed in are expected to be normalized by the caller.
 * Emission of Transfer/Approval logs is left to the owning exchange.
 */
export class ShareLedger {
  private supply = 0n;
  private readonly balances = new Map<Address, bigint>();
  private readonly allowances = new Map<string, bigint>();

  constructor(private readonly chain: Chain) {}

  get totalSupply(): bigint {
    return this.supply;
  }

  balanceOf(owner: Address): bigint {
    return this.balances.get(owner) ?? 0n;
  }

  allowance(owner: Address, spender: Address): bigint {
    return this.allowances.get(`${owner}:${spender}`) ?? 0n;
  }

  mint(to: Address, amount: bigint): void {
    this.setBalance(to, add(this.balanceOf(to), amount));
    this.setSupply(add(this.supply, amount));
  }

  burn(from: Address, amount: bigint): void {
    const balance = this.balanceOf(from);
    if (balance < amount) {
      throw new ExchangeError(
        "InvalidParameters",
        `exchange:removeLiquidity share balance too low (${balance} < ${amount})`
      );
    }
    this.setBalance(from, balance - amount);
    this.setSupply(sub(this.supply, amount));
  }

  transfer(from: Address, to: Address, amount: bigint): void {
    if (to === ZERO_ADDRESS) {
      throw new ExchangeError("InvalidRecipient", "exchange:transfer shares cannot be sent to the zero address");
    }
    const balance = this.balanceOf(from);
    if (balance < amount) {
      throw new ExchangeError(
        "InvalidParameters",
        `exchange:transfer share balance too low (${balance} < ${amount})`
      );
    }
    this.setBalance(from, balance - amount);
    this.setBalance(to, add(this.balanceOf(to), amount));
  }

  approve(owner: Address, spender: Address, amount: bigint): void {
    this.setAllowance(`${owner}:${spender}`, amount);
  }

  /** Consume `amount` of the spender's allowance over `owner`'s shares */
  spendAllowance(owner: Address, spender: Address, amount: bigint): void {
    const key = `${owner}:${spender}`;
    const allowed = this.allowances.get(key) ?? 0n;
    if (allowed < amount) {
      throw new ExchangeError(
        "InvalidParameters",
        `exchange:transferFrom allowance too low (${allowed} < ${amount})`
      );
    }
    this.setAllowance(key, allowed - amount);
  }

  private setSupply(amount: bigint): void {
    const previous = this.supply;
    this.supply = amount;
    this.chain.record(() => {
      this.supply = previous;
    });
  }

  private setBalance(owner: Address, amount: bigint): void {
    const previous = this.balances.get(owner);
    this.balances.set(owner, amount);
    this.chain.record(() => {
      if (previous === undefined) this.balances.delete(owner);
      else this.balances.set(owner, previous);
    });
  }

  private setAllowance(key: string, amount: bigint): void {
    const previous = this.allowances.get(key);
    this.allowances.set(key, amount);
    this.chain.record(() => {
      if (previous === undefined) this.allowances.delete(key);
      else this.allowances.set(key, previous);
    });
  }
}
