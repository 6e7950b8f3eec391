/**
 * In-memory fungible-token ledger.
 *
 * Reference implementation of the TokenLedger contract for tests and
 * embedders. Balance and allowance writes are journaled on the Chain, so a
 * failed exchange call also rolls back the token movements it made.
 */

import { tryNormalizeAddress } from "./address";
import type { Chain } from "./chain";
import { ExchangeError } from "./errors";
import type { Address, TokenLedger } from "./types";
import { add, assertUint256 } from "./uint256";

export interface TokenMetadata {
  name: string;
  symbol: string;
  decimals?: number;
}

export class InMemoryToken implements TokenLedger {
  readonly address: Address;
  readonly name: string;
  readonly symbol: string;
  readonly decimals: number;

  private supply = 0n;
  private readonly balances = new Map<Address, bigint>();
  private readonly allowances = new Map<string, bigint>();

  constructor(
    private readonly chain: Chain,
    deployer: Address,
    metadata: TokenMetadata
  ) {
    this.address = chain.createAddress(deployer);
    this.name = metadata.name;
    this.symbol = metadata.symbol;
    this.decimals = metadata.decimals ?? 18;
  }

  get totalSupply(): bigint {
    return this.supply;
  }

  balanceOf(holder: Address): bigint {
    const key = tryNormalizeAddress(holder);
    return key ? this.balances.get(key) ?? 0n : 0n;
  }

  allowance(owner: Address, spender: Address): bigint {
    const key = allowanceKey(owner, spender);
    return key ? this.allowances.get(key) ?? 0n : 0n;
  }

  mint(to: Address, amount: bigint): void {
    assertUint256(amount, "mint amount");
    const holder = requireAddress(to);
    this.setBalance(holder, add(this.balanceOf(holder), amount));
    const previous = this.supply;
    this.supply = add(previous, amount);
    this.chain.record(() => {
      this.supply = previous;
    });
  }

  approve(owner: Address, spender: Address, amount: bigint): boolean {
    assertUint256(amount, "approve amount");
    const key = allowanceKey(owner, spender);
    if (!key) return false;
    this.setAllowance(key, amount);
    return true;
  }

  transfer(sender: Address, to: Address, amount: bigint): boolean {
    return this.move(sender, to, amount);
  }

  transferFrom(spender: Address, from: Address, to: Address, amount: bigint): boolean {
    const key = allowanceKey(from, spender);
    if (!key) return false;
    const allowed = this.allowances.get(key) ?? 0n;
    if (allowed < amount) return false;
    if (!this.move(from, to, amount)) return false;
    this.setAllowance(key, allowed - amount);
    return true;
  }

  private move(from: Address, to: Address, amount: bigint): boolean {
    const source = tryNormalizeAddress(from);
    const target = tryNormalizeAddress(to);
    if (!source || !target || amount < 0n) return false;

    const balance = this.balanceOf(source);
    if (balance < amount) return false;

    this.setBalance(source, balance - amount);
    this.setBalance(target, this.balanceOf(target) + amount);
    return true;
  }

  private setBalance(holder: Address, amount: bigint): void {
    const previous = this.balances.get(holder);
    this.balances.set(holder, amount);
    this.chain.record(() => restore(this.balances, holder, previous));
  }

  private setAllowance(key: string, amount: bigint): void {
    const previous = this.allowances.get(key);
    this.allowances.set(key, amount);
    this.chain.record(() => restore(this.allowances, key, previous));
  }
}

function requireAddress(value: Address): Address {
  const address = tryNormalizeAddress(value);
  if (!address) {
    throw new ExchangeError("InvalidParameters", `token: malformed address ${value}`);
  }
  return address;
}

function allowanceKey(owner: Address, spender: Address): string | undefined {
  const a = tryNormalizeAddress(owner);
  const b = tryNormalizeAddress(spender);
  return a && b ? `${a}:${b}` : undefined;
}

function restore<K>(map: Map<K, bigint>, key: K, previous: bigint | undefined): void {
  if (previous === undefined) {
    map.delete(key);
  } else {
    map.set(key, previous);
  }
}
