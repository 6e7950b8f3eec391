/**
 * In-process execution environment for exchanges.
 *
 * Provides the pieces a ledger would: an ordering clock, native-currency
 * accounts, contract address allocation, an event log, and all-or-nothing
 * transactions. Every mutation made inside `atomic()` records an undo step;
 * a throw unwinds the frame in reverse order before the error propagates,
 * so a failed call leaves balances, pool state and logs untouched.
 */

import { getCreateAddress } from "ethers";
import { tryNormalizeAddress } from "./address";
import { getConfig } from "./config";
import { ExchangeError } from "./errors";
import type { ChainLog, PendingLog } from "./events";
import type { Address } from "./types";
import { add, assertUint256, sub } from "./uint256";

type Undo = () => void;

/** Decides whether an account accepts a native payment */
export type NativeReceiver = (from: Address, amount: bigint) => boolean;

export interface ChainOptions {
  /** Block number the clock starts at (default from AMM_START_BLOCK) */
  startBlock?: bigint;
}

export class Chain {
  private block: bigint;
  private readonly frames: Undo[][] = [];
  private readonly native = new Map<Address, bigint>();
  private readonly receivers = new Map<Address, NativeReceiver>();
  private readonly nonces = new Map<Address, number>();
  private readonly entries: ChainLog[] = [];

  constructor(options: ChainOptions = {}) {
    this.block = options.startBlock ?? getConfig().startBlock;
  }

  // ============================================
  // Clock
  // ============================================

  get blockNumber(): bigint {
    return this.block;
  }

  mine(blocks: bigint = 1n): bigint {
    if (blocks < 0n) {
      throw new ExchangeError("InvalidParameters", `chain:mine block count must be non-negative (got ${blocks})`);
    }
    this.block += blocks;
    return this.block;
  }

  // ============================================
  // Transactions
  // ============================================

  /**
   * Run `fn` as one transaction frame. Nested calls act as savepoints:
   * an inner failure rolls back only the inner frame unless it propagates.
   */
  atomic<T>(fn: () => T): T {
    const frame: Undo[] = [];
    this.frames.push(frame);
    try {
      const result = fn();
      this.frames.pop();
      const parent = this.frames[this.frames.length - 1];
      if (parent) parent.push(...frame);
      return result;
    } catch (error) {
      this.frames.pop();
      for (let i = frame.length - 1; i >= 0; i--) {
        frame[i]();
      }
      throw error;
    }
  }

  get inTransaction(): boolean {
    return this.frames.length > 0;
  }

  /** Register an undo step with the innermost frame; no-op outside a transaction */
  record(undo: Undo): void {
    const frame = this.frames[this.frames.length - 1];
    if (frame) frame.push(undo);
  }

  // ============================================
  // Addresses
  // ============================================

  /** CREATE-style address for the next contract deployed by `deployer` */
  createAddress(deployer: Address): Address {
    const nonce = this.nonces.get(deployer) ?? 0;
    this.nonces.set(deployer, nonce + 1);
    this.record(() => {
      this.nonces.set(deployer, nonce);
    });
    return getCreateAddress({ from: deployer, nonce });
  }

  // ============================================
  // Native Currency
  // ============================================

  nativeBalanceOf(account: Address): bigint {
    const key = tryNormalizeAddress(account);
    return key ? this.native.get(key) ?? 0n : 0n;
  }

  /** Faucet: credit `amount` of native currency to `account` */
  fund(account: Address, amount: bigint): void {
    assertUint256(amount, "fund amount");
    const key = this.accountOf(account);
    this.setNative(key, add(this.nativeBalanceOf(key), amount));
  }

  setNativeReceiver(account: Address, receiver: NativeReceiver | undefined): void {
    const key = this.accountOf(account);
    if (receiver) {
      this.receivers.set(key, receiver);
    } else {
      this.receivers.delete(key);
    }
  }

  /**
   * Move native currency between accounts
   * @throws ExchangeError(AssetTransferFailed) on insufficient balance or a rejecting recipient
   */
  sendNative(from: Address, to: Address, amount: bigint): void {
    assertUint256(amount, "native amount");
    const source = this.accountOf(from);
    const target = this.accountOf(to);
    const balance = this.nativeBalanceOf(source);
    if (balance < amount) {
      throw new ExchangeError(
        "AssetTransferFailed",
        `chain:sendNative insufficient balance (${source} holds ${balance}, needs ${amount})`
      );
    }

    const receiver = this.receivers.get(target);
    if (receiver && !receiver(source, amount)) {
      throw new ExchangeError("AssetTransferFailed", `chain:sendNative ${target} rejected payment`);
    }

    this.setNative(source, sub(balance, amount));
    this.setNative(target, add(this.nativeBalanceOf(target), amount));
  }

  private setNative(account: Address, amount: bigint): void {
    const previous = this.native.get(account);
    this.native.set(account, amount);
    this.record(() => {
      if (previous === undefined) {
        this.native.delete(account);
      } else {
        this.native.set(account, previous);
      }
    });
  }

  private accountOf(value: Address): Address {
    const account = tryNormalizeAddress(value);
    if (!account) {
      throw new ExchangeError("InvalidParameters", `chain: malformed address ${value}`);
    }
    return account;
  }

  // ============================================
  // Event Log
  // ============================================

  emit(log: PendingLog): void {
    this.entries.push({ ...log, blockNumber: this.block });
    this.record(() => {
      this.entries.pop();
    });
  }

  get logs(): ChainLog[] {
    return [...this.entries];
  }

  /** Logs emitted at or after position `cursor` (e.g. a previous `logs.length`) */
  logsSince(cursor: number): ChainLog[] {
    return this.entries.slice(cursor);
  }
}
