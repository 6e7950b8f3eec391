/**
 * Shared types: identities, call context and the collaborator contracts
 * an exchange relies on (token ledger, registry, destination exchange).
 */

/** Checksummed 20-byte hex address */
export type Address = string;

/**
 * Who is calling and how much native currency rides along with the call.
 * `value` defaults to zero; non-payable operations reject a nonzero value.
 */
export interface CallContext {
  sender: Address;
  value?: bigint;
}

/** Pool reserves owned by one exchange */
export interface Reserves {
  native: bigint;
  token: bigint;
}

/**
 * Fungible-token ledger the exchange trades against.
 *
 * `transfer`/`transferFrom` report failure by returning false; a thrown
 * error is treated the same way by the exchange.
 */
export interface TokenLedger {
  readonly address: Address;
  balanceOf(holder: Address): bigint;
  transfer(sender: Address, to: Address, amount: bigint): boolean;
  transferFrom(spender: Address, from: Address, to: Address, amount: bigint): boolean;
}

/**
 * What a routing exchange needs from the exchange on the far side of a
 * token-to-token trade. Accepting this instead of a concrete class lets a
 * route cross registries.
 */
export interface ExchangeHandle {
  readonly address: Address;
  getNativeToTokenOutputPrice(tokensBought: bigint): bigint;
  nativeToTokenTransferInput(
    ctx: CallContext,
    minTokens: bigint,
    deadline: bigint,
    recipient: Address
  ): bigint;
  nativeToTokenTransferOutput(
    ctx: CallContext,
    tokensBought: bigint,
    deadline: bigint,
    recipient: Address
  ): bigint;
}

/** Token-to-exchange lookup used for routing */
export interface RegistryHandle {
  readonly address: Address;
  getExchange(token: Address): ExchangeHandle | undefined;
}
