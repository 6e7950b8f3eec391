/**
 * Shared fixtures for the test suites.
 */
import { expect } from "vitest";
import { Chain } from "./chain";
import { ExchangeError, type ExchangeErrorKind } from "./errors";
import type { Exchange } from "./exchange";
import { ExchangeRegistry } from "./registry";
import { InMemoryToken } from "./token";

// Digit-only addresses are already in checksum form
export const OWNER = "0x1000000000000000000000000000000000000001";
export const ALICE = "0x2000000000000000000000000000000000000002";
export const BOB = "0x3000000000000000000000000000000000000003";
export const REGISTRY = "0x8000000000000000000000000000000000000008";
export const DEPLOYER = "0x9000000000000000000000000000000000000009";

export const ONE = 10n ** 18n;
export const TWO = 2n * ONE;

/** Far beyond any block the tests mine */
export const FAR_DEADLINE = 29_617_966n;

export const MAX_APPROVAL = 2n ** 255n;

export interface Market {
  chain: Chain;
  registry: ExchangeRegistry;
  token: InMemoryToken;
  exchange: Exchange;
}

/**
 * Registry plus one configured, still empty exchange. OWNER holds
 * 1000 native units and `ownerTokens` tokens, approved for the exchange.
 */
export function createMarket(ownerTokens: bigint = TWO): Market {
  const chain = new Chain({ startBlock: 1n });
  const registry = new ExchangeRegistry(chain, REGISTRY);
  const token = new InMemoryToken(chain, DEPLOYER, { name: "Test Token", symbol: "TST" });
  const exchange = registry.createExchange(token);

  chain.fund(OWNER, 1000n * ONE);
  token.mint(OWNER, ownerTokens);
  token.approve(OWNER, exchange.address, MAX_APPROVAL);

  return { chain, registry, token, exchange };
}

/** createMarket() with OWNER's 2/2 deposit already in the pool */
export function createSeededMarket(ownerTokens: bigint = 10n * ONE): Market {
  const market = createMarket(ownerTokens);
  market.exchange.addLiquidity({ sender: OWNER, value: TWO }, 0n, TWO, FAR_DEADLINE);
  return market;
}

/**
 * Run `fn`, assert it throws an ExchangeError of `kind`, return the error
 */
export function expectExchangeError(fn: () => unknown, kind: ExchangeErrorKind): ExchangeError {
  let caught: unknown;
  try {
    fn();
  } catch (error) {
    caught = error;
  }
  if (!(caught instanceof ExchangeError)) {
    throw new Error(`expected ExchangeError(${kind}), got ${String(caught)}`);
  }
  expect(caught.kind).toBe(kind);
  return caught;
}
