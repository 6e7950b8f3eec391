/**
 * Exchange registry: creates one exchange per token and indexes both
 * directions. Exchanges it creates use it for token-to-token routing.
 */

import { isZeroAddress, tryNormalizeAddress } from "./address";
import type { Chain } from "./chain";
import { ExchangeError } from "./errors";
import { Exchange, type ExchangeOptions } from "./exchange";
import { createLogger, type Logger } from "./logger";
import type { Address, RegistryHandle, TokenLedger } from "./types";

export class ExchangeRegistry implements RegistryHandle {
  readonly address: Address;

  private readonly tokenToExchange = new Map<Address, Exchange>();
  private readonly exchangeToToken = new Map<Address, Address>();
  private readonly idToToken = new Map<number, Address>();
  private count = 0;
  private readonly log: Logger;

  constructor(
    private readonly chain: Chain,
    address: Address,
    private readonly exchangeOptions: ExchangeOptions = {}
  ) {
    const normalized = tryNormalizeAddress(address);
    if (!normalized || isZeroAddress(normalized)) {
      throw new ExchangeError("InvalidParameters", `registry: invalid instance address ${address}`);
    }
    this.address = normalized;
    this.log = (exchangeOptions.logger ?? createLogger("registry")).child({ registry: normalized });
  }

  /**
   * Deploy and configure the exchange for `token`
   * @throws ExchangeError(InvalidParameters) for a zero or malformed token address
   * @throws ExchangeError(AlreadyConfigured) if the token already has an exchange
   */
  createExchange(token: TokenLedger): Exchange {
    const tokenAddress = tryNormalizeAddress(token.address);
    if (!tokenAddress || isZeroAddress(tokenAddress)) {
      throw new ExchangeError("InvalidParameters", `registry:createExchange invalid token address ${token.address}`);
    }
    if (this.tokenToExchange.has(tokenAddress)) {
      throw new ExchangeError("AlreadyConfigured", `registry:createExchange exchange already exists for ${tokenAddress}`);
    }

    const exchange = this.chain.atomic(() => {
      const created = new Exchange(this.chain, this.chain.createAddress(this.address), this.exchangeOptions);
      created.setup(this, token);

      const id = this.count + 1;
      this.tokenToExchange.set(tokenAddress, created);
      this.exchangeToToken.set(created.address, tokenAddress);
      this.idToToken.set(id, tokenAddress);
      this.count = id;
      this.chain.record(() => {
        this.tokenToExchange.delete(tokenAddress);
        this.exchangeToToken.delete(created.address);
        this.idToToken.delete(id);
        this.count = id - 1;
      });

      this.chain.emit({ address: this.address, event: "NewExchange", args: [tokenAddress, created.address] });
      return created;
    });

    this.log.info({ token: tokenAddress, exchange: exchange.address, id: this.count }, "exchange created");
    return exchange;
  }

  getExchange(token: Address): Exchange | undefined {
    const key = tryNormalizeAddress(token);
    return key ? this.tokenToExchange.get(key) : undefined;
  }

  getToken(exchange: Address): Address | undefined {
    const key = tryNormalizeAddress(exchange);
    return key ? this.exchangeToToken.get(key) : undefined;
  }

  /** Tokens are numbered from 1 in creation order */
  getTokenWithId(id: number): Address | undefined {
    return this.idToToken.get(id);
  }

  get tokenCount(): number {
    return this.count;
  }
}
