/**
 * Edge case tests for extreme pool states and unusual inputs.
 */
import { describe, it, expect } from "vitest";
import { priceForExactInput, priceForExactOutput } from "./pricing";
import { ALICE, FAR_DEADLINE, ONE, OWNER, TWO, createMarket, createSeededMarket, expectExchangeError } from "./test-helpers";

describe("Exchange Edge Cases", () => {
  describe("Extreme Imbalance", () => {
    const native = 10n ** 9n;
    const tokens = 10n ** 30n;

    it("should price the scarce side steeply", () => {
      // 1 wei of native buys ~997e18 tokens; 1 token costs a single wei
      expect(priceForExactInput(1n, native, tokens)).toBe(996999999005991000991n);
      expect(priceForExactOutput(1n, native, tokens)).toBe(1n);
    });

    it("should pay under half the scarce reserve for a sale that doubles the other side", () => {
      expect(priceForExactInput(tokens, tokens, native)).toBe(499248873n);
    });
  });

  describe("Near-Empty Pools", () => {
    it("should let a buyer take all but one unit, at a price", () => {
      const { chain, exchange, token } = createSeededMarket();
      const cost = 4012036108324974922768304914744232699n;
      chain.fund(ALICE, cost);

      const spent = exchange.nativeToTokenSwapOutput({ sender: ALICE, value: cost }, TWO - 1n, FAR_DEADLINE);

      expect(spent).toBe(cost);
      expect(token.balanceOf(ALICE)).toBe(TWO - 1n);
      expect(exchange.getReserves()).toEqual({ native: TWO + cost, token: 1n });
    });

    it("should refuse to sell the last unit", () => {
      const { exchange } = createSeededMarket();
      expectExchangeError(() => exchange.getNativeToTokenOutputPrice(TWO), "InsufficientLiquidity");
    });

    it("should reject dust inputs whose output rounds to zero", () => {
      const { chain, exchange } = createSeededMarket();
      chain.fund(ALICE, 1n);
      // floor(997 * 2e18 / (2e21 + 997)) = 0
      expect(priceForExactInput(1n, TWO, TWO)).toBe(0n);
      expectExchangeError(
        () => exchange.nativeToTokenSwapInput({ sender: ALICE, value: 1n }, 1n, FAR_DEADLINE),
        "SlippageExceeded"
      );
      expect(chain.nativeBalanceOf(ALICE)).toBe(1n);
    });
  });

  describe("Word-Size Limits", () => {
    it("should fault on overflow and leave the pool unchanged", () => {
      const big = 2n ** 200n;
      const { chain, exchange } = createMarket(big);
      chain.fund(OWNER, big);
      exchange.addLiquidity({ sender: OWNER, value: big }, 0n, big, FAR_DEADLINE);
      const nativeBefore = chain.nativeBalanceOf(OWNER);

      // 2^60 * 997 * 2^200 exceeds 256 bits
      expectExchangeError(
        () => exchange.nativeToTokenSwapInput({ sender: OWNER, value: 2n ** 60n }, 1n, FAR_DEADLINE),
        "ArithmeticOverflow"
      );

      expect(exchange.getReserves()).toEqual({ native: big, token: big });
      expect(chain.nativeBalanceOf(OWNER)).toBe(nativeBefore);
    });

    it("should reject negative amounts", () => {
      const { chain, exchange } = createSeededMarket();
      chain.fund(ALICE, ONE);
      expectExchangeError(
        () => exchange.nativeToTokenSwapInput({ sender: ALICE, value: ONE }, -1n, FAR_DEADLINE),
        "InvalidParameters"
      );
      expectExchangeError(
        () => exchange.nativeToTokenSwapInput({ sender: ALICE, value: -1n }, 1n, FAR_DEADLINE),
        "InvalidParameters"
      );
      expectExchangeError(
        () => exchange.addLiquidity({ sender: OWNER, value: ONE }, -1n, TWO, FAR_DEADLINE),
        "InvalidParameters"
      );
      expectExchangeError(
        () => exchange.tokenToNativeSwapOutput({ sender: OWNER }, ONE, -1n, FAR_DEADLINE),
        "InvalidParameters"
      );
    });
  });

  describe("Addresses", () => {
    it("should reject a malformed sender", () => {
      const { exchange } = createSeededMarket();
      expectExchangeError(
        () => exchange.nativeToTokenSwapInput({ sender: "not-an-address", value: ONE }, 1n, FAR_DEADLINE),
        "InvalidParameters"
      );
    });

    it("should reject the exchange as its own caller", () => {
      const { chain, exchange } = createSeededMarket();
      const error = expectExchangeError(
        () => exchange.nativeToTokenSwapInput({ sender: exchange.address, value: ONE }, 1n, FAR_DEADLINE),
        "InvalidParameters"
      );
      expect(error.message).toBe("exchange: an exchange cannot call itself");
      expectExchangeError(
        () => exchange.tokenToNativeSwapInput({ sender: exchange.address.toLowerCase() }, ONE, 1n, FAR_DEADLINE),
        "InvalidParameters"
      );
      expect(exchange.getReserves()).toEqual({ native: TWO, token: TWO });
      expect(chain.nativeBalanceOf(exchange.address)).toBe(TWO);
    });

    it("should treat lowercase and checksummed forms as one account", () => {
      const { chain, exchange, token } = createSeededMarket();
      const lower = "0x00000000000000000000000000000000000000aa";
      chain.fund(lower, ONE);

      exchange.nativeToTokenSwapInput({ sender: lower, value: ONE }, 1n, FAR_DEADLINE);

      expect(chain.nativeBalanceOf("0x00000000000000000000000000000000000000AA")).toBe(0n);
      expect(token.balanceOf(lower)).toBe(665331998665331998n);
    });

    it("should reject a malformed recipient", () => {
      const { chain, exchange } = createSeededMarket();
      chain.fund(ALICE, ONE);
      expectExchangeError(
        () => exchange.nativeToTokenTransferInput({ sender: ALICE, value: ONE }, 1n, FAR_DEADLINE, "0x1234"),
        "InvalidRecipient"
      );
    });
  });

  describe("Deadlines", () => {
    it("should expire swaps only after their block", () => {
      const { chain, exchange } = createSeededMarket();
      chain.fund(ALICE, ONE);
      expectExchangeError(
        () => exchange.nativeToTokenSwapInput({ sender: ALICE, value: ONE }, 1n, 0n),
        "Expired"
      );
      expectExchangeError(() => exchange.tokenToNativeSwapInput({ sender: OWNER }, ONE, 1n, 0n), "Expired");
    });

    it("should expire liquidity operations at their block", () => {
      const { chain, exchange } = createSeededMarket();
      const block = chain.blockNumber;
      expectExchangeError(
        () => exchange.addLiquidity({ sender: OWNER, value: ONE }, 1n, TWO, block),
        "Expired"
      );
      expectExchangeError(() => exchange.removeLiquidity({ sender: OWNER }, ONE, 1n, 1n, block), "Expired");
    });
  });
});
