import { describe, it, expect } from "vitest";
import { Chain } from "./chain";
import { InMemoryToken } from "./token";
import { ALICE, BOB, DEPLOYER, OWNER, expectExchangeError } from "./test-helpers";

function createToken() {
  const chain = new Chain({ startBlock: 1n });
  const token = new InMemoryToken(chain, DEPLOYER, { name: "Test Token", symbol: "TST" });
  return { chain, token };
}

describe("InMemoryToken", () => {
  it("should carry metadata", () => {
    const { token } = createToken();
    expect(token.name).toBe("Test Token");
    expect(token.symbol).toBe("TST");
    expect(token.decimals).toBe(18);
  });

  it("should mint and transfer", () => {
    const { token } = createToken();
    token.mint(OWNER, 100n);
    expect(token.transfer(OWNER, ALICE, 40n)).toBe(true);
    expect(token.balanceOf(OWNER)).toBe(60n);
    expect(token.balanceOf(ALICE)).toBe(40n);
    expect(token.totalSupply).toBe(100n);
  });

  it("should return false instead of throwing on failed transfers", () => {
    const { token } = createToken();
    token.mint(OWNER, 10n);
    expect(token.transfer(OWNER, ALICE, 11n)).toBe(false);
    expect(token.transfer(OWNER, "0xbad", 1n)).toBe(false);
    expect(token.balanceOf(OWNER)).toBe(10n);
  });

  it("should spend allowances on transferFrom", () => {
    const { token } = createToken();
    token.mint(OWNER, 10n);
    token.approve(OWNER, BOB, 6n);

    expect(token.transferFrom(BOB, OWNER, ALICE, 7n)).toBe(false);
    expect(token.transferFrom(BOB, OWNER, ALICE, 4n)).toBe(true);

    expect(token.allowance(OWNER, BOB)).toBe(2n);
    expect(token.balanceOf(ALICE)).toBe(4n);
  });

  it("should keep the allowance when the balance is short", () => {
    const { token } = createToken();
    token.mint(OWNER, 1n);
    token.approve(OWNER, BOB, 5n);
    expect(token.transferFrom(BOB, OWNER, ALICE, 2n)).toBe(false);
    expect(token.allowance(OWNER, BOB)).toBe(5n);
  });

  it("should roll back with the enclosing transaction", () => {
    const { chain, token } = createToken();
    token.mint(OWNER, 10n);

    expect(() =>
      chain.atomic(() => {
        token.mint(OWNER, 5n);
        token.transfer(OWNER, ALICE, 15n);
        throw new Error("abort");
      })
    ).toThrow("abort");

    expect(token.balanceOf(OWNER)).toBe(10n);
    expect(token.balanceOf(ALICE)).toBe(0n);
    expect(token.totalSupply).toBe(10n);
  });

  it("should reject minting to a malformed address", () => {
    const { token } = createToken();
    expectExchangeError(() => token.mint("0xbad", 1n), "InvalidParameters");
  });
});
