import { ZeroAddress, getAddress, isAddress } from "ethers";
import type { Address } from "./types";

export { ZeroAddress as ZERO_ADDRESS };

/**
 * Checksum an address, or return undefined when it is not one.
 * Mixed-case input with a bad checksum counts as malformed.
 */
export function tryNormalizeAddress(value: string): Address | undefined {
  if (!isAddress(value)) return undefined;
  return getAddress(value);
}

export function isZeroAddress(value: Address): boolean {
  return value.toLowerCase() === ZeroAddress;
}

export function sameAddress(a: Address, b: Address): boolean {
  return a.toLowerCase() === b.toLowerCase();
}
