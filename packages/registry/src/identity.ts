import { getAddress, isAddress, ZeroAddress } from "ethers";
import { RegistryError } from "./errors.js";
import type { Address } from "./types.js";

export const ZERO_ADDRESS: Address = ZeroAddress;

/** Checksums an address; mixed-case input with a bad checksum is accepted as plain hex. */
export const toAddress = (value: string): Address => {
  if (!isAddress(value.toLowerCase())) {
    throw new RegistryError("invalid_recipient", value);
  }
  return getAddress(value.toLowerCase());
};

export const isZeroAddress = (value: Address) => value === ZERO_ADDRESS;

export const sameAddress = (a: Address, b: Address) => a.toLowerCase() === b.toLowerCase();
