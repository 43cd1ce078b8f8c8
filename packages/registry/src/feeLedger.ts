import { BASIS_POINTS, BURN_BPS, CREATOR_BPS } from "./constants.js";
import type { BurnLedger } from "./collaborators/burnLedger.js";
import type { ValueTransfer } from "./collaborators/valueLedger.js";
import { RegistryError } from "./errors.js";
import { isZeroAddress } from "./identity.js";
import type { RegistryStore } from "./store.js";
import type { Address } from "./types.js";

export type FeeSplit = {
  burn: bigint;
  creatorShare: bigint;
  operatorShare: bigint;
};

/** 90% burn, 5% creator (0 for private namespaces), operator takes the rest including rounding dust. */
export const splitPayment = (amount: bigint, isPrivate: boolean): FeeSplit => {
  if (amount < 0n) {
    throw new RegistryError("insufficient_payment", "negative_amount");
  }
  const burn = (amount * BURN_BPS) / BASIS_POINTS;
  const creatorShare = isPrivate ? 0n : (amount * CREATOR_BPS) / BASIS_POINTS;
  return { burn, creatorShare, operatorShare: amount - burn - creatorShare };
};

const describe = (error: unknown) => (error instanceof Error ? error.message : String(error));

export class FeeLedger {
  private readonly store: RegistryStore;
  private readonly burnLedger: BurnLedger;
  private readonly valueTransfer: ValueTransfer;

  constructor(store: RegistryStore, burnLedger: BurnLedger, valueTransfer: ValueTransfer) {
    this.store = store;
    this.burnLedger = burnLedger;
    this.valueTransfer = valueTransfer;
  }

  settle(amount: bigint, namespaceCreator: Address, isPrivate: boolean, payer: Address): FeeSplit {
    const split = splitPayment(amount, isPrivate);
    if (split.burn > 0n) {
      try {
        this.burnLedger.burn(split.burn, payer);
      } catch (error) {
        throw new RegistryError("burn_failed", describe(error));
      }
    }
    if (split.creatorShare > 0n) {
      this.credit(namespaceCreator, split.creatorShare);
    }
    if (split.operatorShare > 0n) {
      this.credit(this.store.operator.get(), split.operatorShare);
    }
    return split;
  }

  /** Sends value out; any failure aborts the enclosing operation. */
  pay(to: Address, amount: bigint) {
    if (amount === 0n) return;
    try {
      this.valueTransfer.transfer(to, amount);
    } catch (error) {
      throw new RegistryError("transfer_failed", describe(error));
    }
  }

  claim(claimant: Address, recipient: Address) {
    if (isZeroAddress(recipient)) {
      throw new RegistryError("invalid_recipient", "zero_address");
    }
    const amount = this.pendingBalance(claimant);
    if (amount === 0n) {
      throw new RegistryError("nothing_to_claim");
    }
    this.store.pendingFees.delete(claimant);
    this.pay(recipient, amount);
    this.store.emit({ type: "fees_claimed", recipient, amount });
    return amount;
  }

  pendingBalance(identity: Address) {
    return this.store.pendingFees.get(identity) ?? 0n;
  }

  private credit(identity: Address, amount: bigint) {
    this.store.pendingFees.set(identity, this.pendingBalance(identity) + amount);
  }
}
