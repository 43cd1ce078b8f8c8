import type { TransactionParticipant } from "../store.js";
import type { Address } from "../types.js";

/** Permanently removes value and credits the attributed party 1:1. */
export interface BurnLedger {
  burn(amount: bigint, attributedTo: Address): void;
}

export class InMemoryBurnLedger implements BurnLedger, TransactionParticipant {
  private readonly credited = new Map<Address, bigint>();
  private total = 0n;

  burn(amount: bigint, attributedTo: Address) {
    if (amount < 0n) {
      throw new Error("negative_burn");
    }
    this.credited.set(attributedTo, (this.credited.get(attributedTo) ?? 0n) + amount);
    this.total += amount;
  }

  burned(party: Address) {
    return this.credited.get(party) ?? 0n;
  }

  totalBurned() {
    return this.total;
  }

  checkpoint() {
    const credited = new Map(this.credited);
    const total = this.total;
    return () => {
      this.credited.clear();
      for (const [party, amount] of credited) {
        this.credited.set(party, amount);
      }
      this.total = total;
    };
  }
}
