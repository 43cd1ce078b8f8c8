import type { TransactionParticipant } from "../store.js";
import type { Address } from "../types.js";

/** Delivers native value out of the registry: refunds and fee payouts. */
export interface ValueTransfer {
  transfer(to: Address, amount: bigint): void;
}

/**
 * Book of everything the registry has paid out. Recipients marked with
 * `refuse` behave like accounts that reject incoming value.
 */
export class InMemoryValueLedger implements ValueTransfer, TransactionParticipant {
  private readonly received = new Map<Address, bigint>();
  private readonly refusing = new Set<Address>();

  transfer(to: Address, amount: bigint) {
    if (this.refusing.has(to)) {
      throw new Error(`transfer_refused:${to}`);
    }
    this.received.set(to, (this.received.get(to) ?? 0n) + amount);
  }

  refuse(address: Address) {
    this.refusing.add(address);
  }

  balanceOf(address: Address) {
    return this.received.get(address) ?? 0n;
  }

  checkpoint() {
    const snapshot = new Map(this.received);
    return () => {
      this.received.clear();
      for (const [address, amount] of snapshot) {
        this.received.set(address, amount);
      }
    };
  }
}
