import { policyViolation } from "./errors.js";
import { isZeroAddress, sameAddress } from "./identity.js";
import type { RegistryStore } from "./store.js";
import type { Address, CallContext } from "./types.js";

/** Two-step handover of the operator role: propose, then the proposed party accepts. */
export class OperatorRole {
  private readonly store: RegistryStore;

  constructor(store: RegistryStore) {
    this.store = store;
  }

  current() {
    return this.store.operator.get();
  }

  pending() {
    return this.store.pendingOperator.get();
  }

  /** A zero `next` cancels an open handover. */
  transfer(ctx: CallContext, next: Address) {
    const operator = this.store.operator.get();
    if (!sameAddress(ctx.caller, operator)) {
      throw policyViolation("not_operator");
    }
    const pendingOperator = isZeroAddress(next) ? null : next;
    this.store.pendingOperator.set(pendingOperator);
    this.store.emit({ type: "operator_transfer_started", operator, pendingOperator: next });
  }

  accept(ctx: CallContext) {
    const pendingOperator = this.store.pendingOperator.get();
    if (pendingOperator === null || !sameAddress(ctx.caller, pendingOperator)) {
      throw policyViolation("not_pending_operator");
    }
    const previousOperator = this.store.operator.get();
    this.store.operator.set(pendingOperator);
    this.store.pendingOperator.set(null);
    this.store.emit({ type: "operator_transferred", previousOperator, operator: pendingOperator });
  }
}
