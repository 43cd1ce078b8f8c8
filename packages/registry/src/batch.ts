import { RegistryError } from "./errors.js";
import type { FeeLedger } from "./feeLedger.js";
import { isZeroAddress } from "./identity.js";
import type { NameRegistry } from "./names.js";
import type { NamespaceRegistry } from "./namespaces.js";
import { isValidLabelOrNamespace } from "./syntax.js";
import type { AuthorizationRequest, CallContext } from "./types.js";

type BatchDeps = {
  names: NameRegistry;
  namespaces: NamespaceRegistry;
  fees: FeeLedger;
};

export type BatchOutcome = {
  registered: number;
  /** Input positions skipped because the recipient or the name was already taken. */
  skipped: number[];
};

/**
 * Sponsored registration of many names in one namespace. Malformed input
 * rejects the whole batch; an item that lost a race (recipient bound or name
 * taken by then) is skipped and the rest proceed.
 */
export class BatchRegistrar {
  private readonly deps: BatchDeps;

  constructor(deps: BatchDeps) {
    this.deps = deps;
  }

  registerBatch(ctx: CallContext, requests: AuthorizationRequest[], proofs: string[]): BatchOutcome {
    const { names, namespaces, fees } = this.deps;
    if (requests.length === 0) {
      throw new RegistryError("invalid_batch", "empty");
    }
    if (requests.length !== proofs.length) {
      throw new RegistryError("invalid_batch", "length_mismatch");
    }
    const namespace = requests[0].namespace;
    const record = namespaces.lookup(namespace);

    requests.forEach((request, index) => {
      if (!isValidLabelOrNamespace(request.label)) {
        throw new RegistryError("invalid_syntax", `item:${index}`);
      }
      if (isZeroAddress(request.recipient)) {
        throw new RegistryError("invalid_recipient", `item:${index}`);
      }
      if (request.namespace !== namespace) {
        throw new RegistryError("invalid_batch", `namespace_mismatch:item:${index}`);
      }
      names.assertAuthorized(request, proofs[index]);
    });

    const accepted: AuthorizationRequest[] = [];
    const skipped: number[] = [];
    requests.forEach((request, index) => {
      if (names.isBound(request.recipient) || names.isTaken(request.label, namespace)) {
        skipped.push(index);
        return;
      }
      names.assertSponsorAllowed(ctx.caller, namespace, record);
      names.bind(request.recipient, request.label, namespace);
      accepted.push(request);
    });

    if (accepted.length === 0) {
      throw new RegistryError("no_successful_registrations");
    }
    const required = record.price * BigInt(accepted.length);
    if (ctx.value < required) {
      throw new RegistryError("insufficient_payment", `required:${required}`);
    }
    for (let i = 0; i < accepted.length; i += 1) {
      fees.settle(record.price, record.creator, record.visibility === "private", ctx.caller);
    }
    fees.pay(ctx.caller, ctx.value - required);
    return { registered: accepted.length, skipped };
  }
}
