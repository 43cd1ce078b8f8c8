import type { IdentityAuthorizer } from "./authorizer.js";
import { BARE_NAMESPACE, NAME_SEPARATOR } from "./constants.js";
import { policyViolation, RegistryError } from "./errors.js";
import type { FeeLedger } from "./feeLedger.js";
import { isZeroAddress, sameAddress } from "./identity.js";
import type { NamespaceRegistry } from "./namespaces.js";
import type { RegistryStore } from "./store.js";
import { isValidLabelOrNamespace } from "./syntax.js";
import type { Address, AuthorizationRequest, CallContext, NamespaceRecord } from "./types.js";

type NameDeps = {
  store: RegistryStore;
  namespaces: NamespaceRegistry;
  fees: FeeLedger;
  authorizer: IdentityAuthorizer;
};

const nameKey = (label: string, namespace: string) => `${label}${NAME_SEPARATOR}${namespace}`;

/** `alice` → (alice, x); `a.b.c` → (a.b, c). Splits on the last separator. */
export const parseFullName = (fullName: string) => {
  const index = fullName.lastIndexOf(NAME_SEPARATOR);
  if (index === -1) {
    return { label: fullName, namespace: BARE_NAMESPACE };
  }
  return { label: fullName.slice(0, index), namespace: fullName.slice(index + 1) };
};

export const formatName = (label: string, namespace: string) =>
  namespace === BARE_NAMESPACE ? label : nameKey(label, namespace);

export class NameRegistry {
  private readonly deps: NameDeps;

  constructor(deps: NameDeps) {
    this.deps = deps;
  }

  registerDirect(ctx: CallContext, label: string, namespace: string) {
    const { namespaces, fees } = this.deps;
    if (!isValidLabelOrNamespace(label)) {
      throw new RegistryError("invalid_syntax", label);
    }
    const record = namespaces.lookup(namespace);
    if (record.visibility === "private") {
      throw policyViolation("private_namespace");
    }
    if (namespaces.isWithinExclusivityWindow(namespace) && !sameAddress(ctx.caller, record.creator)) {
      throw policyViolation("exclusivity_period");
    }
    if (ctx.value < record.price) {
      throw new RegistryError("insufficient_payment", `required:${record.price}`);
    }
    this.assertAvailable(ctx.caller, label, namespace);
    this.bind(ctx.caller, label, namespace);
    fees.settle(record.price, record.creator, false, ctx.caller);
    fees.pay(ctx.caller, ctx.value - record.price);
  }

  registerSponsored(ctx: CallContext, request: AuthorizationRequest, proof: string) {
    const { namespaces, fees } = this.deps;
    if (isZeroAddress(request.recipient)) {
      throw new RegistryError("invalid_recipient", "zero_address");
    }
    if (!isValidLabelOrNamespace(request.label)) {
      throw new RegistryError("invalid_syntax", request.label);
    }
    const record = namespaces.lookup(request.namespace);
    if (ctx.value < record.price) {
      throw new RegistryError("insufficient_payment", `required:${record.price}`);
    }
    this.assertSponsorAllowed(ctx.caller, request.namespace, record);
    this.assertAvailable(request.recipient, request.label, request.namespace);
    this.assertAuthorized(request, proof);
    this.bind(request.recipient, request.label, request.namespace);
    fees.settle(record.price, record.creator, record.visibility === "private", ctx.caller);
    fees.pay(ctx.caller, ctx.value - record.price);
  }

  /**
   * Private namespaces: only the creator sponsors, forever. Public ones: only
   * the creator while the exclusivity window is open.
   */
  assertSponsorAllowed(sponsor: Address, namespace: string, record: NamespaceRecord) {
    const restricted =
      record.visibility === "private" || this.deps.namespaces.isWithinExclusivityWindow(namespace);
    if (restricted && !sameAddress(sponsor, record.creator)) {
      throw policyViolation("sponsor_not_creator");
    }
  }

  assertAuthorized(request: AuthorizationRequest, proof: string) {
    const outcome = this.deps.authorizer.inspect(request, proof, request.recipient);
    if (!outcome.ok) {
      throw new RegistryError("invalid_proof", outcome.reason);
    }
  }

  isBound(identity: Address) {
    return this.deps.store.owners.has(identity);
  }

  isTaken(label: string, namespace: string) {
    return this.deps.store.names.has(nameKey(label, namespace));
  }

  bind(owner: Address, label: string, namespace: string) {
    const { store } = this.deps;
    store.names.set(nameKey(label, namespace), owner);
    store.owners.set(owner, { label, namespace });
    store.emit({ type: "name_registered", label, namespace, owner });
  }

  resolveAddress(labelOrName: string, namespace?: string): Address | null {
    const target = namespace === undefined ? parseFullName(labelOrName) : { label: labelOrName, namespace };
    return this.deps.store.names.get(nameKey(target.label, target.namespace)) ?? null;
  }

  resolveName(identity: Address) {
    const record = this.deps.store.owners.get(identity);
    return record ? formatName(record.label, record.namespace) : "";
  }

  private assertAvailable(owner: Address, label: string, namespace: string) {
    if (this.isBound(owner)) {
      throw new RegistryError("identity_already_bound", owner);
    }
    if (this.isTaken(label, namespace)) {
      throw new RegistryError("name_already_registered", nameKey(label, namespace));
    }
  }
}
