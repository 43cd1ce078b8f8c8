import { BARE_NAMESPACE } from "./constants.js";
import { policyViolation, RegistryError } from "./errors.js";
import type { FeeLedger } from "./feeLedger.js";
import { isZeroAddress, sameAddress } from "./identity.js";
import type { RegistryStore } from "./store.js";
import { isReservedNamespace, isValidLabelOrNamespace } from "./syntax.js";
import type { Address, CallContext, Clock, NamespaceRecord, RegistryParams, Visibility } from "./types.js";

type NamespaceDeps = {
  store: RegistryStore;
  fees: FeeLedger;
  params: RegistryParams;
  clock: Clock;
  genesisAt: number;
};

export type NamespaceInfo = NamespaceRecord & { namespace: string };

export class NamespaceRegistry {
  private readonly deps: NamespaceDeps;

  constructor(deps: NamespaceDeps) {
    this.deps = deps;
  }

  /** Seeds the bare-name namespace, owned by the operator. Runs once inside the genesis transaction. */
  installGenesis() {
    const { store, params, genesisAt } = this.deps;
    this.persist(BARE_NAMESPACE, {
      price: params.bareNamePrice,
      creator: store.operator.get(),
      createdAt: genesisAt,
      visibility: "public"
    });
  }

  createPaid(ctx: CallContext, namespace: string, price: bigint, visibility: Visibility) {
    return this.createWithFee(ctx, ctx.caller, namespace, price, visibility);
  }

  /**
   * Operator-only creation on behalf of `creator`. Free during onboarding,
   * afterwards identical to the paid path.
   */
  createFor(ctx: CallContext, creator: Address, namespace: string, price: bigint, visibility: Visibility) {
    if (!sameAddress(ctx.caller, this.deps.store.operator.get())) {
      throw policyViolation("not_operator");
    }
    if (isZeroAddress(creator)) {
      throw new RegistryError("invalid_recipient", "zero_creator");
    }
    if (!this.isWithinOnboardingWindow()) {
      return this.createWithFee(ctx, creator, namespace, price, visibility);
    }
    this.validate(namespace, price, visibility);
    const record = this.persist(namespace, {
      price,
      creator,
      createdAt: this.deps.clock(),
      visibility
    });
    this.deps.fees.pay(ctx.caller, ctx.value);
    return record;
  }

  isWithinOnboardingWindow() {
    return this.deps.clock() <= this.deps.genesisAt + this.deps.params.onboardingPeriod;
  }

  isWithinExclusivityWindow(namespace: string) {
    const record = this.lookup(namespace);
    return this.deps.clock() <= record.createdAt + this.deps.params.exclusivityPeriod;
  }

  find(namespace: string) {
    return this.deps.store.namespaces.get(namespace);
  }

  lookup(namespace: string): NamespaceRecord {
    const record = this.find(namespace);
    if (!record) {
      throw new RegistryError("namespace_not_found", namespace);
    }
    return record;
  }

  byPrice(price: bigint) {
    return this.deps.store.publicPrices.get(price) ?? null;
  }

  private createWithFee(
    ctx: CallContext,
    creator: Address,
    namespace: string,
    price: bigint,
    visibility: Visibility
  ) {
    const { params, fees, store } = this.deps;
    this.validate(namespace, price, visibility);
    const fee = visibility === "private" ? params.privateNamespaceFee : params.publicNamespaceFee;
    if (ctx.value < fee) {
      throw new RegistryError("insufficient_payment", `required:${fee}`);
    }
    const record = this.persist(namespace, { price, creator, createdAt: this.deps.clock(), visibility });
    fees.settle(fee, store.operator.get(), false, ctx.caller);
    fees.pay(ctx.caller, ctx.value - fee);
    return record;
  }

  private validate(namespace: string, price: bigint, visibility: Visibility) {
    const { params, store } = this.deps;
    if (!isValidLabelOrNamespace(namespace)) {
      throw new RegistryError("invalid_syntax", namespace);
    }
    if (isReservedNamespace(namespace)) {
      throw new RegistryError("reserved_namespace", namespace);
    }
    const minimum = visibility === "private" ? params.privateMinPrice : params.publicMinPrice;
    if (price < minimum || price % params.priceStep !== 0n) {
      throw new RegistryError("invalid_price", price.toString());
    }
    if (store.namespaces.has(namespace)) {
      throw new RegistryError("namespace_exists", namespace);
    }
    if (visibility === "public" && store.publicPrices.has(price)) {
      throw new RegistryError("price_in_use", price.toString());
    }
  }

  private persist(namespace: string, record: NamespaceRecord) {
    const { store } = this.deps;
    store.namespaces.set(namespace, record);
    if (record.visibility === "public") {
      store.publicPrices.set(record.price, namespace);
    }
    store.emit({
      type: "namespace_registered",
      namespace,
      price: record.price,
      creator: record.creator,
      isPrivate: record.visibility === "private"
    });
    return record;
  }
}
