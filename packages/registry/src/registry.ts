import { buildAuthorizationDomain, IdentityAuthorizer } from "./authorizer.js";
import { BatchRegistrar, type BatchOutcome } from "./batch.js";
import type { BurnLedger } from "./collaborators/burnLedger.js";
import { InMemoryDelegateDirectory, type DelegateDirectory } from "./collaborators/delegates.js";
import type { ValueTransfer } from "./collaborators/valueLedger.js";
import { DEFAULT_REGISTRY_PARAMS } from "./constants.js";
import { RegistryError } from "./errors.js";
import type { RegistryEventListener } from "./events.js";
import { FeeLedger } from "./feeLedger.js";
import { toAddress } from "./identity.js";
import { NameRegistry } from "./names.js";
import { NamespaceRegistry, type NamespaceInfo } from "./namespaces.js";
import { OperatorRole } from "./operator.js";
import { isTransactionParticipant, RegistryStore, type ListenerErrorHandler } from "./store.js";
import { isValidLabelOrNamespace } from "./syntax.js";
import type { Address, AuthorizationRequest, CallContext, Clock, RegistryParams } from "./types.js";

export type RegistryOptions = {
  operator: string;
  chainId: bigint;
  registryAddress: string;
  burnLedger: BurnLedger;
  valueTransfer: ValueTransfer;
  delegates?: DelegateDirectory;
  clock?: Clock;
  params?: Partial<Omit<RegistryParams, "chainId" | "registryAddress">>;
  onListenerError?: ListenerErrorHandler;
};

const systemClock: Clock = () => Math.floor(Date.now() / 1000);

/**
 * The public face of the registry. Every mutation runs in one store
 * transaction: it commits whole or not at all, and events reach subscribers
 * only after commit.
 */
export class Registry {
  readonly params: RegistryParams;
  readonly genesisAt: number;
  private readonly store: RegistryStore;
  private readonly authorizer: IdentityAuthorizer;
  private readonly fees: FeeLedger;
  private readonly namespaces: NamespaceRegistry;
  private readonly names: NameRegistry;
  private readonly batches: BatchRegistrar;
  private readonly operatorRole: OperatorRole;

  constructor(options: RegistryOptions) {
    const clock = options.clock ?? systemClock;
    this.params = {
      ...DEFAULT_REGISTRY_PARAMS,
      ...options.params,
      chainId: options.chainId,
      registryAddress: toAddress(options.registryAddress)
    };
    this.genesisAt = clock();
    this.store = new RegistryStore(toAddress(options.operator), {
      onListenerError: options.onListenerError
    });
    for (const collaborator of [options.burnLedger, options.valueTransfer]) {
      if (isTransactionParticipant(collaborator)) {
        this.store.enlist(collaborator);
      }
    }
    this.authorizer = new IdentityAuthorizer(
      buildAuthorizationDomain(this.params.chainId, this.params.registryAddress),
      options.delegates ?? new InMemoryDelegateDirectory()
    );
    this.fees = new FeeLedger(this.store, options.burnLedger, options.valueTransfer);
    this.namespaces = new NamespaceRegistry({
      store: this.store,
      fees: this.fees,
      params: this.params,
      clock,
      genesisAt: this.genesisAt
    });
    this.names = new NameRegistry({
      store: this.store,
      namespaces: this.namespaces,
      fees: this.fees,
      authorizer: this.authorizer
    });
    this.batches = new BatchRegistrar({ names: this.names, namespaces: this.namespaces, fees: this.fees });
    this.operatorRole = new OperatorRole(this.store);
    this.store.transact(() => this.namespaces.installGenesis());
  }

  subscribe(listener: RegistryEventListener) {
    return this.store.subscribe(listener);
  }

  registerDirect(ctx: CallContext, label: string, namespace: string) {
    this.mutate(ctx, (call) => this.names.registerDirect(call, label, namespace));
  }

  registerSponsored(ctx: CallContext, request: AuthorizationRequest, proof: string) {
    this.mutate(ctx, (call) => this.names.registerSponsored(call, normalizeRequest(request), proof));
  }

  registerBatch(ctx: CallContext, requests: AuthorizationRequest[], proofs: string[]): BatchOutcome {
    return this.mutate(ctx, (call) =>
      this.batches.registerBatch(call, requests.map(normalizeRequest), proofs)
    );
  }

  createPublicNamespace(ctx: CallContext, namespace: string, price: bigint) {
    this.mutate(ctx, (call) => this.namespaces.createPaid(call, namespace, price, "public"));
  }

  createPrivateNamespace(ctx: CallContext, namespace: string, price: bigint) {
    this.mutate(ctx, (call) => this.namespaces.createPaid(call, namespace, price, "private"));
  }

  createPublicNamespaceFor(ctx: CallContext, creator: string, namespace: string, price: bigint) {
    this.mutate(ctx, (call) =>
      this.namespaces.createFor(call, toAddress(creator), namespace, price, "public")
    );
  }

  createPrivateNamespaceFor(ctx: CallContext, creator: string, namespace: string, price: bigint) {
    this.mutate(ctx, (call) =>
      this.namespaces.createFor(call, toAddress(creator), namespace, price, "private")
    );
  }

  claim(ctx: CallContext, recipient: string) {
    return this.mutate(ctx, (call) => this.fees.claim(call.caller, toAddress(recipient)));
  }

  claimToSelf(ctx: CallContext) {
    return this.mutate(ctx, (call) => this.fees.claim(call.caller, call.caller));
  }

  transferOperator(ctx: CallContext, next: string) {
    this.mutate(ctx, (call) => this.operatorRole.transfer(call, toAddress(next)));
  }

  acceptOperator(ctx: CallContext) {
    this.mutate(ctx, (call) => this.operatorRole.accept(call));
  }

  resolveAddress(name: string): Address | null;
  resolveAddress(label: string, namespace: string): Address | null;
  resolveAddress(labelOrName: string, namespace?: string) {
    return this.names.resolveAddress(labelOrName, namespace);
  }

  resolveName(identity: string) {
    return this.names.resolveName(toAddress(identity));
  }

  namespaceInfo(namespace: string): NamespaceInfo {
    return { namespace, ...this.namespaces.lookup(namespace) };
  }

  namespacePrice(namespace: string) {
    return this.namespaces.lookup(namespace).price;
  }

  /** Legacy price → namespace lookup over public namespaces. */
  namespaceByPrice(price: bigint) {
    return this.namespaces.byPrice(price);
  }

  isWithinExclusivityWindow(namespace: string) {
    return this.namespaces.isWithinExclusivityWindow(namespace);
  }

  isWithinOnboardingWindow() {
    return this.namespaces.isWithinOnboardingWindow();
  }

  isValidLabelOrNamespace(value: string) {
    return isValidLabelOrNamespace(value);
  }

  authorizationDigest(request: AuthorizationRequest) {
    return this.authorizer.digest(normalizeRequest(request));
  }

  get authorizationDomain() {
    return this.authorizer.domain;
  }

  verifyProof(request: AuthorizationRequest, proof: string) {
    const normalized = normalizeRequest(request);
    return this.authorizer.verify(normalized, proof, normalized.recipient);
  }

  pendingFees(identity: string) {
    return this.fees.pendingBalance(toAddress(identity));
  }

  operator() {
    return this.operatorRole.current();
  }

  pendingOperator() {
    return this.operatorRole.pending();
  }

  private mutate<T>(ctx: CallContext, operation: (call: CallContext) => T): T {
    return this.store.transact(() => {
      if (ctx.value < 0n) {
        throw new RegistryError("insufficient_payment", "negative_value");
      }
      return operation({ caller: toAddress(ctx.caller), value: ctx.value });
    });
  }
}

const normalizeRequest = (request: AuthorizationRequest): AuthorizationRequest => ({
  recipient: toAddress(request.recipient),
  label: request.label,
  namespace: request.namespace
});

export const createRegistry = (options: RegistryOptions) => new Registry(options);
