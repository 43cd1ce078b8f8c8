export { createRegistry, Registry } from "./registry.js";
export type { RegistryOptions } from "./registry.js";
export {
  IdentityAuthorizer,
  authorizationDigest,
  buildAuthorizationDomain,
  signAuthorization,
  SECP256K1_ORDER
} from "./authorizer.js";
export type { VerificationFailure, VerificationOutcome } from "./authorizer.js";
export { splitPayment } from "./feeLedger.js";
export type { FeeSplit } from "./feeLedger.js";
export type { BatchOutcome } from "./batch.js";
export type { NamespaceInfo } from "./namespaces.js";
export { formatName, parseFullName } from "./names.js";
export { isValidLabelOrNamespace, isValidNamespace } from "./syntax.js";
export { RegistryError, isRegistryError } from "./errors.js";
export type { PolicyDetail } from "./errors.js";
export { toAddress, ZERO_ADDRESS } from "./identity.js";
export { InMemoryBurnLedger } from "./collaborators/burnLedger.js";
export type { BurnLedger } from "./collaborators/burnLedger.js";
export { InMemoryValueLedger } from "./collaborators/valueLedger.js";
export type { ValueTransfer } from "./collaborators/valueLedger.js";
export { InMemoryDelegateDirectory } from "./collaborators/delegates.js";
export type { DelegateDirectory, DelegateValidator } from "./collaborators/delegates.js";
export type { TransactionParticipant, ListenerErrorHandler } from "./store.js";
export type { RegistryEvent, RegistryEventListener } from "./events.js";
export {
  AUTHORIZATION_TYPES,
  BARE_NAMESPACE,
  DEFAULT_REGISTRY_PARAMS,
  DELEGATE_MAGIC_VALUE,
  RESERVED_NAMESPACE
} from "./constants.js";
export type {
  Address,
  AuthorizationRequest,
  CallContext,
  Clock,
  NamespaceRecord,
  RegistryParams,
  Visibility
} from "./types.js";
