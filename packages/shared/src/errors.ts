export type RegistryFailureCode =
  | "invalid_syntax"
  | "reserved_namespace"
  | "invalid_price"
  | "invalid_recipient"
  | "invalid_batch"
  | "name_already_registered"
  | "namespace_exists"
  | "price_in_use"
  | "identity_already_bound"
  | "namespace_not_found"
  | "policy_violation"
  | "insufficient_payment"
  | "invalid_proof"
  | "nothing_to_claim"
  | "no_successful_registrations"
  | "transfer_failed"
  | "burn_failed"
  | "reentrant_call";

export type ErrorCode =
  | RegistryFailureCode
  | "invalid_request"
  | "not_found"
  | "unauthorized"
  | "forbidden"
  | "service_auth_not_configured"
  | "service_auth_scope_missing"
  | "rate_limited"
  | "internal_error";

export type FailureClass =
  | "SyntaxError"
  | "InvalidInput"
  | "AlreadyExists"
  | "AlreadyBound"
  | "NotFound"
  | "PolicyViolation"
  | "InsufficientPayment"
  | "InvalidProof"
  | "NothingToClaim"
  | "NoSuccessfulRegistrations"
  | "TransferFailure"
  | "Reentrancy";

const FAILURE_CLASSES: Record<RegistryFailureCode, FailureClass> = {
  invalid_syntax: "SyntaxError",
  reserved_namespace: "SyntaxError",
  invalid_price: "InvalidInput",
  invalid_recipient: "InvalidInput",
  invalid_batch: "InvalidInput",
  name_already_registered: "AlreadyExists",
  namespace_exists: "AlreadyExists",
  price_in_use: "AlreadyExists",
  identity_already_bound: "AlreadyBound",
  namespace_not_found: "NotFound",
  policy_violation: "PolicyViolation",
  insufficient_payment: "InsufficientPayment",
  invalid_proof: "InvalidProof",
  nothing_to_claim: "NothingToClaim",
  no_successful_registrations: "NoSuccessfulRegistrations",
  transfer_failed: "TransferFailure",
  burn_failed: "TransferFailure",
  reentrant_call: "Reentrancy"
};

const HTTP_STATUS: Record<FailureClass, number> = {
  SyntaxError: 400,
  InvalidInput: 400,
  AlreadyExists: 409,
  AlreadyBound: 409,
  NotFound: 404,
  PolicyViolation: 403,
  InsufficientPayment: 402,
  InvalidProof: 401,
  NothingToClaim: 409,
  NoSuccessfulRegistrations: 409,
  TransferFailure: 502,
  Reentrancy: 409
};

export const failureClassOf = (code: RegistryFailureCode): FailureClass => FAILURE_CLASSES[code];

export const httpStatusOf = (code: RegistryFailureCode) => HTTP_STATUS[FAILURE_CLASSES[code]];

export const isRegistryFailureCode = (value: string): value is RegistryFailureCode =>
  Object.prototype.hasOwnProperty.call(FAILURE_CLASSES, value);

export type ErrorResponse = {
  error: ErrorCode;
  message: string;
  details?: string;
  debug?: { cause?: string; hint?: string };
};

type ErrorOptions = {
  details?: string;
  debug?: { cause?: string; hint?: string };
  devMode?: boolean;
};

export const makeErrorResponse = (
  error: ErrorCode,
  message: string,
  options: ErrorOptions = {}
): ErrorResponse => {
  const response: ErrorResponse = { error, message };
  if (options.details) {
    response.details = options.details;
  }
  if (options.devMode && options.debug) {
    response.debug = options.debug;
  }
  return response;
};
