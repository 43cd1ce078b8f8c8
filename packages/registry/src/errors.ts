import { failureClassOf, type FailureClass, type RegistryFailureCode } from "@nameledger/shared";

export type PolicyDetail =
  | "exclusivity_period"
  | "private_namespace"
  | "sponsor_not_creator"
  | "not_operator"
  | "not_pending_operator";

/**
 * Every registry failure. `message` is the code itself so callers that only
 * look at `error.message` still see a stable identifier.
 */
export class RegistryError extends Error {
  readonly code: RegistryFailureCode;
  readonly detail?: string;

  constructor(code: RegistryFailureCode, detail?: string) {
    super(code);
    this.name = "RegistryError";
    this.code = code;
    this.detail = detail;
  }

  get failureClass(): FailureClass {
    return failureClassOf(this.code);
  }
}

export const policyViolation = (detail: PolicyDetail) => new RegistryError("policy_violation", detail);

export const isRegistryError = (error: unknown): error is RegistryError => error instanceof RegistryError;
