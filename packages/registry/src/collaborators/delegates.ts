import type { Address } from "../types.js";

/**
 * Validation callback of an identity that signs through code rather than a
 * key (a contract wallet). Returns the magic value to accept.
 */
export interface DelegateValidator {
  isValidSignature(digest: string, signature: string): string;
}

export interface DelegateDirectory {
  lookup(identity: Address): DelegateValidator | undefined;
}

export class InMemoryDelegateDirectory implements DelegateDirectory {
  private readonly validators = new Map<string, DelegateValidator>();

  register(identity: Address, validator: DelegateValidator) {
    this.validators.set(identity.toLowerCase(), validator);
  }

  lookup(identity: Address) {
    return this.validators.get(identity.toLowerCase());
  }
}
