import {
  getBytes,
  hexlify,
  isHexString,
  recoverAddress,
  Signature,
  SigningKey,
  toBigInt,
  TypedDataEncoder,
  type TypedDataDomain
} from "ethers";
import {
  AUTHORIZATION_DOMAIN_NAME,
  AUTHORIZATION_DOMAIN_VERSION,
  AUTHORIZATION_TYPES,
  DELEGATE_MAGIC_VALUE
} from "./constants.js";
import type { DelegateDirectory } from "./collaborators/delegates.js";
import { sameAddress } from "./identity.js";
import type { Address, AuthorizationRequest } from "./types.js";

export const SECP256K1_ORDER = BigInt("0xfffffffffffffffffffffffffffffffebaaedce6af48a03bbfd25e8cd0364141");
const SECP256K1_HALF_ORDER = SECP256K1_ORDER / 2n;

export type VerificationFailure =
  | "proof_malformed"
  | "signature_high_s"
  | "signature_bad_v"
  | "signature_unrecoverable"
  | "signer_mismatch"
  | "delegate_rejected"
  | "delegate_call_failed";

export type VerificationOutcome = { ok: true } | { ok: false; reason: VerificationFailure; cause?: string };

export const buildAuthorizationDomain = (chainId: bigint, registryAddress: Address): TypedDataDomain => ({
  name: AUTHORIZATION_DOMAIN_NAME,
  version: AUTHORIZATION_DOMAIN_VERSION,
  chainId,
  verifyingContract: registryAddress
});

export const authorizationDigest = (domain: TypedDataDomain, request: AuthorizationRequest) =>
  TypedDataEncoder.hash(domain, AUTHORIZATION_TYPES, {
    recipient: request.recipient,
    label: request.label,
    namespace: request.namespace
  });

/** 65-byte `r || s || v` proof for the direct-key path. */
export const signAuthorization = (
  signingKey: SigningKey,
  domain: TypedDataDomain,
  request: AuthorizationRequest
) => signingKey.sign(authorizationDigest(domain, request)).serialized;

const inspectDirect = (digest: string, proof: string, claimedSigner: Address): VerificationOutcome => {
  if (!isHexString(proof, 65)) {
    return { ok: false, reason: "proof_malformed" };
  }
  const bytes = getBytes(proof);
  const r = hexlify(bytes.slice(0, 32));
  const s = hexlify(bytes.slice(32, 64));
  const v = bytes[64];
  if (v !== 27 && v !== 28) {
    return { ok: false, reason: "signature_bad_v" };
  }
  if (toBigInt(s) > SECP256K1_HALF_ORDER) {
    return { ok: false, reason: "signature_high_s" };
  }
  let recovered: Address;
  try {
    recovered = recoverAddress(digest, Signature.from({ r, s, v }));
  } catch (error) {
    return {
      ok: false,
      reason: "signature_unrecoverable",
      cause: error instanceof Error ? error.message : String(error)
    };
  }
  return sameAddress(recovered, claimedSigner) ? { ok: true } : { ok: false, reason: "signer_mismatch" };
};

/**
 * Decides whether `claimedSigner` authorized a registration request. Key
 * holders sign the EIP-712 digest; delegate identities are asked through
 * their validation callback. Stateless: there is no nonce and no expiry.
 */
export class IdentityAuthorizer {
  readonly domain: TypedDataDomain;
  private readonly delegates: DelegateDirectory;

  constructor(domain: TypedDataDomain, delegates: DelegateDirectory) {
    this.domain = domain;
    this.delegates = delegates;
  }

  digest(request: AuthorizationRequest) {
    return authorizationDigest(this.domain, request);
  }

  inspect(request: AuthorizationRequest, proof: string, claimedSigner: Address): VerificationOutcome {
    const digest = this.digest(request);
    const delegate = this.delegates.lookup(claimedSigner);
    if (!delegate) {
      return inspectDirect(digest, proof, claimedSigner);
    }
    if (!isHexString(proof)) {
      return { ok: false, reason: "proof_malformed" };
    }
    let answer: string;
    try {
      answer = delegate.isValidSignature(digest, proof);
    } catch (error) {
      return {
        ok: false,
        reason: "delegate_call_failed",
        cause: error instanceof Error ? error.message : String(error)
      };
    }
    return answer.toLowerCase() === DELEGATE_MAGIC_VALUE
      ? { ok: true }
      : { ok: false, reason: "delegate_rejected" };
  }

  verify(request: AuthorizationRequest, proof: string, claimedSigner: Address) {
    return this.inspect(request, proof, claimedSigner).ok;
  }
}
