import { SigningKey } from "ethers";
import { buildAuthorizationDomain, signAuthorization, toAddress } from "@nameledger/registry";
import { loadSignerEnv, type CliEnv } from "../env.js";

/**
 * Produces the direct-key proof a sponsor submits with a sponsored
 * registration. The key in SIGNER_PRIVATE_KEY must belong to the recipient.
 */
export const authSign = (args: string[], env: CliEnv = process.env) => {
  const [recipient, label, namespace] = args;
  if (!recipient || !label || !namespace) {
    throw new Error("usage: auth:sign <recipient> <label> <namespace>");
  }
  const signerEnv = loadSignerEnv(env);
  const key = new SigningKey(signerEnv.SIGNER_PRIVATE_KEY);
  const domain = buildAuthorizationDomain(BigInt(signerEnv.CHAIN_ID), toAddress(signerEnv.REGISTRY_ADDRESS));
  const request = { recipient: toAddress(recipient), label, namespace };
  return { request, proof: signAuthorization(key, domain, request) };
};
