import {
  NamespaceInfoResponseSchema,
  PendingFeesResponseSchema,
  ResolveAddressResponseSchema,
  ResolveNameResponseSchema
} from "@nameledger/shared";
import type { CliEnv } from "../env.js";
import { getJson } from "../http.js";

const requireArg = (value: string | undefined, usage: string) => {
  if (!value) {
    throw new Error(`usage: ${usage}`);
  }
  return value;
};

export const nameResolve = (args: string[], env: CliEnv = process.env) => {
  const name = requireArg(args[0], "name:resolve <name>");
  return getJson(`/v1/names/resolve?name=${encodeURIComponent(name)}`, ResolveAddressResponseSchema, env);
};

export const nameOf = (args: string[], env: CliEnv = process.env) => {
  const address = requireArg(args[0], "name:of <address>");
  return getJson(`/v1/names/by-address/${encodeURIComponent(address)}`, ResolveNameResponseSchema, env);
};

export const namespaceInfo = (args: string[], env: CliEnv = process.env) => {
  const namespace = requireArg(args[0], "namespace:info <namespace>");
  return getJson(`/v1/namespaces/${encodeURIComponent(namespace)}`, NamespaceInfoResponseSchema, env);
};

export const feesPending = (args: string[], env: CliEnv = process.env) => {
  const address = requireArg(args[0], "fees:pending <address>");
  return getJson(`/v1/fees/pending/${encodeURIComponent(address)}`, PendingFeesResponseSchema, env);
};
