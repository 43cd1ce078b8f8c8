import { jwtVerify } from "jose";

const textEncoder = new TextEncoder();

const ADDRESS_PATTERN = /^0x[0-9a-fA-F]{40}$/;

export const extractBearerToken = (authHeader?: string) => {
  if (!authHeader?.startsWith("Bearer ")) {
    return null;
  }
  return authHeader.slice(7);
};

export type VerifiedCaller = {
  caller: string;
  scopes: string[];
  issuer?: string;
};

/**
 * Verifies an HS256 caller token. The `sub` claim names the calling identity,
 * i.e. the party that pays for and signs off on a registry mutation.
 */
export const verifyCallerToken = async (
  token: string,
  options: {
    audience: string;
    secret: string;
    issuer?: string;
    requiredScopes?: string[];
  }
): Promise<VerifiedCaller> => {
  const key = textEncoder.encode(options.secret);
  const { payload } = await jwtVerify(token, key, {
    audience: options.audience,
    issuer: options.issuer,
    algorithms: ["HS256"]
  });
  if (!payload.exp || !payload.aud || !payload.sub) {
    throw new Error("jwt_missing_required_claims");
  }
  if (!ADDRESS_PATTERN.test(payload.sub)) {
    throw new Error("jwt_subject_not_address");
  }
  const scopeValue = payload.scope;
  const tokenScopes = Array.isArray(scopeValue)
    ? scopeValue.map(String)
    : typeof scopeValue === "string"
      ? scopeValue.split(" ").filter(Boolean)
      : [];
  if (options.requiredScopes && options.requiredScopes.length > 0) {
    if (!options.requiredScopes.every((scope) => tokenScopes.includes(scope))) {
      throw new Error("jwt_missing_required_scope");
    }
  }
  return { caller: payload.sub, scopes: tokenScopes, issuer: payload.iss };
};
