import { test } from "node:test";
import assert from "node:assert/strict";
import { SignJWT } from "jose";
import { extractBearerToken, verifyCallerToken } from "./serviceAuth.js";

const secret = "test-secret-test-secret-test-secret";
const audience = "nameledger.registry";
const caller = "0x00000000000000000000000000000000000000aa";

const signToken = (claims: Record<string, unknown>, subject = caller, aud = audience) =>
  new SignJWT(claims)
    .setProtectedHeader({ alg: "HS256" })
    .setAudience(aud)
    .setSubject(subject)
    .setIssuedAt()
    .setExpirationTime("2m")
    .sign(new TextEncoder().encode(secret));

test("caller token: accepts a scoped token and returns the subject", async () => {
  const token = await signToken({ scope: "registry:write registry:read" });
  const verified = await verifyCallerToken(token, {
    audience,
    secret,
    requiredScopes: ["registry:write"]
  });
  assert.equal(verified.caller, caller);
  assert.deepEqual(verified.scopes, ["registry:write", "registry:read"]);
});

test("caller token: rejects wrong audience and wrong secret", async () => {
  const token = await signToken({ scope: ["registry:write"] });
  await assert.rejects(verifyCallerToken(token, { audience: "other", secret }));
  await assert.rejects(verifyCallerToken(token, { audience, secret: `${secret}-other` }));
});

test("caller token: rejects missing scope", async () => {
  const token = await signToken({ scope: ["registry:read"] });
  await assert.rejects(
    verifyCallerToken(token, { audience, secret, requiredScopes: ["registry:write"] }),
    /jwt_missing_required_scope/
  );
});

test("caller token: subject must be an address", async () => {
  const token = await signToken({ scope: ["registry:write"] }, "app-gateway");
  await assert.rejects(verifyCallerToken(token, { audience, secret }), /jwt_subject_not_address/);
});

test("bearer extraction", () => {
  assert.equal(extractBearerToken("Bearer abc"), "abc");
  assert.equal(extractBearerToken("Basic abc"), null);
  assert.equal(extractBearerToken(undefined), null);
});
