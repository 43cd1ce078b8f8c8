import { test } from "node:test";
import assert from "node:assert/strict";
import { signAuthorization } from "@nameledger/registry";
import {
  GENESIS,
  MILLI,
  UNIT,
  alice,
  bearer,
  bob,
  carol,
  configureTestEnv,
  wei,
  type Party
} from "../testUtils/callers.js";
import { startServer } from "../testUtils/server.js";

configureTestEnv();

type Started = Awaited<ReturnType<typeof startServer>>;

const createXns = async ({ app }: Started) => {
  const response = await app.inject({
    method: "POST",
    url: "/v1/namespaces/public",
    headers: await bearer(alice),
    payload: { namespace: "xns", price: wei(MILLI), value: wei(50n * UNIT) }
  });
  assert.equal(response.statusCode, 201);
};

const authorization = (server: Started, recipient: Party, label: string, namespace = "xns") => {
  const request = { recipient: recipient.address, label, namespace };
  return {
    request,
    proof: signAuthorization(recipient.key, server.context.registry.authorizationDomain, request)
  };
};

test("sponsored registration of bob.xns resolves both ways", async () => {
  const server = await startServer();
  await createXns(server);
  const { app } = server;

  const registered = await app.inject({
    method: "POST",
    url: "/v1/names/register-sponsored",
    headers: await bearer(alice),
    payload: { ...authorization(server, bob, "bob"), value: wei(MILLI) }
  });
  assert.equal(registered.statusCode, 201);
  assert.deepEqual(registered.json(), { name: "bob.xns", owner: bob.address });

  const byName = await app.inject({ method: "GET", url: "/v1/names/resolve?name=bob.xns" });
  assert.deepEqual(byName.json(), { address: bob.address });
  const byParts = await app.inject({ method: "GET", url: "/v1/names/resolve?label=bob&namespace=xns" });
  assert.deepEqual(byParts.json(), { address: bob.address });
  const reverse = await app.inject({
    method: "GET",
    url: `/v1/names/by-address/${bob.address.toLowerCase()}`
  });
  assert.deepEqual(reverse.json(), { name: "bob.xns" });
  const unknown = await app.inject({ method: "GET", url: "/v1/names/resolve?name=ghost" });
  assert.deepEqual(unknown.json(), { address: null });
  await app.close();
});

test("resolve needs a name or a label and namespace", async () => {
  const { app } = await startServer();
  const response = await app.inject({ method: "GET", url: "/v1/names/resolve?label=bob" });
  assert.equal(response.statusCode, 400);
  assert.equal(response.json().error, "invalid_request");
  await app.close();
});

test("direct registration honours the exclusivity window", async () => {
  const server = await startServer();
  await createXns(server);
  const { app } = server;
  const attempt = async () =>
    app.inject({
      method: "POST",
      url: "/v1/names/register",
      headers: await bearer(bob),
      payload: { label: "bob", namespace: "xns", value: wei(MILLI) }
    });

  const early = await attempt();
  assert.equal(early.statusCode, 403);
  assert.deepEqual(early.json(), {
    error: "policy_violation",
    message: "PolicyViolation",
    details: "exclusivity_period"
  });

  server.advance(30 * 24 * 60 * 60 + 1);
  const late = await attempt();
  assert.equal(late.statusCode, 201);
  assert.deepEqual(late.json(), { name: "bob.xns", owner: bob.address });

  const again = await attempt();
  assert.equal(again.statusCode, 409);
  assert.equal(again.json().error, "identity_already_bound");
  await app.close();
});

test("mutations require a caller token with the write scope", async () => {
  const server = await startServer();
  const { app } = server;
  const payload = { label: "bob", namespace: "x", value: wei(100n * UNIT) };

  const missing = await app.inject({ method: "POST", url: "/v1/names/register", payload });
  assert.equal(missing.statusCode, 401);
  assert.equal(missing.json().error, "unauthorized");

  const readOnly = await app.inject({
    method: "POST",
    url: "/v1/names/register",
    headers: await bearer(bob, "registry:read"),
    payload
  });
  assert.equal(readOnly.statusCode, 403);
  assert.equal(readOnly.json().error, "service_auth_scope_missing");

  const garbage = await app.inject({
    method: "POST",
    url: "/v1/names/register",
    headers: { authorization: "Bearer not-a-token" },
    payload
  });
  assert.equal(garbage.statusCode, 401);
  await app.close();
});

test("malformed bodies are rejected before reaching the registry", async () => {
  const { app } = await startServer();
  const response = await app.inject({
    method: "POST",
    url: "/v1/names/register",
    headers: await bearer(bob),
    payload: { label: "bob", namespace: "x", value: "1.5" }
  });
  assert.equal(response.statusCode, 400);
  assert.equal(response.json().error, "invalid_request");
  assert.equal(response.json().details, "value: decimal_wei_expected");
  await app.close();
});

test("batch registration reports skipped positions", async () => {
  const server = await startServer();
  await createXns(server);
  const { app } = server;
  const first = authorization(server, carol, "carol");
  const seeded = await app.inject({
    method: "POST",
    url: "/v1/names/register-sponsored",
    headers: await bearer(alice),
    payload: { ...first, value: wei(MILLI) }
  });
  assert.equal(seeded.statusCode, 201);

  const items = [authorization(server, bob, "bob"), authorization(server, carol, "carol2")];
  const response = await app.inject({
    method: "POST",
    url: "/v1/names/register-batch",
    headers: await bearer(alice),
    payload: {
      requests: items.map((item) => item.request),
      proofs: items.map((item) => item.proof),
      value: wei(2n * MILLI)
    }
  });
  assert.equal(response.statusCode, 201);
  assert.deepEqual(response.json(), { registered: 1, skipped: [1] });
  assert.equal(server.context.payouts.balanceOf(alice.address), MILLI);
  await app.close();
});

test("a forged proof is an authorization failure", async () => {
  const server = await startServer();
  await createXns(server);
  const { app } = server;
  const forged = authorization(server, carol, "bob");
  const response = await app.inject({
    method: "POST",
    url: "/v1/names/register-sponsored",
    headers: await bearer(alice),
    payload: { request: { ...forged.request, recipient: bob.address }, proof: forged.proof, value: wei(MILLI) }
  });
  assert.equal(response.statusCode, 401);
  assert.deepEqual(response.json(), {
    error: "invalid_proof",
    message: "InvalidProof",
    details: "signer_mismatch"
  });
  assert.equal(server.context.registry.resolveName(bob.address), "");
  assert.equal(server.context.registry.genesisAt, GENESIS);
  await app.close();
});
