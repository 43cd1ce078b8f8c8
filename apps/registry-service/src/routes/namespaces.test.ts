import { test } from "node:test";
import assert from "node:assert/strict";
import { GENESIS, MILLI, UNIT, alice, bearer, bob, carol, configureTestEnv, operator, wei } from "../testUtils/callers.js";
import { startServer } from "../testUtils/server.js";

configureTestEnv();

test("public namespace creation and queries", async () => {
  const { app, context } = await startServer();
  const created = await app.inject({
    method: "POST",
    url: "/v1/namespaces/public",
    headers: await bearer(alice),
    payload: { namespace: "xns", price: wei(MILLI), value: wei(51n * UNIT) }
  });
  assert.equal(created.statusCode, 201);
  assert.deepEqual(created.json(), {
    namespace: "xns",
    price: "1000000000000000",
    creator: alice.address,
    createdAt: GENESIS,
    isPrivate: false
  });
  assert.equal(context.payouts.balanceOf(alice.address), UNIT);
  assert.equal(context.burns.burned(alice.address), 45n * UNIT);

  const price = await app.inject({ method: "GET", url: "/v1/namespaces/xns/price" });
  assert.deepEqual(price.json(), { namespace: "xns", price: "1000000000000000" });
  const byPrice = await app.inject({ method: "GET", url: "/v1/namespaces/by-price/1000000000000000" });
  assert.deepEqual(byPrice.json(), { price: "1000000000000000", namespace: "xns" });
  const window = await app.inject({ method: "GET", url: "/v1/namespaces/xns/exclusivity" });
  assert.deepEqual(window.json(), {
    namespace: "xns",
    withinExclusivityWindow: true,
    withinOnboardingWindow: true
  });
  await app.close();
});

test("the bare namespace exists from the start", async () => {
  const { app } = await startServer();
  const response = await app.inject({ method: "GET", url: "/v1/namespaces/x" });
  assert.deepEqual(response.json(), {
    namespace: "x",
    price: "100000000000000000000",
    creator: operator.address,
    createdAt: GENESIS,
    isPrivate: false
  });
  await app.close();
});

test("registry failures map onto HTTP statuses", async () => {
  const { app } = await startServer();
  const headers = await bearer(alice);

  const reserved = await app.inject({
    method: "POST",
    url: "/v1/namespaces/public",
    headers,
    payload: { namespace: "eth", price: wei(MILLI), value: wei(50n * UNIT) }
  });
  assert.equal(reserved.statusCode, 400);
  assert.equal(reserved.json().error, "reserved_namespace");

  const underpaid = await app.inject({
    method: "POST",
    url: "/v1/namespaces/private",
    headers,
    payload: { namespace: "club", price: wei(5n * MILLI), value: wei(UNIT) }
  });
  assert.equal(underpaid.statusCode, 402);
  assert.deepEqual(underpaid.json(), {
    error: "insufficient_payment",
    message: "InsufficientPayment",
    details: "required:10000000000000000000"
  });

  const missing = await app.inject({ method: "GET", url: "/v1/namespaces/nope" });
  assert.equal(missing.statusCode, 404);
  assert.equal(missing.json().error, "namespace_not_found");

  const taken = await app.inject({
    method: "POST",
    url: "/v1/namespaces/public",
    headers,
    payload: { namespace: "x", price: wei(2n * MILLI), value: wei(50n * UNIT) }
  });
  assert.equal(taken.statusCode, 409);
  assert.equal(taken.json().error, "namespace_exists");
  await app.close();
});

test("operator onboarding creates namespaces for someone else", async () => {
  const { app, context } = await startServer();
  const denied = await app.inject({
    method: "POST",
    url: "/v1/namespaces/private/onboard",
    headers: await bearer(bob),
    payload: { namespace: "club", price: wei(5n * MILLI), creator: carol.address }
  });
  assert.equal(denied.statusCode, 403);
  assert.equal(denied.json().details, "not_operator");

  const onboarded = await app.inject({
    method: "POST",
    url: "/v1/namespaces/private/onboard",
    headers: await bearer(operator),
    payload: { namespace: "club", price: wei(5n * MILLI), creator: carol.address }
  });
  assert.equal(onboarded.statusCode, 201);
  assert.equal(onboarded.json().creator, carol.address);
  assert.equal(onboarded.json().isPrivate, true);
  assert.equal(context.burns.totalBurned(), 0n);
  await app.close();
});
