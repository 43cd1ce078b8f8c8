import { test } from "node:test";
import assert from "node:assert/strict";
import { MILLI, UNIT, alice, bearer, bob, carol, configureTestEnv, operator, wei } from "../testUtils/callers.js";
import { startServer } from "../testUtils/server.js";

configureTestEnv();

test("fees accrue, are claimed, and cannot be claimed twice", async () => {
  const { app, context } = await startServer();
  await app.inject({
    method: "POST",
    url: "/v1/namespaces/public",
    headers: await bearer(alice),
    payload: { namespace: "xns", price: wei(MILLI), value: wei(50n * UNIT) }
  });

  const pending = await app.inject({ method: "GET", url: `/v1/fees/pending/${operator.address}` });
  assert.deepEqual(pending.json(), { address: operator.address, pending: "5000000000000000000" });

  const claimed = await app.inject({
    method: "POST",
    url: "/v1/fees/claim",
    headers: await bearer(operator),
    payload: { recipient: carol.address }
  });
  assert.equal(claimed.statusCode, 200);
  assert.deepEqual(claimed.json(), { recipient: carol.address, amount: "5000000000000000000" });
  assert.equal(context.payouts.balanceOf(carol.address), 5n * UNIT);

  const empty = await app.inject({
    method: "POST",
    url: "/v1/fees/claim-self",
    headers: await bearer(operator)
  });
  assert.equal(empty.statusCode, 409);
  assert.equal(empty.json().error, "nothing_to_claim");
  await app.close();
});

test("a refused payout surfaces as a transfer failure", async () => {
  const { app, context } = await startServer();
  await app.inject({
    method: "POST",
    url: "/v1/namespaces/public",
    headers: await bearer(alice),
    payload: { namespace: "xns", price: wei(MILLI), value: wei(50n * UNIT) }
  });
  context.payouts.refuse(operator.address);

  const response = await app.inject({
    method: "POST",
    url: "/v1/fees/claim-self",
    headers: await bearer(operator)
  });
  assert.equal(response.statusCode, 502);
  assert.equal(response.json().error, "transfer_failed");
  assert.equal(context.registry.pendingFees(operator.address), 5n * UNIT);
  await app.close();
});

test("operator handover over HTTP", async () => {
  const { app } = await startServer();
  const proposed = await app.inject({
    method: "POST",
    url: "/v1/operator/transfer",
    headers: await bearer(operator),
    payload: { newOperator: bob.address }
  });
  assert.deepEqual(proposed.json(), { operator: operator.address, pendingOperator: bob.address });

  const stranger = await app.inject({
    method: "POST",
    url: "/v1/operator/accept",
    headers: await bearer(carol)
  });
  assert.equal(stranger.statusCode, 403);
  assert.equal(stranger.json().details, "not_pending_operator");

  const accepted = await app.inject({
    method: "POST",
    url: "/v1/operator/accept",
    headers: await bearer(bob)
  });
  assert.deepEqual(accepted.json(), { operator: bob.address, pendingOperator: null });
  const current = await app.inject({ method: "GET", url: "/v1/operator" });
  assert.deepEqual(current.json(), { operator: bob.address, pendingOperator: null });
  await app.close();
});
