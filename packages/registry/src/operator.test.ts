import { test } from "node:test";
import assert from "node:assert/strict";
import { DAY, MILLI, UNIT, call, createHarness, expectRegistryError, withXns } from "./testUtils/fixtures.js";

test("operator: handover takes a proposal and an acceptance", () => {
  const h = createHarness();
  h.registry.transferOperator(call(h.operator), h.bob.address);
  assert.equal(h.registry.operator(), h.operator.address);
  assert.equal(h.registry.pendingOperator(), h.bob.address);

  h.registry.acceptOperator(call(h.bob));
  assert.equal(h.registry.operator(), h.bob.address);
  assert.equal(h.registry.pendingOperator(), null);
  assert.deepEqual(h.events, [
    { type: "operator_transfer_started", operator: h.operator.address, pendingOperator: h.bob.address },
    { type: "operator_transferred", previousOperator: h.operator.address, operator: h.bob.address }
  ]);
});

test("operator: only the operator proposes and only the proposed party accepts", () => {
  const h = createHarness();
  expectRegistryError(
    () => h.registry.transferOperator(call(h.alice), h.alice.address),
    "policy_violation",
    "not_operator"
  );
  expectRegistryError(() => h.registry.acceptOperator(call(h.bob)), "policy_violation", "not_pending_operator");

  h.registry.transferOperator(call(h.operator), h.bob.address);
  expectRegistryError(() => h.registry.acceptOperator(call(h.carol)), "policy_violation", "not_pending_operator");
  assert.equal(h.registry.operator(), h.operator.address);
});

test("operator: proposing the zero address cancels", () => {
  const h = createHarness();
  h.registry.transferOperator(call(h.operator), h.bob.address);
  h.registry.transferOperator(call(h.operator), `0x${"0".repeat(40)}`);
  assert.equal(h.registry.pendingOperator(), null);
  expectRegistryError(() => h.registry.acceptOperator(call(h.bob)), "policy_violation", "not_pending_operator");
});

test("operator: fees accrue to whoever holds the role at settlement", () => {
  const h = withXns(createHarness());
  h.registry.transferOperator(call(h.operator), h.bob.address);
  h.registry.acceptOperator(call(h.bob));
  h.advance(30 * DAY + 1);
  h.registry.registerDirect(call(h.carol, MILLI), "carol", "xns");

  assert.equal(h.registry.pendingFees(h.operator.address), 5n * UNIT);
  assert.equal(h.registry.pendingFees(h.bob.address), 50_000_000_000_000n);
  // the old operator's accrued balance stays claimable
  assert.equal(h.registry.claimToSelf(call(h.operator)), 5n * UNIT);
});

test("operator: the new operator takes over onboarding", () => {
  const h = createHarness();
  h.registry.transferOperator(call(h.operator), h.bob.address);
  h.registry.acceptOperator(call(h.bob));
  expectRegistryError(
    () => h.registry.createPublicNamespaceFor(call(h.operator), h.carol.address, "gm", MILLI),
    "policy_violation",
    "not_operator"
  );
  h.registry.createPublicNamespaceFor(call(h.bob), h.carol.address, "gm", MILLI);
  assert.equal(h.registry.namespaceInfo("gm").creator, h.carol.address);
});
