import { test } from "node:test";
import assert from "node:assert/strict";
import { splitPayment } from "./feeLedger.js";
import { DAY, MILLI, UNIT, call, createHarness, expectRegistryError, withXns } from "./testUtils/fixtures.js";

test("fees: split is 90/5/5 for public namespaces", () => {
  assert.deepEqual(splitPayment(1000n, false), { burn: 900n, creatorShare: 50n, operatorShare: 50n });
  assert.deepEqual(splitPayment(MILLI, false), {
    burn: 900_000_000_000_000n,
    creatorShare: 50_000_000_000_000n,
    operatorShare: 50_000_000_000_000n
  });
});

test("fees: private namespaces give the creator share to the operator", () => {
  assert.deepEqual(splitPayment(1000n, true), { burn: 900n, creatorShare: 0n, operatorShare: 100n });
});

test("fees: rounding dust goes to the operator and nothing is lost", () => {
  for (const amount of [0n, 1n, 7n, 999n, 123_456_789n]) {
    for (const isPrivate of [false, true]) {
      const { burn, creatorShare, operatorShare } = splitPayment(amount, isPrivate);
      assert.equal(burn + creatorShare + operatorShare, amount);
    }
  }
  assert.deepEqual(splitPayment(999n, false), { burn: 899n, creatorShare: 49n, operatorShare: 51n });
});

test("fees: claiming with nothing pending fails and changes nothing", () => {
  const h = createHarness();
  expectRegistryError(() => h.registry.claimToSelf(call(h.alice)), "nothing_to_claim");
  assert.equal(h.registry.pendingFees(h.alice.address), 0n);
  assert.equal(h.payouts.balanceOf(h.alice.address), 0n);
  assert.deepEqual(h.events, []);
});

test("fees: the operator claims its accrued balance", () => {
  const h = withXns(createHarness());
  const amount = h.registry.claimToSelf(call(h.operator));

  assert.equal(amount, 5n * UNIT);
  assert.equal(h.registry.pendingFees(h.operator.address), 0n);
  assert.equal(h.payouts.balanceOf(h.operator.address), 5n * UNIT);
  assert.deepEqual(h.events, [{ type: "fees_claimed", recipient: h.operator.address, amount: 5n * UNIT }]);
  expectRegistryError(() => h.registry.claimToSelf(call(h.operator)), "nothing_to_claim");
});

test("fees: a creator claims to another address", () => {
  const h = withXns(createHarness());
  h.advance(30 * DAY + 1);
  h.registry.registerDirect(call(h.bob, MILLI), "bob", "xns");
  h.events.length = 0;

  const amount = h.registry.claim(call(h.alice), h.carol.address.toLowerCase());
  assert.equal(amount, 50_000_000_000_000n);
  assert.equal(h.payouts.balanceOf(h.carol.address), 50_000_000_000_000n);
  assert.equal(h.payouts.balanceOf(h.alice.address), 0n);
  assert.equal(h.registry.pendingFees(h.alice.address), 0n);
  assert.deepEqual(h.events, [{ type: "fees_claimed", recipient: h.carol.address, amount }]);
});

test("fees: claiming to the zero address is rejected", () => {
  const h = withXns(createHarness());
  expectRegistryError(() => h.registry.claim(call(h.operator), `0x${"0".repeat(40)}`), "invalid_recipient");
  assert.equal(h.registry.pendingFees(h.operator.address), 5n * UNIT);
});

test("fees: a refused payout keeps the balance claimable", () => {
  const h = withXns(createHarness());
  h.payouts.refuse(h.operator.address);

  expectRegistryError(() => h.registry.claimToSelf(call(h.operator)), "transfer_failed");
  assert.equal(h.registry.pendingFees(h.operator.address), 5n * UNIT);
  assert.deepEqual(h.events, []);

  h.registry.claim(call(h.operator), h.dave.address);
  assert.equal(h.payouts.balanceOf(h.dave.address), 5n * UNIT);
});

test("fees: a failing burn aborts the operation", () => {
  const h = createHarness();
  const original = h.burns.burn.bind(h.burns);
  h.burns.burn = () => {
    throw new Error("ledger_offline");
  };

  expectRegistryError(
    () => h.registry.createPublicNamespace(call(h.alice, 50n * UNIT), "xns", MILLI),
    "burn_failed",
    "ledger_offline"
  );
  expectRegistryError(() => h.registry.namespaceInfo("xns"), "namespace_not_found");
  assert.equal(h.registry.pendingFees(h.operator.address), 0n);

  h.burns.burn = original;
  h.registry.createPublicNamespace(call(h.alice, 50n * UNIT), "xns", MILLI);
  assert.equal(h.burns.totalBurned(), 45n * UNIT);
});
