import assert from "node:assert/strict";
import { computeAddress, concat, getBytes, hexlify, SigningKey, toBeHex, toBigInt } from "ethers";
import type { RegistryFailureCode } from "@nameledger/shared";
import { SECP256K1_ORDER, signAuthorization } from "../authorizer.js";
import { InMemoryBurnLedger } from "../collaborators/burnLedger.js";
import { InMemoryDelegateDirectory } from "../collaborators/delegates.js";
import { InMemoryValueLedger } from "../collaborators/valueLedger.js";
import { RegistryError } from "../errors.js";
import type { RegistryEvent } from "../events.js";
import { createRegistry, type Registry } from "../registry.js";
import type { Address, CallContext } from "../types.js";

export const UNIT = 10n ** 18n;
export const MILLI = 10n ** 15n;
export const DAY = 24 * 60 * 60;
export const GENESIS = 1_700_000_000;
export const CHAIN_ID = 31337n;
export const REGISTRY_ADDRESS = `0x${"c0de".padStart(40, "0")}`;

export type Party = { key: SigningKey; address: Address };

/** Deterministic placeholder keys: 0x…01, 0x…02 and so on. */
export const party = (seed: number): Party => {
  const key = new SigningKey(`0x${seed.toString(16).padStart(64, "0")}`);
  return { key, address: computeAddress(key.publicKey) };
};

export const createHarness = () => {
  let now = GENESIS;
  const burns = new InMemoryBurnLedger();
  const payouts = new InMemoryValueLedger();
  const delegates = new InMemoryDelegateDirectory();
  const operator = party(1);
  const registry = createRegistry({
    operator: operator.address,
    chainId: CHAIN_ID,
    registryAddress: REGISTRY_ADDRESS,
    burnLedger: burns,
    valueTransfer: payouts,
    delegates,
    clock: () => now
  });
  const events: RegistryEvent[] = [];
  registry.subscribe((event) => {
    events.push(event);
  });
  return {
    registry,
    burns,
    payouts,
    delegates,
    events,
    operator,
    alice: party(2),
    bob: party(3),
    carol: party(4),
    dave: party(5),
    now: () => now,
    advance: (seconds: number) => {
      now += seconds;
    }
  };
};

export type Harness = ReturnType<typeof createHarness>;

export const call = (who: Party | Address, value = 0n): CallContext => ({
  caller: typeof who === "string" ? who : who.address,
  value
});

export const sign = (registry: Registry, signer: Party, label: string, namespace: string, recipient?: Address) =>
  signAuthorization(signer.key, registry.authorizationDomain, {
    recipient: recipient ?? signer.address,
    label,
    namespace
  });

export const authFor = (recipient: Party, label: string, namespace: string) => ({
  recipient: recipient.address,
  label,
  namespace
});

/** Same signature with `s` mirrored into the upper half of the curve order. */
export const toHighS = (proof: string) => {
  const bytes = getBytes(proof);
  const mirrored = SECP256K1_ORDER - toBigInt(bytes.slice(32, 64));
  const v = bytes[64] === 27 ? 28 : 27;
  return concat([bytes.slice(0, 32), toBeHex(mirrored, 32), hexlify(new Uint8Array([v]))]);
};

export const expectRegistryError = (fn: () => unknown, code: RegistryFailureCode, detail?: string) => {
  assert.throws(fn, (error: unknown) => {
    assert.ok(error instanceof RegistryError, `expected RegistryError, got ${String(error)}`);
    assert.equal(error.code, code);
    if (detail !== undefined) {
      assert.equal(error.detail, detail);
    }
    return true;
  });
};

/** Public `xns` namespace at 0.001, created by alice at genesis. */
export const withXns = (h: Harness) => {
  h.registry.createPublicNamespace(call(h.alice, 50n * UNIT), "xns", MILLI);
  h.events.length = 0;
  return h;
};
