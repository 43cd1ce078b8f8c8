import { SignJWT } from "jose";
import { computeAddress, SigningKey } from "ethers";

export const TEST_SECRET = "test-secret-test-secret-test-secret";
export const TEST_AUDIENCE = "nameledger.registry";
export const GENESIS = 1_700_000_000;
export const UNIT = 10n ** 18n;
export const MILLI = 10n ** 15n;

const textEncoder = new TextEncoder();

export type Party = { key: SigningKey; address: string };

export const party = (seed: number): Party => {
  const key = new SigningKey(`0x${seed.toString(16).padStart(64, "0")}`);
  return { key, address: computeAddress(key.publicKey) };
};

export const operator = party(1);
export const alice = party(2);
export const bob = party(3);
export const carol = party(4);

/** Must run before config.ts is first imported. */
export const configureTestEnv = (overrides: Record<string, string | undefined> = {}) => {
  process.env.NODE_ENV = "test";
  process.env.SERVICE_JWT_SECRET = TEST_SECRET;
  process.env.SERVICE_JWT_AUDIENCE = TEST_AUDIENCE;
  process.env.ALLOW_INSECURE_DEV_AUTH = "false";
  process.env.OPERATOR_ADDRESS = operator.address;
  process.env.CHAIN_ID = "31337";
  process.env.REGISTRY_ADDRESS = "0x000000000000000000000000000000000000c0de";
  delete process.env.SERVICE_JWT_ISSUER;
  delete process.env.EXCLUSIVITY_PERIOD_SECONDS;
  delete process.env.ONBOARDING_PERIOD_SECONDS;
  for (const [name, value] of Object.entries(overrides)) {
    if (value === undefined) {
      delete process.env[name];
    } else {
      process.env[name] = value;
    }
  }
};

export const tokenFor = async (who: Party | string, scope: string = "registry:write") =>
  new SignJWT({ scope })
    .setProtectedHeader({ alg: "HS256" })
    .setSubject(typeof who === "string" ? who : who.address)
    .setAudience(TEST_AUDIENCE)
    .setIssuedAt()
    .setExpirationTime("5m")
    .sign(textEncoder.encode(TEST_SECRET));

export const bearer = async (who: Party | string, scope?: string) => ({
  authorization: `Bearer ${await tokenFor(who, scope)}`
});

export const wei = (value: bigint) => value.toString();
