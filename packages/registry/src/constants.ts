import type { RegistryParams } from "./types.js";

const WEI_PER_UNIT = 10n ** 18n;
const DAY = 24 * 60 * 60;

/** Namespace that holds bare names: `alice` and `alice.x` are the same name. */
export const BARE_NAMESPACE = "x";

/** The network's canonical top-level name can never be a namespace. */
export const RESERVED_NAMESPACE = "eth";

export const NAME_SEPARATOR = ".";

export const MAX_LABEL_LENGTH = 20;

export const BASIS_POINTS = 10_000n;
export const BURN_BPS = 9_000n;
export const CREATOR_BPS = 500n;

export const DELEGATE_MAGIC_VALUE = "0x1626ba7e";

export const AUTHORIZATION_DOMAIN_NAME = "NameLedger";
export const AUTHORIZATION_DOMAIN_VERSION = "1";

export const AUTHORIZATION_TYPES = {
  RegisterNameAuth: [
    { name: "recipient", type: "address" },
    { name: "label", type: "string" },
    { name: "namespace", type: "string" }
  ]
};

export const DEFAULT_REGISTRY_PARAMS: Omit<RegistryParams, "chainId" | "registryAddress"> = {
  exclusivityPeriod: 30 * DAY,
  onboardingPeriod: 90 * DAY,
  priceStep: WEI_PER_UNIT / 1000n,
  publicMinPrice: WEI_PER_UNIT / 1000n,
  privateMinPrice: (5n * WEI_PER_UNIT) / 1000n,
  publicNamespaceFee: 50n * WEI_PER_UNIT,
  privateNamespaceFee: 10n * WEI_PER_UNIT,
  bareNamePrice: 100n * WEI_PER_UNIT
};
