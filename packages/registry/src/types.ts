/** EIP-55 checksummed 20-byte address. */
export type Address = string;

export type Visibility = "public" | "private";

export type NamespaceRecord = {
  price: bigint;
  creator: Address;
  /** Unix seconds. */
  createdAt: number;
  visibility: Visibility;
};

export type NameRecord = {
  label: string;
  namespace: string;
};

export type AuthorizationRequest = {
  recipient: Address;
  label: string;
  namespace: string;
};

/** Who is calling and how much native value rides along, in wei. */
export type CallContext = {
  caller: Address;
  value: bigint;
};

export type Clock = () => number;

export type RegistryParams = {
  chainId: bigint;
  registryAddress: Address;
  exclusivityPeriod: number;
  onboardingPeriod: number;
  priceStep: bigint;
  publicMinPrice: bigint;
  privateMinPrice: bigint;
  publicNamespaceFee: bigint;
  privateNamespaceFee: bigint;
  bareNamePrice: bigint;
};
