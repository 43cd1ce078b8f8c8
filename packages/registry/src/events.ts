import type { Address } from "./types.js";

export type RegistryEvent =
  | { type: "name_registered"; label: string; namespace: string; owner: Address }
  | {
      type: "namespace_registered";
      namespace: string;
      price: bigint;
      creator: Address;
      isPrivate: boolean;
    }
  | { type: "fees_claimed"; recipient: Address; amount: bigint }
  | { type: "operator_transfer_started"; operator: Address; pendingOperator: Address }
  | { type: "operator_transferred"; previousOperator: Address; operator: Address };

export type RegistryEventListener = (event: RegistryEvent) => void;
