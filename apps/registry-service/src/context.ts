import {
  createRegistry,
  InMemoryBurnLedger,
  InMemoryDelegateDirectory,
  InMemoryValueLedger,
  type Clock,
  type Registry,
  type RegistryEvent
} from "@nameledger/registry";
import { config } from "./config.js";
import { log } from "./log.js";
import { metrics } from "./metrics.js";

export type RegistryContext = {
  registry: Registry;
  burns: InMemoryBurnLedger;
  payouts: InMemoryValueLedger;
  delegates: InMemoryDelegateDirectory;
};

const recordEvent = (event: RegistryEvent) => {
  switch (event.type) {
    case "name_registered":
      metrics.incCounter("names_registered_total");
      log.info("registry.name_registered", {
        label: event.label,
        namespace: event.namespace,
        owner: event.owner
      });
      return;
    case "namespace_registered":
      metrics.incCounter("namespaces_registered_total", { private: event.isPrivate });
      log.info("registry.namespace_registered", {
        namespace: event.namespace,
        price: event.price,
        creator: event.creator,
        isPrivate: event.isPrivate
      });
      return;
    case "fees_claimed":
      metrics.incCounter("fees_claimed_total");
      log.info("registry.fees_claimed", { recipient: event.recipient, amount: event.amount });
      return;
    case "operator_transfer_started":
      log.warn("registry.operator_transfer_started", {
        operator: event.operator,
        pendingOperator: event.pendingOperator
      });
      return;
    case "operator_transferred":
      log.warn("registry.operator_transferred", {
        previousOperator: event.previousOperator,
        operator: event.operator
      });
      return;
  }
};

/** One registry per process, backed by the in-memory collaborators. */
export const createRegistryContext = (options: { clock?: Clock } = {}): RegistryContext => {
  const burns = new InMemoryBurnLedger();
  const payouts = new InMemoryValueLedger();
  const delegates = new InMemoryDelegateDirectory();
  const registry = createRegistry({
    operator: config.OPERATOR_ADDRESS,
    chainId: config.CHAIN_ID,
    registryAddress: config.REGISTRY_ADDRESS,
    burnLedger: burns,
    valueTransfer: payouts,
    delegates,
    clock: options.clock,
    params: {
      exclusivityPeriod: config.EXCLUSIVITY_PERIOD_SECONDS,
      onboardingPeriod: config.ONBOARDING_PERIOD_SECONDS
    },
    onListenerError: (error, event) => {
      log.error("registry.listener_failed", { event: event.type, error });
    }
  });
  registry.subscribe(recordEvent);
  return { registry, burns, payouts, delegates };
};
