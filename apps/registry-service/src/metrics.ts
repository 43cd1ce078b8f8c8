import { createMetricsRegistry } from "@nameledger/shared";

export const metrics = createMetricsRegistry({ service: "registry-service" });

const registerRegistryMetrics = () => {
  metrics.incCounter("names_registered_total", {}, 0);
  metrics.incCounter("namespaces_registered_total", {}, 0);
  metrics.incCounter("fees_claimed_total", {}, 0);
  metrics.incCounter("batch_items_skipped_total", {}, 0);
};

registerRegistryMetrics();
