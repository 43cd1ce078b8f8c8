import { buildServer } from "./server.js";
import { config } from "./config.js";
import { log } from "./log.js";

const app = buildServer();

app
  .listen({ port: config.PORT, host: config.SERVICE_BIND_ADDRESS })
  .then((address) => {
    log.info("listening", { address, chainId: config.CHAIN_ID, registry: config.REGISTRY_ADDRESS });
  })
  .catch((error) => {
    log.error("failed to start", { error });
    process.exit(1);
  });
