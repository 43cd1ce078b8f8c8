import { GENESIS } from "./callers.js";

/** Fresh registry and server per call; config is loaded lazily so env overrides land first. */
export const startServer = async () => {
  const { buildServer } = await import("../server.js");
  const { createRegistryContext } = await import("../context.js");
  let now = GENESIS;
  const context = createRegistryContext({ clock: () => now });
  const app = buildServer({ context });
  await app.ready();
  return {
    app,
    context,
    advance: (seconds: number) => {
      now += seconds;
    }
  };
};
