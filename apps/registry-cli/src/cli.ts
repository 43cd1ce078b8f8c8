import { authSign } from "./commands/authSign.js";
import { feesPending, nameOf, nameResolve, namespaceInfo } from "./commands/queries.js";

const commands: Record<string, (args: string[]) => unknown> = {
  "auth:sign": authSign,
  "name:resolve": nameResolve,
  "name:of": nameOf,
  "namespace:info": namespaceInfo,
  "fees:pending": feesPending
};

const [command, ...args] = process.argv.slice(2);

const run = async () => {
  const handler = command ? commands[command] : undefined;
  if (!handler) {
    throw new Error(`Unknown command. Available: ${Object.keys(commands).join(", ")}`);
  }
  const result = await handler(args);
  console.log(JSON.stringify(result, null, 2));
};

run().catch((error) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exit(1);
});
