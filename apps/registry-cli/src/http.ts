import type { ZodType } from "zod";
import { loadServiceEnv, type CliEnv } from "./env.js";

/** GET against the registry service; non-2xx answers become errors carrying the body. */
export const getJson = async <T>(
  pathname: string,
  schema: ZodType<T>,
  env: CliEnv = process.env
): Promise<T> => {
  const { REGISTRY_SERVICE_BASE_URL } = loadServiceEnv(env);
  const response = await fetch(new URL(pathname, REGISTRY_SERVICE_BASE_URL));
  if (!response.ok) {
    const errorText = await response.text();
    throw new Error(`request failed (${response.status}): ${errorText}`);
  }
  return schema.parse(await response.json());
};
