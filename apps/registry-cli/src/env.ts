import { z } from "zod";

const ServiceEnvSchema = z.object({
  REGISTRY_SERVICE_BASE_URL: z.string().url().default("http://localhost:3020")
});

const SignerEnvSchema = z.object({
  SIGNER_PRIVATE_KEY: z.string().regex(/^0x[0-9a-fA-F]{64}$/, "private_key_expected"),
  CHAIN_ID: z.string().regex(/^\d+$/).default("31337"),
  REGISTRY_ADDRESS: z
    .string()
    .regex(/^0x[0-9a-fA-F]{40}$/, "address_expected")
    .default("0x000000000000000000000000000000000000c0de")
});

export type CliEnv = Record<string, string | undefined>;

export const loadServiceEnv = (env: CliEnv = process.env) => ServiceEnvSchema.parse(env);

export const loadSignerEnv = (env: CliEnv = process.env) => SignerEnvSchema.parse(env);
