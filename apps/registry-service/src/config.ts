import dotenv from "dotenv";
import path from "path";
import { z } from "zod";

dotenv.config({ path: path.resolve(process.cwd(), "../../.env") });

const toNumber = (fallback: number) => (value: unknown) => {
  if (value === undefined || value === null || value === "") {
    return fallback;
  }
  const parsed = Number(value);
  return Number.isNaN(parsed) ? fallback : parsed;
};

const emptyToUndefined = (value: unknown) => (value === "" ? undefined : value);

const isBase64UrlSecret = (value: string) => /^[A-Za-z0-9_-]+$/.test(value) && value.length >= 43;

const isHexSecret = (value: string) => /^[a-fA-F0-9]+$/.test(value) && value.length >= 64;

const isSecretFormatValid = (value: string) => isBase64UrlSecret(value) || isHexSecret(value);

const address = z.string().regex(/^0x[0-9a-fA-F]{40}$/, "address_expected");

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  PORT: z.preprocess(toNumber(3020), z.number().int().min(1).max(65535)),
  DEV_MODE: z.preprocess((value) => value === "true", z.boolean()).default(false),
  SERVICE_BIND_ADDRESS: z.string().optional(),
  TRUST_PROXY: z.preprocess((value) => value === "true", z.boolean()).default(false),
  BODY_LIMIT_BYTES: z.preprocess(toNumber(256 * 1024), z.number().int().min(1024)),
  RATE_LIMIT_MAX: z.preprocess(toNumber(120), z.number().int().min(1)),
  CHAIN_ID: z.preprocess(emptyToUndefined, z.string().regex(/^\d+$/).default("31337")),
  REGISTRY_ADDRESS: address.default("0x000000000000000000000000000000000000c0de"),
  OPERATOR_ADDRESS: address.default("0x7E5F4552091A69125d5DfCb7b8C2659029395Bdf"),
  EXCLUSIVITY_PERIOD_SECONDS: z.preprocess(toNumber(30 * 24 * 60 * 60), z.number().int().min(0)),
  ONBOARDING_PERIOD_SECONDS: z.preprocess(toNumber(90 * 24 * 60 * 60), z.number().int().min(0)),
  SERVICE_JWT_SECRET: z.preprocess(emptyToUndefined, z.string().min(32).optional()),
  SERVICE_JWT_AUDIENCE: z.string().default("nameledger.registry"),
  SERVICE_JWT_ISSUER: z.preprocess(emptyToUndefined, z.string().optional()),
  SERVICE_JWT_SECRET_FORMAT_STRICT: z.preprocess((value) => {
    if (value === undefined || value === null || value === "") return undefined;
    return value === "true";
  }, z.boolean().optional()),
  ALLOW_INSECURE_DEV_AUTH: z.preprocess((value) => value === "true", z.boolean()).default(false)
});

const parsed = envSchema.parse(process.env);
if (parsed.NODE_ENV === "production" && parsed.ALLOW_INSECURE_DEV_AUTH) {
  throw new Error("insecure_dev_auth_not_allowed_in_production");
}
if (parsed.NODE_ENV === "production" && !parsed.SERVICE_JWT_SECRET) {
  throw new Error("service_jwt_secret_required_in_production");
}
const strictSecrets = parsed.SERVICE_JWT_SECRET_FORMAT_STRICT ?? parsed.NODE_ENV === "production";
if (strictSecrets && parsed.SERVICE_JWT_SECRET && !isSecretFormatValid(parsed.SERVICE_JWT_SECRET)) {
  throw new Error("service_jwt_secret_format_invalid:SERVICE_JWT_SECRET");
}
const serviceBindAddress =
  parsed.SERVICE_BIND_ADDRESS ?? (parsed.NODE_ENV === "production" ? "127.0.0.1" : "0.0.0.0");

export const config = {
  ...parsed,
  CHAIN_ID: BigInt(parsed.CHAIN_ID),
  SERVICE_BIND_ADDRESS: serviceBindAddress,
  SERVICE_JWT_SECRET_FORMAT_STRICT: strictSecrets
};
