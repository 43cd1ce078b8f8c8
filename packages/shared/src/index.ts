import { z } from "zod";

export const HealthResponseSchema = z.object({
  ok: z.literal(true)
});

export type HealthResponse = z.infer<typeof HealthResponseSchema>;

export const AddressSchema = z.string().regex(/^0x[0-9a-fA-F]{40}$/, "address_expected");

/** Native-asset amounts travel as decimal wei strings. */
export const AmountSchema = z
  .string()
  .regex(/^(?:0|[1-9]\d*)$/, "decimal_wei_expected")
  .transform((value) => BigInt(value));

export const HexBytesSchema = z.string().regex(/^0x(?:[0-9a-fA-F]{2})*$/, "hex_bytes_expected");

export const AuthorizationRequestSchema = z.object({
  recipient: AddressSchema,
  label: z.string(),
  namespace: z.string()
});

export const RegisterNameSchema = z.object({
  label: z.string(),
  namespace: z.string(),
  value: AmountSchema.default("0")
});

export const RegisterSponsoredSchema = z.object({
  request: AuthorizationRequestSchema,
  proof: HexBytesSchema,
  value: AmountSchema.default("0")
});

export const RegisterBatchSchema = z.object({
  requests: z.array(AuthorizationRequestSchema).max(256),
  proofs: z.array(HexBytesSchema).max(256),
  value: AmountSchema.default("0")
});

export const CreateNamespaceSchema = z.object({
  namespace: z.string(),
  price: AmountSchema,
  value: AmountSchema.default("0")
});

export const OnboardNamespaceSchema = CreateNamespaceSchema.extend({
  creator: AddressSchema
});

export const ClaimFeesSchema = z.object({
  recipient: AddressSchema
});

export const TransferOperatorSchema = z.object({
  newOperator: AddressSchema
});

export const VerifyProofSchema = z.object({
  request: AuthorizationRequestSchema,
  proof: HexBytesSchema
});

export const NamespaceInfoResponseSchema = z.object({
  namespace: z.string(),
  price: z.string(),
  creator: z.string(),
  createdAt: z.number().int(),
  isPrivate: z.boolean()
});

export type NamespaceInfoResponse = z.infer<typeof NamespaceInfoResponseSchema>;

export const ResolveAddressResponseSchema = z.object({
  address: z.string().nullable()
});

export const ResolveNameResponseSchema = z.object({
  name: z.string()
});

export const PendingFeesResponseSchema = z.object({
  address: z.string(),
  pending: z.string()
});

export { extractBearerToken, verifyCallerToken } from "./serviceAuth.js";
export type { VerifiedCaller } from "./serviceAuth.js";
export {
  makeErrorResponse,
  failureClassOf,
  httpStatusOf,
  isRegistryFailureCode
} from "./errors.js";
export type { ErrorCode, ErrorResponse, FailureClass, RegistryFailureCode } from "./errors.js";
export { createMetricsRegistry } from "./metrics.js";
export type { MetricLabels, MetricsRegistry } from "./metrics.js";
