import { FastifyInstance } from "fastify";
import { z } from "zod";
import { AuthorizationRequestSchema, VerifyProofSchema } from "@nameledger/shared";
import type { RegistryContext } from "../context.js";

const SyntaxParamsSchema = z.object({ value: z.string() });

/** Read-only helpers for building and checking sponsored registrations off-line. */
export const registerAuthorizationRoutes = (app: FastifyInstance, { registry }: RegistryContext) => {
  app.post("/v1/authorizations/digest", async (request) => {
    const body = AuthorizationRequestSchema.parse(request.body ?? {});
    const domain = registry.authorizationDomain;
    return {
      digest: registry.authorizationDigest(body),
      domain: {
        name: domain.name,
        version: domain.version,
        chainId: registry.params.chainId.toString(),
        verifyingContract: registry.params.registryAddress
      }
    };
  });

  app.post("/v1/authorizations/verify", async (request) => {
    const body = VerifyProofSchema.parse(request.body ?? {});
    return { valid: registry.verifyProof(body.request, body.proof) };
  });

  app.get("/v1/syntax/:value", async (request) => {
    const { value } = SyntaxParamsSchema.parse(request.params);
    return { value, valid: registry.isValidLabelOrNamespace(value) };
  });
};
