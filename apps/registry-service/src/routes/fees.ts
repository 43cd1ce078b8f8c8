import { FastifyInstance } from "fastify";
import { z } from "zod";
import { AddressSchema, ClaimFeesSchema } from "@nameledger/shared";
import { requireCaller } from "../auth.js";
import type { RegistryContext } from "../context.js";

const AddressParamsSchema = z.object({ address: AddressSchema });

export const registerFeeRoutes = (app: FastifyInstance, { registry }: RegistryContext) => {
  app.post("/v1/fees/claim", async (request, reply) => {
    const caller = await requireCaller(request, reply);
    if (!caller) return;
    const body = ClaimFeesSchema.parse(request.body ?? {});
    const amount = registry.claim({ caller, value: 0n }, body.recipient);
    return { recipient: body.recipient, amount: amount.toString() };
  });

  app.post("/v1/fees/claim-self", async (request, reply) => {
    const caller = await requireCaller(request, reply);
    if (!caller) return;
    const amount = registry.claimToSelf({ caller, value: 0n });
    return { recipient: caller, amount: amount.toString() };
  });

  app.get("/v1/fees/pending/:address", async (request) => {
    const { address } = AddressParamsSchema.parse(request.params);
    return { address, pending: registry.pendingFees(address).toString() };
  });
};
