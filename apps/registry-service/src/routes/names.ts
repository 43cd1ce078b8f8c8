import { FastifyInstance } from "fastify";
import { z } from "zod";
import {
  AddressSchema,
  makeErrorResponse,
  RegisterBatchSchema,
  RegisterNameSchema,
  RegisterSponsoredSchema
} from "@nameledger/shared";
import { requireCaller } from "../auth.js";
import { config } from "../config.js";
import type { RegistryContext } from "../context.js";
import { metrics } from "../metrics.js";

const ResolveQuerySchema = z.object({
  name: z.string().min(1).optional(),
  label: z.string().min(1).optional(),
  namespace: z.string().min(1).optional()
});

const AddressParamsSchema = z.object({ address: AddressSchema });

export const registerNameRoutes = (app: FastifyInstance, { registry }: RegistryContext) => {
  app.post("/v1/names/register", async (request, reply) => {
    const caller = await requireCaller(request, reply);
    if (!caller) return;
    const body = RegisterNameSchema.parse(request.body ?? {});
    registry.registerDirect({ caller, value: body.value }, body.label, body.namespace);
    return reply.code(201).send({
      name: registry.resolveName(caller),
      owner: registry.resolveAddress(body.label, body.namespace)
    });
  });

  app.post("/v1/names/register-sponsored", async (request, reply) => {
    const caller = await requireCaller(request, reply);
    if (!caller) return;
    const body = RegisterSponsoredSchema.parse(request.body ?? {});
    registry.registerSponsored({ caller, value: body.value }, body.request, body.proof);
    return reply.code(201).send({
      name: registry.resolveName(body.request.recipient),
      owner: registry.resolveAddress(body.request.label, body.request.namespace)
    });
  });

  app.post("/v1/names/register-batch", async (request, reply) => {
    const caller = await requireCaller(request, reply);
    if (!caller) return;
    const body = RegisterBatchSchema.parse(request.body ?? {});
    const outcome = registry.registerBatch({ caller, value: body.value }, body.requests, body.proofs);
    if (outcome.skipped.length > 0) {
      metrics.incCounter("batch_items_skipped_total", {}, outcome.skipped.length);
    }
    return reply.code(201).send(outcome);
  });

  app.get("/v1/names/resolve", async (request, reply) => {
    const query = ResolveQuerySchema.parse(request.query ?? {});
    if (query.name !== undefined) {
      return { address: registry.resolveAddress(query.name) };
    }
    if (query.label !== undefined && query.namespace !== undefined) {
      return { address: registry.resolveAddress(query.label, query.namespace) };
    }
    return reply.code(400).send(
      makeErrorResponse("invalid_request", "Pass name, or label and namespace", {
        devMode: config.DEV_MODE
      })
    );
  });

  app.get("/v1/names/by-address/:address", async (request) => {
    const { address } = AddressParamsSchema.parse(request.params);
    return { name: registry.resolveName(address) };
  });
};
