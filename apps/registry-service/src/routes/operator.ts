import { FastifyInstance } from "fastify";
import { TransferOperatorSchema } from "@nameledger/shared";
import { requireCaller } from "../auth.js";
import type { RegistryContext } from "../context.js";

export const registerOperatorRoutes = (app: FastifyInstance, { registry }: RegistryContext) => {
  const describe = () => ({ operator: registry.operator(), pendingOperator: registry.pendingOperator() });

  app.get("/v1/operator", async () => describe());

  app.post("/v1/operator/transfer", async (request, reply) => {
    const caller = await requireCaller(request, reply);
    if (!caller) return;
    const body = TransferOperatorSchema.parse(request.body ?? {});
    registry.transferOperator({ caller, value: 0n }, body.newOperator);
    return describe();
  });

  app.post("/v1/operator/accept", async (request, reply) => {
    const caller = await requireCaller(request, reply);
    if (!caller) return;
    registry.acceptOperator({ caller, value: 0n });
    return describe();
  });
};
