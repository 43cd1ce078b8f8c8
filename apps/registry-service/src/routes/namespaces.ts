import { FastifyInstance } from "fastify";
import { z } from "zod";
import { AmountSchema, CreateNamespaceSchema, OnboardNamespaceSchema } from "@nameledger/shared";
import type { Visibility } from "@nameledger/registry";
import { requireCaller } from "../auth.js";
import type { RegistryContext } from "../context.js";

const NamespaceParamsSchema = z.object({ namespace: z.string().min(1) });
const PriceParamsSchema = z.object({ price: AmountSchema });

const VISIBILITIES: Visibility[] = ["public", "private"];

export const registerNamespaceRoutes = (app: FastifyInstance, { registry }: RegistryContext) => {
  const describe = (namespace: string) => {
    const info = registry.namespaceInfo(namespace);
    return {
      namespace,
      price: info.price.toString(),
      creator: info.creator,
      createdAt: info.createdAt,
      isPrivate: info.visibility === "private"
    };
  };

  for (const visibility of VISIBILITIES) {
    app.post(`/v1/namespaces/${visibility}`, async (request, reply) => {
      const caller = await requireCaller(request, reply);
      if (!caller) return;
      const body = CreateNamespaceSchema.parse(request.body ?? {});
      const ctx = { caller, value: body.value };
      if (visibility === "public") {
        registry.createPublicNamespace(ctx, body.namespace, body.price);
      } else {
        registry.createPrivateNamespace(ctx, body.namespace, body.price);
      }
      return reply.code(201).send(describe(body.namespace));
    });

    app.post(`/v1/namespaces/${visibility}/onboard`, async (request, reply) => {
      const caller = await requireCaller(request, reply);
      if (!caller) return;
      const body = OnboardNamespaceSchema.parse(request.body ?? {});
      const ctx = { caller, value: body.value };
      if (visibility === "public") {
        registry.createPublicNamespaceFor(ctx, body.creator, body.namespace, body.price);
      } else {
        registry.createPrivateNamespaceFor(ctx, body.creator, body.namespace, body.price);
      }
      return reply.code(201).send(describe(body.namespace));
    });
  }

  app.get("/v1/namespaces/by-price/:price", async (request) => {
    const { price } = PriceParamsSchema.parse(request.params);
    return { price: price.toString(), namespace: registry.namespaceByPrice(price) };
  });

  app.get("/v1/namespaces/:namespace", async (request) => {
    const { namespace } = NamespaceParamsSchema.parse(request.params);
    return describe(namespace);
  });

  app.get("/v1/namespaces/:namespace/price", async (request) => {
    const { namespace } = NamespaceParamsSchema.parse(request.params);
    return { namespace, price: registry.namespacePrice(namespace).toString() };
  });

  app.get("/v1/namespaces/:namespace/exclusivity", async (request) => {
    const { namespace } = NamespaceParamsSchema.parse(request.params);
    return {
      namespace,
      withinExclusivityWindow: registry.isWithinExclusivityWindow(namespace),
      withinOnboardingWindow: registry.isWithinOnboardingWindow()
    };
  });
};
