import fastify, { type FastifyInstance } from "fastify";
import rateLimit from "@fastify/rate-limit";
import { randomUUID } from "node:crypto";
import net from "node:net";
import { ZodError } from "zod";
import { httpStatusOf, makeErrorResponse } from "@nameledger/shared";
import { isRegistryError } from "@nameledger/registry";
import { config } from "./config.js";
import { createRegistryContext, type RegistryContext } from "./context.js";
import { log } from "./log.js";
import { metrics } from "./metrics.js";
import { registerAuthorizationRoutes } from "./routes/authorizations.js";
import { registerFeeRoutes } from "./routes/fees.js";
import { registerHealthRoutes } from "./routes/health.js";
import { registerNameRoutes } from "./routes/names.js";
import { registerNamespaceRoutes } from "./routes/namespaces.js";
import { registerOperatorRoutes } from "./routes/operator.js";

const isPrivateAddress = (value?: string) => {
  if (!value) return false;
  const trimmed = value.trim().toLowerCase();
  if (trimmed === "localhost" || trimmed === "::1") return true;
  if (trimmed === "0.0.0.0" || trimmed === "::") return false;
  const mapped = trimmed.startsWith("::ffff:") ? trimmed.slice(7) : trimmed;
  const ipType = net.isIP(mapped);
  if (ipType === 4) {
    const [a, b] = mapped.split(".").map((part) => Number(part));
    if (a === 10 || a === 127) return true;
    if (a === 192 && b === 168) return true;
    if (a === 172 && b >= 16 && b <= 31) return true;
    return false;
  }
  if (ipType === 6) {
    return mapped.startsWith("fc") || mapped.startsWith("fd");
  }
  return false;
};

const describeZodError = (error: ZodError) =>
  error.issues.map((issue) => `${issue.path.join(".") || "body"}: ${issue.message}`).join("; ");

export const buildServer = (options: { context?: RegistryContext } = {}): FastifyInstance => {
  if (config.NODE_ENV === "production" && !isPrivateAddress(config.SERVICE_BIND_ADDRESS)) {
    log.error("service.bind.public_not_allowed", {
      env: config.NODE_ENV,
      bind: config.SERVICE_BIND_ADDRESS
    });
    throw new Error("public_bind_not_allowed");
  }
  if (config.ALLOW_INSECURE_DEV_AUTH) {
    log.warn("caller.auth.insecure_enabled", { env: config.NODE_ENV });
  } else if (!config.SERVICE_JWT_SECRET) {
    log.warn("caller.auth.missing", { env: config.NODE_ENV });
  }
  const context = options.context ?? createRegistryContext();
  const app = fastify({
    logger: false,
    trustProxy: config.TRUST_PROXY,
    bodyLimit: config.BODY_LIMIT_BYTES
  });

  app.addHook("onRequest", async (request, reply) => {
    const incoming = request.headers["x-request-id"];
    const requestId = Array.isArray(incoming) ? incoming[0] : (incoming ?? randomUUID());
    (request as { requestId?: string }).requestId = requestId;
    reply.header("X-Request-Id", requestId);
    log.info("request", { requestId, method: request.method, url: request.url });
  });

  app.addHook("onResponse", async (request, reply) => {
    const route = request.routeOptions?.url ?? request.url.split("?")[0];
    metrics.incCounter("requests_total", {
      route,
      method: request.method,
      status: String(reply.statusCode)
    });
  });

  app.setErrorHandler((error, request, reply) => {
    const requestId = (request as { requestId?: string }).requestId;
    if (isRegistryError(error)) {
      metrics.incCounter("registry_failures_total", { code: error.code });
      log.warn("registry.rejected", { requestId, code: error.code, detail: error.detail });
      return reply.code(httpStatusOf(error.code)).send(
        makeErrorResponse(error.code, error.failureClass, { details: error.detail })
      );
    }
    if (error instanceof ZodError) {
      return reply.code(400).send(
        makeErrorResponse("invalid_request", "Invalid request", { details: describeZodError(error) })
      );
    }
    if (error.statusCode === 429) {
      return reply.code(429).send(
        makeErrorResponse("rate_limited", "Too many requests", { devMode: config.DEV_MODE })
      );
    }
    if (error.validation || error.statusCode === 400 || error.statusCode === 415) {
      return reply.code(400).send(
        makeErrorResponse("invalid_request", "Invalid request", {
          details: error.message,
          devMode: config.DEV_MODE,
          debug: config.DEV_MODE ? { cause: error.message } : undefined
        })
      );
    }
    log.error("request.failed", { requestId, error });
    return reply.code(500).send(
      makeErrorResponse("internal_error", "Internal error", {
        devMode: config.DEV_MODE,
        debug: config.DEV_MODE ? { cause: error.message } : undefined
      })
    );
  });

  app.register(rateLimit, { max: config.RATE_LIMIT_MAX, timeWindow: "1 minute" });

  app.register(async (scoped) => {
    registerHealthRoutes(scoped);
    registerNameRoutes(scoped, context);
    registerNamespaceRoutes(scoped, context);
    registerFeeRoutes(scoped, context);
    registerOperatorRoutes(scoped, context);
    registerAuthorizationRoutes(scoped, context);
  });

  return app;
};
