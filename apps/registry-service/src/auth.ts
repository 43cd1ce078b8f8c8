import { FastifyReply, FastifyRequest } from "fastify";
import { AddressSchema, extractBearerToken, makeErrorResponse, verifyCallerToken } from "@nameledger/shared";
import { config } from "./config.js";
import { log } from "./log.js";

export const WRITE_SCOPE = "registry:write";

const DEV_CALLER_HEADER = "x-registry-caller";

/**
 * Resolves the identity behind a mutating request. Sends the error reply and
 * returns null when the caller cannot be established.
 */
export const requireCaller = async (
  request: FastifyRequest,
  reply: FastifyReply,
  options: { requiredScopes?: string[] } = { requiredScopes: [WRITE_SCOPE] }
): Promise<string | null> => {
  const requestId = (request as { requestId?: string }).requestId;
  const secret = config.SERVICE_JWT_SECRET;
  if (!secret) {
    if (config.ALLOW_INSECURE_DEV_AUTH) {
      const header = request.headers[DEV_CALLER_HEADER];
      const claimed = AddressSchema.safeParse(Array.isArray(header) ? header[0] : header);
      if (claimed.success) {
        return claimed.data;
      }
      await reply.code(401).send(
        makeErrorResponse("unauthorized", "Missing caller header", { devMode: config.DEV_MODE })
      );
      return null;
    }
    await reply
      .code(503)
      .send(
        makeErrorResponse("service_auth_not_configured", "Caller authentication is not configured", {
          devMode: config.DEV_MODE
        })
      );
    return null;
  }

  const token = extractBearerToken(request.headers.authorization);
  if (!token) {
    await reply.code(401).send(
      makeErrorResponse("unauthorized", "Missing caller token", { devMode: config.DEV_MODE })
    );
    return null;
  }
  try {
    const verified = await verifyCallerToken(token, {
      audience: config.SERVICE_JWT_AUDIENCE,
      secret,
      issuer: config.SERVICE_JWT_ISSUER,
      requiredScopes: options.requiredScopes
    });
    log.info("caller.auth.ok", { requestId, caller: verified.caller, scope: verified.scopes });
    return verified.caller;
  } catch (error) {
    if (error instanceof Error && error.message === "jwt_missing_required_scope") {
      await reply.code(403).send(
        makeErrorResponse("service_auth_scope_missing", "Caller token scope missing", {
          devMode: config.DEV_MODE
        })
      );
      return null;
    }
    log.warn("caller.auth.failed", { requestId, error });
    await reply.code(401).send(
      makeErrorResponse("unauthorized", "Invalid caller token", {
        devMode: config.DEV_MODE,
        debug: { cause: error instanceof Error ? error.message : String(error) }
      })
    );
    return null;
  }
};
