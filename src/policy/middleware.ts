import type { Context, MiddlewareHandler, Next } from "hono";
import type { RequestContextPropagator } from "../auth/context.js";
import { AuthError } from "../auth/types.js";
import type { AuthorizationEngine } from "./engine.js";
import type { AuthorizationDecision } from "./types.js";

/**
 * Operation Guard
 *
 * Gates a route on one operation of the permission table, evaluated against
 * the auth state propagated for this request.
 */

declare module "hono" {
  interface ContextVariableMap {
    authDecision: AuthorizationDecision;
  }
}

export type OperationGuardOptions = {
  context: RequestContextPropagator;
  /** Bucket the request addresses */
  resource?: (c: Context) => string | undefined | Promise<string | undefined>;
};

export function decisionError(decision: AuthorizationDecision): AuthError {
  const details = {
    reason: decision.reason,
    operation: decision.operation,
    ...(decision.resource !== undefined && { bucket: decision.resource }),
    ...(decision.missingPermissions !== undefined && { missingPermissions: decision.missingPermissions })
  };
  return decision.reason === "unauthenticated"
    ? new AuthError("MISSING_TOKEN", decision.message, details)
    : new AuthError("UNAUTHORIZED", decision.message, details);
}

/**
 * Require `operation` (or the operation named by the route) before the handler runs.
 */
export function requireOperation(
  engine: AuthorizationEngine,
  operation: string | ((c: Context) => string),
  options: OperationGuardOptions
): MiddlewareHandler {
  return async (c: Context, next: Next) => {
    const name = typeof operation === "string" ? operation : operation(c);
    const resource = options.resource ? await options.resource(c) : undefined;
    const decision = engine.authorize(name, resource, options.context.current());

    if (!decision.allowed) {
      const err = decisionError(decision);
      return c.json(err.toJSON(), err.statusCode);
    }

    c.set("authDecision", decision);
    return next();
  };
}
