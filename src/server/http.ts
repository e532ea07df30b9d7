import { Hono } from "hono";
import type { Context } from "hono";
import { serve } from "@hono/node-server";
import { z } from "zod";
import { createAuthMiddleware } from "../auth/middleware.js";
import { AuthError, describeCredentials } from "../auth/types.js";
import type { RuntimeAuthState } from "../auth/types.js";
import { LakegateError, statusForLakegateError, toLakegateError } from "../lakegate/errors.js";
import type { Gateway } from "../lakegate/gateway.js";
import { requireOperation } from "../policy/middleware.js";

// ============================================================================
// Schema Definitions
// ============================================================================

const OperationBodySchema = z.object({
  bucket: z.string().min(1).optional()
});

async function bucketFromBody(c: Context): Promise<string | undefined> {
  const text = await c.req.text();
  if (text.trim().length === 0) {
    return undefined;
  }
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch {
    throw new LakegateError("BAD_REQUEST", "Invalid JSON body");
  }
  return OperationBodySchema.parse(json).bucket;
}

export function describeState(state: RuntimeAuthState): Record<string, unknown> {
  return {
    scheme: state.scheme,
    subject: state.claims?.subject ?? null,
    level: state.claims?.level ?? null,
    permissions: state.claims?.permissions ?? [],
    buckets: state.claims?.resources ?? [],
    roles: state.claims?.roles ?? [],
    credentials: state.credentials ? describeCredentials(state.credentials) : null,
    sessionId: state.sessionId ?? null,
    ...(typeof state.extras.authError === "string" && { authError: state.extras.authError })
  };
}

// ============================================================================
// App
// ============================================================================

export function createHttpApp(gateway: Gateway): Hono {
  const app = new Hono();
  const { engine, context } = gateway;

  app.onError((err, c) => {
    if (err instanceof AuthError) {
      return c.json(err.toJSON(), err.statusCode);
    }
    const lakegateErr = toLakegateError(err);
    if (statusForLakegateError(lakegateErr) === 500) {
      gateway.logger.error("request failed", { path: c.req.path, error: lakegateErr.message });
    }
    return c.json(lakegateErr.toJSON(), statusForLakegateError(lakegateErr));
  });

  app.use("*", createAuthMiddleware({
    authenticator: gateway.authenticator,
    context,
    skipPaths: ["/health"],
    sessionHeader: gateway.config.auth.sessionHeader,
    roleHeader: gateway.config.auth.roleHeader
  }));

  app.get("/health", (c) => {
    const keys = gateway.keys.health();
    const ok = keys.every(k => k.healthy);
    return c.json({
      ok,
      mode: gateway.config.auth.mode,
      sessions: { active: gateway.sessions.size },
      credentials: gateway.exchange.stats,
      keys
    }, ok ? 200 : 503);
  });

  app.get("/auth/status", (c) => {
    return c.json(describeState(context.current()));
  });

  app.post(
    "/operations/:operation",
    requireOperation(engine, (c) => c.req.param("operation") ?? "", {
      context,
      resource: bucketFromBody
    }),
    (c) => {
      const decision = c.get("authDecision");
      const state = context.current();
      return c.json({
        allowed: decision.allowed,
        operation: decision.operation,
        bucket: decision.resource ?? null,
        subject: state.claims?.subject ?? null,
        scheme: state.scheme,
        credentials: decision.credentials ? describeCredentials(decision.credentials) : null
      });
    }
  );

  return app;
}

export type HttpServerHandle = {
  close(): Promise<void>;
};

export function startHttpServer(gateway: Gateway, port = gateway.config.server.port): HttpServerHandle {
  const app = createHttpApp(gateway);
  gateway.start();
  const server = serve({ fetch: app.fetch, port }, (info) => {
    gateway.logger.info("http server listening", { port: info.port, mode: gateway.config.auth.mode });
  });

  return {
    close: () => new Promise<void>((resolve, reject) => {
      gateway.stop();
      server.close((err) => (err ? reject(err) : resolve()));
    })
  };
}
