import { z } from "zod";
import type { RuntimeAuthState } from "../auth/types.js";
import { AuthError, describeCredentials } from "../auth/types.js";
import { toLakegateError } from "../lakegate/errors.js";
import type { Gateway } from "../lakegate/gateway.js";
import type { ConcurrencyLimiter } from "../lakegate/utils/concurrencyLimiter.js";
import { describeState } from "./http.js";

/**
 * Tool surface shared by the MCP server and the CLI.
 */

export type ToolResult = {
  isError?: true;
  content: Array<{ type: "text"; text: string }>;
};

export type ToolDefinition = {
  name: string;
  description: string;
  inputSchema: {
    type: "object";
    properties: Record<string, unknown>;
    required?: string[];
    additionalProperties: false;
  };
};

// ============================================================================
// Schemas
// ============================================================================

const AuthStatusSchema = z.object({
  token: z.string().min(1).optional()
});

const JwtInspectSchema = z.object({
  token: z.string().min(1)
});

const AuthorizationCheckSchema = z.object({
  operation: z.string().min(1),
  bucket: z.string().min(1).optional(),
  token: z.string().min(1).optional()
});

export const TOOL_DEFINITIONS: ToolDefinition[] = [
  {
    name: "auth_status",
    description: "Report the identity a request would run as: scheme, subject, permissions, buckets and credentials",
    inputSchema: {
      type: "object",
      properties: { token: { type: "string", description: "Bearer token; omit to see the ambient identity" } },
      additionalProperties: false
    }
  },
  {
    name: "jwt_inspect",
    description: "Validate a token and show its expanded claims (no secrets)",
    inputSchema: {
      type: "object",
      properties: { token: { type: "string" } },
      required: ["token"],
      additionalProperties: false
    }
  },
  {
    name: "authorization_check",
    description: "Decide whether an operation on a bucket is allowed for a token or the ambient identity",
    inputSchema: {
      type: "object",
      properties: {
        operation: { type: "string" },
        bucket: { type: "string" },
        token: { type: "string" }
      },
      required: ["operation"],
      additionalProperties: false
    }
  },
  {
    name: "operations_list",
    description: "List every operation with the permissions it requires",
    inputSchema: { type: "object", properties: {}, additionalProperties: false }
  }
];

// ============================================================================
// Results
// ============================================================================

function ok(value: unknown): ToolResult {
  return { content: [{ type: "text", text: JSON.stringify(value, null, 2) }] };
}

export function toErrorResponse(err: unknown): ToolResult {
  const body = err instanceof AuthError ? err.toJSON() : toLakegateError(err).toJSON();
  return { isError: true, content: [{ type: "text", text: JSON.stringify(body, null, 2) }] };
}

// ============================================================================
// Handlers
// ============================================================================

export type ToolHandlers = {
  call(name: string, args: unknown): Promise<ToolResult>;
};

export type ToolHandlerOptions = {
  /** Bounds concurrent tool calls; excess calls queue or fail with CAPACITY_EXCEEDED */
  limiter?: ConcurrencyLimiter;
};

export function createToolHandlers(gateway: Gateway, options: ToolHandlerOptions = {}): ToolHandlers {
  const { authenticator, context, engine, validator } = gateway;

  const stateFor = (token: string | undefined): Promise<RuntimeAuthState> =>
    authenticator.authenticate(token !== undefined ? { authorization: `Bearer ${token}` } : {});

  const handlers: Record<string, (args: unknown) => Promise<ToolResult>> = {
    auth_status: async (args) => {
      const input = AuthStatusSchema.parse(args ?? {});
      const state = await stateFor(input.token);
      return ok(describeState(state));
    },

    jwt_inspect: async (args) => {
      const input = JwtInspectSchema.parse(args ?? {});
      const { claims, keyId } = await validator.validate(input.token);
      const { credentials, ...rest } = claims;
      return ok({
        valid: true,
        keyId: keyId ?? null,
        claims: {
          ...rest,
          credentials: credentials ? describeCredentials(credentials) : null
        },
        expiresAt: new Date(claims.expiresAt * 1000).toISOString()
      });
    },

    authorization_check: async (args) => {
      const input = AuthorizationCheckSchema.parse(args ?? {});
      const state = await stateFor(input.token);
      const decision = await context.run(state, () =>
        engine.authorize(input.operation, input.bucket, context.current())
      );
      const { credentials, ...rest } = decision;
      return ok({
        ...rest,
        credentials: credentials ? describeCredentials(credentials) : null
      });
    },

    operations_list: async () => {
      return ok({ operations: engine.listOperations() });
    }
  };

  return {
    async call(name, args) {
      const handler = handlers[name];
      if (!handler) {
        return { isError: true, content: [{ type: "text", text: `Unknown tool: ${name}` }] };
      }
      try {
        return options.limiter
          ? await options.limiter.run(() => handler(args))
          : await handler(args);
      } catch (err) {
        gateway.logger.warn("tool call failed", {
          tool: name,
          error: err instanceof Error ? err.message : String(err)
        });
        return toErrorResponse(err);
      }
    }
  };
}
