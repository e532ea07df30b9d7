import type { Context, MiddlewareHandler, Next } from "hono";
import type { Logger } from "../lakegate/log.js";
import { silentLogger } from "../lakegate/log.js";
import type { RequestContextPropagator } from "./context.js";
import type { CredentialExchangeManager } from "./credentials.js";
import type { TokenValidator } from "./jwt.js";
import { tokenFingerprint } from "./jwt.js";
import type { SessionCache } from "./sessions.js";
import type { AmbientIdentity, ClaimSet, RuntimeAuthState, SessionRecord } from "./types.js";
import { AuthError } from "./types.js";

/**
 * Auth Middleware for Hono
 *
 * Resolves the caller's identity (session cache, then token), optionally
 * assumes a role, and runs the rest of the request inside its own auth frame.
 */

declare module "hono" {
  interface ContextVariableMap {
    authState: RuntimeAuthState;
  }
}

export type AuthMode = "strict" | "optional";

export type AuthRequest = {
  /** Raw Authorization header value */
  authorization?: string;
  sessionId?: string;
  /** Explicit role to assume */
  roleId?: string;
  /** Client disconnect */
  signal?: AbortSignal;
};

export type RequestAuthenticatorOptions = {
  mode: AuthMode;
  validator: TokenValidator;
  sessions: SessionCache;
  exchange?: CredentialExchangeManager;
  /** Identity used in optional mode when no token is sent */
  ambient?: AmbientIdentity;
  /** Assume `claims.assumableRole` when no role is requested explicitly */
  assumeRoleFromClaims?: boolean;
  logger?: Logger;
  /** Clock in epoch ms */
  now?: () => number;
};

const BEARER_PATTERN = /^Bearer\s+(\S+)\s*$/i;

/**
 * Turns request inputs into a RuntimeAuthState. Shared by the HTTP middleware
 * and the tool surface.
 */
export class RequestAuthenticator {
  readonly mode: AuthMode;
  private readonly validator: TokenValidator;
  private readonly sessions: SessionCache;
  private readonly exchange: CredentialExchangeManager | undefined;
  private readonly ambient: AmbientIdentity | undefined;
  private readonly assumeRoleFromClaims: boolean;
  private readonly logger: Logger;
  private readonly now: () => number;

  constructor(options: RequestAuthenticatorOptions) {
    this.mode = options.mode;
    this.validator = options.validator;
    this.sessions = options.sessions;
    this.exchange = options.exchange;
    this.ambient = options.ambient;
    this.assumeRoleFromClaims = options.assumeRoleFromClaims ?? false;
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? Date.now;
  }

  /**
   * @throws AuthError in strict mode for any token failure, and in either mode
   * when a requested role cannot be assumed
   */
  async authenticate(request: AuthRequest): Promise<RuntimeAuthState> {
    const identity = await this.resolveIdentity(request);
    return this.withRole(identity, request);
  }

  private async resolveIdentity(request: AuthRequest): Promise<RuntimeAuthState> {
    const { sessionId } = request;

    let token: string | undefined;
    try {
      token = parseAuthorization(request.authorization);
    } catch (err) {
      return this.degrade(err, sessionId);
    }
    const fingerprint = token !== undefined ? tokenFingerprint(token) : undefined;

    let sessionExpired = false;
    if (sessionId !== undefined) {
      const probe = this.sessions.probe(sessionId);
      if (probe.status === "hit") {
        if (fingerprint === undefined || fingerprint === probe.record.tokenFingerprint) {
          this.logger.debug("session cache hit", { sessionId, subject: probe.record.subject });
          return stateFromRecord(probe.record);
        }
        this.logger.debug("session token changed, revalidating", { sessionId });
      }
      sessionExpired = probe.status === "expired";
    }

    if (token === undefined) {
      if (this.mode === "optional") {
        return this.ambientState(sessionId);
      }
      if (sessionExpired) {
        throw new AuthError("SESSION_EXPIRED", "Session has expired and no token was presented");
      }
      throw new AuthError("MISSING_TOKEN", "A bearer token is required for this request");
    }

    try {
      const { claims } = await this.validator.validate(token);
      if (sessionId !== undefined) {
        this.sessions.store(sessionId, {
          claims,
          tokenFingerprint: tokenFingerprint(token),
          ...(claims.credentials !== undefined && { credentials: claims.credentials })
        });
      }
      this.logger.debug("token validated", { subject: claims.subject, sessionId: sessionId ?? null });
      return {
        scheme: "token",
        claims,
        ...(claims.credentials !== undefined && { credentials: claims.credentials }),
        ...(sessionId !== undefined && { sessionId }),
        extras: { sessionCache: sessionId !== undefined ? "stored" : "none" }
      };
    } catch (err) {
      if (sessionId !== undefined) {
        this.sessions.invalidate(sessionId);
      }
      return this.degrade(err, sessionId);
    }
  }

  /** Strict mode rethrows; optional mode continues without identity */
  private degrade(err: unknown, sessionId: string | undefined): RuntimeAuthState {
    if (!(err instanceof AuthError) || this.mode === "strict") {
      throw err;
    }
    this.logger.info("token rejected, continuing unauthenticated", { code: err.code });
    return {
      scheme: "none",
      ...(sessionId !== undefined && { sessionId }),
      extras: { authError: err.code }
    };
  }

  private ambientState(sessionId: string | undefined): RuntimeAuthState {
    const ambient = this.ambient;
    const base = {
      scheme: "ambient" as const,
      ...(sessionId !== undefined && { sessionId }),
      extras: {}
    };
    if (!ambient) return base;
    const claims: ClaimSet = {
      subject: ambient.subject,
      expiresAt: Math.floor(this.now() / 1000) + 3600,
      audience: [],
      scope: "",
      level: "read",
      permissions: ambient.permissions,
      resources: ambient.resources,
      roles: []
    };
    return {
      ...base,
      claims,
      ...(ambient.credentials !== undefined && { credentials: ambient.credentials })
    };
  }

  private async withRole(state: RuntimeAuthState, request: AuthRequest): Promise<RuntimeAuthState> {
    const roleId = request.roleId ?? (this.assumeRoleFromClaims ? state.claims?.assumableRole : undefined);
    if (roleId === undefined || roleId.length === 0) {
      return state;
    }
    if (!state.claims) {
      this.logger.info("role requested without an identity, ignored", { roleId });
      return state;
    }
    if (!this.exchange) {
      throw new AuthError("ROLE_ASSUMPTION_FAILED", "Role assumption is not configured on this server", { roleId });
    }

    const { credentials, exchanged } = await this.exchange.acquire({
      principal: state.claims.subject,
      roleId,
      ...(state.credentials !== undefined && { current: state.credentials }),
      ...(request.signal !== undefined && { signal: request.signal }),
      ...(state.sessionId !== undefined && { sessionName: `${state.claims.subject}-${state.sessionId}` })
    });

    if (state.sessionId !== undefined && state.credentials !== credentials) {
      this.sessions.attachCredentials(state.sessionId, credentials);
    }
    return {
      ...state,
      scheme: "assumed-role",
      credentials,
      extras: { ...state.extras, roleId, exchanged }
    };
  }
}

function stateFromRecord(record: SessionRecord): RuntimeAuthState {
  return {
    scheme: record.credentials?.source === "exchange" ? "assumed-role" : "token",
    claims: record.claims,
    ...(record.credentials !== undefined && { credentials: record.credentials }),
    sessionId: record.sessionId,
    extras: { sessionCache: "hit" }
  };
}

/**
 * Bearer token from an Authorization header value; undefined when absent.
 *
 * @throws AuthError MALFORMED_TOKEN for any other scheme
 */
export function parseAuthorization(header: string | undefined): string | undefined {
  if (header === undefined || header.trim().length === 0) {
    return undefined;
  }
  const match = BEARER_PATTERN.exec(header.trim());
  if (!match?.[1]) {
    throw new AuthError("MALFORMED_TOKEN", "Authorization header must use the Bearer scheme");
  }
  return match[1];
}

// ============================================================================
// Hono middleware
// ============================================================================

export type AuthMiddlewareOptions = {
  authenticator: RequestAuthenticator;
  context: RequestContextPropagator;
  /** Skip auth for these paths. Default ["/health"] */
  skipPaths?: string[];
  /** Default "mcp-session-id" */
  sessionHeader?: string;
  /** Default "x-assume-role" */
  roleHeader?: string;
};

/**
 * Creates the auth middleware
 */
export function createAuthMiddleware(options: AuthMiddlewareOptions): MiddlewareHandler {
  const skipPaths = new Set(options.skipPaths ?? ["/health"]);
  const sessionHeader = options.sessionHeader ?? "mcp-session-id";
  const roleHeader = options.roleHeader ?? "x-assume-role";

  return async (c: Context, next: Next) => {
    if (skipPaths.has(c.req.path)) {
      return next();
    }

    const authorization = c.req.header("Authorization");
    const sessionId = c.req.header(sessionHeader);
    const roleId = c.req.header(roleHeader);

    let state: RuntimeAuthState;
    try {
      state = await options.authenticator.authenticate({
        ...(authorization !== undefined && { authorization }),
        ...(sessionId !== undefined && sessionId.length > 0 && { sessionId }),
        ...(roleId !== undefined && roleId.length > 0 && { roleId }),
        signal: c.req.raw.signal
      });
    } catch (err) {
      if (err instanceof AuthError) {
        return c.json(err.toJSON(), err.statusCode);
      }
      throw err;
    }

    c.set("authState", state);
    await options.context.run(state, () => next());
  };
}
