import { ClaimsCodec } from "../auth/claims.js";
import { RequestContextPropagator } from "../auth/context.js";
import type { TrustProvider } from "../auth/credentials.js";
import { CredentialExchangeManager, StsTrustProvider } from "../auth/credentials.js";
import { TokenValidator } from "../auth/jwt.js";
import { SigningKeyResolver } from "../auth/keys.js";
import { RequestAuthenticator } from "../auth/middleware.js";
import { SessionCache } from "../auth/sessions.js";
import { AuthorizationEngine } from "../policy/engine.js";
import type { VaultClient } from "../vault/types.js";
import type { LakegateConfig } from "./config.js";
import type { Logger } from "./log.js";
import { createLogger } from "./log.js";
import { ConcurrencyLimiter } from "./utils/concurrencyLimiter.js";

/**
 * Composition root. Every shared cache is owned by one Gateway instance;
 * nothing lives at module level.
 */

export type GatewayDeps = {
  trustProvider?: TrustProvider;
  vaultFactory?: (region: string) => VaultClient;
  logger?: Logger;
  /** Clock in epoch ms */
  now?: () => number;
};

export type Gateway = {
  config: LakegateConfig;
  logger: Logger;
  codec: ClaimsCodec;
  keys: SigningKeyResolver;
  validator: TokenValidator;
  sessions: SessionCache;
  exchange: CredentialExchangeManager;
  engine: AuthorizationEngine;
  context: RequestContextPropagator;
  authenticator: RequestAuthenticator;
  /** Start background eviction */
  start(): void;
  stop(): void;
};

export function createGateway(config: LakegateConfig, deps: GatewayDeps = {}): Gateway {
  const logger = deps.logger ?? createLogger("gateway", { level: config.logLevel });
  const now = deps.now ?? Date.now;

  const codec = new ClaimsCodec({
    maxResources: config.auth.maxResources,
    conflictPolicy: config.auth.conflictPolicy
  });
  const keys = new SigningKeyResolver(config.auth.keys, {
    ...(deps.vaultFactory !== undefined && { vaultFactory: deps.vaultFactory }),
    logger: logger.child("keys")
  });
  const validator = new TokenValidator({
    resolver: keys,
    codec,
    ...(config.auth.issuer !== undefined && { issuer: config.auth.issuer }),
    ...(config.auth.audience !== undefined && { audience: config.auth.audience }),
    clockToleranceSeconds: config.auth.clockToleranceSeconds,
    now
  });
  const sessions = new SessionCache({
    ttlSeconds: config.sessions.ttlSeconds,
    now,
    logger: logger.child("sessions")
  });
  const exchange = new CredentialExchangeManager({
    provider: deps.trustProvider ?? new StsTrustProvider({
      ...(config.roles.region !== undefined && { region: config.roles.region })
    }),
    limiter: new ConcurrencyLimiter({
      maxConcurrent: config.roles.maxConcurrent,
      queueTimeoutMs: config.roles.timeoutMs
    }),
    failureTtlSeconds: config.roles.failureTtlSeconds,
    timeoutMs: config.roles.timeoutMs,
    durationSeconds: config.roles.durationSeconds,
    now,
    logger: logger.child("roles")
  });
  const engine = new AuthorizationEngine({ logger: logger.child("policy") });
  const context = new RequestContextPropagator();
  const authenticator = new RequestAuthenticator({
    mode: config.auth.mode,
    validator,
    sessions,
    exchange,
    ...(config.auth.ambient !== undefined && { ambient: config.auth.ambient }),
    assumeRoleFromClaims: config.roles.assumeFromClaims,
    logger: logger.child("auth"),
    now
  });

  let sweeper: ReturnType<typeof setInterval> | null = null;

  return {
    config,
    logger,
    codec,
    keys,
    validator,
    sessions,
    exchange,
    engine,
    context,
    authenticator,
    start() {
      sessions.startSweeper();
      if (!sweeper) {
        sweeper = setInterval(() => exchange.evictExpired(), 60_000);
        sweeper.unref();
      }
    },
    stop() {
      sessions.stop();
      exchange.close();
      if (sweeper) {
        clearInterval(sweeper);
        sweeper = null;
      }
    }
  };
}
