import { AssumeRoleCommand, STSClient } from "@aws-sdk/client-sts";
import type { Logger } from "../lakegate/log.js";
import { silentLogger } from "../lakegate/log.js";
import { untilAborted } from "../lakegate/utils/abort.js";
import { CapacityExceededError, ConcurrencyLimiter } from "../lakegate/utils/concurrencyLimiter.js";
import type { ScopedCredentials } from "./types.js";
import { AuthError } from "./types.js";

/**
 * Credential Exchange
 *
 * Trades a principal's identity for short-lived credentials scoped to a role.
 * Results are cached per (principal, role), concurrent requests for the same
 * pair share one upstream call, and failures are remembered briefly.
 */

// ============================================================================
// Trust Provider Port
// ============================================================================

export type AssumeRoleRequest = {
  roleId: string;
  principal: string;
  sessionName: string;
  durationSeconds: number;
};

export interface TrustProvider {
  /** `signal` aborts on timeout, shutdown, or once every caller has left; pass it to the upstream call */
  assumeRole(request: AssumeRoleRequest, signal: AbortSignal): Promise<ScopedCredentials>;
}

/** STS RoleSessionName / SourceIdentity: [\w+=,.@-]{2,64} */
export function sanitizeSessionName(value: string): string {
  const cleaned = value.replace(/[^\w+=,.@-]/g, "-").slice(0, 64);
  return cleaned.length >= 2 ? cleaned : `${cleaned}--`.slice(0, 2);
}

export type StsTrustProviderOptions = {
  region?: string;
  client?: STSClient;
};

export class StsTrustProvider implements TrustProvider {
  private readonly client: STSClient;
  private readonly region: string | undefined;

  constructor(options: StsTrustProviderOptions = {}) {
    this.region = options.region;
    this.client = options.client ?? new STSClient({ ...(options.region !== undefined && { region: options.region }) });
  }

  async assumeRole(request: AssumeRoleRequest, signal: AbortSignal): Promise<ScopedCredentials> {
    const response = await this.client.send(
      new AssumeRoleCommand({
        RoleArn: request.roleId,
        RoleSessionName: sanitizeSessionName(request.sessionName),
        DurationSeconds: request.durationSeconds,
        SourceIdentity: sanitizeSessionName(request.principal)
      }),
      { abortSignal: signal }
    );

    const creds = response.Credentials;
    if (!creds?.AccessKeyId || !creds.SecretAccessKey) {
      throw new Error("AssumeRole returned no credentials");
    }
    return {
      accessKeyId: creds.AccessKeyId,
      secretAccessKey: creds.SecretAccessKey,
      ...(creds.SessionToken !== undefined && { sessionToken: creds.SessionToken }),
      ...(creds.Expiration !== undefined && { expiration: creds.Expiration.toISOString() }),
      ...(this.region !== undefined && { region: this.region }),
      roleId: request.roleId,
      source: "exchange"
    };
  }
}

// ============================================================================
// Exchange Manager
// ============================================================================

export type CredentialExchangeOptions = {
  provider: TrustProvider;
  /** Bounds concurrent upstream calls; defaults to 8 with a 10s queue timeout */
  limiter?: ConcurrencyLimiter;
  /** Credentials are refreshed this long before they expire. Default 300 */
  refreshMarginSeconds?: number;
  /** How long a failure is replayed without calling upstream. Default 5 */
  failureTtlSeconds?: number;
  /** Per-exchange timeout. Default 10000 */
  timeoutMs?: number;
  /** Requested credential lifetime. Default 3600 */
  durationSeconds?: number;
  /** Clock in epoch ms */
  now?: () => number;
  logger?: Logger;
};

export type ExchangeRequest = {
  principal: string;
  roleId: string;
  /** Credentials already attached to the caller's session */
  current?: ScopedCredentials;
  /** Caller disconnect; abandons this caller's wait */
  signal?: AbortSignal;
  sessionName?: string;
};

export type ExchangeResult = {
  credentials: ScopedCredentials;
  /** False when served from the session or the result cache */
  exchanged: boolean;
};

type CachedCredentials = {
  credentials: ScopedCredentials;
  validUntil: number;
};

type CachedFailure = {
  message: string;
  until: number;
};

type Flight = {
  promise: Promise<ScopedCredentials>;
  controller: AbortController;
  waiters: number;
  cancelled: boolean;
};

class ExchangeTimeoutError extends Error {
  constructor(timeoutMs: number) {
    super(`Role assumption timed out after ${timeoutMs}ms`);
    this.name = "ExchangeTimeoutError";
  }
}

export class CredentialExchangeManager {
  private readonly provider: TrustProvider;
  private readonly limiter: ConcurrencyLimiter;
  private readonly refreshMarginMs: number;
  private readonly failureTtlMs: number;
  private readonly timeoutMs: number;
  private readonly durationSeconds: number;
  private readonly now: () => number;
  private readonly logger: Logger;

  private readonly results = new Map<string, CachedCredentials>();
  private readonly failures = new Map<string, CachedFailure>();
  private readonly inflight = new Map<string, Flight>();

  constructor(options: CredentialExchangeOptions) {
    this.provider = options.provider;
    this.timeoutMs = options.timeoutMs ?? 10_000;
    this.limiter = options.limiter ?? new ConcurrencyLimiter({ maxConcurrent: 8, queueTimeoutMs: this.timeoutMs });
    this.refreshMarginMs = (options.refreshMarginSeconds ?? 300) * 1000;
    this.failureTtlMs = (options.failureTtlSeconds ?? 5) * 1000;
    this.durationSeconds = options.durationSeconds ?? 3600;
    this.now = options.now ?? Date.now;
    this.logger = options.logger ?? silentLogger;
  }

  get stats(): { cached: number; failures: number; inflight: number; upstreamRunning: number } {
    return {
      cached: this.results.size,
      failures: this.failures.size,
      inflight: this.inflight.size,
      upstreamRunning: this.limiter.running
    };
  }

  /**
   * Credentials for (principal, role).
   *
   * @throws AuthError ROLE_ASSUMPTION_FAILED on upstream failure, replayed
   * failure, timeout or cancellation
   */
  async acquire(request: ExchangeRequest): Promise<ExchangeResult> {
    const { principal, roleId, current, signal } = request;

    if (current?.roleId === roleId && this.isFresh(current)) {
      this.logger.debug("role already active", { principal, roleId });
      return { credentials: current, exchanged: false };
    }

    const key = cacheKey(principal, roleId);
    const cached = this.results.get(key);
    if (cached) {
      if (this.now() < cached.validUntil) {
        this.logger.debug("credential cache hit", { principal, roleId });
        return { credentials: cached.credentials, exchanged: false };
      }
      this.results.delete(key);
    }

    const failure = this.failures.get(key);
    if (failure) {
      if (this.now() < failure.until) {
        throw new AuthError("ROLE_ASSUMPTION_FAILED", failure.message, { roleId, cachedFailure: true });
      }
      this.failures.delete(key);
    }

    if (signal?.aborted) {
      throw cancelled(roleId);
    }

    // Single flight per (principal, role)
    const flight = this.inflight.get(key) ?? this.start(key, request);
    flight.waiters++;

    let abandoned = false;
    try {
      const credentials = await untilAborted(flight.promise, signal);
      return { credentials, exchanged: true };
    } catch (err) {
      if (signal?.aborted) {
        abandoned = true;
        this.abandon(key, flight);
        throw cancelled(roleId);
      }
      throw err;
    } finally {
      if (!abandoned) {
        flight.waiters--;
      }
    }
  }

  /**
   * Drop cached credentials and failures for a principal (all roles, or one).
   */
  invalidate(principal: string, roleId?: string): void {
    if (roleId !== undefined) {
      const key = cacheKey(principal, roleId);
      this.results.delete(key);
      this.failures.delete(key);
      return;
    }
    const prefix = cacheKey(principal, "");
    for (const map of [this.results, this.failures]) {
      for (const key of map.keys()) {
        if (key.startsWith(prefix)) map.delete(key);
      }
    }
  }

  /**
   * Abort every in-flight exchange and refuse queued ones. Cached results stay.
   */
  close(): void {
    for (const [key, flight] of this.inflight) {
      flight.cancelled = true;
      this.inflight.delete(key);
      flight.controller.abort(new Error("Credential exchange is shutting down"));
    }
    this.limiter.drain("Credential exchange is shutting down");
  }

  evictExpired(): number {
    const now = this.now();
    let evicted = 0;
    for (const [key, entry] of this.results) {
      if (now >= entry.validUntil) {
        this.results.delete(key);
        evicted++;
      }
    }
    for (const [key, entry] of this.failures) {
      if (now >= entry.until) {
        this.failures.delete(key);
        evicted++;
      }
    }
    return evicted;
  }

  private start(key: string, request: ExchangeRequest): Flight {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(new ExchangeTimeoutError(this.timeoutMs)), this.timeoutMs);

    const upstream = untilAborted(
      this.limiter.run(() => this.provider.assumeRole({
        roleId: request.roleId,
        principal: request.principal,
        sessionName: request.sessionName ?? request.principal,
        durationSeconds: this.durationSeconds
      }, controller.signal), controller.signal),
      controller.signal
    );

    const flight: Flight = {
      controller,
      waiters: 0,
      cancelled: false,
      promise: upstream.then(
        credentials => {
          const stamped: ScopedCredentials = { ...credentials, roleId: request.roleId };
          this.results.set(key, { credentials: stamped, validUntil: this.validUntil(stamped) });
          this.logger.info("role assumed", { principal: request.principal, roleId: request.roleId });
          return stamped;
        },
        (err: unknown) => {
          throw this.fail(key, request, flight, err);
        }
      ).finally(() => {
        clearTimeout(timer);
        if (this.inflight.get(key) === flight) {
          this.inflight.delete(key);
        }
      })
    };

    // Waiters may all be gone by the time this settles
    flight.promise.catch((err: unknown) => {
      this.logger.debug("exchange settled without waiters", {
        roleId: request.roleId,
        reason: err instanceof Error ? err.message : String(err)
      });
    });

    this.inflight.set(key, flight);
    return flight;
  }

  private fail(key: string, request: ExchangeRequest, flight: Flight, err: unknown): AuthError {
    if (flight.cancelled) {
      return cancelled(request.roleId);
    }
    if (err instanceof CapacityExceededError) {
      this.logger.warn("credential exchange queue full", { roleId: request.roleId });
      return new AuthError("ROLE_ASSUMPTION_FAILED", "Too many concurrent role assumptions", { roleId: request.roleId });
    }
    const message = err instanceof ExchangeTimeoutError
      ? err.message
      : `Role assumption failed for ${request.roleId}: ${err instanceof Error ? err.message : String(err)}`;
    this.failures.set(key, { message, until: this.now() + this.failureTtlMs });
    this.logger.warn("role assumption failed", {
      principal: request.principal,
      roleId: request.roleId,
      reason: err instanceof Error ? err.name : "unknown"
    });
    return new AuthError("ROLE_ASSUMPTION_FAILED", message, { roleId: request.roleId });
  }

  private abandon(key: string, flight: Flight): void {
    flight.waiters--;
    if (flight.waiters > 0 || flight.cancelled) return;
    flight.cancelled = true;
    if (this.inflight.get(key) === flight) {
      this.inflight.delete(key);
    }
    flight.controller.abort(new Error("All callers abandoned the exchange"));
  }

  private isFresh(credentials: ScopedCredentials): boolean {
    if (credentials.expiration === undefined) return true;
    const expiresAt = Date.parse(credentials.expiration);
    return Number.isFinite(expiresAt) && this.now() < expiresAt - this.refreshMarginMs;
  }

  private validUntil(credentials: ScopedCredentials): number {
    const expiresAt = credentials.expiration !== undefined
      ? Date.parse(credentials.expiration)
      : Number.NaN;
    const end = Number.isFinite(expiresAt) ? expiresAt : this.now() + this.durationSeconds * 1000;
    return end - this.refreshMarginMs;
  }
}

function cacheKey(principal: string, roleId: string): string {
  return `${principal}\u0000${roleId}`;
}

function cancelled(roleId: string): AuthError {
  return new AuthError("ROLE_ASSUMPTION_FAILED", "Role assumption cancelled by the caller", { roleId, cancelled: true });
}
