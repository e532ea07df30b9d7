import { GetParameterCommand, ParameterNotFound, SSMClient } from "@aws-sdk/client-ssm";
import type { Logger } from "../lakegate/log.js";
import { silentLogger } from "../lakegate/log.js";
import type { GetSecretOptions, SecretValue, VaultClient, VaultConfig, VaultHealth, VaultProvider } from "./types.js";
import { VaultConfigSchema, VaultError } from "./types.js";

/**
 * Vault Client Implementations
 *
 * Secret retrieval with a soft refresh window, stale-on-error serving up to a
 * hard TTL, and the previous value kept for key rotation.
 */

// ============================================================================
// Base Client with Caching
// ============================================================================

type CacheEntry = {
  value: SecretValue;
  fetchedAt: number;
  previous?: SecretValue;
};

export type VaultClientOptions = {
  logger?: Logger;
  /** Clock in epoch ms */
  now?: () => number;
};

type Fetched = Omit<SecretValue, "fetchedAt">;

export abstract class BaseVaultClient implements VaultClient {
  abstract readonly provider: VaultProvider;

  protected cache: Map<string, CacheEntry> = new Map();
  protected config: VaultConfig;
  protected softTtlMs: number;
  protected hardTtlMs: number;
  protected logger: Logger;
  protected now: () => number;
  private pending: Map<string, Promise<SecretValue | null>> = new Map();
  private lastFailure: string | undefined;

  constructor(config: VaultConfig, options: VaultClientOptions = {}) {
    this.config = config;
    this.softTtlMs = config.softTtlSeconds * 1000;
    this.hardTtlMs = Math.max(config.hardTtlSeconds, config.softTtlSeconds) * 1000;
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? Date.now;
  }

  async get(key: string, options: GetSecretOptions = {}): Promise<SecretValue | null> {
    const fullKey = this.config.pathPrefix + key;

    const cached = this.cache.get(fullKey);
    if (cached && !options.forceRefresh && this.now() - cached.fetchedAt < this.softTtlMs) {
      return cached.value;
    }

    // One backend call per key at a time
    const inFlight = this.pending.get(fullKey);
    if (inFlight) return inFlight;

    const refresh = this.refresh(fullKey).finally(() => {
      this.pending.delete(fullKey);
    });
    this.pending.set(fullKey, refresh);
    return refresh;
  }

  previous(key: string): SecretValue | undefined {
    return this.cache.get(this.config.pathPrefix + key)?.previous;
  }

  health(): VaultHealth {
    return {
      healthy: this.lastFailure === undefined,
      provider: this.provider,
      ...(this.lastFailure !== undefined && { message: this.lastFailure })
    };
  }

  private async refresh(fullKey: string): Promise<SecretValue | null> {
    const cached = this.cache.get(fullKey);
    let fetched: Fetched | null;
    try {
      fetched = await this.fetchSecret(fullKey);
    } catch (err) {
      this.lastFailure = err instanceof Error ? err.message : String(err);
      if (cached && this.now() - cached.fetchedAt < this.hardTtlMs) {
        this.logger.warn("secret refresh failed, serving cached value", {
          key: fullKey,
          ageMs: this.now() - cached.fetchedAt,
          reason: err instanceof Error ? err.message : String(err)
        });
        return cached.value;
      }
      if (err instanceof VaultError) throw err;
      throw new VaultError("CONNECTION_FAILED", `Secret fetch failed for '${fullKey}'`, {
        reason: err instanceof Error ? err.message : String(err)
      });
    }

    this.lastFailure = undefined;
    if (fetched === null) {
      this.cache.delete(fullKey);
      return null;
    }

    const fetchedAt = this.now();
    const value: SecretValue = { ...fetched, fetchedAt };
    const changed = cached !== undefined && !sameValue(cached.value, value);
    const previous = changed ? cached.value : cached?.previous;
    this.cache.set(fullKey, { value, fetchedAt, ...(previous !== undefined && { previous }) });
    if (changed) {
      this.logger.info("secret value rotated", { key: fullKey });
    }
    return value;
  }

  protected abstract fetchSecret(fullKey: string): Promise<Fetched | null>;
}

function sameValue(a: SecretValue, b: SecretValue): boolean {
  return JSON.stringify(a.value) === JSON.stringify(b.value);
}

// ============================================================================
// In-Memory Client (Testing)
// ============================================================================

export class InMemoryVaultClient extends BaseVaultClient {
  readonly provider = "memory";
  private secrets: Map<string, string | Record<string, unknown>> = new Map();
  private failure: Error | null = null;
  fetchCount = 0;

  constructor(
    config: VaultConfig,
    initialSecrets?: Map<string, string | Record<string, unknown>>,
    options: VaultClientOptions = {}
  ) {
    super(config, options);
    if (initialSecrets) {
      for (const [key, value] of initialSecrets) {
        this.secrets.set(this.config.pathPrefix + key, value);
      }
    }
  }

  /** Replace a value in the backend; the cache is left alone. */
  set(key: string, value: string | Record<string, unknown>): void {
    this.secrets.set(this.config.pathPrefix + key, value);
  }

  /** Make every fetch fail until cleared with null. */
  failWith(err: Error | null): void {
    this.failure = err;
  }

  protected async fetchSecret(fullKey: string): Promise<Fetched | null> {
    this.fetchCount++;
    if (this.failure) throw this.failure;
    const value = this.secrets.get(fullKey);
    if (value === undefined) return null;
    return { key: fullKey.slice(this.config.pathPrefix.length), value };
  }
}

// ============================================================================
// SSM Parameter Store Client (Production)
// ============================================================================

export class SsmParameterVaultClient extends BaseVaultClient {
  readonly provider = "ssm";
  private client: SSMClient;

  constructor(config: VaultConfig, options: VaultClientOptions & { client?: SSMClient } = {}) {
    super(config, options);
    if (!config.region) {
      throw new VaultError("INVALID_CONFIG", "SSM parameter store requires a region");
    }
    this.client = options.client ?? new SSMClient({
      region: config.region,
      ...(config.endpoint !== undefined && { endpoint: config.endpoint })
    });
  }

  protected async fetchSecret(fullKey: string): Promise<Fetched | null> {
    try {
      const response = await this.client.send(
        new GetParameterCommand({ Name: fullKey, WithDecryption: true })
      );
      const parameter = response.Parameter;
      if (parameter?.Value === undefined) {
        return null;
      }
      return {
        key: fullKey.slice(this.config.pathPrefix.length),
        value: parameter.Value,
        ...(parameter.Version !== undefined && { version: parameter.Version })
      };
    } catch (err) {
      if (err instanceof ParameterNotFound) {
        return null;
      }
      if (err instanceof Error && err.name === "AccessDeniedException") {
        throw new VaultError("ACCESS_DENIED", `Access denied reading parameter '${fullKey}'`);
      }
      throw new VaultError("CONNECTION_FAILED", `SSM request failed: ${err instanceof Error ? err.message : String(err)}`);
    }
  }
}

// ============================================================================
// Factory
// ============================================================================

export function createVaultClient(
  input: Partial<VaultConfig> & Pick<VaultConfig, "provider">,
  options: VaultClientOptions = {}
): VaultClient {
  const config = VaultConfigSchema.parse(input);
  switch (config.provider) {
    case "memory":
      return new InMemoryVaultClient(config, undefined, options);
    case "ssm":
      return new SsmParameterVaultClient(config, options);
  }
}
