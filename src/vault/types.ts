import { z } from "zod";

/**
 * Secret Reference Types
 *
 * Read-side secret resolution used for signing keys. Backends are an SSM
 * parameter store per region, or memory (tests).
 */

// ============================================================================
// Vault Configuration
// ============================================================================

export const VaultProviderEnum = z.enum([
  "ssm",    // AWS SSM Parameter Store (SecureString)
  "memory"  // In-memory (testing)
]);

export type VaultProvider = z.infer<typeof VaultProviderEnum>;

export const VaultConfigSchema = z.object({
  provider: VaultProviderEnum,
  /** Region for the ssm provider */
  region: z.string().min(1).optional(),
  /** Endpoint override (LocalStack and friends) */
  endpoint: z.string().url().optional(),
  /** Age after which a cached value is refetched */
  softTtlSeconds: z.number().int().nonnegative().default(300),
  /** Age after which a stale value may no longer be served when refresh fails */
  hardTtlSeconds: z.number().int().nonnegative().default(3600),
  /** Prefix for secret paths */
  pathPrefix: z.string().default("")
});

export type VaultConfig = z.infer<typeof VaultConfigSchema>;

// ============================================================================
// Secret Types
// ============================================================================

export const SecretValueSchema = z.object({
  key: z.string(),
  value: z.union([z.string(), z.record(z.unknown())]),
  /** Backend version, when the backend reports one */
  version: z.number().int().optional(),
  /** Epoch ms of the fetch that produced this value */
  fetchedAt: z.number()
});

export type SecretValue = z.infer<typeof SecretValueSchema>;

export type GetSecretOptions = {
  /** Bypass the soft TTL */
  forceRefresh?: boolean;
};

/** Outcome of the most recent backend fetch */
export type VaultHealth = { healthy: boolean; provider: VaultProvider; message?: string };

// ============================================================================
// Vault Client Interface
// ============================================================================

export interface VaultClient {
  readonly provider: VaultProvider;

  /**
   * Get a secret by key. Serves the cached value inside the soft TTL and a
   * stale value inside the hard TTL when the backend is unreachable.
   */
  get(key: string, options?: GetSecretOptions): Promise<SecretValue | null>;

  /**
   * The value that was replaced by the most recent refresh, if it changed.
   */
  previous(key: string): SecretValue | undefined;

  health(): VaultHealth;
}

// ============================================================================
// Errors
// ============================================================================

export class VaultError extends Error {
  constructor(
    public readonly code: VaultErrorCode,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = "VaultError";
  }
}

export type VaultErrorCode =
  | "NOT_FOUND"
  | "ACCESS_DENIED"
  | "CONNECTION_FAILED"
  | "INVALID_CONFIG";
