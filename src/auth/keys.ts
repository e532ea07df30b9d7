import { LakegateError } from "../lakegate/errors.js";
import type { Logger } from "../lakegate/log.js";
import { silentLogger } from "../lakegate/log.js";
import type { SecretValue, VaultClient, VaultHealth } from "../vault/types.js";
import { VaultError } from "../vault/types.js";
import { createVaultClient } from "../vault/client.js";
import { AuthError } from "./types.js";

/**
 * Signing Key Resolver
 *
 * Maps a token's `kid` to HS256 secret material. Material is either inline or
 * a reference resolved through one vault client per region.
 */

export type KeyMaterial =
  | { secret: string }
  | { reference: string; region: string };

export type SigningKeyConfig = {
  /** Matched against the token header `kid`; a key without one is the default */
  keyId?: string;
  material: KeyMaterial;
};

export type ResolvedKey = {
  keyId?: string;
  secret: Uint8Array;
  /** Value replaced by the last rotation, tried once on signature failure */
  previous?: Uint8Array;
};

export type SigningKeyResolverOptions = {
  /** Builds the vault client for a region; defaults to the SSM client */
  vaultFactory?: (region: string) => VaultClient;
  logger?: Logger;
};

const encoder = new TextEncoder();

function secretBytes(value: SecretValue, reference: string): Uint8Array {
  if (typeof value.value !== "string" || value.value.length === 0) {
    throw new LakegateError("CONFIG_INVALID", `Secret reference '${reference}' does not hold a string value`);
  }
  return encoder.encode(value.value);
}

export class SigningKeyResolver {
  private readonly keys: readonly SigningKeyConfig[];
  private readonly vaults = new Map<string, VaultClient>();
  private readonly vaultFactory: (region: string) => VaultClient;
  private readonly logger: Logger;

  constructor(keys: readonly SigningKeyConfig[], options: SigningKeyResolverOptions = {}) {
    for (const key of keys) {
      if ("secret" in key.material && key.material.secret.length === 0) {
        throw new LakegateError("CONFIG_INVALID", "Inline signing secret is empty", { keyId: key.keyId });
      }
      if ("reference" in key.material && key.material.region.length === 0) {
        throw new LakegateError("CONFIG_INVALID", "Secret reference requires a region", { keyId: key.keyId });
      }
    }
    this.keys = keys;
    this.vaultFactory = options.vaultFactory ?? (region => createVaultClient({ provider: "ssm", region }));
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Resolve the key for a token header `kid`.
   *
   * @throws AuthError SIGNATURE_INVALID for an unknown kid
   * @throws LakegateError CONFIG_INVALID when referenced material is missing
   */
  async resolve(kid: string | undefined, options: { forceRefresh?: boolean } = {}): Promise<ResolvedKey> {
    const key = this.select(kid);
    const material = key.material;

    if ("secret" in material) {
      return { ...(key.keyId !== undefined && { keyId: key.keyId }), secret: encoder.encode(material.secret) };
    }

    const vault = this.vaultFor(material.region);
    let value: SecretValue | null;
    try {
      value = await vault.get(material.reference, { forceRefresh: options.forceRefresh ?? false });
    } catch (err) {
      if (err instanceof VaultError) {
        throw new LakegateError(
          err.code === "ACCESS_DENIED" ? "CONFIG_INVALID" : "UPSTREAM_UNAVAILABLE",
          `Could not resolve signing key reference '${material.reference}': ${err.message}`,
          { region: material.region }
        );
      }
      throw err;
    }
    if (value === null) {
      throw new LakegateError("CONFIG_INVALID", `Signing key reference '${material.reference}' not found`, {
        region: material.region
      });
    }

    const previous = vault.previous(material.reference);
    return {
      ...(key.keyId !== undefined && { keyId: key.keyId }),
      secret: secretBytes(value, material.reference),
      ...(previous !== undefined && typeof previous.value === "string" && { previous: encoder.encode(previous.value) })
    };
  }

  /** Health of each secret store used so far, one per region. */
  health(): Array<VaultHealth & { region: string }> {
    return [...this.vaults].map(([region, vault]) => ({ region, ...vault.health() }));
  }

  /** Whether a forced refresh could yield different material for this kid. */
  isReferenced(kid: string | undefined): boolean {
    return "reference" in this.select(kid).material;
  }

  private select(kid: string | undefined): SigningKeyConfig {
    if (kid === undefined) {
      const fallback = this.keys.find(k => k.keyId === undefined) ?? this.keys[0];
      // Only possible in optional mode, where tokens are best-effort
      if (fallback === undefined) {
        throw new AuthError("SIGNATURE_INVALID", "No signing key is configured to verify tokens");
      }
      return fallback;
    }
    const match = this.keys.find(k => k.keyId === kid);
    if (match === undefined) {
      throw new AuthError("SIGNATURE_INVALID", "Token was signed with an unknown key", { kid });
    }
    return match;
  }

  private vaultFor(region: string): VaultClient {
    let vault = this.vaults.get(region);
    if (!vault) {
      this.logger.debug("creating vault client", { region });
      vault = this.vaultFactory(region);
      this.vaults.set(region, vault);
    }
    return vault;
  }
}
