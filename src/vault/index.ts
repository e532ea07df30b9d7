/**
 * Secret reference resolution.
 */

// Types
export {
  type VaultProvider,
  type VaultConfig,
  type SecretValue,
  type GetSecretOptions,
  type VaultHealth,
  type VaultClient,
  type VaultErrorCode,
  VaultProviderEnum,
  VaultConfigSchema,
  SecretValueSchema,
  VaultError
} from "./types.js";

// Client implementations
export {
  type VaultClientOptions,
  BaseVaultClient,
  InMemoryVaultClient,
  SsmParameterVaultClient,
  createVaultClient
} from "./client.js";
