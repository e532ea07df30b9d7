/**
 * Authentication: token validation, claims expansion, sessions, role
 * assumption and per-request auth state.
 */

// Types
export {
  type AccessLevel,
  type ClaimSet,
  type ScopedCredentials,
  type SessionRecord,
  type AuthScheme,
  type RuntimeAuthState,
  type AmbientIdentity,
  type CredentialsSummary,
  type AuthErrorCode,
  type AuthErrorStatus,
  type AuthErrorResponse,
  AccessLevelEnum,
  ClaimSetSchema,
  ScopedCredentialsSchema,
  AuthSchemeEnum,
  AmbientIdentitySchema,
  AuthError,
  describeCredentials,
  remediationFor
} from "./types.js";

// Claims
export {
  type ClaimConflictPolicy,
  type ClaimsCodecOptions,
  type GroupsEncoding,
  type ResourceExpansionLimits,
  ClaimsCodec,
  DEFAULT_MAX_RESOURCES,
  expandPermissionCodes,
  expandResourceEncoding,
  groupResources,
  permissionAbbreviations,
  rawEntryLimit
} from "./claims.js";

// Keys & JWT verification
export {
  type KeyMaterial,
  type SigningKeyConfig,
  type ResolvedKey,
  type SigningKeyResolverOptions,
  SigningKeyResolver
} from "./keys.js";
export {
  type TokenValidatorOptions,
  type ValidatedToken,
  TokenValidator,
  mapJoseError,
  tokenFingerprint
} from "./jwt.js";

// Sessions
export {
  type SessionCacheOptions,
  type SessionProbe,
  type StoreSessionInput,
  SessionCache,
  DEFAULT_SESSION_TTL_SECONDS
} from "./sessions.js";

// Credential exchange
export {
  type AssumeRoleRequest,
  type TrustProvider,
  type StsTrustProviderOptions,
  type CredentialExchangeOptions,
  type ExchangeRequest,
  type ExchangeResult,
  StsTrustProvider,
  CredentialExchangeManager,
  sanitizeSessionName
} from "./credentials.js";

// Request context
export { type ContextToken, RequestContextPropagator, NO_AUTH_STATE } from "./context.js";

// Middleware
export {
  type AuthMode,
  type AuthRequest,
  type RequestAuthenticatorOptions,
  type AuthMiddlewareOptions,
  RequestAuthenticator,
  createAuthMiddleware,
  parseAuthorization
} from "./middleware.js";
