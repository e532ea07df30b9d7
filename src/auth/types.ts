import { z } from "zod";

/**
 * Authentication Types
 *
 * Canonical claims, scoped credentials, session records and the per-request
 * auth state, plus the auth error taxonomy.
 */

// ============================================================================
// Claims
// ============================================================================

export const AccessLevelEnum = z.enum(["read", "write", "admin"]);

export type AccessLevel = z.infer<typeof AccessLevelEnum>;

export const ScopedCredentialsSchema = z.object({
  accessKeyId: z.string().min(1),
  secretAccessKey: z.string().min(1),
  sessionToken: z.string().optional(),
  /** ISO-8601 expiry */
  expiration: z.string().optional(),
  region: z.string().optional(),
  /** Role these credentials were issued for */
  roleId: z.string().optional(),
  source: z.enum(["exchange", "token", "ambient"])
});

export type ScopedCredentials = z.infer<typeof ScopedCredentialsSchema>;

export const ClaimSetSchema = z.object({
  /** Principal identifier (sub) */
  subject: z.string().min(1),
  /** Epoch seconds (exp) */
  expiresAt: z.number().int(),
  issuedAt: z.number().int().optional(),
  notBefore: z.number().int().optional(),
  issuer: z.string().optional(),
  tokenId: z.string().optional(),
  audience: z.array(z.string()).default([]),
  scope: z.string().default(""),
  level: AccessLevelEnum.default("read"),
  /** Canonical permission strings, e.g. s3:GetObject */
  permissions: z.array(z.string()).default([]),
  /** Buckets (or bucket globs) the principal may touch */
  resources: z.array(z.string()).default([]),
  roles: z.array(z.string()).default([]),
  /** Role ARN the token asks to run under */
  assumableRole: z.string().optional(),
  credentials: ScopedCredentialsSchema.optional()
});

export type ClaimSet = z.infer<typeof ClaimSetSchema>;

// ============================================================================
// Sessions & Runtime State
// ============================================================================

export type SessionRecord = {
  sessionId: string;
  subject: string;
  claims: ClaimSet;
  credentials?: ScopedCredentials;
  /** SHA-256 of the token that produced this record */
  tokenFingerprint: string;
  /** Epoch ms */
  createdAt: number;
  /** Epoch ms; min(createdAt + ttl, token exp) */
  expiresAt: number;
};

export const AuthSchemeEnum = z.enum(["none", "token", "assumed-role", "ambient"]);

export type AuthScheme = z.infer<typeof AuthSchemeEnum>;

export type RuntimeAuthState = {
  readonly scheme: AuthScheme;
  readonly claims?: ClaimSet;
  readonly credentials?: ScopedCredentials;
  readonly sessionId?: string;
  readonly extras: Readonly<Record<string, unknown>>;
};

export const AmbientIdentitySchema = z.object({
  subject: z.string().min(1),
  permissions: z.array(z.string()).default([]),
  resources: z.array(z.string()).default([]),
  credentials: ScopedCredentialsSchema.optional()
});

export type AmbientIdentity = z.infer<typeof AmbientIdentitySchema>;

/**
 * Safe view of credentials: no secret parts.
 */
export type CredentialsSummary = {
  accessKeyId: string;
  source: ScopedCredentials["source"];
  roleId?: string;
  expiration?: string;
  region?: string;
};

export function describeCredentials(credentials: ScopedCredentials): CredentialsSummary {
  const keyId = credentials.accessKeyId;
  return {
    accessKeyId: keyId.length > 8 ? `${keyId.slice(0, 4)}…${keyId.slice(-4)}` : "****",
    source: credentials.source,
    ...(credentials.roleId !== undefined && { roleId: credentials.roleId }),
    ...(credentials.expiration !== undefined && { expiration: credentials.expiration }),
    ...(credentials.region !== undefined && { region: credentials.region })
  };
}

// ============================================================================
// Auth Errors
// ============================================================================

export type AuthErrorCode =
  | "MISSING_TOKEN"
  | "MALFORMED_TOKEN"
  | "SIGNATURE_INVALID"
  | "EXPIRED"
  | "MISSING_REQUIRED_CLAIM"
  | "INVALID_ISSUER"
  | "INVALID_AUDIENCE"
  | "DECOMPRESSION_ERROR"
  | "UNAUTHORIZED"
  | "SESSION_EXPIRED"
  | "ROLE_ASSUMPTION_FAILED";

export type AuthErrorStatus = 401 | 403 | 502;

const ERROR_STATUS: Record<AuthErrorCode, AuthErrorStatus> = {
  MISSING_TOKEN: 401,
  MALFORMED_TOKEN: 401,
  SIGNATURE_INVALID: 401,
  EXPIRED: 401,
  MISSING_REQUIRED_CLAIM: 401,
  INVALID_ISSUER: 401,
  INVALID_AUDIENCE: 401,
  DECOMPRESSION_ERROR: 401,
  UNAUTHORIZED: 403,
  SESSION_EXPIRED: 401,
  ROLE_ASSUMPTION_FAILED: 502
};

const REMEDIATION: Record<AuthErrorCode, string> = {
  MISSING_TOKEN: "Send an 'Authorization: Bearer <token>' header",
  MALFORMED_TOKEN: "Obtain a new HS256-signed token from your identity provider",
  SIGNATURE_INVALID: "Token was not signed with the configured key; obtain a new token",
  EXPIRED: "Refresh your token and retry",
  MISSING_REQUIRED_CLAIM: "Token must carry 'sub' and 'exp' claims",
  INVALID_ISSUER: "Use a token issued by the configured issuer",
  INVALID_AUDIENCE: "Use a token minted for this server's audience",
  DECOMPRESSION_ERROR: "Token claims could not be expanded; request a token with fewer or valid resources",
  UNAUTHORIZED: "Request the missing permission or bucket access from your administrator",
  SESSION_EXPIRED: "Session expired; resend your bearer token",
  ROLE_ASSUMPTION_FAILED: "Check that the role exists and trusts this server, then retry"
};

export type AuthErrorResponse = {
  kind: "auth_error";
  code: AuthErrorCode;
  error: string;
  remediation: string;
  details?: Record<string, unknown>;
};

export class AuthError extends Error {
  readonly statusCode: AuthErrorStatus;
  readonly remediation: string;

  constructor(
    public readonly code: AuthErrorCode,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = "AuthError";
    this.statusCode = ERROR_STATUS[code];
    this.remediation = REMEDIATION[code];
  }

  toJSON(): AuthErrorResponse {
    return {
      kind: "auth_error",
      code: this.code,
      error: this.message,
      remediation: this.remediation,
      ...(this.details !== undefined && { details: this.details })
    };
  }
}

export function remediationFor(code: AuthErrorCode): string {
  return REMEDIATION[code];
}
