import type { ScopedCredentials } from "../auth/types.js";

/**
 * Authorization Types
 */

// ============================================================================
// Permission Table
// ============================================================================

export type ResourceRequirement = "bucket" | "optional" | "none";

export type PermissionRequirement = {
  readonly permissions: readonly string[];
  readonly resource: ResourceRequirement;
};

// ============================================================================
// Decisions
// ============================================================================

export type DecisionReason =
  | "allowed"
  | "unknown_operation"
  | "unauthenticated"
  | "missing_permissions"
  | "resource_required"
  | "resource_not_authorized";

export type AuthorizationDecision = {
  allowed: boolean;
  reason: DecisionReason;
  message: string;
  remediation?: string;
  operation: string;
  resource?: string;
  missingPermissions?: string[];
  /** Present on an allowed decision from `authorize` */
  credentials?: ScopedCredentials;
};

/**
 * What a decision is evaluated against: the permissions and buckets of
 * the current identity.
 */
export type AuthorizationSubject = {
  subject: string;
  permissions: readonly string[];
  resources: readonly string[];
};
