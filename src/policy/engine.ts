import picomatch from "picomatch";
import type { RuntimeAuthState } from "../auth/types.js";
import { remediationFor } from "../auth/types.js";
import type { Logger } from "../lakegate/log.js";
import { silentLogger } from "../lakegate/log.js";
import type { OperationTable } from "./operations.js";
import { DEFAULT_OPERATIONS } from "./operations.js";
import type { AuthorizationDecision, AuthorizationSubject, PermissionRequirement } from "./types.js";

/**
 * Authorization Engine
 *
 * decide(operation, resource, subject) is a pure function of its inputs and
 * the frozen operation table. Nothing is cached.
 */

export type AuthorizationEngineOptions = {
  operations?: OperationTable;
  logger?: Logger;
};

const GLOB_CHARS = /[*?[\]{}!]/;

/** Literal membership, else any granted entry used as a glob */
export function grants(granted: readonly string[], value: string): boolean {
  if (granted.includes(value)) return true;
  const patterns = granted.filter(g => GLOB_CHARS.test(g));
  return patterns.length > 0 && picomatch.isMatch(value, patterns);
}

export function subjectFromState(state: RuntimeAuthState): AuthorizationSubject | undefined {
  if (state.scheme === "none" || !state.claims) return undefined;
  return {
    subject: state.claims.subject,
    permissions: state.claims.permissions,
    resources: state.claims.resources
  };
}

export class AuthorizationEngine {
  private readonly operations: OperationTable;
  private readonly logger: Logger;

  constructor(options: AuthorizationEngineOptions = {}) {
    this.operations = options.operations ?? DEFAULT_OPERATIONS;
    this.logger = options.logger ?? silentLogger;
  }

  requirement(operation: string): PermissionRequirement | undefined {
    return this.operations.get(operation);
  }

  listOperations(): Array<{ operation: string } & PermissionRequirement> {
    return [...this.operations.entries()]
      .map(([operation, requirement]) => ({ operation, ...requirement }))
      .sort((a, b) => a.operation.localeCompare(b.operation));
  }

  decide(
    operation: string,
    resource: string | undefined,
    subject: AuthorizationSubject | undefined
  ): AuthorizationDecision {
    const base = {
      operation,
      ...(resource !== undefined && { resource })
    };

    const requirement = this.operations.get(operation);
    if (!requirement) {
      return {
        ...base,
        allowed: false,
        reason: "unknown_operation",
        message: `Operation '${operation}' is not recognized`,
        remediation: "Use one of the operations listed by operations_list"
      };
    }

    if (!subject) {
      return {
        ...base,
        allowed: false,
        reason: "unauthenticated",
        message: `Operation '${operation}' requires an authenticated identity`,
        remediation: remediationFor("MISSING_TOKEN")
      };
    }

    const missingPermissions = requirement.permissions.filter(p => !grants(subject.permissions, p));
    if (missingPermissions.length > 0) {
      return {
        ...base,
        allowed: false,
        reason: "missing_permissions",
        message: `Operation '${operation}' requires missing permissions: ${missingPermissions.join(", ")}`,
        remediation: remediationFor("UNAUTHORIZED"),
        missingPermissions
      };
    }

    if (requirement.resource === "bucket" && (resource === undefined || resource.length === 0)) {
      return {
        ...base,
        allowed: false,
        reason: "resource_required",
        message: `Operation '${operation}' requires a bucket`,
        remediation: "Name the bucket to operate on"
      };
    }

    if (requirement.resource !== "none" && resource !== undefined && resource.length > 0
      && !grants(subject.resources, resource)) {
      return {
        ...base,
        allowed: false,
        reason: "resource_not_authorized",
        message: `Bucket '${resource}' is not authorized for ${subject.subject}`,
        remediation: remediationFor("UNAUTHORIZED")
      };
    }

    return {
      ...base,
      allowed: true,
      reason: "allowed",
      message: `Operation '${operation}' allowed`
    };
  }

  /**
   * decide() against the propagated state; an allow carries the state's credentials.
   */
  authorize(operation: string, resource: string | undefined, state: RuntimeAuthState): AuthorizationDecision {
    const subject = subjectFromState(state);
    const decision = this.decide(operation, resource, subject);

    const fields = {
      operation,
      resource: resource ?? null,
      subject: subject?.subject ?? null,
      scheme: state.scheme,
      reason: decision.reason
    };
    if (decision.allowed) {
      this.logger.info("authorization allowed", fields);
      return state.credentials ? { ...decision, credentials: state.credentials } : decision;
    }
    this.logger.warn("authorization denied", fields);
    return decision;
  }
}
