/**
 * Operation authorization.
 */

// Types
export {
  type ResourceRequirement,
  type PermissionRequirement,
  type DecisionReason,
  type AuthorizationDecision,
  type AuthorizationSubject
} from "./types.js";

// Permission table
export {
  type OperationName,
  type OperationTable,
  DEFAULT_OPERATIONS,
  buildOperationTable,
  isOperationName
} from "./operations.js";

// Engine
export {
  type AuthorizationEngineOptions,
  AuthorizationEngine,
  grants,
  subjectFromState
} from "./engine.js";

// Middleware
export {
  type OperationGuardOptions,
  requireOperation,
  decisionError
} from "./middleware.js";
