/**
 * Library entry point.
 */

export * from "./auth/index.js";
export * from "./policy/index.js";
export * from "./vault/index.js";

export {
  type LakegateErrorCode,
  LakegateError,
  toLakegateError,
  statusForLakegateError
} from "./lakegate/errors.js";
export { type LogLevel, type Logger, type LoggerOptions, createLogger, redact, silentLogger } from "./lakegate/log.js";
export { type LakegateConfig, loadConfig } from "./lakegate/config.js";
export { type Gateway, type GatewayDeps, createGateway } from "./lakegate/gateway.js";
export {
  type ConcurrencyLimiterOptions,
  ConcurrencyLimiter,
  CapacityExceededError
} from "./lakegate/utils/concurrencyLimiter.js";

export { type HttpServerHandle, createHttpApp, describeState, startHttpServer } from "./server/http.js";
export {
  type ToolDefinition,
  type ToolResult,
  type ToolHandlers,
  type ToolHandlerOptions,
  TOOL_DEFINITIONS,
  createToolHandlers,
  toErrorResponse
} from "./server/tools.js";
