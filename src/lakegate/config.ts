import { z } from "zod";
import type { AmbientIdentity } from "../auth/types.js";
import type { SigningKeyConfig } from "../auth/keys.js";
import { LakegateError } from "./errors.js";

/**
 * Server configuration, parsed from the environment.
 */

// ============================================================================
// Environment Schema
// ============================================================================

const csv = z
  .string()
  .optional()
  .transform(v => (v ?? "").split(",").map(s => s.trim()).filter(s => s.length > 0));

const flag = z
  .enum(["true", "false", "1", "0", "yes", "no"])
  .optional()
  .transform(v => v === "true" || v === "1" || v === "yes");

const optionalString = z
  .string()
  .optional()
  .transform(v => (v === undefined || v.trim() === "" ? undefined : v.trim()));

const EnvSchema = z.object({
  LAKEGATE_AUTH_MODE: z.enum(["strict", "optional"]).default("strict"),
  LAKEGATE_JWT_SECRET: optionalString,
  LAKEGATE_JWT_SECRET_PARAMETER: optionalString,
  AWS_REGION: optionalString,
  AWS_DEFAULT_REGION: optionalString,
  LAKEGATE_JWT_KEY_ID: optionalString,
  LAKEGATE_JWT_ISSUER: optionalString,
  LAKEGATE_JWT_AUDIENCE: optionalString,
  LAKEGATE_JWT_CLOCK_TOLERANCE_SECONDS: z.coerce.number().int().nonnegative().default(0),
  LAKEGATE_SESSION_TTL_SECONDS: z.coerce.number().int().positive().default(3600),
  LAKEGATE_SESSION_HEADER: z.string().min(1).default("mcp-session-id"),
  LAKEGATE_ROLE_HEADER: z.string().min(1).default("x-assume-role"),
  LAKEGATE_MAX_RESOURCES: z.coerce.number().int().positive().default(32),
  LAKEGATE_CLAIM_CONFLICT: z.enum(["prefer-expanded", "reject"]).default("prefer-expanded"),
  LAKEGATE_ASSUME_ROLE_FROM_CLAIMS: flag,
  LAKEGATE_ROLE_DURATION_SECONDS: z.coerce.number().int().min(900).max(43_200).default(3600),
  LAKEGATE_ROLE_FAILURE_TTL_SECONDS: z.coerce.number().nonnegative().default(5),
  LAKEGATE_ROLE_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  LAKEGATE_MAX_CONCURRENT_EXCHANGES: z.coerce.number().int().positive().default(8),
  LAKEGATE_AMBIENT_SUBJECT: optionalString,
  LAKEGATE_AMBIENT_PERMISSIONS: csv,
  LAKEGATE_AMBIENT_BUCKETS: csv,
  LAKEGATE_PORT: z.coerce.number().int().min(0).max(65_535).default(8765),
  LAKEGATE_LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info")
});

// ============================================================================
// Resolved Configuration
// ============================================================================

export type LakegateConfig = {
  auth: {
    mode: "strict" | "optional";
    keys: SigningKeyConfig[];
    issuer?: string;
    audience?: string;
    clockToleranceSeconds: number;
    maxResources: number;
    conflictPolicy: "prefer-expanded" | "reject";
    sessionHeader: string;
    roleHeader: string;
    ambient?: AmbientIdentity;
  };
  sessions: {
    ttlSeconds: number;
  };
  roles: {
    region?: string;
    assumeFromClaims: boolean;
    durationSeconds: number;
    failureTtlSeconds: number;
    timeoutMs: number;
    maxConcurrent: number;
  };
  server: {
    port: number;
  };
  logLevel: "debug" | "info" | "warn" | "error";
};

/**
 * Parse the environment into a LakegateConfig.
 *
 * @throws LakegateError CONFIG_INVALID
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): LakegateConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new LakegateError("CONFIG_INVALID", "Invalid configuration", {
      issues: parsed.error.issues.map(i => `${i.path.join(".")}: ${i.message}`)
    });
  }
  const e = parsed.data;
  const region = e.AWS_REGION ?? e.AWS_DEFAULT_REGION;

  const keys: SigningKeyConfig[] = [];
  if (e.LAKEGATE_JWT_SECRET !== undefined && e.LAKEGATE_JWT_SECRET_PARAMETER !== undefined) {
    throw new LakegateError(
      "CONFIG_INVALID",
      "Set only one of LAKEGATE_JWT_SECRET and LAKEGATE_JWT_SECRET_PARAMETER"
    );
  }
  const keyId = e.LAKEGATE_JWT_KEY_ID;
  if (e.LAKEGATE_JWT_SECRET !== undefined) {
    keys.push({
      ...(keyId !== undefined && { keyId }),
      material: { secret: e.LAKEGATE_JWT_SECRET }
    });
  } else if (e.LAKEGATE_JWT_SECRET_PARAMETER !== undefined) {
    if (region === undefined) {
      throw new LakegateError(
        "CONFIG_INVALID",
        "LAKEGATE_JWT_SECRET_PARAMETER requires AWS_REGION or AWS_DEFAULT_REGION"
      );
    }
    keys.push({
      ...(keyId !== undefined && { keyId }),
      material: { reference: e.LAKEGATE_JWT_SECRET_PARAMETER, region }
    });
  }
  if (e.LAKEGATE_AUTH_MODE === "strict" && keys.length === 0) {
    throw new LakegateError(
      "CONFIG_INVALID",
      "Strict mode requires LAKEGATE_JWT_SECRET or LAKEGATE_JWT_SECRET_PARAMETER"
    );
  }

  const ambient: AmbientIdentity | undefined = e.LAKEGATE_AMBIENT_SUBJECT !== undefined
    ? {
        subject: e.LAKEGATE_AMBIENT_SUBJECT,
        permissions: e.LAKEGATE_AMBIENT_PERMISSIONS,
        resources: e.LAKEGATE_AMBIENT_BUCKETS
      }
    : undefined;

  return {
    auth: {
      mode: e.LAKEGATE_AUTH_MODE,
      keys,
      ...(e.LAKEGATE_JWT_ISSUER !== undefined && { issuer: e.LAKEGATE_JWT_ISSUER }),
      ...(e.LAKEGATE_JWT_AUDIENCE !== undefined && { audience: e.LAKEGATE_JWT_AUDIENCE }),
      clockToleranceSeconds: e.LAKEGATE_JWT_CLOCK_TOLERANCE_SECONDS,
      maxResources: e.LAKEGATE_MAX_RESOURCES,
      conflictPolicy: e.LAKEGATE_CLAIM_CONFLICT,
      sessionHeader: e.LAKEGATE_SESSION_HEADER.toLowerCase(),
      roleHeader: e.LAKEGATE_ROLE_HEADER.toLowerCase(),
      ...(ambient !== undefined && { ambient })
    },
    sessions: {
      ttlSeconds: e.LAKEGATE_SESSION_TTL_SECONDS
    },
    roles: {
      ...(region !== undefined && { region }),
      assumeFromClaims: e.LAKEGATE_ASSUME_ROLE_FROM_CLAIMS,
      durationSeconds: e.LAKEGATE_ROLE_DURATION_SECONDS,
      failureTtlSeconds: e.LAKEGATE_ROLE_FAILURE_TTL_SECONDS,
      timeoutMs: e.LAKEGATE_ROLE_TIMEOUT_MS,
      maxConcurrent: e.LAKEGATE_MAX_CONCURRENT_EXCHANGES
    },
    server: {
      port: e.LAKEGATE_PORT
    },
    logLevel: e.LAKEGATE_LOG_LEVEL
  };
}
