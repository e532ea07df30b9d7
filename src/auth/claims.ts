import { readFileSync } from "node:fs";
import { inflateSync } from "node:zlib";
import { z } from "zod";
import type { AccessLevel, ClaimSet, ScopedCredentials } from "./types.js";
import { AuthError } from "./types.js";

/**
 * Claims Codec
 *
 * Expands a verified token payload (compact or expanded fields) into a
 * canonical ClaimSet.
 */

export type ClaimConflictPolicy = "prefer-expanded" | "reject";

export type ClaimsCodecOptions = {
  /** Upper bound on the expanded resource set */
  maxResources?: number;
  /** What to do when an expanded and an abbreviated field disagree */
  conflictPolicy?: ClaimConflictPolicy;
};

export const DEFAULT_MAX_RESOURCES = 32;

// ============================================================================
// Permission abbreviations
// ============================================================================

const AbbreviationTableSchema = z.record(z.string().min(1), z.string().min(1));

function loadAbbreviations(): ReadonlyMap<string, string> {
  const raw = readFileSync(new URL("../../data/permission-abbreviations.json", import.meta.url), "utf8");
  const table = AbbreviationTableSchema.parse(JSON.parse(raw));
  return new Map(Object.entries(table));
}

let abbreviations: ReadonlyMap<string, string> | undefined;

export function permissionAbbreviations(): ReadonlyMap<string, string> {
  abbreviations ??= loadAbbreviations();
  return abbreviations;
}

/**
 * Expand abbreviated permission codes. Entries that are already canonical
 * (`service:Action`) pass through; anything else must be in the table.
 */
export function expandPermissionCodes(codes: readonly string[]): string[] {
  const table = permissionAbbreviations();
  return codes.map(code => {
    if (code.includes(":")) return code;
    const permission = table.get(code);
    if (permission === undefined) {
      throw new AuthError("DECOMPRESSION_ERROR", `Unknown permission abbreviation '${code}'`, { code });
    }
    return permission;
  });
}

// ============================================================================
// Resource encodings
// ============================================================================

const StringListSchema = z.array(z.string());
const StringListMapSchema = z.record(z.string(), z.array(z.string()));

const ResourceEncodingSchema = z.object({
  _type: z.string(),
  _data: z.unknown()
});

export type GroupsEncoding = {
  _type: "groups";
  _data: Record<string, string[]>;
};

const BASE64_PATTERN = /^[A-Za-z0-9+/_-]+={0,2}$/;

/** Entries a resource claim may expand to, per allowed resource, before de-duplication */
const RAW_ENTRIES_PER_RESOURCE = 4;

/** Inflated bytes allowed per raw entry */
const INFLATED_BYTES_PER_ENTRY = 128;

export type ResourceExpansionLimits = {
  /** Most entries the flat list may hold before de-duplication */
  maxEntries: number;
};

export function rawEntryLimit(maxResources: number): number {
  return maxResources * RAW_ENTRIES_PER_RESOURCE;
}

const DEFAULT_LIMITS: ResourceExpansionLimits = { maxEntries: rawEntryLimit(DEFAULT_MAX_RESOURCES) };

function malformedEncoding(kind: string, reason: string): AuthError {
  return new AuthError("DECOMPRESSION_ERROR", `Invalid '${kind}' resource encoding: ${reason}`, { encoding: kind });
}

function tooManyEntries(maxEntries: number): AuthError {
  return new AuthError(
    "DECOMPRESSION_ERROR",
    `Resource claim expands to more than ${maxEntries} entries`,
    { maxEntries }
  );
}

function checkedList(values: string[], limits: ResourceExpansionLimits): string[] {
  if (values.length > limits.maxEntries) throw tooManyEntries(limits.maxEntries);
  return values;
}

function parseStringMap(kind: string, data: unknown): Record<string, string[]> {
  const parsed = StringListMapSchema.safeParse(data);
  if (!parsed.success) {
    throw malformedEncoding(kind, "expected an object of string arrays");
  }
  return parsed.data;
}

function expandMap(
  kind: string,
  data: unknown,
  limits: ResourceExpansionLimits,
  entry: (key: string, value: string) => string
): string[] {
  const out: string[] = [];
  for (const [key, values] of Object.entries(parseStringMap(kind, data))) {
    if (out.length + values.length > limits.maxEntries) throw tooManyEntries(limits.maxEntries);
    for (const value of values) {
      out.push(entry(key, value));
    }
  }
  return out;
}

function groupEntry(prefix: string, suffix: string): string {
  return `${prefix}-${suffix}`;
}

/**
 * `quilt` values take the `quilt-` prefix. A key holding `*` is a template
 * filled with each value. Any other key (`cell`, ...) lists names as they are.
 */
function patternEntry(key: string, value: string): string {
  if (key === "quilt") return `quilt-${value}`;
  if (key.includes("*")) return key.replaceAll("*", value);
  return value;
}

function expandCompressed(data: unknown, limits: ResourceExpansionLimits): string[] {
  if (typeof data !== "string" || !BASE64_PATTERN.test(data)) {
    throw malformedEncoding("compressed", "expected a base64 string");
  }
  let bytes: Buffer = Buffer.from(data, "base64");
  // zlib streams start with 0x78
  if (bytes.length > 0 && bytes[0] === 0x78) {
    const maxOutputLength = limits.maxEntries * INFLATED_BYTES_PER_ENTRY;
    try {
      bytes = inflateSync(bytes, { maxOutputLength });
    } catch (err) {
      if (err instanceof RangeError) {
        throw new AuthError(
          "DECOMPRESSION_ERROR",
          `Compressed resource claim inflates past ${maxOutputLength} bytes`,
          { maxBytes: maxOutputLength }
        );
      }
      throw malformedEncoding("compressed", err instanceof Error ? err.message : "inflate failed");
    }
  }
  let decoded: unknown;
  try {
    decoded = JSON.parse(bytes.toString("utf8"));
  } catch {
    throw malformedEncoding("compressed", "payload is not JSON");
  }
  const parsed = StringListSchema.safeParse(decoded);
  if (!parsed.success) {
    throw malformedEncoding("compressed", "payload is not a string array");
  }
  return checkedList(parsed.data, limits);
}

/**
 * Expand any supported resource encoding into a flat list (not yet de-duplicated).
 *
 * @throws AuthError DECOMPRESSION_ERROR for unknown or malformed encodings, and
 * for lists longer than `limits.maxEntries`
 */
export function expandResourceEncoding(
  encoding: unknown,
  limits: ResourceExpansionLimits = DEFAULT_LIMITS
): string[] {
  const plain = StringListSchema.safeParse(encoding);
  if (plain.success) return checkedList(plain.data, limits);

  const tagged = ResourceEncodingSchema.safeParse(encoding);
  if (!tagged.success) {
    throw new AuthError("DECOMPRESSION_ERROR", "Resource claim is neither a list nor a tagged encoding");
  }

  switch (tagged.data._type) {
    case "groups":
      return expandMap("groups", tagged.data._data, limits, groupEntry);
    case "patterns":
      return expandMap("patterns", tagged.data._data, limits, patternEntry);
    case "compressed":
      return expandCompressed(tagged.data._data, limits);
    default:
      throw new AuthError(
        "DECOMPRESSION_ERROR",
        `Unsupported resource encoding '${tagged.data._type}'`,
        { encoding: tagged.data._type }
      );
  }
}

/**
 * Re-encode a resource list in the `groups` form. Names without a dash
 * cannot be grouped and are rejected.
 */
export function groupResources(resources: readonly string[]): GroupsEncoding {
  const data: Record<string, string[]> = {};
  for (const resource of unique(resources)) {
    const cut = resource.indexOf("-");
    if (cut <= 0 || cut === resource.length - 1) {
      throw new AuthError("DECOMPRESSION_ERROR", `Resource '${resource}' has no prefix-suffix form`);
    }
    const prefix = resource.slice(0, cut);
    (data[prefix] ??= []).push(resource.slice(cut + 1));
  }
  return { _type: "groups", _data: data };
}

// ============================================================================
// Codec
// ============================================================================

const LEVEL_ALIASES: Record<string, AccessLevel> = {
  r: "read",
  read: "read",
  w: "write",
  write: "write",
  a: "admin",
  admin: "admin"
};

const ROLE_ARN_PATTERN = /^arn:aws[a-z-]*:iam::\d{12}:role\/.+/;

const ROLE_KEYS = ["aws_role_arn", "awsRoleArn", "role_arn", "roleArn"] as const;
const CREDENTIAL_KEYS = ["aws_credentials", "awsCredentials", "credentials"] as const;

const EmbeddedCredentialsSchema = z.object({
  access_key_id: z.string().min(1).optional(),
  accessKeyId: z.string().min(1).optional(),
  secret_access_key: z.string().min(1).optional(),
  secretAccessKey: z.string().min(1).optional(),
  session_token: z.string().optional(),
  sessionToken: z.string().optional(),
  expiration: z.string().optional(),
  region: z.string().optional()
});

function unique(values: readonly string[]): string[] {
  return [...new Set(values)];
}

function sameSet(a: readonly string[], b: readonly string[]): boolean {
  const left = new Set(a);
  const right = new Set(b);
  return left.size === right.size && [...left].every(v => right.has(v));
}

function isPresent(value: unknown): boolean {
  if (value === undefined || value === null) return false;
  if (typeof value === "string") return value.length > 0;
  if (Array.isArray(value)) return value.length > 0;
  if (typeof value === "object") return Object.keys(value).length > 0;
  return true;
}

/** Lists may arrive as arrays or comma-separated strings */
function toStringList(field: string, value: unknown): string[] {
  if (typeof value === "string") {
    return value.split(",").map(s => s.trim()).filter(s => s.length > 0);
  }
  const parsed = StringListSchema.safeParse(value);
  if (!parsed.success) {
    throw new AuthError("MALFORMED_TOKEN", `Claim '${field}' must be a list of strings`, { field });
  }
  return parsed.data;
}

function toLevel(field: string, value: unknown): AccessLevel {
  const level = typeof value === "string" ? LEVEL_ALIASES[value.toLowerCase()] : undefined;
  if (level === undefined) {
    throw new AuthError("MALFORMED_TOKEN", `Claim '${field}' is not a known access level`, { field });
  }
  return level;
}

function toScope(field: string, value: unknown): string {
  if (typeof value === "string") return value;
  const list = StringListSchema.safeParse(value);
  if (list.success) return list.data.join(" ");
  throw new AuthError("MALFORMED_TOKEN", `Claim '${field}' must be a string`, { field });
}

type FieldSpec<T> = {
  name: string;
  expanded: string;
  compact: string;
  decode: (field: string, value: unknown) => T;
  equal: (a: T, b: T) => boolean;
};

export class ClaimsCodec {
  readonly maxResources: number;
  readonly conflictPolicy: ClaimConflictPolicy;
  private readonly expansionLimits: ResourceExpansionLimits;

  constructor(options: ClaimsCodecOptions = {}) {
    this.maxResources = options.maxResources ?? DEFAULT_MAX_RESOURCES;
    this.expansionLimits = { maxEntries: rawEntryLimit(this.maxResources) };
    this.conflictPolicy = options.conflictPolicy ?? "prefer-expanded";
    // Fail at startup, not on the first token
    permissionAbbreviations();
  }

  /**
   * Expand a verified payload into a ClaimSet.
   *
   * @throws AuthError MISSING_REQUIRED_CLAIM, MALFORMED_TOKEN or DECOMPRESSION_ERROR
   */
  expand(payload: Record<string, unknown>): ClaimSet {
    const subject = payload.sub;
    if (typeof subject !== "string" || subject.length === 0) {
      throw new AuthError("MISSING_REQUIRED_CLAIM", "Token is missing the 'sub' claim", { claim: "sub" });
    }
    const expiresAt = payload.exp;
    if (typeof expiresAt !== "number" || !Number.isFinite(expiresAt)) {
      throw new AuthError("MISSING_REQUIRED_CLAIM", "Token is missing the 'exp' claim", { claim: "exp" });
    }

    const permissions = this.resolve(payload, {
      name: "permissions",
      expanded: "permissions",
      compact: "p",
      decode: (field, value) => {
        const list = toStringList(field, value);
        return unique(field === "p" ? expandPermissionCodes(list) : list);
      },
      equal: sameSet
    }) ?? [];

    const resources = this.resolve(payload, {
      name: "buckets",
      expanded: "buckets",
      compact: "b",
      decode: (_field, value) => unique(expandResourceEncoding(value, this.expansionLimits)),
      equal: sameSet
    }) ?? [];

    if (resources.length > this.maxResources) {
      throw new AuthError(
        "DECOMPRESSION_ERROR",
        `Token grants ${resources.length} buckets, more than the allowed ${this.maxResources}`,
        { count: resources.length, max: this.maxResources }
      );
    }

    const roles = this.resolve(payload, {
      name: "roles",
      expanded: "roles",
      compact: "r",
      decode: (field, value) => unique(toStringList(field, value)),
      equal: sameSet
    }) ?? [];

    const scope = this.resolve(payload, {
      name: "scope",
      expanded: "scope",
      compact: "s",
      decode: toScope,
      equal: (a, b) => a === b
    }) ?? "";

    const level = this.resolve(payload, {
      name: "level",
      expanded: "level",
      compact: "l",
      decode: toLevel,
      equal: (a, b) => a === b
    }) ?? "read";

    const claims: ClaimSet = {
      subject,
      expiresAt: Math.floor(expiresAt),
      audience: this.audience(payload.aud),
      scope,
      level,
      permissions,
      resources,
      roles
    };
    if (typeof payload.iat === "number") claims.issuedAt = Math.floor(payload.iat);
    if (typeof payload.nbf === "number") claims.notBefore = Math.floor(payload.nbf);
    if (typeof payload.iss === "string") claims.issuer = payload.iss;
    if (typeof payload.jti === "string") claims.tokenId = payload.jti;

    const assumableRole = this.assumableRole(payload, roles);
    if (assumableRole !== undefined) claims.assumableRole = assumableRole;

    const credentials = this.embeddedCredentials(payload);
    if (credentials !== undefined) claims.credentials = credentials;

    return claims;
  }

  private resolve<T>(payload: Record<string, unknown>, field: FieldSpec<T>): T | undefined {
    const expandedRaw = payload[field.expanded];
    const compactRaw = payload[field.compact];
    const hasExpanded = isPresent(expandedRaw);
    const hasCompact = isPresent(compactRaw);

    if (hasExpanded && hasCompact && this.conflictPolicy === "reject") {
      const expanded = field.decode(field.expanded, expandedRaw);
      const compact = field.decode(field.compact, compactRaw);
      if (!field.equal(expanded, compact)) {
        throw new AuthError(
          "MALFORMED_TOKEN",
          `Claims '${field.expanded}' and '${field.compact}' disagree`,
          { field: field.name }
        );
      }
      return expanded;
    }
    if (hasExpanded) return field.decode(field.expanded, expandedRaw);
    if (hasCompact) return field.decode(field.compact, compactRaw);
    return undefined;
  }

  private audience(aud: unknown): string[] {
    if (typeof aud === "string") return [aud];
    const list = StringListSchema.safeParse(aud);
    return list.success ? list.data : [];
  }

  private assumableRole(payload: Record<string, unknown>, roles: readonly string[]): string | undefined {
    for (const key of ROLE_KEYS) {
      const value = payload[key];
      if (typeof value === "string" && value.length > 0) return value;
    }
    return roles.find(role => ROLE_ARN_PATTERN.test(role));
  }

  private embeddedCredentials(payload: Record<string, unknown>): ScopedCredentials | undefined {
    for (const key of CREDENTIAL_KEYS) {
      const parsed = EmbeddedCredentialsSchema.safeParse(payload[key]);
      if (!parsed.success) continue;
      const raw = parsed.data;
      const accessKeyId = raw.access_key_id ?? raw.accessKeyId;
      const secretAccessKey = raw.secret_access_key ?? raw.secretAccessKey;
      if (accessKeyId === undefined || secretAccessKey === undefined) continue;

      const credentials: ScopedCredentials = { accessKeyId, secretAccessKey, source: "token" };
      const sessionToken = raw.session_token ?? raw.sessionToken;
      if (sessionToken !== undefined) credentials.sessionToken = sessionToken;
      if (raw.expiration !== undefined) credentials.expiration = raw.expiration;
      if (raw.region !== undefined) credentials.region = raw.region;
      return credentials;
    }
    return undefined;
  }
}
