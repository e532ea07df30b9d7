import { describe, expect, it } from "vitest";
import { z } from "zod";
import { AuthError, describeCredentials, remediationFor } from "../src/auth/types.js";
import { LakegateError, statusForLakegateError, toLakegateError } from "../src/lakegate/errors.js";

describe("LakegateError", () => {
  it("creates error with code and message", () => {
    const err = new LakegateError("CONFIG_INVALID", "Test message");
    expect(err.code).toBe("CONFIG_INVALID");
    expect(err.message).toBe("Test message");
    expect(err.name).toBe("LakegateError");
  });

  it("toJSON returns serializable object", () => {
    const err = new LakegateError("BAD_REQUEST", "Invalid input", { field: "bucket" });
    expect(err.toJSON()).toEqual({ code: "BAD_REQUEST", message: "Invalid input", details: { field: "bucket" } });
  });

  it("toJSON excludes details when undefined", () => {
    const json = new LakegateError("INTERNAL", "Something went wrong").toJSON();
    expect("details" in json).toBe(false);
  });
});

describe("toLakegateError", () => {
  it("returns LakegateError unchanged", () => {
    const original = new LakegateError("UPSTREAM_UNAVAILABLE", "SSM unreachable");
    expect(toLakegateError(original)).toBe(original);
  });

  it("converts ZodError to BAD_REQUEST", () => {
    const parsed = z.object({ bucket: z.string() }).safeParse({ bucket: 1 });
    expect(parsed.success).toBe(false);
    if (!parsed.success) {
      const err = toLakegateError(parsed.error);
      expect(err.code).toBe("BAD_REQUEST");
      expect(err.message).toBe("Validation error");
    }
  });

  it("converts plain errors and non-errors to INTERNAL", () => {
    expect(toLakegateError(new TypeError("boom")).toJSON()).toEqual({
      code: "INTERNAL",
      message: "boom",
      details: { name: "TypeError" }
    });
    expect(toLakegateError("string error").message).toBe("Unknown error");
  });

  it("maps codes to HTTP status", () => {
    expect(statusForLakegateError(new LakegateError("BAD_REQUEST", "x"))).toBe(400);
    expect(statusForLakegateError(new LakegateError("CAPACITY_EXCEEDED", "x"))).toBe(503);
    expect(statusForLakegateError(new LakegateError("UPSTREAM_UNAVAILABLE", "x"))).toBe(502);
    expect(statusForLakegateError(new LakegateError("CONFIG_INVALID", "x"))).toBe(500);
  });
});

describe("AuthError", () => {
  it("carries status and remediation for its code", () => {
    const err = new AuthError("EXPIRED", "Token has expired");
    expect(err.statusCode).toBe(401);
    expect(err.remediation).toBe(remediationFor("EXPIRED"));
    expect(new AuthError("UNAUTHORIZED", "no").statusCode).toBe(403);
    expect(new AuthError("ROLE_ASSUMPTION_FAILED", "no").statusCode).toBe(502);
  });

  it("serializes to the auth error body", () => {
    const err = new AuthError("SIGNATURE_INVALID", "Token signature verification failed", { kid: "k1" });
    expect(err.toJSON()).toEqual({
      kind: "auth_error",
      code: "SIGNATURE_INVALID",
      error: "Token signature verification failed",
      remediation: "Token was not signed with the configured key; obtain a new token",
      details: { kid: "k1" }
    });
  });
});

describe("describeCredentials", () => {
  it("masks the key id and omits secrets", () => {
    const summary = describeCredentials({
      accessKeyId: "ASIATESTKEY00001",
      secretAccessKey: "test-secret",
      sessionToken: "test-session",
      roleId: "arn:aws:iam::123456789012:role/analyst",
      source: "exchange"
    });
    expect(summary).toEqual({
      accessKeyId: "ASIA…0001",
      source: "exchange",
      roleId: "arn:aws:iam::123456789012:role/analyst"
    });
  });

  it("fully masks short key ids", () => {
    expect(describeCredentials({ accessKeyId: "SHORT", secretAccessKey: "test-secret", source: "token" }).accessKeyId)
      .toBe("****");
  });
});
