import { describe, expect, it, vi } from "vitest";
import { Hono } from "hono";
import { SignJWT } from "jose";
import type { JWTPayload } from "jose";
import { ClaimsCodec } from "../src/auth/claims.js";
import { RequestContextPropagator } from "../src/auth/context.js";
import { CredentialExchangeManager } from "../src/auth/credentials.js";
import type { AssumeRoleRequest, TrustProvider } from "../src/auth/credentials.js";
import { TokenValidator } from "../src/auth/jwt.js";
import { SigningKeyResolver } from "../src/auth/keys.js";
import { RequestAuthenticator, createAuthMiddleware, parseAuthorization } from "../src/auth/middleware.js";
import type { AuthMode } from "../src/auth/middleware.js";
import { SessionCache } from "../src/auth/sessions.js";
import type { AmbientIdentity, ScopedCredentials } from "../src/auth/types.js";
import { AuthError } from "../src/auth/types.js";
import { AuthorizationEngine } from "../src/policy/engine.js";
import { requireOperation } from "../src/policy/middleware.js";

const ROLE = "arn:aws:iam::123456789012:role/analyst";
const encoder = new TextEncoder();

async function sign(subject: string, claims: JWTPayload = {}, ttlSeconds = 3600): Promise<string> {
  return new SignJWT(claims)
    .setProtectedHeader({ alg: "HS256" })
    .setSubject(subject)
    .setIssuedAt()
    .setExpirationTime(Math.floor(Date.now() / 1000) + ttlSeconds)
    .sign(encoder.encode("test-secret"));
}

class FakeTrustProvider implements TrustProvider {
  readonly calls: AssumeRoleRequest[] = [];

  async assumeRole(request: AssumeRoleRequest): Promise<ScopedCredentials> {
    this.calls.push(request);
    return {
      accessKeyId: "ASIATESTKEY00001",
      secretAccessKey: "test-secret",
      sessionToken: "test-session",
      expiration: new Date(Date.now() + 3600_000).toISOString(),
      source: "exchange"
    };
  }
}

type HarnessOptions = {
  mode?: AuthMode;
  ambient?: AmbientIdentity;
  sessionNow?: () => number;
  assumeRoleFromClaims?: boolean;
};

function harness(options: HarnessOptions = {}) {
  const validator = new TokenValidator({
    resolver: new SigningKeyResolver([{ material: { secret: "test-secret" } }]),
    codec: new ClaimsCodec()
  });
  const sessions = new SessionCache({
    ttlSeconds: 60,
    ...(options.sessionNow !== undefined && { now: options.sessionNow })
  });
  const provider = new FakeTrustProvider();
  const exchange = new CredentialExchangeManager({ provider });
  const context = new RequestContextPropagator();
  const authenticator = new RequestAuthenticator({
    mode: options.mode ?? "strict",
    validator,
    sessions,
    exchange,
    ...(options.ambient !== undefined && { ambient: options.ambient }),
    ...(options.assumeRoleFromClaims !== undefined && { assumeRoleFromClaims: options.assumeRoleFromClaims })
  });
  const engine = new AuthorizationEngine();

  const app = new Hono();
  app.use("*", createAuthMiddleware({ authenticator, context }));
  app.get("/health", (c) => c.json({ ok: true }));
  app.get("/whoami", async (c) => {
    await new Promise((r) => setTimeout(r, Number(c.req.query("delay") ?? "0")));
    const state = context.current();
    return c.json({
      scheme: state.scheme,
      subject: state.claims?.subject ?? null,
      sessionCache: state.extras.sessionCache ?? null,
      exchanged: state.extras.exchanged ?? null,
      authError: state.extras.authError ?? null,
      sameAsVariable: c.get("authState").scheme === state.scheme
    });
  });
  app.post(
    "/buckets/:bucket/objects",
    requireOperation(engine, "bucket_objects_list", { context, resource: (c) => c.req.param("bucket") }),
    (c) => c.json({ allowed: true, bucket: c.get("authDecision").resource ?? null })
  );
  app.get("/boom", () => {
    throw new Error("handler exploded");
  });
  app.onError((err, c) => c.json({ error: err.message }, 500));

  return { app, validator, sessions, provider, context, authenticator };
}

function headers(values: { token?: string; session?: string; role?: string }): Record<string, string> {
  return {
    ...(values.token !== undefined && { Authorization: `Bearer ${values.token}` }),
    ...(values.session !== undefined && { "mcp-session-id": values.session }),
    ...(values.role !== undefined && { "x-assume-role": values.role })
  };
}

describe("parseAuthorization", () => {
  it("extracts bearer tokens", () => {
    expect(parseAuthorization(undefined)).toBeUndefined();
    expect(parseAuthorization("  ")).toBeUndefined();
    expect(parseAuthorization("bearer abc.def.ghi")).toBe("abc.def.ghi");
  });

  it("rejects other schemes", () => {
    expect(() => parseAuthorization("Basic dXNlcjpwYXNz")).toThrow(AuthError);
  });
});

describe("auth middleware (strict)", () => {
  it("requires a token", async () => {
    const { app } = harness();
    const res = await app.request("/whoami");
    expect(res.status).toBe(401);
    expect(await res.json()).toMatchObject({
      kind: "auth_error",
      code: "MISSING_TOKEN",
      error: "A bearer token is required for this request"
    });
  });

  it("skips the health path", async () => {
    const { app } = harness();
    expect((await app.request("/health")).status).toBe(200);
  });

  it("rejects a non-bearer Authorization header", async () => {
    const { app } = harness();
    const res = await app.request("/whoami", { headers: { Authorization: "Basic dXNlcjpwYXNz" } });
    expect(res.status).toBe(401);
    expect(await res.json()).toMatchObject({ code: "MALFORMED_TOKEN" });
  });

  it("rejects an expired token without creating a session", async () => {
    const { app, sessions } = harness();
    const token = await sign("user-1", {}, -60);
    const res = await app.request("/whoami", { headers: headers({ token, session: "s-1" }) });

    expect(res.status).toBe(401);
    expect(await res.json()).toMatchObject({ code: "EXPIRED", remediation: "Refresh your token and retry" });
    expect(sessions.size).toBe(0);
  });

  it("never echoes the token in an error body", async () => {
    const { app } = harness();
    const token = await sign("user-1", {}, -60);
    const res = await app.request("/whoami", { headers: headers({ token }) });
    expect(await res.text()).not.toContain(token);
  });

  it("reuses the cached identity for a session without revalidating", async () => {
    const { app, validator } = harness();
    const validate = vi.spyOn(validator, "validate");
    const token = await sign("user-1");

    const first = await app.request("/whoami", { headers: headers({ token, session: "s-1" }) });
    expect(await first.json()).toMatchObject({ scheme: "token", subject: "user-1", sessionCache: "stored" });

    const second = await app.request("/whoami", { headers: headers({ session: "s-1" }) });
    expect(await second.json()).toMatchObject({ scheme: "token", subject: "user-1", sessionCache: "hit", sameAsVariable: true });
    expect(validate).toHaveBeenCalledTimes(1);
  });

  it("revalidates when a session presents a different token", async () => {
    const { app, validator } = harness();
    const validate = vi.spyOn(validator, "validate");

    await app.request("/whoami", { headers: headers({ token: await sign("user-1"), session: "s-1" }) });
    const res = await app.request("/whoami", { headers: headers({ token: await sign("user-2"), session: "s-1" }) });

    expect(await res.json()).toMatchObject({ subject: "user-2", sessionCache: "stored" });
    expect(validate).toHaveBeenCalledTimes(2);
  });

  it("reports an expired session when no token is sent", async () => {
    let t = Date.now();
    const { app } = harness({ sessionNow: () => t });
    await app.request("/whoami", { headers: headers({ token: await sign("user-1"), session: "s-1" }) });

    t += 61_000;
    const res = await app.request("/whoami", { headers: headers({ session: "s-1" }) });
    expect(res.status).toBe(401);
    expect(await res.json()).toMatchObject({ code: "SESSION_EXPIRED" });
  });

  it("drops the session when its new token is rejected", async () => {
    const { app, sessions } = harness();
    await app.request("/whoami", { headers: headers({ token: await sign("user-1"), session: "s-1" }) });
    expect(sessions.size).toBe(1);

    await app.request("/whoami", { headers: headers({ token: "not-a-token", session: "s-1" }) });
    expect(sessions.size).toBe(0);
  });

  it("isolates concurrent requests", async () => {
    const { app } = harness();
    const subjects = Array.from({ length: 20 }, (_, i) => `user-${i}`);
    const tokens = await Promise.all(subjects.map((s) => sign(s)));

    const bodies = await Promise.all(tokens.map(async (token, i) => {
      const res = await app.request(`/whoami?delay=${(i * 7) % 5}`, { headers: headers({ token }) });
      return res.json();
    }));

    bodies.forEach((body, i) => {
      expect(body).toMatchObject({ subject: `user-${i}` });
    });
  });

  it("returns a handler error without leaking the frame", async () => {
    const { app, context } = harness();
    const res = await app.request("/boom", { headers: headers({ token: await sign("user-1") }) });
    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({ error: "handler exploded" });
    expect(context.depth()).toBe(0);
    expect(context.current().scheme).toBe("none");
  });
});

describe("operation guard", () => {
  const permissions = ["s3:ListBucket", "s3:GetBucketLocation"];

  it("allows an authorized bucket", async () => {
    const { app } = harness();
    const token = await sign("user-1", { permissions, buckets: ["team-a"] });
    const res = await app.request("/buckets/team-a/objects", { method: "POST", headers: headers({ token }) });
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ allowed: true, bucket: "team-a" });
  });

  it("returns 403 for a bucket outside the token's grants", async () => {
    const { app } = harness();
    const token = await sign("user-1", { permissions, buckets: ["team-a"] });
    const res = await app.request("/buckets/ops/objects", { method: "POST", headers: headers({ token }) });

    expect(res.status).toBe(403);
    expect(await res.json()).toMatchObject({
      code: "UNAUTHORIZED",
      details: { reason: "resource_not_authorized", operation: "bucket_objects_list", bucket: "ops" }
    });
  });

  it("returns 403 listing missing permissions", async () => {
    const { app } = harness();
    const token = await sign("user-1", { permissions: ["s3:ListBucket"], buckets: ["team-a"] });
    const res = await app.request("/buckets/team-a/objects", { method: "POST", headers: headers({ token }) });

    expect(res.status).toBe(403);
    expect(await res.json()).toMatchObject({ details: { missingPermissions: ["s3:GetBucketLocation"] } });
  });
});

describe("auth middleware (optional)", () => {
  it("continues with the ambient identity when no token is sent", async () => {
    const { app } = harness({
      mode: "optional",
      ambient: { subject: "service", permissions: ["s3:ListBucket", "s3:GetBucketLocation"], resources: ["team-*"] }
    });

    const who = await app.request("/whoami");
    expect(await who.json()).toMatchObject({ scheme: "ambient", subject: "service" });

    const res = await app.request("/buckets/team-z/objects", { method: "POST" });
    expect(res.status).toBe(200);
  });

  it("continues unauthenticated when the token is bad", async () => {
    const { app } = harness({ mode: "optional" });
    const res = await app.request("/whoami", { headers: headers({ token: await sign("user-1", {}, -60) }) });
    expect(await res.json()).toMatchObject({ scheme: "none", subject: null, authError: "EXPIRED" });
  });

  it("still guards operations without an identity", async () => {
    const { app } = harness({ mode: "optional" });
    const res = await app.request("/buckets/team-a/objects", { method: "POST" });
    expect(res.status).toBe(401);
    expect(await res.json()).toMatchObject({ code: "MISSING_TOKEN", details: { reason: "unauthenticated" } });
  });
});

describe("role assumption", () => {
  it("exchanges once and treats a repeat for the same session as a no-op", async () => {
    const { app, provider, sessions } = harness();
    const token = await sign("user-1");

    const first = await app.request("/whoami", { headers: headers({ token, session: "s-1", role: ROLE }) });
    expect(await first.json()).toMatchObject({ scheme: "assumed-role", exchanged: true });
    expect(sessions.lookup("s-1")?.credentials?.roleId).toBe(ROLE);

    const second = await app.request("/whoami", { headers: headers({ session: "s-1", role: ROLE }) });
    expect(await second.json()).toMatchObject({ scheme: "assumed-role", sessionCache: "hit", exchanged: false });
    expect(provider.calls).toHaveLength(1);
  });

  it("assumes the role named in the token when configured", async () => {
    const { app, provider } = harness({ assumeRoleFromClaims: true });
    const token = await sign("user-1", { roles: ["reader", ROLE] });

    const res = await app.request("/whoami", { headers: headers({ token }) });
    expect(await res.json()).toMatchObject({ scheme: "assumed-role", exchanged: true });
    expect(provider.calls[0]).toMatchObject({ roleId: ROLE, principal: "user-1" });
  });

  it("fails with 502 when role assumption is not configured", async () => {
    const authenticator = new RequestAuthenticator({
      mode: "strict",
      validator: new TokenValidator({
        resolver: new SigningKeyResolver([{ material: { secret: "test-secret" } }]),
        codec: new ClaimsCodec()
      }),
      sessions: new SessionCache()
    });
    const err = await authenticator
      .authenticate({ authorization: `Bearer ${await sign("user-1")}`, roleId: ROLE })
      .catch((e: unknown) => e);
    expect(err).toBeInstanceOf(AuthError);
    expect(err).toMatchObject({ code: "ROLE_ASSUMPTION_FAILED", statusCode: 502 });
  });
});
