import { describe, expect, it } from "vitest";
import { SignJWT } from "jose";
import type { JWTPayload } from "jose";
import type { AssumeRoleRequest, TrustProvider } from "../src/auth/credentials.js";
import type { ScopedCredentials } from "../src/auth/types.js";
import { loadConfig } from "../src/lakegate/config.js";
import { createGateway } from "../src/lakegate/gateway.js";
import { silentLogger } from "../src/lakegate/log.js";
import { createHttpApp } from "../src/server/http.js";
import { InMemoryVaultClient, VaultConfigSchema } from "../src/vault/index.js";

const ROLE = "arn:aws:iam::123456789012:role/analyst";

async function sign(subject: string, claims: JWTPayload = {}): Promise<string> {
  return new SignJWT(claims)
    .setProtectedHeader({ alg: "HS256" })
    .setSubject(subject)
    .setIssuedAt()
    .setExpirationTime("1h")
    .sign(new TextEncoder().encode("test-secret"));
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

function setup(env: NodeJS.ProcessEnv = {}) {
  const trustProvider = new FakeTrustProvider();
  const gateway = createGateway(
    loadConfig({ LAKEGATE_JWT_SECRET: "test-secret", ...env }),
    { trustProvider, logger: silentLogger }
  );
  return { app: createHttpApp(gateway), gateway, trustProvider };
}

const reader = {
  permissions: ["s3:ListBucket", "s3:GetBucketLocation", "s3:GetObject"],
  buckets: ["team-a"]
};

describe("HTTP app", () => {
  it("serves health without a token", async () => {
    const { app } = setup();
    const res = await app.request("/health");
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      ok: true,
      mode: "strict",
      sessions: { active: 0 },
      credentials: { cached: 0, failures: 0, inflight: 0, upstreamRunning: 0 },
      keys: []
    });
  });

  it("reports an unreachable secret store on /health", async () => {
    const vault = new InMemoryVaultClient(VaultConfigSchema.parse({ provider: "memory" }));
    vault.failWith(new Error("backend down"));
    const gateway = createGateway(
      loadConfig({ LAKEGATE_JWT_SECRET_PARAMETER: "/lakegate/jwt", AWS_REGION: "us-east-1" }),
      { trustProvider: new FakeTrustProvider(), vaultFactory: () => vault, logger: silentLogger }
    );
    const app = createHttpApp(gateway);
    const token = await sign("user-1", reader);

    const status = await app.request("/auth/status", { headers: { Authorization: `Bearer ${token}` } });
    expect(status.status).toBe(502);
    expect(await status.json()).toMatchObject({ code: "UPSTREAM_UNAVAILABLE" });

    const res = await app.request("/health");
    expect(res.status).toBe(503);
    expect(await res.json()).toMatchObject({
      ok: false,
      keys: [{ region: "us-east-1", healthy: false, provider: "memory", message: "backend down" }]
    });
  });

  it("describes the caller on /auth/status", async () => {
    const { app } = setup();
    const token = await sign("user-1", reader);
    const res = await app.request("/auth/status", {
      headers: { Authorization: `Bearer ${token}`, "mcp-session-id": "s-1" }
    });

    expect(await res.json()).toEqual({
      scheme: "token",
      subject: "user-1",
      level: "read",
      permissions: reader.permissions,
      buckets: ["team-a"],
      roles: [],
      credentials: null,
      sessionId: "s-1"
    });
  });

  it("requires a token in strict mode", async () => {
    const { app } = setup();
    const res = await app.request("/auth/status");
    expect(res.status).toBe(401);
    expect(await res.json()).toMatchObject({ code: "MISSING_TOKEN" });
  });

  it("grants an authorized operation", async () => {
    const { app } = setup();
    const token = await sign("user-1", reader);
    const res = await app.request("/operations/bucket_objects_list", {
      method: "POST",
      headers: { Authorization: `Bearer ${token}`, "Content-Type": "application/json" },
      body: JSON.stringify({ bucket: "team-a" })
    });

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      allowed: true,
      operation: "bucket_objects_list",
      bucket: "team-a",
      subject: "user-1",
      scheme: "token",
      credentials: null
    });
  });

  it("returns masked credentials after a role exchange", async () => {
    const { app, trustProvider } = setup();
    const token = await sign("user-1", reader);
    const res = await app.request("/operations/bucket_object_text", {
      method: "POST",
      headers: { Authorization: `Bearer ${token}`, "x-assume-role": ROLE },
      body: JSON.stringify({ bucket: "team-a" })
    });

    const body = await res.json();
    expect(body).toMatchObject({
      scheme: "assumed-role",
      credentials: { accessKeyId: "ASIA…0001", source: "exchange", roleId: ROLE }
    });
    expect(JSON.stringify(body)).not.toContain("test-secret");
    expect(trustProvider.calls).toHaveLength(1);
  });

  it("denies a bucket outside the token's grants", async () => {
    const { app } = setup();
    const token = await sign("user-1", reader);
    const res = await app.request("/operations/bucket_objects_list", {
      method: "POST",
      headers: { Authorization: `Bearer ${token}` },
      body: JSON.stringify({ bucket: "ops" })
    });
    expect(res.status).toBe(403);
    expect(await res.json()).toMatchObject({ code: "UNAUTHORIZED", details: { bucket: "ops" } });
  });

  it("denies unknown operations", async () => {
    const { app } = setup();
    const token = await sign("user-1", reader);
    const res = await app.request("/operations/bucket_nuke", {
      method: "POST",
      headers: { Authorization: `Bearer ${token}` }
    });
    expect(res.status).toBe(403);
    expect(await res.json()).toMatchObject({ details: { reason: "unknown_operation" } });
  });

  it("rejects malformed bodies", async () => {
    const { app } = setup();
    const token = await sign("user-1", reader);

    const badJson = await app.request("/operations/bucket_objects_list", {
      method: "POST",
      headers: { Authorization: `Bearer ${token}` },
      body: "{"
    });
    expect(badJson.status).toBe(400);
    expect(await badJson.json()).toEqual({ code: "BAD_REQUEST", message: "Invalid JSON body" });

    const badType = await app.request("/operations/bucket_objects_list", {
      method: "POST",
      headers: { Authorization: `Bearer ${token}` },
      body: JSON.stringify({ bucket: 5 })
    });
    expect(badType.status).toBe(400);
    expect(await badType.json()).toMatchObject({ code: "BAD_REQUEST", message: "Validation error" });
  });

  it("uses the configured session header", async () => {
    const { app, gateway } = setup({ LAKEGATE_SESSION_HEADER: "X-Session" });
    const token = await sign("user-1", reader);
    await app.request("/auth/status", { headers: { Authorization: `Bearer ${token}`, "x-session": "abc" } });
    expect(gateway.sessions.lookup("abc")?.subject).toBe("user-1");
  });
});
