import { createHash } from "node:crypto";
import { decodeProtectedHeader, errors, jwtVerify } from "jose";
import type { JWTPayload, JWTVerifyOptions } from "jose";
import type { ClaimsCodec } from "./claims.js";
import type { ResolvedKey, SigningKeyResolver } from "./keys.js";
import type { ClaimSet } from "./types.js";
import { AuthError } from "./types.js";

/**
 * JWT Verification
 *
 * HS256 only. Verifies signature and registered claims with jose, then hands
 * the payload to the claims codec. Never touches the session cache.
 */

export type TokenValidatorOptions = {
  resolver: SigningKeyResolver;
  codec: ClaimsCodec;
  /** Expected `iss`, checked only when set */
  issuer?: string;
  /** Expected `aud`, checked only when set */
  audience?: string;
  clockToleranceSeconds?: number;
  /** Clock in epoch ms */
  now?: () => number;
};

export type ValidatedToken = {
  claims: ClaimSet;
  keyId?: string;
};

const ALGORITHM = "HS256";

/**
 * SHA-256 of a raw token; what the session cache keeps instead of the token.
 */
export function tokenFingerprint(token: string): string {
  return createHash("sha256").update(token).digest("hex");
}

export function mapJoseError(err: unknown): AuthError {
  if (err instanceof AuthError) return err;
  if (err instanceof errors.JWTExpired) {
    return new AuthError("EXPIRED", "Token has expired");
  }
  if (err instanceof errors.JWTClaimValidationFailed) {
    if (err.reason === "missing") {
      return new AuthError("MISSING_REQUIRED_CLAIM", `Token is missing the '${err.claim}' claim`, { claim: err.claim });
    }
    if (err.claim === "iss") {
      return new AuthError("INVALID_ISSUER", "Token issuer is not accepted");
    }
    if (err.claim === "aud") {
      return new AuthError("INVALID_AUDIENCE", "Token audience mismatch");
    }
    if (err.claim === "nbf") {
      return new AuthError("MALFORMED_TOKEN", "Token is not yet valid", { claim: "nbf" });
    }
    return new AuthError("MALFORMED_TOKEN", `Token claim '${err.claim}' is invalid`, { claim: err.claim });
  }
  if (err instanceof errors.JWSSignatureVerificationFailed) {
    return new AuthError("SIGNATURE_INVALID", "Token signature verification failed");
  }
  if (err instanceof errors.JOSEAlgNotAllowed) {
    return new AuthError("MALFORMED_TOKEN", `Only ${ALGORITHM} tokens are accepted`);
  }
  if (err instanceof errors.JWSInvalid || err instanceof errors.JWTInvalid) {
    return new AuthError("MALFORMED_TOKEN", "Token is not a well-formed JWT");
  }
  return new AuthError("MALFORMED_TOKEN", "Token could not be verified");
}

export class TokenValidator {
  private readonly resolver: SigningKeyResolver;
  private readonly codec: ClaimsCodec;
  private readonly verifyOptions: Omit<JWTVerifyOptions, "currentDate">;
  private readonly now: () => number;

  constructor(options: TokenValidatorOptions) {
    this.resolver = options.resolver;
    this.codec = options.codec;
    this.now = options.now ?? Date.now;
    this.verifyOptions = {
      algorithms: [ALGORITHM],
      requiredClaims: ["sub", "exp"],
      clockTolerance: options.clockToleranceSeconds ?? 0,
      ...(options.issuer !== undefined && { issuer: options.issuer }),
      ...(options.audience !== undefined && { audience: options.audience })
    };
  }

  /**
   * Verify a raw token and expand its claims.
   *
   * @throws AuthError with a token failure code
   */
  async validate(token: string): Promise<ValidatedToken> {
    const kid = this.checkHeader(token);
    const key = await this.resolver.resolve(kid);
    const payload = await this.verifyWithRotation(token, kid, key);
    return {
      claims: this.codec.expand(payload),
      ...(key.keyId !== undefined && { keyId: key.keyId })
    };
  }

  private checkHeader(token: string): string | undefined {
    if (token.split(".").length !== 3) {
      throw new AuthError("MALFORMED_TOKEN", "Token is not a well-formed JWT");
    }
    let header: ReturnType<typeof decodeProtectedHeader>;
    try {
      header = decodeProtectedHeader(token);
    } catch {
      throw new AuthError("MALFORMED_TOKEN", "Token header could not be decoded");
    }
    if (header.alg !== ALGORITHM) {
      throw new AuthError("MALFORMED_TOKEN", `Only ${ALGORITHM} tokens are accepted`, { alg: header.alg ?? null });
    }
    return header.kid;
  }

  /**
   * Current secret, then the pre-rotation secret, then a force-refreshed one.
   */
  private async verifyWithRotation(token: string, kid: string | undefined, key: ResolvedKey): Promise<JWTPayload> {
    try {
      return await this.verify(token, key.secret);
    } catch (err) {
      if (!(err instanceof errors.JWSSignatureVerificationFailed)) {
        throw mapJoseError(err);
      }
    }

    if (key.previous) {
      try {
        return await this.verify(token, key.previous);
      } catch (err) {
        if (!(err instanceof errors.JWSSignatureVerificationFailed)) {
          throw mapJoseError(err);
        }
      }
    }

    if (this.resolver.isReferenced(kid)) {
      const refreshed = await this.resolver.resolve(kid, { forceRefresh: true });
      if (!sameBytes(refreshed.secret, key.secret)) {
        try {
          return await this.verify(token, refreshed.secret);
        } catch (err) {
          throw mapJoseError(err);
        }
      }
    }

    throw new AuthError("SIGNATURE_INVALID", "Token signature verification failed");
  }

  private async verify(token: string, secret: Uint8Array): Promise<JWTPayload> {
    const { payload } = await jwtVerify(token, secret, {
      ...this.verifyOptions,
      currentDate: new Date(this.now())
    });
    return payload;
  }
}

function sameBytes(a: Uint8Array, b: Uint8Array): boolean {
  return a.length === b.length && a.every((byte, i) => byte === b[i]);
}
