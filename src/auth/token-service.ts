import { sign, verify } from "hono/jwt";
import { z } from "zod";
import { SigningKeyError } from "../api/errors.js";

export type TokenAlgorithm = "HS256" | "HS384" | "HS512";

/** Minimum signing-secret length accepted at construction. */
export const MIN_SECRET_LENGTH = 32;

/** Versioned session-token claims. `sub` is the credential id in decimal. */
export const sessionClaimsSchema = z.object({
  v: z.literal(1),
  sub: z.string().regex(/^\d+$/),
  name: z.string(),
  iat: z.number().int(),
  exp: z.number().int(),
});

export type SessionClaims = z.infer<typeof sessionClaimsSchema>;

export interface TokenServiceOptions {
  secret: string;
  algorithm?: TokenAlgorithm;
  /** Default lifetime of minted tokens. */
  ttlSeconds: number;
}

export interface MintedToken {
  token: string;
  expiresIn: number;
  expiresAt: Date;
}

function nowSeconds(): number {
  return Math.floor(Date.now() / 1000);
}

/**
 * Mints and verifies HMAC-signed session tokens. Stateless: no storage
 * access, only the configured secret and the wall clock.
 */
export class TokenService {
  private readonly secret: string;
  private readonly algorithm: TokenAlgorithm;
  private readonly ttlSeconds: number;

  constructor(options: TokenServiceOptions) {
    if (options.secret.length < MIN_SECRET_LENGTH) {
      throw new SigningKeyError(`Signing secret must be at least ${MIN_SECRET_LENGTH} characters`);
    }
    this.secret = options.secret;
    this.algorithm = options.algorithm ?? "HS256";
    this.ttlSeconds = options.ttlSeconds;
  }

  get defaultTtlSeconds(): number {
    return this.ttlSeconds;
  }

  async mint(credentialId: number, name: string, ttlSeconds = this.ttlSeconds): Promise<MintedToken> {
    const iat = nowSeconds();
    const ttl = Math.max(0, Math.floor(ttlSeconds));
    const claims: SessionClaims = { v: 1, sub: String(credentialId), name, iat, exp: iat + ttl };
    const token = await sign(claims, this.secret, this.algorithm);
    return { token, expiresIn: ttl, expiresAt: new Date(claims.exp * 1000) };
  }

  /**
   * Verify signature, algorithm, claim shape and expiry.
   * Any failure yields null; callers must not learn which check failed.
   */
  async verify(token: string): Promise<SessionClaims | null> {
    let payload: unknown;
    try {
      payload = await verify(token, this.secret, this.algorithm);
    } catch {
      return null;
    }
    const parsed = sessionClaimsSchema.safeParse(payload);
    if (!parsed.success) return null;
    if (parsed.data.exp <= nowSeconds()) return null;
    return parsed.data;
  }
}
