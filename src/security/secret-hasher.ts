import { randomBytes, scrypt, timingSafeEqual } from "node:crypto";

/** One-way, salted hashing of API-key secrets. */
export interface SecretHasher {
  hash(secret: string): Promise<string>;
  /** True iff `secret` hashes to `encoded`. Malformed `encoded` values never match. */
  verify(secret: string, encoded: string): Promise<boolean>;
}

interface ScryptParams {
  N: number;
  r: number;
  p: number;
}

const SALT_BYTES = 16;
const KEY_BYTES = 64;
const SCHEME = "scrypt";

function deriveKey(secret: string, salt: Buffer, params: ScryptParams, keyLength: number): Promise<Buffer> {
  const { N, r, p } = params;
  return new Promise((resolve, reject) => {
    // scrypt needs ~128 * N * r bytes; lift the 32 MiB default for larger costs
    scrypt(secret, salt, keyLength, { N, r, p, maxmem: 256 * N * r }, (err, key) => {
      if (err) reject(err);
      else resolve(key);
    });
  });
}

function isPositiveInt(n: number): boolean {
  return Number.isInteger(n) && n > 0;
}

/** Parse `scrypt$N$r$p$salt$hash`. Returns null on any structural problem. */
export function parseScryptHash(encoded: string): { params: ScryptParams; salt: Buffer; hash: Buffer } | null {
  const parts = encoded.split("$");
  if (parts.length !== 6 || parts[0] !== SCHEME) return null;
  const [N, r, p] = parts.slice(1, 4).map(Number);
  if (!isPositiveInt(N) || !isPositiveInt(r) || !isPositiveInt(p) || (N & (N - 1)) !== 0 || N < 2) return null;
  const salt = Buffer.from(parts[4], "base64");
  const hash = Buffer.from(parts[5], "base64");
  if (salt.length === 0 || hash.length === 0) return null;
  return { params: { N, r, p }, salt, hash };
}

/**
 * scrypt-based SecretHasher. Every hash carries its own random salt and cost
 * parameters, so raising the cost later does not invalidate existing keys.
 */
export class ScryptSecretHasher implements SecretHasher {
  private readonly params: ScryptParams;

  constructor(cost = 16384, blockSize = 8, parallelization = 1) {
    this.params = { N: cost, r: blockSize, p: parallelization };
  }

  async hash(secret: string): Promise<string> {
    const salt = randomBytes(SALT_BYTES);
    const key = await deriveKey(secret, salt, this.params, KEY_BYTES);
    const { N, r, p } = this.params;
    return [SCHEME, N, r, p, salt.toString("base64"), key.toString("base64")].join("$");
  }

  async verify(secret: string, encoded: string): Promise<boolean> {
    const parsed = parseScryptHash(encoded);
    if (!parsed) return false;
    const candidate = await deriveKey(secret, parsed.salt, parsed.params, parsed.hash.length);
    return candidate.length === parsed.hash.length && timingSafeEqual(candidate, parsed.hash);
  }
}
