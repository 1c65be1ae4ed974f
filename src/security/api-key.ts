import { randomBytes } from "node:crypto";

/** Bytes of CSPRNG entropy per issued key (64 hex characters). */
export const API_KEY_BYTES = 32;

/** Cleartext lookup prefix length stored beside the hash. */
export const API_KEY_PREFIX_LENGTH = 8;

/** Generate a new plaintext API key: 64 lowercase hex characters. */
export function generateApiKey(): string {
  return randomBytes(API_KEY_BYTES).toString("hex");
}

/**
 * Lookup prefix of a presented or issued key. Shorter input is returned
 * whole; it narrows candidates only and never authenticates on its own.
 */
export function apiKeyPrefix(key: string): string {
  return key.slice(0, API_KEY_PREFIX_LENGTH);
}
