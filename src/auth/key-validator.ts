import type { Credential } from "../domain/entities/credential.js";
import type { CredentialRepository } from "../domain/repositories/credential-repository.js";
import { apiKeyPrefix } from "../security/api-key.js";
import type { SecretHasher } from "../security/secret-hasher.js";

/**
 * Resolves a presented plaintext key to its credential.
 *
 * The prefix selects a small candidate set of usable credentials; every
 * candidate is then checked with the slow hash, so two keys sharing a prefix
 * can never authenticate as each other. Candidate order only affects latency.
 */
export class KeyValidator {
  constructor(
    private readonly credentials: CredentialRepository,
    private readonly hasher: SecretHasher,
  ) {}

  async validate(plaintext: string): Promise<Credential | null> {
    if (!plaintext) return null;
    const candidates = await this.credentials.findUsableByPrefix(apiKeyPrefix(plaintext));
    for (const candidate of candidates) {
      if (await this.hasher.verify(plaintext, candidate.secretHash)) {
        return candidate;
      }
    }
    return null;
  }
}
