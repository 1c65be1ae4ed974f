import { logger } from "../config/logger.js";
import type { Credential } from "../domain/entities/credential.js";
import type { CredentialRepository } from "../domain/repositories/credential-repository.js";
import { apiKeyPrefix, generateApiKey } from "../security/api-key.js";
import type { SecretHasher } from "../security/secret-hasher.js";

export interface IssuedKey {
  credential: Credential;
  /** Returned exactly once; unrecoverable after this call. */
  plaintext: string;
}

/**
 * Issues new API keys: random secret, slow salted hash, cleartext lookup prefix.
 * Only the hash and prefix are persisted.
 */
export class KeyIssuer {
  constructor(
    private readonly credentials: CredentialRepository,
    private readonly hasher: SecretHasher,
  ) {}

  /** @throws CredentialCollisionError if the new hash already exists */
  async issue(name: string, description: string | null = null): Promise<IssuedKey> {
    const plaintext = generateApiKey();
    const secretHash = await this.hasher.hash(plaintext);
    const credential = await this.credentials.create({
      name,
      description,
      secretHash,
      secretPrefix: apiKeyPrefix(plaintext),
    });
    logger.info("API key issued", { keyId: credential.id, name: credential.name });
    return { credential, plaintext };
  }
}
