/**
 * Repository Interface: CredentialRepository (ASYNC)
 *
 * Persistence for issued API keys. Stores only the slow hash and the 8-char
 * lookup prefix of each key; plaintext never reaches this layer.
 */
import type { Credential } from "../entities/credential.js";

export interface NewCredential {
  name: string;
  description: string | null;
  secretHash: string;
  secretPrefix: string;
}

export interface ListCredentialsOptions {
  skip?: number;
  limit?: number;
  includeDeleted?: boolean;
}

export interface CredentialRepository {
  /**
   * Insert a new, active credential.
   * @throws CredentialCollisionError if the hash already exists
   */
  create(input: NewCredential): Promise<Credential>;

  /** Fetch by id, including soft-deleted rows. */
  findById(id: number): Promise<Credential | null>;

  /** List credentials ordered by id. Soft-deleted rows are excluded unless requested. */
  list(options?: ListCredentialsOptions): Promise<Credential[]>;

  /** All active, non-deleted credentials whose stored prefix equals `prefix`. */
  findUsableByPrefix(prefix: string): Promise<Credential[]>;

  /**
   * Clear the active flag. Idempotent.
   * Returns false only when no row has this id.
   */
  deactivate(id: number): Promise<boolean>;

  /**
   * Soft delete (stamp deleted_at, keeping an earlier stamp) or hard delete.
   * Hard deletion leaves prediction logs in place with a null key reference.
   * Returns false when no row has this id.
   */
  delete(id: number, hard?: boolean): Promise<boolean>;

  /** Clear deleted_at. Returns true only if the row existed and was soft-deleted. */
  restore(id: number): Promise<boolean>;
}
