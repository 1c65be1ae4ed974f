import { CredentialCollisionError } from "../../api/errors.js";
import { Credential } from "../../domain/entities/credential.js";
import type {
  CredentialRepository,
  ListCredentialsOptions,
  NewCredential,
} from "../../domain/repositories/credential-repository.js";

interface CredentialRecord {
  id: number;
  name: string;
  description: string | null;
  keyHash: string;
  keyPrefix: string;
  isActive: boolean;
  deletedAt: number | null;
  createdAt: number;
  updatedAt: number;
}

export class InMemoryCredentialRepository implements CredentialRepository {
  private readonly records = new Map<number, CredentialRecord>();
  private nextId = 1;

  async create(input: NewCredential): Promise<Credential> {
    for (const record of this.records.values()) {
      if (record.keyHash === input.secretHash) throw new CredentialCollisionError();
    }
    const now = Date.now();
    const record: CredentialRecord = {
      id: this.nextId++,
      name: input.name,
      description: input.description,
      keyHash: input.secretHash,
      keyPrefix: input.secretPrefix,
      isActive: true,
      deletedAt: null,
      createdAt: now,
      updatedAt: now,
    };
    this.records.set(record.id, record);
    return Credential.fromRow(record);
  }

  async findById(id: number): Promise<Credential | null> {
    const record = this.records.get(id);
    return record ? Credential.fromRow(record) : null;
  }

  async list(options: ListCredentialsOptions = {}): Promise<Credential[]> {
    const { skip = 0, limit = 100, includeDeleted = false } = options;
    return [...this.records.values()]
      .filter((r) => includeDeleted || r.deletedAt === null)
      .sort((a, b) => a.id - b.id)
      .slice(skip, skip + limit)
      .map((r) => Credential.fromRow(r));
  }

  async findUsableByPrefix(prefix: string): Promise<Credential[]> {
    const results: Credential[] = [];
    for (const record of this.records.values()) {
      if (record.keyPrefix === prefix && record.isActive && record.deletedAt === null) {
        results.push(Credential.fromRow(record));
      }
    }
    return results;
  }

  async deactivate(id: number): Promise<boolean> {
    const record = this.records.get(id);
    if (!record) return false;
    record.isActive = false;
    record.updatedAt = Date.now();
    return true;
  }

  async delete(id: number, hard = false): Promise<boolean> {
    const record = this.records.get(id);
    if (!record) return false;
    if (hard) {
      this.records.delete(id);
      return true;
    }
    const now = Date.now();
    record.deletedAt ??= now;
    record.updatedAt = now;
    return true;
  }

  async restore(id: number): Promise<boolean> {
    const record = this.records.get(id);
    if (!record || record.deletedAt === null) return false;
    record.deletedAt = null;
    record.updatedAt = Date.now();
    return true;
  }
}
