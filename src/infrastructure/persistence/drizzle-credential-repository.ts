import { and, asc, eq, isNotNull, isNull, sql } from "drizzle-orm";
import { CredentialCollisionError } from "../../api/errors.js";
import type { DrizzleDb } from "../../db/index.js";
import { apiKeys } from "../../db/schema/api-keys.js";
import { Credential } from "../../domain/entities/credential.js";
import type {
  CredentialRepository,
  ListCredentialsOptions,
  NewCredential,
} from "../../domain/repositories/credential-repository.js";

/** PostgreSQL unique_violation, raised directly or wrapped as `cause`. */
function isUniqueViolation(err: unknown): boolean {
  if (typeof err !== "object" || err === null) return false;
  if ("code" in err && err.code === "23505") return true;
  return "cause" in err && isUniqueViolation(err.cause);
}

export class DrizzleCredentialRepository implements CredentialRepository {
  constructor(private readonly db: DrizzleDb) {}

  async create(input: NewCredential): Promise<Credential> {
    const now = Date.now();
    try {
      const [row] = await this.db
        .insert(apiKeys)
        .values({
          name: input.name,
          description: input.description,
          keyHash: input.secretHash,
          keyPrefix: input.secretPrefix,
          isActive: true,
          createdAt: now,
          updatedAt: now,
        })
        .returning();
      return Credential.fromRow(row);
    } catch (err) {
      if (isUniqueViolation(err)) throw new CredentialCollisionError();
      throw err;
    }
  }

  async findById(id: number): Promise<Credential | null> {
    const rows = await this.db.select().from(apiKeys).where(eq(apiKeys.id, id)).limit(1);
    return rows.length > 0 ? Credential.fromRow(rows[0]) : null;
  }

  async list(options: ListCredentialsOptions = {}): Promise<Credential[]> {
    const { skip = 0, limit = 100, includeDeleted = false } = options;
    const rows = await this.db
      .select()
      .from(apiKeys)
      .where(includeDeleted ? undefined : isNull(apiKeys.deletedAt))
      .orderBy(asc(apiKeys.id))
      .offset(skip)
      .limit(limit);
    return rows.map((row) => Credential.fromRow(row));
  }

  async findUsableByPrefix(prefix: string): Promise<Credential[]> {
    const rows = await this.db
      .select()
      .from(apiKeys)
      .where(and(eq(apiKeys.keyPrefix, prefix), eq(apiKeys.isActive, true), isNull(apiKeys.deletedAt)));
    return rows.map((row) => Credential.fromRow(row));
  }

  async deactivate(id: number): Promise<boolean> {
    const rows = await this.db
      .update(apiKeys)
      .set({ isActive: false, updatedAt: Date.now() })
      .where(eq(apiKeys.id, id))
      .returning({ id: apiKeys.id });
    return rows.length > 0;
  }

  async delete(id: number, hard = false): Promise<boolean> {
    if (hard) {
      // prediction_logs.api_key_id is ON DELETE SET NULL
      const rows = await this.db.delete(apiKeys).where(eq(apiKeys.id, id)).returning({ id: apiKeys.id });
      return rows.length > 0;
    }
    const now = Date.now();
    const rows = await this.db
      .update(apiKeys)
      .set({ deletedAt: sql`coalesce(${apiKeys.deletedAt}, ${now})`, updatedAt: now })
      .where(eq(apiKeys.id, id))
      .returning({ id: apiKeys.id });
    return rows.length > 0;
  }

  async restore(id: number): Promise<boolean> {
    const rows = await this.db
      .update(apiKeys)
      .set({ deletedAt: null, updatedAt: Date.now() })
      .where(and(eq(apiKeys.id, id), isNotNull(apiKeys.deletedAt)))
      .returning({ id: apiKeys.id });
    return rows.length > 0;
  }
}
