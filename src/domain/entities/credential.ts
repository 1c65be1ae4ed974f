/**
 * Lifecycle state of an API key.
 *
 * Stored as two columns (`is_active`, `deleted_at`) but always read through
 * this single tag. Deletion overrides activity: a soft-deleted key is
 * "deleted" whatever its active flag says.
 */
export type CredentialState = "active" | "deactivated" | "deleted";

export interface CredentialProps {
  id: number;
  name: string;
  description: string | null;
  secretHash: string;
  secretPrefix: string;
  active: boolean;
  deletedAt: Date | null;
  createdAt: Date;
  updatedAt: Date;
}

/** Caller identity attached to authenticated requests. */
export interface Identity {
  id: number;
  name: string;
}

export interface CredentialInfo {
  id: number;
  name: string;
  description: string | null;
  created_at: string;
  updated_at: string;
  is_active: boolean;
  is_deleted: boolean;
}

export class Credential {
  private constructor(private readonly props: CredentialProps) {}

  get id(): number {
    return this.props.id;
  }

  get name(): string {
    return this.props.name;
  }

  get description(): string | null {
    return this.props.description;
  }

  get secretHash(): string {
    return this.props.secretHash;
  }

  get secretPrefix(): string {
    return this.props.secretPrefix;
  }

  get active(): boolean {
    return this.props.active;
  }

  get deletedAt(): Date | null {
    return this.props.deletedAt;
  }

  get createdAt(): Date {
    return this.props.createdAt;
  }

  get updatedAt(): Date {
    return this.props.updatedAt;
  }

  get isDeleted(): boolean {
    return this.props.deletedAt !== null;
  }

  get state(): CredentialState {
    if (this.props.deletedAt !== null) return "deleted";
    return this.props.active ? "active" : "deactivated";
  }

  /** Usable for authentication iff active and not soft-deleted. */
  isUsable(): boolean {
    return this.state === "active";
  }

  identity(): Identity {
    return { id: this.props.id, name: this.props.name };
  }

  /** Public metadata. Never includes the hash or prefix. */
  toInfo(): CredentialInfo {
    return {
      id: this.props.id,
      name: this.props.name,
      description: this.props.description,
      created_at: this.props.createdAt.toISOString(),
      updated_at: this.props.updatedAt.toISOString(),
      is_active: this.props.active,
      is_deleted: this.isDeleted,
    };
  }

  static fromRow(row: {
    id: number;
    name: string;
    description: string | null;
    keyHash: string;
    keyPrefix: string;
    isActive: boolean;
    deletedAt: number | null;
    createdAt: number;
    updatedAt: number;
  }): Credential {
    return new Credential({
      id: row.id,
      name: row.name,
      description: row.description,
      secretHash: row.keyHash,
      secretPrefix: row.keyPrefix,
      active: row.isActive,
      deletedAt: row.deletedAt !== null ? new Date(row.deletedAt) : null,
      createdAt: new Date(row.createdAt),
      updatedAt: new Date(row.updatedAt),
    });
  }
}
