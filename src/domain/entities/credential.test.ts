import { describe, expect, it } from "vitest";
import { Credential } from "./credential.js";

function row(overrides: Partial<Parameters<typeof Credential.fromRow>[0]> = {}) {
  return {
    id: 7,
    name: "Test Key",
    description: null,
    keyHash: "scrypt$1024$8$1$c2FsdA==$aGFzaA==",
    keyPrefix: "0123abcd",
    isActive: true,
    deletedAt: null,
    createdAt: Date.UTC(2026, 0, 1),
    updatedAt: Date.UTC(2026, 0, 2),
    ...overrides,
  };
}

describe("Credential", () => {
  it("is active and usable by default", () => {
    const c = Credential.fromRow(row());
    expect(c.state).toBe("active");
    expect(c.isUsable()).toBe(true);
    expect(c.isDeleted).toBe(false);
  });

  it("is deactivated when the active flag is cleared", () => {
    const c = Credential.fromRow(row({ isActive: false }));
    expect(c.state).toBe("deactivated");
    expect(c.isUsable()).toBe(false);
  });

  it("treats deletion as overriding the active flag", () => {
    const active = Credential.fromRow(row({ deletedAt: Date.UTC(2026, 0, 3) }));
    const inactive = Credential.fromRow(row({ isActive: false, deletedAt: Date.UTC(2026, 0, 3) }));
    expect(active.state).toBe("deleted");
    expect(inactive.state).toBe("deleted");
    expect(active.isUsable()).toBe(false);
  });

  it("exposes only id and name as identity", () => {
    expect(Credential.fromRow(row()).identity()).toEqual({ id: 7, name: "Test Key" });
  });

  it("renders public metadata without the hash or prefix", () => {
    const info = Credential.fromRow(row({ description: "ci" })).toInfo();
    expect(info).toEqual({
      id: 7,
      name: "Test Key",
      description: "ci",
      created_at: "2026-01-01T00:00:00.000Z",
      updated_at: "2026-01-02T00:00:00.000Z",
      is_active: true,
      is_deleted: false,
    });
  });
});
