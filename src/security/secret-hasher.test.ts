import { describe, expect, it } from "vitest";
import { generateApiKey } from "./api-key.js";
import { ScryptSecretHasher, parseScryptHash } from "./secret-hasher.js";

// Minimum cost keeps the suite fast; production uses SCRYPT_COST.
const hasher = new ScryptSecretHasher(1024);

describe("ScryptSecretHasher", () => {
  it("encodes scheme, parameters, salt and hash", async () => {
    const encoded = await hasher.hash("secret");
    const parts = encoded.split("$");

    expect(parts.slice(0, 4)).toEqual(["scrypt", "1024", "8", "1"]);
    expect(Buffer.from(parts[4], "base64")).toHaveLength(16);
    expect(Buffer.from(parts[5], "base64")).toHaveLength(64);
  });

  it("does not contain the plaintext", async () => {
    const key = generateApiKey();
    expect(await hasher.hash(key)).not.toContain(key);
  });

  it("verifies the original secret only", async () => {
    const encoded = await hasher.hash("correct horse");

    expect(await hasher.verify("correct horse", encoded)).toBe(true);
    expect(await hasher.verify("correct horse ", encoded)).toBe(false);
    expect(await hasher.verify("", encoded)).toBe(false);
  });

  it("salts each hash", async () => {
    const a = await hasher.hash("same");
    const b = await hasher.hash("same");

    expect(a).not.toBe(b);
    expect(await hasher.verify("same", a)).toBe(true);
    expect(await hasher.verify("same", b)).toBe(true);
  });

  it("verifies hashes produced at a different cost", async () => {
    const encoded = await new ScryptSecretHasher(2048).hash("secret");
    expect(await hasher.verify("secret", encoded)).toBe(true);
  });

  it("rejects malformed encodings", async () => {
    for (const bad of ["", "plain", "bcrypt$1024$8$1$c2FsdA==$aGFzaA==", "scrypt$1000$8$1$c2FsdA==$aGFzaA==", "scrypt$1024$8$1$$"]) {
      expect(await hasher.verify("secret", bad)).toBe(false);
    }
  });

  it("yields 1,000 distinct hashes for 1,000 keys", async () => {
    const hashes = new Set<string>();
    for (let i = 0; i < 1000; i++) {
      hashes.add(await hasher.hash(generateApiKey()));
    }
    expect(hashes.size).toBe(1000);
  });
});

describe("parseScryptHash", () => {
  it("reads parameters back", () => {
    const parsed = parseScryptHash("scrypt$1024$8$1$c2FsdA==$aGFzaA==");
    expect(parsed?.params).toEqual({ N: 1024, r: 8, p: 1 });
    expect(parsed?.salt.toString()).toBe("salt");
    expect(parsed?.hash.toString()).toBe("hash");
  });
});
