import { describe, expect, it } from "vitest";
import { API_KEY_PREFIX_LENGTH, apiKeyPrefix, generateApiKey } from "./api-key.js";

describe("generateApiKey", () => {
  it("returns 64 lowercase hex characters", () => {
    expect(generateApiKey()).toMatch(/^[0-9a-f]{64}$/);
  });

  it("yields 1,000 distinct keys", () => {
    const keys = new Set(Array.from({ length: 1000 }, () => generateApiKey()));
    expect(keys.size).toBe(1000);
  });
});

describe("apiKeyPrefix", () => {
  it("takes the first eight characters", () => {
    expect(API_KEY_PREFIX_LENGTH).toBe(8);
    expect(apiKeyPrefix("0123456789abcdef")).toBe("01234567");
  });

  it("returns short input unchanged", () => {
    expect(apiKeyPrefix("abc")).toBe("abc");
    expect(apiKeyPrefix("")).toBe("");
  });
});
