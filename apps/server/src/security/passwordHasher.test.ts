import { describe, expect, it } from "vitest";

import { Argon2PasswordHasher, sha256Hex } from "./passwordHasher";

const hasher = new Argon2PasswordHasher({ memoryCost: 1024, timeCost: 2, parallelism: 1 });

describe("Argon2PasswordHasher", () => {
  it("verifies argon2id hashes it produced", async () => {
    const hash = await hasher.hash("correct horse");

    expect(hash.startsWith("$argon2id$")).toBe(true);
    expect(await hasher.verify("correct horse", hash)).toBe(true);
    expect(await hasher.verify("wrong horse", hash)).toBe(false);
  });

  it("verifies SHA-256 hex digests in either case", async () => {
    const digest = sha256Hex("backup-password");

    expect(await hasher.verify("backup-password", digest)).toBe(true);
    expect(await hasher.verify("backup-password", digest.toUpperCase())).toBe(true);
    expect(await hasher.verify("backup-passwore", digest)).toBe(false);
  });

  it("treats unparseable hashes as a mismatch", async () => {
    expect(await hasher.verify("anything", "not-a-hash")).toBe(false);
  });
});
