import { createHash, timingSafeEqual } from "node:crypto";

import argon2 from "argon2";

export interface PasswordHasherOptions {
  readonly memoryCost?: number;
  readonly timeCost?: number;
  readonly parallelism?: number;
}

export interface PasswordHasher {
  hash(password: string): Promise<string>;
  verify(password: string, hash: string): Promise<boolean>;
}

const ARGON2_TYPE = argon2.argon2id;
const SHA256_HEX_PATTERN = /^[0-9a-f]{64}$/i;

export const sha256Hex = (value: string): string => createHash("sha256").update(value, "utf8").digest("hex");

/**
 * Hashes with argon2id and verifies either argon2 PHC strings or bare SHA-256 hex digests, the two
 * forms accepted for break-glass credentials.
 */
export class Argon2PasswordHasher implements PasswordHasher {
  private readonly options: PasswordHasherOptions;

  constructor(options: PasswordHasherOptions = {}) {
    this.options = options;
  }

  async hash(password: string): Promise<string> {
    return argon2.hash(password, {
      type: ARGON2_TYPE,
      memoryCost: this.options.memoryCost,
      timeCost: this.options.timeCost,
      parallelism: this.options.parallelism
    });
  }

  async verify(password: string, hash: string): Promise<boolean> {
    if (SHA256_HEX_PATTERN.test(hash)) {
      const expected = Buffer.from(hash.toLowerCase(), "hex");
      const provided = Buffer.from(sha256Hex(password), "hex");
      return timingSafeEqual(expected, provided);
    }
    try {
      return await argon2.verify(hash, password);
    } catch (_error) {
      return false;
    }
  }
}
