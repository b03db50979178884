import { createHash, timingSafeEqual } from "node:crypto";

/**
 * Extracts the credential from an `Authorization: Bearer <token>` header.
 */
export const extractBearerToken = (header: string | undefined): string | null => {
  if (!header) {
    return null;
  }
  const match = header.match(/^Bearer\s+(\S+)\s*$/i);
  return match?.[1] ?? null;
};

const digest = (value: string): Buffer => createHash("sha256").update(value, "utf8").digest();

/**
 * Compares a presented static token with the configured one without leaking length or prefix
 * through timing: both sides are hashed to equal-length digests first.
 */
export const matchesStaticToken = (presented: string | null, expected: string): boolean => {
  if (!presented || !expected) {
    return false;
  }
  return timingSafeEqual(digest(presented), digest(expected));
};
