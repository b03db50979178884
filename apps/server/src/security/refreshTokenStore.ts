import { createHash, randomBytes } from "node:crypto";

import { ulid } from "ulidx";

import type { IdentityId } from "@keyrelay/auth-core";

import type { IdentityStore } from "../identity/types";
import type { Clock } from "./tokenService";

export interface RefreshTokenStoreOptions {
  readonly identityStore: IdentityStore;
  readonly refreshTokenDays: number;
  readonly clock?: Clock;
}

export type RevokeOutcome = "revoked" | "not_found";

const REFRESH_SECRET_BYTES = 32;
const DAY_MS = 24 * 60 * 60 * 1000;

export const hashRefreshSecret = (secret: string): string => createHash("sha256").update(secret).digest("hex");

/**
 * Opaque refresh secrets. Only the SHA-256 digest is persisted; the raw value leaves this class
 * exactly once, from {@link RefreshTokenStore.issue}.
 */
export class RefreshTokenStore {
  private readonly store: IdentityStore;
  private readonly lifetimeMs: number;
  private readonly clock: Clock;

  constructor(options: RefreshTokenStoreOptions) {
    this.store = options.identityStore;
    this.lifetimeMs = options.refreshTokenDays * DAY_MS;
    this.clock = options.clock ?? Date.now;
  }

  async issue(identityId: IdentityId): Promise<string> {
    const secret = randomBytes(REFRESH_SECRET_BYTES).toString("base64url");
    const now = this.clock();
    await this.store.insertRefreshCredential({
      id: ulid(now),
      identityId,
      tokenHash: hashRefreshSecret(secret),
      expiresAt: now + this.lifetimeMs,
      createdAt: now,
      revoked: false
    });
    return secret;
  }

  async resolve(secret: string): Promise<IdentityId | null> {
    if (!secret) {
      return null;
    }
    return this.store.findActiveRefreshIdentity(hashRefreshSecret(secret), this.clock());
  }

  async revoke(secret: string): Promise<RevokeOutcome> {
    if (!secret) {
      return "not_found";
    }
    const matched = await this.store.revokeRefreshCredential(hashRefreshSecret(secret));
    return matched ? "revoked" : "not_found";
  }
}
