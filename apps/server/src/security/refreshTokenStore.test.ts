import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { SqliteIdentityStore } from "../identity/sqliteStore";
import { RefreshTokenStore, hashRefreshSecret } from "./refreshTokenStore";

const IDENTITY_ID = "01HZX0000000000000000000A1";
const START = Date.UTC(2030, 0, 1);
const DAY_MS = 24 * 60 * 60 * 1000;

describe("RefreshTokenStore", () => {
  let identityStore: SqliteIdentityStore;
  let now: number;
  let refreshTokens: RefreshTokenStore;

  beforeEach(async () => {
    identityStore = new SqliteIdentityStore({ path: ":memory:" });
    await identityStore.createIdentity({
      id: IDENTITY_ID,
      email: "ada@example.com",
      username: "ada",
      displayName: null,
      avatarUrl: null,
      isActive: true,
      isAdmin: false,
      permissions: {},
      provider: "google",
      providerExternalId: "g-1",
      providerMetadata: null,
      createdAt: START,
      updatedAt: START,
      lastLoginAt: null
    });
    now = START;
    refreshTokens = new RefreshTokenStore({ identityStore, refreshTokenDays: 7, clock: () => now });
  });

  afterEach(() => {
    identityStore.close();
  });

  it("issues 256-bit base64url secrets that resolve to their identity", async () => {
    const secret = await refreshTokens.issue(IDENTITY_ID);

    expect(secret).toMatch(/^[A-Za-z0-9_-]{43}$/);
    expect(await refreshTokens.resolve(secret)).toBe(IDENTITY_ID);
  });

  it("persists only the digest of the secret", async () => {
    const secret = await refreshTokens.issue(IDENTITY_ID);

    expect(hashRefreshSecret(secret)).toMatch(/^[0-9a-f]{64}$/);
    expect(await identityStore.findActiveRefreshIdentity(secret, now)).toBeNull();
    expect(await identityStore.findActiveRefreshIdentity(hashRefreshSecret(secret), now)).toBe(IDENTITY_ID);
  });

  it("stops resolving once the lifetime has passed", async () => {
    const secret = await refreshTokens.issue(IDENTITY_ID);

    now = START + 7 * DAY_MS - 1;
    expect(await refreshTokens.resolve(secret)).toBe(IDENTITY_ID);

    now = START + 7 * DAY_MS;
    expect(await refreshTokens.resolve(secret)).toBeNull();
  });

  it("revokes once and treats a second revoke as a no-op", async () => {
    const secret = await refreshTokens.issue(IDENTITY_ID);

    expect(await refreshTokens.revoke(secret)).toBe("revoked");
    expect(await refreshTokens.resolve(secret)).toBeNull();
    expect(await refreshTokens.revoke(secret)).toBe("revoked");
    expect(await refreshTokens.resolve(secret)).toBeNull();
  });

  it("reports secrets that were never issued", async () => {
    expect(await refreshTokens.resolve("never-issued")).toBeNull();
    expect(await refreshTokens.revoke("never-issued")).toBe("not_found");
    expect(await refreshTokens.resolve("")).toBeNull();
  });
});
