import { afterEach, beforeEach, describe, expect, it } from "vitest";

import type { Identity } from "@keyrelay/auth-core";

import { SqliteIdentityStore } from "./sqliteStore";
import { IdentityConflictError } from "./types";

const baseIdentity = (overrides: Partial<Identity> = {}): Identity => ({
  id: "01HZX0000000000000000000A1",
  email: "ada@example.com",
  username: "ada",
  displayName: "Ada",
  avatarUrl: null,
  isActive: true,
  isAdmin: false,
  permissions: { services: [] },
  provider: "github",
  providerExternalId: "1001",
  providerMetadata: { login: "ada" },
  createdAt: 1_000,
  updatedAt: 1_000,
  lastLoginAt: 1_000,
  ...overrides
});

describe("SqliteIdentityStore", () => {
  let store: SqliteIdentityStore;

  beforeEach(() => {
    store = new SqliteIdentityStore({ path: ":memory:" });
  });

  afterEach(() => {
    store.close();
  });

  it("creates and reads identities by id and provider external id", async () => {
    await store.createIdentity(baseIdentity());

    expect(await store.getIdentityById("01HZX0000000000000000000A1")).toEqual(baseIdentity());
    expect(await store.getIdentityByProviderExternalId("github", "1001")).toEqual(baseIdentity());
    expect(await store.getIdentityByProviderExternalId("google", "1001")).toBeNull();
    expect(await store.usernameExists("ada")).toBe(true);
    expect(await store.usernameExists("bob")).toBe(false);
  });

  it("reports which uniqueness constraint a write broke", async () => {
    await store.createIdentity(baseIdentity());

    await expect(
      store.createIdentity(baseIdentity({ id: "id-2", email: "ADA@example.com", username: "ada2", providerExternalId: "2" }))
    ).rejects.toMatchObject({ name: "IdentityConflictError", field: "email" });
    await expect(
      store.createIdentity(baseIdentity({ id: "id-3", email: "other@example.com", providerExternalId: "3" }))
    ).rejects.toMatchObject({ field: "username" });
    await expect(
      store.createIdentity(baseIdentity({ id: "id-4", email: "four@example.com", username: "four" }))
    ).rejects.toBeInstanceOf(IdentityConflictError);
  });

  it("finds pending identities by provider and email and claims them on login", async () => {
    await store.createIdentity(
      baseIdentity({ providerExternalId: null, providerMetadata: null, lastLoginAt: null, email: "Pending@Example.com" })
    );

    const pending = await store.getPendingIdentityByProviderEmail("github", "pending@example.com");
    expect(pending?.id).toBe("01HZX0000000000000000000A1");
    expect(await store.getPendingIdentityByProviderEmail("google", "pending@example.com")).toBeNull();

    const claimed = await store.recordLogin("01HZX0000000000000000000A1", {
      email: "pending@example.com",
      displayName: "Pending Person",
      avatarUrl: "https://avatars.test/1.png",
      providerMetadata: { login: "pending" },
      loggedInAt: 5_000,
      providerExternalId: "777"
    });

    expect(claimed).toMatchObject({
      providerExternalId: "777",
      displayName: "Pending Person",
      lastLoginAt: 5_000,
      updatedAt: 5_000,
      username: "ada"
    });
    expect(await store.getPendingIdentityByProviderEmail("github", "pending@example.com")).toBeNull();
  });

  it("keeps the recorded external id when a later login passes another one", async () => {
    await store.createIdentity(baseIdentity());

    const updated = await store.recordLogin("01HZX0000000000000000000A1", {
      email: "ada@example.com",
      displayName: null,
      avatarUrl: null,
      providerMetadata: null,
      loggedInAt: 2_000,
      providerExternalId: "9999"
    });

    expect(updated?.providerExternalId).toBe("1001");
    expect(updated?.displayName).toBeNull();
  });

  it("applies partial admin patches and leaves other fields untouched", async () => {
    await store.createIdentity(baseIdentity());

    const patched = await store.updateIdentityAdmin("01HZX0000000000000000000A1", { isAdmin: true, updatedAt: 3_000 });

    expect(patched).toMatchObject({ isAdmin: true, isActive: true, permissions: { services: [] }, updatedAt: 3_000 });
    expect(await store.updateIdentityAdmin("missing", { isActive: false, updatedAt: 3_000 })).toBeNull();
  });

  it("lists identities in creation order with a total count", async () => {
    await store.createIdentity(baseIdentity());
    await store.createIdentity(
      baseIdentity({ id: "id-2", email: "b@example.com", username: "b", providerExternalId: "2", createdAt: 2_000 })
    );
    await store.createIdentity(
      baseIdentity({ id: "id-3", email: "c@example.com", username: "c", providerExternalId: "3", createdAt: 3_000 })
    );

    const page = await store.listIdentities({ limit: 2, offset: 1 });

    expect(page.map((identity) => identity.id)).toEqual(["id-2", "id-3"]);
    expect(await store.countIdentities()).toBe(3);
  });

  it("resolves only active refresh credentials and revokes idempotently", async () => {
    await store.createIdentity(baseIdentity());
    await store.insertRefreshCredential({
      id: "r1",
      identityId: "01HZX0000000000000000000A1",
      tokenHash: "hash-1",
      expiresAt: 10_000,
      createdAt: 1_000,
      revoked: false
    });

    expect(await store.findActiveRefreshIdentity("hash-1", 9_999)).toBe("01HZX0000000000000000000A1");
    expect(await store.findActiveRefreshIdentity("hash-1", 10_000)).toBeNull();
    expect(await store.findActiveRefreshIdentity("hash-2", 5_000)).toBeNull();

    expect(await store.revokeRefreshCredential("hash-1")).toBe(true);
    expect(await store.revokeRefreshCredential("hash-1")).toBe(true);
    expect(await store.revokeRefreshCredential("hash-2")).toBe(false);
    expect(await store.findActiveRefreshIdentity("hash-1", 5_000)).toBeNull();
  });

  it("cascades refresh credentials when an identity is deleted", async () => {
    await store.createIdentity(baseIdentity());
    await store.insertRefreshCredential({
      id: "r1",
      identityId: "01HZX0000000000000000000A1",
      tokenHash: "hash-1",
      expiresAt: 10_000,
      createdAt: 1_000,
      revoked: false
    });

    expect(await store.deleteIdentity("01HZX0000000000000000000A1")).toBe(true);
    expect(await store.deleteIdentity("01HZX0000000000000000000A1")).toBe(false);
    expect(await store.revokeRefreshCredential("hash-1")).toBe(false);
  });
});
