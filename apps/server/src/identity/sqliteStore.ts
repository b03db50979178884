import DatabaseConstructor from "better-sqlite3";

import type {
  Identity,
  IdentityId,
  IdentityProvider,
  RefreshCredentialRecord,
  Timestamp
} from "@keyrelay/auth-core";

import { INITIAL_MIGRATION, applyMigration } from "../db/schema";

import {
  IdentityConflictError,
  type IdentityAdminPatch,
  type IdentityConflictField,
  type IdentityPage,
  type IdentityStore,
  type LoginProfileUpdate
} from "./types";

type BetterSqliteDatabase = InstanceType<typeof DatabaseConstructor>;

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const parseJsonColumn = (value: string | null | undefined): Record<string, unknown> | null => {
  if (!value) {
    return null;
  }
  try {
    const parsed: unknown = JSON.parse(value);
    return isRecord(parsed) ? parsed : null;
  } catch (_error) {
    return null;
  }
};

const serializeJsonColumn = (value: unknown): string | null => {
  if (value === null || value === undefined) {
    return null;
  }
  return JSON.stringify(value);
};

const IDENTITY_PROVIDERS: ReadonlyArray<IdentityProvider> = ["github", "google", "local"];

const toIdentityProvider = (value: string): IdentityProvider => {
  const match = IDENTITY_PROVIDERS.find((provider) => provider === value);
  if (!match) {
    throw new Error(`Unknown identity provider stored: ${value}`);
  }
  return match;
};

interface UserRow {
  id: string;
  email: string;
  username: string;
  display_name: string | null;
  avatar_url: string | null;
  is_active: number;
  is_admin: number;
  permissions: string;
  provider: string;
  provider_external_id: string | null;
  provider_metadata: string | null;
  created_at: number;
  updated_at: number;
  last_login_at: number | null;
}

interface RefreshOwnerRow {
  user_id: string;
}

interface CountRow {
  total: number;
}

const toIdentity = (row: UserRow): Identity => {
  return {
    id: row.id,
    email: row.email,
    username: row.username,
    displayName: row.display_name ?? null,
    avatarUrl: row.avatar_url ?? null,
    isActive: row.is_active === 1,
    isAdmin: row.is_admin === 1,
    permissions: parseJsonColumn(row.permissions) ?? {},
    provider: toIdentityProvider(row.provider),
    providerExternalId: row.provider_external_id ?? null,
    providerMetadata: parseJsonColumn(row.provider_metadata),
    createdAt: row.created_at,
    updatedAt: row.updated_at,
    lastLoginAt: row.last_login_at ?? null
  };
};

const CONSTRAINT_COLUMNS: ReadonlyArray<readonly [string, IdentityConflictField]> = [
  ["users.email", "email"],
  ["users.username", "username"],
  ["users.provider_external_id", "provider_external_id"]
];

/** Maps SQLite uniqueness failures on the users table onto {@link IdentityConflictError}. */
const toConflictError = (error: unknown): IdentityConflictError | null => {
  if (!(error instanceof Error) || !("code" in error) || typeof error.code !== "string") {
    return null;
  }
  if (!error.code.startsWith("SQLITE_CONSTRAINT_UNIQUE") && error.code !== "SQLITE_CONSTRAINT_PRIMARYKEY") {
    return null;
  }
  const message = error.message;
  const match = CONSTRAINT_COLUMNS.find(([column]) => message.includes(column));
  return new IdentityConflictError(match ? match[1] : "unknown", { cause: error });
};

const withConflictMapping = <T>(operation: () => T): T => {
  try {
    return operation();
  } catch (error) {
    throw toConflictError(error) ?? error;
  }
};

export interface SqliteIdentityStoreOptions {
  readonly path: string;
}

export class SqliteIdentityStore implements IdentityStore {
  private readonly db: BetterSqliteDatabase;

  constructor(options: SqliteIdentityStoreOptions) {
    this.db = new DatabaseConstructor(options.path);
    this.db.pragma("foreign_keys = ON");
    if (options.path !== ":memory:") {
      this.db.pragma("journal_mode = WAL");
    }
    applyMigration(INITIAL_MIGRATION, {
      exec: (statement: string) => {
        this.db.prepare(statement).run();
      }
    });
  }

  close(): void {
    this.db.close();
  }

  async getIdentityById(id: IdentityId): Promise<Identity | null> {
    const row = this.db.prepare<[string], UserRow>("SELECT * FROM users WHERE id = ? LIMIT 1").get(id);
    return row ? toIdentity(row) : null;
  }

  async getIdentityByProviderExternalId(provider: IdentityProvider, externalId: string): Promise<Identity | null> {
    const row = this.db
      .prepare<[string, string], UserRow>("SELECT * FROM users WHERE provider = ? AND provider_external_id = ? LIMIT 1")
      .get(provider, externalId);
    return row ? toIdentity(row) : null;
  }

  async getPendingIdentityByProviderEmail(provider: IdentityProvider, email: string): Promise<Identity | null> {
    const row = this.db
      .prepare<[string, string], UserRow>(
        `
        SELECT * FROM users
        WHERE provider = ? AND provider_external_id IS NULL AND email = ? COLLATE NOCASE
        LIMIT 1
      `
      )
      .get(provider, email);
    return row ? toIdentity(row) : null;
  }

  async usernameExists(username: string): Promise<boolean> {
    const row = this.db.prepare<[string], { id: string }>("SELECT id FROM users WHERE username = ? LIMIT 1").get(username);
    return row !== undefined;
  }

  async createIdentity(identity: Identity): Promise<Identity> {
    withConflictMapping(() =>
      this.db
        .prepare(
          `
          INSERT INTO users (
            id, email, username, display_name, avatar_url, is_active, is_admin, permissions,
            provider, provider_external_id, provider_metadata, created_at, updated_at, last_login_at
          ) VALUES (
            @id, @email, @username, @display_name, @avatar_url, @is_active, @is_admin, @permissions,
            @provider, @provider_external_id, @provider_metadata, @created_at, @updated_at, @last_login_at
          )
        `
        )
        .run({
          id: identity.id,
          email: identity.email,
          username: identity.username,
          display_name: identity.displayName,
          avatar_url: identity.avatarUrl,
          is_active: identity.isActive ? 1 : 0,
          is_admin: identity.isAdmin ? 1 : 0,
          permissions: JSON.stringify(identity.permissions),
          provider: identity.provider,
          provider_external_id: identity.providerExternalId,
          provider_metadata: serializeJsonColumn(identity.providerMetadata),
          created_at: identity.createdAt,
          updated_at: identity.updatedAt,
          last_login_at: identity.lastLoginAt
        })
    );
    return identity;
  }

  async recordLogin(id: IdentityId, update: LoginProfileUpdate): Promise<Identity | null> {
    const result = withConflictMapping(() =>
      this.db
        .prepare(
          `
          UPDATE users SET
            email = @email,
            display_name = @display_name,
            avatar_url = @avatar_url,
            provider_metadata = @provider_metadata,
            provider_external_id = COALESCE(provider_external_id, @provider_external_id),
            last_login_at = @logged_in_at,
            updated_at = @logged_in_at
          WHERE id = @id
        `
        )
        .run({
          id,
          email: update.email,
          display_name: update.displayName,
          avatar_url: update.avatarUrl,
          provider_metadata: serializeJsonColumn(update.providerMetadata),
          provider_external_id: update.providerExternalId ?? null,
          logged_in_at: update.loggedInAt
        })
    );
    return result.changes > 0 ? this.getIdentityById(id) : null;
  }

  async updateIdentityAdmin(id: IdentityId, patch: IdentityAdminPatch): Promise<Identity | null> {
    const result = this.db
      .prepare(
        `
        UPDATE users SET
          is_active = COALESCE(@is_active, is_active),
          is_admin = COALESCE(@is_admin, is_admin),
          permissions = COALESCE(@permissions, permissions),
          updated_at = @updated_at
        WHERE id = @id
      `
      )
      .run({
        id,
        is_active: patch.isActive === undefined ? null : patch.isActive ? 1 : 0,
        is_admin: patch.isAdmin === undefined ? null : patch.isAdmin ? 1 : 0,
        permissions: serializeJsonColumn(patch.permissions),
        updated_at: patch.updatedAt
      });
    return result.changes > 0 ? this.getIdentityById(id) : null;
  }

  async listIdentities(page: IdentityPage): Promise<ReadonlyArray<Identity>> {
    const rows = this.db
      .prepare<[number, number], UserRow>("SELECT * FROM users ORDER BY created_at ASC, id ASC LIMIT ? OFFSET ?")
      .all(page.limit, page.offset);
    return rows.map(toIdentity);
  }

  async countIdentities(): Promise<number> {
    const row = this.db.prepare<[], CountRow>("SELECT COUNT(*) AS total FROM users").get();
    return row ? row.total : 0;
  }

  async deleteIdentity(id: IdentityId): Promise<boolean> {
    const result = this.db.prepare("DELETE FROM users WHERE id = ?").run(id);
    return result.changes > 0;
  }

  async insertRefreshCredential(record: RefreshCredentialRecord): Promise<void> {
    this.db
      .prepare(
        `
        INSERT INTO refresh_tokens (id, user_id, token_hash, expires_at, created_at, revoked)
        VALUES (@id, @user_id, @token_hash, @expires_at, @created_at, @revoked)
      `
      )
      .run({
        id: record.id,
        user_id: record.identityId,
        token_hash: record.tokenHash,
        expires_at: record.expiresAt,
        created_at: record.createdAt,
        revoked: record.revoked ? 1 : 0
      });
  }

  async findActiveRefreshIdentity(tokenHash: string, now: Timestamp): Promise<IdentityId | null> {
    const row = this.db
      .prepare<[string, number], RefreshOwnerRow>(
        `
        SELECT user_id FROM refresh_tokens
        WHERE token_hash = ? AND revoked = 0 AND expires_at > ?
        LIMIT 1
      `
      )
      .get(tokenHash, now);
    return row ? row.user_id : null;
  }

  async revokeRefreshCredential(tokenHash: string): Promise<boolean> {
    const result = this.db.prepare("UPDATE refresh_tokens SET revoked = 1 WHERE token_hash = ?").run(tokenHash);
    return result.changes > 0;
  }
}
