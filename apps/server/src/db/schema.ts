export interface Migration {
  readonly id: string;
  readonly statements: ReadonlyArray<string>;
}

const USERS_TABLE = `
CREATE TABLE IF NOT EXISTS users (
  id TEXT PRIMARY KEY,
  email TEXT NOT NULL UNIQUE COLLATE NOCASE,
  username TEXT NOT NULL UNIQUE,
  display_name TEXT,
  avatar_url TEXT,
  is_active INTEGER NOT NULL DEFAULT 1,
  is_admin INTEGER NOT NULL DEFAULT 0,
  permissions TEXT NOT NULL,
  provider TEXT NOT NULL,
  provider_external_id TEXT,
  provider_metadata TEXT,
  created_at INTEGER NOT NULL,
  updated_at INTEGER NOT NULL,
  last_login_at INTEGER,
  UNIQUE(provider, provider_external_id)
);
`.trim();

const REFRESH_TOKENS_TABLE = `
CREATE TABLE IF NOT EXISTS refresh_tokens (
  id TEXT PRIMARY KEY,
  user_id TEXT NOT NULL,
  token_hash TEXT NOT NULL UNIQUE,
  expires_at INTEGER NOT NULL,
  created_at INTEGER NOT NULL,
  revoked INTEGER NOT NULL DEFAULT 0,
  FOREIGN KEY(user_id) REFERENCES users(id) ON DELETE CASCADE
);
`.trim();

const REFRESH_TOKENS_USER_INDEX = `
CREATE INDEX IF NOT EXISTS idx_refresh_tokens_user ON refresh_tokens (user_id);
`.trim();

const USERS_PROVIDER_EMAIL_INDEX = `
CREATE INDEX IF NOT EXISTS idx_users_provider_email ON users (provider, email);
`.trim();

export const INITIAL_MIGRATION: Migration = {
  id: "0001_initial_relay_schema",
  statements: [USERS_TABLE, USERS_PROVIDER_EMAIL_INDEX, REFRESH_TOKENS_TABLE, REFRESH_TOKENS_USER_INDEX]
};

export interface SqlExecutor {
  exec(sql: string): void;
}

export const applyMigration = (migration: Migration, executor: SqlExecutor): void => {
  for (const statement of migration.statements) {
    executor.exec(statement);
  }
};
