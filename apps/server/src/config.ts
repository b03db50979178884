import * as path from "node:path";

import type { OAuthProvider, PermissionSet } from "@keyrelay/auth-core";

import { isLogLevel, type LogLevel } from "./logger";

interface RawEnv {
  readonly [key: string]: string | undefined;
}

export class ConfigError extends Error {
  readonly issues: ReadonlyArray<string>;

  constructor(issues: ReadonlyArray<string>) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

export interface JwtConfig {
  readonly secret: string;
  readonly issuer: string;
  readonly audience: string;
  readonly accessTokenMinutes: number;
  readonly refreshTokenDays: number;
}

export interface ProviderCredentials {
  readonly clientId: string;
  readonly clientSecret: string;
}

export type OAuthSignupPolicy = "preregistered" | "open";

export interface OAuthConfig {
  readonly stateSecret: string;
  readonly stateMaxAgeSeconds: number;
  readonly publicBaseUrl: string;
  readonly frontendUrl: string;
  readonly errorRedirectUrl: string;
  readonly allowedRedirectOrigins: ReadonlyArray<string>;
  readonly signupPolicy: OAuthSignupPolicy;
  readonly providerTimeoutMs: number;
  readonly providers: Readonly<Record<OAuthProvider, ProviderCredentials | null>>;
}

export interface BreakGlassUser {
  readonly username: string;
  readonly passwordHash: string;
  readonly isAdmin: boolean;
  readonly permissions: PermissionSet;
  readonly email: string | null;
  readonly fullName: string | null;
}

export interface BreakGlassConfig {
  readonly users: ReadonlyMap<string, BreakGlassUser>;
  readonly emailDomain: string;
  readonly windowSeconds: number;
  readonly maxAttempts: number;
}

export interface CorsConfig {
  readonly allowedOrigins: ReadonlyArray<string>;
  readonly allowCredentials: boolean;
}

export interface AuthServerConfig {
  readonly port: number;
  readonly databasePath: string;
  readonly logLevel: LogLevel;
  readonly jwt: JwtConfig;
  readonly oauth: OAuthConfig;
  readonly breakGlass: BreakGlassConfig;
  readonly adminApiToken: string | null;
  readonly cors: CorsConfig;
}

export const BREAK_GLASS_USERNAME_PATTERN = /^[A-Za-z0-9_.-]{1,50}$/;
export const DEFAULT_PERMISSIONS: PermissionSet = { services: [] };

const ARGON2_HASH_PATTERN = /^\$argon2(id|i|d)\$/;
const SHA256_HEX_PATTERN = /^[0-9a-fA-F]{64}$/;

const toInt = (value: string | undefined, fallback: number): number => {
  if (!value) {
    return fallback;
  }
  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : fallback;
};

const requireEnv = (env: RawEnv, key: string, fallback?: string): string => {
  const value = env[key] ?? fallback;
  if (!value) {
    throw new ConfigError([`Missing required environment value ${key}`]);
  }
  return value;
};

const optionalEnv = (env: RawEnv, key: string): string | null => {
  const value = env[key]?.trim();
  return value && value.length > 0 ? value : null;
};

const splitList = (value: string | undefined): string[] => {
  if (!value) {
    return [];
  }
  return value
    .split(",")
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
};

const toOrigin = (value: string, key: string, issues: string[]): string | null => {
  try {
    return new URL(value).origin;
  } catch (_error) {
    issues.push(`${key} contains an invalid URL: ${value}`);
    return null;
  }
};

const isPlainObject = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const optionalString = (value: unknown, field: string, issues: string[]): string | null => {
  if (value === undefined || value === null) {
    return null;
  }
  if (typeof value !== "string" || value.trim().length === 0) {
    issues.push(`${field} must be a non-empty string`);
    return null;
  }
  return value.trim();
};

/**
 * Parses the break-glass user map. The accepted shape matches the snake_case JSON operators
 * already keep in their environment files:
 * `{"admin": {"password_hash": "...", "is_admin": true, "permissions": {...}}}`.
 */
export const parseBreakGlassUsers = (raw: string | undefined): ReadonlyMap<string, BreakGlassUser> => {
  const users = new Map<string, BreakGlassUser>();
  if (!raw || raw.trim().length === 0) {
    return users;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (_error) {
    throw new ConfigError(["AUTH_BREAK_GLASS_USERS is not valid JSON"]);
  }
  if (!isPlainObject(parsed)) {
    throw new ConfigError(["AUTH_BREAK_GLASS_USERS must be a JSON object keyed by username"]);
  }

  const issues: string[] = [];
  for (const [username, entry] of Object.entries(parsed)) {
    const prefix = `AUTH_BREAK_GLASS_USERS.${username}`;
    if (!BREAK_GLASS_USERNAME_PATTERN.test(username)) {
      issues.push(`${prefix}: username must match ${BREAK_GLASS_USERNAME_PATTERN.source}`);
      continue;
    }
    if (!isPlainObject(entry)) {
      issues.push(`${prefix} must be an object`);
      continue;
    }
    const passwordHash = entry.password_hash;
    if (typeof passwordHash !== "string" || !(ARGON2_HASH_PATTERN.test(passwordHash) || SHA256_HEX_PATTERN.test(passwordHash))) {
      issues.push(`${prefix}.password_hash must be an argon2 hash or a SHA-256 hex digest`);
      continue;
    }
    if (entry.is_admin !== undefined && typeof entry.is_admin !== "boolean") {
      issues.push(`${prefix}.is_admin must be a boolean`);
      continue;
    }
    if (entry.permissions !== undefined && !isPlainObject(entry.permissions)) {
      issues.push(`${prefix}.permissions must be an object`);
      continue;
    }
    const email = optionalString(entry.email, `${prefix}.email`, issues);
    const fullName = optionalString(entry.full_name, `${prefix}.full_name`, issues);

    users.set(username, {
      username,
      passwordHash: SHA256_HEX_PATTERN.test(passwordHash) ? passwordHash.toLowerCase() : passwordHash,
      isAdmin: entry.is_admin ?? false,
      permissions: isPlainObject(entry.permissions) ? entry.permissions : DEFAULT_PERMISSIONS,
      email,
      fullName
    });
  }

  if (issues.length > 0) {
    throw new ConfigError(issues);
  }
  return users;
};

const parseSignupPolicy = (value: string | undefined, issues: string[]): OAuthSignupPolicy => {
  if (!value) {
    return "preregistered";
  }
  if (value === "preregistered" || value === "open") {
    return value;
  }
  issues.push(`AUTH_OAUTH_SIGNUP_POLICY must be "preregistered" or "open", got "${value}"`);
  return "preregistered";
};

const providerCredentials = (env: RawEnv, prefix: string, issues: string[]): ProviderCredentials | null => {
  const clientId = optionalEnv(env, `${prefix}_CLIENT_ID`);
  const clientSecret = optionalEnv(env, `${prefix}_CLIENT_SECRET`);
  if (!clientId && !clientSecret) {
    return null;
  }
  if (!clientId || !clientSecret) {
    issues.push(`${prefix}_CLIENT_ID and ${prefix}_CLIENT_SECRET must be set together`);
    return null;
  }
  return { clientId, clientSecret };
};

export const loadConfig = (env: RawEnv = process.env): AuthServerConfig => {
  const production = (env.NODE_ENV ?? process.env.NODE_ENV) === "production";
  const devFallback = (value: string): string | undefined => (production ? undefined : value);
  const issues: string[] = [];

  const port = toInt(env.PORT, 8008);
  const databasePath =
    env.AUTH_DATABASE_PATH ?? path.join(process.env.HOME ?? process.cwd(), ".keyrelay", "auth.sqlite");

  const rawLogLevel = env.LOG_LEVEL?.toLowerCase() ?? "info";
  let logLevel: LogLevel = "info";
  if (isLogLevel(rawLogLevel)) {
    logLevel = rawLogLevel;
  } else {
    issues.push(`LOG_LEVEL must be one of debug, info, warn, error`);
  }

  const jwtSecret = requireEnv(env, "AUTH_JWT_SECRET", devFallback("dev-jwt-secret"));
  const stateSecret = requireEnv(env, "AUTH_STATE_SECRET", devFallback("dev-state-secret"));

  const accessTokenMinutes = toInt(env.AUTH_ACCESS_TOKEN_MINUTES, 30);
  const refreshTokenDays = toInt(env.AUTH_REFRESH_TOKEN_DAYS, 7);
  if (accessTokenMinutes <= 0) {
    issues.push("AUTH_ACCESS_TOKEN_MINUTES must be positive");
  }
  if (refreshTokenDays <= 0) {
    issues.push("AUTH_REFRESH_TOKEN_DAYS must be positive");
  }

  const publicBaseUrl = (env.AUTH_PUBLIC_BASE_URL ?? `http://localhost:${port}`).replace(/\/+$/, "");
  const frontendUrl = (env.AUTH_FRONTEND_URL ?? "http://localhost:3000").replace(/\/+$/, "");
  const errorRedirectUrl = env.AUTH_ERROR_REDIRECT_URL ?? `${frontendUrl}/auth/error`;

  const redirectOrigins = new Set<string>();
  for (const candidate of [frontendUrl, ...splitList(env.AUTH_ALLOWED_REDIRECT_ORIGINS)]) {
    const origin = toOrigin(candidate, "AUTH_ALLOWED_REDIRECT_ORIGINS", issues);
    if (origin) {
      redirectOrigins.add(origin);
    }
  }
  toOrigin(publicBaseUrl, "AUTH_PUBLIC_BASE_URL", issues);
  toOrigin(errorRedirectUrl, "AUTH_ERROR_REDIRECT_URL", issues);

  let corsAllowedOrigins: string[] = [];
  if (env.AUTH_CORS_ALLOWED_ORIGINS) {
    corsAllowedOrigins = splitList(env.AUTH_CORS_ALLOWED_ORIGINS);
  } else if (!production) {
    corsAllowedOrigins = [new URL(frontendUrl).origin];
  }

  const signupPolicy = parseSignupPolicy(env.AUTH_OAUTH_SIGNUP_POLICY, issues);
  const github = providerCredentials(env, "AUTH_GITHUB", issues);
  const google = providerCredentials(env, "AUTH_GOOGLE", issues);

  let breakGlassUsers: ReadonlyMap<string, BreakGlassUser> = new Map();
  try {
    breakGlassUsers = parseBreakGlassUsers(env.AUTH_BREAK_GLASS_USERS);
  } catch (error) {
    if (!(error instanceof ConfigError)) {
      throw error;
    }
    issues.push(...error.issues);
  }

  if (issues.length > 0) {
    throw new ConfigError(issues);
  }

  return {
    port,
    databasePath,
    logLevel,
    jwt: {
      secret: jwtSecret,
      issuer: env.AUTH_JWT_ISSUER ?? "keyrelay",
      audience: env.AUTH_JWT_AUDIENCE ?? "keyrelay-clients",
      accessTokenMinutes,
      refreshTokenDays
    },
    oauth: {
      stateSecret,
      stateMaxAgeSeconds: toInt(env.AUTH_STATE_MAX_AGE_SECONDS, 10 * 60),
      publicBaseUrl,
      frontendUrl,
      errorRedirectUrl,
      allowedRedirectOrigins: Array.from(redirectOrigins),
      signupPolicy,
      providerTimeoutMs: toInt(env.AUTH_PROVIDER_TIMEOUT_MS, 10_000),
      providers: { github, google }
    },
    breakGlass: {
      users: breakGlassUsers,
      emailDomain: env.AUTH_BREAK_GLASS_EMAIL_DOMAIN ?? "keyrelay.local",
      windowSeconds: toInt(env.AUTH_BREAK_GLASS_WINDOW_SECONDS, 15 * 60),
      maxAttempts: toInt(env.AUTH_BREAK_GLASS_MAX_ATTEMPTS, 10)
    },
    adminApiToken: optionalEnv(env, "AUTH_ADMIN_API_TOKEN"),
    cors: {
      allowedOrigins: corsAllowedOrigins,
      allowCredentials: true
    }
  };
};
