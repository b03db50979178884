/**
 * Shared identity and token contracts consumed by the relay server and by clients that talk to
 * it. Wire shapes (snake_case) are kept separate from the camelCase records used in code.
 */

export type IdentityId = string;
export type RefreshCredentialId = string;

export type Timestamp = number;

export type OAuthProvider = "github" | "google";

export type IdentityProvider = OAuthProvider | "local";

export const OAUTH_PROVIDERS: ReadonlyArray<OAuthProvider> = ["github", "google"];

export const isOAuthProvider = (value: unknown): value is OAuthProvider =>
  OAUTH_PROVIDERS.some((provider) => provider === value);

/** Operator-defined grants. The relay stores and forwards them without interpreting them. */
export type PermissionSet = Readonly<Record<string, unknown>>;

export interface Identity {
  readonly id: IdentityId;
  readonly email: string;
  readonly username: string;
  readonly displayName: string | null;
  readonly avatarUrl: string | null;
  readonly isActive: boolean;
  readonly isAdmin: boolean;
  readonly permissions: PermissionSet;
  readonly provider: IdentityProvider;
  /** Null only while a pre-registered identity has not completed its first login. */
  readonly providerExternalId: string | null;
  readonly providerMetadata: Readonly<Record<string, unknown>> | null;
  readonly createdAt: Timestamp;
  readonly updatedAt: Timestamp;
  readonly lastLoginAt: Timestamp | null;
}

export interface RefreshCredentialRecord {
  readonly id: RefreshCredentialId;
  readonly identityId: IdentityId;
  readonly tokenHash: string;
  readonly expiresAt: Timestamp;
  readonly createdAt: Timestamp;
  readonly revoked: boolean;
}

/** Normalised result of a provider code exchange. */
export interface ProviderProfile {
  readonly provider: IdentityProvider;
  readonly externalId: string;
  readonly email: string;
  /** Whether the provider vouches for `email`. Pre-registered identities are claimed only then. */
  readonly emailVerified: boolean;
  readonly username: string;
  readonly displayName: string | null;
  readonly avatarUrl: string | null;
  readonly raw: Readonly<Record<string, unknown>>;
}

export interface AccessTokenClaims {
  readonly sub: IdentityId;
  readonly email: string;
  readonly username: string;
  readonly is_admin: boolean;
  readonly permissions: PermissionSet;
  readonly type: "access";
  readonly iat: number;
  readonly exp: number;
}

export type TokenType = "bearer";

export interface TokenEnvelope {
  readonly access_token: string;
  readonly refresh_token?: string;
  readonly token_type: TokenType;
  readonly expires_in: number;
}

export interface IdentityProjection {
  readonly id: IdentityId;
  readonly email: string;
  readonly username: string;
  readonly full_name: string | null;
  readonly avatar_url: string | null;
  readonly is_admin: boolean;
  readonly permissions: PermissionSet;
}

export type OAuthCallbackErrorCode =
  | "invalid_state"
  | "oauth_failed"
  | "access_denied"
  | "not_registered"
  | "account_conflict"
  | "account_disabled";

export const toIdentityProjection = (identity: Identity): IdentityProjection => ({
  id: identity.id,
  email: identity.email,
  username: identity.username,
  full_name: identity.displayName,
  avatar_url: identity.avatarUrl,
  is_admin: identity.isAdmin,
  permissions: identity.permissions
});
