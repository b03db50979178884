import type {
  Identity,
  IdentityId,
  IdentityProvider,
  PermissionSet,
  RefreshCredentialRecord,
  Timestamp
} from "@keyrelay/auth-core";

export type IdentityConflictField = "email" | "username" | "provider_external_id" | "unknown";

/** Raised when a write would break one of the identity uniqueness constraints. */
export class IdentityConflictError extends Error {
  readonly field: IdentityConflictField;

  constructor(field: IdentityConflictField, options?: { cause?: unknown }) {
    super(`Identity ${field} already in use`, options);
    this.name = "IdentityConflictError";
    this.field = field;
  }
}

/** Fields a provider login is allowed to overwrite. */
export interface LoginProfileUpdate {
  readonly email: string;
  readonly displayName: string | null;
  readonly avatarUrl: string | null;
  readonly providerMetadata: Readonly<Record<string, unknown>> | null;
  readonly loggedInAt: Timestamp;
  /** Set when a pre-registered identity is claimed; ignored once an external id is recorded. */
  readonly providerExternalId?: string;
}

export interface IdentityAdminPatch {
  readonly isActive?: boolean;
  readonly isAdmin?: boolean;
  readonly permissions?: PermissionSet;
  readonly updatedAt: Timestamp;
}

export interface IdentityPage {
  readonly limit: number;
  readonly offset: number;
}

export interface IdentityStore {
  getIdentityById(id: IdentityId): Promise<Identity | null>;
  getIdentityByProviderExternalId(provider: IdentityProvider, externalId: string): Promise<Identity | null>;
  /** Pre-registered identities have no external id until their first login. */
  getPendingIdentityByProviderEmail(provider: IdentityProvider, email: string): Promise<Identity | null>;
  usernameExists(username: string): Promise<boolean>;
  createIdentity(identity: Identity): Promise<Identity>;
  recordLogin(id: IdentityId, update: LoginProfileUpdate): Promise<Identity | null>;
  updateIdentityAdmin(id: IdentityId, patch: IdentityAdminPatch): Promise<Identity | null>;
  listIdentities(page: IdentityPage): Promise<ReadonlyArray<Identity>>;
  countIdentities(): Promise<number>;
  deleteIdentity(id: IdentityId): Promise<boolean>;
  insertRefreshCredential(record: RefreshCredentialRecord): Promise<void>;
  /** Identity owning an unrevoked, unexpired credential with this hash. */
  findActiveRefreshIdentity(tokenHash: string, now: Timestamp): Promise<IdentityId | null>;
  /** True when a credential with this hash exists, whether or not it was already revoked. */
  revokeRefreshCredential(tokenHash: string): Promise<boolean>;
}
