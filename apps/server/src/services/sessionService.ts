import { ulid } from "ulidx";

import type { Identity, PermissionSet, ProviderProfile, TokenType } from "@keyrelay/auth-core";

import { DEFAULT_PERMISSIONS } from "../config";
import { IdentityConflictError, type IdentityConflictField, type IdentityStore } from "../identity/types";
import type { Logger } from "../logger";
import type { RefreshTokenStore } from "../security/refreshTokenStore";
import type { Clock, TokenService } from "../security/tokenService";

const keepStored = (identity: Identity, profile: ProviderProfile): ProviderProfile => ({
  ...profile,
  email: identity.email,
  displayName: identity.displayName
});

export interface ResolveOptions {
  /** When false, only existing or pre-registered identities are accepted. */
  readonly allowCreate: boolean;
  /** Grants applied only when a new identity is created. */
  readonly isAdmin?: boolean;
  readonly permissions?: PermissionSet;
  /** Keep the stored email and display name of an identity that already exists. */
  readonly keepStoredProfile?: boolean;
}

export type ResolveResult =
  | { readonly status: "resolved"; readonly identity: Identity; readonly created: boolean }
  | { readonly status: "not_registered" }
  | { readonly status: "conflict"; readonly field: IdentityConflictField }
  | { readonly status: "inactive"; readonly identity: Identity };

export interface EstablishedSession {
  readonly accessToken: string;
  readonly refreshToken: string;
  readonly tokenType: TokenType;
  readonly expiresIn: number;
}

export interface RenewedSession {
  readonly accessToken: string;
  readonly tokenType: TokenType;
  readonly expiresIn: number;
}

export interface SessionManagerOptions {
  readonly identityStore: IdentityStore;
  readonly tokenService: TokenService;
  readonly refreshTokens: RefreshTokenStore;
  readonly logger: Logger;
  readonly clock?: Clock;
}

const MAX_USERNAME_LENGTH = 50;
const MAX_NUMBERED_CANDIDATES = 20;
const MAX_CREATE_ATTEMPTS = 3;

const sanitizeUsername = (value: string): string => {
  const cleaned = value.replace(/[^A-Za-z0-9_.-]/g, "_").slice(0, MAX_USERNAME_LENGTH);
  return cleaned.length > 0 ? cleaned : "user";
};

const withSuffix = (base: string, suffix: string): string =>
  `${base.slice(0, MAX_USERNAME_LENGTH - suffix.length - 1)}_${suffix}`;

export class SessionManager {
  private readonly store: IdentityStore;
  private readonly tokens: TokenService;
  private readonly refreshTokens: RefreshTokenStore;
  private readonly logger: Logger;
  private readonly clock: Clock;

  constructor(options: SessionManagerOptions) {
    this.store = options.identityStore;
    this.tokens = options.tokenService;
    this.refreshTokens = options.refreshTokens;
    this.logger = options.logger;
    this.clock = options.clock ?? Date.now;
  }

  /**
   * Finds the identity for a provider profile, creating or claiming one where allowed. Logins
   * overwrite only provider-controlled fields; username and grants stay as they are.
   */
  async resolveOrCreate(profile: ProviderProfile, options: ResolveOptions): Promise<ResolveResult> {
    const existing = await this.store.getIdentityByProviderExternalId(profile.provider, profile.externalId);
    if (existing) {
      return this.refreshExisting(existing, options.keepStoredProfile ? keepStored(existing, profile) : profile);
    }

    const pending = profile.emailVerified
      ? await this.store.getPendingIdentityByProviderEmail(profile.provider, profile.email)
      : null;
    if (pending) {
      this.logger.info("Claiming pre-registered identity", { identityId: pending.id, provider: profile.provider });
      return this.refreshExisting(pending, profile, profile.externalId);
    }

    if (!options.allowCreate) {
      return { status: "not_registered" };
    }
    return this.createFromProfile(profile, options);
  }

  async establishSession(identity: Identity): Promise<EstablishedSession> {
    const refreshToken = await this.refreshTokens.issue(identity.id);
    const minted = this.tokens.mint(identity);
    return {
      accessToken: minted.token,
      refreshToken,
      tokenType: "bearer",
      expiresIn: minted.expiresIn
    };
  }

  /** The refresh secret stays valid; only a new access token is minted. */
  async renew(refreshSecret: string): Promise<RenewedSession | null> {
    const identityId = await this.refreshTokens.resolve(refreshSecret);
    if (!identityId) {
      return null;
    }
    const identity = await this.store.getIdentityById(identityId);
    if (!identity || !identity.isActive) {
      return null;
    }
    const minted = this.tokens.mint(identity);
    return { accessToken: minted.token, tokenType: "bearer", expiresIn: minted.expiresIn };
  }

  async endSession(refreshSecret: string): Promise<boolean> {
    return (await this.refreshTokens.revoke(refreshSecret)) === "revoked";
  }

  /** Active identity behind a bearer access token. */
  async identityForAccessToken(token: string): Promise<Identity | null> {
    const claims = this.tokens.verify(token);
    if (!claims) {
      return null;
    }
    const identity = await this.store.getIdentityById(claims.sub);
    return identity && identity.isActive ? identity : null;
  }

  private async refreshExisting(identity: Identity, profile: ProviderProfile, claimExternalId?: string): Promise<ResolveResult> {
    if (!identity.isActive) {
      return { status: "inactive", identity };
    }
    try {
      const updated = await this.store.recordLogin(identity.id, {
        email: profile.email,
        displayName: profile.displayName,
        avatarUrl: profile.avatarUrl,
        providerMetadata: profile.raw,
        loggedInAt: this.clock(),
        providerExternalId: claimExternalId
      });
      if (!updated) {
        return { status: "not_registered" };
      }
      return { status: "resolved", identity: updated, created: false };
    } catch (error) {
      if (error instanceof IdentityConflictError) {
        this.logger.warn("Login profile conflicts with another identity", { identityId: identity.id, field: error.field });
        return { status: "conflict", field: error.field };
      }
      throw error;
    }
  }

  private async createFromProfile(profile: ProviderProfile, options: ResolveOptions): Promise<ResolveResult> {
    const base = sanitizeUsername(profile.username);
    for (let attempt = 0; attempt < MAX_CREATE_ATTEMPTS; attempt += 1) {
      const now = this.clock();
      const username = await this.pickUsername(base, attempt > 0);
      const identity: Identity = {
        id: ulid(now),
        email: profile.email,
        username,
        displayName: profile.displayName,
        avatarUrl: profile.avatarUrl,
        isActive: true,
        isAdmin: options.isAdmin ?? false,
        permissions: options.permissions ?? DEFAULT_PERMISSIONS,
        provider: profile.provider,
        providerExternalId: profile.externalId,
        providerMetadata: profile.raw,
        createdAt: now,
        updatedAt: now,
        lastLoginAt: now
      };
      try {
        const created = await this.store.createIdentity(identity);
        this.logger.info("Identity created", { identityId: created.id, provider: created.provider, username });
        return { status: "resolved", identity: created, created: true };
      } catch (error) {
        if (!(error instanceof IdentityConflictError)) {
          throw error;
        }
        if (error.field === "provider_external_id") {
          // Lost a race with a concurrent first login for the same account.
          const winner = await this.store.getIdentityByProviderExternalId(profile.provider, profile.externalId);
          if (winner) {
            return this.refreshExisting(winner, profile);
          }
        }
        if (error.field !== "username") {
          this.logger.warn("New identity conflicts with an existing one", { provider: profile.provider, field: error.field });
          return { status: "conflict", field: error.field };
        }
      }
    }
    return { status: "conflict", field: "username" };
  }

  private async pickUsername(base: string, forceRandom: boolean): Promise<string> {
    if (!forceRandom) {
      if (!(await this.store.usernameExists(base))) {
        return base;
      }
      for (let index = 2; index <= MAX_NUMBERED_CANDIDATES; index += 1) {
        const candidate = withSuffix(base, String(index));
        if (!(await this.store.usernameExists(candidate))) {
          return candidate;
        }
      }
    }
    return withSuffix(base, ulid(this.clock()).slice(-8).toLowerCase());
  }
}
