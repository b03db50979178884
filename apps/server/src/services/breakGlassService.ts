import type { IdentityProjection } from "@keyrelay/auth-core";
import { toIdentityProjection } from "@keyrelay/auth-core";

import type { BreakGlassConfig } from "../config";
import type { Logger } from "../logger";
import type { PasswordHasher } from "../security/passwordHasher";
import { sha256Hex } from "../security/passwordHasher";
import { SlidingWindowRateLimiter } from "../security/rateLimiter";
import type { Clock } from "../security/tokenService";
import type { EstablishedSession, SessionManager } from "./sessionService";

export interface BreakGlassLoginRequest {
  readonly username: string;
  readonly password: string;
  readonly email?: string;
  readonly fullName?: string;
  readonly ipAddress?: string;
}

export type BreakGlassLoginResult =
  | { readonly status: "success"; readonly user: IdentityProjection; readonly session: EstablishedSession }
  | { readonly status: "disabled" }
  | { readonly status: "rate_limited" }
  | { readonly status: "invalid_credentials" }
  | { readonly status: "conflict" }
  | { readonly status: "inactive" };

export interface BreakGlassServiceOptions {
  readonly config: BreakGlassConfig;
  readonly sessionManager: SessionManager;
  readonly passwordHasher: PasswordHasher;
  readonly logger: Logger;
  readonly clock?: Clock;
}

// Verified against when the username is unknown so both paths do comparable work.
const DUMMY_DIGEST = sha256Hex("keyrelay-break-glass-placeholder");

/**
 * Local credential login for when every OAuth provider is unreachable. Accounts are defined in
 * configuration and materialise as `local` identities on first use.
 */
export class BreakGlassService {
  private readonly config: BreakGlassConfig;
  private readonly sessions: SessionManager;
  private readonly hasher: PasswordHasher;
  private readonly logger: Logger;
  private readonly clock: Clock;
  private readonly limiter: SlidingWindowRateLimiter;

  constructor(options: BreakGlassServiceOptions) {
    this.config = options.config;
    this.sessions = options.sessionManager;
    this.hasher = options.passwordHasher;
    this.logger = options.logger;
    this.clock = options.clock ?? Date.now;
    this.limiter = new SlidingWindowRateLimiter({
      windowSeconds: options.config.windowSeconds,
      maxAttempts: options.config.maxAttempts
    });
  }

  get enabled(): boolean {
    return this.config.users.size > 0;
  }

  async login(request: BreakGlassLoginRequest): Promise<BreakGlassLoginResult> {
    if (!this.enabled) {
      return { status: "disabled" };
    }

    const now = this.clock();
    const userAllowed = this.limiter.allow(`user:${request.username.toLowerCase()}`, now);
    const ipAllowed = request.ipAddress ? this.limiter.allow(`ip:${request.ipAddress}`, now) : true;
    if (!userAllowed || !ipAllowed) {
      this.logger.warn("Break-glass login rate limited", { username: request.username, ipAddress: request.ipAddress });
      return { status: "rate_limited" };
    }

    const account = this.config.users.get(request.username);
    const verified = await this.hasher.verify(request.password, account?.passwordHash ?? DUMMY_DIGEST);
    if (!account || !verified) {
      this.logger.warn("Break-glass login failed", { username: request.username, ipAddress: request.ipAddress });
      return { status: "invalid_credentials" };
    }

    const username = `backup_${account.username}`;
    const resolved = await this.sessions.resolveOrCreate(
      {
        provider: "local",
        externalId: account.username,
        email: request.email ?? account.email ?? `${username}@${this.config.emailDomain}`,
        emailVerified: request.email === undefined,
        username,
        displayName: request.fullName ?? account.fullName ?? `Backup User: ${account.username}`,
        avatarUrl: null,
        raw: { break_glass: true }
      },
      { allowCreate: true, isAdmin: account.isAdmin, permissions: account.permissions, keepStoredProfile: true }
    );

    switch (resolved.status) {
      case "resolved": {
        const session = await this.sessions.establishSession(resolved.identity);
        this.logger.info("Break-glass login succeeded", { username: account.username, identityId: resolved.identity.id });
        return { status: "success", user: toIdentityProjection(resolved.identity), session };
      }
      case "inactive":
        this.logger.warn("Break-glass login for a disabled identity", { username: account.username });
        return { status: "inactive" };
      case "conflict":
        this.logger.warn("Break-glass identity conflicts with an existing one", {
          username: account.username,
          field: resolved.field
        });
        return { status: "conflict" };
      case "not_registered":
        return { status: "invalid_credentials" };
    }
  }
}
