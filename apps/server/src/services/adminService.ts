import { ulid } from "ulidx";

import type { Identity, IdentityId, IdentityProvider, PermissionSet } from "@keyrelay/auth-core";

import { DEFAULT_PERMISSIONS } from "../config";
import { IdentityConflictError, type IdentityConflictField, type IdentityStore } from "../identity/types";
import type { Logger } from "../logger";
import type { Clock } from "../security/tokenService";

export interface PreRegisterInput {
  readonly email: string;
  readonly provider: IdentityProvider;
  readonly username?: string;
  readonly fullName?: string;
  readonly isAdmin?: boolean;
  readonly permissions?: PermissionSet;
}

export type PreRegisterResult =
  | { readonly status: "created"; readonly identity: Identity }
  | { readonly status: "conflict"; readonly field: IdentityConflictField };

export interface IdentityUpdateInput {
  readonly isActive?: boolean;
  readonly isAdmin?: boolean;
  readonly permissions?: PermissionSet;
}

export interface IdentityListing {
  readonly identities: ReadonlyArray<Identity>;
  readonly total: number;
}

export interface AdminServiceOptions {
  readonly identityStore: IdentityStore;
  readonly logger: Logger;
  readonly clock?: Clock;
}

export class AdminService {
  private readonly store: IdentityStore;
  private readonly logger: Logger;
  private readonly clock: Clock;

  constructor(options: AdminServiceOptions) {
    this.store = options.identityStore;
    this.logger = options.logger;
    this.clock = options.clock ?? Date.now;
  }

  /**
   * Creates an identity that waits for its first login through `provider`. The external id stays
   * empty until that login claims the row by email.
   */
  async preRegister(input: PreRegisterInput): Promise<PreRegisterResult> {
    const now = this.clock();
    const email = input.email.trim();
    const identity: Identity = {
      id: ulid(now),
      email,
      username: input.username?.trim() || email.split("@")[0] || email,
      displayName: input.fullName?.trim() || null,
      avatarUrl: null,
      isActive: true,
      isAdmin: input.isAdmin ?? false,
      permissions: input.permissions ?? DEFAULT_PERMISSIONS,
      provider: input.provider,
      providerExternalId: null,
      providerMetadata: null,
      createdAt: now,
      updatedAt: now,
      lastLoginAt: null
    };
    try {
      const created = await this.store.createIdentity(identity);
      this.logger.info("Identity pre-registered", { identityId: created.id, provider: created.provider });
      return { status: "created", identity: created };
    } catch (error) {
      if (error instanceof IdentityConflictError) {
        return { status: "conflict", field: error.field };
      }
      throw error;
    }
  }

  async list(limit: number, offset: number): Promise<IdentityListing> {
    const [identities, total] = await Promise.all([
      this.store.listIdentities({ limit, offset }),
      this.store.countIdentities()
    ]);
    return { identities, total };
  }

  async get(id: IdentityId): Promise<Identity | null> {
    return this.store.getIdentityById(id);
  }

  async update(id: IdentityId, input: IdentityUpdateInput): Promise<Identity | null> {
    const updated = await this.store.updateIdentityAdmin(id, { ...input, updatedAt: this.clock() });
    if (updated) {
      this.logger.info("Identity updated by admin", {
        identityId: id,
        fields: Object.keys(input)
      });
    }
    return updated;
  }

  async remove(id: IdentityId): Promise<boolean> {
    const removed = await this.store.deleteIdentity(id);
    if (removed) {
      this.logger.info("Identity deleted by admin", { identityId: id });
    }
    return removed;
  }
}
