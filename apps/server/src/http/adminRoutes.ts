import type { IncomingMessage, ServerResponse } from "node:http";

import type { Identity, IdentityProvider, PermissionSet } from "@keyrelay/auth-core";

import { BREAK_GLASS_USERNAME_PATTERN, type AuthServerConfig } from "../config";
import { describeError, type Logger } from "../logger";
import { extractBearerToken, matchesStaticToken } from "../security/bearer";
import type { AdminService, IdentityUpdateInput, PreRegisterInput } from "../services/adminService";
import { respondJson, respondPreflight } from "./authRoutes";
import { InvalidBodyError, isRecord, normalizePath, readJsonBody, sendNoContent } from "./utils";

export interface AdminRouterDependencies {
  readonly config: AuthServerConfig;
  readonly adminService: AdminService;
  readonly logger: Logger;
}

const DEFAULT_PAGE_SIZE = 50;
const MAX_PAGE_SIZE = 200;
const EMAIL_PATTERN = /^[^\s@]+@[^\s@]+$/;
const PROVIDERS: ReadonlyArray<IdentityProvider> = ["github", "google", "local"];

const toIsoOrNull = (value: number | null): string | null => (value === null ? null : new Date(value).toISOString());

/** Admin view of an identity; includes fields the `/me` projection leaves out. */
const toAdminIdentity = (identity: Identity) => ({
  id: identity.id,
  email: identity.email,
  username: identity.username,
  full_name: identity.displayName,
  avatar_url: identity.avatarUrl,
  is_active: identity.isActive,
  is_admin: identity.isAdmin,
  permissions: identity.permissions,
  provider: identity.provider,
  provider_external_id: identity.providerExternalId,
  pending: identity.providerExternalId === null,
  created_at: new Date(identity.createdAt).toISOString(),
  updated_at: new Date(identity.updatedAt).toISOString(),
  last_login_at: toIsoOrNull(identity.lastLoginAt)
});

const isPermissionSet = (value: unknown): value is PermissionSet => isRecord(value);
const isBoolean = (value: unknown): value is boolean => typeof value === "boolean";
const isString = (value: unknown): value is string => typeof value === "string";
const isUsername = (value: unknown): value is string => isString(value) && BREAK_GLASS_USERNAME_PATTERN.test(value);

const isOptional = <T>(value: unknown, guard: (candidate: unknown) => candidate is T): value is T | undefined =>
  value === undefined || guard(value);

const toProvider = (value: unknown): IdentityProvider | null => PROVIDERS.find((provider) => provider === value) ?? null;

const parsePreRegisterBody = (body: unknown): PreRegisterInput | null => {
  if (!isRecord(body)) {
    return null;
  }
  const { email, provider, username, full_name: fullName, is_admin: isAdmin, permissions } = body;
  const parsedProvider = toProvider(provider);
  if (!isString(email) || !EMAIL_PATTERN.test(email.trim()) || !parsedProvider) {
    return null;
  }
  if (
    !isOptional(username, isUsername) ||
    !isOptional(fullName, isString) ||
    !isOptional(isAdmin, isBoolean) ||
    !isOptional(permissions, isPermissionSet)
  ) {
    return null;
  }
  return {
    email: email.trim(),
    provider: parsedProvider,
    username,
    fullName,
    isAdmin,
    permissions
  };
};

const parseUpdateBody = (body: unknown): IdentityUpdateInput | null => {
  if (!isRecord(body)) {
    return null;
  }
  const { is_active: isActive, is_admin: isAdmin, permissions } = body;
  if (isActive === undefined && isAdmin === undefined && permissions === undefined) {
    return null;
  }
  if (!isOptional(isActive, isBoolean) || !isOptional(isAdmin, isBoolean) || !isOptional(permissions, isPermissionSet)) {
    return null;
  }
  return { isActive, isAdmin, permissions };
};

const parseNonNegativeInt = (value: string | null, fallback: number): number | null => {
  if (value === null) {
    return fallback;
  }
  if (!/^\d+$/.test(value)) {
    return null;
  }
  const parsed = Number.parseInt(value, 10);
  return Number.isSafeInteger(parsed) ? parsed : null;
};

export const createAdminRouter = (dependencies: AdminRouterDependencies) => {
  const cors = dependencies.config.cors;
  const adminToken = dependencies.config.adminApiToken;

  return async (req: IncomingMessage, res: ServerResponse): Promise<boolean> => {
    const { path, query } = normalizePath(req.url);
    if (path !== "/admin" && !path.startsWith("/admin/")) {
      return false;
    }
    const method = req.method ?? "GET";
    if (method === "OPTIONS") {
      respondPreflight(req, res, cors);
      return true;
    }

    if (!adminToken) {
      respondJson(req, res, cors, { error: "admin_api_disabled" }, { status: 503 });
      return true;
    }
    if (!matchesStaticToken(extractBearerToken(req.headers.authorization), adminToken)) {
      respondJson(req, res, cors, { error: "unauthorized" }, { status: 401, headers: { "WWW-Authenticate": "Bearer" } });
      return true;
    }

    const service = dependencies.adminService;
    const userMatch = path.match(/^\/admin\/users\/([^/]+)$/);

    try {
      if (method === "POST" && path === "/admin/pre-register") {
        const input = parsePreRegisterBody(await readJsonBody(req));
        if (!input) {
          respondJson(req, res, cors, { error: "invalid_request" }, { status: 400 });
          return true;
        }
        const result = await service.preRegister(input);
        if (result.status === "conflict") {
          respondJson(req, res, cors, { error: "conflict", field: result.field }, { status: 409 });
          return true;
        }
        respondJson(req, res, cors, toAdminIdentity(result.identity), { status: 201 });
        return true;
      }

      if (method === "GET" && path === "/admin/users") {
        const limit = parseNonNegativeInt(query.get("limit"), DEFAULT_PAGE_SIZE);
        const offset = parseNonNegativeInt(query.get("offset"), 0);
        if (limit === null || offset === null || limit < 1 || limit > MAX_PAGE_SIZE) {
          respondJson(req, res, cors, { error: "invalid_request" }, { status: 400 });
          return true;
        }
        const listing = await service.list(limit, offset);
        respondJson(req, res, cors, { users: listing.identities.map(toAdminIdentity), total: listing.total });
        return true;
      }

      if (userMatch) {
        const id = decodeURIComponent(userMatch[1]);
        switch (method) {
          case "GET": {
            const identity = await service.get(id);
            if (!identity) {
              respondJson(req, res, cors, { error: "not_found" }, { status: 404 });
              return true;
            }
            respondJson(req, res, cors, toAdminIdentity(identity));
            return true;
          }
          case "PATCH": {
            const input = parseUpdateBody(await readJsonBody(req));
            if (!input) {
              respondJson(req, res, cors, { error: "invalid_request" }, { status: 400 });
              return true;
            }
            const identity = await service.update(id, input);
            if (!identity) {
              respondJson(req, res, cors, { error: "not_found" }, { status: 404 });
              return true;
            }
            respondJson(req, res, cors, toAdminIdentity(identity));
            return true;
          }
          case "DELETE": {
            if (!(await service.remove(id))) {
              respondJson(req, res, cors, { error: "not_found" }, { status: 404 });
              return true;
            }
            sendNoContent(res);
            return true;
          }
          default:
            break;
        }
      }

      respondJson(req, res, cors, { error: "not_found" }, { status: 404 });
      return true;
    } catch (error) {
      if (error instanceof InvalidBodyError || error instanceof URIError) {
        respondJson(req, res, cors, { error: "invalid_request" }, { status: 400 });
        return true;
      }
      dependencies.logger.error("Admin route failed", { path, method, error: describeError(error) });
      respondJson(req, res, cors, { error: "internal_error" }, { status: 500 });
      return true;
    }
  };
};
