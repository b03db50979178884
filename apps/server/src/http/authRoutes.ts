import type { IncomingMessage, ServerResponse } from "node:http";

import { toIdentityProjection, type TokenEnvelope } from "@keyrelay/auth-core";

import { BREAK_GLASS_USERNAME_PATTERN, type AuthServerConfig, type CorsConfig } from "../config";
import { describeError, type Logger } from "../logger";
import { extractBearerToken } from "../security/bearer";
import type { BreakGlassService } from "../services/breakGlassService";
import type { OAuthFlowService } from "../services/oauthFlowService";
import type { SessionManager } from "../services/sessionService";
import { InvalidBodyError, getIpAddress, isRecord, normalizePath, readJsonBody, sendJson, sendRedirect } from "./utils";

export interface AuthRouterDependencies {
  readonly config: AuthServerConfig;
  readonly oauthFlow: OAuthFlowService;
  readonly sessionManager: SessionManager;
  readonly breakGlass: BreakGlassService;
  readonly logger: Logger;
}

interface BackupLoginBody {
  readonly username: string;
  readonly password: string;
  readonly email?: string;
  readonly fullName?: string;
}

const SERVICE_NAME = "keyrelay-auth";
const EMAIL_PATTERN = /^[^\s@]+@[^\s@]+$/;
const MIN_PASSWORD_LENGTH = 8;
const MAX_PASSWORD_LENGTH = 100;
const MAX_FULL_NAME_LENGTH = 200;

export const buildCorsHeaders = (req: IncomingMessage, cors: CorsConfig, preflight: boolean): Record<string, string> | null => {
  const origin = req.headers.origin;
  if (!origin) {
    return null;
  }
  const allowed = cors.allowedOrigins;
  if (!allowed.includes("*") && !allowed.includes(origin)) {
    return null;
  }
  const headers: Record<string, string> = {
    "Access-Control-Allow-Origin": origin,
    Vary: "Origin"
  };
  if (cors.allowCredentials) {
    headers["Access-Control-Allow-Credentials"] = "true";
  }
  if (preflight) {
    headers["Access-Control-Allow-Methods"] =
      req.headers["access-control-request-method"]?.toString() ?? "GET,POST,PATCH,DELETE,OPTIONS";
    headers["Access-Control-Allow-Headers"] =
      req.headers["access-control-request-headers"]?.toString() ?? "Content-Type, Authorization";
    headers["Access-Control-Max-Age"] = "600";
  }
  return headers;
};

export const respondJson = (
  req: IncomingMessage,
  res: ServerResponse,
  cors: CorsConfig,
  data: unknown,
  options: { status?: number; headers?: Record<string, string> } = {}
) => {
  sendJson(res, data, {
    status: options.status,
    headers: {
      ...(buildCorsHeaders(req, cors, false) ?? {}),
      ...(options.headers ?? {})
    }
  });
};

export const respondPreflight = (req: IncomingMessage, res: ServerResponse, cors: CorsConfig) => {
  res.writeHead(204, {
    ...(buildCorsHeaders(req, cors, true) ?? {}),
    "Content-Length": "0"
  });
  res.end();
};

const decodeSegment = (value: string): string | null => {
  try {
    return decodeURIComponent(value);
  } catch (_error) {
    return null;
  }
};

const optionalQuery = (query: URLSearchParams, key: string): string | undefined => query.get(key) ?? undefined;

const parseBackupLoginBody = (body: unknown): BackupLoginBody | null => {
  if (!isRecord(body)) {
    return null;
  }
  const { username, password, email, full_name: fullName } = body;
  if (typeof username !== "string" || !BREAK_GLASS_USERNAME_PATTERN.test(username)) {
    return null;
  }
  if (typeof password !== "string" || password.length < MIN_PASSWORD_LENGTH || password.length > MAX_PASSWORD_LENGTH) {
    return null;
  }
  if (email !== undefined && email !== null && (typeof email !== "string" || !EMAIL_PATTERN.test(email))) {
    return null;
  }
  if (
    fullName !== undefined &&
    fullName !== null &&
    (typeof fullName !== "string" || fullName.trim().length === 0 || fullName.length > MAX_FULL_NAME_LENGTH)
  ) {
    return null;
  }
  return {
    username,
    password,
    email: typeof email === "string" ? email : undefined,
    fullName: typeof fullName === "string" ? fullName.trim() : undefined
  };
};

const readRefreshToken = (body: unknown): string | null => {
  if (!isRecord(body)) {
    return null;
  }
  const token = body.refresh_token;
  return typeof token === "string" && token.length > 0 ? token : null;
};

export const createAuthRouter = (dependencies: AuthRouterDependencies) => {
  const cors = dependencies.config.cors;

  return async (req: IncomingMessage, res: ServerResponse): Promise<boolean> => {
    const { path, query } = normalizePath(req.url);
    const method = req.method ?? "GET";

    const loginMatch = path.match(/^\/login\/([^/]+)$/);
    const callbackMatch = path.match(/^\/callback\/([^/]+)$/);

    try {
      if (loginMatch && method === "GET") {
        handleLoginStart(req, res, dependencies, loginMatch[1], query);
        return true;
      }
      if (callbackMatch && method === "GET") {
        await handleCallback(res, dependencies, callbackMatch[1], query);
        return true;
      }

      switch (`${method} ${path}`) {
        case "GET /":
          respondJson(req, res, cors, { service: SERVICE_NAME, status: "running" });
          return true;
        case "GET /health":
          respondJson(req, res, cors, { status: "healthy" });
          return true;
        case "POST /backup-login":
          await handleBackupLogin(req, res, dependencies);
          return true;
        case "POST /refresh":
          await handleRefresh(req, res, dependencies);
          return true;
        case "POST /logout":
          await handleLogout(req, res, dependencies);
          return true;
        case "GET /me":
          await handleMe(req, res, dependencies);
          return true;
        case "OPTIONS /backup-login":
        case "OPTIONS /refresh":
        case "OPTIONS /logout":
        case "OPTIONS /me":
          respondPreflight(req, res, cors);
          return true;
        default:
          if (method === "OPTIONS" && loginMatch) {
            respondPreflight(req, res, cors);
            return true;
          }
          return false;
      }
    } catch (error) {
      if (error instanceof InvalidBodyError) {
        respondJson(req, res, cors, { error: "invalid_request" }, { status: 400 });
        return true;
      }
      dependencies.logger.error("Auth route failed", {
        path,
        method,
        error: describeError(error)
      });
      respondJson(req, res, cors, { error: "internal_error" }, { status: 500 });
      return true;
    }
  };
};

const handleLoginStart = (
  req: IncomingMessage,
  res: ServerResponse,
  deps: AuthRouterDependencies,
  rawProvider: string,
  query: URLSearchParams
) => {
  const cors = deps.config.cors;
  const provider = decodeSegment(rawProvider) ?? "";
  const result = deps.oauthFlow.startLogin(provider, {
    redirectUri: optionalQuery(query, "redirect_uri"),
    clientRedirectUri: optionalQuery(query, "client_redirect_uri")
  });

  switch (result.status) {
    case "ok":
      respondJson(req, res, cors, { auth_url: result.authUrl, state: result.state });
      return;
    case "unsupported_provider":
      respondJson(req, res, cors, { error: "unsupported_provider" }, { status: 400 });
      return;
    case "provider_unavailable":
      respondJson(req, res, cors, { error: "provider_unavailable" }, { status: 503 });
      return;
    case "invalid_redirect":
      respondJson(req, res, cors, { error: "invalid_redirect" }, { status: 400 });
      return;
  }
};

const handleCallback = async (
  res: ServerResponse,
  deps: AuthRouterDependencies,
  rawProvider: string,
  query: URLSearchParams
) => {
  const location = await deps.oauthFlow.completeCallback(decodeSegment(rawProvider) ?? "", {
    code: optionalQuery(query, "code"),
    state: optionalQuery(query, "state"),
    error: optionalQuery(query, "error")
  });
  sendRedirect(res, location);
};

const handleBackupLogin = async (req: IncomingMessage, res: ServerResponse, deps: AuthRouterDependencies) => {
  const cors = deps.config.cors;
  if (!deps.breakGlass.enabled) {
    respondJson(req, res, cors, { error: "backup_login_disabled" }, { status: 503 });
    return;
  }
  const body = parseBackupLoginBody(await readJsonBody(req));
  if (!body) {
    respondJson(req, res, cors, { error: "invalid_request" }, { status: 400 });
    return;
  }

  const result = await deps.breakGlass.login({ ...body, ipAddress: getIpAddress(req) });
  switch (result.status) {
    case "success":
      respondJson(req, res, cors, {
        user: result.user,
        access_token: result.session.accessToken,
        refresh_token: result.session.refreshToken,
        token_type: result.session.tokenType,
        expires_in: result.session.expiresIn
      });
      return;
    case "disabled":
      respondJson(req, res, cors, { error: "backup_login_disabled" }, { status: 503 });
      return;
    case "rate_limited":
      respondJson(
        req,
        res,
        cors,
        { error: "rate_limited" },
        { status: 429, headers: { "Retry-After": String(deps.config.breakGlass.windowSeconds) } }
      );
      return;
    case "invalid_credentials":
      respondJson(req, res, cors, { error: "invalid_credentials" }, { status: 401 });
      return;
    case "conflict":
      respondJson(req, res, cors, { error: "account_conflict" }, { status: 409 });
      return;
    case "inactive":
      respondJson(req, res, cors, { error: "account_disabled" }, { status: 403 });
      return;
  }
};

const handleRefresh = async (req: IncomingMessage, res: ServerResponse, deps: AuthRouterDependencies) => {
  const cors = deps.config.cors;
  const refreshToken = readRefreshToken(await readJsonBody(req));
  if (!refreshToken) {
    respondJson(req, res, cors, { error: "invalid_request" }, { status: 400 });
    return;
  }
  const renewed = await deps.sessionManager.renew(refreshToken);
  if (!renewed) {
    respondJson(req, res, cors, { error: "invalid_token" }, { status: 401 });
    return;
  }
  respondJson(req, res, cors, {
    access_token: renewed.accessToken,
    token_type: renewed.tokenType,
    expires_in: renewed.expiresIn
  } satisfies TokenEnvelope);
};

const handleLogout = async (req: IncomingMessage, res: ServerResponse, deps: AuthRouterDependencies) => {
  const cors = deps.config.cors;
  const refreshToken = readRefreshToken(await readJsonBody(req));
  if (!refreshToken) {
    respondJson(req, res, cors, { error: "invalid_request" }, { status: 400 });
    return;
  }
  const ended = await deps.sessionManager.endSession(refreshToken);
  if (!ended) {
    respondJson(req, res, cors, { error: "invalid_token" }, { status: 401 });
    return;
  }
  respondJson(req, res, cors, { status: "ok" });
};

const handleMe = async (req: IncomingMessage, res: ServerResponse, deps: AuthRouterDependencies) => {
  const cors = deps.config.cors;
  const token = extractBearerToken(req.headers.authorization);
  const identity = token ? await deps.sessionManager.identityForAccessToken(token) : null;
  if (!identity) {
    respondJson(req, res, cors, { error: "unauthorized" }, { status: 401, headers: { "WWW-Authenticate": "Bearer" } });
    return;
  }
  respondJson(req, res, cors, toIdentityProjection(identity));
};
