import http from "node:http";
import { mkdirSync } from "node:fs";
import path from "node:path";
import type { IncomingMessage, ServerResponse } from "node:http";
import type { AddressInfo } from "node:net";

import { loadConfig, type AuthServerConfig } from "./config";
import { createAdminRouter } from "./http/adminRoutes";
import { createAuthRouter } from "./http/authRoutes";
import { withRequestLogging } from "./http/requestLogger";
import { sendJson } from "./http/utils";
import { SqliteIdentityStore } from "./identity/sqliteStore";
import { createConsoleLogger, describeError, type Logger } from "./logger";
import { Argon2PasswordHasher, type PasswordHasher } from "./security/passwordHasher";
import { RefreshTokenStore } from "./security/refreshTokenStore";
import { TokenService, type Clock } from "./security/tokenService";
import { AdminService } from "./services/adminService";
import { BreakGlassService } from "./services/breakGlassService";
import { IdentityBroker, createProviderAdapters } from "./services/identityBroker";
import { OAuthFlowService } from "./services/oauthFlowService";
import { SessionManager } from "./services/sessionService";

export interface AuthServerOptions {
  /** Defaults to `loadConfig()` over the process environment. */
  readonly config?: AuthServerConfig;
  readonly logger?: Logger;
  /** Replaces global fetch for provider calls. */
  readonly fetchImplementation?: typeof fetch;
  readonly passwordHasher?: PasswordHasher;
  readonly clock?: Clock;
}

export interface AuthServer {
  readonly server: http.Server;
  readonly config: AuthServerConfig;
  readonly identityStore: SqliteIdentityStore;
  start(port?: number, host?: string): Promise<AddressInfo>;
  stop(): Promise<void>;
}

const ensureDatabaseDirectory = (databasePath: string) => {
  if (databasePath === ":memory:") {
    return;
  }
  mkdirSync(path.dirname(databasePath), { recursive: true });
};

export const createAuthServer = (options: AuthServerOptions = {}): AuthServer => {
  const config = options.config ?? loadConfig();
  const logger = options.logger ?? createConsoleLogger({ level: config.logLevel });
  const clock = options.clock;

  ensureDatabaseDirectory(config.databasePath);
  const identityStore = new SqliteIdentityStore({ path: config.databasePath });

  const tokenService = new TokenService({
    secret: config.jwt.secret,
    issuer: config.jwt.issuer,
    audience: config.jwt.audience,
    accessTokenMinutes: config.jwt.accessTokenMinutes,
    clock
  });
  const refreshTokens = new RefreshTokenStore({
    identityStore,
    refreshTokenDays: config.jwt.refreshTokenDays,
    clock
  });
  const sessionManager = new SessionManager({
    identityStore,
    tokenService,
    refreshTokens,
    logger,
    clock
  });
  const broker = new IdentityBroker({
    adapters: createProviderAdapters(config.oauth, options.fetchImplementation),
    logger
  });
  const oauthFlow = new OAuthFlowService({
    config: config.oauth,
    broker,
    sessionManager,
    logger
  });
  const breakGlass = new BreakGlassService({
    config: config.breakGlass,
    sessionManager,
    passwordHasher: options.passwordHasher ?? new Argon2PasswordHasher(),
    logger,
    clock
  });
  const adminService = new AdminService({ identityStore, logger, clock });

  const authRouter = createAuthRouter({ config, oauthFlow, sessionManager, breakGlass, logger });
  const adminRouter = createAdminRouter({ config, adminService, logger });

  const requestHandler = async (req: IncomingMessage, res: ServerResponse) => {
    try {
      if (await adminRouter(req, res)) {
        return;
      }
      if (await authRouter(req, res)) {
        return;
      }
      sendJson(res, { error: "not_found" }, { status: 404 });
    } catch (error) {
      logger.error("Unhandled error processing request", { error: describeError(error) });
      if (!res.headersSent) {
        sendJson(res, { error: "internal_error" }, { status: 500 });
      } else {
        res.end();
      }
    }
  };

  const handler = withRequestLogging(logger, requestHandler);
  const server = http.createServer((req, res) => {
    handler(req, res).catch((error: unknown) => {
      logger.error("Request handler rejected", { error: describeError(error) });
    });
  });

  return {
    server,
    config,
    identityStore,
    async start(port = config.port, host?: string) {
      return await new Promise<AddressInfo>((resolve, reject) => {
        server.once("error", reject);
        server.listen(port, host, () => {
          server.off("error", reject);
          const address = server.address();
          if (address === null || typeof address === "string") {
            reject(new Error("Server is not listening on a TCP port"));
            return;
          }
          resolve(address);
        });
      });
    },
    async stop() {
      await new Promise<void>((resolve, reject) => {
        server.close((error) => {
          if (error) {
            reject(error);
            return;
          }
          resolve();
        });
        server.closeAllConnections();
      });
      identityStore.close();
    }
  };
};

if (process.env.NODE_ENV !== "test") {
  const runtimeConfig = loadConfig();
  const logger = createConsoleLogger({ level: runtimeConfig.logLevel });
  const authServer = createAuthServer({ config: runtimeConfig, logger });

  authServer
    .start()
    .then((address) => {
      logger.info("Auth relay listening", { port: address.port });
    })
    .catch((error: unknown) => {
      logger.error("Auth relay failed to start", { error: describeError(error) });
      process.exitCode = 1;
    });

  const shutdown = (signal: string) => {
    logger.info("Shutting down", { signal });
    authServer.stop().catch((error: unknown) => {
      logger.error("Shutdown failed", { error: describeError(error) });
      process.exitCode = 1;
    });
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));
}
