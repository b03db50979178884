import { randomBytes } from "node:crypto";

import {
  HandshakeStateCodec,
  isOAuthProvider,
  type OAuthCallbackErrorCode,
  type OAuthProvider
} from "@keyrelay/auth-core";

import type { OAuthConfig } from "../config";
import type { Logger } from "../logger";
import type { Clock } from "../security/tokenService";
import type { IdentityBroker } from "./identityBroker";
import type { SessionManager } from "./sessionService";

export interface LoginStartParams {
  readonly redirectUri?: string;
  readonly clientRedirectUri?: string;
}

export type LoginStartResult =
  | { readonly status: "ok"; readonly authUrl: string; readonly state: string }
  | { readonly status: "unsupported_provider" }
  | { readonly status: "provider_unavailable" }
  | { readonly status: "invalid_redirect" };

export interface CallbackParams {
  readonly code?: string;
  readonly state?: string;
  readonly error?: string;
}

export interface OAuthFlowServiceOptions {
  readonly config: OAuthConfig;
  readonly broker: IdentityBroker;
  readonly sessionManager: SessionManager;
  readonly logger: Logger;
  readonly clock?: Clock;
}

const NONCE_BYTES = 16;

const originOf = (value: string): string | null => {
  try {
    const url = new URL(value);
    return url.protocol === "http:" || url.protocol === "https:" ? url.origin : null;
  } catch (_error) {
    return null;
  }
};

/**
 * Drives the redirect-based handshake: consent URL on the way out, code exchange and session
 * issuance on the way back. Every callback outcome is a redirect location.
 */
export class OAuthFlowService {
  private readonly config: OAuthConfig;
  private readonly broker: IdentityBroker;
  private readonly sessions: SessionManager;
  private readonly logger: Logger;
  private readonly stateCodec: HandshakeStateCodec;
  private readonly allowedClientOrigins: ReadonlySet<string>;
  private readonly allowedCallbackOrigins: ReadonlySet<string>;

  constructor(options: OAuthFlowServiceOptions) {
    this.config = options.config;
    this.broker = options.broker;
    this.sessions = options.sessionManager;
    this.logger = options.logger;
    this.stateCodec = new HandshakeStateCodec({
      secret: options.config.stateSecret,
      maxAgeMs: options.config.stateMaxAgeSeconds * 1000,
      clock: options.clock
    });
    this.allowedClientOrigins = new Set(options.config.allowedRedirectOrigins);
    const publicOrigin = originOf(options.config.publicBaseUrl);
    this.allowedCallbackOrigins = new Set([
      ...options.config.allowedRedirectOrigins,
      ...(publicOrigin ? [publicOrigin] : [])
    ]);
  }

  startLogin(providerName: string, params: LoginStartParams): LoginStartResult {
    if (!isOAuthProvider(providerName)) {
      return { status: "unsupported_provider" };
    }
    if (!this.broker.isEnabled(providerName)) {
      return { status: "provider_unavailable" };
    }

    const providerCallbackUrl = params.redirectUri || `${this.config.publicBaseUrl}/callback/${providerName}`;
    const clientRedirectUrl = params.clientRedirectUri || `${this.config.frontendUrl}/auth/callback`;
    if (!this.isAllowed(providerCallbackUrl, this.allowedCallbackOrigins) || !this.isAllowed(clientRedirectUrl, this.allowedClientOrigins)) {
      this.logger.warn("Login rejected for a redirect outside the allow-list", { provider: providerName });
      return { status: "invalid_redirect" };
    }

    const nonce = randomBytes(NONCE_BYTES).toString("base64url");
    const state = this.stateCodec.pack(nonce, providerCallbackUrl, clientRedirectUrl, providerName);
    const authUrl = this.broker.buildAuthorizationUrl(providerName, state, providerCallbackUrl);
    if (!authUrl) {
      return { status: "provider_unavailable" };
    }
    return { status: "ok", authUrl, state };
  }

  /** Returns the location the user agent should be sent to. */
  async completeCallback(providerName: string, params: CallbackParams): Promise<string> {
    const handshake = params.state ? this.stateCodec.unpack(params.state) : null;
    if (
      !handshake ||
      handshake.provider !== providerName ||
      !this.isAllowed(handshake.clientRedirectUrl, this.allowedClientOrigins)
    ) {
      this.logger.warn("OAuth callback with an invalid state", { provider: providerName });
      return this.errorPageLocation("invalid_state");
    }

    const provider: OAuthProvider = handshake.provider;
    const clientRedirect = handshake.clientRedirectUrl;

    if (params.error) {
      this.logger.info("Provider reported an authorization error", { provider, error: params.error });
      return this.clientErrorLocation(clientRedirect, "access_denied");
    }
    if (!params.code) {
      return this.clientErrorLocation(clientRedirect, "oauth_failed");
    }

    const profile = await this.broker.exchangeCode(provider, params.code, handshake.providerCallbackUrl);
    if (!profile) {
      return this.clientErrorLocation(clientRedirect, "oauth_failed");
    }

    const resolved = await this.sessions.resolveOrCreate(profile, {
      allowCreate: this.config.signupPolicy === "open"
    });
    switch (resolved.status) {
      case "not_registered":
        this.logger.info("OAuth login for an unregistered identity", { provider, email: profile.email });
        return this.clientErrorLocation(clientRedirect, "not_registered");
      case "conflict":
        return this.clientErrorLocation(clientRedirect, "account_conflict");
      case "inactive":
        this.logger.info("OAuth login for a disabled identity", { provider, identityId: resolved.identity.id });
        return this.clientErrorLocation(clientRedirect, "account_disabled");
      case "resolved":
        break;
    }

    const session = await this.sessions.establishSession(resolved.identity);
    this.logger.info("OAuth login succeeded", { provider, identityId: resolved.identity.id, created: resolved.created });

    const location = new URL(clientRedirect);
    location.hash = new URLSearchParams({
      access_token: session.accessToken,
      refresh_token: session.refreshToken,
      token_type: session.tokenType,
      expires_in: String(session.expiresIn)
    }).toString();
    return location.toString();
  }

  private isAllowed(candidate: string, origins: ReadonlySet<string>): boolean {
    const origin = originOf(candidate);
    return origin !== null && origins.has(origin);
  }

  private clientErrorLocation(clientRedirect: string, code: OAuthCallbackErrorCode): string {
    const location = new URL(clientRedirect);
    location.hash = "";
    location.searchParams.set("error", code);
    return location.toString();
  }

  private errorPageLocation(code: OAuthCallbackErrorCode): string {
    const location = new URL(this.config.errorRedirectUrl);
    location.searchParams.set("error", code);
    return location.toString();
  }
}
