import type { OAuthProvider, ProviderProfile } from "@keyrelay/auth-core";

import type { OAuthConfig } from "../config";
import { describeError, type Logger } from "../logger";
import { ProviderHttpClient, ProviderHttpError } from "../oauth/providerHttp";
import {
  GitHubProviderAdapter,
  GoogleProviderAdapter,
  ProviderProfileError,
  type OAuthProviderAdapter
} from "../oauth/providers";

export interface IdentityBrokerOptions {
  readonly adapters: ReadonlyArray<OAuthProviderAdapter>;
  readonly logger: Logger;
}

/**
 * Builds the adapters for every provider that has client credentials configured.
 */
export const createProviderAdapters = (
  config: OAuthConfig,
  fetchImplementation?: typeof fetch
): ReadonlyArray<OAuthProviderAdapter> => {
  const http = new ProviderHttpClient({ timeoutMs: config.providerTimeoutMs, fetchImplementation });
  const adapters: OAuthProviderAdapter[] = [];
  if (config.providers.github) {
    adapters.push(new GitHubProviderAdapter(config.providers.github, http));
  }
  if (config.providers.google) {
    adapters.push(new GoogleProviderAdapter(config.providers.google, http));
  }
  return adapters;
};

export class IdentityBroker {
  private readonly adapters: ReadonlyMap<OAuthProvider, OAuthProviderAdapter>;
  private readonly logger: Logger;

  constructor(options: IdentityBrokerOptions) {
    this.adapters = new Map(options.adapters.map((adapter) => [adapter.provider, adapter]));
    this.logger = options.logger;
  }

  isEnabled(provider: OAuthProvider): boolean {
    return this.adapters.has(provider);
  }

  buildAuthorizationUrl(provider: OAuthProvider, state: string, redirectUri: string): string | null {
    const adapter = this.adapters.get(provider);
    return adapter ? adapter.buildAuthorizationUrl(state, redirectUri) : null;
  }

  /**
   * Exchanges an authorization code for the provider's profile. Every failure collapses to
   * `null`; the cause is logged here and never reaches the caller.
   */
  async exchangeCode(provider: OAuthProvider, code: string, redirectUri: string): Promise<ProviderProfile | null> {
    const adapter = this.adapters.get(provider);
    if (!adapter) {
      this.logger.warn("Code exchange requested for a disabled provider", { provider });
      return null;
    }
    try {
      return await adapter.exchangeCode(code, redirectUri);
    } catch (error) {
      if (error instanceof ProviderHttpError) {
        this.logger.warn("Provider request failed", {
          provider,
          url: error.url,
          reason: error.code,
          status: error.status,
          error: describeError(error.cause ?? error)
        });
      } else if (error instanceof ProviderProfileError) {
        this.logger.warn("Provider profile rejected", { provider, error: error.message });
      } else {
        this.logger.error("Unexpected code exchange failure", { provider, error: describeError(error) });
      }
      return null;
    }
  }
}
