import type { OAuthProvider, ProviderProfile } from "@keyrelay/auth-core";

import type { ProviderCredentials } from "../config";
import type { ProviderHttpClient } from "./providerHttp";

/** Raised when a provider answers 2xx but the payload lacks something the relay needs. */
export class ProviderProfileError extends Error {
  readonly provider: OAuthProvider;

  constructor(provider: OAuthProvider, message: string) {
    super(message);
    this.name = "ProviderProfileError";
    this.provider = provider;
  }
}

export interface OAuthProviderAdapter {
  readonly provider: OAuthProvider;
  buildAuthorizationUrl(state: string, redirectUri: string): string;
  /** Throws {@link ProviderProfileError} or `ProviderHttpError` on failure. */
  exchangeCode(code: string, redirectUri: string): Promise<ProviderProfile>;
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const nonEmptyString = (value: unknown): string | null =>
  typeof value === "string" && value.trim().length > 0 ? value.trim() : null;

const readAccessToken = (provider: OAuthProvider, payload: unknown): string => {
  const token = isRecord(payload) ? nonEmptyString(payload.access_token) : null;
  if (!token) {
    const reason = isRecord(payload) ? nonEmptyString(payload.error) : null;
    throw new ProviderProfileError(provider, `Token response has no access_token${reason ? ` (${reason})` : ""}`);
  }
  return token;
};

const toExternalId = (value: unknown): string | null => {
  if (typeof value === "number" && Number.isFinite(value)) {
    return String(value);
  }
  return nonEmptyString(value);
};

export const GITHUB_AUTHORIZE_URL = "https://github.com/login/oauth/authorize";
export const GITHUB_TOKEN_URL = "https://github.com/login/oauth/access_token";
export const GITHUB_USER_URL = "https://api.github.com/user";
export const GITHUB_EMAILS_URL = "https://api.github.com/user/emails";

export class GitHubProviderAdapter implements OAuthProviderAdapter {
  readonly provider = "github" as const;
  private readonly credentials: ProviderCredentials;
  private readonly http: ProviderHttpClient;

  constructor(credentials: ProviderCredentials, http: ProviderHttpClient) {
    this.credentials = credentials;
    this.http = http;
  }

  buildAuthorizationUrl(state: string, redirectUri: string): string {
    const params = new URLSearchParams({
      client_id: this.credentials.clientId,
      redirect_uri: redirectUri,
      scope: "user:email",
      state
    });
    return `${GITHUB_AUTHORIZE_URL}?${params.toString()}`;
  }

  async exchangeCode(code: string, redirectUri: string): Promise<ProviderProfile> {
    const tokenPayload = await this.http.requestJson({
      method: "POST",
      url: GITHUB_TOKEN_URL,
      form: {
        client_id: this.credentials.clientId,
        client_secret: this.credentials.clientSecret,
        code,
        redirect_uri: redirectUri
      }
    });
    const accessToken = readAccessToken(this.provider, tokenPayload);
    const authHeaders = { Authorization: `Bearer ${accessToken}`, Accept: "application/vnd.github+json" };

    const user = await this.http.requestJson({ method: "GET", url: GITHUB_USER_URL, headers: authHeaders });
    if (!isRecord(user)) {
      throw new ProviderProfileError(this.provider, "User response is not an object");
    }
    const externalId = toExternalId(user.id);
    const login = nonEmptyString(user.login);
    if (!externalId || !login) {
      throw new ProviderProfileError(this.provider, "User response is missing id or login");
    }

    // GitHub only publishes a profile email once the account owner has verified it.
    const email = nonEmptyString(user.email) ?? (await this.fetchPrimaryEmail(authHeaders));
    if (!email) {
      throw new ProviderProfileError(this.provider, "No verified primary email available");
    }

    return {
      provider: this.provider,
      externalId,
      email,
      emailVerified: true,
      username: login,
      displayName: nonEmptyString(user.name),
      avatarUrl: nonEmptyString(user.avatar_url),
      raw: {
        id: externalId,
        login,
        html_url: nonEmptyString(user.html_url),
        company: nonEmptyString(user.company)
      }
    };
  }

  private async fetchPrimaryEmail(headers: Readonly<Record<string, string>>): Promise<string | null> {
    const emails = await this.http.requestJson({ method: "GET", url: GITHUB_EMAILS_URL, headers });
    if (!Array.isArray(emails)) {
      return null;
    }
    for (const entry of emails) {
      if (isRecord(entry) && entry.primary === true && entry.verified === true) {
        return nonEmptyString(entry.email);
      }
    }
    return null;
  }
}

export const GOOGLE_AUTHORIZE_URL = "https://accounts.google.com/o/oauth2/v2/auth";
export const GOOGLE_TOKEN_URL = "https://oauth2.googleapis.com/token";
export const GOOGLE_USERINFO_URL = "https://www.googleapis.com/oauth2/v2/userinfo";

export class GoogleProviderAdapter implements OAuthProviderAdapter {
  readonly provider = "google" as const;
  private readonly credentials: ProviderCredentials;
  private readonly http: ProviderHttpClient;

  constructor(credentials: ProviderCredentials, http: ProviderHttpClient) {
    this.credentials = credentials;
    this.http = http;
  }

  buildAuthorizationUrl(state: string, redirectUri: string): string {
    const params = new URLSearchParams({
      client_id: this.credentials.clientId,
      redirect_uri: redirectUri,
      response_type: "code",
      scope: "openid email profile",
      state,
      access_type: "online"
    });
    return `${GOOGLE_AUTHORIZE_URL}?${params.toString()}`;
  }

  async exchangeCode(code: string, redirectUri: string): Promise<ProviderProfile> {
    const tokenPayload = await this.http.requestJson({
      method: "POST",
      url: GOOGLE_TOKEN_URL,
      form: {
        code,
        client_id: this.credentials.clientId,
        client_secret: this.credentials.clientSecret,
        redirect_uri: redirectUri,
        grant_type: "authorization_code"
      }
    });
    const accessToken = readAccessToken(this.provider, tokenPayload);

    const info = await this.http.requestJson({
      method: "GET",
      url: GOOGLE_USERINFO_URL,
      headers: { Authorization: `Bearer ${accessToken}` }
    });
    if (!isRecord(info)) {
      throw new ProviderProfileError(this.provider, "Userinfo response is not an object");
    }
    const externalId = toExternalId(info.id);
    const email = nonEmptyString(info.email);
    if (!externalId || !email) {
      throw new ProviderProfileError(this.provider, "Userinfo response is missing id or email");
    }
    const [localPart] = email.split("@");

    return {
      provider: this.provider,
      externalId,
      email,
      emailVerified: info.verified_email === true,
      username: localPart || email,
      displayName: nonEmptyString(info.name),
      avatarUrl: nonEmptyString(info.picture),
      raw: {
        id: externalId,
        verified_email: info.verified_email === true,
        locale: nonEmptyString(info.locale),
        hd: nonEmptyString(info.hd)
      }
    };
  }
}
