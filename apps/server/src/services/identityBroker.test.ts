import { describe, expect, it } from "vitest";

import { createConsoleLogger, type Logger } from "../logger";
import { ProviderHttpClient } from "../oauth/providerHttp";
import {
  GITHUB_EMAILS_URL,
  GITHUB_TOKEN_URL,
  GITHUB_USER_URL,
  GOOGLE_TOKEN_URL,
  GOOGLE_USERINFO_URL,
  GitHubProviderAdapter,
  GoogleProviderAdapter
} from "../oauth/providers";
import { createFakeFetch, type FakeOutcome } from "../testing/fakeFetch";
import { IdentityBroker } from "./identityBroker";

const logger = createConsoleLogger({ level: "error" });
const credentials = { clientId: "test-client-id", clientSecret: "test-client-secret" };
const REDIRECT = "http://relay.test/callback/github";

const createBroker = (routes: Readonly<Record<string, FakeOutcome | ReadonlyArray<FakeOutcome>>>) => {
  const fake = createFakeFetch(routes);
  const http = new ProviderHttpClient({ timeoutMs: 1_000, fetchImplementation: fake.fetch });
  const broker = new IdentityBroker({
    adapters: [new GitHubProviderAdapter(credentials, http), new GoogleProviderAdapter(credentials, http)],
    logger
  });
  return { broker, fake };
};

describe("IdentityBroker", () => {
  it("builds consent URLs with the provider scopes", () => {
    const { broker } = createBroker({});

    const github = new URL(broker.buildAuthorizationUrl("github", "state-1", REDIRECT) ?? "");
    expect(github.origin + github.pathname).toBe("https://github.com/login/oauth/authorize");
    expect(github.searchParams.get("scope")).toBe("user:email");
    expect(github.searchParams.get("state")).toBe("state-1");
    expect(github.searchParams.get("redirect_uri")).toBe(REDIRECT);
    expect(github.searchParams.get("client_id")).toBe("test-client-id");

    const google = new URL(broker.buildAuthorizationUrl("google", "state-2", REDIRECT) ?? "");
    expect(google.origin + google.pathname).toBe("https://accounts.google.com/o/oauth2/v2/auth");
    expect(google.searchParams.get("scope")).toBe("openid email profile");
    expect(google.searchParams.get("response_type")).toBe("code");
  });

  it("reports providers without an adapter as disabled", () => {
    const http = new ProviderHttpClient({ timeoutMs: 1_000 });
    const broker = new IdentityBroker({ adapters: [new GoogleProviderAdapter(credentials, http)], logger });

    expect(broker.isEnabled("github")).toBe(false);
    expect(broker.isEnabled("google")).toBe(true);
    expect(broker.buildAuthorizationUrl("github", "s", REDIRECT)).toBeNull();
  });

  it("exchanges a GitHub code for a profile", async () => {
    const { broker, fake } = createBroker({
      [`POST ${GITHUB_TOKEN_URL}`]: { json: { access_token: "gh-token", token_type: "bearer" } },
      [`GET ${GITHUB_USER_URL}`]: {
        json: { id: 4242, login: "octo", email: "octo@example.com", name: "Octo Cat", avatar_url: "https://avatars.test/octo" }
      }
    });

    const profile = await broker.exchangeCode("github", "code-1", REDIRECT);

    expect(profile).toEqual({
      provider: "github",
      externalId: "4242",
      email: "octo@example.com",
      emailVerified: true,
      username: "octo",
      displayName: "Octo Cat",
      avatarUrl: "https://avatars.test/octo",
      raw: { id: "4242", login: "octo", html_url: null, company: null }
    });
    const [tokenCall] = fake.callsTo("POST", GITHUB_TOKEN_URL);
    expect(tokenCall.headers.get("accept")).toBe("application/json");
    expect(new URLSearchParams(tokenCall.body ?? "").get("code")).toBe("code-1");
    const [userCall] = fake.callsTo("GET", GITHUB_USER_URL);
    expect(userCall.headers.get("authorization")).toBe("Bearer gh-token");
    expect(fake.callsTo("GET", GITHUB_EMAILS_URL)).toHaveLength(0);
  });

  it("falls back to the primary verified GitHub email", async () => {
    const { broker } = createBroker({
      [`POST ${GITHUB_TOKEN_URL}`]: { json: { access_token: "gh-token" } },
      [`GET ${GITHUB_USER_URL}`]: { json: { id: 7, login: "hidden", email: null } },
      [`GET ${GITHUB_EMAILS_URL}`]: {
        json: [
          { email: "old@example.com", primary: false, verified: true },
          { email: "unverified@example.com", primary: true, verified: false },
          { email: "main@example.com", primary: true, verified: true }
        ]
      }
    });

    const profile = await broker.exchangeCode("github", "code-2", REDIRECT);

    expect(profile?.email).toBe("main@example.com");
    expect(profile?.displayName).toBeNull();
  });

  it("returns null when GitHub has no usable email", async () => {
    const { broker } = createBroker({
      [`POST ${GITHUB_TOKEN_URL}`]: { json: { access_token: "gh-token" } },
      [`GET ${GITHUB_USER_URL}`]: { json: { id: 7, login: "hidden", email: "" } },
      [`GET ${GITHUB_EMAILS_URL}`]: { json: [{ email: "x@example.com", primary: true, verified: false }] }
    });

    expect(await broker.exchangeCode("github", "code-3", REDIRECT)).toBeNull();
  });

  it("returns null when the token response has no access_token", async () => {
    const { broker, fake } = createBroker({
      [`POST ${GITHUB_TOKEN_URL}`]: { json: { error: "bad_verification_code" } }
    });

    expect(await broker.exchangeCode("github", "stale", REDIRECT)).toBeNull();
    expect(fake.callsTo("GET", GITHUB_USER_URL)).toHaveLength(0);
  });

  it("exchanges a Google code and derives the username from the email", async () => {
    const { broker, fake } = createBroker({
      [`POST ${GOOGLE_TOKEN_URL}`]: { json: { access_token: "g-token", expires_in: 3599 } },
      [`GET ${GOOGLE_USERINFO_URL}`]: {
        json: { id: "1077", email: "grace@example.com", name: "Grace", picture: "https://avatars.test/g", verified_email: true }
      }
    });

    const profile = await broker.exchangeCode("google", "code-4", "http://relay.test/callback/google");

    expect(profile).toMatchObject({
      provider: "google",
      externalId: "1077",
      email: "grace@example.com",
      emailVerified: true,
      username: "grace",
      displayName: "Grace",
      avatarUrl: "https://avatars.test/g"
    });
    const form = new URLSearchParams(fake.callsTo("POST", GOOGLE_TOKEN_URL)[0].body ?? "");
    expect(form.get("grant_type")).toBe("authorization_code");
    expect(form.get("redirect_uri")).toBe("http://relay.test/callback/google");
  });

  it("returns null on a non-2xx answer without retrying", async () => {
    const { broker, fake } = createBroker({
      [`POST ${GOOGLE_TOKEN_URL}`]: { status: 400, json: { error: "invalid_grant" } }
    });

    expect(await broker.exchangeCode("google", "bad", REDIRECT)).toBeNull();
    expect(fake.callsTo("POST", GOOGLE_TOKEN_URL)).toHaveLength(1);
  });

  it("returns null on invalid JSON", async () => {
    const { broker } = createBroker({
      [`POST ${GOOGLE_TOKEN_URL}`]: { text: "<html>oops</html>" }
    });

    expect(await broker.exchangeCode("google", "code", REDIRECT)).toBeNull();
  });

  it("retries a transport failure once", async () => {
    const { broker, fake } = createBroker({
      [`POST ${GOOGLE_TOKEN_URL}`]: [{ fail: new TypeError("fetch failed") }, { json: { access_token: "g-token" } }],
      [`GET ${GOOGLE_USERINFO_URL}`]: { json: { id: "1", email: "a@example.com" } }
    });

    const profile = await broker.exchangeCode("google", "code", REDIRECT);

    expect(profile?.externalId).toBe("1");
    expect(fake.callsTo("POST", GOOGLE_TOKEN_URL)).toHaveLength(2);
  });

  it("gives up after the second transport failure", async () => {
    const { broker, fake } = createBroker({
      [`POST ${GOOGLE_TOKEN_URL}`]: { fail: new TypeError("fetch failed") }
    });

    expect(await broker.exchangeCode("google", "code", REDIRECT)).toBeNull();
    expect(fake.callsTo("POST", GOOGLE_TOKEN_URL)).toHaveLength(2);
  });

  it("returns null and logs a timeout when the provider stalls", async () => {
    const warnings: Array<Record<string, unknown> | undefined> = [];
    const recording: Logger = { ...logger, warn: (_message, context) => warnings.push(context) };
    const fake = createFakeFetch({ [`POST ${GOOGLE_TOKEN_URL}`]: { hang: true } });
    const http = new ProviderHttpClient({ timeoutMs: 20, fetchImplementation: fake.fetch });
    const broker = new IdentityBroker({ adapters: [new GoogleProviderAdapter(credentials, http)], logger: recording });

    expect(await broker.exchangeCode("google", "code", REDIRECT)).toBeNull();
    expect(warnings).toHaveLength(1);
    expect(warnings[0]).toMatchObject({ provider: "google", url: GOOGLE_TOKEN_URL, reason: "timeout", status: null });
    expect(fake.callsTo("POST", GOOGLE_TOKEN_URL)).toHaveLength(2);
  });
});
