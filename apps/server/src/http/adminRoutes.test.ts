import { afterEach, describe, expect, it } from "vitest";

import { createTestConfig, TEST_ADMIN_TOKEN, TEST_BREAK_GLASS_PASSWORD } from "../testing/testConfig";
import { startTestServer, type RunningTestServer } from "../testing/testServer";
import { isRecord } from "./utils";

const AUTH = { Authorization: `Bearer ${TEST_ADMIN_TOKEN}` };

const readJson = async (response: Response): Promise<Record<string, unknown>> => {
  const body: unknown = await response.json();
  if (!isRecord(body)) {
    throw new Error("Expected a JSON object");
  }
  return body;
};

const idOf = (body: Record<string, unknown>): string => (typeof body.id === "string" ? body.id : "");

describe("admin routes", () => {
  let running: RunningTestServer | null = null;

  const start = async (config = createTestConfig()) => {
    running = await startTestServer({ config });
    return running;
  };

  afterEach(async () => {
    await running?.stop();
    running = null;
  });

  it("answers 503 when no admin token is configured", async () => {
    const server = await start(createTestConfig({ AUTH_ADMIN_API_TOKEN: undefined }));

    const response = await server.request("/admin/users", { headers: AUTH });

    expect(response.status).toBe(503);
    expect(await response.json()).toEqual({ error: "admin_api_disabled" });
  });

  it("rejects missing or wrong bearer tokens", async () => {
    const server = await start();

    const missing = await server.request("/admin/users");
    expect(missing.status).toBe(401);
    expect(missing.headers.get("www-authenticate")).toBe("Bearer");

    const wrong = await server.request("/admin/users", { headers: { Authorization: "Bearer test-other-token" } });
    expect(wrong.status).toBe(401);
    expect(await wrong.json()).toEqual({ error: "unauthorized" });
  });

  it("pre-registers an identity and reports conflicts", async () => {
    const server = await start();

    const created = await server.postJson(
      "/admin/pre-register",
      { email: "ada@example.com", provider: "google", full_name: "Ada", is_admin: true },
      AUTH
    );

    expect(created.status).toBe(201);
    const body = await readJson(created);
    expect(body).toMatchObject({
      email: "ada@example.com",
      username: "ada",
      full_name: "Ada",
      is_active: true,
      is_admin: true,
      provider: "google",
      provider_external_id: null,
      pending: true,
      last_login_at: null
    });
    expect(typeof body.created_at === "string" ? new Date(body.created_at).toISOString() : null).toBe(body.created_at);

    const duplicate = await server.postJson(
      "/admin/pre-register",
      { email: "ada@example.com", provider: "github", username: "ada2" },
      AUTH
    );
    expect(duplicate.status).toBe(409);
    expect(await duplicate.json()).toEqual({ error: "conflict", field: "email" });
  });

  it("validates pre-registration bodies", async () => {
    const server = await start();

    const badEmail = await server.postJson("/admin/pre-register", { email: "not-an-email", provider: "github" }, AUTH);
    expect(badEmail.status).toBe(400);

    const badProvider = await server.postJson("/admin/pre-register", { email: "a@example.com", provider: "gitlab" }, AUTH);
    expect(badProvider.status).toBe(400);

    const badGrant = await server.postJson(
      "/admin/pre-register",
      { email: "a@example.com", provider: "github", is_admin: "yes" },
      AUTH
    );
    expect(badGrant.status).toBe(400);
    expect(await badGrant.json()).toEqual({ error: "invalid_request" });
  });

  it("lists identities with paging", async () => {
    const server = await start();
    for (const email of ["a@example.com", "b@example.com", "c@example.com"]) {
      await server.postJson("/admin/pre-register", { email, provider: "github" }, AUTH);
    }

    const page = await readJson(await server.request("/admin/users?limit=2&offset=0", { headers: AUTH }));

    expect(page.total).toBe(3);
    expect(Array.isArray(page.users) ? page.users.length : -1).toBe(2);

    const tooLarge = await server.request("/admin/users?limit=500", { headers: AUTH });
    expect(tooLarge.status).toBe(400);

    const hugeOffset = await server.request("/admin/users?offset=99999999999999999999", { headers: AUTH });
    expect(hugeOffset.status).toBe(400);
    expect(await hugeOffset.json()).toEqual({ error: "invalid_request" });
  });

  it("reads, updates and deletes a single identity", async () => {
    const server = await start();
    const id = idOf(
      await readJson(await server.postJson("/admin/pre-register", { email: "ada@example.com", provider: "github" }, AUTH))
    );

    const fetched = await server.request(`/admin/users/${id}`, { headers: AUTH });
    expect(fetched.status).toBe(200);
    expect(await fetched.json()).toMatchObject({ id, email: "ada@example.com" });

    const patched = await server.request(`/admin/users/${id}`, {
      method: "PATCH",
      headers: { ...AUTH, "Content-Type": "application/json" },
      body: JSON.stringify({ is_admin: true, permissions: { services: ["billing"] } })
    });
    expect(patched.status).toBe(200);
    expect(await patched.json()).toMatchObject({ id, is_admin: true, is_active: true, permissions: { services: ["billing"] } });

    const emptyPatch = await server.request(`/admin/users/${id}`, {
      method: "PATCH",
      headers: { ...AUTH, "Content-Type": "application/json" },
      body: JSON.stringify({})
    });
    expect(emptyPatch.status).toBe(400);

    const deleted = await server.request(`/admin/users/${id}`, { method: "DELETE", headers: AUTH });
    expect(deleted.status).toBe(204);

    const missing = await server.request(`/admin/users/${id}`, { headers: AUTH });
    expect(missing.status).toBe(404);
    expect(await missing.json()).toEqual({ error: "not_found" });
  });

  it("blocks refresh for a deactivated identity", async () => {
    const server = await start();
    const login = await readJson(
      await server.postJson("/backup-login", { username: "admin", password: TEST_BREAK_GLASS_PASSWORD })
    );
    const user = isRecord(login.user) ? login.user : {};

    const patched = await server.request(`/admin/users/${idOf(user)}`, {
      method: "PATCH",
      headers: { ...AUTH, "Content-Type": "application/json" },
      body: JSON.stringify({ is_active: false })
    });
    expect(patched.status).toBe(200);

    const refresh = await server.postJson("/refresh", { refresh_token: login.refresh_token });
    expect(refresh.status).toBe(401);
  });

  it("cascades refresh records when an identity is deleted", async () => {
    const server = await start();
    const login = await readJson(
      await server.postJson("/backup-login", { username: "admin", password: TEST_BREAK_GLASS_PASSWORD })
    );
    const user = isRecord(login.user) ? login.user : {};

    const deleted = await server.request(`/admin/users/${idOf(user)}`, { method: "DELETE", headers: AUTH });
    expect(deleted.status).toBe(204);

    const logout = await server.postJson("/logout", { refresh_token: login.refresh_token });
    expect(logout.status).toBe(401);
  });
});
