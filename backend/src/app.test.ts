import { once } from "events";
import type { Server } from "http";

import { validate as isUuid } from "uuid";

import { createApp } from "./app";
import type { ExpenseRepository } from "./repositories/expense.repository";
import type { UserRepository } from "./repositories/user.repository";
import { createMemoryRepositories, pgError } from "./testing/memory-repositories";
import { createCapturingMailer, seedUser, testConfig } from "./testing/fixtures";
import { signAccessToken } from "./utils/jwt";

// Postgres rejects a non-uuid literal against a uuid column.
function malformedUuid(id: string) {
  return pgError("22P02", `invalid input syntax for type uuid: "${id}"`);
}

describe("HTTP API", () => {
  const repos = createMemoryRepositories();
  const users: UserRepository = {
    ...repos.users,
    async findById(id) {
      if (!isUuid(id)) throw malformedUuid(id);
      return repos.users.findById(id);
    },
  };
  const expenses: ExpenseRepository = {
    ...repos.expenses,
    async findById(id) {
      if (!isUuid(id)) throw malformedUuid(id);
      return repos.expenses.findById(id);
    },
  };
  const mail = createCapturingMailer();
  let server: Server;
  let baseUrl = "";
  let accessToken = "";
  let refreshCookie = "";

  async function call(
    method: string,
    path: string,
    options: { body?: unknown; token?: string; cookie?: string } = {},
  ) {
    const headers: Record<string, string> = { "Content-Type": "application/json" };
    if (options.token) headers.Authorization = `Bearer ${options.token}`;
    if (options.cookie) headers.Cookie = options.cookie;

    const res = await fetch(`${baseUrl}${path}`, {
      method,
      headers,
      body: options.body === undefined ? undefined : JSON.stringify(options.body),
    });
    const text = await res.text();

    return { status: res.status, headers: res.headers, body: text ? JSON.parse(text) : null };
  }

  beforeAll(async () => {
    jest.spyOn(console, "log").mockImplementation(() => undefined);

    const app = createApp({
      config: testConfig(),
      users,
      profiles: repos.profiles,
      expenses,
      mailer: mail.mailer,
      checkDatabase: async () => true,
    });

    server = app.listen(0, "127.0.0.1");
    await once(server, "listening");

    const address = server.address();
    if (!address || typeof address === "string") {
      throw new Error("Server did not bind to a port");
    }
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterAll(async () => {
    await new Promise<void>((resolve, reject) =>
      server.close((err) => (err ? reject(err) : resolve())),
    );
    jest.restoreAllMocks();
  });

  it("should report health", async () => {
    const res = await call("GET", "/health");

    expect(res.status).toBe(200);
    expect(res.body).toEqual({ status: "ok", database: "up" });
  });

  it("should register a user once", async () => {
    const res = await call("POST", "/auth/register", {
      body: { email: "a@b.com", password: "pw123" },
    });

    expect(res.status).toBe(201);
    expect(res.body).toMatchObject({ email: "a@b.com", is_verified: false });
    expect(res.body).not.toHaveProperty("password_hash");

    const again = await call("POST", "/auth/register", {
      body: { email: "a@b.com", password: "pw123" },
    });
    expect(again.status).toBe(409);
    expect(again.body).toEqual({ message: "User already exists", code: "DUPLICATE_EMAIL" });
  });

  it("should refuse login until the email is verified", async () => {
    const res = await call("POST", "/auth/login", {
      body: { email: "a@b.com", password: "pw123" },
    });

    expect(res.status).toBe(403);
    expect(res.body.code).toBe("NOT_VERIFIED");
  });

  it("should verify and log in", async () => {
    const verified = await call("POST", "/auth/verify", {
      body: { token: mail.lastTokenFor("a@b.com") },
    });
    expect(verified.status).toBe(200);
    expect(verified.body.user.is_verified).toBe(true);

    const res = await call("POST", "/auth/login", {
      body: { email: "a@b.com", password: "pw123" },
    });
    expect(res.status).toBe(200);
    expect(typeof res.body.accessToken).toBe("string");

    const setCookie = res.headers.get("set-cookie") ?? "";
    expect(setCookie).toContain("HttpOnly");
    expect(setCookie).toContain("Path=/auth");

    const match = /refreshToken=([^;]+)/.exec(setCookie);
    refreshCookie = match ? `refreshToken=${match[1]}` : "";
    accessToken = res.body.accessToken;
    expect(refreshCookie).not.toBe("");
  });

  it("should return the current user with roles", async () => {
    const res = await call("GET", "/auth/me", { token: accessToken });

    expect(res.status).toBe(200);
    expect(res.body).toMatchObject({ email: "a@b.com", roles: ["user"] });
  });

  it("should require a session for the ledger", async () => {
    const res = await call("GET", "/expenses");

    expect(res.status).toBe(401);
    expect(res.headers.get("www-authenticate")).toBe("Bearer");
    expect(res.body.code).toBe("INVALID_SESSION");
  });

  it("should accrue points for an expense and give them back on delete", async () => {
    const created = await call("POST", "/expenses", {
      token: accessToken,
      body: { amount: 10, category: "food", note: "lunch" },
    });
    expect(created.status).toBe(201);
    expect(created.body).toMatchObject({
      amount: 10,
      category: "food",
      note: "lunch",
      points: 10,
    });

    expect((await call("GET", "/points", { token: accessToken })).body).toEqual({ balance: 10 });

    const list = await call("GET", "/expenses?limit=10", { token: accessToken });
    expect(list.body).toMatchObject({ total: 1, page: 1, limit: 10, totalPages: 1 });
    expect(list.body.data[0].id).toBe(created.body.id);

    const removed = await call("DELETE", `/expenses/${created.body.id}`, { token: accessToken });
    expect(removed.status).toBe(204);

    expect((await call("GET", "/points", { token: accessToken })).body).toEqual({ balance: 0 });
    expect((await call("GET", "/expenses", { token: accessToken })).body.total).toBe(0);
  });

  it("should map ledger and validation failures", async () => {
    const zero = await call("POST", "/expenses", {
      token: accessToken,
      body: { amount: 0, category: "food" },
    });
    expect(zero.status).toBe(400);
    expect(zero.body).toEqual({ message: "Amount must be greater than 0", code: "INVALID_AMOUNT" });

    const missing = await call("POST", "/expenses", {
      token: accessToken,
      body: { category: "food" },
    });
    expect(missing.status).toBe(400);
    expect(missing.body).toEqual({
      message: "Validation failed",
      code: "VALIDATION_FAILED",
      details: ["Amount is required"],
    });

    for (const method of ["GET", "PUT", "DELETE"]) {
      const malformed = await call(method, "/expenses/does-not-exist", {
        token: accessToken,
        body: method === "PUT" ? { amount: 1 } : undefined,
      });
      expect(malformed.status).toBe(404);
      expect(malformed.body.code).toBe("NOT_FOUND");
    }

    const absent = await call("GET", "/expenses/00000000-0000-4000-8000-000000000000", {
      token: accessToken,
    });
    expect(absent.status).toBe(404);
  });

  it("should summarize spending", async () => {
    await call("POST", "/expenses", {
      token: accessToken,
      body: { amount: 12.5, category: "education", spent_at: "2024-03-02T09:00:00Z" },
    });

    const res = await call("GET", "/reports/summary?from=2024-03-01T00:00:00Z", {
      token: accessToken,
    });

    expect(res.status).toBe(200);
    expect(res.body).toMatchObject({
      total_spent: 12.5,
      count: 1,
      points: 24,
      by_category: [{ category: "education", total: 12.5, count: 1 }],
      by_month: [{ month: "2024-03", total: 12.5, count: 1 }],
    });
  });

  it("should update the profile", async () => {
    const res = await call("PATCH", "/profile", {
      token: accessToken,
      body: { first_name: "Ada", age: 36 },
    });

    expect(res.status).toBe(200);
    expect(res.body).toMatchObject({
      user: { first_name: "Ada" },
      age: 36,
      points: 24,
      total_transactions: 1,
      is_profile_complete: false,
    });
  });

  it("should keep user administration to admins", async () => {
    const denied = await call("GET", "/users", { token: accessToken });
    expect(denied.status).toBe(403);
    expect(denied.body.code).toBe("FORBIDDEN");

    const admin = await seedUser(repos.users, { email: "root@b.com" }, ["user", "admin"]);
    const adminToken = signAccessToken(
      { userId: admin.id, roles: ["user", "admin"] },
      "test-secret",
      900,
    );

    const listed = await call("GET", "/users?search=a%40b", { token: adminToken });
    expect(listed.status).toBe(200);
    expect(listed.body).toMatchObject({ total: 1, page: 1, pages: 1 });
    expect(listed.body.items[0].email).toBe("a@b.com");

    const malformed = await call("GET", "/users/not-a-uuid", { token: adminToken });
    expect(malformed.status).toBe(404);
    expect(malformed.body.code).toBe("NOT_FOUND");

    const removal = await call("DELETE", "/users/not-a-uuid", { token: adminToken });
    expect(removal.status).toBe(404);
  });

  it("should refresh with the cookie and forget it after logout", async () => {
    const refreshed = await call("POST", "/auth/refresh", { cookie: refreshCookie });
    expect(refreshed.status).toBe(200);
    expect(typeof refreshed.body.accessToken).toBe("string");

    const out = await call("POST", "/auth/logout", { cookie: refreshCookie });
    expect(out.body).toEqual({ message: "Logged out" });

    const after = await call("POST", "/auth/refresh", { cookie: refreshCookie });
    expect(after.status).toBe(401);
  });

  it("should answer unknown routes with 404", async () => {
    const res = await call("GET", "/nope");

    expect(res.status).toBe(404);
    expect(res.body).toEqual({ message: "Not found", code: "NOT_FOUND" });
  });
});
