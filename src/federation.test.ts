import { describe, expect, it, vi } from "vitest";
import { ProvisionError } from "./errors";
import { FederationClient } from "./federation";
import { FakeClock, jsonResponse, routeFetch, type RecordedRequest } from "./testing";

vi.mock("@clack/prompts", () => ({
  log: { step: vi.fn(), info: vi.fn(), success: vi.fn(), warn: vi.fn(), error: vi.fn(), message: vi.fn() },
  note: vi.fn(),
  spinner: () => ({ start: vi.fn(), stop: vi.fn(), message: vi.fn() }),
}));

const APP = { clientId: "test-client-id", clientSecret: "test-client-secret" };

function client(handler: (req: RecordedRequest) => Response | Promise<Response>) {
  const clock = new FakeClock();
  const { fetch, requests } = routeFetch(handler);
  return { api: new FederationClient("https://example.test/", { fetch, clock }), requests, clock };
}

function form(req: RecordedRequest | undefined): URLSearchParams {
  return new URLSearchParams(req?.body ?? "");
}

/** One instance where alice exists and bob does not. */
function mastodonRoutes(req: RecordedRequest): Response {
  if (req.url.pathname === "/api/v2/search") {
    const q = req.url.searchParams.get("q");
    return jsonResponse({ accounts: q === "alice@social.example" ? [{ id: "42" }] : [], statuses: [], hashtags: [] });
  }
  if (req.method === "POST" && req.url.pathname === "/api/v1/accounts/42/follow") {
    return jsonResponse({ id: "42", following: true });
  }
  return jsonResponse({ error: "Record not found" }, 404);
}

describe("FederationClient.registerApp", () => {
  it("registers an out-of-band app with the default scopes", async () => {
    const { api, requests } = client(() =>
      jsonResponse({ client_id: "test-client-id", client_secret: "test-client-secret" })
    );

    await expect(api.registerApp()).resolves.toEqual(APP);
    expect(requests).toHaveLength(1);
    expect(requests[0]?.method).toBe("POST");
    expect(requests[0]?.url.href).toBe("https://example.test/api/v1/apps");
    expect(requests[0]?.headers["content-type"]).toBe("application/x-www-form-urlencoded");
    expect(Object.fromEntries(form(requests[0]))).toEqual({
      client_name: "FollowUsersApp",
      redirect_uris: "urn:ietf:wg:oauth:2.0:oob",
      scopes: "read write follow admin:read",
      website: "https://example.test",
    });
  });

  it("fails on a response without credentials", async () => {
    const { api } = client(() => jsonResponse({ error: "Validation failed" }, 422));
    await expect(api.registerApp()).rejects.toThrow(
      'Failed to register the application (HTTP 422). Response: {"error":"Validation failed"}'
    );
  });
});

describe("FederationClient.getToken", () => {
  it("uses the password grant", async () => {
    const { api, requests } = client(() =>
      jsonResponse({ access_token: "test-token", token_type: "Bearer" })
    );

    await expect(api.getToken(APP, "admin@example.test", "test-secret")).resolves.toBe("test-token");
    expect(requests[0]?.url.pathname).toBe("/oauth/token");
    expect(Object.fromEntries(form(requests[0]))).toEqual({
      client_id: "test-client-id",
      client_secret: "test-client-secret",
      grant_type: "password",
      username: "admin@example.test",
      password: "test-secret",
      scope: "read write follow admin:read",
    });
  });

  it("rejects a literal null token", async () => {
    const { api } = client(() => jsonResponse({ access_token: "null" }));
    const err = await api.getToken(APP, "admin@example.test", "test-secret").catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ProvisionError);
    expect(err instanceof ProvisionError && err.kind).toBe("federation");
    expect(err instanceof ProvisionError && err.message).toBe(
      'Failed to get an access token (HTTP 200). Response: {"access_token":"null"}'
    );
  });

  it("rejects a refused grant", async () => {
    const { api } = client(() => jsonResponse({ error: "invalid_grant" }, 400));
    await expect(api.getToken(APP, "admin@example.test", "wrong")).rejects.toThrow(
      'Failed to get an access token (HTTP 400). Response: {"error":"invalid_grant"}'
    );
  });
});

describe("FederationClient.follow", () => {
  it("searches with resolve and follows the first match", async () => {
    const { api, requests } = client(mastodonRoutes);

    await expect(api.follow("alice@social.example", "test-token")).resolves.toEqual({
      handle: "alice@social.example",
      status: "followed",
      accountId: "42",
    });
    expect(requests).toHaveLength(2);
    expect(requests[0]?.method).toBe("GET");
    expect(requests[0]?.url.searchParams.get("q")).toBe("alice@social.example");
    expect(requests[0]?.url.searchParams.get("resolve")).toBe("true");
    expect(requests[0]?.headers.authorization).toBe("Bearer test-token");
    expect(requests[1]?.method).toBe("POST");
    expect(requests[1]?.url.pathname).toBe("/api/v1/accounts/42/follow");
    expect(requests[1]?.headers.authorization).toBe("Bearer test-token");
  });

  it("skips a handle with no matching account without posting", async () => {
    const { api, requests } = client(mastodonRoutes);

    await expect(api.follow("bob@social.example", "test-token")).resolves.toEqual({
      handle: "bob@social.example",
      status: "skipped",
      reason: "no account found",
    });
    expect(requests).toHaveLength(1);
  });

  it("accepts numeric account ids", async () => {
    const { api, requests } = client((req) =>
      req.url.pathname === "/api/v2/search"
        ? jsonResponse({ accounts: [{ id: 7 }] })
        : jsonResponse({ id: "7", following: true })
    );

    await expect(api.follow("carol@social.example", "test-token")).resolves.toEqual({
      handle: "carol@social.example",
      status: "followed",
      accountId: "7",
    });
    expect(requests[1]?.url.pathname).toBe("/api/v1/accounts/7/follow");
  });

  it("reports the error field of a follow response", async () => {
    const { api } = client((req) =>
      req.url.pathname === "/api/v2/search"
        ? jsonResponse({ accounts: [{ id: "9" }] })
        : jsonResponse({ error: "This action is not allowed" }, 403)
    );

    await expect(api.follow("dave@social.example", "test-token")).resolves.toEqual({
      handle: "dave@social.example",
      status: "failed",
      reason: "This action is not allowed",
    });
  });

  it("treats a failed search as a failure", async () => {
    const { api } = client(() => new Response("upstream timeout", { status: 502 }));

    await expect(api.follow("erin@social.example", "test-token")).resolves.toEqual({
      handle: "erin@social.example",
      status: "failed",
      reason: "search returned HTTP 502",
    });
  });

  it("turns network errors into failures", async () => {
    const { api } = client(() => {
      throw new Error("connect ECONNREFUSED");
    });

    await expect(api.follow("frank@social.example", "test-token")).resolves.toEqual({
      handle: "frank@social.example",
      status: "failed",
      reason: "connect ECONNREFUSED",
    });
  });
});

describe("FederationClient.followAll", () => {
  it("processes every handle with a pause between attempts", async () => {
    const { api, clock } = client(mastodonRoutes);
    const outcomes = await api.followAll(
      ["alice@social.example", "bob@social.example", "alice@social.example"],
      "test-token",
      5000
    );

    expect(outcomes.map((o) => o.status)).toEqual(["followed", "skipped", "followed"]);
    expect(clock.sleeps).toEqual([5000, 5000]);
  });

  it("does not sleep for a single handle", async () => {
    const { api, clock } = client(mastodonRoutes);
    await api.followAll(["alice@social.example"], "test-token", 5000);
    expect(clock.sleeps).toEqual([]);
  });
});

describe("FederationClient.waitUntilReady", () => {
  it("polls the health endpoint until it answers", async () => {
    let calls = 0;
    const { api, requests, clock } = client(() => {
      calls++;
      if (calls === 1) throw new Error("getaddrinfo ENOTFOUND");
      return calls === 2 ? new Response(null, { status: 503 }) : new Response("OK");
    });

    await api.waitUntilReady(600000);
    expect(requests.map((r) => r.url.href)).toEqual([
      "https://example.test/health",
      "https://example.test/health",
      "https://example.test/health",
    ]);
    expect(clock.sleeps).toEqual([5000, 10000]);
  });

  it("fails once the deadline passes", async () => {
    const { api, clock } = client(() => new Response(null, { status: 503 }));
    const err = await api.waitUntilReady(20000).catch((e: unknown) => e);

    expect(err instanceof ProvisionError && err.kind).toBe("federation");
    expect(err instanceof ProvisionError && err.message).toBe(
      "Timed out after 20s waiting for https://example.test to respond"
    );
    expect(clock.sleeps).toEqual([5000, 10000, 5000]);
  });
});
