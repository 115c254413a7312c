/**
 * Minimal Mastodon client: OAuth app registration, password grant and
 * search-then-follow. Registration and token failures are fatal; every
 * per-handle problem becomes a `skipped` or `failed` outcome instead.
 */
import * as p from "@clack/prompts";
import pc from "picocolors";
import { z } from "zod";
import { ProvisionError } from "./errors";
import type { FollowOutcome } from "./types";
import { type Clock, systemClock, waitFor, WaitTimeoutError } from "./wait";

const DEFAULT_SCOPES = "read write follow admin:read";
const OOB_REDIRECT_URI = "urn:ietf:wg:oauth:2.0:oob";
const CLIENT_NAME = "FollowUsersApp";

const AppSchema = z.object({
  client_id: z.string().min(1),
  client_secret: z.string().min(1),
});

const TokenSchema = z.object({
  access_token: z.string().min(1),
});

const SearchSchema = z.object({
  accounts: z.array(z.object({ id: z.union([z.string(), z.number()]).transform(String) })),
});

export interface AppCredentials {
  clientId: string;
  clientSecret: string;
}

export interface FederationClientOptions {
  fetch?: typeof fetch;
  clock?: Clock;
}

async function readBody(res: Response): Promise<unknown> {
  const text = await res.text();
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}

function errorIndicator(body: unknown): string | null {
  if (typeof body === "string") return body.includes("error") ? body : null;
  if (body && typeof body === "object" && "error" in body) {
    return String(body.error);
  }
  return null;
}

function describeBody(body: unknown): string {
  const text = typeof body === "string" ? body : JSON.stringify(body);
  return text.length > 200 ? `${text.slice(0, 200)}…` : text;
}

export class FederationClient {
  private readonly fetch: typeof fetch;
  private readonly clock: Clock;
  readonly instanceUrl: string;

  constructor(instanceUrl: string, options: FederationClientOptions = {}) {
    this.instanceUrl = instanceUrl.replace(/\/+$/, "");
    this.fetch = options.fetch ?? globalThis.fetch;
    this.clock = options.clock ?? systemClock;
  }

  private url(path: string, query?: Record<string, string>): string {
    const qs = query ? `?${new URLSearchParams(query).toString()}` : "";
    return `${this.instanceUrl}${path}${qs}`;
  }

  private async postForm(path: string, form: Record<string, string>, token?: string) {
    const res = await this.fetch(this.url(path), {
      method: "POST",
      headers: {
        "Content-Type": "application/x-www-form-urlencoded",
        ...(token ? { Authorization: `Bearer ${token}` } : {}),
      },
      body: new URLSearchParams(form).toString(),
    });
    return { res, body: await readBody(res) };
  }

  /** Poll `/health` until the web process answers through the proxy. */
  async waitUntilReady(timeoutMs: number): Promise<void> {
    try {
      await waitFor(
        `${this.instanceUrl} to respond`,
        async () => {
          try {
            const res = await this.fetch(this.url("/health"));
            return res.ok;
          } catch {
            return false; // DNS, TLS or connection not there yet
          }
        },
        { timeoutMs, baseDelayMs: 5000, maxDelayMs: 30000, clock: this.clock }
      );
    } catch (err) {
      if (err instanceof WaitTimeoutError) {
        throw new ProvisionError("federation", err.message, {
          cause: err,
          hint: "Caddy may still be issuing the certificate. Check: docker compose logs caddy",
        });
      }
      throw err;
    }
  }

  async registerApp(
    name: string = CLIENT_NAME,
    redirectUri: string = OOB_REDIRECT_URI,
    scopes: string = DEFAULT_SCOPES
  ): Promise<AppCredentials> {
    const { res, body } = await this.postForm("/api/v1/apps", {
      client_name: name,
      redirect_uris: redirectUri,
      scopes,
      website: this.instanceUrl,
    });
    const parsed = AppSchema.safeParse(body);
    if (!res.ok || !parsed.success) {
      throw new ProvisionError(
        "federation",
        `Failed to register the application (HTTP ${res.status}). Response: ${describeBody(body)}`
      );
    }
    return { clientId: parsed.data.client_id, clientSecret: parsed.data.client_secret };
  }

  /** Password grant; `username` is the account's e-mail address. */
  async getToken(
    app: AppCredentials,
    username: string,
    password: string,
    scopes: string = DEFAULT_SCOPES
  ): Promise<string> {
    const { res, body } = await this.postForm("/oauth/token", {
      client_id: app.clientId,
      client_secret: app.clientSecret,
      grant_type: "password",
      username,
      password,
      scope: scopes,
    });
    const parsed = TokenSchema.safeParse(body);
    if (!res.ok || !parsed.success || parsed.data.access_token === "null") {
      throw new ProvisionError(
        "federation",
        `Failed to get an access token (HTTP ${res.status}). Response: ${describeBody(body)}`
      );
    }
    return parsed.data.access_token;
  }

  /** Resolve `handle` through federated search and follow the first match. */
  async follow(handle: string, token: string): Promise<FollowOutcome> {
    const auth = { Authorization: `Bearer ${token}` };
    try {
      const search = await this.fetch(this.url("/api/v2/search", { q: handle, resolve: "true" }), {
        headers: auth,
      });
      const body = await readBody(search);
      if (!search.ok) {
        return { handle, status: "failed", reason: `search returned HTTP ${search.status}` };
      }

      const parsed = SearchSchema.safeParse(body);
      const accountId = parsed.success ? parsed.data.accounts[0]?.id : undefined;
      if (!accountId) {
        return { handle, status: "skipped", reason: "no account found" };
      }

      const { res, body: followBody } = await this.postForm(
        `/api/v1/accounts/${encodeURIComponent(accountId)}/follow`,
        {},
        token
      );
      const error = errorIndicator(followBody);
      if (!res.ok || error) {
        return {
          handle,
          status: "failed",
          reason: error ?? `follow returned HTTP ${res.status}`,
        };
      }
      return { handle, status: "followed", accountId };
    } catch (err) {
      return { handle, status: "failed", reason: err instanceof Error ? err.message : String(err) };
    }
  }

  /** Follow each handle in order with a fixed pause between attempts. */
  async followAll(handles: readonly string[], token: string, delayMs: number): Promise<FollowOutcome[]> {
    const outcomes: FollowOutcome[] = [];
    for (const [i, handle] of handles.entries()) {
      if (i > 0 && delayMs > 0) await this.clock.sleep(delayMs);

      const outcome = await this.follow(handle, token);
      outcomes.push(outcome);

      const progress = pc.dim(`[${i + 1}/${handles.length}]`);
      if (outcome.status === "followed") {
        p.log.success(`${progress} Followed ${handle} (id ${outcome.accountId})`);
      } else if (outcome.status === "skipped") {
        p.log.warn(`${progress} Could not find ${handle}, skipping`);
      } else {
        p.log.error(`${progress} Failed to follow ${handle}: ${outcome.reason}`);
      }
    }
    return outcomes;
  }
}
