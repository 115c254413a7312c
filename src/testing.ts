/**
 * In-process stand-ins for the container engine, the clock and the HTTP
 * layer, shared by the test suites.
 */
import { RELAY_COLUMNS } from "./database";
import type { CommandResult, ContainerRuntime, ExecOptions, HealthStatus } from "./runtime";
import type { DeploymentConfig } from "./types";
import type { Clock } from "./wait";

export class FakeClock implements Clock {
  private t = 0;
  readonly sleeps: number[] = [];

  now(): number {
    return this.t;
  }

  async sleep(ms: number): Promise<void> {
    this.sleeps.push(ms);
    this.t += ms;
  }
}

export const ok = (stdout = ""): CommandResult => ({ exitCode: 0, stdout, stderr: "" });
export const fail = (stderr: string, exitCode = 1): CommandResult => ({ exitCode, stdout: "", stderr });

export type CommandHandler = (
  service: string,
  command: string[],
  input: string | undefined
) => CommandResult;

/**
 * Records every call. After `start`, a service walks through its scripted
 * health statuses (default: straight to healthy); the last one sticks.
 */
export class FakeRuntime implements ContainerRuntime {
  readonly events: string[] = [];
  readonly healthScript = new Map<string, HealthStatus[]>();
  private readonly statuses = new Map<string, HealthStatus[]>();
  execHandler: CommandHandler = () => ok();
  runHandler: CommandHandler = () => ok();

  async start(service: string): Promise<void> {
    this.events.push(`start:${service}`);
    this.statuses.set(service, [...(this.healthScript.get(service) ?? ["healthy"])]);
  }

  async health(service: string): Promise<HealthStatus> {
    const queue = this.statuses.get(service);
    if (!queue || queue.length === 0) return "stopped";
    return queue.length > 1 ? (queue.shift() ?? "stopped") : (queue[0] ?? "stopped");
  }

  /** Force a status, e.g. to simulate a dependency going down later. */
  setHealth(service: string, ...statuses: HealthStatus[]): void {
    this.statuses.set(service, statuses);
  }

  async run(service: string, command: string[]): Promise<CommandResult> {
    this.events.push(`run:${service}:${command.join(" ")}`);
    return this.runHandler(service, command, undefined);
  }

  async exec(service: string, command: string[], options: ExecOptions = {}): Promise<CommandResult> {
    this.events.push(`exec:${service}:${command.join(" ")}`);
    return this.execHandler(service, command, options.input);
  }

  async down(): Promise<void> {
    this.events.push("down");
    this.statuses.clear();
  }

  started(): string[] {
    return this.events.filter((e) => e.startsWith("start:")).map((e) => e.slice("start:".length));
  }
}

export interface RelayRow {
  inboxUrl: string;
  followActivityId: string | null;
  state: number;
}

const RELAY_TUPLE = /\('((?:[^']|'')*)', (NULL|'(?:[^']|'')*'), (\d)\)/g;

function relayTuples(sql: string): RelayRow[] {
  return [...sql.matchAll(RELAY_TUPLE)].map((m) => ({
    inboxUrl: (m[1] ?? "").replace(/''/g, "'"),
    followActivityId: m[2] === "NULL" || m[2] === undefined ? null : m[2].slice(1, -1),
    state: Number(m[3]),
  }));
}

/**
 * Answers the psql and tootctl calls of a bootstrap run against an
 * in-memory relays table.
 */
export class FakeMastodon {
  readonly relays: RelayRow[] = [];
  readonly sql: string[] = [];
  password = "test-generated-password";
  relayColumns: readonly string[] = RELAY_COLUMNS;

  readonly handler: CommandHandler = (service, command, input) => {
    if (service === "db" && command[0] === "pg_isready") return ok("accepting connections");
    if (service === "db" && command[0] === "psql") return this.psql(input ?? "");
    if (service === "web" && command.slice(0, 3).join(" ") === "bin/tootctl accounts create") {
      return ok(`OK\nNew password: ${this.password}\n`);
    }
    return ok("OK\n");
  };

  private psql(input: string): CommandResult {
    this.sql.push(input);
    if (input.startsWith("SELECT column_name")) {
      return ok(this.relayColumns.join("\n") + "\n");
    }
    if (input.startsWith("INSERT INTO relays")) {
      for (const row of relayTuples(input)) {
        if (!this.relays.some((r) => r.inboxUrl === row.inboxUrl)) this.relays.push(row);
      }
      return ok();
    }
    if (input.startsWith("SELECT count(DISTINCT")) {
      const wanted = relayTuples(input);
      const found = this.relays.filter((r) =>
        wanted.some((w) => w.inboxUrl === r.inboxUrl && w.state === r.state)
      );
      return ok(`${found.length}\n`);
    }
    return ok();
  }
}

export interface RecordedRequest {
  method: string;
  url: URL;
  body: string | null;
  headers: Record<string, string>;
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

/** A `fetch` that records each request and answers through `handler`. */
export function routeFetch(handler: (req: RecordedRequest) => Response | Promise<Response>) {
  const requests: RecordedRequest[] = [];
  const fetchImpl: typeof fetch = async (input, init) => {
    const url = new URL(input instanceof Request ? input.url : String(input));
    const req: RecordedRequest = {
      method: init?.method ?? "GET",
      url,
      body: typeof init?.body === "string" ? init.body : null,
      headers: Object.fromEntries(new Headers(init?.headers).entries()),
    };
    requests.push(req);
    return handler(req);
  };
  return { fetch: fetchImpl, requests };
}

export function testConfig(overrides: Partial<DeploymentConfig> = {}): DeploymentConfig {
  return {
    domain: "example.test",
    publicIp: "203.0.113.5",
    operatorEmail: "admin@example.test",
    mastodonVersion: "v4.2.10",
    secrets: {
      secretKeyBase: "test-secret-key-base",
      otpSecret: "test-otp-secret",
      vapid: { privateKey: "test-vapid-private", publicKey: "test-vapid-public" },
    },
    datastore: { postgresPassword: "x", redisPassword: "y" },
    ...overrides,
  };
}
