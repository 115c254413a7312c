import { beforeEach, describe, expect, it, vi } from "vitest";
import {
  BootstrapError,
  BootstrapSequencer,
  initialBootstrapState,
  parseGeneratedPassword,
  type BootstrapState,
} from "./bootstrap";
import { Orchestrator } from "./orchestrator";
import { fail, FakeClock, FakeMastodon, FakeRuntime, ok, testConfig } from "./testing";
import { buildTopology } from "./topology";
import { RelayState, type RelayEntry } from "./types";
import { WaitTimeoutError } from "./wait";

vi.mock("@clack/prompts", () => ({
  log: { step: vi.fn(), info: vi.fn(), success: vi.fn(), warn: vi.fn(), error: vi.fn(), message: vi.fn() },
  note: vi.fn(),
  spinner: () => ({ start: vi.fn(), stop: vi.fn(), message: vi.fn() }),
}));

const relay = (inboxUrl: string): RelayEntry => ({
  inboxUrl,
  followActivityId: null,
  state: RelayState.accepted,
});

const RELAYS = [relay("https://relay.example/inbox"), relay("https://relay.example.net/inbox")];

async function bootstrapFailure(pending: Promise<unknown>): Promise<BootstrapError> {
  const err = await pending.then(
    () => null,
    (e: unknown) => e
  );
  if (!(err instanceof BootstrapError)) {
    throw new Error(`expected a BootstrapError, got ${String(err)}`);
  }
  return err;
}

describe("parseGeneratedPassword", () => {
  it("extracts the password line", () => {
    expect(parseGeneratedPassword("OK\nNew password: abc123\n")).toBe("abc123");
  });

  it("returns null when the line is missing or empty", () => {
    expect(parseGeneratedPassword("OK\n")).toBeNull();
    expect(parseGeneratedPassword("New password:   \n")).toBeNull();
  });
});

describe("BootstrapSequencer", () => {
  let runtime: FakeRuntime;
  let mastodon: FakeMastodon;
  let clock: FakeClock;

  const sequencer = (relays: readonly RelayEntry[] = RELAYS, dbReadyTimeoutMs = 10000) =>
    new BootstrapSequencer({
      driver: new Orchestrator(runtime, { healthTimeoutMs: 10000, clock }),
      topology: buildTopology(testConfig()),
      config: testConfig(),
      relays,
      adminUsername: "superadmin",
      dbReadyTimeoutMs,
      clock,
    });

  beforeEach(() => {
    runtime = new FakeRuntime();
    mastodon = new FakeMastodon();
    clock = new FakeClock();
    runtime.execHandler = mastodon.handler;
  });

  it("runs every stage through to done", async () => {
    const state = await sequencer().run();

    expect(state.stage).toBe("done");
    expect(state.relaysLoaded).toBe(2);
    expect(state.admin).toEqual({
      username: "superadmin",
      email: "admin@example.test",
      password: "test-generated-password",
      role: "Admin",
      confirmation: "approved",
      twoFactor: "disabled",
    });
    expect(Object.isFrozen(state)).toBe(true);
    expect(mastodon.relays).toEqual([
      { inboxUrl: "https://relay.example/inbox", followActivityId: null, state: 2 },
      { inboxUrl: "https://relay.example.net/inbox", followActivityId: null, state: 2 },
    ]);
  });

  it("issues the bootstrap commands in order", async () => {
    await sequencer().run();
    const commands = runtime.events.filter(
      (e) => e.startsWith("run:") || e.startsWith("exec:web:") || e === "down"
    );
    expect(commands).toEqual([
      "run:web:bundle exec rails db:migrate",
      "run:web:bundle exec rails db:seed",
      "down",
      "exec:web:bin/tootctl accounts create superadmin --email admin@example.test --confirmed",
      "exec:web:bin/tootctl accounts modify superadmin --role Admin",
      "exec:web:bin/tootctl accounts modify superadmin --disable-2fa",
      "exec:web:bin/tootctl accounts approve superadmin",
    ]);
  });

  it("prepares the database roles before migrating", async () => {
    await sequencer().run();
    expect(mastodon.sql[0]).toContain(
      "SELECT 'CREATE DATABASE mastodon OWNER mastodon'"
    );
    expect(mastodon.sql[0]).toContain("CREATE ROLE mastodon WITH LOGIN PASSWORD 'x';");
  });

  it("advances exactly one stage per step", async () => {
    const seq = sequencer();
    const next = await seq.step(initialBootstrapState);
    expect(next.stage).toBe("services_up");
    expect(runtime.started()).toHaveLength(8);
    expect(initialBootstrapState.stage).toBe("rendered");
  });

  it("leaves a finished state alone", async () => {
    const done: BootstrapState = { stage: "done", admin: null, relaysLoaded: 0 };
    await expect(sequencer().step(done)).resolves.toBe(done);
    expect(BootstrapSequencer.nextStage("done")).toBeNull();
    expect(BootstrapSequencer.nextStage("seeded")).toBe("restarted");
  });

  it("fails admin creation when no password is printed", async () => {
    runtime.execHandler = (service, command, input) =>
      command[1] === "accounts" && command[2] === "create"
        ? ok("OK\n")
        : mastodon.handler(service, command, input);

    const err = await bootstrapFailure(sequencer().run());
    expect(err.stage).toBe("admin_created");
    expect(err.message).toBe("Failed to retrieve the admin password.");
    expect(err.lastState?.stage).toBe("restarted");
    expect(err.lastState?.admin).toBeNull();
  });

  it("names the stage of a failing command and keeps the minted password", async () => {
    runtime.execHandler = (service, command, input) =>
      command[2] === "approve" ? fail("boom", 2) : mastodon.handler(service, command, input);

    const err = await bootstrapFailure(sequencer().run());
    expect(err.stage).toBe("admin_approved");
    expect(err.message).toBe("tootctl accounts approve exited with status 2");
    expect(err.hint).toBe("boom");
    expect(err.lastState?.stage).toBe("admin_2fa_disabled");
    expect(err.lastState?.admin?.password).toBe("test-generated-password");
  });

  it("stops on a failed migration", async () => {
    runtime.runHandler = (_service, command) =>
      command.includes("db:migrate") ? fail("PG::ConnectionBad") : ok();

    const err = await bootstrapFailure(sequencer().run());
    expect(err.stage).toBe("migrated");
    expect(err.message).toBe("rails db:migrate exited with status 1");
    expect(err.lastState?.stage).toBe("db_ready");
    expect(runtime.events).not.toContain("run:web:bundle exec rails db:seed");
  });

  it("gives up when the database never accepts connections", async () => {
    runtime.execHandler = (service, command, input) =>
      command[0] === "pg_isready" ? fail("no response", 2) : mastodon.handler(service, command, input);

    const err = await bootstrapFailure(sequencer(RELAYS, 2000).run());
    expect(err.stage).toBe("db_ready");
    expect(err.message).toBe("Timed out after 2s waiting for PostgreSQL to accept connections");
    expect(err.cause).toBeInstanceOf(WaitTimeoutError);
    expect(err.lastState?.stage).toBe("services_up");
  });

  it("refuses to write relays into an unexpected schema", async () => {
    mastodon.relayColumns = ["created_at", "inbox_url", "state"];

    const err = await bootstrapFailure(sequencer().run());
    expect(err.stage).toBe("relays_loaded");
    expect(err.message).toBe(
      "The relays table does not match the expected schema (missing: follow_activity_id, updated_at)"
    );
    expect(mastodon.sql.some((s) => s.startsWith("INSERT INTO relays"))).toBe(false);
    expect(mastodon.relays).toEqual([]);
  });

  it("fails when fewer relays are present than requested", async () => {
    const err = await bootstrapFailure(
      sequencer([relay("https://relay.example/inbox"), relay("https://relay.example/inbox")]).run()
    );
    expect(err.message).toBe("Expected 2 relays, found 1");
  });

  it("does not duplicate relays when the stage runs twice", async () => {
    const seq = sequencer();
    const approved: BootstrapState = {
      stage: "admin_approved",
      admin: null,
      relaysLoaded: 0,
    };
    await seq.step(approved);
    const again = await seq.step(approved);

    expect(again.relaysLoaded).toBe(2);
    expect(mastodon.relays).toHaveLength(2);
  });
});
