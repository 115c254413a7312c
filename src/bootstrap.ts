import * as p from "@clack/prompts";
import pc from "picocolors";
import {
  pgIsReadyCommand,
  prepareDatabaseSql,
  psql,
  RELAY_COLUMNS,
  relayColumnsSql,
  relayCountSql,
  relayInsertSql,
} from "./database";
import { isProvisionError, ProvisionError, type ProvisionErrorOptions } from "./errors";
import { type CommandResult, type ExecOptions, tail } from "./runtime";
import type { AdminAccount, DeploymentConfig, RelayEntry, Topology } from "./types";
import { type Clock, waitFor } from "./wait";

const BOOTSTRAP_STAGES = [
  "rendered",
  "services_up",
  "db_ready",
  "migrated",
  "seeded",
  "restarted",
  "admin_created",
  "admin_roled",
  "admin_2fa_disabled",
  "admin_approved",
  "relays_loaded",
  "done",
] as const;
export type BootstrapStage = (typeof BOOTSTRAP_STAGES)[number];

export interface BootstrapState {
  readonly stage: BootstrapStage;
  readonly admin: Readonly<AdminAccount> | null;
  readonly relaysLoaded: number;
}

export const initialBootstrapState: BootstrapState = Object.freeze({
  stage: "rendered",
  admin: null,
  relaysLoaded: 0,
});

export class BootstrapError extends ProvisionError {
  readonly stage: BootstrapStage;
  /** Last completed state, so credentials minted before the failure survive */
  lastState: BootstrapState | null = null;

  constructor(stage: BootstrapStage, message: string, options: ProvisionErrorOptions = {}) {
    super("bootstrap", message, options);
    this.name = "BootstrapError";
    this.stage = stage;
  }
}

/** Subset of the orchestrator the sequencer drives. */
export interface DeploymentDriver {
  up(topology: Topology): Promise<void>;
  restart(topology: Topology): Promise<void>;
  runOnce(service: string, command: string[]): Promise<CommandResult>;
  exec(service: string, command: string[], options?: ExecOptions): Promise<CommandResult>;
}

export interface BootstrapContext {
  driver: DeploymentDriver;
  topology: Topology;
  config: DeploymentConfig;
  relays: readonly RelayEntry[];
  adminUsername: string;
  adminRole?: string;
  dbReadyTimeoutMs: number;
  clock?: Clock;
}

const NEW_PASSWORD = /^New password:[ \t]*(\S+)[ \t]*$/m;

/**
 * tootctl prints the generated password as `New password: <value>`; it has
 * no structured output, so this line is the only source.
 */
export function parseGeneratedPassword(output: string): string | null {
  return NEW_PASSWORD.exec(output)?.[1] ?? null;
}

function tootctl(...args: string[]): string[] {
  return ["bin/tootctl", ...args];
}

type Transition = (state: BootstrapState) => Promise<BootstrapState>;

export class BootstrapSequencer {
  private readonly transitions: Record<Exclude<BootstrapStage, "rendered">, Transition>;

  constructor(private readonly ctx: BootstrapContext) {
    this.transitions = {
      services_up: async (s) => {
        await ctx.driver.up(ctx.topology);
        return { ...s, stage: "services_up" };
      },
      db_ready: (s) => this.prepareDatabase(s),
      migrated: async (s) => {
        await this.check("migrated", "rails db:migrate", ctx.driver.runOnce("web", ["bundle", "exec", "rails", "db:migrate"]));
        return { ...s, stage: "migrated" };
      },
      seeded: async (s) => {
        await this.check("seeded", "rails db:seed", ctx.driver.runOnce("web", ["bundle", "exec", "rails", "db:seed"]));
        return { ...s, stage: "seeded" };
      },
      restarted: async (s) => {
        await ctx.driver.restart(ctx.topology);
        return { ...s, stage: "restarted" };
      },
      admin_created: (s) => this.createAdmin(s),
      admin_roled: async (s) => {
        const admin = this.requireAdmin(s, "admin_roled");
        const role = ctx.adminRole ?? "Admin";
        await this.check(
          "admin_roled",
          "tootctl accounts modify --role",
          ctx.driver.exec("web", tootctl("accounts", "modify", admin.username, "--role", role))
        );
        return { ...s, stage: "admin_roled", admin: { ...admin, role } };
      },
      admin_2fa_disabled: async (s) => {
        const admin = this.requireAdmin(s, "admin_2fa_disabled");
        await this.check(
          "admin_2fa_disabled",
          "tootctl accounts modify --disable-2fa",
          ctx.driver.exec("web", tootctl("accounts", "modify", admin.username, "--disable-2fa"))
        );
        return { ...s, stage: "admin_2fa_disabled", admin: { ...admin, twoFactor: "disabled" } };
      },
      admin_approved: async (s) => {
        const admin = this.requireAdmin(s, "admin_approved");
        await this.check(
          "admin_approved",
          "tootctl accounts approve",
          ctx.driver.exec("web", tootctl("accounts", "approve", admin.username))
        );
        return { ...s, stage: "admin_approved", admin: { ...admin, confirmation: "approved" } };
      },
      relays_loaded: (s) => this.loadRelays(s),
      done: async (s) => ({ ...s, stage: "done" }),
    };
  }

  static nextStage(stage: BootstrapStage): BootstrapStage | null {
    return BOOTSTRAP_STAGES[BOOTSTRAP_STAGES.indexOf(stage) + 1] ?? null;
  }

  /** Perform the single transition out of `state.stage`. */
  async step(state: BootstrapState): Promise<BootstrapState> {
    const target = BootstrapSequencer.nextStage(state.stage);
    if (target === null || target === "rendered") return state;

    p.log.step(`Bootstrap: ${pc.bold(target.replace(/_/g, " "))}`);
    try {
      return Object.freeze(await this.transitions[target](state));
    } catch (err) {
      const failure =
        err instanceof BootstrapError
          ? err
          : new BootstrapError(target, err instanceof Error ? err.message : String(err), {
              cause: err,
              hint: isProvisionError(err) ? err.hint : undefined,
            });
      failure.lastState = state;
      throw failure;
    }
  }

  /** Run every remaining transition in order. */
  async run(state: BootstrapState = initialBootstrapState): Promise<BootstrapState> {
    let current = state;
    while (current.stage !== "done") {
      current = await this.step(current);
    }
    return current;
  }

  private async check(
    stage: BootstrapStage,
    what: string,
    pending: Promise<CommandResult>
  ): Promise<CommandResult> {
    const res = await pending;
    if (res.exitCode !== 0) {
      throw new BootstrapError(stage, `${what} exited with status ${res.exitCode}`, {
        hint: tail(res.stderr || res.stdout) || undefined,
      });
    }
    return res;
  }

  private requireAdmin(state: BootstrapState, stage: BootstrapStage): Readonly<AdminAccount> {
    if (!state.admin) {
      throw new BootstrapError(stage, "No admin account in the bootstrap state");
    }
    return state.admin;
  }

  private async prepareDatabase(state: BootstrapState): Promise<BootstrapState> {
    const { driver, config, clock, dbReadyTimeoutMs } = this.ctx;

    await waitFor(
      "PostgreSQL to accept connections",
      async () => (await driver.exec("db", pgIsReadyCommand())).exitCode === 0,
      { timeoutMs: dbReadyTimeoutMs, clock }
    );
    await this.check(
      "db_ready",
      "database preparation",
      psql(driver, prepareDatabaseSql(config.datastore.postgresPassword))
    );
    return { ...state, stage: "db_ready" };
  }

  private async createAdmin(state: BootstrapState): Promise<BootstrapState> {
    const { driver, config, adminUsername } = this.ctx;
    p.log.info(`Creating admin ${pc.bold(adminUsername)} <${config.operatorEmail}> (no e-mail confirmation)`);

    const res = await this.check(
      "admin_created",
      "tootctl accounts create",
      driver.exec(
        "web",
        tootctl("accounts", "create", adminUsername, "--email", config.operatorEmail, "--confirmed")
      )
    );

    const password = parseGeneratedPassword(res.stdout);
    if (!password) {
      throw new BootstrapError("admin_created", "Failed to retrieve the admin password.", {
        hint: `Reset it by hand: docker compose exec web bin/tootctl accounts modify ${adminUsername} --reset-password`,
      });
    }

    p.log.success("Admin account created. The password is shown at the end of the run.");
    return {
      ...state,
      stage: "admin_created",
      admin: {
        username: adminUsername,
        email: config.operatorEmail,
        password,
        role: null,
        confirmation: "confirmed",
        twoFactor: "enabled",
      },
    };
  }

  private async loadRelays(state: BootstrapState): Promise<BootstrapState> {
    const { driver, relays, config } = this.ctx;

    const cols = await this.check("relays_loaded", "relay schema check", psql(driver, relayColumnsSql()));
    const present = new Set(cols.stdout.split("\n").map((l) => l.trim()).filter(Boolean));
    const missing = RELAY_COLUMNS.filter((c) => !present.has(c));
    if (missing.length > 0) {
      throw new BootstrapError(
        "relays_loaded",
        `The relays table does not match the expected schema (missing: ${missing.join(", ")})`,
        { hint: `Relays are written directly to the database; check compatibility with Mastodon ${config.mastodonVersion}.` }
      );
    }

    await this.check("relays_loaded", "relay insert", psql(driver, relayInsertSql(relays)));
    const counted = await this.check("relays_loaded", "relay count", psql(driver, relayCountSql(relays)));
    const loaded = Number.parseInt(counted.stdout.trim(), 10);
    if (loaded !== relays.length) {
      throw new BootstrapError(
        "relays_loaded",
        `Expected ${relays.length} relays, found ${Number.isNaN(loaded) ? "none" : loaded}`
      );
    }

    p.log.success(`${loaded} relay subscriptions in place`);
    return { ...state, stage: "relays_loaded", relaysLoaded: loaded };
  }
}
