import type { CommandResult, ExecOptions } from "./runtime";
import type { RelayEntry } from "./types";

const DB_SERVICE = "db";
export const DB_NAME = "mastodon";
export const DB_USER = "mastodon";

/** Columns the relay insert writes; checked against the live schema first. */
export const RELAY_COLUMNS = [
  "created_at",
  "follow_activity_id",
  "inbox_url",
  "state",
  "updated_at",
] as const;

export interface CommandRunner {
  exec(service: string, command: string[], options?: ExecOptions): Promise<CommandResult>;
}

export function sqlLiteral(value: string | null): string {
  return value === null ? "NULL" : `'${value.replace(/'/g, "''")}'`;
}

/** Run SQL through psql in the db container; unaligned, tuples only. */
export function psql(runner: CommandRunner, sql: string): Promise<CommandResult> {
  return runner.exec(
    DB_SERVICE,
    ["psql", "-U", DB_USER, "-d", DB_NAME, "-v", "ON_ERROR_STOP=1", "-tA", "-f", "-"],
    { input: sql }
  );
}

export function pgIsReadyCommand(): string[] {
  return ["pg_isready", "-U", DB_USER, "-d", DB_NAME];
}

/**
 * Roles and database Mastodon expects. Only creates what is missing, so a
 * re-run is harmless. CREATE DATABASE cannot run inside DO, hence \gexec.
 */
export function prepareDatabaseSql(password: string): string {
  const pw = sqlLiteral(password);
  return [
    "DO $$",
    "BEGIN",
    "    IF NOT EXISTS (SELECT 1 FROM pg_roles WHERE rolname = 'postgres') THEN",
    `        CREATE ROLE postgres WITH SUPERUSER CREATEDB CREATEROLE LOGIN PASSWORD ${pw};`,
    "    END IF;",
    `    IF NOT EXISTS (SELECT 1 FROM pg_roles WHERE rolname = '${DB_USER}') THEN`,
    `        CREATE ROLE ${DB_USER} WITH LOGIN PASSWORD ${pw};`,
    "    END IF;",
    "END",
    "$$;",
    `SELECT 'CREATE DATABASE ${DB_NAME} OWNER ${DB_USER}'`,
    `    WHERE NOT EXISTS (SELECT 1 FROM pg_database WHERE datname = '${DB_NAME}')\\gexec`,
    `GRANT ALL PRIVILEGES ON DATABASE ${DB_NAME} TO ${DB_USER};`,
    "",
  ].join("\n");
}

export function relayColumnsSql(): string {
  return [
    "SELECT column_name FROM information_schema.columns",
    "    WHERE table_schema = 'public' AND table_name = 'relays'",
    "    ORDER BY column_name;",
    "",
  ].join("\n");
}

function relayValues(entries: readonly RelayEntry[]): string {
  return entries
    .map((e) => `    (${sqlLiteral(e.inboxUrl)}, ${sqlLiteral(e.followActivityId)}, ${e.state})`)
    .join(",\n");
}

/**
 * Writes straight into Mastodon's relays table, bypassing its admin flow.
 * Inbox URLs already present are left alone.
 */
export function relayInsertSql(entries: readonly RelayEntry[]): string {
  return [
    "INSERT INTO relays (inbox_url, follow_activity_id, created_at, updated_at, state)",
    "SELECT v.inbox_url, v.follow_activity_id, NOW(), NOW(), v.state",
    "FROM (VALUES",
    relayValues(entries),
    ") AS v(inbox_url, follow_activity_id, state)",
    "WHERE NOT EXISTS (SELECT 1 FROM relays r WHERE r.inbox_url = v.inbox_url);",
    "",
  ].join("\n");
}

/** Distinct entries present with the expected state. */
export function relayCountSql(entries: readonly RelayEntry[]): string {
  return [
    "SELECT count(DISTINCT r.inbox_url) FROM relays r",
    "JOIN (VALUES",
    relayValues(entries),
    ") AS v(inbox_url, follow_activity_id, state)",
    "    ON r.inbox_url = v.inbox_url AND r.state = v.state;",
    "",
  ].join("\n");
}
