import { ProvisionError } from "./errors";
import type { DeploymentConfig } from "./types";

const ACME_DIRECTORY_URL = "https://acme-v02.api.letsencrypt.org/directory";
export const KAFKA_TOPIC = "activitypub_events";
const RETENTION_SECONDS = 31556952; // one year

const IMMUTABLE_ASSET_PATHS = [
  "/emoji*",
  "/packs*",
  "/system/accounts/avatars*",
  "/system/media_attachments/files*",
];

type RequiredField = [label: string, value: string];

function requiredFields(config: DeploymentConfig): RequiredField[] {
  return [
    ["domain", config.domain],
    ["public IP", config.publicIp],
    ["operator email", config.operatorEmail],
    ["PostgreSQL password", config.datastore.postgresPassword],
    ["Redis password", config.datastore.redisPassword],
    ["SECRET_KEY_BASE", config.secrets.secretKeyBase],
    ["OTP_SECRET", config.secrets.otpSecret],
    ["VAPID private key", config.secrets.vapid.privateKey],
    ["VAPID public key", config.secrets.vapid.publicKey],
  ];
}

/** Every templated value must be present and fit on one line. */
export function validateDeploymentConfig(config: DeploymentConfig): void {
  for (const [label, value] of requiredFields(config)) {
    if (!value.trim()) {
      throw new ProvisionError("render", `Cannot render configuration: ${label} is blank.`);
    }
    if (/[\r\n]/.test(value)) {
      throw new ProvisionError(
        "render",
        `Cannot render configuration: ${label} contains a line break.`
      );
    }
    // env file values with special characters are single-quoted
    if (value.includes("'")) {
      throw new ProvisionError(
        "render",
        `Cannot render configuration: ${label} contains a single quote.`
      );
    }
  }
}

export function redisUrl(password: string): string {
  return `redis://:${encodeURIComponent(password)}@redis:6379/0`;
}

const PLAIN_ENV_VALUE = /^[\w.,:/@%+=-]*$/;

/** Single-quoted values are read literally by compose's env_file parser and dotenv. */
export function envValue(value: string | number | boolean): string {
  const text = String(value);
  return PLAIN_ENV_VALUE.test(text) ? text : `'${text}'`;
}

function section(title: string, entries: [string, string | number | boolean][]): string {
  return [`# ${title}`, ...entries.map(([k, v]) => `${k}=${envValue(v)}`)].join("\n");
}

/** `.env.production`, read by every Mastodon and broker container. */
export function renderEnvFile(config: DeploymentConfig): string {
  validateDeploymentConfig(config);
  const { datastore, secrets, publicIp } = config;

  return (
    [
      section("Federation", [
        ["LOCAL_DOMAIN", config.domain],
        ["SINGLE_USER_MODE", true],
        ["ENABLE_REGISTRATIONS", false],
        ["LETS_ENCRYPT_EMAIL", config.operatorEmail],
      ]),
      section("Redis", [
        ["REDIS_HOST", "redis"],
        ["REDIS_PORT", 6379],
        ["REDIS_PASSWORD", datastore.redisPassword],
        ["REDIS_URL", redisUrl(datastore.redisPassword)],
      ]),
      section("PostgreSQL", [
        ["DB_HOST", "db"],
        ["DB_PORT", 5432],
        ["DB_NAME", "mastodon"],
        ["DB_USER", "mastodon"],
        ["DB_PASS", datastore.postgresPassword],
        ["POSTGRES_DB", "mastodon"],
        ["POSTGRES_USER", "mastodon"],
        ["POSTGRES_PASSWORD", datastore.postgresPassword],
      ]),
      section("Secrets (generated automatically)", [
        ["SECRET_KEY_BASE", secrets.secretKeyBase],
        ["OTP_SECRET", secrets.otpSecret],
        ["VAPID_PRIVATE_KEY", secrets.vapid.privateKey],
        ["VAPID_PUBLIC_KEY", secrets.vapid.publicKey],
      ]),
      section("Kafka (single node, KRaft)", [
        ["KAFKA_ADVERTISED_HOST", publicIp],
        ["KAFKA_BROKER", "kafka:9092"],
        ["KAFKA_TOPIC", KAFKA_TOPIC],
        ["KAFKA_CFG_NODE_ID", 1],
        ["KAFKA_CFG_PROCESS_ROLES", "controller,broker"],
        ["KAFKA_CFG_CONTROLLER_QUORUM_VOTERS", "1@kafka:9093"],
        ["KAFKA_CFG_LISTENERS", "PLAINTEXT://:9092,CONTROLLER://:9093"],
        ["KAFKA_CFG_ADVERTISED_LISTENERS", `PLAINTEXT://${publicIp}:9092`],
        ["KAFKA_CFG_LISTENER_SECURITY_PROTOCOL_MAP", "CONTROLLER:PLAINTEXT,PLAINTEXT:PLAINTEXT"],
        ["KAFKA_CFG_CONTROLLER_LISTENER_NAMES", "CONTROLLER"],
      ]),
      section("IP and session retention", [
        ["IP_RETENTION_PERIOD", RETENTION_SECONDS],
        ["SESSION_RETENTION_PERIOD", RETENTION_SECONDS],
      ]),
    ].join("\n\n") + "\n"
  );
}

/** Caddyfile with ACME issuance and per-path routing to the backends. */
export function renderCaddyfile(config: DeploymentConfig): string {
  validateDeploymentConfig(config);

  const cacheHeaders = IMMUTABLE_ASSET_PATHS.map(
    (p) => `\theader ${p} Cache-Control "public, max-age=31536000, immutable"`
  );

  return [
    "{",
    `\temail ${config.operatorEmail}`,
    `\tacme_ca ${ACME_DIRECTORY_URL}`,
    "}",
    "",
    `${config.domain} {`,
    "\tlog {",
    "\t\toutput file /logs/access.log",
    "\t}",
    "",
    "\troot * /opt/mastodon/public",
    "\tencode gzip",
    "",
    "\thandle /.well-known/acme-challenge/* {",
    "\t\troot * /opt/mastodon/public",
    "\t}",
    "\thandle /inbox* {",
    "\t\treverse_proxy kafka_sender:3001",
    "\t}",
    "\thandle /actor/inbox* {",
    "\t\treverse_proxy kafka_sender:3001",
    "\t}",
    "\thandle /api/v1/streaming* {",
    "\t\treverse_proxy streaming:4000",
    "\t}",
    "\thandle {",
    "\t\treverse_proxy web:3000",
    "\t}",
    "",
    "\theader {",
    '\t\tStrict-Transport-Security "max-age=31536000;"',
    "\t}",
    '\theader /sw.js Cache-Control "public, max-age=0"',
    ...cacheHeaders,
    "",
    "\thandle_errors {",
    "\t\t@5xx expression {http.error.status_code} >= 500 && {http.error.status_code} < 600",
    "\t\trewrite @5xx /500.html",
    "\t}",
    "}",
    "",
  ].join("\n");
}
