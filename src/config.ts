import { z } from "zod";
import { ProvisionError } from "./errors";

const REQUIRED_VARIABLES = [
  "POSTGRES_PASSWORD",
  "REDIS_PASSWORD",
  "LETS_ENCRYPT_EMAIL",
] as const;
export type RequiredVariable = (typeof REQUIRED_VARIABLES)[number];

const EXAMPLE_VALUES: Record<RequiredVariable, string> = {
  POSTGRES_PASSWORD: "your_secure_db_password",
  REDIS_PASSWORD: "your_secure_redis_password",
  LETS_ENCRYPT_EMAIL: "your_certificate_management_email",
};

const booleanFlag = z
  .enum(["true", "false", "1", "0", "yes", "no"])
  .default("false")
  .transform((v) => v === "true" || v === "1" || v === "yes");

const seconds = (fallback: number) =>
  z.coerce.number().int().nonnegative().default(fallback);

const EnvironmentSchema = z.object({
  POSTGRES_PASSWORD: z.string().min(1),
  REDIS_PASSWORD: z.string().min(1),
  LETS_ENCRYPT_EMAIL: z.string().trim().email("must be a valid e-mail address"),
  MASTODON_VERSION: z.string().trim().min(1).default("v4.2.10"),
  DEPLOY_DIR: z.string().trim().min(1).default("mastodon"),
  ADMIN_USERNAME: z
    .string()
    .trim()
    .regex(/^[a-z0-9_]{1,30}$/i, "letters, digits and underscores only")
    .default("superadmin"),
  DOCKER_SUDO: booleanFlag,
  HEALTH_TIMEOUT_SECONDS: seconds(300),
  INSTANCE_READY_TIMEOUT_SECONDS: seconds(600),
  FOLLOW_DELAY_SECONDS: seconds(5),
});

export interface ProvisionEnvironment {
  postgresPassword: string;
  redisPassword: string;
  operatorEmail: string;
  mastodonVersion: string;
  deployDir: string;
  adminUsername: string;
  useSudo: boolean;
  healthTimeoutMs: number;
  instanceReadyTimeoutMs: number;
  followDelayMs: number;
}

type RawEnv = Record<string, string | undefined>;

/** Blank values count as unset, so defaults apply and required ones fail. */
function present(env: RawEnv): RawEnv {
  const out: RawEnv = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== "") out[key] = value;
  }
  return out;
}

export function missingVariables(env: RawEnv): RequiredVariable[] {
  return REQUIRED_VARIABLES.filter((name) => !env[name]?.trim());
}

/**
 * Read and validate the process environment. Throws a precondition error
 * naming every missing required variable before anything else happens.
 */
export function loadEnvironment(env: RawEnv = process.env): ProvisionEnvironment {
  const missing = missingVariables(env);
  if (missing.length > 0) {
    const exports = missing.map(
      (name) => `export ${name}='${EXAMPLE_VALUES[name]}'`
    );
    throw new ProvisionError(
      "precondition",
      `Missing required environment variable${missing.length > 1 ? "s" : ""}: ${missing.join(", ")}`,
      { hint: ["Set them before running, for example:", ...exports].join("\n    ") }
    );
  }

  const parsed = EnvironmentSchema.safeParse(present(env));
  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (i) => `${i.path.join(".")}: ${i.message}`
    );
    throw new ProvisionError("precondition", `Invalid environment: ${issues.join("; ")}`);
  }

  const e = parsed.data;
  return {
    postgresPassword: e.POSTGRES_PASSWORD,
    redisPassword: e.REDIS_PASSWORD,
    operatorEmail: e.LETS_ENCRYPT_EMAIL,
    mastodonVersion: e.MASTODON_VERSION,
    deployDir: e.DEPLOY_DIR,
    adminUsername: e.ADMIN_USERNAME,
    useSudo: e.DOCKER_SUDO,
    healthTimeoutMs: e.HEALTH_TIMEOUT_SECONDS * 1000,
    instanceReadyTimeoutMs: e.INSTANCE_READY_TIMEOUT_SECONDS * 1000,
    followDelayMs: e.FOLLOW_DELAY_SECONDS * 1000,
  };
}
