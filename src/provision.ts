import * as p from "@clack/prompts";
import path from "node:path";
import pc from "picocolors";
import { BootstrapError, BootstrapSequencer } from "./bootstrap";
import { loadFollowTargets, loadRelayEntries } from "./catalog";
import type { ProvisionEnvironment } from "./config";
import { FederationClient } from "./federation";
import { fileExists, type RenderedFile, writeDeploymentFiles } from "./files";
import { Orchestrator } from "./orchestrator";
import { renderCaddyfile, renderEnvFile, validateDeploymentConfig } from "./render";
import type { ContainerRuntime } from "./runtime";
import { generateSecrets } from "./secrets";
import { buildTopology, ENV_FILE, renderComposeFile } from "./topology";
import type {
  DeploymentConfig,
  DeploymentInput,
  FollowOutcome,
  GeneratedSecrets,
  ProvisionResult,
  RelayEntry,
  Topology,
} from "./types";
import type { Clock } from "./wait";

export interface ProvisionDeps {
  createRuntime: (projectDir: string) => ContainerRuntime;
  fetch?: typeof fetch;
  clock?: Clock;
  generateSecrets?: () => GeneratedSecrets;
  relays?: readonly RelayEntry[];
  followTargets?: readonly string[];
}

function createDeploymentConfig(
  input: DeploymentInput,
  env: ProvisionEnvironment,
  secrets: GeneratedSecrets
): DeploymentConfig {
  const config: DeploymentConfig = {
    domain: input.domain,
    publicIp: input.publicIp,
    operatorEmail: env.operatorEmail,
    mastodonVersion: env.mastodonVersion,
    secrets: Object.freeze({ ...secrets, vapid: Object.freeze({ ...secrets.vapid }) }),
    datastore: Object.freeze({
      postgresPassword: env.postgresPassword,
      redisPassword: env.redisPassword,
    }),
  };
  validateDeploymentConfig(config);
  return Object.freeze(config);
}

function renderDeploymentFiles(config: DeploymentConfig, topology: Topology): RenderedFile[] {
  return [
    { relPath: ENV_FILE, contents: renderEnvFile(config), secret: true },
    { relPath: "Caddyfile", contents: renderCaddyfile(config), secret: false },
    // carries the datastore passwords inline
    { relPath: "docker-compose.yml", contents: renderComposeFile(topology), secret: true },
  ];
}

function summarizeOutcomes(outcomes: FollowOutcome[]): string {
  const count = (status: FollowOutcome["status"]) =>
    outcomes.filter((o) => o.status === status).length;
  return `${count("followed")} followed, ${count("skipped")} not found, ${count("failed")} failed`;
}

/**
 * Full run: render and write config, bring the stack up, bootstrap it and
 * establish the initial follows. Throws ProvisionError on anything fatal.
 */
export async function provision(
  input: DeploymentInput,
  env: ProvisionEnvironment,
  deps: ProvisionDeps
): Promise<ProvisionResult> {
  const deployDir = path.resolve(process.cwd(), env.deployDir);

  if (await fileExists(path.join(deployDir, ENV_FILE))) {
    p.log.warn(
      [
        `${ENV_FILE} already exists in ${deployDir} and will be overwritten.`,
        "New secrets are generated: existing sessions and push subscriptions stop working.",
      ].join("\n")
    );
  }

  const config = createDeploymentConfig(input, env, (deps.generateSecrets ?? generateSecrets)());
  const topology = buildTopology(config);
  const files = renderDeploymentFiles(config, topology);

  const written = await writeDeploymentFiles(deployDir, files);
  p.note(written.written.map((f) => path.relative(process.cwd(), f)).join("\n"), "Configuration written");
  if (!written.uploadDirOwned) {
    p.log.warn(
      `Not running as root: make the upload directory writable for the containers with\n` +
        pc.magenta(`sudo chown -R 1001:1001 ${written.uploadDir}`)
    );
  }

  const orchestrator = new Orchestrator(deps.createRuntime(deployDir), {
    healthTimeoutMs: env.healthTimeoutMs,
    clock: deps.clock,
  });
  const sequencer = new BootstrapSequencer({
    driver: orchestrator,
    topology,
    config,
    relays: deps.relays ?? loadRelayEntries(),
    adminUsername: env.adminUsername,
    dbReadyTimeoutMs: env.healthTimeoutMs,
    clock: deps.clock,
  });

  const state = await sequencer.run();
  if (!state.admin) {
    throw new BootstrapError("done", "Bootstrap finished without an admin account");
  }
  const admin = { ...state.admin };

  p.log.step("Federation: following accounts on other instances");
  const client = new FederationClient(`https://${config.domain}`, {
    fetch: deps.fetch,
    clock: deps.clock,
  });
  await client.waitUntilReady(env.instanceReadyTimeoutMs);
  const app = await client.registerApp();
  p.log.info(`Application registered (client_id ${app.clientId})`);
  const token = await client.getToken(app, admin.email, admin.password);

  const outcomes = await client.followAll(
    deps.followTargets ?? loadFollowTargets(),
    token,
    env.followDelayMs
  );
  p.log.info(`All handles processed: ${summarizeOutcomes(outcomes)}`);

  return {
    config,
    deployDir,
    admin,
    outcomes,
    finishedAtIso: new Date().toISOString(),
  };
}
