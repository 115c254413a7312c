import * as p from "@clack/prompts";
import { isCancel } from "@clack/prompts";
import pc from "picocolors";
import { BootstrapError } from "./bootstrap";
import { loadEnvironment } from "./config";
import { describeFailure } from "./errors";
import { copyToClipboard } from "./files";
import { collectDeploymentInput } from "./metadata";
import { runDnsCheckOrExit, runPreflightOrExit } from "./preflight";
import { provision } from "./provision";
import { ComposeRuntime } from "./runtime";
import type { AdminAccount, ProvisionResult } from "./types";

// If someone runs via non-interactive shell (CI), degrade gracefully
const isTTY = process.stdout.isTTY && process.stdin.isTTY;

async function pressEnterToContinue(message = "Press Enter to continue") {
  const res = await p.text({
    message: pc.dim(message),
    placeholder: "",
    initialValue: "",
  });
  if (isCancel(res)) {
    p.cancel("Cancelled.");
    process.exit(1);
  }
}

function credentialLines(admin: Readonly<AdminAccount>): string[] {
  return [
    `Username: ${admin.username}`,
    `Email:    ${admin.email}`,
    `Password: ${admin.password}`,
  ];
}

async function offerCredentialCopy(admin: Readonly<AdminAccount>) {
  const copyConfirm = await p.confirm({
    message: "Copy the admin credentials to the clipboard?",
    initialValue: false,
  });
  if (isCancel(copyConfirm) || !copyConfirm) return;

  const text = credentialLines(admin).join("\n");
  const copied = await copyToClipboard(text);
  if (copied) p.note("Credentials copied to clipboard.", "Copied");
  else
    p.note(
      ["Could not access the clipboard.", "Copy them from above instead."].join("\n"),
      "Copy manually"
    );
}

async function showSummary(result: ProvisionResult) {
  const { config, admin } = result;
  p.note(
    [
      `🌐 https://${config.domain}`,
      "",
      pc.bold("👤 Admin account"),
      ...credentialLines(admin),
      "",
      pc.yellow("⚠️  Log in and change the generated password."),
    ].join("\n"),
    "Setup complete"
  );
  p.log.message(
    [
      "Caddy may need a few more minutes to finish TLS issuance. If the site is not",
      `reachable, check ${pc.magenta("docker compose logs caddy")} in ${result.deployDir}.`,
      `Broker endpoint for downstream consumers: ${pc.bold(`${config.publicIp}:9092`)}`,
      "Relay subscriptions will start delivering posts from the larger instances.",
    ].join("\n")
  );
  await offerCredentialCopy(admin);
}

async function main() {
  if (!isTTY) {
    // Non-TTY fallback (e.g., piping or CI)
    console.log("The Mastodon provisioner requires an interactive terminal.");
    process.exit(1);
  }

  p.intro(pc.cyan(pc.bold("🐘  Mastodon instance provisioner")));
  p.log.message(
    "This CLI will render your configuration, start Mastodon with PostgreSQL, Redis,\n" +
      "Kafka and Caddy, create an admin account, subscribe to relays and follow a\n" +
      "starter set of accounts on other instances."
  );

  // Secrets come from the environment; check them before touching anything.
  const env = loadEnvironment();

  // 🔽 Pause here until the user presses Enter
  await pressEnterToContinue();

  const compose = await runPreflightOrExit(env.useSudo);

  const input = await collectDeploymentInput();
  if (!input) process.exit(1);

  await runDnsCheckOrExit(input.domain, input.publicIp);

  const result = await provision(input, env, {
    createRuntime: (projectDir) => new ComposeRuntime(projectDir, compose),
  });
  await showSummary(result);

  p.outro(pc.green("✅ Mastodon deployment completed."));
  process.exit(0);
}

main().catch((err: unknown) => {
  const lines = describeFailure(err);
  if (err instanceof BootstrapError) {
    lines.push(`  - failed at stage: ${err.stage}`);
    const admin = err.lastState?.admin;
    if (admin) {
      lines.push("", "The admin account was created before the failure:", ...credentialLines(admin));
    }
  }
  p.log.error(pc.red(lines.join("\n")));
  p.cancel("Deployment aborted. Completed steps were left in place.");
  process.exit(1);
});
