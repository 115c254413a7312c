import * as p from "@clack/prompts";
import { isCancel } from "@clack/prompts";
import { execFileSync, spawnSync } from "node:child_process";
import { lookup } from "node:dns/promises";
import process from "node:process";
import type { ComposeCommand } from "./runtime";

type Ok = {
  ok: true;
  name: string;
  version?: string;
  required: boolean;
};

type Fail = {
  ok: false;
  name: string;
  reason: string; // concise, no links here
  required: boolean;
  helpUrl?: string; // rendered once in the outro
  hint?: string; // extra guidance, no links
};

type CheckResult = Ok | Fail;

const MIN_NODE = "20.0.0";

export function compareSemver(a: string, b: string): number {
  const pa = a.split(".").map(Number);
  const pb = b.split(".").map(Number);
  for (let i = 0; i < Math.max(pa.length, pb.length); i++) {
    const x = pa[i] ?? 0;
    const y = pb[i] ?? 0;
    if (x > y) return 1;
    if (x < y) return -1;
  }
  return 0;
}

function getCmdVersion(cmd: string, args = ["--version"], fallbacks = true): string | null {
  const tryArgs = fallbacks ? [args, ["-v"], ["version"]] : [args];
  for (const a of tryArgs) {
    try {
      const out = execFileSync(cmd, a, { stdio: ["ignore", "pipe", "ignore"] })
        .toString()
        .trim();
      // tolerant: 24.0.6, v2.27.1, 1.29.2 build ... → first dotted number
      const m = out.match(/\d+(?:\.\d+){0,3}/);
      return m?.[0] ?? out;
    } catch {
      continue; // flag not supported, or the binary is missing
    }
  }
  return null;
}

function checkNode(required = true): CheckResult {
  const current = process.versions.node;
  if (compareSemver(current, MIN_NODE) < 0) {
    return {
      ok: false,
      name: "Node.js",
      required,
      reason: `Detected ${current}, requires >= ${MIN_NODE}`,
      hint: "Install/update Node 20+ (LTS recommended).",
      helpUrl: "https://nodejs.org/",
    };
  }
  return { ok: true, name: "Node.js", version: current, required };
}

function checkDocker(sudo: boolean, required = true): CheckResult {
  const v = getCmdVersion("docker", ["--version"]);
  if (!v) {
    return {
      ok: false,
      name: "Docker",
      required,
      reason: "CLI not found",
      hint: "Install Docker Engine and ensure the daemon is running.",
      helpUrl: "https://docs.docker.com/engine/install/",
    };
  }

  // Is the daemon reachable?
  const [cmd, ...args] = sudo ? ["sudo", "docker", "info"] : ["docker", "info"];
  const res = spawnSync(cmd ?? "docker", args, {
    stdio: ["ignore", "ignore", "ignore"],
  });
  if (res.status !== 0) {
    return {
      ok: false,
      name: "Docker",
      required,
      reason: "Docker CLI found but the daemon isn’t reachable",
      hint: sudo
        ? "Start the Docker daemon (systemctl start docker)."
        : "Start the Docker daemon, or add your user to the docker group / set DOCKER_SUDO=true.",
      helpUrl: "https://docs.docker.com/engine/install/linux-postinstall/",
    };
  }

  return { ok: true, name: "Docker", version: v, required };
}

/** Compose v2 plugin first, then the standalone docker-compose binary. */
function checkCompose(required = true): { result: CheckResult; command: string[] | null } {
  // no fallback flags: `docker -v` would succeed without the plugin
  const plugin = getCmdVersion("docker", ["compose", "version"], false);
  if (plugin) {
    return {
      result: { ok: true, name: "Docker Compose", version: plugin, required },
      command: ["docker", "compose"],
    };
  }
  const legacy = getCmdVersion("docker-compose", ["--version"]);
  if (legacy) {
    return {
      result: { ok: true, name: "docker-compose", version: legacy, required },
      command: ["docker-compose"],
    };
  }
  return {
    result: {
      ok: false,
      name: "Docker Compose",
      required,
      reason: "Neither `docker compose` nor `docker-compose` found",
      hint: "Install the Docker Compose plugin.",
      helpUrl: "https://docs.docker.com/compose/install/",
    },
    command: null,
  };
}

function renderFailures(failures: Fail[], heading: string): string {
  // Collate a single, clean outro with optional links rendered ONCE.
  const lines: string[] = [heading, ""];
  for (const f of failures) {
    lines.push(`• ${f.name}: ${f.reason}`);
    if (f.hint) lines.push(`  - ${f.hint}`);
    if (f.helpUrl) lines.push(`  - ${f.helpUrl}`);
    lines.push(""); // blank line between items
  }
  return lines.join("\n");
}

async function confirmOrExit(failures: Fail[], heading: string): Promise<void> {
  p.outro(renderFailures(failures, heading));

  if (failures.some((f) => f.required)) {
    p.cancel("Please resolve the above and re-run the installer.");
    process.exit(1);
  }

  const cont = await p.confirm({
    message: "Only recommended checks failed. Continue anyway?",
    initialValue: false,
  });

  if (isCancel(cont) || !cont) {
    p.cancel("Aborted.");
    process.exit(1);
  }
}

/** Verifies the toolchain and returns the compose invocation to use. */
export async function runPreflightOrExit(sudo: boolean): Promise<ComposeCommand> {
  const s = p.spinner();
  p.note(
    "We’ll quickly verify your environment: Node.js, Docker and Docker Compose.",
    "Preflight checks"
  );

  s.start("Checking Node.js");
  const node = checkNode(true);
  s.stop(node.ok ? `Node.js ✓ (${node.version})` : "Node.js ✗");

  s.start("Checking Docker");
  const docker = checkDocker(sudo, true);
  s.stop(docker.ok ? `Docker ✓ (${docker.version})` : "Docker ✗");

  s.start("Checking Docker Compose");
  const compose = checkCompose(true);
  s.stop(
    compose.result.ok
      ? `${compose.result.name} ✓ (${compose.result.version})`
      : "Docker Compose ✗"
  );

  const results = [node, docker, compose.result];
  const failures = results.filter((r): r is Fail => !r.ok);
  if (failures.length > 0) {
    await confirmOrExit(failures, "Some required tools are missing or not ready:");
  }
  if (!compose.command) process.exit(1); // already reported as a required failure

  p.log.message("All requirements satisfied. Onward!");
  return sudo ? ["sudo", ...compose.command] : compose.command;
}

async function checkDomainResolves(domain: string, ip: string): Promise<CheckResult> {
  const name = `DNS for ${domain}`;
  try {
    const addresses = await lookup(domain, { all: true });
    if (addresses.some((a) => a.address === ip)) {
      return { ok: true, name, version: ip, required: false };
    }
    return {
      ok: false,
      name,
      required: false,
      reason: `resolves to ${addresses.map((a) => a.address).join(", ")}, not ${ip}`,
      hint: "Point the domain's A record at this server; certificate issuance fails otherwise.",
    };
  } catch (err) {
    const code = err instanceof Error && "code" in err ? String(err.code) : "lookup failed";
    return {
      ok: false,
      name,
      required: false,
      reason: `does not resolve (${code})`,
      hint: "Create an A record for the domain pointing at this server.",
    };
  }
}

/** Recommended check: ACME issuance needs the domain to point here. */
export async function runDnsCheckOrExit(domain: string, ip: string): Promise<void> {
  const s = p.spinner();
  s.start(`Resolving ${domain}`);
  const dns = await checkDomainResolves(domain, ip);
  s.stop(dns.ok ? `${dns.name} ✓ (${ip})` : `${dns.name} ✗`);
  if (!dns.ok) {
    await confirmOrExit([dns], "The domain does not point at this server yet:");
  }
}
