import * as p from "@clack/prompts";
import { isCancel } from "@clack/prompts";
import { isIP } from "node:net";
import type { DeploymentInput } from "./types";

export function normalizeDomain(input: string | null | undefined) {
  if (!input) return null;
  let t = input.trim().toLowerCase();
  // strip scheme, trailing slashes
  t = t.replace(/^\s*https?:\/\//, "").replace(/\/+$/, "");
  return t || null;
}

export function domainLooksValid(val: string) {
  // FQDNs only: labels start/end with alphanumeric, may contain hyphens.
  // No localhost, ACME cannot issue for it.
  const re = /^(?!-)([a-z0-9]([a-z0-9-]{0,61}[a-z0-9])?\.)+[a-z]{2,}$/i;
  return re.test(val);
}

export function ipLooksValid(val: string) {
  return isIP(val.trim()) !== 0;
}

function formatSummary(input: DeploymentInput) {
  return [
    `Domain:              ${input.domain}`,
    `Public IP:           ${input.publicIp}`,
    `Instance URL:        https://${input.domain}`,
  ].join("\n");
}

// Prompt factories for reuse in askAll and editLoop
const prompts = {
  domain: (initialValue?: string) =>
    p.text({
      message: "Domain name",
      placeholder: "mastodon.example.com",
      initialValue,
      validate(v) {
        const t = normalizeDomain(v);
        if (!t) return "Please enter a domain name.";
        if (!domainLooksValid(t)) {
          return "Please enter a valid domain (e.g., mastodon.example.com).";
        }
      },
    }),

  publicIp: (initialValue?: string) =>
    p.text({
      message: "Server's public IP address",
      placeholder: "203.0.113.5",
      initialValue,
      validate(v) {
        if (!v?.trim()) return "Please enter the public IP address.";
        if (!ipLooksValid(v)) return "That doesn't look like an IPv4 or IPv6 address.";
      },
    }),
};

// ---------- main prompts ----------
async function askAll(): Promise<DeploymentInput | null> {
  const result = await p.group(
    {
      domain: () => prompts.domain(),
      publicIp: () => prompts.publicIp(),
    },
    { onCancel: () => p.cancel("Setup cancelled.") }
  );

  if (isCancel(result)) return null;

  const domain = normalizeDomain(result.domain);
  if (!domain) return null;
  return { domain, publicIp: String(result.publicIp).trim() };
}

async function editLoop(
  input: DeploymentInput
): Promise<"confirm" | "start-over" | "cancel"> {
  while (true) {
    p.note(formatSummary(input), "Review configuration");
    const choice = await p.select({
      message: "What would you like to do?",
      options: [
        { value: "confirm", label: "Confirm & continue" },
        { value: "edit", label: "Edit a field" },
        { value: "start-over", label: "Start over" },
        { value: "cancel", label: "Cancel setup" },
      ],
      initialValue: "confirm",
    });
    if (isCancel(choice)) return "cancel";

    if (choice === "confirm") return "confirm";
    if (choice === "start-over") return "start-over";
    if (choice === "cancel") return "cancel";

    // Edit a single field
    const field = await p.select({
      message: "Pick a field to edit",
      options: [
        { value: "domain", label: "Domain" },
        { value: "publicIp", label: "Public IP" },
      ],
    });
    if (isCancel(field)) continue;

    if (field === "domain") {
      const v = await prompts.domain(input.domain);
      const domain = isCancel(v) ? null : normalizeDomain(v);
      if (domain) input.domain = domain;
    } else if (field === "publicIp") {
      const v = await prompts.publicIp(input.publicIp);
      if (!isCancel(v)) input.publicIp = v.trim();
    }
  }
}

// ---------- exported entry ----------
export async function collectDeploymentInput(): Promise<DeploymentInput | null> {
  p.intro("Let’s grab a few details for your instance.");
  p.note(
    "The domain must already point at this server's public IP for TLS to work.",
    "Before you start"
  );

  while (true) {
    const input = await askAll();
    if (!input) return null;

    const next = await editLoop(input);
    if (next === "confirm") {
      p.outro("Configuration captured.");
      return input;
    }
    if (next === "cancel") {
      p.cancel("Setup cancelled.");
      return null;
    }
    // "start-over": ask everything again
  }
}
