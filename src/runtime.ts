import { spawn } from "node:child_process";
import { ProvisionError } from "./errors";

export type HealthStatus = "healthy" | "starting" | "unhealthy" | "running" | "stopped";

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export interface ExecOptions {
  /** Piped to the command's stdin */
  input?: string;
}

/** What the orchestrator needs from a container engine. */
export interface ContainerRuntime {
  start(service: string): Promise<void>;
  health(service: string): Promise<HealthStatus>;
  /** One-off command in a fresh container, removed afterwards. */
  run(service: string, command: string[]): Promise<CommandResult>;
  /** Command inside the already-running container. */
  exec(service: string, command: string[], options?: ExecOptions): Promise<CommandResult>;
  down(): Promise<void>;
}

/** `["docker", "compose"]`, `["docker-compose"]`, optionally behind sudo. */
export type ComposeCommand = readonly string[];

export function invoke(
  argv: readonly string[],
  options: { cwd?: string; input?: string } = {}
): Promise<CommandResult> {
  const [cmd, ...args] = argv;
  if (!cmd) return Promise.reject(new Error("Empty command"));

  return new Promise((resolve, reject) => {
    const child = spawn(cmd, args, {
      cwd: options.cwd,
      stdio: ["pipe", "pipe", "pipe"],
    });
    const stdout: Buffer[] = [];
    const stderr: Buffer[] = [];
    child.stdout.on("data", (chunk: Buffer) => stdout.push(chunk));
    child.stderr.on("data", (chunk: Buffer) => stderr.push(chunk));
    child.on("error", reject);
    // EPIPE when the command exits without reading its input
    child.stdin.on("error", reject);
    child.on("close", (code) => {
      resolve({
        exitCode: code ?? 1,
        stdout: Buffer.concat(stdout).toString("utf8"),
        stderr: Buffer.concat(stderr).toString("utf8"),
      });
    });
    child.stdin.end(options.input ?? "");
  });
}

/** Last non-empty lines of a command's output, for error messages. */
export function tail(text: string, lines = 5): string {
  return text
    .split("\n")
    .map((l) => l.trimEnd())
    .filter(Boolean)
    .slice(-lines)
    .join("\n");
}

export function parseHealth(inspectOutput: string): HealthStatus {
  const [state = "", health = ""] = inspectOutput.trim().split(/\s+/);
  if (state !== "running") return state === "restarting" ? "starting" : "stopped";
  if (health === "healthy" || health === "starting" || health === "unhealthy") {
    return health;
  }
  return "running";
}

/** docker itself, with the same sudo prefix compose uses */
export function dockerCommandFor(compose: ComposeCommand): ComposeCommand {
  return compose[0] === "sudo" ? ["sudo", "docker"] : ["docker"];
}

/** Drives a compose project in `projectDir`. */
export class ComposeRuntime implements ContainerRuntime {
  constructor(
    private readonly projectDir: string,
    private readonly compose: ComposeCommand,
    private readonly docker: ComposeCommand = dockerCommandFor(compose)
  ) {}

  private async composeOrThrow(args: string[], what: string): Promise<CommandResult> {
    const res = await invoke([...this.compose, ...args], { cwd: this.projectDir });
    if (res.exitCode !== 0) {
      throw new ProvisionError("orchestration", `${what} failed (exit ${res.exitCode})`, {
        hint: tail(res.stderr) || undefined,
      });
    }
    return res;
  }

  async start(service: string): Promise<void> {
    await this.composeOrThrow(["up", "-d", "--no-deps", service], `Starting ${service}`);
  }

  async health(service: string): Promise<HealthStatus> {
    const ps = await this.composeOrThrow(["ps", "-q", service], `Locating ${service}`);
    const id = ps.stdout.trim().split("\n")[0];
    if (!id) return "stopped";

    const res = await invoke([
      ...this.docker,
      "inspect",
      "--format",
      "{{.State.Status}} {{if .State.Health}}{{.State.Health.Status}}{{end}}",
      id,
    ]);
    return res.exitCode === 0 ? parseHealth(res.stdout) : "stopped";
  }

  run(service: string, command: string[]): Promise<CommandResult> {
    return invoke([...this.compose, "run", "--rm", "-T", service, ...command], {
      cwd: this.projectDir,
    });
  }

  exec(service: string, command: string[], options: ExecOptions = {}): Promise<CommandResult> {
    return invoke([...this.compose, "exec", "-T", service, ...command], {
      cwd: this.projectDir,
      input: options.input,
    });
  }

  async down(): Promise<void> {
    await this.composeOrThrow(["down"], "Stopping the deployment");
  }
}
