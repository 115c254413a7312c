import * as p from "@clack/prompts";
import pc from "picocolors";
import { ProvisionError } from "./errors";
import type { CommandResult, ContainerRuntime, ExecOptions, HealthStatus } from "./runtime";
import { dependencyOrder } from "./topology";
import type { ServiceSpec, Topology } from "./types";
import { type Clock, systemClock, waitFor, WaitTimeoutError } from "./wait";

export interface OrchestratorOptions {
  healthTimeoutMs: number;
  pollBaseDelayMs?: number;
  pollMaxDelayMs?: number;
  clock?: Clock;
}

/** Ready to serve dependents: healthy, or merely running when no probe is declared. */
function isReady(svc: ServiceSpec, status: HealthStatus): boolean {
  return status === "healthy" || (!svc.healthcheck && status === "running");
}

export class Orchestrator {
  private readonly clock: Clock;

  constructor(
    private readonly runtime: ContainerRuntime,
    private readonly options: OrchestratorOptions
  ) {
    this.clock = options.clock ?? systemClock;
  }

  /**
   * Start every service after its dependencies, blocking on each until it is
   * ready. Services already started stay up when a later one fails.
   */
  async up(topology: Topology): Promise<void> {
    const byName = new Map(topology.map((s) => [s.name, s]));

    for (const svc of dependencyOrder(topology)) {
      for (const depName of svc.dependsOn) {
        const dep = byName.get(depName);
        const status = await this.runtime.health(depName);
        if (!dep || !isReady(dep, status)) {
          throw new ProvisionError(
            "orchestration",
            `Refusing to start ${svc.name}: dependency ${depName} is ${status}`,
            { hint: `Inspect it with: docker compose logs ${depName}` }
          );
        }
      }

      const s = p.spinner();
      s.start(`Starting ${svc.name}`);
      try {
        await this.runtime.start(svc.name);
        await this.waitReady(svc, (msg) => s.message(msg));
      } catch (err) {
        s.stop(`${svc.name} ${pc.red("✗")}`);
        throw err;
      }
      s.stop(`${svc.name} ${pc.green("✓")}`);
    }
  }

  private async waitReady(svc: ServiceSpec, progress: (msg: string) => void): Promise<void> {
    let last: HealthStatus = "stopped";
    try {
      await waitFor(
        `${svc.name} to become ${svc.healthcheck ? "healthy" : "running"}`,
        // unhealthy is not final: docker flips it back once a probe passes
        async () => {
          last = await this.runtime.health(svc.name);
          return isReady(svc, last);
        },
        {
          timeoutMs: this.options.healthTimeoutMs,
          baseDelayMs: this.options.pollBaseDelayMs,
          maxDelayMs: this.options.pollMaxDelayMs,
          clock: this.clock,
          onPoll: (attempt) => progress(`Waiting for ${svc.name} (${last}, check ${attempt})`),
        }
      );
    } catch (err) {
      if (err instanceof WaitTimeoutError) {
        throw new ProvisionError("orchestration", `${err.message} (last status: ${last})`, {
          cause: err,
          hint: `Already started services are left running. Inspect with: docker compose logs ${svc.name}`,
        });
      }
      throw err;
    }
  }

  runOnce(service: string, command: string[]): Promise<CommandResult> {
    return this.runtime.run(service, command);
  }

  exec(service: string, command: string[], options?: ExecOptions): Promise<CommandResult> {
    return this.runtime.exec(service, command, options);
  }

  /** Full stop, then a gated start of the whole topology. */
  async restart(topology: Topology): Promise<void> {
    p.log.step("Restarting all services");
    await this.runtime.down();
    await this.up(topology);
  }
}
