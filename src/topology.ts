import { stringify } from "yaml";
import { ProvisionError } from "./errors";
import { redisUrl } from "./render";
import type { DeploymentConfig, ServiceName, ServiceSpec, Topology } from "./types";

export const ENV_FILE = ".env.production";
const KAFKA_SENDER_IMAGE =
  "ghcr.io/rss3-network/mastodon-instance-kit:main-0359d7920db633f14f2c36f831f9ff47bd6aa7f0";

const MASTODON_USER = "1001:1001";
const HEALTHCHECK_INTERVAL = "10s";

function httpProbe(url: string): string[] {
  return ["CMD-SHELL", `wget -q --spider --proxy=off ${url} || exit 1`];
}

/** The eight services of a deployment, leaves first. */
export function buildTopology(config: DeploymentConfig): Topology {
  const mastodonImage = `tootsuite/mastodon:${config.mastodonVersion}`;
  const { redisPassword, postgresPassword } = config.datastore;
  const systemVolume = "./public/system:/opt/mastodon/public/system";

  return [
    {
      name: "db",
      image: "postgres:14-alpine",
      restart: "always",
      shmSize: "256mb",
      healthcheck: ["CMD", "pg_isready", "-U", "mastodon"],
      environment: {
        POSTGRES_USER: "mastodon",
        POSTGRES_PASSWORD: postgresPassword,
        POSTGRES_DB: "mastodon",
      },
      ports: ["127.0.0.1:5432:5432"],
      volumes: ["./postgres14:/var/lib/postgresql/data"],
      dependsOn: [],
    },
    {
      name: "redis",
      image: "redis:7-alpine",
      restart: "always",
      command: ["redis-server", "--requirepass", redisPassword],
      healthcheck: [
        "CMD-SHELL",
        'redis-cli -a "$$REDIS_PASSWORD" --no-auth-warning ping | grep -q PONG',
      ],
      environment: { REDIS_PASSWORD: redisPassword },
      ports: ["127.0.0.1:6379:6379"],
      volumes: ["./redis:/data"],
      dependsOn: [],
    },
    {
      name: "web",
      image: mastodonImage,
      restart: "always",
      user: MASTODON_USER,
      envFile: ENV_FILE,
      command: "bundle exec puma -C config/puma.rb",
      healthcheck: httpProbe("localhost:3000/health"),
      environment: {
        REDIS_PASSWORD: redisPassword,
        REDIS_URL: redisUrl(redisPassword),
      },
      ports: ["127.0.0.1:3000:3000"],
      volumes: [systemVolume],
      dependsOn: ["db", "redis"],
    },
    {
      name: "streaming",
      image: mastodonImage,
      restart: "always",
      user: MASTODON_USER,
      envFile: ENV_FILE,
      command: ["node", "streaming/index.js"],
      healthcheck: httpProbe("localhost:4000/api/v1/streaming/health"),
      ports: ["127.0.0.1:4000:4000"],
      volumes: [systemVolume],
      dependsOn: ["db", "redis"],
    },
    {
      name: "sidekiq",
      image: mastodonImage,
      restart: "always",
      user: MASTODON_USER,
      envFile: ENV_FILE,
      command: "bundle exec sidekiq",
      healthcheck: ["CMD-SHELL", "ps aux | grep '[s]idekiq\\ 6' || false"],
      environment: { REDIS_PASSWORD: redisPassword },
      ports: [],
      volumes: [systemVolume],
      dependsOn: ["db", "redis"],
    },
    {
      name: "kafka",
      image: "bitnami/kafka:3.7",
      restart: "always",
      envFile: ENV_FILE,
      healthcheck: ["CMD-SHELL", "bash -c 'echo > /dev/tcp/localhost/9092'"],
      ports: ["9092:9092"],
      volumes: ["./kafka:/bitnami/kafka"],
      dependsOn: [],
    },
    {
      name: "kafka_sender",
      image: KAFKA_SENDER_IMAGE,
      restart: "always",
      envFile: ENV_FILE,
      ports: ["127.0.0.1:3001:3001"],
      volumes: [],
      dependsOn: ["kafka"],
    },
    {
      name: "caddy",
      image: "caddy:2-alpine",
      containerName: "caddy",
      restart: "always",
      envFile: ENV_FILE,
      ports: ["80:80", "443:443"],
      volumes: [
        "./Caddyfile:/etc/caddy/Caddyfile:ro",
        "./caddy/config:/config",
        "./caddy/data:/data",
        "./caddy/logs:/logs",
        "./public:/opt/mastodon/public:ro",
      ],
      dependsOn: ["web", "streaming", "kafka_sender"],
    },
  ];
}

/**
 * Start order for a topology: every service after all of its dependencies,
 * otherwise in declaration order. DFS with a recursion stack to report
 * cycles with their path.
 */
export function dependencyOrder(topology: Topology): ServiceSpec[] {
  const byName = new Map<ServiceName, ServiceSpec>(topology.map((s) => [s.name, s]));
  const visited = new Set<ServiceName>();
  const stack: ServiceName[] = [];
  const order: ServiceSpec[] = [];

  const visit = (svc: ServiceSpec): void => {
    if (stack.includes(svc.name)) {
      const cycle = [...stack.slice(stack.indexOf(svc.name)), svc.name];
      throw new ProvisionError(
        "orchestration",
        `Circular dependency detected: ${cycle.join(" -> ")}`
      );
    }
    if (visited.has(svc.name)) return;

    stack.push(svc.name);
    for (const dep of svc.dependsOn) {
      const target = byName.get(dep);
      if (!target) {
        throw new ProvisionError(
          "orchestration",
          `Service '${svc.name}' depends on undeclared service '${dep}'`
        );
      }
      visit(target);
    }
    stack.pop();

    visited.add(svc.name);
    order.push(svc);
  };

  for (const svc of topology) visit(svc);
  return order;
}

/** Compose interpolates `$name`; `$$` is a literal dollar sign. */
export function composeLiteral(value: string): string {
  return value.replace(/\$/g, () => "$$");
}

function composeService(svc: ServiceSpec, byName: Map<ServiceName, ServiceSpec>) {
  const entry: Record<string, unknown> = { image: svc.image };
  if (svc.containerName) entry.container_name = svc.containerName;
  if (svc.restart) entry.restart = svc.restart;
  if (svc.user) entry.user = svc.user;
  if (svc.shmSize) entry.shm_size = svc.shmSize;
  if (svc.envFile) entry.env_file = svc.envFile;
  if (svc.command) {
    entry.command =
      typeof svc.command === "string" ? composeLiteral(svc.command) : svc.command.map(composeLiteral);
  }
  if (svc.environment) {
    entry.environment = Object.fromEntries(
      Object.entries(svc.environment).map(([k, v]) => [k, composeLiteral(v)])
    );
  }
  if (svc.healthcheck) {
    entry.healthcheck = { test: svc.healthcheck, interval: HEALTHCHECK_INTERVAL };
  }
  if (svc.ports.length) entry.ports = svc.ports;
  if (svc.volumes.length) entry.volumes = svc.volumes;
  if (svc.dependsOn.length) {
    entry.depends_on = Object.fromEntries(
      svc.dependsOn.map((dep) => [
        dep,
        {
          condition: byName.get(dep)?.healthcheck ? "service_healthy" : "service_started",
        },
      ])
    );
  }
  return entry;
}

/** `docker-compose.yml` for the topology, services in declaration order. */
export function renderComposeFile(topology: Topology): string {
  dependencyOrder(topology);
  const byName = new Map<ServiceName, ServiceSpec>(topology.map((s) => [s.name, s]));
  const services = Object.fromEntries(
    topology.map((svc) => [svc.name, composeService(svc, byName)])
  );
  return stringify({ services }, { lineWidth: 0 });
}
