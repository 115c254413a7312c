export type ServiceName =
  | "db"
  | "redis"
  | "web"
  | "streaming"
  | "sidekiq"
  | "kafka"
  | "kafka_sender"
  | "caddy";

export interface VapidKeys {
  privateKey: string;
  publicKey: string;
}

export interface GeneratedSecrets {
  secretKeyBase: string;
  otpSecret: string;
  vapid: VapidKeys;
}

export interface DatastoreCredentials {
  postgresPassword: string;
  redisPassword: string;
}

export interface DeploymentInput {
  domain: string;
  publicIp: string;
}

export interface DeploymentConfig extends DeploymentInput {
  operatorEmail: string;
  mastodonVersion: string;
  secrets: GeneratedSecrets;
  datastore: DatastoreCredentials;
}

export interface ServiceSpec {
  name: ServiceName;
  image: string;
  restart?: "always" | "unless-stopped";
  containerName?: string;
  user?: string;
  shmSize?: string;
  envFile?: string;
  environment?: Record<string, string>;
  command?: string | string[];
  healthcheck?: string[];
  ports: string[];
  volumes: string[];
  dependsOn: ServiceName[];
}

export type Topology = readonly ServiceSpec[];

export type ConfirmationState = "unconfirmed" | "confirmed" | "approved";
export type TwoFactorState = "enabled" | "disabled";

export interface AdminAccount {
  username: string;
  email: string;
  password: string;
  role: string | null;
  confirmation: ConfirmationState;
  twoFactor: TwoFactorState;
}

export const RelayState = {
  pending: 1,
  accepted: 2,
  rejected: 3,
} as const;
export type RelayState = (typeof RelayState)[keyof typeof RelayState];

export interface RelayEntry {
  inboxUrl: string;
  followActivityId: string | null;
  state: RelayState;
}

export type FollowOutcome =
  | { handle: string; status: "followed"; accountId: string }
  | { handle: string; status: "skipped"; reason: string }
  | { handle: string; status: "failed"; reason: string };

export interface ProvisionResult {
  config: DeploymentConfig;
  deployDir: string;
  admin: AdminAccount;
  outcomes: FollowOutcome[];
  finishedAtIso: string;
}
