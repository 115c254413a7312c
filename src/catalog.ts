import { readFileSync } from "node:fs";
import { z } from "zod";
import { RelayState, type RelayEntry } from "./types";

const HANDLE = /^[A-Za-z0-9_.-]+@[A-Za-z0-9.-]+\.[A-Za-z0-9-]+$/;

const RelayFileSchema = z.array(
  z.object({
    inboxUrl: z.string().url().startsWith("https://"),
    followActivityId: z.string().nullable().default(null),
    state: z.union([
      z.literal(RelayState.pending),
      z.literal(RelayState.accepted),
      z.literal(RelayState.rejected),
    ]),
  })
);

const FollowTargetsSchema = z.array(z.string().regex(HANDLE, "expected user@domain"));

function readData(name: string): unknown {
  // src/ and dist/ both sit one level below data/
  const url = new URL(`../data/${name}`, import.meta.url);
  return JSON.parse(readFileSync(url, "utf8"));
}

export function loadRelayEntries(): RelayEntry[] {
  return RelayFileSchema.parse(readData("relays.json"));
}

export function loadFollowTargets(): string[] {
  return FollowTargetsSchema.parse(readData("follow-targets.json"));
}
