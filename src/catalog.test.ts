import { describe, expect, it } from "vitest";
import { loadFollowTargets, loadRelayEntries } from "./catalog";
import { RelayState } from "./types";

describe("loadRelayEntries", () => {
  const relays = loadRelayEntries();

  it("loads the bundled relay list as accepted subscriptions", () => {
    expect(relays).toHaveLength(18);
    expect(relays.every((r) => r.state === RelayState.accepted)).toBe(true);
    expect(relays.every((r) => r.followActivityId === null)).toBe(true);
  });

  it("has no duplicate inbox URLs", () => {
    expect(new Set(relays.map((r) => r.inboxUrl)).size).toBe(relays.length);
  });
});

describe("loadFollowTargets", () => {
  const handles = loadFollowTargets();

  it("loads the bundled handles", () => {
    expect(handles).toHaveLength(86);
    expect(new Set(handles).size).toBe(86);
  });

  it("stores handles without a leading @", () => {
    expect(handles.some((h) => h.startsWith("@"))).toBe(false);
  });
});
