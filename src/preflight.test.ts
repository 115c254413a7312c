import { describe, expect, it } from "vitest";
import { compareSemver } from "./preflight";

describe("compareSemver", () => {
  it("orders versions numerically", () => {
    expect(compareSemver("20.11.1", "20.0.0")).toBe(1);
    expect(compareSemver("18.19.0", "20.0.0")).toBe(-1);
    expect(compareSemver("20.10.0", "20.9.0")).toBe(1);
  });

  it("treats missing parts as zero", () => {
    expect(compareSemver("20", "20.0.0")).toBe(0);
  });
});
