import { describe, it, expect } from "vitest";
import { isAllowedUser } from "./auth";

describe("isAllowedUser", () => {
  const allowed = ["analyst", " Reviewer "];

  it("matches case-insensitively after trimming", () => {
    expect(isAllowedUser("ANALYST", allowed)).toBe(true);
    expect(isAllowedUser("  reviewer", allowed)).toBe(true);
  });

  it("rejects unknown and blank names", () => {
    expect(isAllowedUser("guest", allowed)).toBe(false);
    expect(isAllowedUser("   ", allowed)).toBe(false);
    expect(isAllowedUser("analyst", [])).toBe(false);
  });
});
