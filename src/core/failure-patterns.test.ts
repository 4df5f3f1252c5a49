import { describe, expect, it } from "vitest";

import { DEFAULT_FAILURE_PATTERNS, mergeFailurePatterns } from "./failure-patterns.js";

describe("mergeFailurePatterns", () => {
  it("returns the defaults unchanged without overrides", () => {
    expect(mergeFailurePatterns(DEFAULT_FAILURE_PATTERNS)).toEqual(DEFAULT_FAILURE_PATTERNS);
  });

  it("appends new phrases and skips ones already present", () => {
    const merged = mergeFailurePatterns(DEFAULT_FAILURE_PATTERNS, {
      timeout: ["timed out", "deadline exceeded"],
      quota: {
        common: ["credit balance is too low"],
        providers: { codex: ["weekly limit"], mistral: ["capacity exceeded"] },
      },
    });

    expect(merged.timeout).toEqual(["timeout", "timed out", "deadline exceeded"]);
    expect(merged.quota.common.at(-1)).toBe("credit balance is too low");
    expect(merged.quota.providers.codex.at(-1)).toBe("weekly limit");
    expect(merged.quota.providers.mistral).toEqual(["capacity exceeded"]);
    expect(merged.quota.providers.claude).toEqual(DEFAULT_FAILURE_PATTERNS.quota.providers.claude);
  });

  it("does not mutate the base lists", () => {
    const before = [...DEFAULT_FAILURE_PATTERNS.network];

    mergeFailurePatterns(DEFAULT_FAILURE_PATTERNS, { network: ["dns lookup failed"] });

    expect(DEFAULT_FAILURE_PATTERNS.network).toEqual(before);
  });
});
