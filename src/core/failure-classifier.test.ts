import { describe, expect, it } from "vitest";

import {
  INCOMPLETE_MESSAGE,
  classifyTaskOutput,
  extractFailureLine,
  extractQuotaMessage,
  isQuotaError,
} from "./failure-classifier.js";
import { DEFAULT_FAILURE_PATTERNS, mergeFailurePatterns } from "./failure-patterns.js";

const patterns = DEFAULT_FAILURE_PATTERNS;

function classify(stderr: string, stdout = "", provider = "claude") {
  return classifyTaskOutput({ stderr, stdout, provider }, patterns);
}

describe("classifyTaskOutput", () => {
  it("classifies a rate limit message as quota", () => {
    expect(classify("Rate limit exceeded. Please wait.")).toEqual({
      failed: true,
      errorType: "quota/rate_limit",
      message: "Rate limit exceeded. Please wait.",
    });
  });

  it("reports the API error span for quota failures", () => {
    const result = classify("retrying...\n[API Error: 429 Too Many Requests] backing off");

    expect(result).toEqual({
      failed: true,
      errorType: "quota/rate_limit",
      message: "[API Error: 429 Too Many Requests]",
    });
  });

  it("treats approval-mode banners as success", () => {
    const result = classify(
      "YOLO mode is enabled. All tool calls will be automatically approved.",
      "Marking student Ada\n✓ Feedback written",
    );

    expect(result).toEqual({ failed: false });
  });

  it("files a notice that is not an approval banner as other", () => {
    expect(classify("Loaded cached credentials.")).toEqual({
      failed: true,
      errorType: "other",
      message: "Loaded cached credentials.",
    });
  });

  it("classifies an exceeded-quota billing message as quota", () => {
    const stderr =
      "Error: You exceeded your current quota, please check your plan and billing details.";

    expect(classify(stderr, "", "codex")).toEqual({
      failed: true,
      errorType: "quota/rate_limit",
      message: stderr,
    });
  });

  it("flags a task that started but never reported success", () => {
    expect(classify("", "Marking student Ada...\nLoading notebook")).toEqual({
      failed: true,
      errorType: "incomplete",
      message: INCOMPLETE_MESSAGE,
    });
  });

  it("accepts a started task with a success marker", () => {
    expect(classify("", "Creating final feedback for Ada\n✓ Done")).toEqual({ failed: false });
  });

  it("accepts empty output", () => {
    expect(classify("   \n ", "")).toEqual({ failed: false });
  });

  it("classifies connection failures as network", () => {
    const result = classify("Error: connect ECONNREFUSED 127.0.0.1:443");

    expect(result).toEqual({
      failed: true,
      errorType: "network",
      message: "Error: connect ECONNREFUSED 127.0.0.1:443",
    });
  });

  it("prefers timeout over network when both appear", () => {
    const result = classify("Request timed out while waiting for network");

    expect(result.failed && result.errorType).toBe("timeout");
  });

  it("classifies access problems as permission", () => {
    const result = classify("EACCES: permission denied, open '/data/out.md'");

    expect(result.failed && result.errorType).toBe("permission");
  });

  it("reports the first failing line for generic agent failures", () => {
    const result = classify(
      "YOLO mode is enabled.\nError: model returned an empty response\nstack trace follows",
    );

    expect(result).toEqual({
      failed: true,
      errorType: "llm_failure",
      message: "Error: model returned an empty response",
    });
  });

  it("falls back to other with the full stderr", () => {
    expect(classify("Segmentation fault (core dumped)")).toEqual({
      failed: true,
      errorType: "other",
      message: "Segmentation fault (core dumped)",
    });
  });

  it("applies provider-specific quota phrases only for that provider", () => {
    expect(classify("Enable /extra-usage to continue", "", "codex")).toMatchObject({
      errorType: "quota/rate_limit",
    });
    expect(classify("Enable /extra-usage to continue", "", "gemini")).toMatchObject({
      errorType: "other",
    });
  });

  it("uses phrases added through config", () => {
    const merged = mergeFailurePatterns(patterns, { informational: ["sandbox notice"] });
    const output = {
      stderr: "Sandbox notice: writes go to the workspace",
      stdout: "",
      provider: "claude",
    };

    expect(classifyTaskOutput(output, patterns)).toMatchObject({ errorType: "other" });
    expect(classifyTaskOutput(output, merged)).toEqual({ failed: false });
  });
});

describe("isQuotaError", () => {
  it("matches case-insensitively and normalizes the provider name", () => {
    expect(isQuotaError("QUOTA EXCEEDED for project", "gemini", patterns)).toBe(true);
    expect(isQuotaError("overloaded_error", "Claude", patterns)).toBe(true);
    expect(isQuotaError("overloaded_error", "codex", patterns)).toBe(false);
    expect(isQuotaError("all done", "unknown-provider", patterns)).toBe(false);
  });
});

describe("message extraction", () => {
  it("falls back to the first quota-looking line, then the whole text", () => {
    expect(extractQuotaMessage("starting\n  Usage limit reached for today  \nbye")).toBe(
      "Usage limit reached for today",
    );
    expect(extractQuotaMessage("too many requests")).toBe("too many requests");
  });

  it("skips informational lines when looking for the failure line", () => {
    const stderr = "automatically approved error-free mode\nfailed: boom";

    expect(extractFailureLine(stderr, patterns)).toBe("failed: boom");
    expect(extractFailureLine("nothing here", patterns)).toBeNull();
  });
});
