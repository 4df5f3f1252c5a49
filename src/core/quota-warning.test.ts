import { describe, expect, it } from "vitest";

import { extractQuotaSnippet, renderQuotaWarning } from "./quota-warning.js";

const RULE = "=".repeat(80);

describe("extractQuotaSnippet", () => {
  it("prefers an API error span", () => {
    expect(extractQuotaSnippet("x [API Error: quota exhausted] y\nlimit reached")).toBe(
      "[API Error: quota exhausted]",
    );
  });

  it("falls back to a limit or reset line", () => {
    expect(extractQuotaSnippet("booting\n  Your limit resets at 3am \n")).toBe(
      "Your limit resets at 3am",
    );
    expect(extractQuotaSnippet("nothing useful")).toBeNull();
  });
});

describe("renderQuotaWarning", () => {
  it("renders provider guidance with alternatives", () => {
    const lines = renderQuotaWarning("codex", "Error: 5-hour limit reached").split("\n");

    expect(lines.slice(0, 7)).toEqual([
      "",
      RULE,
      "  CODEX API QUOTA/RATE LIMIT REACHED",
      RULE,
      "",
      "Error message: Error: 5-hour limit reached",
      "",
    ]);
    expect(lines).toContain("  • The Codex API has run out of quota or hit a rate limit");
    expect(lines).toContain(
      "  1. Wait for the usage window to reset (typically resets at 3am local time)",
    );
    expect(lines).toContain("  2. Upgrade plan: Use '/upgrade to Max' or enable '/extra-usage'");
    expect(lines).toContain("  3. Switch provider: Edit overview.md to use 'claude' or 'gemini'");
    expect(lines).toContain("  • When you re-run, only failed tasks will be processed");
    expect(lines.at(-2)).toBe(RULE);
  });

  it("uses the reset wording of each provider", () => {
    const claude = renderQuotaWarning("Claude", "rate limit exceeded");
    const gemini = renderQuotaWarning("gemini", "quota_exceeded");

    expect(claude).toContain("  1. Wait for rate limit reset (typically resets hourly or daily)");
    expect(claude).toContain("Edit overview.md to use 'codex' or 'gemini'");
    expect(gemini).toContain("  1. Wait for quota reset (typically resets daily)");
  });

  it("omits the error line when no snippet is found", () => {
    const output = renderQuotaWarning("gemini", "quota_exceeded");

    expect(output).not.toContain("Error message:");
  });

  it("falls back to generic options for unknown providers", () => {
    const lines = renderQuotaWarning("mistral", "usage limit").split("\n");

    expect(lines[2]).toBe("  MISTRAL API QUOTA/RATE LIMIT REACHED");
    expect(lines).toContain("  1. Wait for quota reset and re-run");
    expect(lines).toContain("  2. Upgrade plan or switch to a different provider");
    expect(lines.some((line) => line.includes("Switch provider"))).toBe(false);
  });

  it("colors the banner only when asked", () => {
    const colored = renderQuotaWarning("codex", "limit reached", { useColor: true });

    expect(colored.split("\n")[1]).toBe(`\u001b[1m\u001b[31m${RULE}\u001b[39m\u001b[22m`);
    expect(renderQuotaWarning("codex", "limit reached")).not.toContain("\u001b[");
  });
});
