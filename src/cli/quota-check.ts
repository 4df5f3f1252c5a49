import type { Command } from "commander";
import fse from "fs-extra";

import { resolveProvider, type AppContext } from "../app/context.js";
import { resolveColorEnabled } from "../core/error-format.js";
import { isQuotaError, renderQuotaWarning } from "../core/quota-warning.js";

export type QuotaCheckOptions = {
  provider?: string;
  file?: string;
};

export type QuotaCheckIo = {
  readStdin?: () => Promise<string>;
  stderr?: { write(chunk: string): unknown; isTTY?: boolean };
};

export function registerQuotaCheckCommand(program: Command, getContext: () => AppContext): void {
  program
    .command("quota-check")
    .description("Exit 1 and print guidance when LLM output shows a quota or rate limit")
    .option("--provider <name>", "Provider that produced the output (default: config)")
    .option("--file <path>", "Read output from a file instead of stdin")
    .action(async (opts: QuotaCheckOptions) => {
      process.exitCode = await quotaCheckCommand(opts, getContext());
    });
}

export async function quotaCheckCommand(
  opts: QuotaCheckOptions,
  ctx: AppContext,
  io: QuotaCheckIo = {},
): Promise<number> {
  const text = opts.file
    ? await fse.readFile(opts.file, "utf8")
    : await (io.readStdin ?? readStdin)();

  const provider = resolveProvider(ctx, opts.provider);
  if (!isQuotaError(text, provider, ctx.patterns)) {
    return 0;
  }

  const stderr = io.stderr ?? process.stderr;
  const useColor = resolveColorEnabled({ stream: stderr });
  stderr.write(`${renderQuotaWarning(provider, text, { useColor })}\n`);
  return 1;
}

async function readStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString("utf8");
}
