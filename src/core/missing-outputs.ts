import fse from "fs-extra";
import { z } from "zod";

import { formatErrorMessage } from "./error-format.js";
import { logEvent, type EventSink } from "./logger.js";
import { expectedOutputPath } from "./paths.js";

// =============================================================================
// TYPES
// =============================================================================

export const SubmissionSchema = z
  .object({
    student_name: z.string(),
    path: z.string().default(""),
  })
  .passthrough();

export type Submission = z.infer<typeof SubmissionSchema>;

// Entries are validated one at a time so a single bad entry cannot hide the rest.
export const SubmissionsManifestSchema = z
  .object({
    submissions: z.array(z.unknown()).default([]),
  })
  .passthrough();

export type SubmissionsManifest = {
  submissions: Submission[];
};

export type MissingOutput = {
  student_name: string;
  expected_file: string;
  submission_path: string;
};

export type AuditOptions = {
  outputSuffix?: string;
  logger?: EventSink;
};

// =============================================================================
// AUDIT
// =============================================================================

/**
 * Report every manifest submission without a produced artifact. This is the only way to see
 * a worker that died before writing anything, stderr included.
 */
export async function auditMissingOutputs(
  manifestPath: string,
  outputDir: string,
  opts: AuditOptions = {},
): Promise<MissingOutput[]> {
  const manifest = await readManifest(manifestPath, opts.logger);
  if (!manifest) return [];

  const missing: MissingOutput[] = [];
  for (const submission of manifest.submissions) {
    const expected = expectedOutputPath(outputDir, submission.student_name, opts.outputSuffix);
    if (await fse.pathExists(expected)) continue;

    missing.push({
      student_name: submission.student_name,
      expected_file: expected,
      submission_path: submission.path,
    });
    logEvent(opts.logger, "audit.missing", {
      student: submission.student_name,
      expected_file: expected,
    });
  }

  return missing;
}

export async function readManifest(
  manifestPath: string,
  logger?: EventSink,
): Promise<SubmissionsManifest | null> {
  if (!(await fse.pathExists(manifestPath))) {
    console.warn(`Warning: submissions manifest not found: ${manifestPath}`);
    return null;
  }

  let doc: unknown;
  try {
    doc = JSON.parse(await fse.readFile(manifestPath, "utf8"));
  } catch (err) {
    return rejectManifest(manifestPath, formatErrorMessage(err), logger);
  }

  const parsed = SubmissionsManifestSchema.safeParse(doc);
  if (!parsed.success) {
    return rejectManifest(manifestPath, parsed.error.issues[0]?.message ?? "invalid", logger);
  }

  const submissions: Submission[] = [];
  parsed.data.submissions.forEach((entry, index) => {
    const submission = SubmissionSchema.safeParse(entry);
    if (submission.success) {
      submissions.push(submission.data);
      return;
    }

    const detail = formatIssue(submission.error);
    console.warn(`Warning: skipping submission ${index} in ${manifestPath}: ${detail}`);
    logEvent(logger, "audit.manifest_invalid", { path: manifestPath, index, error: detail });
  });

  return { submissions };
}

function formatIssue(error: z.ZodError): string {
  const issue = error.issues[0];
  if (!issue) return "invalid";
  return issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message;
}

function rejectManifest(manifestPath: string, detail: string, logger?: EventSink): null {
  console.warn(`Warning: could not read submissions manifest ${manifestPath}: ${detail}`);
  logEvent(logger, "audit.manifest_invalid", { path: manifestPath, error: detail });
  return null;
}
