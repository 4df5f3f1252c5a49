import { z } from "zod";

// =============================================================================
// CHECKSUMS
// =============================================================================

export const ChecksumRecordSchema = z.object({
  path: z.string(),
  checksum: z.string(),
  recorded_at: z.string(),
});
export type ChecksumRecord = z.infer<typeof ChecksumRecordSchema>;

// =============================================================================
// RUN STATE
// =============================================================================

// Completed collections are persisted as arrays with set semantics (no duplicates,
// insertion order kept). Files written by older runs may lack the newer fields.
export const RunStateSchema = z.object({
  started_at: z.string(),
  updated_at: z.string().optional(),
  completed_at: z.string().optional(),
  last_stage: z.string().nullable().default(null),
  completed_stages: z.array(z.string()).default([]),
  completed_activities: z.array(z.string()).default([]),
  completed_students: z.array(z.string()).default([]),
  checksums: z.record(ChecksumRecordSchema).default({}),
});

export type RunState = z.infer<typeof RunStateSchema>;
