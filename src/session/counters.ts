/**
 * Cumulative session counters.
 *
 * Saved in the checkpoint after every photo, so a paused and resumed run
 * ends with the same totals as an uninterrupted one.
 */

import { z } from "zod";

import type { PhotoSummary, WriteResults } from "~/session/write-coordinator";

export const sessionCountersSchema = z.object({
  // Photo results.
  processed: z.number().int().min(0),
  partial: z.number().int().min(0),
  failed: z.number().int().min(0),

  // Destination outcomes ("written" only; already-present is not a write).
  catalogWritten: z.number().int().min(0),
  sidecarWritten: z.number().int().min(0),
  catalogFailed: z.number().int().min(0),
  sidecarFailed: z.number().int().min(0),
  skippedUnreachable: z.number().int().min(0),

  // Analysis.
  analyzed: z.number().int().min(0),
  degraded: z.number().int().min(0),
  noImage: z.number().int().min(0),
  skippedNoTags: z.number().int().min(0),
});

export type SessionCounters = z.infer<typeof sessionCountersSchema>;

export function emptyCounters(): SessionCounters {
  return {
    processed: 0,
    partial: 0,
    failed: 0,
    catalogWritten: 0,
    sidecarWritten: 0,
    catalogFailed: 0,
    sidecarFailed: 0,
    skippedUnreachable: 0,
    analyzed: 0,
    degraded: 0,
    noImage: 0,
    skippedNoTags: 0,
  };
}

// How the image sent to the model was obtained.
export type AnalysisInput = "preview" | "original" | "none";

export type PhotoTally = {
  input: AnalysisInput;
  // The original stood in for a missing preview.
  degraded: boolean;
  generatedCount: number;
  results: WriteResults;
  summary: PhotoSummary;
};

// Returns new counters; the input is left as is.
export function tallyPhoto(counters: SessionCounters, tally: PhotoTally): SessionCounters {
  const next = { ...counters };

  next[tally.summary]++;

  if (tally.input === "none") next.noImage++;
  else next.analyzed++;
  if (tally.degraded) next.degraded++;
  if (tally.generatedCount === 0) next.skippedNoTags++;

  for (const [destination, outcome] of tally.results) {
    switch (outcome.status) {
      case "written":
        if (destination === "catalog") next.catalogWritten++;
        else next.sidecarWritten++;
        break;
      case "failed":
        if (destination === "catalog") next.catalogFailed++;
        else next.sidecarFailed++;
        break;
      case "skipped-unreachable":
        next.skippedUnreachable++;
        break;
      case "skipped-already-present":
        break;
    }
  }

  return next;
}
