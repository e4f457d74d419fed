/**
 * CheckpointManager
 *
 * One JSON document holding everything a resume needs: schema version,
 * timestamp, the full session configuration, the cursor (index of the next
 * unprocessed photo) and the cumulative counters.
 *
 * - save: atomic replace; a crash mid-save leaves the previous checkpoint
 * - load: never repairs or deletes; a file that fails validation is
 *   reported as corrupt
 * - clear: idempotent
 */

import fs from "node:fs/promises";
import { z } from "zod";

import { errorMessage } from "~/lib/log/logger";
import { writeFileAtomic } from "~/server/storage/atomic-file";
import { sessionConfigSchema } from "~/session/config";
import { sessionCountersSchema } from "~/session/counters";

export const CHECKPOINT_SCHEMA_VERSION = 1;

export const sessionStateSchema = z.object({
  schemaVersion: z.literal(CHECKPOINT_SCHEMA_VERSION),
  savedAt: z.string().datetime(),
  // "running" is what a crashed or killed run leaves behind.
  status: z.enum(["running", "paused"]),
  config: sessionConfigSchema,
  // See PhotoSource.keywordMark.
  keywordMark: z.number().int().min(0).nullable(),
  cursor: z.number().int().min(0),
  totalPhotos: z.number().int().min(0),
  counters: sessionCountersSchema,
});

export type SessionState = z.infer<typeof sessionStateSchema>;

export type CheckpointLoad =
  | { status: "absent" }
  | { status: "corrupt"; reason: string }
  | { status: "found"; state: SessionState };

function isNotFound(err: unknown): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === "ENOENT";
}

export class CheckpointManager {
  constructor(readonly checkpointPath: string) {}

  async save(state: SessionState): Promise<void> {
    await writeFileAtomic(this.checkpointPath, `${JSON.stringify(state, null, 2)}\n`);
  }

  async load(): Promise<CheckpointLoad> {
    let text: string;
    try {
      text = await fs.readFile(this.checkpointPath, "utf8");
    } catch (err) {
      if (isNotFound(err)) return { status: "absent" };
      return { status: "corrupt", reason: errorMessage(err) };
    }

    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (err) {
      return { status: "corrupt", reason: `invalid JSON: ${errorMessage(err)}` };
    }

    const parsed = sessionStateSchema.safeParse(raw);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue && issue.path.length > 0 ? issue.path.join(".") : "checkpoint";
      return { status: "corrupt", reason: `${where}: ${issue?.message ?? "invalid"}` };
    }

    return { status: "found", state: parsed.data };
  }

  async clear(): Promise<void> {
    await fs.rm(this.checkpointPath, { force: true });
  }
}
