import { describe, expect, it } from "vitest";

import type { SessionState } from "./checkpoint";
import { emptyCounters } from "./counters";
import { formatCheckpointStatus, formatCounters, formatSessionResult } from "./report";

const counters = {
  ...emptyCounters(),
  processed: 3,
  catalogWritten: 3,
  sidecarWritten: 2,
  skippedUnreachable: 1,
  analyzed: 3,
};

describe("formatCounters", () => {
  it("leads with the destination totals", () => {
    expect(formatCounters(counters)).toEqual([
      "catalog=3 sidecar=2 skipped=1",
      "processed=3 partial=0 failed=0",
      "analyzed=3 degraded=0 no_image=0 no_new_tags=0",
      "catalog_failed=0 sidecar_failed=0",
    ]);
  });
});

describe("formatSessionResult", () => {
  it("tells how to continue a paused session", () => {
    const lines = formatSessionResult({ status: "paused", cursor: 1, totalPhotos: 3, counters });

    expect(lines[0]).toBe("session=paused photos=1/3");
    expect(lines.at(-1)).toBe("Run `resume` to continue from the next photo.");
  });

  it("ends with the counters when completed", () => {
    const lines = formatSessionResult({ status: "completed", cursor: 3, totalPhotos: 3, counters });

    expect(lines).toEqual(["session=completed photos=3/3", ...formatCounters(counters)]);
  });
});

describe("formatCheckpointStatus", () => {
  it("reports no session", () => {
    expect(formatCheckpointStatus({ status: "absent" }, "state.json")).toEqual([
      "checkpoint=state.json session=none",
    ]);
  });

  it("reports an unreadable checkpoint as not resumable", () => {
    expect(
      formatCheckpointStatus({ status: "corrupt", reason: "invalid JSON" }, "state.json")[1],
    ).toBe("No resumable session found. Inspect the file or run `stop` to discard it.");
  });

  it("summarizes a saved session", () => {
    const state: SessionState = {
      schemaVersion: 1,
      savedAt: "2024-05-01T10:00:00.000Z",
      status: "paused",
      config: {
        source: { kind: "catalog", catalogPath: "/photos/Main.lrcat", filters: {} },
        destinations: ["catalog", "sidecar"],
        mode: { kind: "auto" },
        model: "test-model",
        language: "english",
        tagPolicy: {
          casing: "capitalize",
          maxTags: 15,
          suffix: { enabled: true, suffix: "ai", separator: "_" },
        },
        remaps: [],
      },
      keywordMark: null,
      cursor: 3,
      totalPhotos: 10,
      counters,
    };

    expect(formatCheckpointStatus({ status: "found", state }, "state.json").slice(0, 4)).toEqual([
      "checkpoint=state.json session=paused saved_at=2024-05-01T10:00:00.000Z",
      "source=/photos/Main.lrcat destinations=catalog,sidecar mode=auto model=test-model",
      "photos=3/10",
      "catalog=3 sidecar=2 skipped=1",
    ]);
  });
});
