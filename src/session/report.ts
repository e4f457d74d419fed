/**
 * Plain-text reports for the CLI: end-of-session totals and the `status`
 * command's checkpoint summary. Lines use the same key=value style as the logs.
 */

import type { CheckpointLoad } from "~/session/checkpoint";
import type { SessionCounters } from "~/session/counters";
import type { SessionResult } from "~/session/runner";

export function formatCounters(counters: SessionCounters): string[] {
  return [
    `catalog=${counters.catalogWritten} sidecar=${counters.sidecarWritten} skipped=${counters.skippedUnreachable}`,
    `processed=${counters.processed} partial=${counters.partial} failed=${counters.failed}`,
    `analyzed=${counters.analyzed} degraded=${counters.degraded} no_image=${counters.noImage} no_new_tags=${counters.skippedNoTags}`,
    `catalog_failed=${counters.catalogFailed} sidecar_failed=${counters.sidecarFailed}`,
  ];
}

export function formatSessionResult(result: SessionResult): string[] {
  const head = `session=${result.status} photos=${result.cursor}/${result.totalPhotos}`;
  const lines = [head, ...formatCounters(result.counters)];

  if (result.status === "paused") {
    lines.push("Run `resume` to continue from the next photo.");
  }

  return lines;
}

export function formatCheckpointStatus(load: CheckpointLoad, checkpointPath: string): string[] {
  switch (load.status) {
    case "absent":
      return [`checkpoint=${checkpointPath} session=none`];

    case "corrupt":
      return [
        `checkpoint=${checkpointPath} session=unreadable reason=${load.reason}`,
        "No resumable session found. Inspect the file or run `stop` to discard it.",
      ];

    case "found": {
      const { state } = load;
      const source =
        state.config.source.kind === "catalog"
          ? state.config.source.catalogPath
          : state.config.source.folderPath;

      return [
        `checkpoint=${checkpointPath} session=${state.status} saved_at=${state.savedAt}`,
        `source=${source} destinations=${state.config.destinations.join(",")} mode=${state.config.mode.kind} model=${state.config.model}`,
        `photos=${state.cursor}/${state.totalPhotos}`,
        ...formatCounters(state.counters),
      ];
    }
  }
}
