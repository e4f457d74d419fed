/**
 * WriteCoordinator
 *
 * Writes one photo's final keyword set to every requested destination and
 * reports one `WriteOutcome` per destination. Destinations are independent:
 * a failed sidecar never undoes or blocks a catalog write, and nothing here
 * throws.
 *
 * Destinations are a closed set of variants dispatched by `destination`:
 * - catalog: membership rows through the exclusively opened CatalogStore
 * - sidecar: read-merge-write of the XMP beside the original; needs the
 *   original to be accessible, otherwise `skipped-unreachable`. Generated
 *   keywords whose base the sidecar already holds are left out.
 */

import { errorMessage, type Logger } from "~/lib/log/logger";
import { generatedNames, keywordNames, type KeywordSet } from "~/lib/tags/keywords";
import type { SuffixPolicy } from "~/lib/tags/suffix";
import { isCoveredBy } from "~/lib/tags/transform";
import type { CatalogStore } from "~/server/db";
import type { OriginalResolution } from "~/server/storage/originals";
import { mergeSidecarKeywords } from "~/server/storage/sidecar";
import type { Destination } from "~/session/config";
import { describePhoto, type PhotoIdentity } from "~/session/photo";

export type WriteOutcome =
  | { status: "written"; added: string[] }
  | { status: "skipped-already-present" }
  | { status: "skipped-unreachable"; reason: string }
  | { status: "failed"; error: string };

export type DestinationWriter =
  | { destination: "catalog"; catalog: Pick<CatalogStore, "addKeywords"> }
  | { destination: "sidecar"; suffix: SuffixPolicy };

export type WriteResults = ReadonlyMap<Destination, WriteOutcome>;

export type PhotoSummary = "processed" | "partial" | "failed";

function fromAdded(added: string[]): WriteOutcome {
  return added.length > 0 ? { status: "written", added } : { status: "skipped-already-present" };
}

async function writeTo(
  writer: DestinationWriter,
  photo: PhotoIdentity,
  keywords: KeywordSet,
  original: () => Promise<OriginalResolution>,
): Promise<WriteOutcome> {
  const names = keywordNames(keywords);

  switch (writer.destination) {
    case "catalog": {
      if (photo.catalogId === null) {
        return { status: "failed", error: "photo is not in the catalog" };
      }
      return fromAdded(writer.catalog.addKeywords(photo.catalogId, names));
    }

    case "sidecar": {
      const resolved = await original();
      if (resolved.status === "inaccessible") {
        return { status: "skipped-unreachable", reason: resolved.reason };
      }
      const generated = new Set(generatedNames(keywords));
      const { added } = await mergeSidecarKeywords(
        resolved.path,
        names,
        (name, present) => !generated.has(name) || !isCoveredBy(name, present, writer.suffix),
      );
      return fromAdded(added);
    }
  }
}

export class WriteCoordinator {
  constructor(
    private readonly writers: readonly DestinationWriter[],
    private readonly logger: Logger,
  ) {}

  async write(
    photo: PhotoIdentity,
    keywords: KeywordSet,
    original: () => Promise<OriginalResolution>,
  ): Promise<WriteResults> {
    const results = new Map<Destination, WriteOutcome>();

    for (const writer of this.writers) {
      let outcome: WriteOutcome;
      try {
        outcome = await writeTo(writer, photo, keywords, original);
      } catch (err) {
        outcome = { status: "failed", error: errorMessage(err) };
        this.logger.error(
          `${describePhoto(photo)} ${writer.destination}=failed err=${outcome.error}`,
        );
      }
      results.set(writer.destination, outcome);
    }

    return results;
  }
}

/**
 * - processed: every requested destination was written or already had the
 *   keywords; a sidecar skipped for an unreachable original does not count
 *   against the photo
 * - failed: no destination holds the keywords
 * - partial: anything in between
 */
export function summarize(results: WriteResults): PhotoSummary {
  let ok = 0;
  let failed = 0;

  for (const outcome of results.values()) {
    if (outcome.status === "written" || outcome.status === "skipped-already-present") ok++;
    else if (outcome.status === "failed") failed++;
  }

  if (ok === 0) return "failed";
  return failed === 0 ? "processed" : "partial";
}
