/**
 * Photo sources: where a session's photos come from.
 *
 * Both sources enumerate in a stable order (catalog image id, folder
 * relative path) so that resume can skip the first `cursor` photos of a
 * fresh enumeration. Filters that the session's own writes would change are
 * pinned by `keywordMark()`. A source changed by something else between
 * pause and resume shifts that boundary; nothing here detects it.
 */

import fs from "node:fs/promises";
import path from "node:path";

import { errorMessage, type Logger } from "~/lib/log/logger";
import type { CatalogStore, PhotoFilters } from "~/server/db";
import { isSupportedImage } from "~/server/storage/images";
import type { OriginalResolution } from "~/server/storage/originals";
import { readSidecarKeywords } from "~/server/storage/sidecar";
import type { StorageRoot } from "~/server/storage/volumes";
import type { PhotoIdentity } from "~/session/photo";

export const FOLDER_ROOT_ID = "folder";

export type PhotoSource = {
  readonly kind: "catalog" | "folder";
  roots(): StorageRoot[];
  // Pins what the filters mean for one session; null when nothing needs pinning.
  keywordMark(): Promise<number | null>;
  // Pass the session's mark so a resumed enumeration lists the same photos.
  enumerate(keywordMark?: number | null): Promise<PhotoIdentity[]>;
  // Keywords the photo already carries in the source's own store.
  existingKeywords(
    photo: PhotoIdentity,
    original: () => Promise<OriginalResolution>,
  ): Promise<string[]>;
};

export function catalogSource(
  catalog: Pick<CatalogStore, "listRoots" | "listPhotos" | "getKeywords" | "keywordMark">,
  filters: PhotoFilters,
): PhotoSource {
  return {
    kind: "catalog",
    roots: () => catalog.listRoots(),
    // Only "untagged" changes as the session writes keywords.
    keywordMark: async () => (filters.onlyUntagged ? catalog.keywordMark() : null),
    enumerate: async (keywordMark) =>
      catalog.listPhotos(filters, { keywordMark: keywordMark ?? undefined }),
    existingKeywords: async (photo) =>
      photo.catalogId === null ? [] : catalog.getKeywords(photo.catalogId),
  };
}

async function walk(dir: string, recursive: boolean, prefix: string, out: string[]): Promise<void> {
  const entries = await fs.readdir(dir, { withFileTypes: true });

  for (const entry of entries) {
    // Hidden files and folders (".thumbnails", "._IMG_0001.jpg").
    if (entry.name.startsWith(".")) continue;

    const relative = prefix ? `${prefix}/${entry.name}` : entry.name;

    if (entry.isDirectory()) {
      if (recursive) await walk(path.join(dir, entry.name), recursive, relative, out);
    } else if (entry.isFile() && isSupportedImage(entry.name)) {
      out.push(relative);
    }
  }
}

function byCodePoint(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

export function folderSource(
  folderPath: string,
  options: { recursive: boolean; logger: Logger },
): PhotoSource {
  const absolute = path.resolve(folderPath);

  return {
    kind: "folder",

    roots: () => [{ id: FOLDER_ROOT_ID, absolutePath: absolute, name: path.basename(absolute) }],

    keywordMark: async () => null,

    async enumerate() {
      const relativePaths: string[] = [];
      await walk(absolute, options.recursive, "", relativePaths);
      relativePaths.sort(byCodePoint);

      return relativePaths.map((relativePath) => ({
        photoId: relativePath,
        catalogId: null,
        rootId: FOLDER_ROOT_ID,
        relativePath,
        previewToken: null,
        displayName: path.posix.basename(relativePath),
      }));
    },

    // A folder photo's keywords are the ones in its sidecar.
    async existingKeywords(photo, original) {
      const resolved = await original();
      if (resolved.status === "inaccessible") return [];

      try {
        return await readSidecarKeywords(resolved.path);
      } catch (err) {
        options.logger.warn(
          `photo=${photo.photoId} sidecar=unreadable err=${errorMessage(err)}`,
        );
        return [];
      }
    },
  };
}
