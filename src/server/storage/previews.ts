/**
 * PreviewLocator
 *
 * Finds the rendered smart preview of a catalog photo inside the catalog's
 * preview cache ("<catalog> Smart Previews.lrdata").
 *
 * Bucketing scheme, keyed by the preview token (the original file's global
 * id, an upper-case GUID such as 22525EB1-CB1F-4C04-9347-237F3FD2F64A):
 *
 *   <cache>/<token[0]>/<token[0..4]>/<token>.dng
 *   e.g. 2/2252/22525EB1-CB1F-4C04-9347-237F3FD2F64A.dng
 *
 * The same token always lands in the same bucket. Lower/upper-case bucket
 * variants and two older flat layouts are tried after the canonical path.
 */

import fs from "node:fs/promises";
import path from "node:path";

import type { PhotoIdentity } from "~/session/photo";
import type { VolumeResolver } from "~/server/storage/volumes";

export const PREVIEW_ROOT_ID = "previews";
export const PREVIEW_EXTENSION = ".dng";

export type PreviewHandle =
  | { status: "valid"; rootId: string; path: string }
  | { status: "invalid"; reason: string };

// Relative candidate paths for a token, canonical layout first.
export function previewCandidates(token: string): string[] {
  const file = `${token}${PREVIEW_EXTENSION}`;
  const first = token.slice(0, 1);
  const firstFour = token.slice(0, 4);

  const candidates = [
    path.join(first, firstFour, file),
    path.join(first.toLowerCase(), firstFour.toLowerCase(), file),
    path.join(first.toUpperCase(), firstFour.toUpperCase(), `${token.toUpperCase()}${PREVIEW_EXTENSION}`),
    path.join(first, file),
    file,
  ];

  return Array.from(new Set(candidates));
}

/**
 * Preview cache directories to look for beside a catalog file, in order.
 */
export function previewCacheCandidates(catalogPath: string): string[] {
  const dir = path.dirname(catalogPath);
  const base = path.basename(catalogPath, path.extname(catalogPath));

  return [
    path.join(dir, `${base} Smart Previews.lrdata`),
    path.join(dir, "Smart Previews.lrdata"),
  ];
}

// A usable preview is a non-empty regular file.
async function isNonEmptyFile(p: string): Promise<boolean> {
  try {
    const stat = await fs.stat(p);
    return stat.isFile() && stat.size > 0;
  } catch {
    return false;
  }
}

export class PreviewLocator {
  constructor(
    private readonly volumes: VolumeResolver,
    private readonly rootId: string = PREVIEW_ROOT_ID,
  ) {}

  async locate(identity: PhotoIdentity): Promise<PreviewHandle> {
    if (!identity.previewToken) {
      return { status: "invalid", reason: "no preview token" };
    }

    const root = await this.volumes.resolve(this.rootId);
    if (root.status === "unavailable") {
      return { status: "invalid", reason: `preview cache ${root.reason}` };
    }

    for (const relative of previewCandidates(identity.previewToken)) {
      const candidate = path.join(root.path, relative);
      if (await isNonEmptyFile(candidate)) {
        return { status: "valid", rootId: this.rootId, path: candidate };
      }
    }

    return { status: "invalid", reason: "no preview in cache" };
  }
}
