/**
 * OriginalLocator
 *
 * Resolves the absolute path of a photo's original file through the
 * VolumeResolver and checks it is a readable regular file. Used as the
 * analysis fallback when no preview exists, and as the anchor of the
 * sidecar path.
 */

import fs from "node:fs/promises";
import { constants } from "node:fs";
import path from "node:path";

import type { PhotoIdentity } from "~/session/photo";
import type { VolumeResolver } from "~/server/storage/volumes";

export type OriginalResolution =
  | { status: "accessible"; path: string }
  | { status: "inaccessible"; reason: string };

export class OriginalLocator {
  constructor(private readonly volumes: VolumeResolver) {}

  async locate(identity: PhotoIdentity): Promise<OriginalResolution> {
    const root = await this.volumes.resolve(identity.rootId);
    if (root.status === "unavailable") {
      return { status: "inaccessible", reason: root.reason };
    }

    const segments = identity.relativePath.split("/").filter((s) => s.length > 0);
    const absolute = path.join(root.path, ...segments);

    try {
      const stat = await fs.stat(absolute);
      if (!stat.isFile()) {
        return { status: "inaccessible", reason: `not a file: ${absolute}` };
      }
      await fs.access(absolute, constants.R_OK);
    } catch {
      return { status: "inaccessible", reason: `missing or unreadable: ${absolute}` };
    }

    return { status: "accessible", path: absolute };
  }
}
