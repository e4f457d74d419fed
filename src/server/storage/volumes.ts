/**
 * VolumeResolver
 *
 * Maps a logical storage-root id (a catalog root folder, the preview cache,
 * a tagged folder) to a currently mounted directory, or reports it
 * unavailable. External disks get unmounted; that is an expected outcome and
 * is returned as a value, never thrown.
 *
 * Verdicts are cached per root id for the resolver's lifetime, so a root is
 * checked at most once per session. Build a new resolver on every
 * start/resume: mounts may have changed in between.
 */

import fs from "node:fs/promises";
import path from "node:path";

import type { Logger } from "~/lib/log/logger";

export type StorageRoot = {
  id: string;
  absolutePath: string;
  name: string;
};

export type VolumeResolution =
  | { status: "mounted"; path: string }
  | { status: "unavailable"; mountPoint: string; reason: string };

// Rewrites a path prefix, e.g. a disk renamed from /Volumes/Old to /Volumes/New.
export type PathRemap = {
  from: string;
  to: string;
};

export function applyRemaps(absolutePath: string, remaps: readonly PathRemap[]): string {
  for (const remap of remaps) {
    const from = stripTrailingSeparators(remap.from);
    const matches =
      absolutePath === from ||
      absolutePath.startsWith(`${from}/`) ||
      absolutePath.startsWith(`${from}\\`);

    if (matches) {
      return `${stripTrailingSeparators(remap.to)}${absolutePath.slice(from.length)}`;
    }
  }

  return absolutePath;
}

function stripTrailingSeparators(p: string): string {
  const stripped = p.replace(/[\\/]+$/, "");
  return stripped.length > 0 ? stripped : p;
}

/**
 * Mount point that must exist for a path to be reachable.
 *
 * - macOS external disks:  /Volumes/<disk>
 * - Linux removable media: /media/<user>/<disk>, /run/media/<user>/<disk>
 * - Linux manual mounts:   /mnt/<disk>
 * - Windows:               <drive letter>:\
 * - anything else:         the path itself
 */
export function mountPointOf(absolutePath: string): string {
  const drive = /^([A-Za-z]:)[\\/]/.exec(absolutePath);
  if (drive?.[1]) return `${drive[1]}\\`;

  const parts = absolutePath.split("/");

  // ["", "Volumes", "<disk>", ...]
  if (parts[1] === "Volumes" && parts[2]) return parts.slice(0, 3).join("/");
  if (parts[1] === "mnt" && parts[2]) return parts.slice(0, 3).join("/");
  if (parts[1] === "media" && parts[3]) return parts.slice(0, 4).join("/");
  if (parts[1] === "run" && parts[2] === "media" && parts[4]) {
    return parts.slice(0, 5).join("/");
  }

  return stripTrailingSeparators(absolutePath);
}

async function isDirectory(p: string): Promise<boolean> {
  try {
    const stat = await fs.stat(p);
    return stat.isDirectory();
  } catch {
    return false;
  }
}

export class VolumeResolver {
  private readonly roots = new Map<string, StorageRoot>();
  private readonly verdicts = new Map<string, VolumeResolution>();
  // One check per mount point for the resolver's lifetime.
  private readonly mountVerdicts = new Map<string, boolean>();

  constructor(
    roots: readonly StorageRoot[],
    private readonly options: { remaps?: readonly PathRemap[]; logger: Logger },
  ) {
    for (const root of roots) this.register(root);
  }

  register(root: StorageRoot): void {
    this.roots.set(root.id, root);
    this.verdicts.delete(root.id);
  }

  async resolve(rootId: string): Promise<VolumeResolution> {
    const cached = this.verdicts.get(rootId);
    if (cached) return cached;

    const verdict = await this.check(rootId);
    this.verdicts.set(rootId, verdict);
    return verdict;
  }

  private effectivePath(root: StorageRoot): string {
    return path.normalize(applyRemaps(root.absolutePath, this.options.remaps ?? []));
  }

  private async check(rootId: string): Promise<VolumeResolution> {
    const root = this.roots.get(rootId);
    if (!root) {
      return {
        status: "unavailable",
        mountPoint: "",
        reason: `unknown storage root id=${rootId}`,
      };
    }

    const effective = this.effectivePath(root);
    const mountPoint = mountPointOf(effective);

    let mounted = this.mountVerdicts.get(mountPoint);
    if (mounted === undefined) {
      mounted = await isDirectory(mountPoint);
      this.mountVerdicts.set(mountPoint, mounted);

      if (mounted) {
        this.options.logger.info(`volume=${mountPoint} mounted=true`);
      } else {
        this.options.logger.warn(
          `volume=${mountPoint} mounted=false (photos on it are skipped unless a preview exists)`,
        );
      }
    }

    const isOwnMount = mountPoint === stripTrailingSeparators(effective);

    if (!mounted) {
      return {
        status: "unavailable",
        mountPoint,
        reason: isOwnMount ? `folder missing: ${effective}` : "volume not mounted",
      };
    }

    if (!isOwnMount) {
      if (!(await isDirectory(effective))) {
        return {
          status: "unavailable",
          mountPoint,
          reason: `root folder missing: ${effective}`,
        };
      }
    }

    return { status: "mounted", path: effective };
  }
}
