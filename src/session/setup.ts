/**
 * Wires a TaggingSession from a validated config and the runtime settings.
 *
 * Opening the catalog happens here, so `CatalogLockedError` and
 * `CatalogOpenError` surface before any photo is touched. Call `close()`
 * when the session returns to release the catalog.
 */

import fs from "node:fs";
import path from "node:path";

import { ConfigError } from "~/lib/errors";
import type { Logger } from "~/lib/log/logger";
import { OllamaVisionTagger, type VisionTagger } from "~/server/ai/ollama-vision-tagger";
import { TaggingService } from "~/server/ai/tagging-service";
import { openCatalog, type CatalogStore } from "~/server/db";
import { SharpImageLoader, type ImageLoader } from "~/server/storage/images";
import { OriginalLocator } from "~/server/storage/originals";
import {
  PREVIEW_ROOT_ID,
  PreviewLocator,
  previewCacheCandidates,
} from "~/server/storage/previews";
import { VolumeResolver } from "~/server/storage/volumes";
import { CheckpointManager } from "~/session/checkpoint";
import type { RuntimeSettings, SessionConfig } from "~/session/config";
import { TaggingSession, type ProgressEvent } from "~/session/runner";
import { catalogSource, folderSource, type PhotoSource } from "~/session/sources";
import { WriteCoordinator, type DestinationWriter } from "~/session/write-coordinator";

export type SessionSetup = {
  session: TaggingSession;
  checkpoint: CheckpointManager;
  close: () => void;
};

export type SessionSetupOptions = {
  logger: Logger;
  onProgress?: (event: ProgressEvent) => void;
  // Stand-ins for the sharp loader and the inference service (tests).
  images?: ImageLoader;
  tagger?: VisionTagger;
};

// The first cache folder that exists, else the canonical one (reported missing per photo).
function previewCacheFor(catalogPath: string): string {
  const candidates = previewCacheCandidates(path.resolve(catalogPath));
  return candidates.find((c) => fs.existsSync(c)) ?? candidates[0] ?? catalogPath;
}

function writersFor(config: SessionConfig, catalog: CatalogStore | null): DestinationWriter[] {
  return config.destinations.map((destination): DestinationWriter => {
    if (destination === "sidecar") return { destination, suffix: config.tagPolicy.suffix };
    if (!catalog) {
      throw new ConfigError("The catalog destination needs a catalog source (use --to sidecar).");
    }
    return { destination, catalog };
  });
}

export function createSession(
  config: SessionConfig,
  settings: RuntimeSettings,
  options: SessionSetupOptions,
): SessionSetup {
  const { logger } = options;
  const source = config.source;

  const catalog =
    source.kind === "catalog" ? openCatalog(source.catalogPath, { logger }) : null;

  try {
    let photos: PhotoSource;
    let volumes: VolumeResolver;
    let previews: PreviewLocator | null = null;

    if (source.kind === "catalog" && catalog) {
      photos = catalogSource(catalog, source.filters);
      volumes = new VolumeResolver(photos.roots(), { remaps: config.remaps, logger });

      const cache = previewCacheFor(source.catalogPath);
      volumes.register({ id: PREVIEW_ROOT_ID, absolutePath: cache, name: path.basename(cache) });
      previews = new PreviewLocator(volumes);
    } else if (source.kind === "folder") {
      photos = folderSource(source.folderPath, { recursive: source.recursive, logger });
      volumes = new VolumeResolver(photos.roots(), { remaps: config.remaps, logger });
    } else {
      throw new ConfigError("Catalog source without an open catalog");
    }

    const tagger =
      options.tagger ??
      new OllamaVisionTagger({
        baseUrl: settings.inference.baseUrl,
        model: config.model,
        timeoutMs: settings.inference.timeoutMs,
      });

    const tagging = new TaggingService(
      tagger,
      {
        mode: config.mode,
        language: config.language,
        maxTags: config.tagPolicy.maxTags,
        retry: {
          maxRetries: settings.inference.maxRetries,
          baseDelayMs: settings.inference.retryBaseMs,
        },
      },
      { logger },
    );
    logger.info(`tagger model=${tagging.model} calls_per_photo=${tagging.callsPerPhoto}`);

    const checkpoint = new CheckpointManager(settings.checkpointPath);

    const session = new TaggingSession({
      config,
      source: photos,
      previews,
      originals: new OriginalLocator(volumes),
      images: options.images ?? new SharpImageLoader(settings.image, logger),
      tagging,
      coordinator: new WriteCoordinator(writersFor(config, catalog), logger),
      checkpoint,
      logger,
      onProgress: options.onProgress,
    });

    return {
      session,
      checkpoint,
      close: () => catalog?.close(),
    };
  } catch (err) {
    catalog?.close();
    throw err;
  }
}
