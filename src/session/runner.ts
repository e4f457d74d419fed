/**
 * Tagging session
 *
 * Walks the enumerated photos one at a time:
 *   preview -> (original fallback) -> model -> tag policy -> destinations
 *   -> counters -> checkpoint
 *
 * Control:
 * - `requestPause()` / `requestStop()` only set a flag; the loop honours it
 *   at the next photo boundary, so a photo's writes are never cut in half.
 * - pause keeps the checkpoint (status "paused"), stop and completion clear it.
 * - resume re-enumerates the source with the keyword mark taken at start and
 *   skips the first `cursor` photos.
 *
 * Per-photo problems end up in the counters; only startup problems (config
 * mismatch, invalid transition) throw.
 */

import { ConfigMismatchError, InvalidTransitionError } from "~/lib/errors";
import { errorMessage, type Logger } from "~/lib/log/logger";
import { existingKeywords, generatedNames, type KeywordSet } from "~/lib/tags/keywords";
import { applyTagPolicy } from "~/lib/tags/transform";
import type { TaggingService } from "~/server/ai/tagging-service";
import type { ImageLoader } from "~/server/storage/images";
import type { OriginalLocator, OriginalResolution } from "~/server/storage/originals";
import type { PreviewLocator } from "~/server/storage/previews";
import {
  CHECKPOINT_SCHEMA_VERSION,
  type CheckpointManager,
  type SessionState,
} from "~/session/checkpoint";
import { diffConfig, type Destination, type SessionConfig } from "~/session/config";
import {
  emptyCounters,
  tallyPhoto,
  type AnalysisInput,
  type SessionCounters,
} from "~/session/counters";
import { describePhoto, type PhotoIdentity } from "~/session/photo";
import type { PhotoSource } from "~/session/sources";
import {
  summarize,
  type PhotoSummary,
  type WriteCoordinator,
  type WriteOutcome,
  type WriteResults,
} from "~/session/write-coordinator";

export type SessionStatus = "idle" | "running" | "paused" | "stopped" | "completed";
export type SessionAction = "start" | "pause" | "resume" | "stop" | "complete";

/**
 * Allowed transitions. `idle -> resume` is a paused session picked up by a
 * new process from its checkpoint.
 */
export const SESSION_TRANSITIONS: Readonly<
  Record<SessionStatus, Readonly<Partial<Record<SessionAction, SessionStatus>>>>
> = {
  idle: { start: "running", resume: "running" },
  running: { pause: "paused", stop: "stopped", complete: "completed" },
  paused: { resume: "running", stop: "stopped" },
  stopped: {},
  completed: {},
};

export function nextStatus(from: SessionStatus, action: SessionAction): SessionStatus {
  const to = SESSION_TRANSITIONS[from][action];
  if (to === undefined) throw new InvalidTransitionError(from, action);
  return to;
}

export type SessionControls = {
  start: boolean;
  pause: boolean;
  resume: boolean;
  stop: boolean;
};

/**
 * Which of the four operator controls are enabled. With no process running
 * ("idle"), stop and resume act on a saved checkpoint.
 */
export function availableControls(
  status: SessionStatus,
  options: { hasCheckpoint: boolean },
): SessionControls {
  switch (status) {
    case "idle":
      return {
        start: true,
        pause: false,
        resume: options.hasCheckpoint,
        stop: options.hasCheckpoint,
      };
    case "running":
      return { start: false, pause: true, resume: false, stop: true };
    case "paused":
      return { start: false, pause: false, resume: true, stop: true };
    case "stopped":
    case "completed":
      return { start: false, pause: false, resume: false, stop: false };
  }
}

export type PhotoResult = {
  input: AnalysisInput;
  generated: string[];
  results: WriteResults;
  summary: PhotoSummary;
};

export type ProgressEvent = {
  // Zero-based position in the enumeration.
  index: number;
  total: number;
  photo: PhotoIdentity;
  result: PhotoResult;
  counters: SessionCounters;
};

export type SessionResult = {
  status: "paused" | "stopped" | "completed";
  cursor: number;
  totalPhotos: number;
  counters: SessionCounters;
};

export type SessionDeps = {
  config: SessionConfig;
  source: PhotoSource;
  // Null when the source has no previews (folder sources).
  previews: Pick<PreviewLocator, "locate"> | null;
  originals: Pick<OriginalLocator, "locate">;
  images: ImageLoader;
  tagging: Pick<TaggingService, "describe">;
  coordinator: WriteCoordinator;
  checkpoint: CheckpointManager;
  logger: Logger;
  now?: () => Date;
  onProgress?: (event: ProgressEvent) => void;
};

type PendingSignal = "pause" | "stop" | null;

export class TaggingSession {
  private state: SessionStatus = "idle";
  private pending: PendingSignal = null;
  private keywordMark: number | null = null;

  constructor(private readonly deps: SessionDeps) {}

  get status(): SessionStatus {
    return this.state;
  }

  // Honoured after the photo in flight. A stop request is never downgraded to a pause.
  requestPause(): void {
    if (this.state !== "running") throw new InvalidTransitionError(this.state, "pause");
    if (this.pending === null) this.pending = "pause";
  }

  requestStop(): void {
    if (this.state !== "running") throw new InvalidTransitionError(this.state, "stop");
    this.pending = "stop";
  }

  async start(): Promise<SessionResult> {
    this.transition("start");
    this.keywordMark = await this.deps.source.keywordMark();
    const photos = await this.deps.source.enumerate(this.keywordMark);

    this.deps.logger.info(
      `session=start source=${this.deps.config.source.kind} photos=${photos.length} destinations=${this.deps.config.destinations.join(",")}`,
    );

    return this.run(photos, 0, emptyCounters());
  }

  /**
   * Continue a saved session. The saved configuration must match the one
   * this session was built with, remaps aside.
   */
  async resume(saved: SessionState): Promise<SessionResult> {
    const differences = diffConfig(saved.config, this.deps.config);
    if (differences.length > 0) throw new ConfigMismatchError(differences);

    this.transition("resume");
    // The mark from the first start: photos this session tagged stay listed.
    this.keywordMark = saved.keywordMark;
    const photos = await this.deps.source.enumerate(this.keywordMark);

    if (photos.length !== saved.totalPhotos) {
      this.deps.logger.warn(
        `session=resume photos=${photos.length} saved_total=${saved.totalPhotos} (source changed since pause; the resume boundary may have shifted)`,
      );
    }

    // Clamped: the source may have shrunk.
    const cursor = Math.min(saved.cursor, photos.length);
    this.deps.logger.info(`session=resume cursor=${cursor} photos=${photos.length}`);

    return this.run(photos, cursor, saved.counters);
  }

  private transition(action: SessionAction): void {
    this.state = nextStatus(this.state, action);
  }

  private async run(
    photos: readonly PhotoIdentity[],
    startAt: number,
    initial: SessionCounters,
  ): Promise<SessionResult> {
    let counters = initial;
    let cursor = startAt;

    while (cursor < photos.length) {
      // Signals land here only, between two photos.
      const signal = this.takeSignal();

      if (signal === "stop") {
        this.transition("stop");
        await this.deps.checkpoint.clear();
        this.deps.logger.info(`session=stopped cursor=${cursor} photos=${photos.length}`);
        return { status: "stopped", cursor, totalPhotos: photos.length, counters };
      }

      if (signal === "pause") {
        this.transition("pause");
        await this.saveCheckpoint("paused", cursor, photos.length, counters);
        this.deps.logger.info(`session=paused cursor=${cursor} photos=${photos.length}`);
        return { status: "paused", cursor, totalPhotos: photos.length, counters };
      }

      const photo = photos[cursor];
      if (photo === undefined) break;

      const result = await this.processPhoto(photo);
      counters = tallyPhoto(counters, {
        input: result.input,
        degraded: result.input === "original" && this.deps.previews !== null,
        generatedCount: result.generated.length,
        results: result.results,
        summary: result.summary,
      });
      cursor++;

      // cursor counts finished photos; a crash resumes at the next one.
      await this.saveCheckpoint("running", cursor, photos.length, counters);

      this.deps.onProgress?.({
        index: cursor - 1,
        total: photos.length,
        photo,
        result,
        counters,
      });
    }

    this.transition("complete");
    await this.deps.checkpoint.clear();
    this.deps.logger.info(`session=completed photos=${photos.length}`);

    return { status: "completed", cursor, totalPhotos: photos.length, counters };
  }

  private takeSignal(): PendingSignal {
    const signal = this.pending;
    this.pending = null;
    return signal;
  }

  private async saveCheckpoint(
    status: "running" | "paused",
    cursor: number,
    totalPhotos: number,
    counters: SessionCounters,
  ): Promise<void> {
    const now = this.deps.now?.() ?? new Date();
    await this.deps.checkpoint.save({
      schemaVersion: CHECKPOINT_SCHEMA_VERSION,
      savedAt: now.toISOString(),
      status,
      config: this.deps.config,
      keywordMark: this.keywordMark,
      cursor,
      totalPhotos,
      counters,
    });
  }

  private async processPhoto(photo: PhotoIdentity): Promise<PhotoResult> {
    const label = describePhoto(photo);

    // Resolved at most once per photo, and only if something needs it.
    let originalResolution: Promise<OriginalResolution> | undefined;
    const original = () => (originalResolution ??= this.deps.originals.locate(photo));

    const { input, image } = await this.loadImage(photo, original);
    const phrases = image ? await this.deps.tagging.describe(image, label) : [];

    let finalSet: KeywordSet;
    try {
      const existing = await this.deps.source.existingKeywords(photo, original);
      finalSet = applyTagPolicy(phrases, existingKeywords(existing), this.deps.config.tagPolicy);
    } catch (err) {
      // Without the current keywords nothing can be merged safely.
      const error = errorMessage(err);
      this.deps.logger.error(`${label} existing=unreadable err=${error}`);

      const results = new Map<Destination, WriteOutcome>();
      for (const destination of this.deps.config.destinations) {
        results.set(destination, { status: "failed", error });
      }
      return { input, generated: [], results, summary: "failed" };
    }

    const generated = generatedNames(finalSet);
    const results = await this.deps.coordinator.write(photo, finalSet, original);
    const summary = summarize(results);

    const outcomes = Array.from(results, ([destination, outcome]) => `${destination}=${outcome.status}`);
    this.deps.logger.info(
      `${label} input=${input} new=${generated.length} ${outcomes.join(" ")} result=${summary}`,
    );

    return { input, generated, results, summary };
  }

  private async loadImage(
    photo: PhotoIdentity,
    original: () => Promise<OriginalResolution>,
  ): Promise<{ input: AnalysisInput; image: Buffer | null }> {
    const label = describePhoto(photo);

    if (this.deps.previews) {
      const preview = await this.deps.previews.locate(photo);
      if (preview.status === "valid") {
        const image = await this.deps.images.load(preview.path);
        if (image) return { input: "preview", image };
        this.deps.logger.warn(`${label} preview=undecodable path=${preview.path}`);
      } else {
        this.deps.logger.debug(`${label} preview=invalid reason=${preview.reason}`);
      }
    }

    const resolved = await original();
    if (resolved.status === "inaccessible") {
      this.deps.logger.warn(`${label} original=unreachable reason=${resolved.reason}`);
      return { input: "none", image: null };
    }

    const image = await this.deps.images.load(resolved.path);
    return image ? { input: "original", image } : { input: "none", image: null };
  }
}
