import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { ConfigMismatchError, InvalidTransitionError } from "~/lib/errors";
import { silentLogger } from "~/lib/log/logger";
import { openCatalog, type CatalogStore } from "~/server/db";
import { createTestCatalog } from "~/server/db/test-catalog";
import type { ImageLoader } from "~/server/storage/images";
import { OriginalLocator } from "~/server/storage/originals";
import { PREVIEW_ROOT_ID, PreviewLocator, previewCandidates } from "~/server/storage/previews";
import { readSidecarKeywords } from "~/server/storage/sidecar";
import { VolumeResolver } from "~/server/storage/volumes";
import { CheckpointManager } from "./checkpoint";
import { buildSessionConfig, type SessionConfig } from "./config";
import { emptyCounters, type SessionCounters } from "./counters";
import { formatCounters } from "./report";
import {
  availableControls,
  nextStatus,
  TaggingSession,
  type ProgressEvent,
  type SessionDeps,
} from "./runner";
import { catalogSource } from "./sources";
import { WriteCoordinator } from "./write-coordinator";

const TOKENS = [
  "22525EB1-CB1F-4C04-9347-237F3FD2F64A",
  "3A1F0C22-0B6E-4C1B-9D55-5E0E6B1C7A10",
  "4B7D9E01-77AA-4F3C-8C21-0D9A6E5F2B33",
];

// Loads any path: the runner only needs some bytes to hand to the tagger.
const fakeImages: ImageLoader = {
  load: async (filePath) => Buffer.from(filePath),
};

describe("session transitions", () => {
  it("follows the transition table", () => {
    expect(nextStatus("idle", "start")).toBe("running");
    expect(nextStatus("running", "pause")).toBe("paused");
    expect(nextStatus("paused", "resume")).toBe("running");
    expect(nextStatus("paused", "stop")).toBe("stopped");
    expect(nextStatus("running", "complete")).toBe("completed");
  });

  it("rejects edges out of terminal states", () => {
    expect(() => nextStatus("completed", "resume")).toThrow(InvalidTransitionError);
    expect(() => nextStatus("stopped", "start")).toThrow(InvalidTransitionError);
    expect(() => nextStatus("running", "start")).toThrow(InvalidTransitionError);
  });

  it("enables controls consistently with the table", () => {
    expect(availableControls("idle", { hasCheckpoint: false })).toEqual({
      start: true,
      pause: false,
      resume: false,
      stop: false,
    });
    expect(availableControls("idle", { hasCheckpoint: true })).toEqual({
      start: true,
      pause: false,
      resume: true,
      stop: true,
    });
    expect(availableControls("running", { hasCheckpoint: true })).toEqual({
      start: false,
      pause: true,
      resume: false,
      stop: true,
    });
    expect(availableControls("paused", { hasCheckpoint: true })).toEqual({
      start: false,
      pause: false,
      resume: true,
      stop: true,
    });
    expect(availableControls("completed", { hasCheckpoint: false })).toEqual({
      start: false,
      pause: false,
      resume: false,
      stop: false,
    });
  });
});

describe("TaggingSession", () => {
  let tmp: string;
  let catalogPath: string;
  let photosDir: string;
  let catalog: CatalogStore;
  let config: SessionConfig;
  let checkpoint: CheckpointManager;

  beforeEach(() => {
    tmp = fs.mkdtempSync(path.join(os.tmpdir(), "session-"));
    catalogPath = path.join(tmp, "Main.lrcat");
    photosDir = path.join(tmp, "photos");

    createTestCatalog(catalogPath, {
      roots: [{ id: 1, absolutePath: `${photosDir}/`, name: "photos" }],
      photos: [
        { id: 10, rootId: 1, folder: "2021/", baseName: "IMG_0001", extension: "jpg", previewToken: TOKENS[0], keywords: ["Lake"] },
        { id: 11, rootId: 1, folder: "2021/", baseName: "IMG_0002", extension: "jpg", previewToken: TOKENS[1] },
        { id: 12, rootId: 1, folder: "2021/", baseName: "IMG_0003", extension: "jpg", previewToken: TOKENS[2] },
      ],
    });

    // Originals 1 and 3 exist; original 2 is gone.
    fs.mkdirSync(path.join(photosDir, "2021"), { recursive: true });
    fs.writeFileSync(path.join(photosDir, "2021", "IMG_0001.jpg"), "jpeg-1");
    fs.writeFileSync(path.join(photosDir, "2021", "IMG_0003.jpg"), "jpeg-3");

    const cache = path.join(tmp, "Main Smart Previews.lrdata");
    for (const token of TOKENS) {
      const relative = previewCandidates(token)[0] ?? `${token}.dng`;
      fs.mkdirSync(path.dirname(path.join(cache, relative)), { recursive: true });
      fs.writeFileSync(path.join(cache, relative), "preview");
    }

    config = buildSessionConfig({
      source: { kind: "catalog", catalogPath },
      destinations: ["sidecar", "catalog"],
      mode: { kind: "auto" },
      model: "test-model",
      language: "english",
      tagPolicy: {
        casing: "capitalize",
        maxTags: 5,
        suffix: { enabled: true, suffix: "ai", separator: "_" },
      },
    });

    catalog = openCatalog(catalogPath, { logger: silentLogger });
    checkpoint = new CheckpointManager(path.join(tmp, "state", "checkpoint.json"));
  });

  afterEach(() => {
    catalog.close();
    fs.rmSync(tmp, { recursive: true, force: true });
  });

  function deps(overrides: Partial<SessionDeps> = {}): SessionDeps {
    const source = catalogSource(catalog, {});
    const volumes = new VolumeResolver(source.roots(), { logger: silentLogger });
    volumes.register({
      id: PREVIEW_ROOT_ID,
      absolutePath: path.join(tmp, "Main Smart Previews.lrdata"),
      name: "previews",
    });

    return {
      config,
      source,
      previews: new PreviewLocator(volumes),
      originals: new OriginalLocator(volumes),
      images: fakeImages,
      tagging: { describe: async () => ["Mountain", "mountain", "Lake"] },
      coordinator: new WriteCoordinator(
        [
          { destination: "catalog", catalog },
          { destination: "sidecar", suffix: config.tagPolicy.suffix },
        ],
        silentLogger,
      ),
      checkpoint,
      logger: silentLogger,
      now: () => new Date("2024-05-01T10:00:00Z"),
      ...overrides,
    };
  }

  const expectedTotals: SessionCounters = {
    ...emptyCounters(),
    processed: 3,
    catalogWritten: 3,
    sidecarWritten: 2,
    skippedUnreachable: 1,
    analyzed: 3,
  };

  it("writes every reachable destination and skips the missing original's sidecar", async () => {
    const result = await new TaggingSession(deps()).start();

    expect(result).toEqual({
      status: "completed",
      cursor: 3,
      totalPhotos: 3,
      counters: expectedTotals,
    });
    expect(formatCounters(result.counters)[0]).toBe("catalog=3 sidecar=2 skipped=1");

    expect(catalog.getKeywords(10)).toEqual(["Lake", "Mountain_ai"]);
    expect(catalog.getKeywords(11)).toEqual(["Mountain_ai", "Lake_ai"]);

    const sidecar1 = path.join(photosDir, "2021", "IMG_0001.xmp");
    expect(await readSidecarKeywords(path.join(photosDir, "2021", "IMG_0001.jpg"))).toEqual([
      "Lake",
      "Mountain_ai",
    ]);
    expect(fs.existsSync(sidecar1)).toBe(true);
    expect(fs.existsSync(path.join(photosDir, "2021", "IMG_0002.xmp"))).toBe(false);

    expect((await checkpoint.load()).status).toBe("absent");
  });

  it("reports each photo's outcome in order", async () => {
    const events: ProgressEvent[] = [];
    await new TaggingSession(deps({ onProgress: (e) => events.push(e) })).start();

    expect(events.map((e) => e.photo.photoId)).toEqual(["10", "11", "12"]);
    expect(events[1]?.result.results.get("sidecar")).toEqual({
      status: "skipped-unreachable",
      reason: `missing or unreadable: ${path.join(photosDir, "2021", "IMG_0002.jpg")}`,
    });
    expect(events[1]?.result.summary).toBe("processed");
    expect(events[2]?.counters.catalogWritten).toBe(3);
  });

  it("does not add anything on a second run", async () => {
    await new TaggingSession(deps()).start();
    const again = await new TaggingSession(deps()).start();

    expect(again.counters.catalogWritten).toBe(0);
    expect(again.counters.sidecarWritten).toBe(0);
    expect(again.counters.processed).toBe(3);
    expect(catalog.getKeywords(10)).toEqual(["Lake", "Mountain_ai"]);
  });

  it("pauses at a photo boundary and resumes at the next photo", async () => {
    const infer = vi.fn(async () => ["Mountain"]);

    const first = new TaggingSession(
      deps({
        tagging: { describe: infer },
        onProgress: (e) => {
          if (e.index === 0) first.requestPause();
        },
      }),
    );
    const paused = await first.start();

    expect(paused.status).toBe("paused");
    expect(paused.cursor).toBe(1);
    expect(first.status).toBe("paused");
    expect(infer).toHaveBeenCalledTimes(1);

    const saved = await checkpoint.load();
    if (saved.status !== "found") throw new Error(`expected a checkpoint, got ${saved.status}`);
    expect(saved.state.status).toBe("paused");
    expect(saved.state.cursor).toBe(1);
    expect(saved.state.totalPhotos).toBe(3);
    expect(saved.state.savedAt).toBe("2024-05-01T10:00:00.000Z");

    const second = new TaggingSession(deps({ tagging: { describe: infer } }));
    const done = await second.resume(saved.state);

    expect(infer).toHaveBeenCalledTimes(3);
    expect(done.status).toBe("completed");
    expect(done.counters).toEqual({
      ...emptyCounters(),
      processed: 3,
      catalogWritten: 3,
      sidecarWritten: 2,
      skippedUnreachable: 1,
      analyzed: 3,
    });
    expect((await checkpoint.load()).status).toBe("absent");
  });

  it("ends with the same counters as an uninterrupted run", async () => {
    const uninterrupted = await new TaggingSession(deps()).start();

    // Fresh catalog and originals for the interrupted run.
    catalog.close();
    fs.rmSync(path.join(photosDir, "2021", "IMG_0001.xmp"));
    fs.rmSync(path.join(photosDir, "2021", "IMG_0003.xmp"));
    fs.rmSync(catalogPath);
    createTestCatalog(catalogPath, {
      roots: [{ id: 1, absolutePath: `${photosDir}/`, name: "photos" }],
      photos: [
        { id: 10, rootId: 1, folder: "2021/", baseName: "IMG_0001", extension: "jpg", previewToken: TOKENS[0], keywords: ["Lake"] },
        { id: 11, rootId: 1, folder: "2021/", baseName: "IMG_0002", extension: "jpg", previewToken: TOKENS[1] },
        { id: 12, rootId: 1, folder: "2021/", baseName: "IMG_0003", extension: "jpg", previewToken: TOKENS[2] },
      ],
    });
    catalog = openCatalog(catalogPath, { logger: silentLogger });

    const first = new TaggingSession(
      deps({
        onProgress: (e) => {
          if (e.index === 1) first.requestPause();
        },
      }),
    );
    await first.start();

    const saved = await checkpoint.load();
    if (saved.status !== "found") throw new Error(`expected a checkpoint, got ${saved.status}`);
    expect(saved.state.cursor).toBe(2);

    const resumed = await new TaggingSession(deps()).resume(saved.state);
    expect(resumed.counters).toEqual(uninterrupted.counters);
  });

  it("resumes an untagged-only session without skipping photos", async () => {
    const untaggedConfig = buildSessionConfig({
      source: { kind: "catalog", catalogPath, filters: { onlyUntagged: true } },
      destinations: ["catalog"],
      mode: { kind: "auto" },
      model: "test-model",
      language: "english",
      tagPolicy: config.tagPolicy,
    });
    const infer = vi.fn(async () => ["Mountain"]);
    const untaggedDeps = (overrides: Partial<SessionDeps> = {}) =>
      deps({
        config: untaggedConfig,
        source: catalogSource(catalog, { onlyUntagged: true }),
        tagging: { describe: infer },
        coordinator: new WriteCoordinator([{ destination: "catalog", catalog }], silentLogger),
        ...overrides,
      });

    const first = new TaggingSession(
      untaggedDeps({
        onProgress: () => first.requestPause(),
      }),
    );
    const paused = await first.start();
    expect(paused).toMatchObject({ status: "paused", cursor: 1, totalPhotos: 2 });

    const saved = await checkpoint.load();
    if (saved.status !== "found") throw new Error(`expected a checkpoint, got ${saved.status}`);
    expect(saved.state.keywordMark).toBe(1);

    const done = await new TaggingSession(untaggedDeps()).resume(saved.state);

    expect(done).toMatchObject({ status: "completed", cursor: 2, totalPhotos: 2 });
    expect(infer).toHaveBeenCalledTimes(2);
    expect(catalog.getKeywords(11)).toEqual(["Mountain_ai"]);
    expect(catalog.getKeywords(12)).toEqual(["Mountain_ai"]);
  });

  it("stops at the next boundary and clears the checkpoint", async () => {
    const infer = vi.fn(async () => ["Mountain"]);
    const session = new TaggingSession(
      deps({
        tagging: { describe: infer },
        onProgress: () => session.requestStop(),
      }),
    );

    const result = await session.start();

    expect(result.status).toBe("stopped");
    expect(result.cursor).toBe(1);
    expect(infer).toHaveBeenCalledTimes(1);
    expect((await checkpoint.load()).status).toBe("absent");
    expect(() => session.requestPause()).toThrow(InvalidTransitionError);
  });

  it("keeps a stop requested after a pause", async () => {
    const session = new TaggingSession(
      deps({
        onProgress: () => {
          session.requestStop();
          session.requestPause();
        },
      }),
    );

    expect((await session.start()).status).toBe("stopped");
  });

  it("refuses to resume under a different configuration", async () => {
    const session = new TaggingSession(deps());
    const saved = {
      schemaVersion: 1 as const,
      savedAt: "2024-05-01T09:00:00.000Z",
      status: "paused" as const,
      config: { ...config, model: "other-model" },
      keywordMark: null,
      cursor: 1,
      totalPhotos: 3,
      counters: emptyCounters(),
    };

    await expect(session.resume(saved)).rejects.toBeInstanceOf(ConfigMismatchError);
    await expect(session.resume(saved)).rejects.toThrow(
      "model (saved=\"other-model\" requested=\"test-model\")",
    );
    expect(session.status).toBe("idle");
  });

  it("ignores remaps when comparing configurations", async () => {
    const session = new TaggingSession(deps());
    const saved = {
      schemaVersion: 1 as const,
      savedAt: "2024-05-01T09:00:00.000Z",
      status: "paused" as const,
      config: { ...config, remaps: [{ from: "/Volumes/Old", to: "/Volumes/New" }] },
      keywordMark: null,
      cursor: 3,
      totalPhotos: 3,
      counters: expectedTotals,
    };

    const result = await session.resume(saved);
    expect(result).toEqual({ status: "completed", cursor: 3, totalPhotos: 3, counters: expectedTotals });
  });

  it("still merges existing keywords when the model returns nothing", async () => {
    const result = await new TaggingSession(deps({ tagging: { describe: async () => [] } })).start();

    expect(result.counters).toEqual({
      ...emptyCounters(),
      processed: 3,
      // Photo 1's catalog keyword is copied into its new sidecar.
      sidecarWritten: 1,
      skippedUnreachable: 1,
      analyzed: 3,
      skippedNoTags: 3,
    });
    expect(catalog.getKeywords(10)).toEqual(["Lake"]);
    expect(await readSidecarKeywords(path.join(photosDir, "2021", "IMG_0001.jpg"))).toEqual([
      "Lake",
    ]);
  });

  it("falls back to the original when the preview is missing", async () => {
    fs.rmSync(path.join(tmp, "Main Smart Previews.lrdata"), { recursive: true });
    const loaded: string[] = [];
    const images: ImageLoader = {
      load: async (p) => {
        loaded.push(p);
        return Buffer.from(p);
      },
    };

    const result = await new TaggingSession(deps({ images })).start();

    expect(loaded).toEqual([
      path.join(photosDir, "2021", "IMG_0001.jpg"),
      path.join(photosDir, "2021", "IMG_0003.jpg"),
    ]);
    expect(result.counters.analyzed).toBe(2);
    expect(result.counters.degraded).toBe(2);
    expect(result.counters.noImage).toBe(1);
    expect(result.counters.skippedNoTags).toBe(1);
    expect(catalog.getKeywords(11)).toEqual([]);
  });

  it("counts a photo as failed when no destination takes the keywords", async () => {
    const result = await new TaggingSession(
      deps({
        coordinator: new WriteCoordinator(
          [
            {
              destination: "catalog",
              catalog: {
                addKeywords: () => {
                  throw new Error("disk I/O error");
                },
              },
            },
            { destination: "sidecar", suffix: config.tagPolicy.suffix },
          ],
          silentLogger,
        ),
      }),
    ).start();

    expect(result.counters.catalogFailed).toBe(3);
    expect(result.counters.sidecarWritten).toBe(2);
    expect(result.counters.partial).toBe(2);
    expect(result.counters.failed).toBe(1);
  });
});
