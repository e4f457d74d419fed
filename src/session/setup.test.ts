import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { CatalogLockedError } from "~/lib/errors";
import { silentLogger, type Logger } from "~/lib/log/logger";
import type { VisionTagger } from "~/server/ai/ollama-vision-tagger";
import { createTestCatalog } from "~/server/db/test-catalog";
import type { ImageLoader } from "~/server/storage/images";
import { readSidecarKeywords } from "~/server/storage/sidecar";
import { buildSessionConfig, type RuntimeSettings } from "./config";
import { createSession } from "./setup";

const images: ImageLoader = { load: async (p) => Buffer.from(p) };

const tagger: VisionTagger = {
  model: "test-model",
  infer: async () => "1. Beach\n2. sunset",
};

describe("createSession", () => {
  let tmp: string;
  let settings: RuntimeSettings;

  beforeEach(() => {
    tmp = fs.mkdtempSync(path.join(os.tmpdir(), "setup-"));
    settings = {
      inference: { baseUrl: "http://localhost:11434", timeoutMs: 1000, maxRetries: 0, retryBaseMs: 0 },
      image: { maxSize: 512, jpegQuality: 70 },
      checkpointPath: path.join(tmp, "checkpoint.json"),
      logLevel: "error",
    };
  });

  afterEach(() => {
    fs.rmSync(tmp, { recursive: true, force: true });
  });

  it("tags a folder into sidecars", async () => {
    const folder = path.join(tmp, "photos");
    fs.mkdirSync(folder);
    fs.writeFileSync(path.join(folder, "a.jpg"), "x");
    fs.writeFileSync(path.join(folder, "b.jpg"), "x");

    const config = buildSessionConfig({
      source: { kind: "folder", folderPath: folder },
      destinations: ["sidecar"],
      mode: { kind: "auto" },
      model: "test-model",
      language: "english",
      tagPolicy: {
        casing: "capitalize",
        maxTags: 10,
        suffix: { enabled: true, suffix: "ai", separator: "_" },
      },
    });

    const setup = createSession(config, settings, { logger: silentLogger, images, tagger });
    try {
      const result = await setup.session.start();

      expect(result.status).toBe("completed");
      expect(result.counters.sidecarWritten).toBe(2);
      expect(result.counters.analyzed).toBe(2);
      expect(result.counters.degraded).toBe(0);
      expect(await readSidecarKeywords(path.join(folder, "a.jpg"))).toEqual([
        "Beach_ai",
        "Sunset_ai",
      ]);
      expect((await setup.checkpoint.load()).status).toBe("absent");
    } finally {
      setup.close();
    }
  });

  it("logs the model and the calls each photo costs", () => {
    const lines: string[] = [];
    const logger: Logger = { ...silentLogger, info: (...args) => lines.push(args.join(" ")) };

    const config = buildSessionConfig({
      source: { kind: "folder", folderPath: tmp },
      destinations: ["sidecar"],
      mode: {
        kind: "targeted",
        mappings: [
          { criterion: "a beach", tag: "Beach" },
          { criterion: "a dog", tag: "Dog" },
        ],
      },
      model: "test-model",
      language: "english",
      tagPolicy: {
        casing: "capitalize",
        maxTags: 10,
        suffix: { enabled: true, suffix: "ai", separator: "_" },
      },
    });

    const setup = createSession(config, settings, { logger, images, tagger });
    setup.close();

    expect(lines).toContain("tagger model=test-model calls_per_photo=2");
  });

  it("refuses a catalog that is open elsewhere", () => {
    const catalogPath = path.join(tmp, "Main.lrcat");
    createTestCatalog(catalogPath, { roots: [], photos: [] });
    fs.writeFileSync(`${catalogPath}.lock`, "");

    const config = buildSessionConfig({
      source: { kind: "catalog", catalogPath },
      destinations: ["catalog"],
      mode: { kind: "auto" },
      model: "test-model",
      language: "english",
      tagPolicy: {
        casing: "preserve",
        maxTags: 10,
        suffix: { enabled: false, suffix: "", separator: "" },
      },
    });

    expect(() => createSession(config, settings, { logger: silentLogger, images, tagger })).toThrow(
      CatalogLockedError,
    );
  });
});
