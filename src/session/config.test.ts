import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { ConfigError } from "~/lib/errors";
import { buildSessionConfig, diffConfig, type SessionConfigInput } from "./config";

describe("buildSessionConfig", () => {
  let tmp: string;
  let catalogPath: string;

  beforeEach(() => {
    tmp = fs.mkdtempSync(path.join(os.tmpdir(), "config-"));
    catalogPath = path.join(tmp, "Main.lrcat");
    fs.writeFileSync(catalogPath, "");
  });

  afterEach(() => {
    fs.rmSync(tmp, { recursive: true, force: true });
  });

  function input(overrides: Partial<SessionConfigInput> = {}): SessionConfigInput {
    return {
      source: { kind: "catalog", catalogPath },
      destinations: ["catalog"],
      mode: { kind: "auto" },
      model: "test-model",
      language: "english",
      tagPolicy: {
        casing: "capitalize",
        maxTags: 15,
        suffix: { enabled: true, suffix: "ai", separator: "_" },
      },
      ...overrides,
    };
  }

  it("fills defaults and orders destinations", () => {
    const config = buildSessionConfig(input({ destinations: ["sidecar", "catalog", "sidecar"] }));

    expect(config.destinations).toEqual(["catalog", "sidecar"]);
    expect(config.source).toEqual({ kind: "catalog", catalogPath, filters: {} });
    expect(config.remaps).toEqual([]);
  });

  it("defaults folder sources to a recursive walk", () => {
    const config = buildSessionConfig(
      input({ source: { kind: "folder", folderPath: tmp }, destinations: ["sidecar"] }),
    );
    expect(config.source).toEqual({ kind: "folder", folderPath: tmp, recursive: true });
  });

  it("names the offending field", () => {
    expect(() => buildSessionConfig(input({ destinations: [] }))).toThrow(
      "Invalid configuration: destinations: choose at least one destination",
    );
    expect(() => buildSessionConfig(input({ mode: { kind: "targeted", mappings: [] } }))).toThrow(
      "Invalid configuration: mode.mappings: targeted mode needs at least one criterion=tag mapping",
    );
  });

  it("rejects the catalog destination for a folder source", () => {
    expect(() =>
      buildSessionConfig(input({ source: { kind: "folder", folderPath: tmp } })),
    ).toThrow(ConfigError);
  });

  it("rejects a missing source", () => {
    const missing = path.join(tmp, "Other.lrcat");
    expect(() =>
      buildSessionConfig(input({ source: { kind: "catalog", catalogPath: missing } })),
    ).toThrow(`Source not found: ${missing}`);
  });

  it("rejects a reversed date range", () => {
    expect(() =>
      buildSessionConfig(
        input({
          source: {
            kind: "catalog",
            catalogPath,
            filters: { capturedFrom: "2022-01-01", capturedTo: "2021-12-31" },
          },
        }),
      ),
    ).toThrow("Empty date range: 2022-01-01 > 2021-12-31");
  });

  describe("diffConfig", () => {
    it("lists changed keys in order", () => {
      const saved = buildSessionConfig(input());
      const requested = buildSessionConfig(
        input({
          model: "other-model",
          tagPolicy: {
            casing: "capitalize",
            maxTags: 10,
            suffix: { enabled: true, suffix: "ai", separator: "_" },
          },
        }),
      );

      expect(diffConfig(saved, requested)).toEqual([
        { key: "model", saved: '"test-model"', requested: '"other-model"' },
        { key: "tagPolicy.maxTags", saved: "15", requested: "10" },
      ]);
    });

    it("ignores volume remaps", () => {
      const saved = buildSessionConfig(input());
      const requested = buildSessionConfig(
        input({ remaps: [{ from: "/Volumes/Old", to: "/Volumes/New" }] }),
      );

      expect(diffConfig(saved, requested)).toEqual([]);
    });

    it("compares targeted mappings as a whole", () => {
      const saved = buildSessionConfig(
        input({ mode: { kind: "targeted", mappings: [{ criterion: "a dog", tag: "Dog" }] } }),
      );
      const requested = buildSessionConfig(
        input({ mode: { kind: "targeted", mappings: [{ criterion: "a cat", tag: "Cat" }] } }),
      );

      expect(diffConfig(saved, requested).map((d) => d.key)).toEqual(["mode.mappings"]);
    });
  });
});
