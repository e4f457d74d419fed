/**
 * Session configuration.
 *
 * One explicit value, built once at start from CLI arguments and the
 * environment, then handed to every component. It is also what the
 * checkpoint stores, and what resume compares against.
 *
 * Runtime knobs that do not change which photos get which keywords
 * (inference URL, timeouts, image size, checkpoint location) live in
 * `RuntimeSettings` and are never compared.
 */

import fs from "node:fs";
import { z } from "zod";

import type { Env } from "~/env";
import { ConfigError, type ConfigDifference } from "~/lib/errors";
import type { LogLevel } from "~/lib/log/logger";

export const DESTINATIONS = ["catalog", "sidecar"] as const;
export type Destination = (typeof DESTINATIONS)[number];

const isoDay = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, "expected YYYY-MM-DD");

export const photoFiltersSchema = z.object({
  onlyUntagged: z.boolean().optional(),
  capturedFrom: isoDay.optional(),
  capturedTo: isoDay.optional(),
  minRating: z.number().int().min(0).max(5).optional(),
  collection: z.string().min(1).optional(),
});

export const targetMappingSchema = z.object({
  criterion: z.string().trim().min(1),
  tag: z.string().trim().min(1),
});

export const sessionConfigSchema = z.object({
  source: z.discriminatedUnion("kind", [
    z.object({
      kind: z.literal("catalog"),
      catalogPath: z.string().min(1),
      filters: photoFiltersSchema.default({}),
    }),
    z.object({
      kind: z.literal("folder"),
      folderPath: z.string().min(1),
      recursive: z.boolean().default(true),
    }),
  ]),
  destinations: z.array(z.enum(DESTINATIONS)).min(1, "choose at least one destination"),
  mode: z.discriminatedUnion("kind", [
    z.object({ kind: z.literal("auto") }),
    z.object({
      kind: z.literal("targeted"),
      mappings: z
        .array(targetMappingSchema)
        .min(1, "targeted mode needs at least one criterion=tag mapping"),
    }),
  ]),
  model: z.string().min(1, "no model selected"),
  language: z.string().min(1),
  tagPolicy: z.object({
    casing: z.enum(["preserve", "capitalize", "lower"]),
    maxTags: z.number().int().positive(),
    suffix: z.object({
      enabled: z.boolean(),
      suffix: z.string(),
      separator: z.string(),
    }),
  }),
  // Moved volumes; not part of the compared configuration.
  remaps: z.array(z.object({ from: z.string().min(1), to: z.string().min(1) })).default([]),
});

export type SessionConfig = z.infer<typeof sessionConfigSchema>;
export type SessionConfigInput = z.input<typeof sessionConfigSchema>;

export type RuntimeSettings = {
  inference: {
    baseUrl: string;
    timeoutMs: number;
    maxRetries: number;
    retryBaseMs: number;
  };
  image: {
    maxSize: number;
    jpegQuality: number;
  };
  checkpointPath: string;
  logLevel: LogLevel;
};

export function runtimeSettingsFromEnv(e: Env): RuntimeSettings {
  return {
    inference: {
      baseUrl: e.TAGGER_BASE_URL,
      timeoutMs: e.TAGGER_TIMEOUT_MS,
      maxRetries: e.TAGGER_MAX_RETRIES,
      retryBaseMs: e.TAGGER_RETRY_BASE_MS,
    },
    image: {
      maxSize: e.IMAGE_MAX_SIZE,
      jpegQuality: e.JPEG_QUALITY,
    },
    checkpointPath: e.CHECKPOINT_FILE,
    logLevel: e.LOG_LEVEL,
  };
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "config"}: ${issue.message}`)
    .join("; ");
}

/**
 * Validate a configuration. Throws `ConfigError` for anything that would
 * make the session fail before its first photo.
 */
export function buildSessionConfig(input: unknown): SessionConfig {
  const parsed = sessionConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigError(`Invalid configuration: ${formatIssues(parsed.error)}`);
  }

  const requested = new Set(parsed.data.destinations);
  const config: SessionConfig = {
    ...parsed.data,
    destinations: DESTINATIONS.filter((d) => requested.has(d)),
  };

  const source = config.source;

  if (source.kind === "folder" && requested.has("catalog")) {
    throw new ConfigError("The catalog destination needs a catalog source (use --to sidecar).");
  }

  const sourcePath = source.kind === "catalog" ? source.catalogPath : source.folderPath;
  if (!fs.existsSync(sourcePath)) {
    throw new ConfigError(`Source not found: ${sourcePath}`);
  }

  if (source.kind === "catalog") {
    const { capturedFrom, capturedTo } = source.filters;
    if (capturedFrom && capturedTo && capturedFrom > capturedTo) {
      throw new ConfigError(`Empty date range: ${capturedFrom} > ${capturedTo}`);
    }
  }

  return config;
}

function flatten(value: unknown, prefix: string, out: Map<string, string>): void {
  if (typeof value === "object" && value !== null && !Array.isArray(value)) {
    for (const [key, child] of Object.entries(value)) {
      flatten(child, prefix ? `${prefix}.${key}` : key, out);
    }
    return;
  }
  out.set(prefix, JSON.stringify(value) ?? "undefined");
}

/**
 * Keys whose values differ between a saved and a requested configuration,
 * sorted by key. Volume remaps are ignored.
 */
export function diffConfig(saved: SessionConfig, requested: SessionConfig): ConfigDifference[] {
  const a = new Map<string, string>();
  const b = new Map<string, string>();
  flatten(saved, "", a);
  flatten(requested, "", b);

  const keys = new Set([...a.keys(), ...b.keys()]);
  const out: ConfigDifference[] = [];

  for (const key of keys) {
    if (key === "remaps" || key.startsWith("remaps.")) continue;
    const left = a.get(key) ?? "undefined";
    const right = b.get(key) ?? "undefined";
    if (left !== right) out.push({ key, saved: left, requested: right });
  }

  return out.sort((x, y) => x.key.localeCompare(y.key));
}
