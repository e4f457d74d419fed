/**
 * Validated environment.
 *
 * This is the only module that reads `process.env`. Everything else receives
 * an explicit `SessionConfig` built from these values plus CLI arguments.
 */

import { createEnv } from "@t3-oss/env-core";
import { z } from "zod";

// "true"/"false" strings from the shell -> boolean.
const booleanString = z
  .enum(["true", "false"])
  .transform((v) => v === "true");

export const env = createEnv({
  server: {
    // Inference service (Ollama-compatible /api/generate).
    TAGGER_BASE_URL: z.string().url().default("http://localhost:11434"),
    TAGGER_MODEL: z.string().min(1).optional(),
    TAGGER_TIMEOUT_MS: z.coerce.number().int().positive().default(300_000),
    TAGGER_MAX_RETRIES: z.coerce.number().int().min(0).max(10).default(2),
    TAGGER_RETRY_BASE_MS: z.coerce.number().int().min(0).default(2_000),

    // Bounded raster sent to the model.
    IMAGE_MAX_SIZE: z.coerce.number().int().min(64).default(1024),
    JPEG_QUALITY: z.coerce.number().int().min(1).max(100).default(70),

    // Keyword policy.
    TAG_LANGUAGE: z.string().min(1).default("english"),
    TAG_CASING: z.enum(["preserve", "capitalize", "lower"]).default("capitalize"),
    MAX_TAGS_PER_PHOTO: z.coerce.number().int().positive().default(15),
    TAG_SUFFIX: z.string().default("ai"),
    TAG_SUFFIX_SEPARATOR: z.string().default("_"),
    TAG_SUFFIX_ENABLED: booleanString.default("true"),

    // Session persistence.
    CHECKPOINT_FILE: z.string().min(1).default(".photo-tagger/checkpoint.json"),

    LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
  },
  runtimeEnv: process.env,
  emptyStringAsUndefined: true,
});

export type Env = typeof env;
