/**
 * Photo tagger CLI
 *
 * The four session controls plus two read-only helpers:
 * - `npm run tagger -- start --catalog=<file> [flags]`
 * - `npm run tagger -- resume [--use-saved-config]`
 * - `npm run tagger -- stop`     (discards a saved session)
 * - `npm run tagger -- status`
 * - `npm run tagger -- models`
 *
 * Pause and stop while running:
 * - first Ctrl-C (SIGINT) or SIGTERM: pause after the current photo; the
 *   checkpoint is kept for `resume`
 * - a second signal, or SIGUSR2: stop after the current photo; the checkpoint
 *   is discarded
 *
 * Run `npm run tagger` without a command for the flag list.
 */

import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";

import { env } from "~/env";
import {
  CatalogLockedError,
  CatalogOpenError,
  ConfigError,
  ConfigMismatchError,
  NoResumableSessionError,
} from "~/lib/errors";
import { createLogger, type Logger } from "~/lib/log/logger";
import { OllamaVisionTagger } from "~/server/ai/ollama-vision-tagger";
import type { TargetMapping } from "~/server/ai/tagging-service";
import { CheckpointManager, type SessionState } from "~/session/checkpoint";
import {
  buildSessionConfig,
  diffConfig,
  runtimeSettingsFromEnv,
  targetMappingSchema,
  type RuntimeSettings,
  type SessionConfig,
} from "~/session/config";
import { formatCheckpointStatus, formatCounters, formatSessionResult } from "~/session/report";
import { availableControls, type ProgressEvent, type SessionResult } from "~/session/runner";
import { createSession } from "~/session/setup";
import {
  configInputFrom,
  hasSourceArgs,
  parseArgs,
  type CliArgs,
} from "./_tag_photos_args";

// Progress summary cadence, in photos.
const PROGRESS_EVERY = 25;

async function readMappingsFile(file: string): Promise<TargetMapping[]> {
  let raw: unknown;
  try {
    raw = JSON.parse(await fs.readFile(file, "utf8"));
  } catch (err) {
    throw new ConfigError(
      `Cannot read --mappings=${file}: ${err instanceof Error ? err.message : String(err)}`,
    );
  }

  const parsed = z.array(targetMappingSchema).safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(
      `Invalid --mappings=${file}: expected [{"criterion": "...", "tag": "..."}]`,
    );
  }
  return parsed.data;
}

async function requestedConfig(args: CliArgs): Promise<SessionConfig> {
  const fileMappings = args.mappingsFile ? await readMappingsFile(args.mappingsFile) : [];
  return buildSessionConfig(configInputFrom(args, env, fileMappings));
}

function settingsFor(args: CliArgs): RuntimeSettings {
  const settings = runtimeSettingsFromEnv(env);
  return {
    ...settings,
    checkpointPath: path.resolve(args.checkpoint ?? settings.checkpointPath),
  };
}

/**
 * Fail before the first photo when the inference service is down or the
 * model is not installed; otherwise every photo would end with no keywords.
 */
async function checkModel(config: SessionConfig, settings: RuntimeSettings): Promise<void> {
  const tagger = new OllamaVisionTagger({
    baseUrl: settings.inference.baseUrl,
    model: config.model,
    timeoutMs: settings.inference.timeoutMs,
  });

  if (!(await tagger.isAvailable())) {
    throw new ConfigError(`Inference service not reachable at ${settings.inference.baseUrl}`);
  }

  const models = await tagger.listModels();
  const installed = models.some((m) => m === config.model || m === `${config.model}:latest`);
  if (!installed) {
    throw new ConfigError(
      `Model not installed: ${config.model} (available: ${models.join(", ") || "none"})`,
    );
  }
}

function logProgress(logger: Logger, event: ProgressEvent): void {
  const done = event.index + 1;
  if (done % PROGRESS_EVERY !== 0 && done !== event.total) return;

  const [totals = ""] = formatCounters(event.counters);
  logger.info(`progress=${done}/${event.total} ${totals}`);
}

/**
 * Build and run one session. SIGINT/SIGTERM pause, a second signal or
 * SIGUSR2 stops; both take effect after the photo in flight.
 */
async function runSession(
  config: SessionConfig,
  settings: RuntimeSettings,
  logger: Logger,
  saved: SessionState | null,
): Promise<SessionResult> {
  await checkModel(config, settings);

  const setup = createSession(config, settings, {
    logger,
    onProgress: (event) => logProgress(logger, event),
  });
  const { session } = setup;

  let signals = 0;
  const onPauseSignal = (signal: NodeJS.Signals) => {
    if (session.status !== "running") return;
    signals++;

    if (signals === 1) {
      logger.info(`Received ${signal}, pausing after the current photo (send again to stop)…`);
      session.requestPause();
    } else {
      logger.info(`Received ${signal} again, stopping after the current photo…`);
      session.requestStop();
    }
  };
  const onStopSignal = () => {
    if (session.status !== "running") return;
    logger.info("Received SIGUSR2, stopping after the current photo…");
    session.requestStop();
  };

  process.on("SIGINT", onPauseSignal);
  process.on("SIGTERM", onPauseSignal);
  process.on("SIGUSR2", onStopSignal);

  try {
    return saved ? await session.resume(saved) : await session.start();
  } finally {
    process.off("SIGINT", onPauseSignal);
    process.off("SIGTERM", onPauseSignal);
    process.off("SIGUSR2", onStopSignal);
    setup.close();
  }
}

async function start(args: CliArgs, settings: RuntimeSettings, logger: Logger): Promise<void> {
  const config = await requestedConfig(args);
  const checkpoint = new CheckpointManager(settings.checkpointPath);

  const existing = await checkpoint.load();
  if (existing.status !== "absent") {
    if (!args.discardCheckpoint) {
      throw new ConfigError(
        `A saved session exists at ${settings.checkpointPath}. Run \`resume\`, \`stop\`, or start again with --discard-checkpoint.`,
      );
    }
    await checkpoint.clear();
    logger.info(`checkpoint=${settings.checkpointPath} discarded=true`);
  }

  const result = await runSession(config, settings, logger, null);
  for (const line of formatSessionResult(result)) console.log(line);
}

async function resume(args: CliArgs, settings: RuntimeSettings, logger: Logger): Promise<void> {
  const checkpoint = new CheckpointManager(settings.checkpointPath);
  const loaded = await checkpoint.load();

  if (loaded.status === "absent") {
    throw new NoResumableSessionError(`no checkpoint at ${settings.checkpointPath}`);
  }
  if (loaded.status === "corrupt") {
    throw new NoResumableSessionError(`${settings.checkpointPath} is unreadable (${loaded.reason})`);
  }

  const saved = loaded.state;
  const remaps = args.remaps.length > 0 ? args.remaps : saved.config.remaps;

  let config: SessionConfig = { ...saved.config, remaps };

  // Flags that describe a session are compared with the saved one.
  if (hasSourceArgs(args) && !args.useSavedConfig) {
    const requested = await requestedConfig(args);
    const differences = diffConfig(saved.config, requested);
    if (differences.length > 0) {
      throw new ConfigMismatchError(differences);
    }
    config = requested;
  }

  const result = await runSession(config, settings, logger, saved);
  for (const line of formatSessionResult(result)) console.log(line);
}

async function stop(settings: RuntimeSettings): Promise<void> {
  const checkpoint = new CheckpointManager(settings.checkpointPath);
  const loaded = await checkpoint.load();

  if (loaded.status === "absent") {
    console.log(`checkpoint=${settings.checkpointPath} session=none`);
    return;
  }

  await checkpoint.clear();
  console.log(`checkpoint=${settings.checkpointPath} session=stopped (checkpoint discarded)`);
}

async function status(settings: RuntimeSettings): Promise<void> {
  const loaded = await new CheckpointManager(settings.checkpointPath).load();
  for (const line of formatCheckpointStatus(loaded, settings.checkpointPath)) console.log(line);

  const controls = availableControls("idle", { hasCheckpoint: loaded.status === "found" });
  const enabled = Object.entries(controls)
    .filter(([, on]) => on)
    .map(([name]) => name);
  console.log(`controls=${enabled.join(",")}`);
}

async function models(settings: RuntimeSettings): Promise<void> {
  const tagger = new OllamaVisionTagger({
    baseUrl: settings.inference.baseUrl,
    model: env.TAGGER_MODEL ?? "",
    timeoutMs: settings.inference.timeoutMs,
  });

  const names = await tagger.listModels();
  if (names.length === 0) {
    console.log(`No models installed at ${settings.inference.baseUrl}`);
    return;
  }
  for (const name of names) console.log(name);
}

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  const settings = settingsFor(args);
  const logger = createLogger(settings.logLevel);

  switch (args.command) {
    case "start":
      return start(args, settings, logger);
    case "resume":
      return resume(args, settings, logger);
    case "stop":
      return stop(settings);
    case "status":
      return status(settings);
    case "models":
      return models(settings);
  }
}

// Operator mistakes get their message only; anything else keeps its stack.
function isExpected(err: unknown): err is Error {
  return (
    err instanceof ConfigError ||
    err instanceof ConfigMismatchError ||
    err instanceof NoResumableSessionError ||
    err instanceof CatalogLockedError ||
    err instanceof CatalogOpenError
  );
}

main().catch((err) => {
  if (err instanceof ConfigMismatchError) {
    console.error(
      `tag_photos failed: ${err.message}\nRun \`resume --use-saved-config\` to continue with the saved configuration, or \`stop\` to discard it.`,
    );
  } else {
    console.error("tag_photos failed:", isExpected(err) ? err.message : err);
  }
  process.exit(1);
});
