/**
 * Argument parsing for `scripts/tag_photos.ts`.
 *
 * `--key=value` flags, no dependencies, in the same style as the other
 * operator scripts. Kept apart from the script so it can be tested without
 * touching the environment or the network.
 */

import type { Env } from "~/env";
import { ConfigError } from "~/lib/errors";
import type { Casing } from "~/lib/text/normalize";
import type { PhotoFilters } from "~/server/db";
import type { TargetMapping } from "~/server/ai/tagging-service";
import type { PathRemap } from "~/server/storage/volumes";
import { DESTINATIONS, type Destination, type SessionConfigInput } from "~/session/config";

export const COMMANDS = ["start", "resume", "stop", "status", "models"] as const;
export type Command = (typeof COMMANDS)[number];

export type CliArgs = {
  command: Command;

  catalog?: string;
  folder?: string;
  recursive: boolean;
  filters: PhotoFilters;

  destinations?: Destination[];
  mode: "auto" | "targeted";
  maps: TargetMapping[];
  mappingsFile?: string;

  model?: string;
  language?: string;
  maxTags?: number;
  casing?: Casing;
  suffix?: string;
  separator?: string;
  noSuffix: boolean;

  remaps: PathRemap[];
  checkpoint?: string;
  discardCheckpoint: boolean;
  useSavedConfig: boolean;
};

export type ConfigDefaults = Pick<
  Env,
  | "TAGGER_MODEL"
  | "TAG_LANGUAGE"
  | "TAG_CASING"
  | "MAX_TAGS_PER_PHOTO"
  | "TAG_SUFFIX"
  | "TAG_SUFFIX_SEPARATOR"
  | "TAG_SUFFIX_ENABLED"
>;

export const USAGE = `Usage: tag_photos <command> [flags]

Commands:
  start     tag photos (refuses when a session is saved, see --discard-checkpoint)
  resume    continue the saved session
  stop      discard the saved session
  status    show the saved session
  models    list the models the inference service has installed

Source (start, and resume when checking the saved configuration):
  --catalog=<file.lrcat>         catalog source
  --folder=<dir>                 folder source (sidecar destination only)
  --no-recursive                 folder source: top folder only
  --only-untagged                catalog: photos without any keyword
  --captured-from=YYYY-MM-DD     catalog: capture date lower bound (inclusive)
  --captured-to=YYYY-MM-DD       catalog: capture date upper bound (inclusive)
  --min-rating=<0-5>             catalog: minimum star rating
  --collection=<text>            catalog: collection name contains <text>

Tagging:
  --to=catalog,sidecar           destinations (default: catalog, or sidecar for folders)
  --mode=auto|targeted           free keywords, or yes/no criteria
  --map=<criterion>=<tag>        targeted: one criterion (repeatable)
  --mappings=<file.json>         targeted: [{"criterion": "...", "tag": "..."}]
  --model=<name>                 inference model (default: TAGGER_MODEL)
  --language=<name>              keyword language (default: TAG_LANGUAGE)
  --max-tags=<n>                 keywords per photo (default: MAX_TAGS_PER_PHOTO)
  --casing=preserve|capitalize|lower
  --suffix=<text> --separator=<text> --no-suffix

Session:
  --remap=<from>=<to>            moved volume, e.g. --remap=/Volumes/Old=/Volumes/New
  --checkpoint=<file>            checkpoint location (default: CHECKPOINT_FILE)
  --discard-checkpoint           start: drop a saved session first
  --use-saved-config             resume: run with the saved configuration as is
`;

function isCommand(value: string | undefined): value is Command {
  return COMMANDS.some((c) => c === value);
}

function isDestination(value: string): value is Destination {
  return DESTINATIONS.some((d) => d === value);
}

function isCasing(value: string): value is Casing {
  return value === "preserve" || value === "capitalize" || value === "lower";
}

function integerFlag(name: string, raw: string): number {
  const n = Number(raw);
  if (raw.trim().length === 0 || !Number.isInteger(n)) {
    throw new ConfigError(`Invalid --${name}=${raw}. Must be an integer.`);
  }
  return n;
}

// "<left>=<right>" split at the first "=" after the flag name.
function pairFlag(name: string, raw: string): [string, string] {
  const at = raw.indexOf("=");
  const left = raw.slice(0, at).trim();
  const right = raw.slice(at + 1).trim();

  if (at < 0 || left.length === 0 || right.length === 0) {
    throw new ConfigError(`Invalid --${name}=${raw}. Expected <left>=<right>.`);
  }
  return [left, right];
}

export function parseArgs(argv: readonly string[]): CliArgs {
  const [first, ...rest] = argv.filter((a) => a !== "--");

  if (!isCommand(first)) {
    throw new ConfigError(first ? `Unknown command: ${first}\n\n${USAGE}` : USAGE);
  }

  const out: CliArgs = {
    command: first,
    recursive: true,
    filters: {},
    mode: "auto",
    maps: [],
    noSuffix: false,
    remaps: [],
    discardCheckpoint: false,
    useSavedConfig: false,
  };

  for (const arg of rest) {
    const eq = arg.indexOf("=");
    const key = eq < 0 ? arg : arg.slice(0, eq);
    const value = eq < 0 ? "" : arg.slice(eq + 1);

    switch (key) {
      case "--catalog":
        out.catalog = value;
        break;
      case "--folder":
        out.folder = value;
        break;
      case "--no-recursive":
        out.recursive = false;
        break;
      case "--only-untagged":
        out.filters.onlyUntagged = true;
        break;
      case "--captured-from":
        out.filters.capturedFrom = value;
        break;
      case "--captured-to":
        out.filters.capturedTo = value;
        break;
      case "--min-rating":
        out.filters.minRating = integerFlag("min-rating", value);
        break;
      case "--collection":
        out.filters.collection = value;
        break;

      case "--to": {
        const destinations: Destination[] = [];
        for (const part of value.split(",")) {
          const d = part.trim();
          if (!isDestination(d)) {
            throw new ConfigError(`Invalid --to=${value}. Use catalog, sidecar or both.`);
          }
          destinations.push(d);
        }
        out.destinations = destinations;
        break;
      }
      case "--mode":
        if (value !== "auto" && value !== "targeted") {
          throw new ConfigError(`Invalid --mode=${value}. Must be "auto" or "targeted".`);
        }
        out.mode = value;
        break;
      case "--map": {
        const [criterion, tag] = pairFlag("map", value);
        out.maps.push({ criterion, tag });
        break;
      }
      case "--mappings":
        out.mappingsFile = value;
        break;

      case "--model":
        out.model = value;
        break;
      case "--language":
        out.language = value;
        break;
      case "--max-tags":
        out.maxTags = integerFlag("max-tags", value);
        break;
      case "--casing":
        if (!isCasing(value)) {
          throw new ConfigError(`Invalid --casing=${value}. Must be preserve, capitalize or lower.`);
        }
        out.casing = value;
        break;
      case "--suffix":
        out.suffix = value;
        break;
      case "--separator":
        out.separator = value;
        break;
      case "--no-suffix":
        out.noSuffix = true;
        break;

      case "--remap": {
        const [from, to] = pairFlag("remap", value);
        out.remaps.push({ from, to });
        break;
      }
      case "--checkpoint":
        out.checkpoint = value;
        break;
      case "--discard-checkpoint":
        out.discardCheckpoint = true;
        break;
      case "--use-saved-config":
        out.useSavedConfig = true;
        break;

      default:
        if (arg.trim().length > 0) throw new ConfigError(`Unknown argument: ${arg}`);
    }
  }

  return out;
}

// Whether the arguments describe a session (as opposed to only naming a command).
export function hasSourceArgs(args: CliArgs): boolean {
  return args.catalog !== undefined || args.folder !== undefined;
}

/**
 * Raw configuration for `buildSessionConfig`: flags first, then environment
 * defaults. `fileMappings` are the entries of `--mappings`, placed before
 * the `--map` flags.
 */
export function configInputFrom(
  args: CliArgs,
  defaults: ConfigDefaults,
  fileMappings: readonly TargetMapping[] = [],
): SessionConfigInput {
  if (args.catalog !== undefined && args.folder !== undefined) {
    throw new ConfigError("Choose one source: --catalog or --folder, not both.");
  }

  let source: SessionConfigInput["source"];
  if (args.catalog !== undefined) {
    source = { kind: "catalog", catalogPath: args.catalog, filters: args.filters };
  } else if (args.folder !== undefined) {
    source = { kind: "folder", folderPath: args.folder, recursive: args.recursive };
  } else {
    throw new ConfigError("Choose a source: --catalog=<file> or --folder=<dir>.");
  }

  const destinations: Destination[] =
    args.destinations ?? (source.kind === "catalog" ? ["catalog"] : ["sidecar"]);

  const mappings = [...fileMappings, ...args.maps];

  return {
    source,
    destinations,
    mode: args.mode === "auto" ? { kind: "auto" } : { kind: "targeted", mappings },
    model: args.model ?? defaults.TAGGER_MODEL ?? "",
    language: args.language ?? defaults.TAG_LANGUAGE,
    tagPolicy: {
      casing: args.casing ?? defaults.TAG_CASING,
      maxTags: args.maxTags ?? defaults.MAX_TAGS_PER_PHOTO,
      suffix: {
        enabled: !args.noSuffix && defaults.TAG_SUFFIX_ENABLED,
        suffix: args.suffix ?? defaults.TAG_SUFFIX,
        separator: args.separator ?? defaults.TAG_SUFFIX_SEPARATOR,
      },
    },
    remaps: args.remaps,
  };
}
