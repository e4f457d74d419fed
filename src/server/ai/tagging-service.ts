/**
 * TaggingService: one bounded photo in, raw keyword phrases out.
 *
 * - auto: one call, free-text keyword list
 * - targeted: one yes/no call per (criterion, tag) mapping; every affirmative
 *   answer contributes its mapping's tag, so a photo costs
 *   `mappings.length` calls
 *
 * Failures never escape: an exhausted or permanently failed call contributes
 * nothing and the photo goes on with zero new phrases.
 */

import type { Logger } from "~/lib/log/logger";
import { parsePhraseList } from "~/lib/text/normalize";
import { withRetry, type RetryPolicy } from "~/server/ai/retry";
import type { VisionTagger } from "~/server/ai/ollama-vision-tagger";
import {
  AUTO_GENERATION,
  autoInstruction,
  TARGETED_GENERATION,
  targetedInstruction,
} from "~/server/ai/taggingPrompt";

export type TargetMapping = {
  criterion: string;
  tag: string;
};

export type TaggingMode =
  | { kind: "auto" }
  | { kind: "targeted"; mappings: readonly TargetMapping[] };

export type TaggingServiceOptions = {
  mode: TaggingMode;
  language: string;
  maxTags: number;
  retry: RetryPolicy;
};

const AFFIRMATIVE = /(?<!\p{L})(?:YES|OUI|SI|SÍ|JA)(?!\p{L})/u;
const NEGATIVE_WORDS = new Set(["NO", "NON", "NEIN"]);

/**
 * Read a yes/no answer. A reply starting with a negative word is a no even
 * if an affirmative word follows ("NO, not yes").
 */
export function parseYesNo(responseText: string): boolean {
  const upper = responseText.trim().toUpperCase();
  const firstWord = /^\p{L}+/u.exec(upper)?.[0];

  if (firstWord !== undefined && NEGATIVE_WORDS.has(firstWord)) return false;
  return AFFIRMATIVE.test(upper);
}

export class TaggingService {
  constructor(
    private readonly tagger: VisionTagger,
    private readonly options: TaggingServiceOptions,
    private readonly deps: { logger: Logger; sleep?: (ms: number) => Promise<unknown> },
  ) {}

  get model(): string {
    return this.tagger.model;
  }

  // Remote calls spent on one photo.
  get callsPerPhoto(): number {
    const mode = this.options.mode;
    return mode.kind === "auto" ? 1 : mode.mappings.length;
  }

  async describe(image: Buffer, label: string): Promise<string[]> {
    const mode = this.options.mode;

    switch (mode.kind) {
      case "auto":
        return this.describeAuto(image, label);
      case "targeted":
        return this.describeTargeted(image, label, mode.mappings);
    }
  }

  private async describeAuto(image: Buffer, label: string): Promise<string[]> {
    const instruction = autoInstruction({
      language: this.options.language,
      maxTags: this.options.maxTags,
    });

    const text = await withRetry(
      label,
      () => this.tagger.infer({ image, instruction, generation: AUTO_GENERATION }),
      this.options.retry,
      this.deps,
    );

    if (text === null) return [];

    const phrases = parsePhraseList(text);
    this.deps.logger.debug(`${label} phrases=${JSON.stringify(phrases)}`);
    return phrases;
  }

  private async describeTargeted(
    image: Buffer,
    label: string,
    mappings: readonly TargetMapping[],
  ): Promise<string[]> {
    const tags: string[] = [];

    for (const mapping of mappings) {
      const answer = await withRetry(
        `${label} criterion=${JSON.stringify(mapping.criterion)}`,
        () =>
          this.tagger.infer({
            image,
            instruction: targetedInstruction(mapping.criterion),
            generation: TARGETED_GENERATION,
          }),
        this.options.retry,
        this.deps,
      );

      if (answer !== null && parseYesNo(answer)) {
        this.deps.logger.debug(`${label} criterion=${JSON.stringify(mapping.criterion)} match=true`);
        tags.push(mapping.tag);
      }
    }

    return tags;
  }
}
