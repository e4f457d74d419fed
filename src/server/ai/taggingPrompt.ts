/**
 * Prompts sent with every photo.
 *
 * Auto mode asks for a plain comma-separated keyword list. The reply is
 * still untrusted text and goes through `parsePhraseList` (markers, quotes,
 * articles).
 *
 * Targeted mode asks one closed question per criterion and expects a single
 * word back; `parseYesNo` reads the answer.
 *
 * Language and tag count come from the session config; the wording lives here.
 */

export type AutoPromptOptions = {
  language: string;
  maxTags: number;
};

// Sampling options for /api/generate.
export const AUTO_GENERATION = { temperature: 0.1, num_predict: 100 } as const;
export const TARGETED_GENERATION = { temperature: 0.1, num_predict: 10 } as const;

export function autoInstruction(opts: AutoPromptOptions): string {
  const minTags = Math.min(5, opts.maxTags);

  return [
    "Describe this photo as keywords for a photo management application.",
    "Return ONLY a list of keywords separated by commas, without numbering or formatting.",
    "Example answer: Paris, Eiffel Tower, Monument, Architecture, Night",
    "",
    "Rules:",
    `- Keywords in ${opts.language}`,
    `- Between ${minTags} and ${opts.maxTags} keywords`,
    "- Precise and descriptive",
    "- No articles (the, a, an, le, la, les, un, une, des)",
  ].join("\n");
}

export function targetedInstruction(criterion: string): string {
  return [
    "Look at this photo and answer only YES or NO.",
    "",
    `Question: does this photo contain ${criterion}?`,
    "",
    "Answer ONLY:",
    `- YES if you clearly see ${criterion} in the image`,
    "- NO otherwise",
    "",
    "Give no explanation, just YES or NO.",
  ].join("\n");
}
