/**
 * TagTransform (PURE MODULE)
 *
 * Turns raw model phrases into the final keyword set of one photo.
 *
 * Steps, in this order:
 * 1. normalize whitespace and apply the casing policy
 * 2. drop empty phrases and case-insensitive duplicates (first one wins)
 * 3. keep at most `maxTags` phrases; earlier phrases in model output order
 *    are kept preferentially
 * 4. append the suffix to every generated phrase
 * 5. union with the existing keywords: existing keywords are never suffixed,
 *    removed or reordered, and a generated phrase whose base or suffixed form
 *    already exists (case-insensitive) is dropped
 */

import {
  applyCasing,
  foldCase,
  normalizeWhitespace,
  type Casing,
} from "~/lib/text/normalize";
import {
  type Keyword,
  type KeywordSet,
  unionKeywords,
} from "~/lib/tags/keywords";
import { addSuffix, removeSuffix, type SuffixPolicy } from "~/lib/tags/suffix";

export type TagPolicy = {
  casing: Casing;
  maxTags: number;
  suffix: SuffixPolicy;
};

// Steps 1-3: cleaned, de-duplicated, truncated phrases (no suffix yet).
export function selectPhrases(
  rawPhrases: readonly string[],
  policy: TagPolicy,
): string[] {
  const seen = new Set<string>();
  const out: string[] = [];

  for (const raw of rawPhrases) {
    const phrase = applyCasing(normalizeWhitespace(raw), policy.casing);
    if (phrase.length === 0) continue;

    // A model echoing "Lake_ai" and "Lake" means the same keyword.
    const key = foldCase(removeSuffix(phrase, policy.suffix));
    if (seen.has(key)) continue;

    seen.add(key);
    out.push(phrase);
  }

  return out.slice(0, Math.max(0, policy.maxTags));
}

export function applyTagPolicy(
  rawPhrases: readonly string[],
  existing: KeywordSet,
  policy: TagPolicy,
): KeywordSet {
  const present = existing.map((k) => k.name);
  const generated: Keyword[] = [];

  for (const phrase of selectPhrases(rawPhrases, policy)) {
    const suffixed = addSuffix(phrase, policy.suffix);
    // "Lake" typed by a person already says what "Lake_ai" would.
    if (isCoveredBy(suffixed, present, policy.suffix)) continue;

    generated.push({ name: suffixed, provenance: "generated" });
  }

  return unionKeywords(existing, generated);
}

/**
 * Whether generated keyword `name` adds nothing to a store that already holds
 * `present`: its base or suffixed form is there (case-insensitive). Each
 * destination is checked against its own keywords, since a sidecar can carry
 * keywords the catalog does not.
 */
export function isCoveredBy(
  name: string,
  present: readonly string[],
  suffix: SuffixPolicy,
): boolean {
  const keys = new Set(present.map(foldCase));
  const base = removeSuffix(name, suffix);
  return keys.has(foldCase(base)) || keys.has(foldCase(addSuffix(base, suffix)));
}
