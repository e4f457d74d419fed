/**
 * KeywordSet: the keywords of one photo at one point in time.
 *
 * Order is irrelevant for equality but kept stable for logs and sidecar
 * output. Uniqueness is case-insensitive: "Lake" and "lake" are one keyword.
 */

import { foldCase } from "~/lib/text/normalize";

export type KeywordProvenance = "generated" | "existing";

export type Keyword = {
  readonly name: string;
  readonly provenance: KeywordProvenance;
};

export type KeywordSet = readonly Keyword[];

// Wrap names already stored somewhere (catalog, sidecar) as existing keywords.
export function existingKeywords(names: readonly string[]): KeywordSet {
  return unionKeywords(
    [],
    names.map((name) => ({ name, provenance: "existing" as const })),
  );
}

export function keywordNames(set: KeywordSet): string[] {
  return set.map((k) => k.name);
}

export function generatedNames(set: KeywordSet): string[] {
  return set.filter((k) => k.provenance === "generated").map((k) => k.name);
}

/**
 * Additive union: every keyword of `base` survives untouched and in order;
 * keywords of `extra` are appended unless a case-insensitive match exists.
 */
export function unionKeywords(base: KeywordSet, extra: KeywordSet): KeywordSet {
  const seen = new Set(base.map((k) => foldCase(k.name)));
  const out: Keyword[] = [...base];

  for (const k of extra) {
    const key = foldCase(k.name);
    if (key.length === 0 || seen.has(key)) continue;
    seen.add(key);
    out.push(k);
  }

  return out;
}

/**
 * Names from `candidates` that are not in `present` (case-insensitive),
 * de-duplicated, in candidate order.
 */
export function missingNames(
  present: readonly string[],
  candidates: readonly string[],
): string[] {
  const seen = new Set(present.map(foldCase));
  const out: string[] = [];

  for (const name of candidates) {
    const key = foldCase(name);
    if (key.length === 0 || seen.has(key)) continue;
    seen.add(key);
    out.push(name);
  }

  return out;
}
