/**
 * Keyword phrase normalization (PURE MODULE)
 *
 * Shared by the inference adapter (turning raw model text into phrases) and
 * by the tag policy (casing, case-insensitive comparison). No I/O, no env,
 * no clock: same input, same output.
 *
 * Rules:
 * - whitespace runs collapse to one ASCII space, edges trimmed
 * - comparisons are case-insensitive (Unicode lowercase), spelling is kept
 * - list markers, wrapping quotes/brackets and leading articles are dropped
 *   from model output
 */

// Articles the prompt asks the model to omit; some models still emit them.
export const LEADING_ARTICLES: readonly string[] = [
  // Longest first so "de la " wins over "de ".
  "de la ",
  "the ",
  "an ",
  "a ",
  "les ",
  "le ",
  "la ",
  "une ",
  "un ",
  "des ",
  "du ",
  "l'",
  "l’",
];

// Phrases outside this length window are noise (single letters, sentences).
export const MIN_PHRASE_LENGTH = 2;
export const MAX_PHRASE_LENGTH = 49;

export type Casing = "preserve" | "capitalize" | "lower";

/**
 * Trim and collapse any whitespace run (tabs, newlines included) to " ".
 */
export function normalizeWhitespace(input: string): string {
  return input.replace(/\s+/g, " ").trim();
}

/**
 * Case-folded comparison key for a keyword.
 */
export function foldCase(input: string): string {
  return normalizeWhitespace(input).toLowerCase();
}

/**
 * Apply a casing policy to an already whitespace-normalized phrase.
 * `capitalize` only touches the first character: "new york" -> "New york",
 * "iPhone" -> "IPhone".
 */
export function applyCasing(phrase: string, casing: Casing): string {
  if (phrase.length === 0) return phrase;

  switch (casing) {
    case "preserve":
      return phrase;
    case "lower":
      return phrase.toLowerCase();
    case "capitalize": {
      const [first = "", ...rest] = Array.from(phrase);
      return first.toUpperCase() + rest.join("");
    }
  }
}

/**
 * Remove numbering and bullets at the start of a line:
 * "1. Lake" -> "Lake", "- Lake" -> "Lake", "• Lake" -> "Lake".
 */
export function stripListMarker(line: string): string {
  return line.replace(/^\s*(?:\d+[.)]\s*|[-*•]\s*)+/u, "");
}

/**
 * Strip quotes and brackets wrapping a phrase, and trailing sentence
 * punctuation: `"Lake."` -> `Lake`, `(Forest)` -> `Forest`.
 */
export function stripWrappingPunctuation(phrase: string): string {
  return phrase
    .replace(/^["'“”‘’()[\]{}]+/u, "")
    .replace(/["'“”‘’()[\]{}.;:!]+$/u, "")
    .trim();
}

/**
 * Drop one leading article (case-insensitive).
 */
export function removeLeadingArticle(
  phrase: string,
  articles: readonly string[] = LEADING_ARTICLES,
): string {
  const lower = phrase.toLowerCase();

  for (const article of articles) {
    if (lower.startsWith(article) && phrase.length > article.length) {
      return phrase.slice(article.length).trim();
    }
  }

  return phrase;
}

/**
 * Split a free-text model answer into candidate phrases, in output order.
 *
 * Accepts comma lists, one-per-line lists and numbered/bulleted lists.
 * Duplicates are kept: de-duplication belongs to the tag policy.
 */
export function parsePhraseList(responseText: string): string[] {
  const lines = responseText
    .split(/\r?\n/)
    .map((line) => stripListMarker(line.trim()))
    .filter((line) => line.length > 0);

  const out: string[] = [];

  for (const line of lines) {
    for (const part of line.split(/[,;]/)) {
      let phrase = normalizeWhitespace(part);
      phrase = stripWrappingPunctuation(phrase);
      phrase = removeLeadingArticle(phrase);
      phrase = normalizeWhitespace(phrase);

      if (phrase.length < MIN_PHRASE_LENGTH) continue;
      if (phrase.length > MAX_PHRASE_LENGTH) continue;

      out.push(phrase);
    }
  }

  return out;
}
