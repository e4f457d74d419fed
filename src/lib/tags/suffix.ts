/**
 * Suffix policy for machine-generated keywords.
 *
 * "Mountain" -> "Mountain_ai" marks a keyword as generated so it can be told
 * apart from (and filtered separately from) keywords a person typed.
 */

export type SuffixPolicy = {
  enabled: boolean;
  suffix: string; // e.g. "ai"
  separator: string; // e.g. "_"
};

// Full marker appended to tags, or "" when the policy is inactive.
export function suffixMarker(policy: SuffixPolicy): string {
  if (!policy.enabled || policy.suffix.length === 0) return "";
  return `${policy.separator}${policy.suffix}`;
}

export function hasSuffix(tag: string, policy: SuffixPolicy): boolean {
  const marker = suffixMarker(policy);
  return marker.length > 0 && tag.endsWith(marker);
}

// Appends the marker once; already-suffixed tags are returned unchanged.
export function addSuffix(tag: string, policy: SuffixPolicy): string {
  const marker = suffixMarker(policy);
  if (marker.length === 0 || tag.length === 0) return tag;
  if (tag.endsWith(marker)) return tag;
  return `${tag}${marker}`;
}

export function removeSuffix(tag: string, policy: SuffixPolicy): string {
  if (!hasSuffix(tag, policy)) return tag;
  return tag.slice(0, -suffixMarker(policy).length);
}
