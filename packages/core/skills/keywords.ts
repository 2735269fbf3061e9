/**
 * Whole-word keyword matching shared by the rule-based skills.
 * A keyword also matches its regular plural ("walk" → "walks",
 * "class" → "classes", "party" → "parties"), and nothing else: "ski" does
 * not match "skies".
 */

const patternCache = new Map<string, RegExp>();

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function pluralAlternatives(word: string): string {
  const escaped = escapeRegExp(word);
  if (/(?:s|x|z|ch|sh)$/.test(word)) return `${escaped}(?:es)?`;
  if (/[^aeiou]y$/.test(word)) return `(?:${escaped}|${escapeRegExp(word.slice(0, -1))}ies)`;
  return `${escaped}s?`;
}

function keywordPattern(keyword: string): RegExp {
  let pattern = patternCache.get(keyword);
  if (!pattern) {
    const words = keyword.toLowerCase().trim().split(/\s+/);
    const last = words.pop() ?? "";
    const body = [...words.map(escapeRegExp), pluralAlternatives(last)].join("\\s+");
    pattern = new RegExp(`(?:^|[^a-z0-9])${body}(?![a-z0-9])`, "i");
    patternCache.set(keyword, pattern);
  }
  return pattern;
}

export function matchesKeyword(text: string, keyword: string): boolean {
  return keywordPattern(keyword).test(text);
}

/** Keywords found in text, deduplicated, in list order. */
export function findKeywords(text: string, keywords: readonly string[]): string[] {
  const found: string[] = [];
  for (const keyword of keywords) {
    if (!found.includes(keyword) && matchesKeyword(text, keyword)) {
      found.push(keyword);
    }
  }
  return found;
}
