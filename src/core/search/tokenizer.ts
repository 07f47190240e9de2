const WORD_SEPARATOR = /[^\p{L}\p{N}]+/u;
const TAG_PATTERN = /^#([\p{L}\p{N}_/-]+)$/u;
const TRAILING_PUNCTUATION = /[.,;:!?)\]}'"]+$/u;

export const TAG_MARKER = '#';

/** Tag names (without the marker) in first-appearance order, lower-cased. */
export function extractTags(text: string): string[] {
  const tags: string[] = [];
  const seen = new Set<string>();
  for (const chunk of text.split(/\s+/)) {
    const match = chunk.replace(TRAILING_PUNCTUATION, '').match(TAG_PATTERN);
    const name = match?.[1]?.toLowerCase();
    if (name && !seen.has(name)) {
      seen.add(name);
      tags.push(name);
    }
  }
  return tags;
}

export function tokenize(text: string): string[] {
  const words = text
    .toLowerCase()
    .split(WORD_SEPARATOR)
    .filter((word) => word.length > 0);
  const tags = extractTags(text).map((tag) => `${TAG_MARKER}${tag}`);
  return [...new Set([...words, ...tags])];
}
