const WORD_PATTERN = /[\p{L}\p{N}_]+/gu;
const ASCII_IDENTIFIER = /^[A-Za-z0-9_]+$/;
const IDENTIFIER_PART_PATTERN = /[A-Z]+(?=[A-Z][a-z])|[A-Z]?[a-z]+|[A-Z]+|\d+/g;

/**
 * Split text into case-folded terms with punctuation stripped.
 *
 * Identifiers are kept whole and also contribute their camelCase and
 * snake_case parts, so "parseConfig" matches a query for "config".
 */
export function tokenize(text: string): string[] {
  const terms: string[] = [];

  for (const match of text.matchAll(WORD_PATTERN)) {
    const word = match[0];
    if (/^_+$/.test(word)) continue;

    const lower = word.toLowerCase();
    terms.push(lower);

    if (!ASCII_IDENTIFIER.test(word)) continue;
    const parts = word
      .split("_")
      .flatMap((piece) => piece.match(IDENTIFIER_PART_PATTERN) ?? [])
      .map((part) => part.toLowerCase());
    if (parts.length > 1) {
      for (const part of parts) {
        if (part !== lower) terms.push(part);
      }
    }
  }

  return terms;
}

export function termFrequencies(terms: readonly string[]): Map<string, number> {
  const counts = new Map<string, number>();
  for (const term of terms) {
    counts.set(term, (counts.get(term) ?? 0) + 1);
  }
  return counts;
}
