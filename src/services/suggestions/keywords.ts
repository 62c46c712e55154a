const STOP_WORDS = new Set([
  'the', 'and', 'for', 'with', 'are', 'was', 'were', 'been', 'have',
  'has', 'had', 'does', 'did', 'will', 'would', 'could', 'should',
]);

const MIN_KEYWORD_LENGTH = 3;

export const DEFAULT_KEYWORD_LIMIT = 5;

/**
 * Extracts keyword tokens from free-form text.
 *
 * The text is lowercased, every character other than a letter, digit,
 * underscore or whitespace becomes a space, and the resulting tokens are kept when they are
 * at least three characters long and not stop words. Order and duplicates are
 * preserved so callers can count frequencies.
 */
export function extractKeywords(text: string | null | undefined): string[] {
  if (!text) {
    return [];
  }

  return text
    .toLowerCase()
    .replace(/[^\p{L}\p{N}_\s]/gu, ' ')
    .split(/\s+/)
    // Length counts code points, not UTF-16 units.
    .filter((word) => [...word].length >= MIN_KEYWORD_LENGTH && !STOP_WORDS.has(word));
}

/**
 * Returns the most frequent distinct keywords, highest count first.
 * Equal counts keep the order in which the keywords first appeared.
 */
export function rankKeywords(keywords: readonly string[], limit = DEFAULT_KEYWORD_LIMIT): string[] {
  // Map iteration follows insertion order, i.e. first occurrence.
  const counts = new Map<string, number>();
  for (const keyword of keywords) {
    counts.set(keyword, (counts.get(keyword) || 0) + 1);
  }

  // Array#sort is stable, so ties stay in first-seen order.
  return [...counts.entries()]
    .sort((a, b) => b[1] - a[1])
    .slice(0, limit)
    .map(([keyword]) => keyword);
}

/** `"project-plan"` -> `"Project Plan"` */
export function formatKeyword(keyword: string): string {
  return keyword
    .split('-')
    .map((part) => {
      const [first = '', ...rest] = [...part];
      return first.toUpperCase() + rest.join('');
    })
    .join(' ');
}
