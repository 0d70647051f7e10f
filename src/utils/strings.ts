export function splitWords(text: string): string[] {
  return text.split(/\s+/).filter((word) => word.length > 0);
}

export function levenshteinDistance(a: string, b: string): number {
  if (a.length === 0) return b.length;
  if (b.length === 0) return a.length;

  let previous = Array.from({ length: a.length + 1 }, (_, index) => index);

  for (let i = 1; i <= b.length; i++) {
    const current = [i];
    for (let j = 1; j <= a.length; j++) {
      const cost = b.charAt(i - 1) === a.charAt(j - 1) ? 0 : 1;
      current[j] = Math.min(
        (previous[j - 1] ?? 0) + cost,
        (current[j - 1] ?? 0) + 1,
        (previous[j] ?? 0) + 1
      );
    }
    previous = current;
  }
  return previous[a.length] ?? 0;
}

/**
 * Text similarity from edit distance (0-1, higher = better).
 */
export function editSimilarity(a: string, b: string): number {
  const maxLen = Math.max(a.length, b.length);
  return maxLen > 0 ? 1 - levenshteinDistance(a, b) / maxLen : 1;
}
