/**
 * Edit-distance suggestions for misspelled names.
 */

export function levenshtein(a: string, b: string): number {
  if (a === b) return 0;
  if (a.length === 0) return b.length;
  if (b.length === 0) return a.length;

  let previous = Array.from({ length: b.length + 1 }, (_, i) => i);
  for (let i = 1; i <= a.length; i++) {
    const current = [i];
    for (let j = 1; j <= b.length; j++) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      current[j] = Math.min(
        previous[j] + 1,
        current[j - 1] + 1,
        previous[j - 1] + cost
      );
    }
    previous = current;
  }
  return previous[b.length];
}

/**
 * Every candidate within `maxDistance` edits of `name`, closest first,
 * ties in the candidates' original order.
 */
export function findCloseMatches(
  name: string,
  candidates: Iterable<string>,
  options: { maxDistance?: number; ignoreCase?: boolean } = {}
): string[] {
  const maxDistance = options.maxDistance ?? 2;
  const normalize = (s: string) => (options.ignoreCase ? s.toLowerCase() : s);
  const target = normalize(name);

  const scored: Array<{ candidate: string; distance: number }> = [];
  for (const candidate of candidates) {
    const distance = levenshtein(target, normalize(candidate));
    if (distance <= maxDistance) {
      scored.push({ candidate, distance });
    }
  }
  // Array.prototype.sort is stable
  return scored.sort((x, y) => x.distance - y.distance).map(s => s.candidate);
}

/** " Did you mean: a, b?" or "" */
export function formatSuggestions(suggestions: string[]): string {
  return suggestions.length > 0 ? ` Did you mean: ${suggestions.join(', ')}?` : '';
}
