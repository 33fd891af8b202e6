/**
 * "Did you mean" suggestions for mistyped file and fileset names
 */

/**
 * Simple fuzzy match - checks if characters appear in order
 * Returns a score (higher = better match) or -1 if no match
 */
export function fuzzyScore(pattern: string, text: string): number {
  const patternLower = pattern.toLowerCase();
  const textLower = text.toLowerCase();

  if (patternLower.length === 0) {
    return -1;
  }

  if (patternLower.length > textLower.length) {
    return -1;
  }

  // Exact substring match scores highest
  const exactIndex = textLower.indexOf(patternLower);
  if (exactIndex !== -1) {
    const startBonus = exactIndex === 0 ? 100 : 0;
    return 1000 + startBonus - exactIndex;
  }

  // Fuzzy match - characters must appear in order
  let score = 0;
  let patternIndex = 0;
  let consecutiveMatches = 0;
  let lastMatchIndex = -2;

  for (let i = 0; i < textLower.length && patternIndex < patternLower.length; i++) {
    if (textLower[i] === patternLower[patternIndex]) {
      if (lastMatchIndex === i - 1) {
        consecutiveMatches++;
        score += 10 * consecutiveMatches;
      } else {
        consecutiveMatches = 0;
        score += 1;
      }

      // Bonus for matching at path and word boundaries
      if (i === 0 || '/._- '.includes(text[i - 1] ?? '')) {
        score += 20;
      }

      lastMatchIndex = i;
      patternIndex++;
    }
  }

  if (patternIndex < patternLower.length) {
    return -1;
  }

  return score;
}

/**
 * Best candidate for a mistyped name, or undefined when nothing is close.
 * A candidate is close when the input is a (fuzzy) subsequence of it, or
 * when the candidate is a subsequence of the input (an over-long guess).
 */
export function suggest(input: string, candidates: string[]): string | undefined {
  let best: { candidate: string; score: number } | undefined;

  for (const candidate of candidates) {
    if (candidate === input) continue;
    const score = Math.max(fuzzyScore(input, candidate), fuzzyScore(candidate, input));
    if (score > 0 && (!best || score > best.score)) {
      best = { candidate, score };
    }
  }

  return best?.candidate;
}

/**
 * One suggestion per unmatched input, deduplicated, in input order
 */
export function suggestAll(inputs: string[], candidates: string[]): string[] {
  const suggestions: string[] = [];
  for (const input of inputs) {
    const match = suggest(input, candidates);
    if (match && !suggestions.includes(match)) {
      suggestions.push(match);
    }
  }
  return suggestions;
}
