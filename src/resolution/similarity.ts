/**
 * Name normalization and token-set similarity.
 *
 * Legal names differ from everyday queries in word order and boilerplate
 * ("Inc.", "Corporation"), so names are compared as token sets rather than
 * as raw strings.
 */

const STRIPPED_PUNCTUATION = /[.,'’]/g;

/** Uppercase, drop periods/commas/apostrophes, collapse whitespace */
export function normalizeName(value: string): string {
  return value.toUpperCase().replace(STRIPPED_PUNCTUATION, '').replace(/\s+/g, ' ').trim();
}

export function tokenize(normalized: string): string[] {
  return normalized.split(' ').filter(Boolean);
}

/** Length of the longest common subsequence, two-row DP */
export function lcsLength(a: string, b: string): number {
  if (!a.length || !b.length) return 0;
  let previous = new Array<number>(b.length + 1).fill(0);
  let current = new Array<number>(b.length + 1).fill(0);

  for (let i = 1; i <= a.length; i++) {
    for (let j = 1; j <= b.length; j++) {
      current[j] =
        a.charCodeAt(i - 1) === b.charCodeAt(j - 1)
          ? previous[j - 1] + 1
          : Math.max(previous[j], current[j - 1]);
    }
    [previous, current] = [current, previous];
  }

  return previous[b.length];
}

/**
 * 1 - indel(a, b) / (|a| + |b|), where indel counts the insertions and
 * deletions turning a into b.
 */
export function indelSimilarity(a: string, b: string): number {
  const total = a.length + b.length;
  if (total === 0) return 1;
  const distance = total - 2 * lcsLength(a, b);
  return 1 - distance / total;
}

function joinTokens(...groups: string[][]): string {
  return groups.flat().join(' ');
}

/**
 * Order- and duplicate-insensitive similarity of two normalized names.
 * Full score when the shared tokens cover one side entirely.
 */
export function tokenSetSimilarity(a: string, b: string): number {
  const tokensA = new Set(tokenize(a));
  const tokensB = new Set(tokenize(b));
  if (tokensA.size === 0 || tokensB.size === 0) return 0;

  const shared = [...tokensA].filter((token) => tokensB.has(token)).sort();
  const onlyA = [...tokensA].filter((token) => !tokensB.has(token)).sort();
  const onlyB = [...tokensB].filter((token) => !tokensA.has(token)).sort();

  if (shared.length > 0 && (onlyA.length === 0 || onlyB.length === 0)) {
    return 1;
  }

  const sharedText = joinTokens(shared);
  const combinedA = joinTokens(shared, onlyA);
  const combinedB = joinTokens(shared, onlyB);

  let best = indelSimilarity(combinedA, combinedB);
  if (sharedText) {
    best = Math.max(
      best,
      indelSimilarity(sharedText, combinedA),
      indelSimilarity(sharedText, combinedB)
    );
  }
  return best;
}
