/**
 * Fuzzy string scores on a 0-100 scale.
 *
 * `ratio` is the normalized indel similarity (insertions and deletions only).
 * `partialRatio` aligns the shorter string against every window of the
 * longer one, including the shorter windows at either edge.
 * `tokenSetRatio` compares the shared and differing word sets.
 * Every score is rounded half-to-even to an integer.
 */

/** Levenshtein distance, two-row dynamic programming. */
export function levenshteinDistance(a: string, b: string): number {
  const m = a.length;
  const n = b.length;

  if (m === 0) return n;
  if (n === 0) return m;

  let prev = Array.from({ length: n + 1 }, (_, j) => j);
  for (let i = 1; i <= m; i++) {
    const curr = [i];
    for (let j = 1; j <= n; j++) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      curr[j] = Math.min(
        (prev[j] ?? 0) + 1,
        (curr[j - 1] ?? 0) + 1,
        (prev[j - 1] ?? 0) + cost,
      );
    }
    prev = curr;
  }

  return prev[n] ?? 0;
}

function longestCommonSubsequence(a: string, b: string): number {
  if (a.length === 0 || b.length === 0) return 0;

  let prev = new Array<number>(b.length + 1).fill(0);
  for (let i = 1; i <= a.length; i++) {
    const curr = new Array<number>(b.length + 1).fill(0);
    for (let j = 1; j <= b.length; j++) {
      curr[j] =
        a[i - 1] === b[j - 1]
          ? (prev[j - 1] ?? 0) + 1
          : Math.max(prev[j] ?? 0, curr[j - 1] ?? 0);
    }
    prev = curr;
  }
  return prev[b.length] ?? 0;
}

/** Edit distance allowing only insertions and deletions. */
export function indelDistance(a: string, b: string): number {
  return a.length + b.length - 2 * longestCommonSubsequence(a, b);
}

function normalizedSimilarity(distance: number, lengthSum: number): number {
  if (lengthSum === 0) return 100;
  return 100 - (100 * distance) / lengthSum;
}

/** Round to the nearest integer, ties to even. */
export function roundHalfEven(value: number): number {
  const floor = Math.floor(value);
  const diff = value - floor;
  if (diff > 0.5) return floor + 1;
  if (diff < 0.5) return floor;
  return floor % 2 === 0 ? floor : floor + 1;
}

function rawRatio(a: string, b: string): number {
  return normalizedSimilarity(indelDistance(a, b), a.length + b.length);
}

export function ratio(a: string, b: string): number {
  return roundHalfEven(rawRatio(a, b));
}

function bestWindowRatio(needle: string, haystack: string): number {
  const len1 = needle.length;
  const len2 = haystack.length;
  const needleChars = new Set(needle);
  let best = 0;

  const consider = (window: string): boolean => {
    const score = rawRatio(needle, window);
    if (score > best) best = score;
    return best === 100;
  };

  // windows growing in from the left edge
  for (let i = 1; i < len1; i++) {
    if (!needleChars.has(haystack.charAt(i - 1))) continue;
    if (consider(haystack.slice(0, i))) return best;
  }

  // full-length windows
  for (let i = 0; i < len2 - len1; i++) {
    if (!needleChars.has(haystack.charAt(i + len1 - 1))) continue;
    if (consider(haystack.slice(i, i + len1))) return best;
  }

  // windows shrinking toward the right edge
  for (let i = len2 - len1; i < len2; i++) {
    if (!needleChars.has(haystack.charAt(i))) continue;
    if (consider(haystack.slice(i))) return best;
  }

  return best;
}

export function partialRatio(a: string, b: string): number {
  if (a.length === 0 || b.length === 0) return 0;

  const [shorter, longer] = a.length <= b.length ? [a, b] : [b, a];
  let best = bestWindowRatio(shorter, longer);
  if (best !== 100 && shorter.length === longer.length) {
    best = Math.max(best, bestWindowRatio(longer, shorter));
  }
  return roundHalfEven(best);
}

/**
 * Lower-case, keep ASCII letters and digits, turn everything else into
 * spaces and trim.
 */
export function processForTokens(text: string): string {
  return text
    .replace(/[^\x00-\x7F]/g, "")
    .replace(/[^a-zA-Z0-9]/g, " ")
    .toLowerCase()
    .trim();
}

function tokenSet(text: string): Set<string> {
  return new Set(text.split(/\s+/).filter(Boolean));
}

function joinSorted(tokens: Iterable<string>): string {
  return [...tokens].sort().join(" ");
}

export function tokenSetRatio(a: string, b: string): number {
  const tokensA = tokenSet(processForTokens(a));
  const tokensB = tokenSet(processForTokens(b));
  if (tokensA.size === 0 || tokensB.size === 0) return 0;

  const intersection = [...tokensA].filter((t) => tokensB.has(t));
  const diffAB = [...tokensA].filter((t) => !tokensB.has(t));
  const diffBA = [...tokensB].filter((t) => !tokensA.has(t));

  if (intersection.length > 0 && (diffAB.length === 0 || diffBA.length === 0)) {
    return 100;
  }

  const diffABJoined = joinSorted(diffAB);
  const diffBAJoined = joinSorted(diffBA);
  const sectLen = joinSorted(intersection).length;
  const separator = sectLen !== 0 ? 1 : 0;
  const sectABLen = sectLen + separator + diffABJoined.length;
  const sectBALen = sectLen + separator + diffBAJoined.length;

  const diffScore = normalizedSimilarity(
    indelDistance(diffABJoined, diffBAJoined),
    sectABLen + sectBALen,
  );
  if (sectLen === 0) return roundHalfEven(diffScore);

  const sectABScore = normalizedSimilarity(separator + diffABJoined.length, sectLen + sectABLen);
  const sectBAScore = normalizedSimilarity(separator + diffBAJoined.length, sectLen + sectBALen);

  return roundHalfEven(Math.max(diffScore, sectABScore, sectBAScore));
}
