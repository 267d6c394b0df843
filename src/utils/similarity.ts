export const TOKEN_SET_WEIGHT = 0.7;
export const PARTIAL_WEIGHT = 0.3;

// Needles up to this length are compared against every window of the haystack.
const SHORT_NEEDLE_LENGTH = 64;

export type SimilarityScorer = (a: string, b: string) => number;

interface MatchingBlock {
  needleStart: number;
  haystackStart: number;
  length: number;
}

/**
 * Blended similarity in [0, 1]: token-set overlap weighted 0.7, partial
 * substring overlap weighted 0.3. Case-insensitive and symmetric.
 */
export function similarityScore(a: string, b: string): number {
  const left = a.toLowerCase();
  const right = b.toLowerCase();

  if (left === right) {
    return 1;
  }
  if (!left || !right) {
    return 0;
  }

  const blended =
    TOKEN_SET_WEIGHT * tokenSetRatio(left, right) +
    PARTIAL_WEIGHT * partialRatio(left, right);
  return Math.min(1, Math.max(0, blended));
}

/**
 * Compares whitespace token sets. A text whose tokens are all contained in
 * the other scores 1, regardless of how much longer the other text is.
 */
export function tokenSetRatio(a: string, b: string): number {
  const tokensA = new Set(splitTokens(a.toLowerCase()));
  const tokensB = new Set(splitTokens(b.toLowerCase()));
  if (tokensA.size === 0 || tokensB.size === 0) {
    return 0;
  }

  const intersection = [...tokensA].filter((token) => tokensB.has(token)).sort();
  const onlyA = [...tokensA].filter((token) => !tokensB.has(token)).sort();
  const onlyB = [...tokensB].filter((token) => !tokensA.has(token)).sort();

  if (intersection.length > 0 && (onlyA.length === 0 || onlyB.length === 0)) {
    return 1;
  }

  const shared = intersection.join(" ");
  const combinedA = joinTokens(shared, onlyA.join(" "));
  const combinedB = joinTokens(shared, onlyB.join(" "));

  let best = indelRatio(combinedA, combinedB);
  if (shared) {
    best = Math.max(best, indelRatio(shared, combinedA), indelRatio(shared, combinedB));
  }
  return best;
}

/**
 * Best alignment of the shorter text against a window of the longer one.
 */
export function partialRatio(a: string, b: string): number {
  const left = a.toLowerCase();
  const right = b.toLowerCase();

  if (!left && !right) {
    return 1;
  }
  if (!left || !right) {
    return 0;
  }

  if (left.length === right.length) {
    return Math.max(bestWindowRatio(left, right), bestWindowRatio(right, left));
  }
  return left.length < right.length
    ? bestWindowRatio(left, right)
    : bestWindowRatio(right, left);
}

/** Normalized indel similarity: `2 * LCS / (|a| + |b|)`. */
export function indelRatio(a: string, b: string): number {
  const total = a.length + b.length;
  if (total === 0) {
    return 1;
  }
  return (2 * lcsLength(a, b)) / total;
}

export function lcsLength(a: string, b: string): number {
  if (!a || !b) {
    return 0;
  }

  let previous = new Int32Array(b.length + 1);
  let current = new Int32Array(b.length + 1);

  for (let i = 1; i <= a.length; i += 1) {
    const charA = a.charCodeAt(i - 1);
    for (let j = 1; j <= b.length; j += 1) {
      if (charA === b.charCodeAt(j - 1)) {
        current[j] = previous[j - 1] + 1;
      } else {
        current[j] = Math.max(previous[j], current[j - 1]);
      }
    }
    [previous, current] = [current, previous];
  }

  return previous[b.length];
}

function bestWindowRatio(needle: string, haystack: string): number {
  if (haystack.includes(needle)) {
    return 1;
  }

  const windows =
    needle.length <= SHORT_NEEDLE_LENGTH
      ? slidingWindows(needle.length, haystack.length)
      : blockAlignedWindows(needle, haystack);

  let best = 0;
  for (const [start, end] of windows) {
    const ratio = indelRatio(needle, haystack.slice(start, end));
    if (ratio > best) {
      best = ratio;
      if (best === 1) {
        break;
      }
    }
  }
  return best;
}

// Every full-width window, plus the shorter windows hanging off either end.
function slidingWindows(needleLength: number, haystackLength: number): Array<[number, number]> {
  const windows: Array<[number, number]> = [];
  const lastFullStart = haystackLength - needleLength;

  for (let end = 1; end < needleLength; end += 1) {
    windows.push([0, end]);
  }
  for (let start = 0; start <= lastFullStart; start += 1) {
    windows.push([start, start + needleLength]);
  }
  for (let start = lastFullStart + 1; start < haystackLength; start += 1) {
    windows.push([start, haystackLength]);
  }
  return windows;
}

function blockAlignedWindows(needle: string, haystack: string): Array<[number, number]> {
  const seen = new Set<number>();
  const windows: Array<[number, number]> = [];

  for (const block of matchingBlocks(needle, haystack)) {
    const start = Math.max(0, block.haystackStart - block.needleStart);
    if (seen.has(start)) {
      continue;
    }
    seen.add(start);
    windows.push([start, Math.min(haystack.length, start + needle.length)]);
  }

  if (windows.length === 0) {
    windows.push([0, Math.min(haystack.length, needle.length)]);
  }
  return windows;
}

function matchingBlocks(needle: string, haystack: string): MatchingBlock[] {
  const width = haystack.length + 1;
  const table = new Int32Array((needle.length + 1) * width);

  for (let i = 1; i <= needle.length; i += 1) {
    const charA = needle.charCodeAt(i - 1);
    for (let j = 1; j <= haystack.length; j += 1) {
      table[i * width + j] =
        charA === haystack.charCodeAt(j - 1)
          ? table[(i - 1) * width + j - 1] + 1
          : Math.max(table[(i - 1) * width + j], table[i * width + j - 1]);
    }
  }

  const pairs: Array<[number, number]> = [];
  let i = needle.length;
  let j = haystack.length;
  while (i > 0 && j > 0) {
    if (needle.charCodeAt(i - 1) === haystack.charCodeAt(j - 1)) {
      pairs.push([i - 1, j - 1]);
      i -= 1;
      j -= 1;
    } else if (table[(i - 1) * width + j] >= table[i * width + j - 1]) {
      i -= 1;
    } else {
      j -= 1;
    }
  }
  pairs.reverse();

  const blocks: MatchingBlock[] = [];
  for (const [needleIndex, haystackIndex] of pairs) {
    const last = blocks[blocks.length - 1];
    if (
      last &&
      last.needleStart + last.length === needleIndex &&
      last.haystackStart + last.length === haystackIndex
    ) {
      last.length += 1;
    } else {
      blocks.push({ needleStart: needleIndex, haystackStart: haystackIndex, length: 1 });
    }
  }
  return blocks;
}

function splitTokens(text: string): string[] {
  return text.split(/\s+/).filter((token) => token.length > 0);
}

function joinTokens(shared: string, rest: string): string {
  if (!shared) {
    return rest;
  }
  return rest ? `${shared} ${rest}` : shared;
}
