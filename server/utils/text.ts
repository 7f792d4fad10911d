/**
 * Longest-matching-blocks similarity ("gestalt pattern matching"): find the
 * longest common block, recurse on both sides of it, and report
 * `2 * matched / (len(a) + len(b))`.
 *
 * When `b` has 200+ items, elements occurring more than `len(b) / 100 + 1`
 * times are "popular" and never seed a match.
 */

const POPULAR_MIN_LENGTH = 200;

interface MatchBlock {
  i: number;
  j: number;
  size: number;
}

const buildIndex = (b: string[]): Map<string, number[]> => {
  const index = new Map<string, number[]>();
  b.forEach((elt, j) => {
    const positions = index.get(elt);
    if (positions) positions.push(j);
    else index.set(elt, [j]);
  });

  if (b.length >= POPULAR_MIN_LENGTH) {
    const limit = Math.floor(b.length / 100) + 1;
    for (const [elt, positions] of index) {
      if (positions.length > limit) index.delete(elt);
    }
  }
  return index;
};

const findLongestMatch = (
  a: string[],
  b: string[],
  index: Map<string, number[]>,
  alo: number,
  ahi: number,
  blo: number,
  bhi: number,
): MatchBlock => {
  let bestI = alo;
  let bestJ = blo;
  let bestSize = 0;
  let runLengths = new Map<number, number>();

  for (let i = alo; i < ahi; i += 1) {
    const next = new Map<number, number>();
    for (const j of index.get(a[i]) ?? []) {
      if (j < blo) continue;
      if (j >= bhi) break;
      const k = (runLengths.get(j - 1) ?? 0) + 1;
      next.set(j, k);
      if (k > bestSize) {
        bestI = i - k + 1;
        bestJ = j - k + 1;
        bestSize = k;
      }
    }
    runLengths = next;
  }

  // Popular elements never seed a match but may still extend one.
  while (bestI > alo && bestJ > blo && a[bestI - 1] === b[bestJ - 1]) {
    bestI -= 1;
    bestJ -= 1;
    bestSize += 1;
  }
  while (bestI + bestSize < ahi && bestJ + bestSize < bhi && a[bestI + bestSize] === b[bestJ + bestSize]) {
    bestSize += 1;
  }

  return { i: bestI, j: bestJ, size: bestSize };
};

export const matchingBlocks = (a: string[], b: string[]): MatchBlock[] => {
  const index = buildIndex(b);
  const blocks: MatchBlock[] = [];
  const queue: Array<[number, number, number, number]> = [[0, a.length, 0, b.length]];

  while (queue.length) {
    const range = queue.pop();
    if (!range) break;
    const [alo, ahi, blo, bhi] = range;
    const match = findLongestMatch(a, b, index, alo, ahi, blo, bhi);
    if (match.size === 0) continue;
    blocks.push(match);
    if (alo < match.i && blo < match.j) {
      queue.push([alo, match.i, blo, match.j]);
    }
    if (match.i + match.size < ahi && match.j + match.size < bhi) {
      queue.push([match.i + match.size, ahi, match.j + match.size, bhi]);
    }
  }

  return blocks.sort((x, y) => x.i - y.i || x.j - y.j);
};

/** Ratio in [0, 1] over code points; 1.0 only for identical inputs. Two empty strings score 1. */
export const sequenceRatio = (left: string, right: string): number => {
  const a = Array.from(left);
  const b = Array.from(right);
  const total = a.length + b.length;
  if (total === 0) return 1;
  const matched = matchingBlocks(a, b).reduce((sum, block) => sum + block.size, 0);
  return (2 * matched) / total;
};

export const jaccardSimilarity = <T>(left: Set<T>, right: Set<T>): number => {
  let intersection = 0;
  for (const item of left) {
    if (right.has(item)) intersection += 1;
  }
  const union = left.size + right.size - intersection;
  return union === 0 ? 0 : intersection / union;
};
