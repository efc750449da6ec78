import type { ScoredCandidate } from '../types/packages.js';

export const DEFAULT_MAX_RESULTS = 10;
export const DEFAULT_CUTOFF = 0.3;

// Queries this long get the auto-junk treatment: very common characters never start a match.
const AUTOJUNK_MIN_LENGTH = 200;

interface Block {
  aStart: number;
  bStart: number;
  size: number;
}

/** Positions of each character of `b`, minus popular characters on long inputs. */
function indexSequence(b: string): Map<string, number[]> {
  const positions = new Map<string, number[]>();
  for (let j = 0; j < b.length; j++) {
    const ch = b[j];
    const list = positions.get(ch);
    if (list) list.push(j);
    else positions.set(ch, [j]);
  }

  if (b.length >= AUTOJUNK_MIN_LENGTH) {
    const threshold = Math.floor(b.length / 100) + 1;
    for (const [ch, list] of positions) {
      if (list.length > threshold) positions.delete(ch);
    }
  }
  return positions;
}

function findLongestMatch(
  a: string,
  b: string,
  positions: Map<string, number[]>,
  aLo: number,
  aHi: number,
  bLo: number,
  bHi: number,
): Block {
  let best: Block = { aStart: aLo, bStart: bLo, size: 0 };
  // runLengths.get(j) = length of the match ending at a[i-1], b[j]
  let runLengths = new Map<number, number>();

  for (let i = aLo; i < aHi; i++) {
    const next = new Map<number, number>();
    for (const j of positions.get(a[i]) ?? []) {
      if (j < bLo) continue;
      if (j >= bHi) break;
      const k = (runLengths.get(j - 1) ?? 0) + 1;
      next.set(j, k);
      if (k > best.size) {
        best = { aStart: i - k + 1, bStart: j - k + 1, size: k };
      }
    }
    runLengths = next;
  }

  // Popular characters cannot seed a block but still extend one, even an empty one.
  let { aStart, bStart, size } = best;
  while (aStart > aLo && bStart > bLo && a[aStart - 1] === b[bStart - 1]) {
    aStart--;
    bStart--;
    size++;
  }
  while (aStart + size < aHi && bStart + size < bHi && a[aStart + size] === b[bStart + size]) {
    size++;
  }
  return { aStart, bStart, size };
}

function countMatches(a: string, b: string): number {
  const positions = indexSequence(b);
  const pending: [number, number, number, number][] = [[0, a.length, 0, b.length]];
  let matched = 0;

  while (pending.length > 0) {
    const range = pending.pop();
    if (!range) break;
    const [aLo, aHi, bLo, bHi] = range;
    const block = findLongestMatch(a, b, positions, aLo, aHi, bLo, bHi);
    if (block.size === 0) continue;

    matched += block.size;
    if (aLo < block.aStart && bLo < block.bStart) {
      pending.push([aLo, block.aStart, bLo, block.bStart]);
    }
    const aEnd = block.aStart + block.size;
    const bEnd = block.bStart + block.size;
    if (aEnd < aHi && bEnd < bHi) {
      pending.push([aEnd, aHi, bEnd, bHi]);
    }
  }
  return matched;
}

/**
 * Ratcliff/Obershelp similarity in [0, 1]: twice the number of characters in the
 * recursively found longest common blocks, over the combined length.
 */
export function similarity(a: string, b: string): number {
  const total = a.length + b.length;
  if (total === 0) return 1;
  return (2 * countMatches(a, b)) / total;
}

/** Distinct candidates scoring at least `cutoff`, best first; equal scores keep input order. */
export function rankCandidates(
  query: string,
  candidates: Iterable<string>,
  maxResults = DEFAULT_MAX_RESULTS,
  cutoff = DEFAULT_CUTOFF,
): ScoredCandidate[] {
  if (cutoff < 0 || cutoff > 1) {
    throw new RangeError(`cutoff must be within [0, 1], got ${cutoff}`);
  }
  if (maxResults <= 0) return [];

  const unique = [...new Set(candidates)];
  const scored = unique
    .map((name, order) => ({ name, score: similarity(name, query), order }))
    .filter((c) => c.score >= cutoff);

  scored.sort((x, y) => y.score - x.score || x.order - y.order);

  return scored.slice(0, maxResults).map(({ name, score }) => ({ name, score }));
}

export function resolve(
  query: string,
  candidates: Iterable<string>,
  maxResults = DEFAULT_MAX_RESULTS,
  cutoff = DEFAULT_CUTOFF,
): string[] {
  return rankCandidates(query, candidates, maxResults, cutoff).map((c) => c.name);
}
