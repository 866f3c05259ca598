/**
 * Ratcliff/Obershelp similarity: 2·M / T, where M is the number of
 * characters in the matching blocks found by repeatedly taking the longest
 * common substring and recursing on both sides, and T the total length.
 *
 * When `b` has 200 or more characters, characters occurring in more than
 * 1% of it (plus one) are not used to seed matches, only to extend them.
 */
export function similarityRatio(a: string, b: string): number {
  const left = Array.from(a);
  const right = Array.from(b);
  const total = left.length + right.length;
  if (total === 0) return 1.0;
  return (2 * countMatches(left, right)) / total;
}

const AUTOJUNK_MIN_LENGTH = 200;

function indexPositions(b: string[]): Map<string, number[]> {
  const positions = new Map<string, number[]>();
  b.forEach((ch, j) => {
    const list = positions.get(ch);
    if (list) list.push(j);
    else positions.set(ch, [j]);
  });

  if (b.length >= AUTOJUNK_MIN_LENGTH) {
    const limit = Math.floor(b.length / 100) + 1;
    for (const [ch, list] of positions) {
      if (list.length > limit) positions.delete(ch);
    }
  }
  return positions;
}

interface Block {
  i: number;
  j: number;
  size: number;
}

function longestMatch(
  a: string[],
  b: string[],
  positions: Map<string, number[]>,
  alo: number,
  ahi: number,
  blo: number,
  bhi: number
): Block {
  let best: Block = { i: alo, j: blo, size: 0 };
  let runs = new Map<number, number>();

  for (let i = alo; i < ahi; i++) {
    const next = new Map<number, number>();
    for (const j of positions.get(a[i]) ?? []) {
      if (j < blo) continue;
      if (j >= bhi) break;
      const k = (runs.get(j - 1) ?? 0) + 1;
      next.set(j, k);
      if (k > best.size) best = { i: i - k + 1, j: j - k + 1, size: k };
    }
    runs = next;
  }

  // Grow the match over characters excluded from seeding.
  let { i, j, size } = best;
  while (i > alo && j > blo && a[i - 1] === b[j - 1]) {
    i--;
    j--;
    size++;
  }
  while (i + size < ahi && j + size < bhi && a[i + size] === b[j + size]) {
    size++;
  }
  return { i, j, size };
}

function countMatches(a: string[], b: string[]): number {
  const positions = indexPositions(b);
  const queue: Array<[number, number, number, number]> = [[0, a.length, 0, b.length]];
  let matched = 0;

  while (queue.length > 0) {
    const range = queue.pop();
    if (!range) break;
    const [alo, ahi, blo, bhi] = range;
    const { i, j, size } = longestMatch(a, b, positions, alo, ahi, blo, bhi);
    if (size === 0) continue;

    matched += size;
    if (alo < i && blo < j) queue.push([alo, i, blo, j]);
    if (i + size < ahi && j + size < bhi) queue.push([i + size, ahi, j + size, bhi]);
  }

  return matched;
}
