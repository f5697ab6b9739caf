/**
 * Lazy permutation generator.
 *
 * Iterative form of the recursive swap/backtrack scheme: position `d` is
 * filled by swapping in each of the elements at d..n-1 in turn, recursing on
 * d+1 and swapping back. Starting from the input order this yields, for
 * [a, b, c]: abc, acb, bac, bca, cba, cab. The order is fixed, which is what
 * makes the exact optimizer's tie-breaking deterministic.
 *
 * Each yielded array is a fresh copy.
 */
export function* permutations<T>(items: readonly T[]): Generator<T[], void, undefined> {
  const work = [...items];
  const n = work.length;
  if (n <= 1) {
    yield [...work];
    return;
  }

  // next[d]: index of the next element to swap into position d
  const next = new Array<number>(n).fill(0);
  let depth = 0;

  while (depth >= 0) {
    if (depth === n - 1) {
      yield [...work];
      depth--;
      continue;
    }

    const candidate = next[depth]!;
    // Coming back from a child: undo the swap that produced it
    if (candidate > depth) swap(work, depth, candidate - 1);
    if (candidate === n) {
      depth--;
      continue;
    }

    swap(work, depth, candidate);
    next[depth] = candidate + 1;
    depth++;
    next[depth] = depth;
  }
}

/** n! for small n */
export function factorial(n: number): number {
  let result = 1;
  for (let i = 2; i <= n; i++) result *= i;
  return result;
}

function swap<T>(arr: T[], i: number, j: number): void {
  if (i === j) return;
  const tmp = arr[i]!;
  arr[i] = arr[j]!;
  arr[j] = tmp;
}
