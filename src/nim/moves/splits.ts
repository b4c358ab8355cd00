import { Stack } from '../core/stack'

/**
 * Calculate all possibilities to split `remainder` coins into two non-empty
 * stacks, accounting for symmetry: `(a, b)` and `(b, a)` are the same split,
 * so only pairs with `a <= b` are listed, in increasing order of `a`.
 *
 *    calculateSplits(4) => [(1, 3), (2, 2)]
 *    calculateSplits(5) => [(1, 4), (2, 3)]
 */
export function calculateSplits (remainder: number): Array<[Stack, Stack]> {
  const splits: Array<[Stack, Stack]> = []
  // Stacks of height 0 and 1 can't be split
  if (remainder <= 1) {
    return splits
  }
  for (let a = 1; a <= Math.floor(remainder / 2); a++) {
    splits.push([new Stack(a), new Stack(remainder - a)])
  }
  return splits
}
