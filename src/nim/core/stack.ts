/**
 * A stack of coins, represented by its height.
 * A stack of height 0 is terminal: no move can be made on it.
 */
export class Stack {
  constructor (
    public readonly height: number
  ) {
    if (!Number.isSafeInteger(height) || height < 0) {
      throw new RangeError(`Stack height must be a non-negative integer, got ${height}`)
    }
  }

  get terminal (): boolean {
    return this.height === 0
  }

  public toString (): string {
    return `${this.height}`
  }
}

/**
 * One full game state. The order of the stacks does not change the value of
 * the position, but it is kept for display and for addressing stacks by index.
 */
export type Position = readonly Stack[]

export function toPosition (heights: Iterable<number>): Stack[] {
  return Array.from(heights, h => new Stack(h))
}
