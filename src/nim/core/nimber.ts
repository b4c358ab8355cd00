/**
 * A Sprague-Grundy value.
 *
 * Kept apart from stack heights: a nimber of 3 and a stack of height 3 are
 * different things, even if classic Nim maps one onto the other.
 */
export class Nimber {
  public static readonly ZERO = new Nimber(0)

  constructor (
    public readonly value: number
  ) {
    if (!Number.isSafeInteger(value) || value < 0) {
      throw new RangeError(`Nimber must be a non-negative integer, got ${value}`)
    }
  }

  /**
   * Nim-sum of two nimbers: the value of the disjunctive sum of two games
   */
  public xor (other: Nimber): Nimber {
    return new Nimber(this.value ^ other.value)
  }

  public equals (other: Nimber): boolean {
    return this.value === other.value
  }

  public isZero (): boolean {
    return this.value === 0
  }

  public toString (): string {
    return `${this.value}`
  }

  /**
   * Minimum excludant: the smallest nimber not contained in `values`
   */
  public static mex (values: Iterable<Nimber>): Nimber {
    const excluded = new Set<number>()
    for (const nimber of values) {
      excluded.add(nimber.value)
    }
    let candidate = 0
    while (excluded.has(candidate)) {
      candidate++
    }
    return new Nimber(candidate)
  }

  public static sum (values: Iterable<Nimber>): Nimber {
    let total = Nimber.ZERO
    for (const nimber of values) {
      total = total.xor(nimber)
    }
    return total
  }
}
