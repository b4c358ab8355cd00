import { type Nimber } from '../core/nimber'

/**
 * Memo table from stack height to nimber.
 *
 * A cache is only valid for the rule set it was filled with, so every `RuleSet`
 * owns one and never shares it. Entries are written once: writing a different
 * nimber for a height already present is a programming error.
 */
export class NimberCache {
  private readonly data_ = new Map<number, Nimber>()

  get (height: number): Nimber | undefined {
    return this.data_.get(height)
  }

  has (height: number): boolean {
    return this.data_.has(height)
  }

  set (height: number, nimber: Nimber): this {
    const existing = this.data_.get(height)
    if (existing !== undefined && !existing.equals(nimber)) {
      throw new Error(`Nimber for height ${height} is already cached as ${existing.toString()}, refusing ${nimber.toString()}`)
    }
    this.data_.set(height, nimber)
    return this
  }

  get size (): number {
    return this.data_.size
  }

  clear (): void {
    this.data_.clear()
  }
}
