import { type NimRule, ruleToString, takeExact, validateRule } from './rule'
import { config } from './config'
import { type Nimber } from './nimber'
import { Stack, type Position } from './stack'
import { type NimAction } from './action'
import { type MoveResult } from './errors'
import { NimberCache } from '../nimbers/cache'
import { calculateNimberForHeight, calculateNimberForPosition } from '../nimbers/engine'
import { calculateLegalMoves, checkMove } from '../moves/movegenerator'

/**
 * An ordered set of rules. A move is legal if it matches at least one rule;
 * the order only decides the order in which moves are listed.
 *
 * Each rule set owns the cache its nimbers are memoized in, so values computed
 * under one rule set can never leak into another.
 */
export class RuleSet implements Iterable<NimRule> {
  private readonly rules_: readonly NimRule[]
  public readonly cache = new NimberCache()

  /**
   * The rules are validated and copied, so changing the given objects later
   * cannot invalidate the cache.
   */
  constructor (rules: Iterable<NimRule>) {
    this.rules_ = Object.freeze(Array.from(rules, rule => validateRule(rule)))
  }

  /**
   * The classic game: take 1, 2 or 3 coins, no splitting
   */
  public static default (): RuleSet {
    return new RuleSet(config.defaultTakeSizes.map(n => takeExact(n, config.defaultSplit)))
  }

  get rules (): readonly NimRule[] {
    return this.rules_
  }

  get length (): number {
    return this.rules_.length
  }

  [Symbol.iterator] (): Iterator<NimRule> {
    return this.rules_[Symbol.iterator]()
  }

  public nimberForHeight (height: number): Nimber {
    return calculateNimberForHeight(this.rules_, height, this.cache)
  }

  public nimberForPosition (position: Position): Nimber {
    return calculateNimberForPosition(this.rules_, position, this.cache)
  }

  public legalMoves (height: number): NimAction[] {
    return calculateLegalMoves(this.rules_, new Stack(height))
  }

  public checkMove (height: number, action: NimAction): MoveResult<void> {
    return checkMove(this.rules_, new Stack(height), action)
  }

  /**
   * Release the memoized nimbers. Later results are unaffected; they are recomputed on demand
   */
  public clearCache (): void {
    this.cache.clear()
  }

  public toString (): string {
    return this.rules_.map(r => ruleToString(r)).join('; ')
  }
}
