import debugFactory from 'debug'
import { Stack, toPosition } from '../core/stack'
import { type Nimber } from '../core/nimber'
import { type NimAction, actionToString } from '../core/action'
import { type MoveResult, moveFailed } from '../core/errors'
import { RuleSet } from '../core/ruleset'
import { config } from '../core/config'
import { applyMoveUnchecked, calculateLegalMoves, checkMove } from '../moves/movegenerator'

const debug = debugFactory('nimlib:game:module')

/**
 * A move on a full game: an action on the stack at `stackIndex`
 */
export interface PositionMove {
  readonly stackIndex: number
  readonly action: NimAction
}

export function positionMoveToString (move: PositionMove): string {
  return `S${move.stackIndex + 1}: ${actionToString(move.action)}`
}

/**
 * NIM game: a rule set and the stacks in play.
 *
 * For games history, rules, and theory check out wikipedia:
 * https://en.wikipedia.org/wiki/Nim
 *
 * Games are immutable; `step` returns a new game sharing the rule set (and so its nimber cache).
 * The coin pools of both players are reserved for Poker-Nim and must be empty.
 */
export class NimGame {
  private readonly stacks_: readonly Stack[]

  constructor (
    public readonly rules: RuleSet,
    stacks: Iterable<Stack>,
    public readonly coinsA = 0,
    public readonly coinsB = 0
  ) {
    if (coinsA !== 0 || coinsB !== 0) {
      throw new RangeError('Pool coins are not supported')
    }
    this.stacks_ = Array.from(stacks)
  }

  /**
   * The default game: take 1, 2 or 3 coins from a single stack of 10
   */
  public static reset (): NimGame {
    return new NimGame(RuleSet.default(), toPosition(config.defaultStacks))
  }

  get stacks (): readonly Stack[] {
    return this.stacks_
  }

  /**
   * Every legal move of the position, stack by stack
   */
  public legalMoves (): PositionMove[] {
    const legal: PositionMove[] = []
    this.stacks_.forEach((stack, stackIndex) => {
      for (const action of calculateLegalMoves(this.rules, stack)) {
        legal.push({ stackIndex, action })
      }
    })
    return legal
  }

  public checkMove (move: PositionMove): MoveResult<void> {
    const stack = this.stacks_[move.stackIndex]
    if (!Number.isInteger(move.stackIndex) || stack === undefined) {
      return moveFailed('stack-index-out-of-range', `No stack at index ${move.stackIndex} (${this.stacks_.length} stacks)`)
    }
    return checkMove(this.rules, stack, move.action)
  }

  /**
   * Apply a move and return the new game.
   * A split replaces the stack with its two parts, in place.
   * @throws MoveError if the move is illegal
   */
  public step (move: PositionMove): NimGame {
    const check = this.checkMove(move)
    if (!check.ok) {
      throw check.error
    }
    const stack = this.stacks_[move.stackIndex]
    const split = applyMoveUnchecked(stack, move.action)
    const replacement = split.kind === 'yes'
      ? [split.left, split.right]
      : [new Stack(stack.height - move.action.amount)]
    const stacks = [...this.stacks_]
    stacks.splice(move.stackIndex, 1, ...replacement)
    debug(`${positionMoveToString(move)}: ${this.toString()} -> ${stacks.map(s => s.toString()).join('|')}`)
    return new NimGame(this.rules, stacks, this.coinsA, this.coinsB)
  }

  /**
   * A game is over when no legal move is left; the player to move has lost
   */
  public terminal (): boolean {
    return this.legalMoves().length === 0
  }

  public nimber (): Nimber {
    return this.rules.nimberForPosition(this.stacks_)
  }

  /**
   * True if the player to move can force a win
   */
  public winning (): boolean {
    return !this.nimber().isZero()
  }

  public toString (): string {
    return this.stacks_.map(s => s.terminal ? '_' : s.toString()).join('|')
  }
}
