import debugFactory from 'debug'
import { Stack, type Position } from '../core/stack'
import { Nimber } from '../core/nimber'
import { type NimRule } from '../core/rule'
import { calculateLegalMoves, resultingStacks } from '../moves/movegenerator'
import { type NimberCache } from './cache'

const debug = debugFactory('nimlib:nimbers:engine')

function cachedNimber (cache: NimberCache, height: number): Nimber {
  const nimber = cache.get(height)
  if (nimber === undefined) {
    throw new Error(`Nimber for height ${height} is not cached`)
  }
  return nimber
}

/**
 * Calculate the nimber of a stack of height `height` under `rules`.
 *
 * Every legal move is applied to a copy of the stack; the value of the resulting
 * position is the XOR of the nimbers of its stacks (one stack, or two after a split).
 * The nimber of the stack is the MEX (minimum excluded value) of those values.
 *
 * Heights are resolved depth first from an explicit work list, so the call stack
 * does not grow with the height. Only heights reachable from `height` are visited.
 * Results are memoized in `cache`, which must belong to `rules`.
 */
export function calculateNimberForHeight (rules: Iterable<NimRule>, height: number, cache: NimberCache): Nimber {
  const cached = cache.get(height)
  if (cached !== undefined) {
    return cached
  }
  const ruleList = Array.from(rules)
  const pending: number[] = [new Stack(height).height]
  let top = pending.pop()
  while (top !== undefined) {
    if (!cache.has(top)) {
      const stack = new Stack(top)
      const outcomes = calculateLegalMoves(ruleList, stack).map(action => resultingStacks(stack, action))
      const missing = new Set<number>()
      for (const s of outcomes.flat()) {
        if (s.height >= top) {
          throw new Error(`A move from height ${top} leaves a stack of height ${s.height}`)
        }
        if (!cache.has(s.height)) {
          missing.add(s.height)
        }
      }
      if (missing.size > 0) {
        // Revisit this height once every successor is known
        pending.push(top, ...missing)
      } else {
        const nimber = Nimber.mex(outcomes.map(stacks => Nimber.sum(stacks.map(s => cachedNimber(cache, s.height)))))
        cache.set(top, nimber)
        if (debug.enabled) {
          debug(`nimber(${top}) = ${nimber.toString()} from ${outcomes.length} moves`)
        }
      }
    }
    top = pending.pop()
  }
  return cachedNimber(cache, height)
}

/**
 * Calculate the nimber of a position: the XOR of the nimbers of its stacks.
 * The player to move wins the position if and only if the result is not zero.
 */
export function calculateNimberForPosition (rules: Iterable<NimRule>, position: Position, cache: NimberCache): Nimber {
  return Nimber.sum(position.map(s => calculateNimberForHeight(rules, s.height, cache)))
}

export function isWinningPosition (rules: Iterable<NimRule>, position: Position, cache: NimberCache): boolean {
  return !calculateNimberForPosition(rules, position, cache).isZero()
}
