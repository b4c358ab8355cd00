import debugFactory from 'debug'
import { Stack } from '../core/stack'
import { type NimRule, type Split, type TakeSize } from '../core/rule'
import { type NimAction, type NimSplit, noSplit, splitInto, takeCoins, actionToString } from '../core/action'
import { type MoveResult, moveFailed, moveOk } from '../core/errors'
import { calculateSplits } from './splits'

const debug = debugFactory('nimlib:moves:generator')

/**
 * The amounts a take rule allows on a stack of `height` coins
 */
function legalAmounts (take: TakeSize, height: number): number[] {
  switch (take.kind) {
    case 'exact':
      return take.amount <= height ? [take.amount] : []
    case 'any':
      return Array.from({ length: height }, (_, i) => i + 1)
    case 'place':
      // Pools are always empty, so there is nothing to place
      return []
  }
}

function takeMatches (take: TakeSize, amount: number, height: number): boolean {
  switch (take.kind) {
    case 'exact':
      return take.amount === amount
    case 'any':
      return Number.isInteger(amount) && amount >= 1 && amount <= height
    case 'place':
      return false
  }
}

function splitPermits (policy: Split, split: NimSplit): boolean {
  switch (policy) {
    case 'never':
      return split.kind === 'no'
    case 'always':
      return split.kind === 'yes'
    case 'optional':
      return true
  }
}

/**
 * Check whether `action` is legal on `stack` under `rules`.
 * The action is legal if at least one rule accepts both its amount and its split.
 */
export function checkMove (rules: Iterable<NimRule>, stack: Stack, action: NimAction): MoveResult<void> {
  if (action.kind === 'place') {
    return moveFailed('place-not-supported', 'Placing coins from a pool is not supported')
  }
  const { amount, split } = action
  if (amount < 1) {
    return moveFailed('zero-amount', `At least one coin must be taken, got ${amount}`)
  }
  if (amount > stack.height) {
    return moveFailed('amount-exceeds-height', `Cannot take ${amount} coins from a stack of height ${stack.height}`)
  }
  const remainder = stack.height - amount
  if (split.kind === 'yes') {
    const { left, right } = split
    if (left.height < 1 || right.height < 1 || left.height + right.height !== remainder) {
      return moveFailed('invalid-split', `Cannot split ${remainder} coins into ${left.height} and ${right.height}`)
    }
  }
  const matching = Array.from(rules).filter(rule => takeMatches(rule.take, amount, stack.height))
  if (matching.length === 0) {
    return moveFailed('no-matching-rule', `No rule allows taking ${amount} coins from a stack of height ${stack.height}`)
  }
  if (matching.some(rule => splitPermits(rule.split, split))) {
    return moveOk(undefined)
  }
  return split.kind === 'yes'
    ? moveFailed('split-not-permitted', `Taking ${amount} coins does not allow a split`)
    : moveFailed('split-required', `Taking ${amount} coins requires a split`)
}

/**
 * List every legal action on `stack`, in rule order, then amount order, then split order.
 * Identical actions allowed by several rules are listed once per rule.
 */
export function calculateLegalMoves (rules: Iterable<NimRule>, stack: Stack): NimAction[] {
  const legal: NimAction[] = []
  for (const rule of rules) {
    for (const amount of legalAmounts(rule.take, stack.height)) {
      if (rule.split !== 'always') {
        legal.push(takeCoins(amount))
      }
      if (rule.split !== 'never') {
        for (const [left, right] of calculateSplits(stack.height - amount)) {
          legal.push(takeCoins(amount, splitInto(left, right)))
        }
      }
    }
  }
  if (debug.enabled) {
    debug(`Legal moves for height ${stack.height}: ${legal.map(a => actionToString(a)).join(', ')}`)
  }
  return legal
}

/**
 * Apply `action` to `stack` without validation.
 * The action must be legal for the stack; for an illegal action the result is meaningless.
 */
export function applyMoveUnchecked (stack: Stack, action: NimAction): NimSplit {
  if (action.kind === 'place') {
    throw new Error('Place actions are not supported')
  }
  return action.split.kind === 'yes' ? action.split : noSplit
}

/**
 * The stacks left behind by `action`: the reduced stack (possibly empty) or the two split stacks
 */
export function resultingStacks (stack: Stack, action: NimAction): Stack[] {
  const split = applyMoveUnchecked(stack, action)
  if (split.kind === 'yes') {
    return [split.left, split.right]
  }
  return [new Stack(stack.height - action.amount)]
}

export function applyMove (rules: Iterable<NimRule>, stack: Stack, action: NimAction): MoveResult<NimSplit> {
  const check = checkMove(rules, stack, action)
  if (!check.ok) {
    return check
  }
  return moveOk(applyMoveUnchecked(stack, action))
}
