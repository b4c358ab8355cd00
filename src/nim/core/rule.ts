/**
 * Whether a player may or must split the remainder of a stack into two
 * non-empty stacks after taking coins
 *    never - the remainder stays one stack
 *    optional - the player decides
 *    always - the remainder must be split; a remainder below 2 can't be, so no move exists
 */
export type Split = 'never' | 'optional' | 'always'

export const splitPolicies: readonly Split[] = ['never', 'optional', 'always']

export interface ExactTake {
  readonly kind: 'exact'
  readonly amount: number
}

export interface AnyTake {
  readonly kind: 'any'
}

/**
 * Placing coins from a player's pool onto a stack (Poker-Nim).
 * Reserved: a place rule allows no move until pools are modelled.
 */
export interface PlaceTake {
  readonly kind: 'place'
}

export type TakeSize = ExactTake | AnyTake | PlaceTake

/**
 * A rule specifies a set of possible moves for a player.
 * A move is legal if it matches at least one rule of the rule set.
 */
export interface NimRule {
  readonly take: TakeSize
  readonly split: Split
}

export function takeExact (amount: number, split: Split = 'never'): NimRule {
  if (!Number.isSafeInteger(amount) || amount < 1) {
    throw new RangeError(`Take amount must be a positive integer, got ${amount}`)
  }
  return { take: { kind: 'exact', amount }, split }
}

export function takeAny (split: Split = 'never'): NimRule {
  return { take: { kind: 'any' }, split }
}

export function placeCoins (): NimRule {
  return { take: { kind: 'place' }, split: 'never' }
}

export function isSplit (value: string): value is Split {
  return splitPolicies.some(s => s === value)
}

/**
 * Check a rule built without the helpers above and return a frozen copy of it
 */
export function validateRule (rule: NimRule): NimRule {
  if (!isSplit(rule.split)) {
    throw new RangeError(`Unknown split policy '${String(rule.split)}'`)
  }
  let take: TakeSize
  switch (rule.take.kind) {
    case 'exact':
      take = takeExact(rule.take.amount).take
      break
    case 'any':
      take = { kind: 'any' }
      break
    case 'place':
      take = { kind: 'place' }
      break
    default:
      throw new RangeError('Unknown take size')
  }
  return Object.freeze({ take: Object.freeze(take), split: rule.split })
}

export function ruleToString (rule: NimRule): string {
  switch (rule.take.kind) {
    case 'exact':
      return `take ${rule.take.amount}, split ${rule.split}`
    case 'any':
      return `take any, split ${rule.split}`
    case 'place':
      return 'place'
  }
}
