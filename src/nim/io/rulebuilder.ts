import { type NimRule, type Split, placeCoins, takeAny, takeExact } from '../core/rule'
import { RuleSet } from '../core/ruleset'

export interface RuleSetOptions {
  // Take sizes whose remainder cannot be split
  takeSplitNever?: number[]
  // Take sizes whose remainder may be split
  takeSplitOptional?: number[]
  // Take sizes whose remainder must be split
  takeSplitAlways?: number[]
  // Allow taking any amount of coins, with the given split policy
  allowAnyTake?: Split
  // Allow placing coins (reserved)
  allowPlace?: boolean
}

/**
 * Build the rules described by `options`, in the order never, optional, always, any, place
 */
export function makeRules (options: RuleSetOptions): NimRule[] {
  const rules: NimRule[] = []
  const lists: Array<[number[] | undefined, Split]> = [
    [options.takeSplitNever, 'never'],
    [options.takeSplitOptional, 'optional'],
    [options.takeSplitAlways, 'always']
  ]
  for (const [amounts, split] of lists) {
    for (const amount of amounts ?? []) {
      rules.push(takeExact(amount, split))
    }
  }
  if (options.allowAnyTake !== undefined) {
    rules.push(takeAny(options.allowAnyTake))
  }
  if (options.allowPlace === true) {
    rules.push(placeCoins())
  }
  return rules
}

export function makeRuleSet (options: RuleSetOptions): RuleSet {
  return new RuleSet(makeRules(options))
}
