import { Stack } from './stack'

export interface NoSplit {
  readonly kind: 'no'
}

/**
 * The remainder of the stack is split into `left` and `right`, both non-empty.
 * Generated splits are canonical (`left.height <= right.height`).
 */
export interface YesSplit {
  readonly kind: 'yes'
  readonly left: Stack
  readonly right: Stack
}

export type NimSplit = NoSplit | YesSplit

export interface TakeAction {
  readonly kind: 'take'
  readonly amount: number
  readonly split: NimSplit
}

export interface PlaceAction {
  readonly kind: 'place'
  readonly amount: number
}

export type NimAction = TakeAction | PlaceAction

export const noSplit: NoSplit = { kind: 'no' }

export function splitInto (left: number | Stack, right: number | Stack): YesSplit {
  return {
    kind: 'yes',
    left: left instanceof Stack ? left : new Stack(left),
    right: right instanceof Stack ? right : new Stack(right)
  }
}

export function takeCoins (amount: number, split: NimSplit = noSplit): TakeAction {
  return { kind: 'take', amount, split }
}

export function actionToString (action: NimAction): string {
  if (action.kind === 'place') {
    return `place ${action.amount}`
  }
  if (action.split.kind === 'yes') {
    return `take ${action.amount} split ${action.split.left.height}+${action.split.right.height}`
  }
  return `take ${action.amount}`
}
