export { Stack, type Position, toPosition } from './nim/core/stack'
export { Nimber } from './nim/core/nimber'
export {
  type Split,
  type TakeSize,
  type ExactTake,
  type AnyTake,
  type PlaceTake,
  type NimRule,
  splitPolicies,
  takeExact,
  takeAny,
  placeCoins,
  isSplit,
  validateRule,
  ruleToString
} from './nim/core/rule'
export {
  type NimSplit,
  type NoSplit,
  type YesSplit,
  type NimAction,
  type TakeAction,
  type PlaceAction,
  noSplit,
  splitInto,
  takeCoins,
  actionToString
} from './nim/core/action'
export { MoveError, type MoveErrorCode, type MoveResult } from './nim/core/errors'
export { RuleSet } from './nim/core/ruleset'
export { config, type NimConfig } from './nim/core/config'
export { calculateSplits } from './nim/moves/splits'
export { checkMove, calculateLegalMoves, applyMoveUnchecked, applyMove, resultingStacks } from './nim/moves/movegenerator'
export { NimberCache } from './nim/nimbers/cache'
export { calculateNimberForHeight, calculateNimberForPosition, isWinningPosition } from './nim/nimbers/engine'
export { NimGame, type PositionMove, positionMoveToString } from './nim/game/nimgame'
export {
  RuleSetParseError,
  ruleSchema,
  ruleSetSchema,
  gameSchema,
  serializeRules,
  deserializeRules,
  serializeGame,
  deserializeGame
} from './nim/io/serialize'
export { type RuleSetOptions, makeRules, makeRuleSet } from './nim/io/rulebuilder'
export { formatSplits, formatNimbers, formatMoves } from './nim/io/format'
