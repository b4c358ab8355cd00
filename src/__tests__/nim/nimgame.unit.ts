import { describe, expect, test } from '@jest/globals'
import { NimGame, type PositionMove, positionMoveToString } from '../../nim/game/nimgame'
import { RuleSet } from '../../nim/core/ruleset'
import { Stack, toPosition } from '../../nim/core/stack'
import { takeExact } from '../../nim/core/rule'
import { splitInto, takeCoins } from '../../nim/core/action'
import { MoveError } from '../../nim/core/errors'

const kayles = new RuleSet([takeExact(1, 'optional'), takeExact(2, 'optional')])

describe('Nim Game Unit Test:', () => {
  test('Check the default game', () => {
    const game = NimGame.reset()
    expect(game.toString()).toEqual('10')
    expect(game.legalMoves().map(m => positionMoveToString(m))).toEqual(['S1: take 1', 'S1: take 2', 'S1: take 3'])
    expect(game.nimber().value).toEqual(2)
    expect(game.winning()).toEqual(true)
    const s1 = game.step({ stackIndex: 0, action: takeCoins(2) })
    expect(s1.toString()).toEqual('8')
    expect(s1.winning()).toEqual(false)
    expect(s1.rules).toBe(game.rules)
    // The previous game is untouched
    expect(game.stacks.map(s => s.height)).toEqual([10])
  })
  test('Check a game with splits', () => {
    const game = new NimGame(kayles, toPosition([5, 2]))
    expect(game.legalMoves().map(m => positionMoveToString(m))).toEqual([
      'S1: take 1', 'S1: take 1 split 1+3', 'S1: take 1 split 2+2', 'S1: take 2', 'S1: take 2 split 1+2',
      'S2: take 1', 'S2: take 2'
    ])
    // n(5) = 4, n(2) = 2
    expect(game.nimber().value).toEqual(6)
    const s1 = game.step({ stackIndex: 0, action: takeCoins(1, splitInto(2, 2)) })
    expect(s1.toString()).toEqual('2|2|2')
    expect(s1.nimber().value).toEqual(2)
    expect(s1.terminal()).toEqual(false)
    const s2 = s1.step({ stackIndex: 2, action: takeCoins(2) })
    expect(s2.toString()).toEqual('2|2|_')
    expect(s2.winning()).toEqual(false)
    const s3 = s2.step({ stackIndex: 1, action: takeCoins(1) })
    expect(s3.stacks).toEqual([new Stack(2), new Stack(1), new Stack(0)])
    expect(s3.nimber().value).toEqual(3)
    const s4 = s3.step({ stackIndex: 0, action: takeCoins(1) })
    const s5 = s4.step({ stackIndex: 0, action: takeCoins(1) })
    const s6 = s5.step({ stackIndex: 1, action: takeCoins(1) })
    expect(s6.toString()).toEqual('_|_|_')
    expect(s6.terminal()).toEqual(true)
    expect(s6.legalMoves()).toEqual([])
    expect(s6.nimber().value).toEqual(0)
  })
  test('Check illegal moves', () => {
    const game = new NimGame(kayles, toPosition([4]))
    const outOfRange: PositionMove = { stackIndex: 1, action: takeCoins(1) }
    const check = game.checkMove(outOfRange)
    expect(check.ok).toEqual(false)
    if (!check.ok) {
      expect(check.error.code).toEqual('stack-index-out-of-range')
    }
    expect(() => game.step(outOfRange)).toThrow(MoveError)
    expect(() => game.step({ stackIndex: 0, action: takeCoins(3) })).toThrow('No rule allows taking 3 coins')
    expect(() => game.step({ stackIndex: 0, action: takeCoins(1, splitInto(1, 1)) })).toThrow('Cannot split 3 coins')
  })
  test('Pool coins are not supported', () => {
    expect(() => new NimGame(kayles, toPosition([4]), 1, 0)).toThrow(RangeError)
  })
})
