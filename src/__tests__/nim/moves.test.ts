import { describe, expect, test } from '@jest/globals'
import debugFactory from 'debug'
import { NimGame } from '../../nim/game/nimgame'
import { RuleSet } from '../../nim/core/ruleset'
import { toPosition } from '../../nim/core/stack'
import { takeAny, takeExact } from '../../nim/core/rule'

const perf = debugFactory('nimlib:moves:test')

describe('Move enumeration Test:', () => {
  test('Taking any amount gives one move per coin', () => {
    const rules = new RuleSet([takeAny('never')])
    for (let height = 0; height <= 300; height++) {
      expect(new NimGame(rules, toPosition([height])).legalMoves().length).toEqual(height)
      expect(new NimGame(rules, toPosition([height, height])).legalMoves().length).toEqual(height * 2)
      expect(new NimGame(rules, toPosition([height, height, height, height, height])).legalMoves().length).toEqual(height * 5)
    }
  })
  test('Taking 1, 2 or 3 coins gives at most three moves', () => {
    const game = NimGame.reset()
    for (let height = 0; height <= 300; height++) {
      expect(new NimGame(game.rules, toPosition([height])).legalMoves().length).toEqual(Math.min(height, 3))
    }
    const moves = game.legalMoves()
    expect(moves.map(m => m.stackIndex)).toEqual([0, 0, 0])
    expect(moves.map(m => m.action)).toEqual([1, 2, 3].map(amount => ({ kind: 'take', amount, split: { kind: 'no' } })))
  })
  test('Optional splits add one move per split of the remainder', () => {
    const rules = new RuleSet([takeAny('optional')])
    for (let height = 0; height <= 60; height++) {
      // Every amount a gives the plain take plus floor((height - a) / 2) splits
      let expected = 0
      for (let amount = 1; amount <= height; amount++) {
        expected += 1 + Math.floor((height - amount) / 2)
      }
      expect(rules.legalMoves(height).length).toEqual(expected)
    }
  })
  test('Play the default game to the end with winning moves', () => {
    let game = NimGame.reset()
    let turns = 0
    while (!game.terminal()) {
      const moves = game.legalMoves()
      const winning = moves.find(m => !game.step(m).winning())
      // From a winning position a move to a losing position exists; otherwise any move will do
      expect(winning !== undefined).toEqual(game.winning())
      game = game.step(winning ?? moves[0])
      turns++
    }
    perf(`Default game finished after ${turns} turns, cache size ${game.rules.cache.size}`)
    // 10 has nimber 2: the first player takes 2, then answers every take of n with 4 - n
    expect(turns % 2).toEqual(1)
    expect(game.rules.nimberForHeight(10).value).toEqual(2)
  })
  test('Kayles positions', () => {
    const rules = new RuleSet([takeExact(1, 'optional'), takeExact(2, 'optional')])
    // Symmetric positions are lost for the player to move
    for (let height = 1; height <= 20; height++) {
      expect(rules.nimberForPosition(toPosition([height, height])).isZero()).toEqual(true)
    }
    // A single row can always be split into two equal rows
    for (let height = 1; height <= 20; height++) {
      expect(rules.nimberForHeight(height).isZero()).toEqual(false)
    }
  })
})
