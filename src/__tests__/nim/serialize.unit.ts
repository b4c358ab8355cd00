import { describe, expect, test } from '@jest/globals'
import {
  RuleSetParseError,
  deserializeGame,
  deserializeRules,
  serializeGame,
  serializeRules
} from '../../nim/io/serialize'
import { makeRuleSet, makeRules } from '../../nim/io/rulebuilder'
import { placeCoins, takeAny, takeExact } from '../../nim/core/rule'
import { NimGame } from '../../nim/game/nimgame'
import { toPosition } from '../../nim/core/stack'

describe('Serialization Unit Test:', () => {
  test('Serialize rules', () => {
    expect(serializeRules([takeExact(3), takeAny('optional')])).toEqual(
      '[{"take":{"kind":"exact","amount":3},"split":"never"},{"take":{"kind":"any"},"split":"optional"}]'
    )
    expect(serializeRules([placeCoins()], true)).toEqual([
      '[',
      '  {',
      '    "take": {',
      '      "kind": "place"',
      '    },',
      '    "split": "never"',
      '  }',
      ']'
    ].join('\n'))
  })
  test('Deserialize rules', () => {
    const ruleSet = deserializeRules('[{"take":{"kind":"exact","amount":2},"split":"always"},{"take":{"kind":"any"},"split":"never"}]')
    expect(ruleSet.rules).toEqual([takeExact(2, 'always'), takeAny('never')])
    expect(ruleSet.cache.size).toEqual(0)
    expect(ruleSet.nimberForHeight(3).value).toEqual(3)
  })
  test('Reject invalid rules', () => {
    expect(() => deserializeRules('not json')).toThrow(RuleSetParseError)
    expect(() => deserializeRules('{}')).toThrow('Invalid rule set: (root): Expected array, received object')
    try {
      deserializeRules('[{"take":{"kind":"exact","amount":0},"split":"never"},{"take":{"kind":"any"},"split":"sometimes"}]')
      throw new Error('expected a parse error')
    } catch (e) {
      expect(e).toBeInstanceOf(RuleSetParseError)
      if (e instanceof RuleSetParseError) {
        expect(e.issues.map(i => i.split(':')[0])).toEqual(['0.take.amount', '1.split'])
      }
    }
  })
  test('Serialize games', () => {
    const game = new NimGame(makeRuleSet({ takeSplitNever: [1, 2] }), toPosition([3, 0, 4]))
    const json = serializeGame(game)
    expect(JSON.parse(json)).toEqual({
      rules: [takeExact(1), takeExact(2)],
      stacks: [3, 0, 4],
      coinsA: 0,
      coinsB: 0
    })
    const restored = deserializeGame(json)
    expect(restored.toString()).toEqual('3|_|4')
    expect(restored.rules.rules).toEqual(game.rules.rules)
    expect(restored.nimber()).toEqual(game.nimber())
  })
  test('Deserialize games without pools', () => {
    const game = deserializeGame('{"rules":[{"take":{"kind":"any"},"split":"never"}],"stacks":[1,2,3]}')
    expect(game.coinsA).toEqual(0)
    expect(game.coinsB).toEqual(0)
    expect(game.winning()).toEqual(false)
    expect(() => deserializeGame('{"rules":[],"stacks":[1],"coinsA":3}')).toThrow(RuleSetParseError)
    expect(() => deserializeGame('{"rules":[],"stacks":[-1]}')).toThrow(RuleSetParseError)
  })
})

describe('Rule Builder Unit Test:', () => {
  test('Rules are built in policy order', () => {
    expect(makeRules({
      allowPlace: true,
      allowAnyTake: 'always',
      takeSplitAlways: [4],
      takeSplitOptional: [2, 3],
      takeSplitNever: [1]
    })).toEqual([
      takeExact(1, 'never'),
      takeExact(2, 'optional'),
      takeExact(3, 'optional'),
      takeExact(4, 'always'),
      takeAny('always'),
      placeCoins()
    ])
    expect(makeRules({})).toEqual([])
  })
})
