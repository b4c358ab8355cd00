import { z } from 'zod'
import { type NimRule } from '../core/rule'
import { RuleSet } from '../core/ruleset'
import { toPosition } from '../core/stack'
import { NimGame } from '../game/nimgame'

const takeSizeSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('exact'), amount: z.number().int().min(1) }),
  z.object({ kind: z.literal('any') }),
  z.object({ kind: z.literal('place') })
])

export const ruleSchema = z.object({
  take: takeSizeSchema,
  split: z.enum(['never', 'optional', 'always'])
})

export const ruleSetSchema = z.array(ruleSchema)

export const gameSchema = z.object({
  rules: ruleSetSchema,
  stacks: z.array(z.number().int().min(0)),
  // Pools are reserved for Poker-Nim
  coinsA: z.literal(0).default(0),
  coinsB: z.literal(0).default(0)
})

/**
 * Raised when a JSON document is not a valid rule set or game.
 * `issues` lists every problem found, as `path: message`.
 */
export class RuleSetParseError extends Error {
  constructor (
    message: string,
    public readonly issues: string[] = []
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message)
    this.name = 'RuleSetParseError'
  }
}

function parseJson<T> (stream: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, what: string): T {
  let json: unknown
  try {
    json = JSON.parse(stream)
  } catch (e) {
    throw new RuleSetParseError(`Invalid ${what} JSON`, [e instanceof Error ? e.message : String(e)])
  }
  const parsed = schema.safeParse(json)
  if (!parsed.success) {
    throw new RuleSetParseError(
      `Invalid ${what}`,
      parsed.error.issues.map(issue => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    )
  }
  return parsed.data
}

export function serializeRules (rules: Iterable<NimRule>, pretty = false): string {
  return JSON.stringify(Array.from(rules), null, pretty ? 2 : undefined)
}

export function deserializeRules (stream: string): RuleSet {
  return new RuleSet(parseJson(stream, ruleSetSchema, 'rule set'))
}

export function serializeGame (game: NimGame, pretty = false): string {
  return JSON.stringify({
    rules: game.rules.rules,
    stacks: game.stacks.map(s => s.height),
    coinsA: game.coinsA,
    coinsB: game.coinsB
  }, null, pretty ? 2 : undefined)
}

export function deserializeGame (stream: string): NimGame {
  const { rules, stacks, coinsA, coinsB } = parseJson(stream, gameSchema, 'game')
  return new NimGame(new RuleSet(rules), toPosition(stacks), coinsA, coinsB)
}
