import debugFactory from 'debug'
import fs from 'fs'
import { type Command, UsageError, usage } from './args'
import { config } from '../core/config'
import { RuleSet } from '../core/ruleset'
import { toPosition } from '../core/stack'
import { calculateLegalMoves } from '../moves/movegenerator'
import { calculateSplits } from '../moves/splits'
import { deserializeRules, serializeRules } from '../io/serialize'
import { makeRules } from '../io/rulebuilder'
import { formatMoves, formatNimbers, formatSplits } from '../io/format'

const debug = debugFactory('nimlib:cli:commands')

function readRulesFile (path: string): RuleSet {
  let json: string
  try {
    json = fs.readFileSync(path, { encoding: 'utf8' })
  } catch (e) {
    throw new UsageError(`Cannot read rule set file ${path}: ${e instanceof Error ? e.message : String(e)}`)
  }
  return deserializeRules(json)
}

/**
 * Resolve the rule set of a command:
 *    `@path` - a JSON file
 *    anything else - inline JSON
 *    nothing - the file named by the NIMLIB_RULES variable, or the default rule set
 */
export function loadRules (source: string | undefined, env: NodeJS.ProcessEnv = process.env): RuleSet {
  if (source !== undefined) {
    return source.startsWith('@') ? readRulesFile(source.slice(1)) : deserializeRules(source)
  }
  const path = env[config.rulesVariable]
  if (path !== undefined && path.length > 0) {
    debug(`Loading rule set from ${config.rulesVariable}=${path}`)
    return readRulesFile(path)
  }
  return RuleSet.default()
}

/**
 * Run a parsed command and return the lines to print
 */
export function runCommand (command: Command, env: NodeJS.ProcessEnv = process.env): string[] {
  switch (command.name) {
    case 'help':
      return usage
    case 'nimber': {
      const rules = loadRules(command.rules, env)
      const position = toPosition(command.heights.length > 0 ? command.heights : config.defaultStacks)
      debug(`Calculating nimbers under ${rules.toString()}`)
      const nimbers = position.map(s => rules.nimberForHeight(s.height))
      return formatNimbers(position, nimbers, rules.nimberForPosition(position), command.csv)
    }
    case 'splits':
      return formatSplits(command.height, calculateSplits(command.height), command.csv)
    case 'moves': {
      const rules = loadRules(command.rules, env)
      const position = toPosition(command.heights.length > 0 ? command.heights : config.defaultStacks)
      return position.flatMap(s => formatMoves(s, calculateLegalMoves(rules, s)))
    }
    case 'make-rule-set':
      return ['Made rule set:', serializeRules(makeRules(command.options), command.pretty)]
  }
}
