import { type Split, isSplit } from '../core/rule'
import { type RuleSetOptions } from '../io/rulebuilder'

/**
 * Raised for command lines that can't be understood
 */
export class UsageError extends Error {
  constructor (message: string) {
    super(message)
    this.name = 'UsageError'
  }
}

export type Command =
  | { name: 'nimber', heights: number[], rules?: string, csv: boolean }
  | { name: 'splits', height: number, csv: boolean }
  | { name: 'moves', heights: number[], rules?: string }
  | { name: 'make-rule-set', options: RuleSetOptions, pretty: boolean }
  | { name: 'help' }

export interface CliArgs {
  command: Command
  verbose: boolean
}

export const usage = [
  'Usage: nimlib [-v] <command> [options]',
  '',
  'Commands:',
  '  nimber [--rules <json|@file>] [--csv] <height...>  Calculate the nimbers of stacks and of their position',
  '  splits [--csv] <height>                            Calculate all possible splits for a given height',
  '  moves [--rules <json|@file>] <height...>           List the legal moves of stacks',
  '  make-rule-set [options]                            Create a JSON rule set',
  '      -n, --take-split-never <n,...>     take sizes whose remainder cannot be split',
  '      -o, --take-split-optional <n,...>  take sizes whose remainder may be split',
  '      -a, --take-split-always <n,...>    take sizes whose remainder must be split',
  '      -s, --allow-any-take <split>       allow taking any amount (never, optional, always)',
  '      -p, --allow-place                  allow placing coins (reserved)',
  '      -P, --pretty-print                 pretty-print the JSON output',
  '',
  'Options:',
  '  -v, --verbose  Enable debug output'
]

export function parseCount (value: string, what: string): number {
  if (!/^\d+$/.test(value)) {
    throw new UsageError(`${what} must be a non-negative integer, got '${value}'`)
  }
  const count = Number.parseInt(value, 10)
  if (!Number.isSafeInteger(count)) {
    throw new UsageError(`${what} is too large, got '${value}'`)
  }
  return count
}

function parseList (value: string, what: string): number[] {
  return value.split(',').filter(v => v.length > 0).map(v => parseCount(v, what))
}

function parseSplit (value: string): Split {
  if (!isSplit(value)) {
    throw new UsageError(`Split must be one of never, optional, always, got '${value}'`)
  }
  return value
}

/**
 * Walks the arguments of one subcommand
 */
class ArgReader {
  private index = 0

  constructor (private readonly args: string[]) {}

  next (): string | undefined {
    return this.args[this.index++]
  }

  value (flag: string): string {
    const value = this.next()
    if (value === undefined) {
      throw new UsageError(`Option ${flag} needs a value`)
    }
    return value
  }
}

function parseHeights (reader: ArgReader, allowRules: boolean, allowCsv: boolean): { heights: number[], rules?: string, csv: boolean } {
  const heights: number[] = []
  let rules: string | undefined
  let csv = false
  for (let arg = reader.next(); arg !== undefined; arg = reader.next()) {
    if (allowRules && (arg === '--rules' || arg === '-r')) {
      rules = reader.value(arg)
    } else if (allowCsv && (arg === '--csv' || arg === '-c')) {
      csv = true
    } else if (arg.startsWith('-')) {
      throw new UsageError(`Unknown option ${arg}`)
    } else {
      heights.push(parseCount(arg, 'Height'))
    }
  }
  return { heights, rules, csv }
}

function parseMakeRuleSet (reader: ArgReader): Command {
  const options: RuleSetOptions = {}
  let pretty = false
  for (let arg = reader.next(); arg !== undefined; arg = reader.next()) {
    switch (arg) {
      case '-n':
      case '--take-split-never':
        options.takeSplitNever = (options.takeSplitNever ?? []).concat(parseList(reader.value(arg), 'Take size'))
        break
      case '-o':
      case '--take-split-optional':
        options.takeSplitOptional = (options.takeSplitOptional ?? []).concat(parseList(reader.value(arg), 'Take size'))
        break
      case '-a':
      case '--take-split-always':
        options.takeSplitAlways = (options.takeSplitAlways ?? []).concat(parseList(reader.value(arg), 'Take size'))
        break
      case '-s':
      case '--allow-any-take':
        options.allowAnyTake = parseSplit(reader.value(arg))
        break
      case '-p':
      case '--allow-place':
        options.allowPlace = true
        break
      case '-P':
      case '--pretty-print':
        pretty = true
        break
      default:
        throw new UsageError(`Unknown option ${arg}`)
    }
  }
  for (const sizes of [options.takeSplitNever, options.takeSplitOptional, options.takeSplitAlways]) {
    if (sizes?.includes(0) === true) {
      throw new UsageError('Take size must be at least 1')
    }
  }
  return { name: 'make-rule-set', options, pretty }
}

/**
 * Parse the command line (without the node executable and script path)
 */
export function parseArgs (argv: string[]): CliArgs {
  const verbose = argv.some(a => a === '-v' || a === '--verbose')
  const args = argv.filter(a => a !== '-v' && a !== '--verbose')
  const name: string | undefined = args[0]
  const reader = new ArgReader(args.slice(1))
  switch (name) {
    case undefined:
    case 'help':
    case '-h':
    case '--help':
      return { command: { name: 'help' }, verbose }
    case 'nimber': {
      const { heights, rules, csv } = parseHeights(reader, true, true)
      return { command: { name: 'nimber', heights, rules, csv }, verbose }
    }
    case 'moves': {
      const { heights, rules } = parseHeights(reader, true, false)
      return { command: { name: 'moves', heights, rules }, verbose }
    }
    case 'splits': {
      const { heights, csv } = parseHeights(reader, false, true)
      if (heights.length !== 1) {
        throw new UsageError('splits needs exactly one height')
      }
      return { command: { name: 'splits', height: heights[0], csv }, verbose }
    }
    case 'make-rule-set':
      return { command: parseMakeRuleSet(reader), verbose }
    default:
      throw new UsageError(`Unknown command '${name}'`)
  }
}
