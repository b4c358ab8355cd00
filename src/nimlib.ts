#!/usr/bin/env node
import debugFactory from 'debug'
import { parseArgs, UsageError } from './nim/cli/args'
import { runCommand } from './nim/cli/commands'
import { RuleSetParseError } from './nim/io/serialize'
import { config } from './nim/core/config'

const debug = debugFactory('nimlib:cli:main')

/**
 * Run the CLI and return the exit code
 */
export function main (argv: string[]): number {
  try {
    const { command, verbose } = parseArgs(argv)
    if (verbose) {
      debugFactory.enable(config.verboseNamespaces)
    }
    debug(`Running ${command.name}`)
    for (const line of runCommand(command)) {
      console.log(line)
    }
    return 0
  } catch (e) {
    if (e instanceof UsageError || e instanceof RuleSetParseError) {
      console.error(e.message)
      return 1
    }
    throw e
  }
}

if (require.main === module) {
  process.exitCode = main(process.argv.slice(2))
}
