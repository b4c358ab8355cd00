import { type Split } from './rule'

export interface NimConfig {
  defaultTakeSizes: number[]
  defaultSplit: Split
  defaultStacks: number[]
  rulesVariable: string
  verboseNamespaces: string
}

export const config: NimConfig = {
  // Take sizes of the rule set used when no rule set is given (the classic "take 1, 2 or 3" game)
  defaultTakeSizes: [1, 2, 3],
  // Split policy of the default rule set
  defaultSplit: 'never',
  // Stack heights of a default game
  defaultStacks: [10],
  // Environment variable naming a JSON rule set file. Used by the CLI when --rules is omitted
  rulesVariable: 'NIMLIB_RULES',
  // Debug namespaces enabled by the verbose flag
  verboseNamespaces: 'nimlib:*'
}
