import { type Stack, type Position } from '../core/stack'
import { type Nimber } from '../core/nimber'
import { type NimAction, actionToString } from '../core/action'

/**
 * Render the splits of a height, either as CSV or as right-aligned `a + b` lines
 */
export function formatSplits (height: number, splits: Array<[Stack, Stack]>, csv = false): string[] {
  if (csv) {
    return ['left,right', ...splits.map(([left, right]) => `${left.height},${right.height}`)]
  }
  if (splits.length === 0) {
    return [`No splits for height ${height}`]
  }
  // The largest left part is the last one, the largest right part the first one
  const leftWidth = `${splits[splits.length - 1][0].height}`.length
  const rightWidth = `${splits[0][1].height}`.length
  return [
    `Splits for height ${height}:`,
    ...splits.map(([left, right]) => `${left.toString().padStart(leftWidth)} + ${right.toString().padStart(rightWidth)}`)
  ]
}

/**
 * Render the nimber of every stack and of the whole position
 */
export function formatNimbers (position: Position, nimbers: Nimber[], total: Nimber, csv = false): string[] {
  if (csv) {
    return ['height,nimber', ...position.map((stack, i) => `${stack.height},${nimbers[i].value}`)]
  }
  const lines = position.map((stack, i) => `Height ${stack.height}: nimber ${nimbers[i].value}`)
  if (position.length > 1) {
    lines.push(`Position ${position.map(s => s.height).join(' ')}: nimber ${total.value}`)
  }
  lines.push(total.isZero() ? 'The player to move loses' : 'The player to move wins')
  return lines
}

export function formatMoves (stack: Stack, moves: NimAction[]): string[] {
  if (moves.length === 0) {
    return [`No legal moves for height ${stack.height}`]
  }
  return [`Legal moves for height ${stack.height}:`, ...moves.map(a => `  ${actionToString(a)}`)]
}
