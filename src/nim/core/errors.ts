export type MoveErrorCode =
  | 'amount-exceeds-height'
  | 'zero-amount'
  | 'split-not-permitted'
  | 'split-required'
  | 'invalid-split'
  | 'no-matching-rule'
  | 'place-not-supported'
  | 'stack-index-out-of-range'

/**
 * The reason a proposed move is illegal.
 * Returned (not thrown) by the validating move functions.
 */
export class MoveError extends Error {
  constructor (
    public readonly code: MoveErrorCode,
    message: string
  ) {
    super(message)
    this.name = 'MoveError'
  }
}

export type MoveResult<T> =
  | { ok: true, value: T }
  | { ok: false, error: MoveError }

export function moveOk<T> (value: T): MoveResult<T> {
  return { ok: true, value }
}

export function moveFailed<T> (code: MoveErrorCode, message: string): MoveResult<T> {
  return { ok: false, error: new MoveError(code, message) }
}
