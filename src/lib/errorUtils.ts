/**
 * Error handling utilities
 *
 * Consistent error message extraction and logging for engine callers.
 */

import { isBoardError } from '../game/errors'

/**
 * Extract a readable error message from an unknown error value.
 * Handles Error objects, strings, and objects with a message property.
 *
 * @param fallback - Message used when nothing can be extracted
 *
 * @example
 * try {
 *   dropPiece(board, column, 1)
 * } catch (err) {
 *   status = getErrorMessage(err)
 * }
 */
export function getErrorMessage(err: unknown, fallback = 'An error occurred'): string {
  if (err instanceof Error) {
    return err.message
  }

  if (typeof err === 'string') {
    return err
  }

  if (err && typeof err === 'object' && 'message' in err && typeof err.message === 'string') {
    return err.message
  }

  return fallback
}

/**
 * Returns the domain error code, or null for anything that isn't a BoardError.
 */
export function getErrorCode(err: unknown): string | null {
  return isBoardError(err) ? err.code : null
}

/**
 * Log an error with context for debugging.
 *
 * @param context - Where the error occurred, e.g. 'Minimax'
 */
export function logError(context: string, err: unknown): void {
  const code = getErrorCode(err)
  const message = getErrorMessage(err)
  console.error(`[${context}]`, code ? `${code}: ${message}` : message, err)
}
