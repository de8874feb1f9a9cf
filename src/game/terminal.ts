/**
 * Terminal Detector
 *
 * Win and draw detection. A board on which both players have four in a
 * row is representable; it is terminal and reports a win for each.
 */

import { type Board, type Player, isBoardFull } from './board'
import { forEachWindow } from './windows'

// Game result
export type GameResult = Player | 'draw' | null

/**
 * Checks whether `player` has four consecutive pieces in any direction.
 */
export function hasFourInARow(board: Board, player: Player): boolean {
  return forEachWindow(board, (window) => window.cells.every((cell) => cell === player))
}

/**
 * Terminal when someone has four in a row or the board fills up.
 */
export function isTerminal(board: Board): boolean {
  return hasFourInARow(board, 1) || hasFourInARow(board, 2) || isBoardFull(board)
}

/**
 * Gets the winning cells (for highlighting).
 * Returns an array of [row, col] tuples, or null if `player` has no four.
 */
export function getWinningCells(board: Board, player: Player): [number, number][] | null {
  let cells: [number, number][] | null = null

  forEachWindow(board, (window) => {
    if (window.cells.every((cell) => cell === player)) {
      cells = window.coordinates
      return true
    }
    return false
  })

  return cells
}

/**
 * Checks for a winner on the board.
 *
 * @returns The winning player, 'draw' if the board is full, or null if the game continues
 */
export function checkWinner(board: Board): GameResult {
  if (hasFourInARow(board, 1)) return 1
  if (hasFourInARow(board, 2)) return 2
  if (isBoardFull(board)) return 'draw'
  return null
}
