/**
 * Test utilities shared across test files.
 */

import { type Board, type Cell, createBoard } from './game/board'

/**
 * Helper to create a board from a string representation.
 * '.' = empty, '1' = player 1, '2' = player 2
 * Rows are from top to bottom; the board takes the size of the drawing.
 */
export function boardFromString(str: string): Board {
  const lines = str
    .trim()
    .split('\n')
    .map((l) => l.trim())
  const board = createBoard(lines.length, lines[0].length)

  lines.forEach((line, row) => {
    for (let col = 0; col < line.length; col++) {
      const char = line[col]
      if (char === '1') board[row][col] = 1
      else if (char === '2') board[row][col] = 2
    }
  })

  return board
}

/**
 * Renders a board back to the string form used by boardFromString.
 */
export function boardToString(board: Board): string {
  const symbol = (cell: Cell): string => (cell === null ? '.' : String(cell))
  return board.map((row) => row.map(symbol).join('')).join('\n')
}

/**
 * Mirrors a board left to right.
 */
export function mirrorBoard(board: Board): Board {
  return board.map((row) => [...row].reverse())
}

/**
 * Swaps the two players' pieces.
 */
export function swapPlayers(board: Board): Board {
  return board.map((row) => row.map((cell): Cell => (cell === null ? null : cell === 1 ? 2 : 1)))
}

/**
 * Checks the gravity invariant: in every column the occupied cells form
 * one run that starts at the bottom row.
 */
export function hasNoFloatingPieces(board: Board): boolean {
  const columns = board.length > 0 ? board[0].length : 0
  for (let col = 0; col < columns; col++) {
    let seenEmpty = false
    for (let row = board.length - 1; row >= 0; row--) {
      if (board[row][col] === null) seenEmpty = true
      else if (seenEmpty) return false
    }
  }
  return true
}
