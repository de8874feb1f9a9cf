/**
 * Window enumeration
 *
 * A window is a group of WIN_LENGTH consecutive cells in a straight line.
 * Both the terminal detector and the evaluator walk the same four families.
 */

import { type Board, type Cell, WIN_LENGTH, getColumnCount, getRowCount } from './board'

// [deltaRow, deltaCol] for each family
export const DIRECTIONS = {
  horizontal: [0, 1],
  vertical: [1, 0],
  diagonalDownRight: [1, 1],
  diagonalDownLeft: [1, -1],
} as const

export type Direction = keyof typeof DIRECTIONS

const DIRECTION_ORDER: Direction[] = [
  'horizontal',
  'vertical',
  'diagonalDownRight',
  'diagonalDownLeft',
]

export interface CellWindow {
  cells: Cell[]
  /** [row, col] of each cell, in the same order as cells */
  coordinates: [number, number][]
  direction: Direction
}

/**
 * Iterates over every window on the board and applies a callback.
 * Stops early when the callback returns true.
 *
 * @returns True if the callback stopped the iteration
 */
export function forEachWindow(board: Board, callback: (window: CellWindow) => boolean | void): boolean {
  const rows = getRowCount(board)
  const columns = getColumnCount(board)

  for (const direction of DIRECTION_ORDER) {
    const [deltaRow, deltaCol] = DIRECTIONS[direction]

    for (let row = 0; row < rows; row++) {
      for (let col = 0; col < columns; col++) {
        const endRow = row + deltaRow * (WIN_LENGTH - 1)
        const endCol = col + deltaCol * (WIN_LENGTH - 1)
        if (endRow < 0 || endRow >= rows || endCol < 0 || endCol >= columns) continue

        const cells: Cell[] = []
        const coordinates: [number, number][] = []
        for (let i = 0; i < WIN_LENGTH; i++) {
          const r = row + i * deltaRow
          const c = col + i * deltaCol
          cells.push(board[r][c])
          coordinates.push([r, c])
        }

        if (callback({ cells, coordinates, direction }) === true) {
          return true
        }
      }
    }
  }

  return false
}

/**
 * Counts the windows on a board of the given size.
 */
export function countWindows(rows: number, columns: number): number {
  const span = WIN_LENGTH - 1
  const horizontal = rows * Math.max(0, columns - span)
  const vertical = columns * Math.max(0, rows - span)
  const diagonal = Math.max(0, rows - span) * Math.max(0, columns - span)
  return horizontal + vertical + 2 * diagonal
}
