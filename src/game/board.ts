/**
 * Board Model
 *
 * A fixed-size grid of cells with gravity: pieces enter a column from the
 * top and land on the lowest empty row. The grid carries its own
 * dimensions, so every function works for any rows x columns board.
 */

import { ColumnFullError, InvalidColumnError, InvalidPlacementError } from './errors'

// Default board dimensions
export const ROWS = 6
export const COLUMNS = 7
export const WIN_LENGTH = 4

// Player identifiers
export type Player = 1 | 2
export type Cell = Player | null

// Board is represented as a 2D array: board[row][column]
// Row 0 is the TOP of the board (where pieces fall from)
// The last row is the BOTTOM of the board (where pieces land first)
export type Board = Cell[][]

/**
 * Creates an empty board. All cells are initialized to null (empty).
 *
 * @param rows - Number of rows (default 6)
 * @param columns - Number of columns (default 7)
 * @returns A new board with all cells empty
 */
export function createBoard(rows: number = ROWS, columns: number = COLUMNS): Board {
  return Array.from({ length: rows }, () => Array<Cell>(columns).fill(null))
}

/**
 * Deep clones a board to avoid mutations.
 */
export function cloneBoard(board: Board): Board {
  return board.map((row) => [...row])
}

export function getRowCount(board: Board): number {
  return board.length
}

export function getColumnCount(board: Board): number {
  return board.length > 0 ? board[0].length : 0
}

export function getOpponent(player: Player): Player {
  return player === 1 ? 2 : 1
}

function inRange(board: Board, column: number): boolean {
  return Number.isInteger(column) && column >= 0 && column < getColumnCount(board)
}

/**
 * Checks if a column accepts a piece: in range and top cell empty.
 *
 * @param column - Column index (0-based)
 * @returns True if a piece can be dropped in the column
 */
export function isValidColumn(board: Board, column: number): boolean {
  return inRange(board, column) && board[0][column] === null
}

/**
 * Gets the row index where a piece would land if dropped in the given column.
 *
 * @returns The row index, or null if the column is full or out of range
 */
export function getNextOpenRow(board: Board, column: number): number | null {
  if (!inRange(board, column)) {
    return null
  }

  // Start from the bottom row and find the first empty cell
  for (let row = board.length - 1; row >= 0; row--) {
    if (board[row][column] === null) {
      return row
    }
  }

  return null
}

/**
 * Places a piece at an exact cell. Mutates the board.
 *
 * The cell must be the column's next open row. Anything else would break
 * the gravity invariant, so it throws instead of writing.
 *
 * @param row - Row index (0 = top)
 * @param column - Column index (0-based)
 * @param player - Player whose piece is placed
 * @throws InvalidColumnError if the column is out of range
 * @throws ColumnFullError if the column has no empty cell
 * @throws InvalidPlacementError if `row` is not the next open row
 */
export function placePiece(board: Board, row: number, column: number, player: Player): void {
  if (!inRange(board, column)) {
    throw new InvalidColumnError(column, getColumnCount(board))
  }

  const openRow = getNextOpenRow(board, column)
  if (openRow === null) {
    throw new ColumnFullError(column)
  }
  if (row !== openRow) {
    throw new InvalidPlacementError(row, column, openRow)
  }

  board[row][column] = player
}

/**
 * Drops a piece into a column. Mutates the board.
 *
 * @param column - Column index (0-based)
 * @param player - Player making the move
 * @returns The row the piece landed on
 * @throws InvalidColumnError or ColumnFullError for an illegal column
 */
export function dropPiece(board: Board, column: number, player: Player): number {
  if (!inRange(board, column)) {
    throw new InvalidColumnError(column, getColumnCount(board))
  }

  const row = getNextOpenRow(board, column)
  if (row === null) {
    throw new ColumnFullError(column)
  }

  board[row][column] = player
  return row
}

/**
 * Applies a move to a copy of the board.
 * Does NOT mutate the original board.
 *
 * @param board - Current board state
 * @param column - Column to drop the piece in (0-based)
 * @param player - Player making the move
 * @returns The new board and landing row, or null if the move is illegal
 */
export function applyMove(
  board: Board,
  column: number,
  player: Player
): { board: Board; row: number } | null {
  const row = getNextOpenRow(board, column)

  if (row === null) {
    return null
  }

  const newBoard = cloneBoard(board)
  newBoard[row][column] = player

  return { board: newBoard, row }
}

/**
 * Checks if the board is completely full (draw condition).
 */
export function isBoardFull(board: Board): boolean {
  return board.length === 0 || board[0].every((cell) => cell !== null)
}

/**
 * Returns the columns currently accepting a piece, in ascending order.
 */
export function getLegalColumns(board: Board): number[] {
  const columns: number[] = []
  for (let col = 0; col < getColumnCount(board); col++) {
    if (isValidColumn(board, col)) {
      columns.push(col)
    }
  }
  return columns
}
