/**
 * Domain errors for the board and the search engine.
 *
 * Query operations never throw. These errors are raised only on the
 * mutation path (placing a piece) and when a move is requested for a
 * position that has none.
 */

export type BoardErrorCode =
  | 'INVALID_COLUMN'
  | 'COLUMN_FULL'
  | 'INVALID_PLACEMENT'
  | 'NO_LEGAL_MOVES'

/**
 * Base class for every error the engine raises.
 */
export class BoardError extends Error {
  readonly code: BoardErrorCode

  constructor(code: BoardErrorCode, message: string) {
    super(message)
    this.name = 'BoardError'
    this.code = code
  }
}

/**
 * Column index outside [0, columns).
 */
export class InvalidColumnError extends BoardError {
  readonly column: number

  constructor(column: number, columns: number) {
    super('INVALID_COLUMN', `Column ${column} is out of range (0-${columns - 1})`)
    this.name = 'InvalidColumnError'
    this.column = column
  }
}

/**
 * Column in range but without an open row.
 */
export class ColumnFullError extends BoardError {
  readonly column: number

  constructor(column: number) {
    super('COLUMN_FULL', `Column ${column} is full`)
    this.name = 'ColumnFullError'
    this.column = column
  }
}

/**
 * Placement at a row other than the column's next open row.
 */
export class InvalidPlacementError extends BoardError {
  readonly row: number
  readonly column: number

  constructor(row: number, column: number, expectedRow: number) {
    super(
      'INVALID_PLACEMENT',
      `Cannot place at row ${row} of column ${column}; next open row is ${expectedRow}`
    )
    this.name = 'InvalidPlacementError'
    this.row = row
    this.column = column
  }
}

/**
 * A move was requested for a board where every column is full.
 */
export class NoLegalMovesError extends BoardError {
  constructor() {
    super('NO_LEGAL_MOVES', 'No valid moves available')
    this.name = 'NoLegalMovesError'
  }
}

export function isBoardError(err: unknown): err is BoardError {
  return err instanceof BoardError
}
