/**
 * Connect Four engine: board model, win detection, heuristic evaluation
 * and minimax move selection.
 */

export {
  ROWS,
  COLUMNS,
  WIN_LENGTH,
  type Player,
  type Cell,
  type Board,
  createBoard,
  cloneBoard,
  getRowCount,
  getColumnCount,
  getOpponent,
  isValidColumn,
  getNextOpenRow,
  placePiece,
  dropPiece,
  applyMove,
  isBoardFull,
  getLegalColumns,
} from './game/board'
export {
  type BoardErrorCode,
  BoardError,
  InvalidColumnError,
  ColumnFullError,
  InvalidPlacementError,
  NoLegalMovesError,
  isBoardError,
} from './game/errors'
export { type GameResult, hasFourInARow, isTerminal, getWinningCells, checkWinner } from './game/terminal'
export { type CellWindow, type Direction, forEachWindow, countWindows } from './game/windows'
export {
  type GameState,
  type MoveFailure,
  type MoveOutcome,
  type EngineMoveFailure,
  type EngineMoveOutcome,
  type MatchStatus,
  createGameState,
  makeMove,
  playEngineMove,
  replayMoves,
  getStatus,
} from './game/match'
export {
  type CenterMode,
  type EvalWeights,
  DEFAULT_EVAL_WEIGHTS,
  scoreWindow,
  scoreCenterControl,
  scorePosition,
} from './ai/evaluation'
export {
  type TieBreak,
  type SearchOptions,
  type SearchResult,
  type MoveDecision,
  DEFAULT_SEARCH_DEPTH,
  DEFAULT_ENGINE_PLAYER,
  minimax,
  chooseMove,
  decideMove,
} from './ai/minimax'
export {
  type EngineConfig,
  type EngineConfigInput,
  MAX_SEARCH_DEPTH,
  engineConfigSchema,
  ConfigError,
  parseEngineConfig,
  DEFAULT_ENGINE_CONFIG,
  createRandomSource,
  toSearchOptions,
} from './ai/config'
export { type RandomSource, type SeededRandom, createSeededRandom, defaultRandom, pickRandom } from './lib/random'
export { getErrorMessage, getErrorCode, logError } from './lib/errorUtils'
