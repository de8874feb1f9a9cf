/**
 * Match state
 *
 * Turn-by-turn game flow as explicit immutable state: each function takes a
 * GameState and returns a new one. Nothing here holds state between calls,
 * so a caller can keep the current GameState wherever it likes.
 */

import { type EngineConfig, DEFAULT_ENGINE_CONFIG, toSearchOptions } from '../ai/config'
import { type MoveDecision, chooseMove } from '../ai/minimax'
import type { RandomSource } from '../lib/random'
import {
  type Board,
  type Player,
  applyMove,
  createBoard,
  getColumnCount,
  getOpponent,
  isBoardFull,
} from './board'
import { type GameResult, hasFourInARow } from './terminal'

export interface GameState {
  board: Board
  currentPlayer: Player
  winner: GameResult
  moveHistory: number[] // Array of column indices
}

export type MoveFailure = 'game-over' | 'invalid-column' | 'column-full'

export type MoveOutcome =
  | { ok: true; state: GameState; column: number; row: number }
  | { ok: false; reason: MoveFailure }

/** 'not-engine-turn' when the player to move is not the configured engine player */
export type EngineMoveFailure = MoveFailure | 'not-engine-turn'

export type EngineMoveOutcome =
  | { ok: true; state: GameState; column: number; row: number; decision: MoveDecision }
  | { ok: false; reason: EngineMoveFailure }

export type MatchStatus = 'in-progress' | 'engine-won' | 'opponent-won' | 'draw'

type BoardSize = Pick<EngineConfig, 'rows' | 'columns'>

/**
 * Creates a new game state with an empty board.
 * Player 1 always goes first.
 */
export function createGameState(size: BoardSize = DEFAULT_ENGINE_CONFIG): GameState {
  return {
    board: createBoard(size.rows, size.columns),
    currentPlayer: 1,
    winner: null,
    moveHistory: [],
  }
}

/**
 * Plays `column` for the player to move.
 * The input state is never mutated.
 */
export function makeMove(state: GameState, column: number): MoveOutcome {
  if (state.winner !== null) {
    return { ok: false, reason: 'game-over' }
  }

  if (!Number.isInteger(column) || column < 0 || column >= getColumnCount(state.board)) {
    return { ok: false, reason: 'invalid-column' }
  }

  const result = applyMove(state.board, column, state.currentPlayer)
  if (result === null) {
    return { ok: false, reason: 'column-full' }
  }

  // Only the mover can have completed a line on this turn
  let winner: GameResult = null
  if (hasFourInARow(result.board, state.currentPlayer)) {
    winner = state.currentPlayer
  } else if (isBoardFull(result.board)) {
    winner = 'draw'
  }

  return {
    ok: true,
    column,
    row: result.row,
    state: {
      board: result.board,
      currentPlayer: winner === null ? getOpponent(state.currentPlayer) : state.currentPlayer,
      winner,
      moveHistory: [...state.moveHistory, column],
    },
  }
}

/**
 * Lets the engine play its turn as `config.enginePlayer`.
 * Refuses when the game is over or the other player is to move.
 *
 * @param config - Search depth, engine player, weights and seed
 * @param random - Overrides the source derived from `config.seed`
 * @returns The new state with the engine's decision, or why it did not move
 */
export function playEngineMove(
  state: GameState,
  config: EngineConfig = DEFAULT_ENGINE_CONFIG,
  random?: RandomSource
): EngineMoveOutcome {
  if (state.winner !== null) {
    return { ok: false, reason: 'game-over' }
  }

  if (state.currentPlayer !== config.enginePlayer) {
    return { ok: false, reason: 'not-engine-turn' }
  }

  const options = toSearchOptions(config)
  const decision = chooseMove(state.board, config.searchDepth, {
    ...options,
    random: random ?? options.random,
  })

  const outcome = makeMove(state, decision.column)
  if (!outcome.ok) {
    return outcome
  }

  return { ...outcome, decision }
}

/**
 * Replays a game from a list of moves.
 *
 * @returns The final game state, or null if any move is invalid
 */
export function replayMoves(moves: number[], size: BoardSize = DEFAULT_ENGINE_CONFIG): GameState | null {
  let state = createGameState(size)

  for (const column of moves) {
    const outcome = makeMove(state, column)
    if (!outcome.ok) {
      return null
    }
    state = outcome.state
  }

  return state
}

/**
 * Describes the match from the engine player's side.
 */
export function getStatus(state: GameState, enginePlayer: Player): MatchStatus {
  if (state.winner === null) return 'in-progress'
  if (state.winner === 'draw') return 'draw'
  return state.winner === enginePlayer ? 'engine-won' : 'opponent-won'
}
