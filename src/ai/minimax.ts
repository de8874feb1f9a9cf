/**
 * Search Engine
 *
 * Depth-limited minimax over legal columns. The engine player is always the
 * maximizer at the root. Each branch is explored on its own copy of the
 * board, so the caller's board is never touched.
 */

import {
  type Board,
  type Player,
  cloneBoard,
  getLegalColumns,
  getNextOpenRow,
  getOpponent,
  isBoardFull,
} from '../game/board'
import { NoLegalMovesError } from '../game/errors'
import { hasFourInARow } from '../game/terminal'
import { type RandomSource, defaultRandom, pickRandom } from '../lib/random'
import { DEFAULT_EVAL_WEIGHTS, type EvalWeights, scorePosition } from './evaluation'

export const DEFAULT_SEARCH_DEPTH = 3
export const DEFAULT_ENGINE_PLAYER: Player = 2

// ============================================================================
// TYPES
// ============================================================================

/**
 * Column a node keeps when no child beats the initial sentinel.
 * - 'random': uniformly random legal column from the random source
 * - 'leftmost': lowest legal column index
 */
export type TieBreak = 'random' | 'leftmost'

export interface SearchOptions {
  /** Player the search maximizes for (default 2) */
  enginePlayer?: Player
  weights?: EvalWeights
  tieBreak?: TieBreak
  random?: RandomSource
  /** Log a one-line search summary via console.debug */
  debug?: boolean
}

export interface SearchResult {
  /** Chosen column, or null at a leaf */
  column: number | null
  /** Heuristic score, or +/-Infinity for a forced win/loss */
  score: number
}

export interface MoveDecision {
  column: number
  score: number
  /** 'fallback' when the search produced no column and a random one was played */
  source: 'search' | 'fallback'
  nodesSearched: number
}

interface ResolvedOptions {
  enginePlayer: Player
  weights: EvalWeights
  tieBreak: TieBreak
  random: RandomSource
}

interface SearchStats {
  nodesSearched: number
}

function resolveOptions(options: SearchOptions): ResolvedOptions {
  return {
    enginePlayer: options.enginePlayer ?? DEFAULT_ENGINE_PLAYER,
    weights: options.weights ?? DEFAULT_EVAL_WEIGHTS,
    tieBreak: options.tieBreak ?? 'random',
    random: options.random ?? defaultRandom,
  }
}

// ============================================================================
// MINIMAX SEARCH
// ============================================================================

function leafScore(board: Board, options: ResolvedOptions): number {
  const { enginePlayer } = options

  // The maximizer's win is checked first, so a board where both sides
  // have four scores as a win.
  if (hasFourInARow(board, enginePlayer)) return Infinity
  if (hasFourInARow(board, getOpponent(enginePlayer))) return -Infinity
  if (isBoardFull(board)) return 0
  return scorePosition(board, enginePlayer, options.weights)
}

function isTerminalFor(board: Board, enginePlayer: Player): boolean {
  return (
    hasFourInARow(board, enginePlayer) ||
    hasFourInARow(board, getOpponent(enginePlayer)) ||
    isBoardFull(board)
  )
}

function logSummary(depth: number, result: SearchResult, stats: SearchStats): void {
  console.debug(
    `[Minimax] depth ${depth}: column ${result.column ?? 'none'}, score ${result.score}, ${stats.nodesSearched} nodes`
  )
}

function initialColumn(legalColumns: number[], options: ResolvedOptions): number {
  if (options.tieBreak === 'leftmost') return legalColumns[0]
  return pickRandom(legalColumns, options.random) ?? legalColumns[0]
}

function search(
  board: Board,
  depth: number,
  maximizing: boolean,
  options: ResolvedOptions,
  stats: SearchStats
): SearchResult {
  stats.nodesSearched++

  if (depth <= 0 || isTerminalFor(board, options.enginePlayer)) {
    return { column: null, score: leafScore(board, options) }
  }

  const legalColumns = getLegalColumns(board)
  const mover = maximizing ? options.enginePlayer : getOpponent(options.enginePlayer)
  let bestScore = maximizing ? -Infinity : Infinity
  let bestColumn = initialColumn(legalColumns, options)

  for (const column of legalColumns) {
    const row = getNextOpenRow(board, column)
    if (row === null) continue

    const child = cloneBoard(board)
    child[row][column] = mover

    const { score } = search(child, depth - 1, !maximizing, options, stats)

    // Strict comparison: the first column seen keeps a tie
    if (maximizing ? score > bestScore : score < bestScore) {
      bestScore = score
      bestColumn = column
    }
  }

  return { column: bestColumn, score: bestScore }
}

/**
 * Depth-limited minimax.
 *
 * Leaves score +Infinity when the engine player has four, -Infinity when
 * its opponent has, 0 on a full board and the heuristic otherwise.
 *
 * @param board - Position to search; left untouched
 * @param depth - Plies to look ahead; 0 or less scores the board as a leaf
 * @param maximizing - True when the engine player is to move
 * @param options - Engine player, weights, tie-break and random source
 * @returns The best column (null at a leaf) and its score
 */
export function minimax(
  board: Board,
  depth: number,
  maximizing: boolean,
  options: SearchOptions = {}
): SearchResult {
  const stats: SearchStats = { nodesSearched: 0 }
  const result = search(board, depth, maximizing, resolveOptions(options), stats)
  if (options.debug) {
    logSummary(depth, result, stats)
  }
  return result
}

// ============================================================================
// MOVE SELECTION
// ============================================================================

/**
 * Searches for the engine player's move and reports how it was chosen.
 * Falls back to a random legal column when the search yields none.
 *
 * @param depth - Plies to look ahead
 * @returns The column with its score, provenance and node count
 * @throws NoLegalMovesError if the board has no open column
 */
export function chooseMove(
  board: Board,
  depth: number = DEFAULT_SEARCH_DEPTH,
  options: SearchOptions = {}
): MoveDecision {
  const legalColumns = getLegalColumns(board)
  if (legalColumns.length === 0) {
    throw new NoLegalMovesError()
  }

  const resolved = resolveOptions(options)
  const stats: SearchStats = { nodesSearched: 0 }
  const result = search(board, depth, true, resolved, stats)

  if (options.debug) {
    logSummary(depth, result, stats)
  }

  if (result.column !== null) {
    return {
      column: result.column,
      score: result.score,
      source: 'search',
      nodesSearched: stats.nodesSearched,
    }
  }

  // Only reachable at depth 0 or on an already decided board
  const column = pickRandom(legalColumns, resolved.random) ?? legalColumns[0]
  console.warn(`[Minimax] search at depth ${depth} chose no column, playing random column ${column}`)

  return {
    column,
    score: result.score,
    source: 'fallback',
    nodesSearched: stats.nodesSearched,
  }
}

/**
 * Returns the column the engine player should play.
 *
 * @example
 * const column = decideMove(board, 3, { enginePlayer: 2 })
 *
 * @throws NoLegalMovesError if the board has no open column
 */
export function decideMove(
  board: Board,
  depth: number = DEFAULT_SEARCH_DEPTH,
  options: SearchOptions = {}
): number {
  return chooseMove(board, depth, options).column
}
