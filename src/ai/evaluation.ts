/**
 * Position Evaluator
 *
 * Heuristic scoring of non-terminal positions from one player's point of
 * view: every 4-cell window is scored by its composition, and pieces in
 * the middle column earn a center-control bonus.
 */

import { type Board, type Cell, type Player, getColumnCount, getOpponent } from '../game/board'
import { forEachWindow } from '../game/windows'

// ============================================================================
// EVALUATION WEIGHTS
// ============================================================================

/**
 * How the center-control bonus treats the opponent's center pieces.
 * - 'own': only the evaluating player's pieces count
 * - 'symmetric': opponent pieces subtract the same bonus
 */
export type CenterMode = 'own' | 'symmetric'

export interface EvalWeights {
  win: number
  threeInRow: number
  twoInRow: number
  /** Opponent threats weigh slightly more, which biases toward blocking */
  opponentThreeInRow: number
  opponentTwoInRow: number
  centerControl: number
  centerMode: CenterMode
}

export const DEFAULT_EVAL_WEIGHTS: EvalWeights = {
  win: 100000,
  threeInRow: 100,
  twoInRow: 10,
  opponentThreeInRow: 120,
  opponentTwoInRow: 12,
  centerControl: 6,
  centerMode: 'own',
}

// ============================================================================
// WINDOW EVALUATION
// ============================================================================

/**
 * Evaluates a window of 4 cells for scoring potential.
 * A window holding pieces of both players scores 0.
 *
 * @param window - The 4 cells, in any order
 * @param player - Player to score for
 * @param weights - Score table (defaults to the tuned values)
 * @returns Score for this window from player's perspective
 */
export function scoreWindow(
  window: readonly Cell[],
  player: Player,
  weights: EvalWeights = DEFAULT_EVAL_WEIGHTS
): number {
  const opponent = getOpponent(player)
  let playerCount = 0
  let opponentCount = 0
  let emptyCount = 0

  for (const cell of window) {
    if (cell === player) playerCount++
    else if (cell === opponent) opponentCount++
    else emptyCount++
  }

  // Mixed windows (both players have pieces) are worthless
  if (playerCount > 0 && opponentCount > 0) return 0

  if (playerCount === 4) return weights.win
  if (playerCount === 3 && emptyCount === 1) return weights.threeInRow
  if (playerCount === 2 && emptyCount === 2) return weights.twoInRow

  if (opponentCount === 4) return -weights.win
  if (opponentCount === 3 && emptyCount === 1) return -weights.opponentThreeInRow
  if (opponentCount === 2 && emptyCount === 2) return -weights.opponentTwoInRow

  return 0
}

// ============================================================================
// POSITION EVALUATION
// ============================================================================

/**
 * Center-column control for `player`.
 *
 * @param weights - `centerControl` per piece; `centerMode` decides whether
 *   opponent pieces subtract it
 * @returns Bonus for pieces in column floor(C / 2)
 */
export function scoreCenterControl(
  board: Board,
  player: Player,
  weights: EvalWeights = DEFAULT_EVAL_WEIGHTS
): number {
  const centerCol = Math.floor(getColumnCount(board) / 2)
  let score = 0

  for (const row of board) {
    const cell = row[centerCol]
    if (cell === player) {
      score += weights.centerControl
    } else if (cell !== null && weights.centerMode === 'symmetric') {
      score -= weights.centerControl
    }
  }

  return score
}

/**
 * Evaluates the board position from the perspective of the given player.
 * Sums every horizontal, vertical and diagonal window plus center control.
 *
 * @param board - Position to score; not modified
 * @param player - Player to score for
 * @returns Score from player's perspective (positive = good for player)
 */
export function scorePosition(
  board: Board,
  player: Player,
  weights: EvalWeights = DEFAULT_EVAL_WEIGHTS
): number {
  let score = scoreCenterControl(board, player, weights)

  forEachWindow(board, (window) => {
    score += scoreWindow(window.cells, player, weights)
  })

  return score
}
