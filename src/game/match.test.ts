import { describe, it, expect } from 'vitest'
import {
  createGameState,
  makeMove,
  playEngineMove,
  replayMoves,
  getStatus,
  type GameState,
} from './match'
import { parseEngineConfig } from '../ai/config'
import { createBoard } from './board'
import { boardFromString } from '../test-utils'

function expectMove(state: GameState, column: number): GameState {
  const outcome = makeMove(state, column)
  if (!outcome.ok) {
    throw new Error(`Move ${column} rejected: ${outcome.reason}`)
  }
  return outcome.state
}

describe('Match state', () => {
  describe('createGameState', () => {
    it('creates initial game state', () => {
      const state = createGameState()
      expect(state.board).toEqual(createBoard())
      expect(state.currentPlayer).toBe(1)
      expect(state.winner).toBeNull()
      expect(state.moveHistory).toEqual([])
    })

    it('uses the configured board size', () => {
      const state = createGameState({ rows: 5, columns: 8 })
      expect(state.board.length).toBe(5)
      expect(state.board[0].length).toBe(8)
    })
  })

  describe('makeMove', () => {
    it('places piece and switches player', () => {
      const outcome = makeMove(createGameState(), 3)

      expect(outcome.ok).toBe(true)
      if (!outcome.ok) return
      expect(outcome.row).toBe(5)
      expect(outcome.state.board[5][3]).toBe(1)
      expect(outcome.state.currentPlayer).toBe(2)
      expect(outcome.state.moveHistory).toEqual([3])
    })

    it('does not mutate the input state', () => {
      const state = createGameState()
      makeMove(state, 3)
      expect(state.board[5][3]).toBeNull()
      expect(state.moveHistory).toEqual([])
      expect(state.currentPlayer).toBe(1)
    })

    it('rejects out-of-range columns', () => {
      const state = createGameState()
      expect(makeMove(state, 7)).toEqual({ ok: false, reason: 'invalid-column' })
      expect(makeMove(state, -1)).toEqual({ ok: false, reason: 'invalid-column' })
    })

    it('rejects a full column', () => {
      let state = createGameState()
      for (let i = 0; i < 6; i++) {
        state = expectMove(state, 0)
      }
      expect(makeMove(state, 0)).toEqual({ ok: false, reason: 'column-full' })
    })

    it('detects a win and keeps the winner as current player', () => {
      // Player 1 plays 0,1,2,3 on the bottom row; player 2 stacks on top
      let state = createGameState()
      for (const column of [0, 0, 1, 1, 2, 2]) {
        state = expectMove(state, column)
      }
      state = expectMove(state, 3)

      expect(state.winner).toBe(1)
      expect(state.currentPlayer).toBe(1)
    })

    it('rejects moves after the game is over', () => {
      const state = replayMoves([0, 0, 1, 1, 2, 2, 3])
      expect(state).not.toBeNull()
      if (state === null) return
      expect(makeMove(state, 4)).toEqual({ ok: false, reason: 'game-over' })
    })

    it('detects a draw on the last cell', () => {
      const board = boardFromString(`
        112211.
        2211221
        1122112
        2211221
        1122112
        2211221
      `)
      const state: GameState = { board, currentPlayer: 2, winner: null, moveHistory: [] }

      const outcome = makeMove(state, 6)
      expect(outcome.ok).toBe(true)
      if (!outcome.ok) return
      expect(outcome.state.winner).toBe('draw')
      expect(outcome.state.currentPlayer).toBe(2)
    })
  })

  describe('replayMoves', () => {
    it('replays a sequence of moves', () => {
      const state = replayMoves([3, 3, 4])
      expect(state?.moveHistory).toEqual([3, 3, 4])
      expect(state?.board[5][3]).toBe(1)
      expect(state?.board[4][3]).toBe(2)
      expect(state?.board[5][4]).toBe(1)
      expect(state?.currentPlayer).toBe(2)
    })

    it('returns null for an illegal sequence', () => {
      expect(replayMoves([0, 0, 0, 0, 0, 0, 0])).toBeNull()
      expect(replayMoves([9])).toBeNull()
    })
  })

  describe('playEngineMove', () => {
    const config = parseEngineConfig({ searchDepth: 3, seed: 7 })

    it('plays the center on an empty board when it moves first', () => {
      const firstMover = parseEngineConfig({ searchDepth: 3, seed: 7, enginePlayer: 1 })
      const outcome = playEngineMove(createGameState(), firstMover)

      expect(outcome.ok).toBe(true)
      if (!outcome.ok) return
      expect(outcome.column).toBe(3)
      expect(outcome.decision.source).toBe('search')
      expect(outcome.state.board[5][3]).toBe(1)
      expect(outcome.state.currentPlayer).toBe(2)
    })

    it('drops the configured engine player', () => {
      const state = replayMoves([3])
      expect(state).not.toBeNull()
      if (state === null) return

      const outcome = playEngineMove(state, parseEngineConfig({ enginePlayer: 2, seed: 1 }))
      expect(outcome.ok).toBe(true)
      if (!outcome.ok) return
      expect(outcome.state.board[outcome.row][outcome.column]).toBe(2)
      expect(outcome.state.currentPlayer).toBe(1)
      expect(outcome.state.moveHistory).toEqual([3, outcome.column])
    })

    it('refuses to move on the other player\'s turn', () => {
      const state = createGameState()
      expect(playEngineMove(state, parseEngineConfig({ enginePlayer: 2, seed: 1 }))).toEqual({
        ok: false,
        reason: 'not-engine-turn',
      })
      expect(state.board).toEqual(createBoard())
    })

    it('answers a human move by blocking', () => {
      // Player 1 has three on the bottom row; engine is player 2
      const state = replayMoves([0, 0, 1, 1, 2])
      expect(state).not.toBeNull()
      if (state === null) return

      const outcome = playEngineMove(state, config)
      expect(outcome.ok).toBe(true)
      if (!outcome.ok) return
      expect(outcome.column).toBe(3)
      expect(outcome.state.winner).toBeNull()
      expect(getStatus(outcome.state, 2)).toBe('in-progress')
    })

    it('takes a winning move and reports it', () => {
      // Player 2 has three stacked in column 6
      const state = replayMoves([0, 6, 1, 6, 0, 6, 1])
      expect(state).not.toBeNull()
      if (state === null) return

      const outcome = playEngineMove(state, config)
      expect(outcome.ok).toBe(true)
      if (!outcome.ok) return
      expect(outcome.column).toBe(6)
      expect(outcome.decision.score).toBe(Infinity)
      expect(getStatus(outcome.state, 2)).toBe('engine-won')
      expect(getStatus(outcome.state, 1)).toBe('opponent-won')
    })

    it('refuses to move once the game is over', () => {
      const state = replayMoves([0, 0, 1, 1, 2, 2, 3])
      expect(state).not.toBeNull()
      if (state === null) return
      expect(playEngineMove(state, config)).toEqual({ ok: false, reason: 'game-over' })
    })
  })

  describe('getStatus', () => {
    it('reports draws', () => {
      const state: GameState = {
        board: createBoard(),
        currentPlayer: 1,
        winner: 'draw',
        moveHistory: [],
      }
      expect(getStatus(state, 2)).toBe('draw')
    })
  })
})
