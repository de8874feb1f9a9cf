/**
 * Engine configuration
 *
 * Validated with zod. Every field has a default, so `parseEngineConfig({})`
 * yields the standard 6x7 depth-3 engine playing as player 2.
 */

import { z } from 'zod'
import { COLUMNS, ROWS } from '../game/board'
import { type RandomSource, createSeededRandom, defaultRandom } from '../lib/random'
import { DEFAULT_EVAL_WEIGHTS, type EvalWeights } from './evaluation'
import { DEFAULT_ENGINE_PLAYER, DEFAULT_SEARCH_DEPTH, type SearchOptions } from './minimax'

export const MAX_SEARCH_DEPTH = 8

export const engineConfigSchema = z.object({
  rows: z.number().int().min(4).max(20).default(ROWS),
  columns: z.number().int().min(4).max(20).default(COLUMNS),
  searchDepth: z.number().int().min(0).max(MAX_SEARCH_DEPTH).default(DEFAULT_SEARCH_DEPTH),
  enginePlayer: z.union([z.literal(1), z.literal(2)]).default(DEFAULT_ENGINE_PLAYER),
  centerMode: z.enum(['own', 'symmetric']).default('own'),
  tieBreak: z.enum(['random', 'leftmost']).default('random'),
  seed: z.number().int().optional(),
  debug: z.boolean().default(false),
})

export type EngineConfig = z.infer<typeof engineConfigSchema>
export type EngineConfigInput = z.input<typeof engineConfigSchema>

export class ConfigError extends Error {
  readonly issues: string[]

  constructor(issues: string[]) {
    super(`Invalid engine config: ${issues.join('; ')}`)
    this.name = 'ConfigError'
    this.issues = issues
  }
}

/**
 * Parses and validates an engine configuration.
 *
 * @throws ConfigError listing every failed field
 */
export function parseEngineConfig(input: unknown = {}): EngineConfig {
  const result = engineConfigSchema.safeParse(input)

  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) => `${issue.path.join('.') || 'config'}: ${issue.message}`)
    )
  }

  return result.data
}

export const DEFAULT_ENGINE_CONFIG: EngineConfig = parseEngineConfig({})

/**
 * Seeded source when the config pins a seed, Math.random otherwise.
 */
export function createRandomSource(config: Pick<EngineConfig, 'seed'>): RandomSource {
  return config.seed === undefined ? defaultRandom : createSeededRandom(config.seed)
}

/**
 * Builds search options from a config. A fresh random source is created
 * on each call, so two calls with the same seed replay the same draws.
 */
export function toSearchOptions(config: EngineConfig): SearchOptions {
  const weights: EvalWeights = { ...DEFAULT_EVAL_WEIGHTS, centerMode: config.centerMode }

  return {
    enginePlayer: config.enginePlayer,
    weights,
    tieBreak: config.tieBreak,
    random: createRandomSource(config),
    debug: config.debug,
  }
}
