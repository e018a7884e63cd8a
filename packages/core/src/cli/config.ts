/**
 * CLI configuration: flags, then environment, then defaults.
 * @packageDocumentation
 */

import { DEFAULT_CONSTRAINTS_DIR, isLevelNumber, type LevelNumber } from '../levels'

/**
 * Environment variable naming the default level.
 * @public
 */
export const LEVEL_ENV = 'NFA_WITNESS_LEVEL'

/**
 * Environment variable naming the constraints directory.
 * @public
 */
export const CONSTRAINTS_DIR_ENV = 'NFA_WITNESS_CONSTRAINTS_DIR'

/**
 * Resolved settings for one CLI run.
 * @public
 */
export interface CliConfig {
  /** `.aut` file describing the journey automaton */
  readonly file: string

  /** Level whose constraints are applied */
  readonly level: LevelNumber

  /** Directory the constraint `.aut` files are read from */
  readonly constraintsDir: string
}

/**
 * Values given on the command line.
 * @public
 */
export interface CliFlags {
  readonly file: string
  readonly level?: number
  readonly constraints?: string
}

/**
 * Error thrown for settings that cannot be used.
 * @public
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ConfigError'
  }
}

/**
 * Resolve the configuration of a run.
 *
 * @param flags - Command-line values
 * @param env - Environment to read fallbacks from
 * @throws ConfigError for a level that is not 0, 1 or 2
 *
 * @public
 */
export function resolveConfig(flags: CliFlags, env: NodeJS.ProcessEnv = process.env): CliConfig {
  const level = flags.level ?? parseLevelVariable(env[LEVEL_ENV]) ?? 0
  if (!isLevelNumber(level)) {
    throw new ConfigError(`Unknown level ${level}; expected 0, 1 or 2`)
  }

  const constraintsDir = flags.constraints ?? nonEmpty(env[CONSTRAINTS_DIR_ENV]) ?? DEFAULT_CONSTRAINTS_DIR

  return { file: flags.file, level, constraintsDir }
}

function parseLevelVariable(value: string | undefined): number | undefined {
  const text = nonEmpty(value)
  if (text === undefined) return undefined

  if (!/^\d+$/.test(text)) {
    throw new ConfigError(`${LEVEL_ENV} must be a level number, got "${text}"`)
  }
  return Number(text)
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim()
  return trimmed === '' ? undefined : trimmed
}
