/**
 * NFA Witness
 *
 * Non-deterministic finite automata with epsilon transitions over a fixed
 * alphabet: build them from declarations, intersect them without
 * determinizing, and find shortest accepted or rejected words.
 *
 * @packageDocumentation
 */

/**
 * Library version.
 * @public
 */
export const version = '0.1.0'

// =============================================================================
// Types
// =============================================================================

export type {
  // Automaton types
  AlphabetSymbol,
  Alphabet,
  SymbolLabel,
  EpsilonLabel,
  TransitionLabel,
  AutomatonState,
  FiniteAutomaton,
  // Error types
  AutomatonErrorCode,
  AutFormatErrorDetails,
} from './types'
export { AutomatonError, AutFormatError } from './types'

// =============================================================================
// Symbol Table
// =============================================================================

export { internSymbol, symbolLabel, formatLabel, EPSILON } from './alphabet'
export { createAlphabet, intersectAlphabets } from './alphabet'

// =============================================================================
// State Graph
// =============================================================================

export { StateNode, StateGraph } from './graph'

// =============================================================================
// Building
// =============================================================================

export { AutomatonBuilder } from './build'

// =============================================================================
// Automaton Operations
// =============================================================================

export { Automaton } from './automaton'
export { epsilonClosure, epsilonClosureOfSet } from './automaton'
export { intersect } from './automaton'
export { findShortestWord, findShortestExample, accepts } from './automaton'

// =============================================================================
// .aut Files
// =============================================================================

export { parseAut, parseAutLine, readAutFile, EPSILON_TOKEN, type AutDeclaration } from './parse'

// =============================================================================
// Levels & CLI
// =============================================================================

export {
  JOURNEY_LABELS,
  journeyAlphabet,
  DEFAULT_CONSTRAINTS_DIR,
  CONSTRAINT_NAMES,
  LEVELS,
  isLevelNumber,
  loadConstraints,
  applyLevel,
  type JourneyLabel,
  type ConstraintName,
  type ConstraintSet,
  type LevelNumber,
} from './levels'
export { run, resolveConfig, ConfigError, type CliOutput, type CliConfig, type CliFlags } from './cli'
