/**
 * Type definitions for automata and their errors.
 * @packageDocumentation
 */

// Automaton types
export type {
  AlphabetSymbol,
  Alphabet,
  SymbolLabel,
  EpsilonLabel,
  TransitionLabel,
  AutomatonState,
  FiniteAutomaton,
} from './automaton'

// Error types
export type { AutomatonErrorCode, AutFormatErrorDetails } from './errors'
export { AutomatonError, AutFormatError } from './errors'
