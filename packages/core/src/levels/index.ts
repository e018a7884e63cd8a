/**
 * Adventure levels and their constraint automata.
 * @packageDocumentation
 */

export { JOURNEY_LABELS, journeyAlphabet, type JourneyLabel } from './alphabet'
export {
  DEFAULT_CONSTRAINTS_DIR,
  CONSTRAINT_NAMES,
  LEVELS,
  isLevelNumber,
  loadConstraints,
  applyLevel,
  type ConstraintName,
  type ConstraintSet,
  type LevelNumber,
} from './levels'
