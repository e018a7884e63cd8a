/**
 * Error codes for automaton construction failures.
 * @public
 */
export type AutomatonErrorCode =
  | 'INVALID_ARGUMENT' // empty or malformed state name / label
  | 'UNKNOWN_SYMBOL' // transition label outside the declared alphabet
  | 'ALREADY_FINISHED' // builder or state mutated after finalization
  | 'NO_START_STATE' // getResult() before setStartState()

/**
 * Error thrown by the alphabet, the state graph and the builder.
 *
 * A call that throws has no effect on the object it was made on.
 *
 * @public
 */
export class AutomatonError extends Error {
  /** Error classification code */
  readonly code: AutomatonErrorCode

  constructor(code: AutomatonErrorCode, message: string) {
    super(message)
    this.name = 'AutomatonError'
    this.code = code
  }
}

/**
 * Details attached to an {@link AutFormatError}.
 * @public
 */
export interface AutFormatErrorDetails {
  /** 1-based line number of the offending declaration */
  readonly line?: number

  /** The offending line, as written */
  readonly text?: string

  /** Underlying builder error, if the builder rejected the line */
  readonly cause?: unknown
}

/**
 * Error thrown when `.aut` text cannot be turned into an automaton.
 * @public
 */
export class AutFormatError extends Error {
  readonly line?: number

  readonly text?: string

  constructor(message: string, details: AutFormatErrorDetails = {}) {
    super(details.line === undefined ? message : `Line ${details.line}: ${message}`, { cause: details.cause })
    this.name = 'AutFormatError'
    this.line = details.line
    this.text = details.text
  }
}
