// =============================================================================
// ALPHABET
// =============================================================================

/**
 * A symbol of the alphabet, interned by its label.
 *
 * Two requests for the same label yield the same object, so symbols are
 * compared by identity and can key maps and sets directly.
 *
 * @public
 */
export interface AlphabetSymbol {
  readonly label: string
}

/**
 * A closed, ordered set of symbols declared before any automaton is built.
 *
 * The declaration order is the iteration order used by intersection and by
 * the shortest-example search.
 *
 * @public
 */
export interface Alphabet {
  /** Symbols in declaration order */
  readonly symbols: readonly AlphabetSymbol[]

  /** Whether the symbol belongs to this alphabet */
  has(symbol: AlphabetSymbol): boolean

  /** Find the symbol for a label, or undefined if the label is not declared */
  find(label: string): AlphabetSymbol | undefined

  /**
   * Resolve a label against the alphabet.
   * @throws AutomatonError with code `UNKNOWN_SYMBOL` if the label is not declared
   */
  lookup(label: string): AlphabetSymbol
}

// =============================================================================
// TRANSITION LABELS
// =============================================================================

/**
 * Transition consuming one symbol.
 * @public
 */
export interface SymbolLabel {
  readonly type: 'symbol'
  readonly symbol: AlphabetSymbol
}

/**
 * Transition consuming no input.
 * @public
 */
export interface EpsilonLabel {
  readonly type: 'epsilon'
}

/**
 * Key of a state's transition map.
 *
 * Labels are interned (one `SymbolLabel` per symbol, a single `EpsilonLabel`),
 * so they are compared by identity like symbols.
 *
 * @public
 */
export type TransitionLabel = SymbolLabel | EpsilonLabel

// =============================================================================
// AUTOMATON
// =============================================================================

/**
 * A read-only view of a state in an automaton's arena.
 * @public
 */
export interface AutomatonState {
  /** Index of this state in the owning automaton's `states` array */
  readonly id: number

  /** Is this an accepting state? */
  readonly accepting: boolean

  /**
   * Destination state ids reachable on the given label.
   * Empty (never an error) when there is no such edge.
   */
  transitions(label: TransitionLabel): ReadonlySet<number>
}

/**
 * A non-deterministic finite automaton with epsilon transitions.
 *
 * States live in an arena and refer to each other by index, so cycles
 * (including epsilon cycles) need no special handling.
 *
 * @public
 */
export interface FiniteAutomaton {
  /** All states, indexed by id */
  readonly states: readonly AutomatonState[]

  /** Index of the start state */
  readonly initialState: number

  /** Alphabet the transitions are labelled with */
  readonly alphabet: Alphabet
}
