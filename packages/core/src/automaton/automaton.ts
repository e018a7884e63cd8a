/**
 * Immutable automaton with the query operations.
 * @packageDocumentation
 */

import type { Alphabet, AlphabetSymbol, AutomatonState, FiniteAutomaton, TransitionLabel } from '../types'
import { AutomatonError } from '../types'
import { EPSILON, symbolLabel } from '../alphabet'
import { StateGraph } from '../graph'
import { epsilonClosure } from './closure'
import { intersect } from './intersect'
import { accepts } from './membership'
import { findShortestExample, findShortestWord } from './shortest-example'

/**
 * A finished automaton.
 *
 * Produced by {@link AutomatonBuilder.getResult} or by
 * {@link Automaton.intersection}. Nothing about it can change afterwards,
 * so it may be shared freely and intersected any number of times.
 *
 * @public
 */
export class Automaton implements FiniteAutomaton {
  readonly states: readonly AutomatonState[]

  readonly initialState: number

  readonly alphabet: Alphabet

  /**
   * Snapshot `definition` into a frozen state arena. Only edges on epsilon and
   * on the symbols of `definition.alphabet` are kept.
   *
   * @throws AutomatonError with code `INVALID_ARGUMENT` if the start state or
   * an edge destination is not in `states`
   */
  constructor(definition: FiniteAutomaton) {
    if (!isStateOf(definition, definition.initialState)) {
      throw new AutomatonError('INVALID_ARGUMENT', `Start state ${definition.initialState} is not a state of the automaton`)
    }

    this.states = snapshotStates(definition)
    this.initialState = definition.initialState
    this.alphabet = definition.alphabet
    Object.freeze(this)
  }

  /** Number of states */
  get size(): number {
    return this.states.length
  }

  /** States reachable from `stateId` on epsilon edges alone, including itself */
  closure(stateId: number): ReadonlySet<number> {
    return epsilonClosure(this, stateId)
  }

  /** An automaton accepting the strings both this and `other` accept */
  intersection(other: Automaton): Automaton {
    return new Automaton(intersect(this, other))
  }

  /** Whether the word, given as symbol labels, is accepted */
  accepts(labels: readonly string[]): boolean {
    return accepts(this, labels)
  }

  /**
   * Shortest word that is (`accept = true`) or is not (`accept = false`) accepted.
   * @returns The labels concatenated, or undefined if no such word exists
   */
  shortestExample(accept: boolean): string | undefined {
    return findShortestExample(this, accept)
  }

  /** Like {@link Automaton.shortestExample}, keeping the symbols apart */
  shortestWord(accept: boolean): AlphabetSymbol[] | undefined {
    return findShortestWord(this, accept)
  }
}

function isStateOf(automaton: FiniteAutomaton, stateId: number): boolean {
  return Number.isInteger(stateId) && stateId >= 0 && stateId < automaton.states.length
}

function snapshotStates(definition: FiniteAutomaton): readonly AutomatonState[] {
  const labels: TransitionLabel[] = [EPSILON, ...definition.alphabet.symbols.map(symbolLabel)]
  const graph = new StateGraph()

  for (const state of definition.states) {
    graph.addState().setAccept(state.accepting)
  }

  definition.states.forEach((state, source) => {
    for (const label of labels) {
      for (const destination of state.transitions(label)) {
        if (!isStateOf(definition, destination)) {
          throw new AutomatonError(
            'INVALID_ARGUMENT',
            `State ${source} has an edge to ${destination}, which is not a state of the automaton`,
          )
        }
        graph.addTransition(source, destination, label)
      }
    }
  })

  graph.freeze()
  return graph.states
}
