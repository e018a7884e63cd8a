/**
 * Word membership by NFA simulation.
 * @packageDocumentation
 */

import type { FiniteAutomaton } from '../types'
import { symbolLabel } from '../alphabet'
import { epsilonClosure, epsilonClosureOfSet } from './closure'

/**
 * Check whether an automaton accepts a word.
 *
 * Tracks the set of states reachable on the prefix read so far, closed under
 * epsilon moves. A label outside the automaton's alphabet is never accepted.
 *
 * @param automaton - The automaton
 * @param labels - The word, one symbol label per element
 * @returns true if some state reached after the whole word is accepting
 *
 * @public
 */
export function accepts(automaton: FiniteAutomaton, labels: readonly string[]): boolean {
  let current = epsilonClosure(automaton, automaton.initialState)

  for (const text of labels) {
    const symbol = automaton.alphabet.find(text)
    if (symbol === undefined) return false

    const label = symbolLabel(symbol)
    const next: number[] = []
    for (const stateId of current) {
      next.push(...automaton.states[stateId].transitions(label))
    }

    current = epsilonClosureOfSet(automaton, next)
    if (current.size === 0) return false
  }

  for (const stateId of current) {
    if (automaton.states[stateId].accepting) return true
  }
  return false
}
