/**
 * Epsilon closure.
 * @packageDocumentation
 */

import type { FiniteAutomaton } from '../types'
import { AutomatonError } from '../types'
import { EPSILON } from '../alphabet'

/**
 * Compute the epsilon closure of a state.
 *
 * Breadth-first over epsilon edges only. The result always contains
 * `stateId` itself, and epsilon cycles terminate because a state already in
 * the closure is never queued again.
 *
 * @param automaton - The automaton owning the state
 * @param stateId - State to start from
 * @returns Ids of all states reachable from `stateId` without consuming input
 * @throws AutomatonError with code `INVALID_ARGUMENT` if `stateId` is not a state of the automaton
 *
 * @public
 */
export function epsilonClosure(automaton: FiniteAutomaton, stateId: number): Set<number> {
  if (!Number.isInteger(stateId) || automaton.states[stateId] === undefined) {
    throw new AutomatonError('INVALID_ARGUMENT', `No state with id ${stateId}`)
  }

  const closure = new Set<number>([stateId])
  const queue = [stateId]

  for (let head = 0; head < queue.length; head++) {
    const state = automaton.states[queue[head]]

    for (const target of state.transitions(EPSILON)) {
      if (!closure.has(target)) {
        closure.add(target)
        queue.push(target)
      }
    }
  }

  return closure
}

/**
 * Union of the epsilon closures of several states.
 *
 * @public
 */
export function epsilonClosureOfSet(automaton: FiniteAutomaton, stateIds: Iterable<number>): Set<number> {
  const closure = new Set<number>()

  for (const stateId of stateIds) {
    if (closure.has(stateId)) continue
    for (const member of epsilonClosure(automaton, stateId)) {
      closure.add(member)
    }
  }

  return closure
}
