/**
 * Automaton intersection using product construction.
 * @packageDocumentation
 */

import registerDebug from 'debug'
import type { FiniteAutomaton } from '../types'
import { EPSILON, intersectAlphabets, symbolLabel } from '../alphabet'
import { StateGraph } from '../graph'

const debugIntersect = registerDebug('nfa-witness:intersect')

interface ProductPair {
  stateId: number
  stateA: number
  stateB: number
}

/**
 * Compute the intersection of two automata using product construction.
 *
 * The resulting automaton accepts a string iff both input automata accept it.
 * L(A ∩ B) = L(A) ∩ L(B)
 *
 * Product states are pairs (a, b), created on demand from the pair of start
 * states. A pair is accepting iff both components are. Symbol edges are
 * synchronized: both sides consume the same symbol. Epsilon edges are not:
 * either side may take an epsilon move while the other stays put.
 *
 * Neither operand is determinized or modified; the result owns a new set of
 * states.
 *
 * @param a - First automaton
 * @param b - Second automaton
 * @returns Intersection automaton, over the symbols both alphabets declare
 *
 * @public
 */
export function intersect(a: FiniteAutomaton, b: FiniteAutomaton): FiniteAutomaton {
  const alphabet = intersectAlphabets(a.alphabet, b.alphabet)
  const graph = new StateGraph()

  // (stateA, stateB) -> product state id, keyed by stateA * |B| + stateB
  const pairToState = new Map<number, number>()
  const worklist: ProductPair[] = []

  const getOrCreateState = (stateA: number, stateB: number): number => {
    const key = stateA * b.states.length + stateB
    let stateId = pairToState.get(key)

    if (stateId === undefined) {
      const node = graph.addState()
      node.setAccept(a.states[stateA].accepting && b.states[stateB].accepting)
      stateId = node.id
      pairToState.set(key, stateId)
      worklist.push({ stateId, stateA, stateB })
    }

    return stateId
  }

  const initialState = getOrCreateState(a.initialState, b.initialState)

  for (let head = 0; head < worklist.length; head++) {
    const { stateId, stateA, stateB } = worklist[head]
    const fromA = a.states[stateA]
    const fromB = b.states[stateB]

    // Both sides consume the same symbol
    for (const symbol of alphabet.symbols) {
      const label = symbolLabel(symbol)
      const targetsB = fromB.transitions(label)
      if (targetsB.size === 0) continue

      for (const targetA of fromA.transitions(label)) {
        for (const targetB of targetsB) {
          graph.addTransition(stateId, getOrCreateState(targetA, targetB), label)
        }
      }
    }

    // A moves on epsilon, B stays
    for (const targetA of fromA.transitions(EPSILON)) {
      graph.addTransition(stateId, getOrCreateState(targetA, stateB), EPSILON)
    }

    // B moves on epsilon, A stays
    for (const targetB of fromB.transitions(EPSILON)) {
      graph.addTransition(stateId, getOrCreateState(stateA, targetB), EPSILON)
    }
  }

  graph.freeze()
  debugIntersect(
    'product of %d x %d states explored %d pairs',
    a.states.length,
    b.states.length,
    graph.size,
  )

  return {
    states: graph.states,
    initialState,
    alphabet,
  }
}
