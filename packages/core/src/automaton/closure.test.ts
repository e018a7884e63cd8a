import { describe, it, expect } from 'vitest'
import { epsilonClosure, epsilonClosureOfSet } from './closure'
import { AutomatonBuilder } from '../build'
import { createAlphabet } from '../alphabet'
import type { Automaton } from './automaton'
import { AutomatonError } from '../types'

const alphabet = createAlphabet(['X'])

function sorted(ids: Iterable<number>): number[] {
  return [...ids].sort((a, b) => a - b)
}

/**
 * q0 -$-> q1 -$-> q2 -X-> q3, with q3 -$-> q1 and q1 -$-> q0
 */
function cyclicAutomaton(): Automaton {
  const builder = new AutomatonBuilder(alphabet)
  builder.setStartState('q0')
  builder.addTransition('q0', 'q1', null)
  builder.addTransition('q1', 'q2', null)
  builder.addTransition('q2', 'q3', 'X')
  builder.addTransition('q3', 'q1', null)
  builder.addTransition('q1', 'q0', null)
  return builder.getResult()
}

describe('epsilonClosure', () => {
  it('rejects an id that is not a state of the automaton', () => {
    const automaton = cyclicAutomaton()

    for (const stateId of [4, -1, 1.5]) {
      expect(() => epsilonClosure(automaton, stateId)).toThrow(AutomatonError)
      expect(() => automaton.closure(stateId)).toThrow(`No state with id ${stateId}`)
    }
  })

  it('contains the state itself when it has no epsilon edges', () => {
    const builder = new AutomatonBuilder(alphabet)
    builder.setStartState('q0')
    builder.addTransition('q0', 'q1', 'X')
    const automaton = builder.getResult()

    expect(sorted(epsilonClosure(automaton, 0))).toEqual([0])
    expect(sorted(epsilonClosure(automaton, 1))).toEqual([1])
  })

  it('follows epsilon chains but not symbol edges', () => {
    const builder = new AutomatonBuilder(alphabet)
    builder.setStartState('q0')
    builder.addTransition('q0', 'q1', null)
    builder.addTransition('q1', 'q2', null)
    builder.addTransition('q2', 'q3', 'X')
    const automaton = builder.getResult()

    expect(sorted(epsilonClosure(automaton, 0))).toEqual([0, 1, 2])
  })

  it('terminates on epsilon cycles', () => {
    const automaton = cyclicAutomaton()

    expect(sorted(epsilonClosure(automaton, 0))).toEqual([0, 1, 2])
    expect(sorted(epsilonClosure(automaton, 3))).toEqual([0, 1, 2, 3])
  })

  it('is closed: the closure of a member lies within the closure', () => {
    const automaton = cyclicAutomaton()

    for (let stateId = 0; stateId < automaton.size; stateId++) {
      const closure = epsilonClosure(automaton, stateId)
      for (const member of closure) {
        for (const reached of epsilonClosure(automaton, member)) {
          expect(closure.has(reached)).toBe(true)
        }
      }
    }
  })

  it('is exposed on the automaton', () => {
    const automaton = cyclicAutomaton()

    expect(sorted(automaton.closure(1))).toEqual([0, 1, 2])
  })
})

describe('epsilonClosureOfSet', () => {
  it('unites the closures of every state', () => {
    const builder = new AutomatonBuilder(alphabet)
    builder.setStartState('a')
    builder.addTransition('a', 'b', null)
    builder.addTransition('c', 'd', null)
    builder.addTransition('b', 'c', 'X')
    const automaton = builder.getResult()

    expect(sorted(epsilonClosureOfSet(automaton, [0, 2]))).toEqual([0, 1, 2, 3])
    expect(sorted(epsilonClosureOfSet(automaton, []))).toEqual([])
  })
})
