/**
 * Shortest accepted / rejected words.
 * @packageDocumentation
 */

import registerDebug from 'debug'
import type { AlphabetSymbol, FiniteAutomaton, TransitionLabel } from '../types'
import { symbolLabel } from '../alphabet'
import { epsilonClosure, epsilonClosureOfSet } from './closure'

const debugSearch = registerDebug('nfa-witness:search')

interface LabeledSymbol {
  symbol: AlphabetSymbol
  label: TransitionLabel
}

/**
 * Find a shortest accepted or rejected word.
 *
 * With `accept = true` the result is a shortest word the automaton accepts.
 * With `accept = false` it is a shortest word it does not accept: one after
 * which no accepting state can be occupied, including words that run off
 * every edge.
 *
 * Among words of equal length, the one found first follows the alphabet's
 * declaration order; callers should not rely on which one that is.
 *
 * @param automaton - The automaton to search
 * @param accept - Whether the word should be accepted
 * @returns The symbols of the word, or undefined if no such word exists
 *
 * @public
 */
export function findShortestWord(automaton: FiniteAutomaton, accept: boolean): AlphabetSymbol[] | undefined {
  const labels = automaton.alphabet.symbols.map((symbol) => ({ symbol, label: symbolLabel(symbol) }))
  return accept ? findAcceptedWord(automaton, labels) : findRejectedWord(automaton, labels)
}

/**
 * Breadth-first over symbol count. Epsilon moves are free: when a state is
 * dequeued, its whole epsilon closure is examined and expanded at the same
 * distance, so every symbol step taken from the closure lengthens the word
 * by exactly one and the queue stays ordered by word length. Each state is
 * expanded at most once, which bounds the search even with cycles.
 */
function findAcceptedWord(automaton: FiniteAutomaton, labels: readonly LabeledSymbol[]): AlphabetSymbol[] | undefined {
  interface SearchState {
    stateId: number
    word: AlphabetSymbol[]
  }

  const visited = new Set<number>([automaton.initialState])
  const queue: SearchState[] = [{ stateId: automaton.initialState, word: [] }]

  for (let head = 0; head < queue.length; head++) {
    const { stateId, word } = queue[head]
    const closure = epsilonClosure(automaton, stateId)

    for (const member of closure) {
      if (automaton.states[member].accepting) {
        debugSearch('found accepted word of length %d after %d states', word.length, head + 1)
        return word
      }
    }

    // Closure members are reached at this distance; expand them here
    for (const member of closure) {
      visited.add(member)
    }

    for (const { symbol, label } of labels) {
      for (const member of closure) {
        for (const target of automaton.states[member].transitions(label)) {
          if (!visited.has(target)) {
            visited.add(target)
            queue.push({ stateId: target, word: [...word, symbol] })
          }
        }
      }
    }
  }

  debugSearch('no accepted word after %d states', queue.length)
  return undefined
}

/**
 * Breadth-first over configurations: the epsilon-closed sets of states the
 * automaton can occupy after a word. The empty configuration is one of them.
 * A word is rejected when its configuration holds no accepting state.
 */
function findRejectedWord(automaton: FiniteAutomaton, labels: readonly LabeledSymbol[]): AlphabetSymbol[] | undefined {
  interface SearchConfiguration {
    states: ReadonlySet<number>
    word: AlphabetSymbol[]
  }

  const start = epsilonClosure(automaton, automaton.initialState)
  const visited = new Set<string>([configurationKey(start)])
  const queue: SearchConfiguration[] = [{ states: start, word: [] }]

  for (let head = 0; head < queue.length; head++) {
    const { states, word } = queue[head]

    if (![...states].some((member) => automaton.states[member].accepting)) {
      debugSearch('found rejected word of length %d after %d configurations', word.length, head + 1)
      return word
    }

    for (const { symbol, label } of labels) {
      const targets: number[] = []
      for (const member of states) {
        targets.push(...automaton.states[member].transitions(label))
      }

      const next = epsilonClosureOfSet(automaton, targets)
      const key = configurationKey(next)
      if (!visited.has(key)) {
        visited.add(key)
        queue.push({ states: next, word: [...word, symbol] })
      }
    }
  }

  debugSearch('no rejected word after %d configurations', queue.length)
  return undefined
}

function configurationKey(states: ReadonlySet<number>): string {
  return [...states].sort((a, b) => a - b).join(',')
}

/**
 * Find a shortest word of the requested acceptance kind, as a string.
 *
 * Symbol labels are concatenated without a separator; the empty word is `''`.
 *
 * @param automaton - The automaton to search
 * @param accept - `true` for a shortest accepted word, `false` for a shortest rejected one
 * @returns The word, or undefined if no such word exists
 *
 * @public
 */
export function findShortestExample(automaton: FiniteAutomaton, accept: boolean): string | undefined {
  return findShortestWord(automaton, accept)?.map((symbol) => symbol.label).join('')
}
