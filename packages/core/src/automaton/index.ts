/**
 * Automaton operations: closure, intersection, search.
 * @packageDocumentation
 */

export { Automaton } from './automaton'
export { epsilonClosure, epsilonClosureOfSet } from './closure'
export { intersect } from './intersect'
export { findShortestWord, findShortestExample } from './shortest-example'
export { accepts } from './membership'
