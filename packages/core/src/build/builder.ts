/**
 * Automaton builder - assembles an automaton from named declarations.
 * @packageDocumentation
 */

import registerDebug from 'debug'
import type { Alphabet, TransitionLabel } from '../types'
import { AutomatonError } from '../types'
import { EPSILON, formatLabel, symbolLabel } from '../alphabet'
import { StateGraph } from '../graph'
import { Automaton } from '../automaton'

const debugBuild = registerDebug('nfa-witness:build')

/**
 * Mutable staging area, dropped when the builder finishes.
 */
interface BuildStage {
  graph: StateGraph
  names: Map<string, number>
  startState?: number
}

/**
 * Assembles an {@link Automaton} from state and transition declarations.
 *
 * Names only exist while building: the first reference to a name allocates
 * a state in the arena, later references reuse it. Declarations may come in
 * any order. {@link AutomatonBuilder.getResult} freezes the arena, forgets
 * the names and may succeed once; every call after that fails with
 * `ALREADY_FINISHED`.
 *
 * A call that throws leaves the builder as it was.
 *
 * @example
 * ```ts
 * const builder = new AutomatonBuilder(createAlphabet(['X', 'Y']))
 * builder.setStartState('q0')
 * builder.addTransition('q0', 'q1', 'X')
 * builder.addAcceptState('q1')
 * builder.getResult().shortestExample(true) // 'X'
 * ```
 *
 * @public
 */
export class AutomatonBuilder {
  readonly alphabet: Alphabet

  private stage: BuildStage | undefined = { graph: new StateGraph(), names: new Map() }

  constructor(alphabet: Alphabet) {
    this.alphabet = alphabet
  }

  /** Whether {@link AutomatonBuilder.getResult} has succeeded */
  get isFinished(): boolean {
    return this.stage === undefined
  }

  /**
   * Mark the named state as accepting, creating it if needed.
   * @throws AutomatonError `INVALID_ARGUMENT` for an empty name, `ALREADY_FINISHED` after getResult()
   */
  addAcceptState(name: string): void {
    const stage = this.openStage()
    assertStateName(name)

    stage.graph.get(resolveState(stage, name)).setAccept(true)
  }

  /**
   * Add an edge between two named states, creating them if needed.
   *
   * @param source - Name of the state the edge leaves
   * @param destination - Name of the state the edge enters
   * @param label - Symbol label, or `null` (or `''`) for an epsilon edge
   * @throws AutomatonError `INVALID_ARGUMENT` for an empty name, `UNKNOWN_SYMBOL` for a label outside
   * the alphabet, `ALREADY_FINISHED` after getResult()
   */
  addTransition(source: string, destination: string, label: string | null): void {
    const stage = this.openStage()
    assertStateName(source)
    assertStateName(destination)
    const transitionLabel = this.resolveLabel(label)

    const from = resolveState(stage, source)
    const to = resolveState(stage, destination)
    stage.graph.addTransition(from, to, transitionLabel)
    debugBuild('%s -%s-> %s', source, formatLabel(transitionLabel), destination)
  }

  /**
   * Record the named state as the start state, creating it if needed.
   * A later call replaces the earlier choice.
   * @throws AutomatonError `INVALID_ARGUMENT` for an empty name, `ALREADY_FINISHED` after getResult()
   */
  setStartState(name: string): void {
    const stage = this.openStage()
    assertStateName(name)

    stage.startState = resolveState(stage, name)
  }

  /**
   * Freeze and return the automaton.
   * @throws AutomatonError `NO_START_STATE` if no start state was set, `ALREADY_FINISHED` on a second call
   */
  getResult(): Automaton {
    const stage = this.openStage()
    if (stage.startState === undefined) {
      throw new AutomatonError('NO_START_STATE', 'No start state was declared')
    }

    stage.graph.freeze()
    this.stage = undefined
    debugBuild('finished automaton with %d states from %d names', stage.graph.size, stage.names.size)

    return new Automaton({
      states: stage.graph.states,
      initialState: stage.startState,
      alphabet: this.alphabet,
    })
  }

  private openStage(): BuildStage {
    if (this.stage === undefined) {
      throw new AutomatonError('ALREADY_FINISHED', 'The automaton has already been built')
    }
    return this.stage
  }

  private resolveLabel(label: string | null): TransitionLabel {
    if (label === null || label === '') return EPSILON
    return symbolLabel(this.alphabet.lookup(label))
  }
}

/**
 * Validate a state name before it is looked up.
 */
function assertStateName(name: string): void {
  if (name === '') {
    throw new AutomatonError('INVALID_ARGUMENT', 'State name must not be empty')
  }
}

/**
 * Find the state for a name, allocating it on first use.
 */
function resolveState(stage: BuildStage, name: string): number {
  let id = stage.names.get(name)
  if (id === undefined) {
    id = stage.graph.addState().id
    stage.names.set(name, id)
  }
  return id
}
