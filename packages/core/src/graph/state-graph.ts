/**
 * Arena of state nodes addressed by index.
 * @packageDocumentation
 */

import type { TransitionLabel } from '../types'
import { AutomatonError } from '../types'
import { StateNode } from './state-node'

/**
 * Owns the states of one automaton while it is assembled.
 *
 * Every edge added through the graph points at a state of the same graph.
 * After {@link StateGraph.freeze} neither the arena nor any node can change.
 *
 * @public
 */
export class StateGraph {
  private readonly nodes: StateNode[] = []

  private frozen = false

  /** All states, indexed by id */
  get states(): readonly StateNode[] {
    return this.nodes
  }

  get size(): number {
    return this.nodes.length
  }

  get isFrozen(): boolean {
    return this.frozen
  }

  /**
   * Allocate a new, non-accepting state with no edges.
   */
  addState(): StateNode {
    this.assertMutable()
    const node = new StateNode(this.nodes.length)
    this.nodes.push(node)
    return node
  }

  /**
   * Get the state at an index.
   * @throws AutomatonError with code `INVALID_ARGUMENT` if there is no such state
   */
  get(id: number): StateNode {
    const node = this.nodes[id]
    if (node === undefined) {
      throw new AutomatonError('INVALID_ARGUMENT', `No state with id ${id}`)
    }
    return node
  }

  /**
   * Add an edge between two states of this graph.
   */
  addTransition(source: number, destination: number, label: TransitionLabel): void {
    this.assertMutable()
    const from = this.get(source)
    this.get(destination)
    from.addTransition(destination, label)
  }

  /**
   * Freeze the arena and every node in it.
   */
  freeze(): void {
    this.frozen = true
    Object.freeze(this.nodes)
    for (const node of this.nodes) {
      node.freeze()
    }
  }

  private assertMutable(): void {
    if (this.frozen) {
      throw new AutomatonError('ALREADY_FINISHED', 'The state graph is already finished')
    }
  }
}
