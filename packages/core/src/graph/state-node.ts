/**
 * Mutable state node, frozen once its automaton is finished.
 * @packageDocumentation
 */

import type { AutomatonState, TransitionLabel } from '../types'
import { AutomatonError } from '../types'

const NO_TARGETS: ReadonlySet<number> = new Set()

/**
 * A state in a {@link StateGraph} arena.
 *
 * Destinations are stored per label in a set, so a repeated edge on the same
 * label collapses into one.
 *
 * @public
 */
export class StateNode implements AutomatonState {
  readonly id: number

  private readonly edges = new Map<TransitionLabel, Set<number>>()

  private accept = false

  private frozen = false

  constructor(id: number) {
    this.id = id
  }

  get accepting(): boolean {
    return this.accept
  }

  isAccept(): boolean {
    return this.accept
  }

  setAccept(accepting: boolean): void {
    this.assertMutable()
    this.accept = accepting
  }

  addTransition(destination: number, label: TransitionLabel): void {
    this.assertMutable()
    let targets = this.edges.get(label)
    if (targets === undefined) {
      targets = new Set()
      this.edges.set(label, targets)
    }
    targets.add(destination)
  }

  transitions(label: TransitionLabel): ReadonlySet<number> {
    return this.edges.get(label) ?? NO_TARGETS
  }

  /** Number of distinct (label, destination) edges leaving this state */
  get edgeCount(): number {
    let count = 0
    for (const targets of this.edges.values()) {
      count += targets.size
    }
    return count
  }

  get isFrozen(): boolean {
    return this.frozen
  }

  freeze(): void {
    this.frozen = true
  }

  private assertMutable(): void {
    if (this.frozen) {
      throw new AutomatonError('ALREADY_FINISHED', `State ${this.id} belongs to a finished automaton`)
    }
  }
}
