/**
 * Levels: named constraint automata applied to a journey by intersection.
 * @packageDocumentation
 */

import { join } from 'node:path'
import type { Alphabet } from '../types'
import type { Automaton } from '../automaton'
import { readAutFile } from '../parse'

/**
 * Directory holding the bundled constraint `.aut` files.
 * @public
 */
export const DEFAULT_CONSTRAINTS_DIR = join(__dirname, 'constraints')

/**
 * Names of the constraint automata, one `.aut` file each.
 * @public
 */
export const CONSTRAINT_NAMES = [
  'at-least-two-treasures',
  'key-before-gates',
  'river-after-dragon-without-sword',
  'no-treasures-after-dragon',
  'two-treasures-lost-at-arc',
] as const

/**
 * @public
 */
export type ConstraintName = (typeof CONSTRAINT_NAMES)[number]

/**
 * One automaton per constraint.
 * @public
 */
export type ConstraintSet = Readonly<Record<ConstraintName, Automaton>>

/**
 * Constraints each level applies, in application order.
 * @public
 */
export const LEVELS = {
  0: [],
  1: ['at-least-two-treasures', 'key-before-gates', 'river-after-dragon-without-sword'],
  2: ['key-before-gates', 'river-after-dragon-without-sword', 'no-treasures-after-dragon', 'two-treasures-lost-at-arc'],
} as const satisfies Record<number, readonly ConstraintName[]>

/**
 * @public
 */
export type LevelNumber = keyof typeof LEVELS

/**
 * @public
 */
export function isLevelNumber(value: number): value is LevelNumber {
  return Object.prototype.hasOwnProperty.call(LEVELS, value)
}

/**
 * Read every constraint automaton from a directory.
 *
 * @param directory - Directory holding `<name>.aut` for every constraint name
 * @param alphabet - Alphabet the files are resolved against
 *
 * @public
 */
export async function loadConstraints(directory: string, alphabet: Alphabet): Promise<ConstraintSet> {
  const automata = await Promise.all(CONSTRAINT_NAMES.map((name) => readAutFile(join(directory, `${name}.aut`), alphabet)))

  const [atLeastTwoTreasures, keyBeforeGates, riverAfterDragon, noTreasuresAfterDragon, twoTreasuresLostAtArc] = automata
  return {
    'at-least-two-treasures': atLeastTwoTreasures,
    'key-before-gates': keyBeforeGates,
    'river-after-dragon-without-sword': riverAfterDragon,
    'no-treasures-after-dragon': noTreasuresAfterDragon,
    'two-treasures-lost-at-arc': twoTreasuresLostAtArc,
  }
}

/**
 * Intersect an automaton with the constraints of a level, in order.
 *
 * Level 0 returns the automaton unchanged.
 *
 * @public
 */
export function applyLevel(level: LevelNumber, automaton: Automaton, constraints: ConstraintSet): Automaton {
  const names: readonly ConstraintName[] = LEVELS[level]
  return names.reduce((constrained, name) => constrained.intersection(constraints[name]), automaton)
}
