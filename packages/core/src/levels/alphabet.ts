/**
 * Alphabet of the adventure journeys the levels reason about.
 * @packageDocumentation
 */

import { createAlphabet } from '../alphabet'

/**
 * Event labels, in search order.
 *
 * - `T` find a treasure
 * - `K` find the key
 * - `S` find the sword
 * - `G` pass through a gate
 * - `D` pass the dragon
 * - `R` jump in the river
 * - `A` pass through the arc
 *
 * @public
 */
export const JOURNEY_LABELS = ['T', 'K', 'S', 'G', 'D', 'R', 'A'] as const

/**
 * @public
 */
export type JourneyLabel = (typeof JOURNEY_LABELS)[number]

/**
 * The closed alphabet every `.aut` file read by the CLI is resolved against.
 * @public
 */
export const journeyAlphabet = createAlphabet(JOURNEY_LABELS)
