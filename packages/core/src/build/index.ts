/**
 * Building automata from declarations.
 * @packageDocumentation
 */

export { AutomatonBuilder } from './builder'
