/**
 * Reading automata from `.aut` text.
 * @packageDocumentation
 */

export { parseAut, parseAutLine, readAutFile, EPSILON_TOKEN, type AutDeclaration } from './aut-parser'
