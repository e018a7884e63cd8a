/**
 * Symbol table and alphabets.
 * @packageDocumentation
 */

export { internSymbol, symbolLabel, formatLabel, EPSILON } from './symbol-table'
export { createAlphabet, intersectAlphabets } from './alphabet'
