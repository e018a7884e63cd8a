/**
 * Closed alphabets over interned symbols.
 * @packageDocumentation
 */

import type { Alphabet, AlphabetSymbol } from '../types'
import { AutomatonError } from '../types'
import { internSymbol } from './symbol-table'

class ClosedAlphabet implements Alphabet {
  readonly symbols: readonly AlphabetSymbol[]

  private readonly byLabel: ReadonlyMap<string, AlphabetSymbol>

  constructor(symbols: readonly AlphabetSymbol[]) {
    this.symbols = Object.freeze([...symbols])
    this.byLabel = new Map(symbols.map((symbol) => [symbol.label, symbol]))
  }

  has(symbol: AlphabetSymbol): boolean {
    return this.byLabel.get(symbol.label) === symbol
  }

  find(label: string): AlphabetSymbol | undefined {
    return this.byLabel.get(label)
  }

  lookup(label: string): AlphabetSymbol {
    const symbol = this.byLabel.get(label)
    if (symbol === undefined) {
      throw new AutomatonError('UNKNOWN_SYMBOL', `Unknown symbol "${label}"`)
    }
    return symbol
  }
}

/**
 * Declare a closed alphabet.
 *
 * Labels are interned process-wide, so two alphabets declaring the same label
 * share the symbol.
 *
 * @param labels - Symbol labels, in the order searches should try them
 * @returns The alphabet
 * @throws AutomatonError with code `INVALID_ARGUMENT` for an empty or repeated label
 *
 * @public
 */
export function createAlphabet(labels: Iterable<string>): Alphabet {
  const symbols: AlphabetSymbol[] = []
  const seen = new Set<string>()

  for (const label of labels) {
    if (seen.has(label)) {
      throw new AutomatonError('INVALID_ARGUMENT', `Symbol "${label}" is declared twice`)
    }
    seen.add(label)
    symbols.push(internSymbol(label))
  }

  return new ClosedAlphabet(symbols)
}

/**
 * The symbols two alphabets have in common, in the order of the first.
 *
 * Returns `a` itself when both are the same alphabet.
 *
 * @public
 */
export function intersectAlphabets(a: Alphabet, b: Alphabet): Alphabet {
  if (a === b) return a
  return new ClosedAlphabet(a.symbols.filter((symbol) => b.has(symbol)))
}
