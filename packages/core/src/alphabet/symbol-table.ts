/**
 * Process-wide symbol interning.
 * @packageDocumentation
 */

import type { AlphabetSymbol, EpsilonLabel, SymbolLabel, TransitionLabel } from '../types'
import { AutomatonError } from '../types'

const symbolTable = new Map<string, AlphabetSymbol>()
const labelTable = new Map<AlphabetSymbol, SymbolLabel>()

/**
 * The single epsilon transition label.
 *
 * @public
 */
export const EPSILON: EpsilonLabel = Object.freeze({ type: 'epsilon' } satisfies EpsilonLabel)

/**
 * Intern a label, returning the one symbol for it.
 *
 * Idempotent: the same label always yields the same object.
 *
 * @param label - Non-empty symbol label
 * @throws AutomatonError with code `INVALID_ARGUMENT` for an empty label
 *
 * @public
 */
export function internSymbol(label: string): AlphabetSymbol {
  if (label === '') {
    throw new AutomatonError('INVALID_ARGUMENT', 'Symbol label must not be empty')
  }

  let symbol = symbolTable.get(label)
  if (symbol === undefined) {
    symbol = Object.freeze({ label })
    symbolTable.set(label, symbol)
  }
  return symbol
}

/**
 * Get the interned transition label for a symbol.
 *
 * @public
 */
export function symbolLabel(symbol: AlphabetSymbol): SymbolLabel {
  let label = labelTable.get(symbol)
  if (label === undefined) {
    label = Object.freeze({ type: 'symbol', symbol } satisfies SymbolLabel)
    labelTable.set(symbol, label)
  }
  return label
}

/**
 * Render a transition label the way `.aut` files write it (`$` for epsilon).
 *
 * @public
 */
export function formatLabel(label: TransitionLabel): string {
  return label.type === 'epsilon' ? '$' : label.symbol.label
}
