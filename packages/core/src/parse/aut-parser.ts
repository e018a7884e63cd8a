/**
 * `.aut` reader - turns automaton descriptions into builder calls.
 * @packageDocumentation
 */

import { readFile } from 'node:fs/promises'
import type { Alphabet } from '../types'
import { AutFormatError, AutomatonError } from '../types'
import { AutomatonBuilder } from '../build'
import type { Automaton } from '../automaton'

/**
 * Label written for an epsilon transition.
 * @public
 */
export const EPSILON_TOKEN = '$'

const START_MARKER = '(START)'
const START_ARROW = '|-'
const FINAL_MARKER = '(FINAL)'
const FINAL_ARROW = '-|'

/**
 * One declaration of an `.aut` file.
 * @public
 */
export type AutDeclaration =
  | { readonly type: 'start'; readonly state: string }
  | { readonly type: 'final'; readonly state: string }
  | { readonly type: 'transition'; readonly source: string; readonly label: string | null; readonly destination: string }

/**
 * Parse a single `.aut` line.
 *
 * Recognized forms:
 * - `(START) |- STATE` - start state
 * - `STATE -| (FINAL)` - accepting state
 * - `SOURCE LABEL DESTINATION` - transition, `$` as label for epsilon
 *
 * @param line - Line text
 * @returns The declaration, or undefined for a blank or `#` comment line
 * @throws AutFormatError for any other line
 *
 * @public
 */
export function parseAutLine(line: string): AutDeclaration | undefined {
  const trimmed = line.trim()
  if (trimmed === '' || trimmed.startsWith('#')) return undefined

  const tokens = trimmed.split(/\s+/)
  if (tokens.length !== 3) {
    throw new AutFormatError(`Expected three tokens, found ${tokens.length}`)
  }

  const [first, second, third] = tokens

  if (first === START_MARKER || second === START_ARROW) {
    if (first !== START_MARKER || second !== START_ARROW) {
      throw new AutFormatError(`Start declarations are written "${START_MARKER} ${START_ARROW} STATE"`)
    }
    return { type: 'start', state: third }
  }

  if (third === FINAL_MARKER || second === FINAL_ARROW) {
    if (third !== FINAL_MARKER || second !== FINAL_ARROW) {
      throw new AutFormatError(`Final declarations are written "STATE ${FINAL_ARROW} ${FINAL_MARKER}"`)
    }
    return { type: 'final', state: first }
  }

  return {
    type: 'transition',
    source: first,
    label: second === EPSILON_TOKEN ? null : second,
    destination: third,
  }
}

/**
 * Build an automaton from `.aut` text.
 *
 * Each declaration becomes exactly one builder call, in file order;
 * `getResult()` is called once after the last line.
 *
 * @param source - File contents
 * @param alphabet - Alphabet transition labels are resolved against
 * @returns The finished automaton
 * @throws AutFormatError for a malformed line, a label outside the alphabet, or a missing start state;
 * a builder rejection is attached as `cause`
 *
 * @public
 */
export function parseAut(source: string, alphabet: Alphabet): Automaton {
  const builder = new AutomatonBuilder(alphabet)
  const lines = source.split(/\r?\n/)

  for (let index = 0; index < lines.length; index++) {
    const text = lines[index]
    const line = index + 1

    try {
      const declaration = parseAutLine(text)
      if (declaration !== undefined) {
        applyDeclaration(builder, declaration)
      }
    } catch (error) {
      if (error instanceof AutFormatError) {
        throw new AutFormatError(error.message, { line, text })
      }
      if (error instanceof AutomatonError) {
        throw new AutFormatError(error.message, { line, text, cause: error })
      }
      throw error
    }
  }

  try {
    return builder.getResult()
  } catch (error) {
    if (error instanceof AutomatonError) {
      throw new AutFormatError(error.message, { cause: error })
    }
    throw error
  }
}

/**
 * Read and build an automaton from an `.aut` file.
 *
 * @param path - File to read (UTF-8)
 * @param alphabet - Alphabet transition labels are resolved against
 *
 * @public
 */
export async function readAutFile(path: string, alphabet: Alphabet): Promise<Automaton> {
  const source = await readFile(path, 'utf8')
  return parseAut(source, alphabet)
}

function applyDeclaration(builder: AutomatonBuilder, declaration: AutDeclaration): void {
  switch (declaration.type) {
    case 'start':
      builder.setStartState(declaration.state)
      break
    case 'final':
      builder.addAcceptState(declaration.state)
      break
    case 'transition':
      builder.addTransition(declaration.source, declaration.destination, declaration.label)
      break
  }
}
