import { describe, it, expect } from 'vitest'
import { join } from 'node:path'
import { parseAut, parseAutLine, readAutFile } from './aut-parser'
import { createAlphabet } from '../alphabet'
import { AutFormatError, AutomatonError } from '../types'
import { journeyAlphabet } from '../levels'

const alphabet = createAlphabet(['X', 'Y'])
const fixtures = join(__dirname, '..', 'cli', 'fixtures')

function formatError(fn: () => unknown): AutFormatError {
  try {
    fn()
  } catch (error) {
    if (error instanceof AutFormatError) return error
    throw error
  }
  throw new Error('expected an AutFormatError')
}

describe('parseAutLine', () => {
  it('parses start declarations', () => {
    expect(parseAutLine('(START) |- q0')).toEqual({ type: 'start', state: 'q0' })
  })

  it('parses final declarations', () => {
    expect(parseAutLine('q3 -| (FINAL)')).toEqual({ type: 'final', state: 'q3' })
  })

  it('parses transitions', () => {
    expect(parseAutLine('q0 X q1')).toEqual({ type: 'transition', source: 'q0', label: 'X', destination: 'q1' })
  })

  it('parses $ as an epsilon label', () => {
    expect(parseAutLine('q0 $ q1')).toEqual({ type: 'transition', source: 'q0', label: null, destination: 'q1' })
  })

  it('accepts surrounding and repeated whitespace', () => {
    expect(parseAutLine('  q0 \t X   q1  ')).toEqual({ type: 'transition', source: 'q0', label: 'X', destination: 'q1' })
  })

  it('skips blank and comment lines', () => {
    expect(parseAutLine('')).toBeUndefined()
    expect(parseAutLine('   ')).toBeUndefined()
    expect(parseAutLine('# a comment')).toBeUndefined()
  })

  it('rejects lines with the wrong number of tokens', () => {
    expect(() => parseAutLine('q0 X')).toThrow('Expected three tokens, found 2')
    expect(() => parseAutLine('q0 X q1 q2')).toThrow(AutFormatError)
  })

  it('rejects half-written start and final declarations', () => {
    expect(() => parseAutLine('(START) -> q0')).toThrow(AutFormatError)
    expect(() => parseAutLine('q0 |- q1')).toThrow(AutFormatError)
    expect(() => parseAutLine('q3 -| FINAL')).toThrow(AutFormatError)
    expect(() => parseAutLine('q3 X (FINAL)')).toThrow(AutFormatError)
  })
})

describe('parseAut', () => {
  it('builds an automaton from declarations in any order', () => {
    const automaton = parseAut(['q1 -| (FINAL)', 'q0 X q1', '(START) |- q0'].join('\n'), alphabet)

    expect(automaton.size).toBe(2)
    expect(automaton.initialState).toBe(1)
    expect(automaton.shortestExample(true)).toBe('X')
  })

  it('reads CRLF line endings', () => {
    const automaton = parseAut('(START) |- q0\r\nq0 Y q1\r\nq1 -| (FINAL)\r\n', alphabet)

    expect(automaton.shortestExample(true)).toBe('Y')
  })

  it('reports the line of a malformed declaration', () => {
    const error = formatError(() => parseAut('(START) |- q0\nq0 X\n', alphabet))

    expect(error.line).toBe(2)
    expect(error.text).toBe('q0 X')
    expect(error.message).toBe('Line 2: Expected three tokens, found 2')
  })

  it('wraps builder rejections with their line', () => {
    const error = formatError(() => parseAut('(START) |- q0\nq0 Q q1\n', alphabet))

    expect(error.line).toBe(2)
    expect(error.message).toBe('Line 2: Unknown symbol "Q"')
    expect(error.cause).toBeInstanceOf(AutomatonError)
    expect(error.cause instanceof AutomatonError && error.cause.code).toBe('UNKNOWN_SYMBOL')
  })

  it('fails without a start declaration', () => {
    const error = formatError(() => parseAut('q0 X q1\nq1 -| (FINAL)\n', alphabet))

    expect(error.line).toBeUndefined()
    expect(error.message).toBe('No start state was declared')
    expect(error.cause instanceof AutomatonError && error.cause.code).toBe('NO_START_STATE')
  })
})

describe('readAutFile', () => {
  it('reads an automaton from disk', async () => {
    const automaton = await readAutFile(join(fixtures, 'journey.aut'), journeyAlphabet)

    expect(automaton.shortestExample(true)).toBe('G')
    expect(automaton.accepts(['T', 'A', 'T'])).toBe(true)
  })

  it('rejects files with labels outside the alphabet', async () => {
    await expect(readAutFile(join(fixtures, 'broken.aut'), journeyAlphabet)).rejects.toThrow(
      'Line 2: Unknown symbol "X"',
    )
  })

  it('rejects missing files', async () => {
    await expect(readAutFile(join(fixtures, 'missing.aut'), journeyAlphabet)).rejects.toThrow()
  })
})
