import { describe, it, expect, beforeAll } from 'vitest'
import { join } from 'node:path'
import { applyLevel, DEFAULT_CONSTRAINTS_DIR, isLevelNumber, loadConstraints, type ConstraintSet } from './levels'
import { journeyAlphabet } from './alphabet'
import { readAutFile } from '../parse'
import type { Automaton } from '../automaton'

const fixtures = join(__dirname, '..', 'cli', 'fixtures')

function word(text: string): string[] {
  return [...text]
}

describe('constraints', () => {
  let constraints: ConstraintSet

  beforeAll(async () => {
    constraints = await loadConstraints(DEFAULT_CONSTRAINTS_DIR, journeyAlphabet)
  })

  it('at-least-two-treasures counts treasures anywhere', () => {
    const automaton = constraints['at-least-two-treasures']

    expect(automaton.accepts(word('TGT'))).toBe(true)
    expect(automaton.accepts(word('TTTT'))).toBe(true)
    expect(automaton.accepts(word('T'))).toBe(false)
    expect(automaton.accepts(word(''))).toBe(false)
  })

  it('key-before-gates rejects a gate passed without the key', () => {
    const automaton = constraints['key-before-gates']

    expect(automaton.accepts(word(''))).toBe(true)
    expect(automaton.accepts(word('KG'))).toBe(true)
    expect(automaton.accepts(word('TKTG'))).toBe(true)
    expect(automaton.accepts(word('GK'))).toBe(false)
  })

  it('river-after-dragon-without-sword demands a jump right after an unarmed dragon', () => {
    const automaton = constraints['river-after-dragon-without-sword']

    expect(automaton.accepts(word('DR'))).toBe(true)
    expect(automaton.accepts(word('SD'))).toBe(true)
    expect(automaton.accepts(word('D'))).toBe(false)
    expect(automaton.accepts(word('DT'))).toBe(false)
  })

  it('no-treasures-after-dragon rejects treasures found past the dragon', () => {
    const automaton = constraints['no-treasures-after-dragon']

    expect(automaton.accepts(word('TD'))).toBe(true)
    expect(automaton.accepts(word('DT'))).toBe(false)
  })

  it('two-treasures-lost-at-arc counts treasures since the last arc', () => {
    const automaton = constraints['two-treasures-lost-at-arc']

    expect(automaton.accepts(word('TT'))).toBe(true)
    expect(automaton.accepts(word('TATT'))).toBe(true)
    expect(automaton.accepts(word('TTA'))).toBe(false)
    expect(automaton.accepts(word('TAT'))).toBe(false)
  })
})

describe('applyLevel', () => {
  let constraints: ConstraintSet
  let journey: Automaton

  beforeAll(async () => {
    constraints = await loadConstraints(DEFAULT_CONSTRAINTS_DIR, journeyAlphabet)
    journey = await readAutFile(join(fixtures, 'journey.aut'), journeyAlphabet)
  })

  it('level 0 leaves the journey unconstrained', () => {
    expect(applyLevel(0, journey, constraints)).toBe(journey)
    expect(applyLevel(0, journey, constraints).shortestExample(true)).toBe('G')
  })

  it('level 1 needs two treasures and the key before the gate', () => {
    expect(applyLevel(1, journey, constraints).shortestExample(true)).toBe('TAT')
  })

  it('level 2 loses the treasures at the arc', () => {
    expect(applyLevel(2, journey, constraints).shortestExample(true)).toBe('KTTG')
  })

  it('reports no journey when the constraints cannot be met', async () => {
    const treasureless = await readAutFile(join(fixtures, 'treasureless.aut'), journeyAlphabet)

    expect(applyLevel(1, treasureless, constraints).shortestExample(true)).toBeUndefined()
  })
})

describe('isLevelNumber', () => {
  it('accepts the defined levels only', () => {
    expect(isLevelNumber(0)).toBe(true)
    expect(isLevelNumber(2)).toBe(true)
    expect(isLevelNumber(3)).toBe(false)
    expect(isLevelNumber(-1)).toBe(false)
    expect(isLevelNumber(1.5)).toBe(false)
  })
})
