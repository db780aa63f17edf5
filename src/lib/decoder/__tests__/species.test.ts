import { describe, it, expect } from 'vitest'
import { speciesFromCode } from '../species'

describe('speciesFromCode', () => {
  it('maps CPOD codes in pairs', () => {
    expect([0, 1, 2, 3, 4, 5, 6, 7].map((c) => speciesFromCode(c, 'CP3'))).toEqual([
      'NBHF', 'NBHF', 'OtherCet', 'OtherCet', 'Unclassed', 'Unclassed', 'Sonar', 'Sonar',
    ])
    expect(speciesFromCode(8, 'CP3')).toBe('')
  })

  it('maps FPOD codes one to one', () => {
    expect([0, 1, 2, 3].map((c) => speciesFromCode(c, 'FP3'))).toEqual(['NBHF', 'OtherCet', 'Unclassed', 'Sonar'])
    expect(speciesFromCode(4, 'FP3')).toBe('')
  })

  it('has no labels for formats without a classifier', () => {
    expect(speciesFromCode(0, 'CP1')).toBe('')
    expect(speciesFromCode(1, 'FP1')).toBe('')
  })
})
