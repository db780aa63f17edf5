import type { FormatTag, SpeciesGroup } from './types'

// Index is the raw classifier code.
const SPECIES_CODES: Partial<Record<FormatTag, readonly SpeciesGroup[]>> = {
  CP3: ['NBHF', 'NBHF', 'OtherCet', 'OtherCet', 'Unclassed', 'Unclassed', 'Sonar', 'Sonar'],
  FP3: ['NBHF', 'OtherCet', 'Unclassed', 'Sonar'],
}

/** Unknown codes, and formats without a classifier, map to ''. */
export function speciesFromCode(code: number, format: FormatTag): SpeciesGroup {
  return SPECIES_CODES[format]?.[code] ?? ''
}
