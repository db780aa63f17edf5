import type { TrainAnnotation } from '../types'
import { readUintBE } from '../bytes'

// The click timer runs at 200 ticks per millisecond.
export function readMicrosec(block: Uint8Array): number {
  return Math.trunc(readUintBE(block, 0, 3) / 200 * 1000)
}

export const NO_TRAIN: Readonly<TrainAnnotation> = {
  trainId: 0,
  species: '',
  qualityLevel: 0,
  echo: false,
}
