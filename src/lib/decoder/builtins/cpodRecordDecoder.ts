import type {
  BlockOutcome,
  ClickRecord,
  CpodHeader,
  DecodedRecords,
  RecordDecoder,
  TrainAnnotation,
} from '../types'
import { countByte } from '../bytes'
import { speciesFromCode } from '../species'
import { NO_TRAIN, readMicrosec } from './common'

export const CPOD_MINUTE = 254        // last byte of a minute marker
export const TERMINATOR_BYTE = 0xff
export const TERMINATOR_TOLERANCE = 5 // bytes allowed to differ from 0xff
const TERMINATORS_TO_STOP = 2

// CP3 click-train fields
const CP3_CLASS_OFFSET = 36
const CP3_TRAIN_ID_OFFSET = 39

export interface CpodClickFields {
  microsec: number
  ncyc: number
  khz: number
  ampAtMax: number
  duration: number | null
}

export type CpodBlock =
  | { kind: 'click'; click: CpodClickFields; train: TrainAnnotation }
  | { kind: 'minute' }

export function isTerminatorBlock(block: Uint8Array): boolean {
  return countByte(block, TERMINATOR_BYTE) >= block.length - TERMINATOR_TOLERANCE
}

export function parseCpodBlock(block: Uint8Array, format: CpodHeader['format']): CpodBlock {
  if (block[block.length - 1] === CPOD_MINUTE) return { kind: 'minute' }

  const ncyc = block[3]
  const khz = block[5]
  const train: TrainAnnotation = format === 'CP3'
    ? {
        trainId: block[CP3_TRAIN_ID_OFFSET],
        species: speciesFromCode(block[CP3_CLASS_OFFSET] >> 3, format),
        qualityLevel: block[CP3_CLASS_OFFSET] & 0x03,
        echo: false,
      }
    : NO_TRAIN

  return {
    kind: 'click',
    click: {
      microsec: readMicrosec(block),
      ncyc,
      khz,
      ampAtMax: khz,
      duration: khz > 0 ? ncyc / khz : null,
    },
    train,
  }
}

/**
 * CP1/CP3 data blocks. The recorded region ends with two consecutive
 * blocks of 0xff; the first of them is still decoded as a click and is
 * excluded from the reported count.
 */
export class CpodRecordDecoder implements RecordDecoder {
  readonly family = 'cpod' as const

  private currentClick = -1
  private currentMinute = -1
  private terminators = 0
  private readonly clicks: ClickRecord[] = []

  constructor(private readonly header: CpodHeader) {}

  consume(block: Uint8Array): BlockOutcome {
    if (isTerminatorBlock(block)) {
      if (++this.terminators === TERMINATORS_TO_STOP) return 'stop'
    } else {
      this.terminators = 0
    }

    const parsed = parseCpodBlock(block, this.header.format)
    switch (parsed.kind) {
      case 'minute':
        this.currentMinute++
        break
      case 'click':
        this.currentClick++
        this.clicks.push({
          ...parsed.train,
          ...parsed.click,
          minute: this.currentMinute,
          clickNo: this.currentClick + 1,
          pkat: 0,
          clkIpiRange: 0,
          ipiPreMax: 0,
          ipiAtMax: 0,
          ampReversals: 0,
          hasWav: false,
        })
        break
      default: {
        const unreachable: never = parsed
        return unreachable
      }
    }
    return 'continue'
  }

  finish(): DecodedRecords {
    const lastClick = this.currentClick - 1
    return {
      clicks: this.clicks.slice(0, Math.max(0, lastClick + 1)),
      waveforms: [],
      environment: [],
      lastClick,
      ignoredBlocks: 0,
      danglingTrains: 0,
      danglingWaveforms: 0,
    }
  }
}
