import type {
  BlockOutcome,
  ClickRecord,
  DecodedRecords,
  EnvironmentalSample,
  FpodHeader,
  RecordDecoder,
  TrainAnnotation,
  WaveformChunk,
  WaveformSample,
} from '../types'
import { speciesFromCode } from '../species'
import { SAMPLES_PER_CHUNK, WaveformAccumulator } from '../waveform'
import { NO_TRAIN, readMicrosec } from './common'

// --- Discriminants (first byte of each block) ---

export const FPOD_CLICK_LIMIT = 184   // anything below is a click
export const FPOD_TRAIN = 249
export const FPOD_WAVE = 250
export const FPOD_MINUTE = 254

// Battery bytes moved in PIC firmware 28.
const LEGACY_BATTERY_PIC_VERSION = 28

export interface FpodClickFields {
  microsec: number
  ncyc: number
  pkat: number
  clkIpiRange: number
  ipiPreMax: number
  ipiAtMax: number
  ampAtMax: number
  ampReversals: number
  duration: number
}

export type FpodBlock =
  | { kind: 'click'; click: FpodClickFields }
  | { kind: 'train'; train: TrainAnnotation }
  | { kind: 'wave'; chunk: WaveformChunk }
  | { kind: 'minute'; degC: number; bat1v: number; bat2v: number }
  | { kind: 'unknown'; discriminant: number }

export function decodeIpiRange(byte: number): number {
  const nibble = byte & 0x0f
  if (nibble === 15) return 65
  if ((nibble & 0x08) === 0x08) return ((nibble & 0x07) + 1) << 3
  return nibble & 0x07
}

function parseClick(b: Uint8Array): FpodClickFields {
  return {
    microsec: readMicrosec(b),
    ncyc: b[3],
    pkat: (b[4] & 0xf0) >> 4,
    clkIpiRange: decodeIpiRange(b[4]),
    ipiPreMax: b[5] + 1,
    ipiAtMax: b[6] + 1,
    ampAtMax: Math.max(2, b[10]),
    ampReversals: b[13] & 0x0f,
    duration: Math.floor(((b[13] & 0xf0) * 16 + b[14]) / 5),
  }
}

function parseTrain(b: Uint8Array, format: FpodHeader['format']): TrainAnnotation {
  return {
    trainId: b[15],
    species: speciesFromCode((b[14] >> 2) & 0x03, format),
    qualityLevel: b[14] & 0x03,
    echo: (b[14] & 0x20) === 0x20,
  }
}

/** Seven (IPI, SPL) pairs stored from the end of the block backwards. */
export function parseWaveChunk(b: Uint8Array): WaveformChunk {
  const samples: WaveformSample[] = []
  for (let pos = (SAMPLES_PER_CHUNK - 1) * 2; pos >= 0; pos -= 2) {
    samples.push({ ipi: b[pos + 1], spl: b[pos + 2] })
  }
  return samples
}

function parseMinute(b: Uint8Array, picVersion: number): Extract<FpodBlock, { kind: 'minute' }> {
  const legacy = picVersion < LEGACY_BATTERY_PIC_VERSION && b[11] === 0 && b[13] !== 0
  return {
    kind: 'minute',
    degC: b[7],
    bat1v: legacy ? b[12] : b[11],
    bat2v: legacy ? b[13] : b[12],
  }
}

export function parseFpodBlock(block: Uint8Array, format: FpodHeader['format'], picVersion: number): FpodBlock {
  const discriminant = block[0]
  if (discriminant < FPOD_CLICK_LIMIT) return { kind: 'click', click: parseClick(block) }
  switch (discriminant) {
    case FPOD_TRAIN: return { kind: 'train', train: parseTrain(block, format) }
    case FPOD_WAVE: return { kind: 'wave', chunk: parseWaveChunk(block) }
    case FPOD_MINUTE: return parseMinute(block, picVersion)
    default: return { kind: 'unknown', discriminant }
  }
}

/**
 * FP1/FP3 data blocks. Train and wave blocks describe the click that
 * follows them, so they wait in lookahead buffers keyed by click index.
 */
export class FpodRecordDecoder implements RecordDecoder {
  readonly family = 'fpod' as const

  private currentClick = -1
  private currentMinute = -1
  private ignoredBlocks = 0
  private readonly clicks: ClickRecord[] = []
  private readonly environment: EnvironmentalSample[] = []
  private readonly pendingTrains = new Map<number, TrainAnnotation>()
  private readonly waveforms = new WaveformAccumulator()

  constructor(private readonly header: FpodHeader) {}

  consume(block: Uint8Array): BlockOutcome {
    const parsed = parseFpodBlock(block, this.header.format, this.header.picVersion)
    const next = this.currentClick + 1

    switch (parsed.kind) {
      case 'click': {
        this.currentClick = next
        const train = this.pendingTrains.get(next) ?? NO_TRAIN
        this.pendingTrains.delete(next)
        this.clicks.push({
          ...train,
          ...parsed.click,
          minute: this.currentMinute,
          clickNo: next + 1,
          khz: 0,
          hasWav: this.waveforms.has(next + 1),
        })
        break
      }
      case 'train':
        this.pendingTrains.set(next, parsed.train)
        break
      case 'wave':
        // keyed by click number, which is index + 1
        this.waveforms.append(next + 1, parsed.chunk)
        break
      case 'minute':
        this.currentMinute++
        this.environment.push({
          minute: this.environment.length + 1,
          degC: parsed.degC,
          bat1v: parsed.bat1v,
          bat2v: parsed.bat2v,
        })
        break
      case 'unknown':
        this.ignoredBlocks++
        break
      default: {
        const unreachable: never = parsed
        return unreachable
      }
    }
    return 'continue'
  }

  finish(): DecodedRecords {
    const danglingWaveforms = this.waveforms.dropAbove(this.clicks.length)
    return {
      clicks: [...this.clicks],
      waveforms: this.waveforms.toSeries(),
      environment: [...this.environment],
      lastClick: this.currentClick,
      ignoredBlocks: this.ignoredBlocks,
      danglingTrains: this.pendingTrains.size,
      danglingWaveforms,
    }
  }
}
