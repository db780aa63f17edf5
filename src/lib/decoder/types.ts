export type FormatTag = 'CP1' | 'CP3' | 'FP1' | 'FP3'

export type DeviceFamily = 'cpod' | 'fpod'

export interface FormatLayout {
  tag: FormatTag
  family: DeviceFamily
  headerSize: number      // bytes in the fixed header block
  recordSize: number      // bytes in every data block
  hasTrains: boolean      // click-train classification present
  description: string
}

export type SpeciesGroup = 'NBHF' | 'OtherCet' | 'Unclassed' | 'Sonar' | ''

interface HeaderBase {
  filename: string
  firstLoggedMin: number  // int32, minutes since 1900-01-01
  lastLoggedMin: number
  waterDepth: number
  deploymentDepth: number
  latText: string         // fixed-width, untrimmed
  lonText: string
  locationText: string
  notesText: string
}

export interface CpodHeader extends HeaderBase {
  family: 'cpod'
  format: 'CP1' | 'CP3'
  podId: string
  clicksInCp1?: number    // CP3 only
}

export interface FpodHeader extends HeaderBase {
  family: 'fpod'
  format: 'FP1' | 'FP3'
  podId: number
  gmtText: string
  picVersion: number
  fpgaVersion: number
  extendedAmps: boolean
  clicksInFp1?: bigint    // FP3 only
}

export type FileHeader = CpodHeader | FpodHeader

export interface TrainAnnotation {
  trainId: number
  species: SpeciesGroup
  qualityLevel: number    // 0..3
  echo: boolean
}

export interface ClickRecord extends TrainAnnotation {
  minute: number          // -1 before the first minute marker
  microsec: number
  clickNo: number         // 1-based, contiguous
  ncyc: number
  pkat: number
  clkIpiRange: number
  ipiPreMax: number
  ipiAtMax: number
  khz: number
  ampAtMax: number
  ampReversals: number
  duration: number | null // CPOD: cycles per kHz, FPOD: duration code
  hasWav: boolean
}

export interface WaveformSample {
  ipi: number
  spl: number
}

export type WaveformChunk = readonly WaveformSample[]

export interface WaveformSeries {
  clickNo: number
  chunks: WaveformChunk[] // insertion order
}

export interface EnvironmentalSample {
  minute: number          // 1-based
  degC: number
  bat1v: number           // 10 mV units
  bat2v: number
}

export interface DecodeStats {
  capacity: number        // upper bound on data blocks in the source
  blocksRead: number      // full blocks handed to the record decoder
  ignoredBlocks: number   // blocks with an unrecognised discriminant
  trailingBytes: number   // size of a short final read
  danglingTrains: number
  danglingWaveforms: number
}

/** Output of a single record decoder run. */
export interface DecodedRecords {
  clicks: ClickRecord[]
  waveforms: WaveformSeries[]
  environment: EnvironmentalSample[]
  lastClick: number       // index of the last reported click, negative when none
  ignoredBlocks: number
  danglingTrains: number
  danglingWaveforms: number
}

export interface DecodedDataset<H extends FileHeader = FileHeader> {
  format: FormatLayout
  header: H
  clicks: ClickRecord[]
  waveforms: WaveformSeries[]
  environment: EnvironmentalSample[]
  lastClick: number
  stats: DecodeStats
}

export type BlockOutcome = 'continue' | 'stop'

export interface RecordDecoder {
  family: DeviceFamily
  consume(block: Uint8Array): BlockOutcome
  finish(): DecodedRecords
}

/** Sequential reader over a finite byte stream. */
export interface ByteSource {
  readonly name: string
  readonly extension: string
  readonly size: number
  read(target: Uint8Array): number  // bytes obtained; fewer than requested only at end of stream
}
