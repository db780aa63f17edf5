export { decodePodSource, decodePodBytes } from './pipeline'
export { resolveFormat, supportedFormats, extensionOf } from './registry'
export { BufferByteSource, FileByteSource } from './byteSource'
export { PodFileError } from './errors'
export type { PodFileErrorCode } from './errors'
export { speciesFromCode } from './species'
export { WaveformAccumulator, flattenWaveforms, SAMPLES_PER_CHUNK } from './waveform'
export type { WaveformRow } from './waveform'
export { readIntBE, readUintBE, readInt64BE, readText } from './bytes'
export type {
  ByteSource,
  ClickRecord,
  CpodHeader,
  DecodedDataset,
  DecodeStats,
  DeviceFamily,
  EnvironmentalSample,
  FileHeader,
  FormatLayout,
  FormatTag,
  FpodHeader,
  SpeciesGroup,
  TrainAnnotation,
  WaveformChunk,
  WaveformSample,
  WaveformSeries,
} from './types'
