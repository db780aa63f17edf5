import type { ByteSource, DecodedDataset, FileHeader, FormatLayout, RecordDecoder } from './types'
import { PodFileError } from './errors'
import { BufferByteSource } from './byteSource'
import { resolveFormat } from './registry'
import { decodeCpodHeader } from './builtins/cpodHeaderDecoder'
import { decodeFpodHeader } from './builtins/fpodHeaderDecoder'
import { CpodRecordDecoder } from './builtins/cpodRecordDecoder'
import { FpodRecordDecoder } from './builtins/fpodRecordDecoder'

function decodeHeader(buf: Uint8Array, format: FormatLayout, filename: string): { header: FileHeader; decoder: RecordDecoder } {
  switch (format.tag) {
    case 'CP1':
    case 'CP3': {
      const header = decodeCpodHeader(buf, format.tag, filename)
      return { header, decoder: new CpodRecordDecoder(header) }
    }
    case 'FP1':
    case 'FP3': {
      const header = decodeFpodHeader(buf, format.tag, filename)
      return { header, decoder: new FpodRecordDecoder(header) }
    }
  }
}

/**
 * Decodes a whole CP1/CP3/FP1/FP3 stream. Reading stops at the first short
 * read or when the record decoder sees the end-of-data marker.
 */
export function decodePodSource(source: ByteSource): DecodedDataset {
  const format = resolveFormat(source.extension)

  const headerBuf = new Uint8Array(format.headerSize)
  const got = source.read(headerBuf)
  if (got < format.headerSize) {
    throw new PodFileError(
      'HEADER_TRUNCATED',
      `Unable to read from file ${source.name}: header needs ${format.headerSize} bytes, got ${got}`,
      { filename: source.name },
    )
  }

  const { header, decoder } = decodeHeader(headerBuf, format, source.name)
  const capacity = Math.max(0, Math.floor((source.size - format.headerSize) / format.recordSize))

  const block = new Uint8Array(format.recordSize)
  let blocksRead = 0
  let trailingBytes = 0

  for (;;) {
    const n = source.read(block)
    if (n < format.recordSize) {
      trailingBytes = n
      break
    }
    blocksRead++
    if (decoder.consume(block) === 'stop') break
  }

  const records = decoder.finish()
  return {
    format,
    header,
    clicks: records.clicks,
    waveforms: records.waveforms,
    environment: records.environment,
    lastClick: records.lastClick,
    stats: {
      capacity,
      blocksRead,
      ignoredBlocks: records.ignoredBlocks,
      trailingBytes,
      danglingTrains: records.danglingTrains,
      danglingWaveforms: records.danglingWaveforms,
    },
  }
}

export function decodePodBytes(data: Uint8Array, filename: string): DecodedDataset {
  return decodePodSource(new BufferByteSource(data, filename))
}
