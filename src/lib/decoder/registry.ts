import type { FormatLayout } from './types'
import { PodFileError } from './errors'

const FORMATS = new Map<string, FormatLayout>([
  ['CP1', { tag: 'CP1', family: 'cpod', headerSize: 360, recordSize: 10, hasTrains: false, description: 'CPOD clicks' }],
  ['CP3', { tag: 'CP3', family: 'cpod', headerSize: 720, recordSize: 40, hasTrains: true, description: 'CPOD classified trains' }],
  ['FP1', { tag: 'FP1', family: 'fpod', headerSize: 1024, recordSize: 16, hasTrains: false, description: 'FPOD clicks' }],
  ['FP3', { tag: 'FP3', family: 'fpod', headerSize: 1024, recordSize: 16, hasTrains: true, description: 'FPOD classified trains' }],
])

/** Upper-cased extension without the dot, '' when the name has none. */
export function extensionOf(filename: string): string {
  const base = filename.slice(Math.max(filename.lastIndexOf('/'), filename.lastIndexOf('\\')) + 1)
  const dot = base.lastIndexOf('.')
  return dot < 0 ? '' : base.slice(dot + 1).toUpperCase()
}

export function resolveFormat(tag: string): FormatLayout {
  const normalized = tag.replace(/^\./, '').toUpperCase()
  const layout = FORMATS.get(normalized)
  if (!layout) {
    throw new PodFileError('UNKNOWN_FORMAT', `Unknown file type: ${normalized || '(none)'}`)
  }
  return layout
}

export function supportedFormats(): FormatLayout[] {
  return [...FORMATS.values()]
}
