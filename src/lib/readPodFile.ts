import { FileByteSource } from './decoder/byteSource'
import { decodePodSource } from './decoder/pipeline'
import type { DecodedDataset } from './decoder/types'
import { toPodTables, type PodTables } from './tables'
import { currentPodSettings, type PodSettings } from '../stores/settingsStore'

function warnings(dataset: DecodedDataset): string[] {
  const { stats, header } = dataset
  const out: string[] = []
  if (stats.trailingBytes > 0) {
    out.push(`${header.filename}: ignoring ${stats.trailingBytes} trailing bytes (incomplete ${dataset.format.recordSize}-byte record)`)
  }
  const dangling = stats.danglingTrains + stats.danglingWaveforms
  if (dangling > 0) {
    out.push(`${header.filename}: discarded ${dangling} annotation(s) for a click that was never recorded`)
  }
  return out
}

export function decodePodFile(path: string): DecodedDataset {
  const source = new FileByteSource(path)
  try {
    return decodePodSource(source)
  } finally {
    source.close()
  }
}

/**
 * Reads a CP1, CP3, FP1 or FP3 file into click, waveform and
 * environment tables. Options not given fall back to `podSettingsStore`.
 */
export function readPodFile(path: string, overrides: Partial<PodSettings> = {}): PodTables {
  const settings = currentPodSettings(overrides)
  const dataset = decodePodFile(path)

  if (!settings.quiet) {
    for (const message of warnings(dataset)) console.warn(message)
  }
  return toPodTables(dataset, settings)
}
