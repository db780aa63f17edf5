import type { WaveformChunk, WaveformSeries } from './types'

export const SAMPLES_PER_CHUNK = 7

export interface WaveformRow {
  clickNo: number
  ipi: number
  spl: number
}

/**
 * Collects pseudo-waveform chunks per click. Chunks arrive newest-cycle
 * first, so flattening walks each click's chunks in reverse.
 */
export class WaveformAccumulator {
  private series = new Map<number, WaveformSeries>()

  has(clickNo: number): boolean {
    return this.series.has(clickNo)
  }

  /** Appends a chunk, opening the click's series on first use. Returns true when a series was opened. */
  append(clickNo: number, chunk: WaveformChunk): boolean {
    const existing = this.series.get(clickNo)
    if (existing) {
      existing.chunks.push(chunk)
      return false
    }
    this.series.set(clickNo, { clickNo, chunks: [chunk] })
    return true
  }

  /** Removes series for clicks numbered above maxClickNo, returning how many were dropped. */
  dropAbove(maxClickNo: number): number {
    let dropped = 0
    for (const clickNo of [...this.series.keys()]) {
      if (clickNo > maxClickNo) {
        this.series.delete(clickNo)
        dropped++
      }
    }
    return dropped
  }

  toSeries(): WaveformSeries[] {
    return [...this.series.values()].map((s) => ({ clickNo: s.clickNo, chunks: [...s.chunks] }))
  }
}

export function flattenWaveforms(series: readonly WaveformSeries[]): WaveformRow[] {
  const rows: WaveformRow[] = []
  for (const s of series) {
    for (let c = s.chunks.length - 1; c >= 0; c--) {
      for (const sample of s.chunks[c]) {
        rows.push({ clickNo: s.clickNo, ipi: sample.ipi, spl: sample.spl })
      }
    }
  }
  return rows
}
