import type { ClickRecord, DecodedDataset, EnvironmentalSample, FileHeader, WaveformSeries } from './decoder/types'
import { flattenWaveforms, type WaveformRow } from './decoder/waveform'
import type { PodSettings } from '../stores/settingsStore'

export type TableOptions = Pick<PodSettings, 'utcOffsetMinutes' | 'simplify' | 'trimWaveforms'>

const DETAIL_COLUMNS = ['clkIpiRange', 'ipiPreMax', 'ipiAtMax', 'ampReversals', 'duration'] as const
type DetailColumn = typeof DETAIL_COLUMNS[number]

export interface ClickRow extends ClickRecord {
  time: Date
}

/** Detail columns are absent when the tables were built with `simplify`. */
export type PodClickRow = Omit<ClickRow, DetailColumn> & Partial<Pick<ClickRow, DetailColumn>>

export interface PodTables {
  header: FileHeader
  clicks: PodClickRow[]
  wav: WaveformRow[]
  env: EnvironmentalSample[]
}

const EPOCH_1900_MS = Date.UTC(1900, 0, 1)
const MS_PER_MINUTE = 60_000

// FPGA builds after 801 time the peak cycle itself rather than the one before it.
const FPGA_IPI_AT_MAX_VERSION = 801

/**
 * Wall-clock time of a click. `Date` holds whole milliseconds, so the
 * sub-millisecond part is truncated; `microsec` on the row keeps it.
 */
export function clickTime(firstLoggedMin: number, minute: number, microsec: number, utcOffsetMinutes = 0): Date {
  return new Date(EPOCH_1900_MS + (firstLoggedMin + minute - utcOffsetMinutes) * MS_PER_MINUTE + microsec / 1000)
}

/** Peak frequency in kHz from an inter-peak interval in 250 ns units. */
export function khzFromIpi(ipi: number): number {
  return ipi > 0 ? Math.round(4000 / ipi) : 0
}

function simplifyClick(row: ClickRow): PodClickRow {
  const simplified: PodClickRow = { ...row }
  for (const column of DETAIL_COLUMNS) delete simplified[column]
  return simplified
}

/** Keeps each click's last `ncyc` samples of the flattened waveform. */
export function trimWaveforms(series: readonly WaveformSeries[], clicks: readonly ClickRecord[]): WaveformRow[] {
  const rows: WaveformRow[] = []
  for (const s of series) {
    const click = clicks[s.clickNo - 1]
    if (!click) continue
    const flat = flattenWaveforms([s])
    rows.push(...flat.slice(Math.max(0, flat.length - click.ncyc)))
  }
  return rows
}

export function toPodTables(dataset: DecodedDataset, options: TableOptions): PodTables {
  const { header } = dataset
  const localIpi = (c: ClickRecord): number =>
    header.family === 'fpod' && header.fpgaVersion > FPGA_IPI_AT_MAX_VERSION ? c.ipiAtMax : c.ipiPreMax

  const rows: ClickRow[] = dataset.clicks.map((c) => ({
    ...c,
    time: clickTime(header.firstLoggedMin, c.minute, c.microsec, options.utcOffsetMinutes),
    khz: header.family === 'fpod' ? khzFromIpi(localIpi(c)) : c.khz,
  }))

  return {
    header,
    clicks: options.simplify ? rows.map(simplifyClick) : rows,
    wav: options.trimWaveforms
      ? trimWaveforms(dataset.waveforms, dataset.clicks)
      : flattenWaveforms(dataset.waveforms),
    env: dataset.environment.map((e) => ({ ...e })),
  }
}
