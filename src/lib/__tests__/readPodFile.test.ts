import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { decodePodFile, readPodFile } from '../readPodFile'
import { podSettingsStore } from '../../stores/settingsStore'
import { concat, fpodClick, fpodMinute, fpodTrain, fpodWave, makeFpodHeader, thrownBy } from '../decoder/__tests__/builders'

describe('readPodFile', () => {
  let dir: string

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'pod-reader-'))
  })

  afterEach(() => {
    podSettingsStore.getState().reset()
    vi.restoreAllMocks()
    rmSync(dir, { recursive: true, force: true })
  })

  function writePod(name: string, data: Uint8Array): string {
    const path = join(dir, name)
    writeFileSync(path, data)
    return path
  }

  it('reads a file into tables', () => {
    const path = writePod('site.fp3', concat(makeFpodHeader(), fpodMinute(14, 40, 41, 0), fpodClick()))
    const tables = readPodFile(path)

    expect(tables.header).toMatchObject({ format: 'FP3', filename: 'site.fp3', podId: 1234 })
    expect(tables.clicks).toHaveLength(1)
    expect(tables.clicks[0].ncyc).toBe(12)
    expect('duration' in tables.clicks[0]).toBe(false)
    expect(tables.env).toHaveLength(1)
  })

  it('warns about a trailing partial record', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})
    const path = writePod('tail.FP1', concat(makeFpodHeader(), fpodClick(), new Uint8Array(5)))

    expect(readPodFile(path).clicks).toHaveLength(1)
    expect(warn).toHaveBeenCalledTimes(1)
    expect(warn).toHaveBeenCalledWith('tail.FP1: ignoring 5 trailing bytes (incomplete 16-byte record)')
  })

  it('warns about discarded annotations', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})
    const path = writePod('dangling.FP3', concat(makeFpodHeader(), fpodClick(), fpodTrain(1, 0)))

    readPodFile(path)
    expect(warn).toHaveBeenCalledWith('dangling.FP3: discarded 1 annotation(s) for a click that was never recorded')
  })

  it('stays quiet when configured', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})
    const path = writePod('tail.FP1', concat(makeFpodHeader(), fpodClick(), new Uint8Array(5)))

    podSettingsStore.getState().setOptions({ quiet: true })
    readPodFile(path)
    readPodFile(path, { quiet: true })
    expect(warn).not.toHaveBeenCalled()
  })

  it('takes defaults from the settings store and lets overrides win', () => {
    const path = writePod('site.FP1', concat(makeFpodHeader(), fpodClick()))

    podSettingsStore.getState().setOptions({ simplify: false })
    expect(readPodFile(path).clicks[0].duration).toBe(104)
    expect('duration' in readPodFile(path, { simplify: true }).clicks[0]).toBe(false)
  })

  it('ignores overrides left undefined', () => {
    const path = writePod('wave.FP1', concat(makeFpodHeader(), fpodWave(), fpodClick({ ncyc: 3 })))
    expect(readPodFile(path, { trimWaveforms: undefined }).wav).toHaveLength(3)
  })

  it('reports unreadable files', () => {
    expect(thrownBy(() => readPodFile(join(dir, 'missing.FP1')))).toMatchObject({
      name: 'PodFileError',
      code: 'UNREADABLE',
      filename: 'missing.FP1',
      message: 'Unable to open file missing.FP1',
    })
  })

  it('rejects files with an unknown extension', () => {
    const path = writePod('notes.txt', new Uint8Array(2048))
    expect(thrownBy(() => decodePodFile(path))).toMatchObject({ code: 'UNKNOWN_FORMAT' })
  })
})
