import { describe, it, expect } from 'vitest'
import { extensionOf, resolveFormat, supportedFormats } from '../registry'
import { PodFileError } from '../errors'
import { thrownBy } from './builders'

describe('resolveFormat', () => {
  it.each([
    { tag: 'CP1', family: 'cpod', headerSize: 360, recordSize: 10 },
    { tag: 'CP3', family: 'cpod', headerSize: 720, recordSize: 40 },
    { tag: 'FP1', family: 'fpod', headerSize: 1024, recordSize: 16 },
    { tag: 'FP3', family: 'fpod', headerSize: 1024, recordSize: 16 },
  ])('$tag uses the $family layout', (expected) => {
    expect(resolveFormat(expected.tag)).toMatchObject(expected)
  })

  it('returns the registered layout for a tag', () => {
    expect(resolveFormat('cp3')).toBe(resolveFormat('CP3'))
    expect(supportedFormats()).toContain(resolveFormat('.FP1'))
  })

  it('normalizes case and a leading dot', () => {
    expect(resolveFormat('.fp3').tag).toBe('FP3')
    expect(resolveFormat('cp1').tag).toBe('CP1')
  })

  it('rejects unknown tags', () => {
    expect(() => resolveFormat('WAV')).toThrow(PodFileError)
    expect(() => resolveFormat('WAV')).toThrow('Unknown file type: WAV')
    expect(thrownBy(() => resolveFormat(''))).toMatchObject({
      name: 'PodFileError',
      code: 'UNKNOWN_FORMAT',
      message: 'Unknown file type: (none)',
    })
  })

  it('marks only the third-stage variants as carrying trains', () => {
    expect(supportedFormats().filter((f) => f.hasTrains).map((f) => f.tag)).toEqual(['CP3', 'FP3'])
  })
})

describe('extensionOf', () => {
  it('returns the upper-cased extension', () => {
    expect(extensionOf('/data/site 4/helga period 1.fp3')).toBe('FP3')
    expect(extensionOf('C:\\pods\\deploy.v2.CP1')).toBe('CP1')
  })

  it('returns empty string without an extension', () => {
    expect(extensionOf('/data/fp3/readme')).toBe('')
  })
})
