import type { CpodHeader } from '../types'
import { readIntBE, readText, readUintBE } from '../bytes'

export const CPOD_POD_ID_OFFSET = 164
export const CP3_CLICKS_IN_CP1_OFFSET = 128

export function decodeCpodHeader(buf: Uint8Array, format: 'CP1' | 'CP3', filename = ''): CpodHeader {
  const header: CpodHeader = {
    family: 'cpod',
    format,
    filename,
    podId: readText(buf, CPOD_POD_ID_OFFSET, 4),
    firstLoggedMin: readIntBE(buf, 256, 4),
    lastLoggedMin: readIntBE(buf, 260, 4),
    waterDepth: readUintBE(buf, 31, 2),
    deploymentDepth: readUintBE(buf, 29, 2),
    latText: readText(buf, 13, 8),
    lonText: readText(buf, 21, 8),
    locationText: readText(buf, 33, 31),
    notesText: readText(buf, 211, 50),
  }

  if (format === 'CP3') {
    header.clicksInCp1 = readUintBE(buf, CP3_CLICKS_IN_CP1_OFFSET, 4)
  }
  return header
}
