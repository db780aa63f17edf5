import type { FpodHeader } from '../types'
import { readInt64BE, readIntBE, readText, readUintBE } from '../bytes'

export const FPOD_PIC_VERSION_OFFSET = 37
export const FPOD_FPGA_VERSION_OFFSET = 39
export const FP3_CLICKS_IN_FP1_OFFSET = 231

export function decodeFpodHeader(buf: Uint8Array, format: 'FP1' | 'FP3', filename = ''): FpodHeader {
  const fpgaVersion = readUintBE(buf, FPOD_FPGA_VERSION_OFFSET, 2)

  const header: FpodHeader = {
    family: 'fpod',
    format,
    filename,
    podId: 100 * buf[3] + buf[4],
    firstLoggedMin: readIntBE(buf, 256, 4),
    lastLoggedMin: readIntBE(buf, 260, 4),
    waterDepth: readUintBE(buf, 131, 2),
    deploymentDepth: readUintBE(buf, 129, 2),
    latText: readText(buf, 133, 11),
    lonText: readText(buf, 145, 11),
    locationText: readText(buf, 157, 30),
    notesText: readText(buf, 188, 43),
    gmtText: readText(buf, 232, 11),
    picVersion: buf[FPOD_PIC_VERSION_OFFSET],
    fpgaVersion,
    extendedAmps: fpgaVersion > 0,
  }

  // Overlaps gmtText; both are read as stored.
  if (format === 'FP3') {
    header.clicksInFp1 = readInt64BE(buf, FP3_CLICKS_IN_FP1_OFFSET)
  }
  return header
}
