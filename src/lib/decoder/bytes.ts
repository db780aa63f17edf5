function fits(buf: Uint8Array, offset: number, size: number): boolean {
  return offset >= 0 && offset + size <= buf.length
}

/**
 * Big-endian integer of up to four bytes, most significant byte first.
 * Four-byte fields come out as signed 32-bit values. Reads past the end
 * of the buffer yield 0.
 */
export function readIntBE(buf: Uint8Array, offset: number, size: number): number {
  if (size > 4) throw new RangeError(`readIntBE supports at most 4 bytes, got ${size}`)
  if (!fits(buf, offset, size)) return 0
  let res = 0
  for (let i = 0; i < size; i++) {
    res = (res << 8) | buf[offset + i]
  }
  return res
}

export function readUintBE(buf: Uint8Array, offset: number, size: number): number {
  return readIntBE(buf, offset, size) >>> 0
}

/** Signed 64-bit big-endian field. */
export function readInt64BE(buf: Uint8Array, offset: number): bigint {
  if (!fits(buf, offset, 8)) return 0n
  let res = 0n
  for (let i = 0; i < 8; i++) {
    res = (res << 8n) | BigInt(buf[offset + i])
  }
  return BigInt.asIntN(64, res)
}

/** Copies a fixed-width byte range verbatim, one char per byte (latin1). */
export function readText(buf: Uint8Array, offset: number, length: number): string {
  return String.fromCharCode(...buf.subarray(offset, offset + length))
}

export function countByte(buf: Uint8Array, value: number): number {
  let n = 0
  for (const b of buf) {
    if (b === value) n++
  }
  return n
}
