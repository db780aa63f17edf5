import { closeSync, fstatSync, openSync, readSync } from 'node:fs'
import { basename } from 'node:path'
import type { ByteSource } from './types'
import { PodFileError } from './errors'
import { extensionOf } from './registry'

export class BufferByteSource implements ByteSource {
  readonly extension: string
  private pos = 0

  constructor(private readonly data: Uint8Array, readonly name: string) {
    this.extension = extensionOf(name)
  }

  get size(): number {
    return this.data.length
  }

  /** Bytes handed out so far. */
  get position(): number {
    return this.pos
  }

  read(target: Uint8Array): number {
    const n = Math.min(target.length, this.data.length - this.pos)
    target.set(this.data.subarray(this.pos, this.pos + n))
    this.pos += n
    return n
  }
}

function openForReading(path: string, name: string): { fd: number; size: number } {
  let fd: number | undefined
  try {
    fd = openSync(path, 'r')
    return { fd, size: fstatSync(fd).size }
  } catch (err) {
    if (fd !== undefined) closeSync(fd)
    throw new PodFileError('UNREADABLE', `Unable to open file ${name}`, { filename: name, cause: err })
  }
}

export class FileByteSource implements ByteSource {
  readonly name: string
  readonly extension: string
  readonly size: number
  private fd: number | null

  constructor(path: string) {
    this.name = basename(path)
    this.extension = extensionOf(path)
    const { fd, size } = openForReading(path, this.name)
    this.fd = fd
    this.size = size
  }

  read(target: Uint8Array): number {
    if (this.fd === null) throw new PodFileError('UNREADABLE', `File ${this.name} is closed`, { filename: this.name })
    let filled = 0
    while (filled < target.length) {
      let n: number
      try {
        n = readSync(this.fd, target, filled, target.length - filled, null)
      } catch (err) {
        throw new PodFileError('UNREADABLE', `Unable to read from file ${this.name}`, { filename: this.name, cause: err })
      }
      if (n === 0) break
      filled += n
    }
    return filled
  }

  close(): void {
    if (this.fd === null) return
    closeSync(this.fd)
    this.fd = null
  }
}
