export type PodFileErrorCode = 'UNKNOWN_FORMAT' | 'UNREADABLE' | 'HEADER_TRUNCATED'

export class PodFileError extends Error {
  readonly code: PodFileErrorCode
  readonly filename?: string

  constructor(code: PodFileErrorCode, message: string, options?: { filename?: string; cause?: unknown }) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined)
    this.name = 'PodFileError'
    this.code = code
    this.filename = options?.filename
  }
}
