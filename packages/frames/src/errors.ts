/** Malformed or incomplete frame data. Loading is rejected, never patched. */
export class DataFormatError extends Error {
  /** Dot path of the offending value, e.g. `3.players` */
  readonly path: string | undefined

  constructor(message: string, options: { path?: string; cause?: unknown } = {}) {
    super(options.path ? `${options.path}: ${message}` : message, { cause: options.cause })
    this.name = 'DataFormatError'
    this.path = options.path
  }
}

/** Direct frame access outside [0, frameCount) */
export class IndexOutOfRangeError extends Error {
  readonly index: number
  readonly count: number

  constructor(index: number, count: number) {
    super(`Frame index ${index} out of range (frame count: ${count})`)
    this.name = 'IndexOutOfRangeError'
    this.index = index
    this.count = count
  }
}
