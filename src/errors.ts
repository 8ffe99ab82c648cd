/** Thrown for an invalid vertex index or an invalid/empty priority queue access. */
export class OutOfRangeError extends RangeError {
  constructor(message: string) {
    super(message)
    this.name = 'OutOfRangeError'
  }
}

export class InvalidConfigurationError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'InvalidConfigurationError'
  }
}

/** A persisted graph that could not be parsed. `line` is 1-based. */
export class GraphFormatError extends Error {
  constructor(
    message: string,
    public readonly line: number
  ) {
    super(`line ${line}: ${message}`)
    this.name = 'GraphFormatError'
  }
}
