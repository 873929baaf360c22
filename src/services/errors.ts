// src/services/errors.ts
// Failures raised while reading or parsing a data file.

export type DataErrorKind = 'NotFound' | 'Schema' | 'MalformedRow' | 'Type' | 'Read'

export abstract class DataFileError extends Error {
  abstract readonly kind: DataErrorKind

  constructor(readonly file: string, message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = new.target.name
  }
}

export class NotFoundError extends DataFileError {
  readonly kind = 'NotFound' as const

  constructor(file: string) {
    super(file, `${file}: file not found`)
  }
}

export class SchemaError extends DataFileError {
  readonly kind = 'Schema' as const

  constructor(
    file: string,
    readonly expected: readonly string[],
    readonly actual: readonly string[]
  ) {
    super(file, `${file}: expected columns [${expected.join(', ')}], got [${actual.join(', ')}]`)
  }
}

export class MalformedRowError extends DataFileError {
  readonly kind = 'MalformedRow' as const

  constructor(file: string, readonly line: number, detail: string) {
    super(file, `${file}, line ${line}: ${detail}`)
  }
}

/** A count field that is not a non-negative integer. */
export class CountTypeError extends DataFileError {
  readonly kind = 'Type' as const

  constructor(file: string, readonly line: number, readonly column: string, readonly value: string) {
    super(file, `${file}, line ${line}: "${column}" must be a non-negative integer, got "${value}"`)
  }
}

export class ReadError extends DataFileError {
  readonly kind = 'Read' as const

  constructor(file: string, detail: string, options?: ErrorOptions) {
    super(file, `${file}: ${detail}`, options)
  }
}

export function isDataFileError(err: unknown): err is DataFileError {
  return err instanceof DataFileError
}

/** Anything thrown while loading `file`, as a DataFileError. */
export function toDataFileError(err: unknown, file: string): DataFileError {
  if (isDataFileError(err)) return err
  const detail = err instanceof Error ? err.message : String(err)
  return new ReadError(file, detail || 'read failed', { cause: err })
}

const HEADINGS: Record<DataErrorKind, string> = {
  NotFound: 'Data file missing',
  Schema: 'Unexpected columns',
  MalformedRow: 'Malformed row',
  Type: 'Invalid count',
  Read: 'Could not read data',
}

/** Short heading + message pair for the section error banner. */
export function describeError(err: DataFileError): { heading: string; message: string } {
  return { heading: HEADINGS[err.kind], message: err.message }
}
