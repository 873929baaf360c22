// src/services/loader.ts
// Reads a data file from a source and parses it against a schema.

import { toDataFileError } from './errors'
import { fetchText, type FetchTextOptions } from './http'
import { parseRecords, type RecordSchema } from './records'

/** Where data files come from. */
export interface DataSource {
  /** Human-readable location of `file`, used in error messages. */
  describe(file: string): string
  readText(file: string): Promise<string>
}

/** Files served next to the app, e.g. Vite's publicDir. */
export function httpSource(baseUrl: string, opt: Omit<FetchTextOptions, 'label'> = {}): DataSource {
  const root = baseUrl.endsWith('/') ? baseUrl : `${baseUrl}/`
  return {
    describe: file => `${root}${file}`,
    readText: file => fetchText(`${root}${encodeURIComponent(file)}`, { ...opt, label: file }),
  }
}

/**
 * Load every record of `schema.file` or fail with a DataFileError.
 * No partial results: the first bad row aborts the load.
 */
export async function loadRecords<T>(source: DataSource, schema: RecordSchema<T>): Promise<T[]> {
  try {
    const text = await source.readText(schema.file)
    return parseRecords(text, schema)
  } catch (err) {
    throw toDataFileError(err, schema.file)
  }
}
