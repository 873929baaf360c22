import { NotFoundError } from '../services/errors'
import type { DataSource } from '../services/loader'
import type { InstitutionRecord } from '../services/records'

/** DataSource over an in-memory map of file name to contents. */
export function memorySource(files: Record<string, string>): DataSource {
  return {
    describe: file => `memory:${file}`,
    readText: async file => {
      const text = files[file]
      if (text === undefined) throw new NotFoundError(file)
      return text
    },
  }
}

export const INSTITUTIONS: InstitutionRecord[] = [
  { name: 'Alpha Institute', count: 10, country: 'France' },
  { name: 'Beta University', count: 5, country: 'Germany' },
  { name: 'Gamma College', count: 7, country: 'France' },
  { name: 'Delta Lab', count: 3, country: 'france' },
  { name: 'Epsilon School', count: 5, country: 'Spain' },
]

export const INSTITUTION_TSV = [
  'name\tcount\tcountry',
  ...INSTITUTIONS.map(r => `${r.name}\t${r.count}\t${r.country}`),
].join('\n')

export const TOPIC_TSV = 'name\tcount\nAI\t120\nBiology\t120\nPhysics\t80\n'

export const TYPE_TSV = 'name\tcount\nJournal\t50\nConference\t30\nPreprint\t20\n'
