// src/services/aggregate.ts
// Derived views over loaded records. Everything here is pure.

import type { InstitutionRecord, TopicRecord, TypeRecord } from './records'

export type CountryFilter = { kind: 'all' } | { kind: 'country'; country: string }

export const ALL_COUNTRIES: CountryFilter = { kind: 'all' }

export function countryFilter(country: string): CountryFilter {
  return { kind: 'country', country }
}

export type CountryTotal = { country: string; count: number }

export type InstitutionSummary = {
  /** Summed count per country, over every row regardless of the filter. */
  byCountry: ReadonlyMap<string, number>
  /** Same totals, largest first. */
  countries: CountryTotal[]
  /** Input rows, restricted to the filtered country. */
  institutions: InstitutionRecord[]
}

export type RankedTopic = TopicRecord & { rank: number }

export type ParetoRow = TypeRecord & { cumulative: number; cumulativePct: number }

type Counted = { count: number }

/** Largest count first. Array#sort is stable, so ties keep input order. */
export function sortByCountDesc<T extends Counted>(rows: readonly T[]): T[] {
  return [...rows].sort((a, b) => b.count - a.count)
}

/** The n largest rows, first occurrence winning ties. */
export function topN<T extends Counted>(rows: readonly T[], n: number): T[] {
  return sortByCountDesc(rows).slice(0, Math.max(0, n))
}

export function matchesFilter(row: InstitutionRecord, filter: CountryFilter): boolean {
  return filter.kind === 'all' || row.country === filter.country
}

export function summarizeInstitutions(
  records: readonly InstitutionRecord[],
  filter: CountryFilter
): InstitutionSummary {
  const byCountry = new Map<string, number>()
  for (const r of records) byCountry.set(r.country, (byCountry.get(r.country) ?? 0) + r.count)

  const countries = sortByCountDesc(Array.from(byCountry, ([country, count]) => ({ country, count })))
  const institutions = records.filter(r => matchesFilter(r, filter))
  return { byCountry, countries, institutions }
}

export function rankTopics(records: readonly TopicRecord[]): RankedTopic[] {
  return sortByCountDesc(records).map((t, i) => ({ name: t.name, count: t.count, rank: i + 1 }))
}

export function paretoView(records: readonly TypeRecord[]): ParetoRow[] {
  const sorted = sortByCountDesc(records)
  const total = sorted.reduce((s, r) => s + r.count, 0)
  let cumulative = 0
  return sorted.map(r => {
    cumulative += r.count
    return {
      name: r.name,
      count: r.count,
      cumulative,
      cumulativePct: total === 0 ? 0 : (cumulative / total) * 100,
    }
  })
}

/** Distinct countries in code-point order. */
export function countryOptions(records: readonly InstitutionRecord[]): string[] {
  return Array.from(new Set(records.map(r => r.country))).sort((a, b) => (a < b ? -1 : a > b ? 1 : 0))
}

// Long institution names only show their last word on the KPI card
export function shortLabel(name: string, max = 20): string {
  if (name.length <= max) return name
  const words = name.trim().split(/\s+/)
  return words[words.length - 1] || name
}

export type DatasetSummary = {
  institutionRows: number | null
  topicRows: number | null
  typeRows: number | null
  totalCitations: number | null
  countriesRepresented: number | null
  topInstitution: string | null
  topTopic: string | null
}

export function summarizeDataset(data: {
  institutions: readonly InstitutionRecord[] | null
  topics: readonly TopicRecord[] | null
  types: readonly TypeRecord[] | null
}): DatasetSummary {
  const { institutions, topics, types } = data
  const [bestInstitution] = institutions ? topN(institutions, 1) : []
  const [bestTopic] = topics ? topN(topics, 1) : []
  return {
    institutionRows: institutions ? institutions.length : null,
    topicRows: topics ? topics.length : null,
    typeRows: types ? types.length : null,
    totalCitations: institutions ? institutions.reduce((s, r) => s + r.count, 0) : null,
    countriesRepresented: institutions ? countryOptions(institutions).length : null,
    topInstitution: bestInstitution ? shortLabel(bestInstitution.name) : null,
    topTopic: bestTopic ? bestTopic.name : null,
  }
}
