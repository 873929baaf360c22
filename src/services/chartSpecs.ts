// src/services/chartSpecs.ts
// Maps records and derived views to renderer-agnostic chart specs.
// Same input, same output: nothing here reads the clock or the DOM.

import {
  paretoView,
  rankTopics,
  sortByCountDesc,
  summarizeInstitutions,
  topN,
  type CountryFilter,
} from './aggregate'
import type { ColorScaleName, PaletteName } from './palettes'
import type { InstitutionRecord, TopicRecord, TypeRecord } from './records'

export type ChartKind = 'bar' | 'horizontal-bar' | 'pie' | 'donut' | 'treemap' | 'bubble' | 'pareto'

export type ChartDatum = Record<string, string | number>

/** Which datum field drives each visual channel. */
export type ChartEncoding = {
  x?: string
  y?: string
  /** Secondary value axis (pareto line). */
  y2?: string
  color?: string
  /** Bubble area, slice value or treemap tile area. */
  size?: string
  label?: string
  /** Treemap hierarchy, outermost level first. */
  path?: string[]
  tooltip?: string[]
}

export type ChartAxes = { x?: string; y?: string; y2?: string }

export type ChartOptions = {
  height: number
  palette?: PaletteName
  colorScale?: ColorScaleName
  /** Inner radius as a fraction of the outer one. */
  hole?: number
  /** Per-slice offset as a fraction of the radius. */
  pull?: number[]
  textInfo?: Array<'label' | 'percent'>
  textPosition?: 'inside' | 'outside'
  sizeMax?: number
  y2Range?: [number, number]
  barColor?: string
  barOpacity?: number
  lineColor?: string
  showLegend?: boolean
}

export type ChartSpec = {
  id: string
  kind: ChartKind
  title: string
  data: ChartDatum[]
  encoding: ChartEncoding
  axes: ChartAxes
  options: ChartOptions
}

export type TableColumn = { key: string; label: string; format?: 'int' | 'percent' }
export type TableSpec = { columns: TableColumn[]; rows: ChartDatum[] }

export type SectionView = { charts: ChartSpec[]; table: TableSpec }

export type DisplayLimits = { institutions: number; topics: number }

export const DEFAULT_LIMITS: DisplayLimits = { institutions: 15, topics: 12 }

/** Countries shown in the country pie. */
export const COUNTRY_SLICES = 12

/** Keep a top-N limit inside [1, rows]; 0 only when there are no rows. */
export function clampLimit(limit: number, rows: number): number {
  if (rows <= 0) return 0
  const n = Number.isFinite(limit) ? Math.trunc(limit) : rows
  return Math.min(rows, Math.max(1, n))
}

const CITATIONS = 'Citations'

export function buildInstitutionView(
  records: readonly InstitutionRecord[],
  filter: CountryFilter,
  limit: number
): SectionView {
  const summary = summarizeInstitutions(records, filter)
  const top = topN(summary.institutions, clampLimit(limit, summary.institutions.length))
  const topData = top.map(r => ({ name: r.name, count: r.count, country: r.country }))

  const charts: ChartSpec[] = [
    {
      id: 'institutions-top',
      kind: 'horizontal-bar',
      title: 'Top Institutions by Citation Count',
      data: topData,
      encoding: { x: 'count', y: 'name', color: 'count', label: 'count', tooltip: ['country'] },
      axes: { x: CITATIONS },
      options: { height: 420, colorScale: 'Blues' },
    },
    {
      id: 'institutions-countries',
      kind: 'pie',
      title: 'Citations by Country',
      data: summary.countries.slice(0, COUNTRY_SLICES).map(c => ({ country: c.country, count: c.count })),
      encoding: { label: 'country', size: 'count' },
      axes: {},
      options: { height: 420, hole: 0.45, palette: 'Blues', textInfo: ['percent', 'label'], textPosition: 'inside' },
    },
    {
      id: 'institutions-treemap',
      kind: 'treemap',
      title: 'Institution Treemap',
      data: topData,
      encoding: { path: ['country', 'name'], size: 'count', color: 'count' },
      axes: {},
      options: { height: 350, colorScale: 'Blues' },
    },
  ]

  return {
    charts,
    table: {
      columns: [
        { key: 'name', label: 'Institution' },
        { key: 'count', label: 'Count', format: 'int' },
        { key: 'country', label: 'Country' },
      ],
      rows: sortByCountDesc(summary.institutions).map(r => ({ name: r.name, count: r.count, country: r.country })),
    },
  }
}

export function buildTopicView(records: readonly TopicRecord[], limit: number): SectionView {
  const ranked = rankTopics(records)
  const top = ranked.slice(0, clampLimit(limit, ranked.length)).map(t => ({ name: t.name, count: t.count }))

  const charts: ChartSpec[] = [
    {
      id: 'topics-distribution',
      kind: 'pie',
      title: 'Topic Distribution',
      data: top,
      encoding: { label: 'name', size: 'count' },
      axes: {},
      options: { height: 400, hole: 0.4, palette: 'Pastel', textInfo: ['percent', 'label'], textPosition: 'inside' },
    },
    {
      id: 'topics-ranking',
      kind: 'horizontal-bar',
      title: 'Topic Ranking',
      data: top,
      encoding: { x: 'count', y: 'name', color: 'count', label: 'count' },
      axes: { x: CITATIONS },
      options: { height: 400, colorScale: 'Teal' },
    },
    {
      id: 'topics-bubble',
      kind: 'bubble',
      title: 'Topic Bubble Chart',
      data: ranked.map(t => ({ name: t.name, count: t.count, rank: t.rank })),
      encoding: { x: 'rank', size: 'count', label: 'name', color: 'count' },
      axes: {},
      options: { height: 280, colorScale: 'Teal', sizeMax: 80 },
    },
  ]

  return {
    charts,
    table: {
      columns: [
        { key: 'rank', label: 'Rank', format: 'int' },
        { key: 'name', label: 'Topic' },
        { key: 'count', label: 'Count', format: 'int' },
      ],
      rows: ranked.map(t => ({ rank: t.rank, name: t.name, count: t.count })),
    },
  }
}

export function buildTypeView(records: readonly TypeRecord[]): SectionView {
  const pareto = paretoView(records)

  const charts: ChartSpec[] = [
    {
      id: 'types-breakdown',
      kind: 'donut',
      title: 'Publication Type Breakdown',
      data: records.map(r => ({ name: r.name, count: r.count })),
      encoding: { label: 'name', size: 'count' },
      axes: {},
      options: {
        height: 420,
        hole: 0.5,
        palette: 'Set3',
        // the first row of the file stands out
        pull: records.map((_, i) => (i === 0 ? 0.05 : 0)),
        textInfo: ['label', 'percent'],
        textPosition: 'outside',
      },
    },
    {
      id: 'types-volume',
      kind: 'horizontal-bar',
      title: 'Citation Volume by Type',
      data: pareto.map(r => ({ name: r.name, count: r.count })),
      encoding: { x: 'count', y: 'name', color: 'count', label: 'count' },
      axes: { x: CITATIONS },
      options: { height: 420, colorScale: 'Purples' },
    },
    {
      id: 'types-cumulative',
      kind: 'pareto',
      title: 'Cumulative Share',
      data: pareto.map(r => ({ name: r.name, count: r.count, cumulativePct: r.cumulativePct })),
      encoding: { x: 'name', y: 'count', y2: 'cumulativePct' },
      axes: { y: 'Count', y2: 'Cumulative %' },
      options: {
        height: 320,
        barColor: '#7c9ffc',
        barOpacity: 0.7,
        lineColor: '#f38ba8',
        y2Range: [0, 105],
        showLegend: true,
      },
    },
  ]

  return {
    charts,
    table: {
      columns: [
        { key: 'name', label: 'Type' },
        { key: 'count', label: 'Count', format: 'int' },
        { key: 'cumulativePct', label: 'Cumulative %', format: 'percent' },
      ],
      rows: pareto.map(r => ({ name: r.name, count: r.count, cumulativePct: r.cumulativePct })),
    },
  }
}
