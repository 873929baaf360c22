import type { TableColumn } from '../services/chartSpecs'

export function fmtInt(v: number | null | undefined) {
  return typeof v === 'number' ? v.toLocaleString('en-US') : '—'
}

export function fmtPct(v: number) {
  return `${v.toFixed(1)}%`
}

export function fmtCell(v: string | number | undefined, format?: TableColumn['format']) {
  if (v === undefined) return ''
  if (typeof v === 'string') return v
  if (format === 'percent') return fmtPct(v)
  return fmtInt(v)
}
