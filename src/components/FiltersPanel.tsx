import { FileText, Landmark, SlidersHorizontal, Tag } from 'lucide-react'
import { countryFilter, ALL_COUNTRIES, type CountryFilter, type DatasetSummary } from '../services/aggregate'
import { clampLimit, type DisplayLimits } from '../services/chartSpecs'
import { fmtInt } from '../utils/format'

type Props = {
  countries: string[]
  filter: CountryFilter
  limits: DisplayLimits
  rowCounts: Record<keyof DisplayLimits, number>
  summary: DatasetSummary
  onSelectFilter: (filter: CountryFilter) => void
  onSelectLimit: (section: keyof DisplayLimits, limit: number) => void
}

// Empty string never names a country: the loader rejects empty fields
const ALL_VALUE = ''

function LimitSlider({
  label,
  value,
  rows,
  onChange,
}: {
  label: string
  value: number
  rows: number
  onChange: (v: number) => void
}) {
  const current = clampLimit(value, rows)
  return (
    <label className="block text-sm">
      <span className="flex justify-between text-slate-600">
        {label}
        <span className="tabular-nums font-medium text-slate-900">{current}</span>
      </span>
      <input
        type="range"
        className="mt-1 w-full accent-indigo-500"
        min={Math.min(5, rows)}
        max={rows}
        value={current}
        disabled={rows === 0}
        onChange={e => onChange(Number(e.target.value))}
      />
    </label>
  )
}

export default function FiltersPanel({
  countries,
  filter,
  limits,
  rowCounts,
  summary,
  onSelectFilter,
  onSelectLimit,
}: Props) {
  return (
    <aside className="space-y-5 rounded-2xl border bg-white p-4 shadow-sm">
      <div className="flex items-center gap-2 font-semibold">
        <SlidersHorizontal className="h-4 w-4 text-slate-500" />
        Display settings
      </div>

      <LimitSlider
        label="Top N institutions"
        value={limits.institutions}
        rows={rowCounts.institutions}
        onChange={v => onSelectLimit('institutions', v)}
      />
      <LimitSlider
        label="Top N topics"
        value={limits.topics}
        rows={rowCounts.topics}
        onChange={v => onSelectLimit('topics', v)}
      />

      <label className="block text-sm">
        <span className="text-slate-600">Filter by country</span>
        <select
          className="mt-1 w-full rounded-lg border px-2 py-1.5"
          value={filter.kind === 'all' ? ALL_VALUE : filter.country}
          disabled={countries.length === 0}
          onChange={e => onSelectFilter(e.target.value === ALL_VALUE ? ALL_COUNTRIES : countryFilter(e.target.value))}
        >
          <option value={ALL_VALUE}>All</option>
          {countries.map(c => (
            <option key={c} value={c}>
              {c}
            </option>
          ))}
        </select>
      </label>

      <div className="border-t pt-4 text-sm">
        <div className="mb-2 font-semibold">Dataset summary</div>
        <ul className="space-y-1 text-slate-700">
          <li className="flex items-center gap-2">
            <Landmark className="h-4 w-4 text-slate-400" />
            <span className="font-medium tabular-nums">{fmtInt(summary.institutionRows)}</span> institutions
          </li>
          <li className="flex items-center gap-2">
            <Tag className="h-4 w-4 text-slate-400" />
            <span className="font-medium tabular-nums">{fmtInt(summary.topicRows)}</span> topics
          </li>
          <li className="flex items-center gap-2">
            <FileText className="h-4 w-4 text-slate-400" />
            <span className="font-medium tabular-nums">{fmtInt(summary.typeRows)}</span> citation types
          </li>
        </ul>
      </div>
    </aside>
  )
}
