import type { ReactElement } from 'react'
import {
  Bar,
  BarChart,
  CartesianGrid,
  Cell,
  ComposedChart,
  LabelList,
  Legend,
  Line,
  Pie,
  PieChart,
  ResponsiveContainer,
  Scatter,
  ScatterChart,
  Tooltip,
  Treemap,
  XAxis,
  YAxis,
  ZAxis,
} from 'recharts'
import Card from './Card'
import type { ChartDatum, ChartSpec } from '../services/chartSpecs'
import { paletteColor, scaleColors } from '../services/palettes'
import { bubbleRange, nestByPath, numberOf, pullOffsets, textOf } from '../utils/chartData'
import { fmtInt } from '../utils/format'

const RADIAN = Math.PI / 180
const FALLBACK_FILL = '#7c9ffc'

function isDatum(v: unknown): v is ChartDatum {
  return typeof v === 'object' && v !== null && !Array.isArray(v)
}

// ---------- Tooltip showing the hovered datum's own fields
function DatumTooltip({
  active,
  payload,
  titleField,
  fields,
}: {
  active?: boolean
  payload?: ReadonlyArray<{ payload?: unknown }>
  titleField?: string
  fields: Array<{ key: string; label: string }>
}) {
  const datum = payload?.[0]?.payload
  if (!active || !isDatum(datum)) return null
  return (
    <div className="rounded-lg border bg-white px-3 py-2 text-xs shadow">
      {titleField && <div className="font-semibold text-slate-800">{textOf(datum, titleField)}</div>}
      {fields.map(f => {
        const v = datum[f.key]
        return (
          <div key={f.key} className="text-slate-600">
            {f.label}: <span className="tabular-nums">{typeof v === 'number' ? fmtInt(v) : v ?? '—'}</span>
          </div>
        )
      })}
    </div>
  )
}

// ---------- Pie labels ("label", "percent" or both)
type SliceLabelProps = {
  cx?: unknown
  cy?: unknown
  midAngle?: unknown
  innerRadius?: unknown
  outerRadius?: unknown
  percent?: unknown
  name?: unknown
}

const num = (v: unknown) => (typeof v === 'number' ? v : Number(v) || 0)

function sliceLabel(spec: ChartSpec) {
  const info = spec.options.textInfo ?? []
  const outside = spec.options.textPosition === 'outside'
  return (p: SliceLabelProps) => {
    const inner = num(p.innerRadius)
    const outer = num(p.outerRadius)
    const r = outside ? outer + 18 : inner + (outer - inner) / 2
    const angle = -num(p.midAngle) * RADIAN
    const x = num(p.cx) + r * Math.cos(angle)
    const y = num(p.cy) + r * Math.sin(angle)
    const parts = info.map(part => (part === 'label' ? String(p.name ?? '') : `${(num(p.percent) * 100).toFixed(1)}%`))
    return (
      <text
        x={x}
        y={y}
        fill="#1f2937"
        fontSize={11}
        textAnchor={outside ? (x > num(p.cx) ? 'start' : 'end') : 'middle'}
        dominantBaseline="central"
      >
        {parts.join(' ')}
      </text>
    )
  }
}

// ---------- Treemap tile
function TreemapTile({
  x = 0,
  y = 0,
  width = 0,
  height = 0,
  depth = 0,
  name,
  fill,
}: {
  x?: number
  y?: number
  width?: number
  height?: number
  depth?: number
  name?: string
  fill?: string
}) {
  if (depth === 0) return null
  const leaf = depth > 1
  return (
    <g>
      <rect x={x} y={y} width={width} height={height} fill={fill ?? FALLBACK_FILL} stroke="#ffffff" strokeWidth={leaf ? 1 : 3} />
      {width > 48 && height > 18 && (
        <text
          x={x + 6}
          y={y + (leaf ? height / 2 : 14)}
          fontSize={leaf ? 11 : 12}
          fontWeight={leaf ? 400 : 600}
          fill={leaf ? '#0f172a' : '#334155'}
          dominantBaseline="central"
        >
          {name}
        </text>
      )}
    </g>
  )
}

// ---------- One renderer per chart kind
function horizontalBar(spec: ChartSpec): ReactElement {
  const { encoding: enc, options: opt, axes } = spec
  const valueKey = enc.x ?? 'count'
  const colors = opt.colorScale ? scaleColors(opt.colorScale, spec.data.map(d => numberOf(d, enc.color ?? valueKey))) : []
  return (
    <BarChart data={spec.data} layout="vertical" margin={{ top: 8, right: 40, bottom: 16, left: 0 }}>
      <CartesianGrid strokeDasharray="3 3" horizontal={false} />
      <XAxis
        type="number"
        dataKey={valueKey}
        tick={{ fontSize: 11 }}
        label={axes.x ? { value: axes.x, position: 'insideBottom', offset: -10, fontSize: 12 } : undefined}
      />
      <YAxis dataKey={enc.y} type="category" width={170} tick={{ fontSize: 11 }} interval={0} />
      <Tooltip
        cursor={{ fill: 'rgba(148, 163, 184, 0.15)' }}
        content={
          <DatumTooltip
            titleField={enc.y}
            fields={[{ key: valueKey, label: axes.x ?? valueKey }, ...(enc.tooltip ?? []).map(key => ({ key, label: key }))]}
          />
        }
      />
      <Bar dataKey={valueKey} name={axes.x ?? valueKey} isAnimationActive={false}>
        {spec.data.map((d, i) => (
          <Cell key={`${textOf(d, enc.y)}-${i}`} fill={colors[i] ?? FALLBACK_FILL} />
        ))}
        {enc.label && <LabelList dataKey={enc.label} position="right" fontSize={11} />}
      </Bar>
    </BarChart>
  )
}

function verticalBar(spec: ChartSpec): ReactElement {
  const { encoding: enc, options: opt, axes } = spec
  const valueKey = enc.y ?? 'count'
  const colors = opt.colorScale ? scaleColors(opt.colorScale, spec.data.map(d => numberOf(d, enc.color ?? valueKey))) : []
  return (
    <BarChart data={spec.data} margin={{ top: 16, right: 16, bottom: 8, left: 0 }}>
      <CartesianGrid strokeDasharray="3 3" vertical={false} />
      <XAxis dataKey={enc.x} tick={{ fontSize: 11 }} interval={0} />
      <YAxis
        tick={{ fontSize: 11 }}
        label={axes.y ? { value: axes.y, angle: -90, position: 'insideLeft', fontSize: 12 } : undefined}
      />
      <Tooltip
        cursor={{ fill: 'rgba(148, 163, 184, 0.15)' }}
        content={<DatumTooltip titleField={enc.x} fields={[{ key: valueKey, label: axes.y ?? valueKey }]} />}
      />
      <Bar dataKey={valueKey} name={axes.y ?? valueKey} fillOpacity={opt.barOpacity ?? 1} isAnimationActive={false}>
        {spec.data.map((d, i) => (
          <Cell key={`${textOf(d, enc.x)}-${i}`} fill={colors[i] ?? opt.barColor ?? FALLBACK_FILL} />
        ))}
        {enc.label && <LabelList dataKey={enc.label} position="top" fontSize={11} />}
      </Bar>
    </BarChart>
  )
}

function pie(spec: ChartSpec): ReactElement {
  const { encoding: enc, options: opt } = spec
  const valueKey = enc.size ?? 'count'
  const outer = Math.round(opt.height * (opt.textPosition === 'outside' ? 0.3 : 0.38))
  const inner = Math.round(outer * (opt.hole ?? 0))
  const offsets = pullOffsets(spec.data.map(d => numberOf(d, valueKey)), opt.pull ?? [], outer)
  return (
    <PieChart>
      <Pie
        data={spec.data}
        dataKey={valueKey}
        nameKey={enc.label}
        innerRadius={inner}
        outerRadius={outer}
        startAngle={90}
        endAngle={-270}
        labelLine={opt.textPosition === 'outside'}
        label={opt.textInfo?.length ? sliceLabel(spec) : false}
        isAnimationActive={false}
      >
        {spec.data.map((d, i) => {
          const { dx, dy } = offsets[i]
          return (
            <Cell
              key={`${textOf(d, enc.label)}-${i}`}
              fill={opt.palette ? paletteColor(opt.palette, i) : FALLBACK_FILL}
              stroke="#ffffff"
              transform={dx || dy ? `translate(${dx}, ${dy})` : undefined}
            />
          )
        })}
      </Pie>
      <Tooltip />
      {opt.showLegend && <Legend />}
    </PieChart>
  )
}

function treemap(spec: ChartSpec): ReactElement {
  const { encoding: enc, options: opt } = spec
  const nodes = nestByPath(spec.data, enc.path ?? [], enc.size ?? 'count', opt.colorScale ?? 'Blues')
  return (
    <Treemap data={nodes} dataKey="size" nameKey="name" isAnimationActive={false} content={<TreemapTile />}>
      <Tooltip />
    </Treemap>
  )
}

function bubble(spec: ChartSpec): ReactElement {
  const { encoding: enc, options: opt } = spec
  const sizeKey = enc.size ?? 'count'
  // every bubble sits on one lane
  const data = spec.data.map(d => ({ ...d, lane: 1 }))
  const colors = opt.colorScale ? scaleColors(opt.colorScale, spec.data.map(d => numberOf(d, enc.color ?? sizeKey))) : []
  return (
    <ScatterChart margin={{ top: 10, right: 40, bottom: 10, left: 40 }}>
      <XAxis type="number" dataKey={enc.x} hide domain={['dataMin - 1', 'dataMax + 1']} />
      <YAxis type="number" dataKey="lane" hide domain={[0, 2]} />
      <ZAxis type="number" dataKey={sizeKey} range={bubbleRange(opt.sizeMax ?? 80)} />
      <Tooltip cursor={false} content={<DatumTooltip titleField={enc.label} fields={[{ key: sizeKey, label: sizeKey }]} />} />
      <Scatter data={data} isAnimationActive={false}>
        {data.map((d, i) => (
          <Cell key={`${textOf(d, enc.label)}-${i}`} fill={colors[i] ?? FALLBACK_FILL} />
        ))}
        {enc.label && <LabelList dataKey={enc.label} position="center" fill="#ffffff" fontSize={11} />}
      </Scatter>
    </ScatterChart>
  )
}

function pareto(spec: ChartSpec): ReactElement {
  const { encoding: enc, options: opt, axes } = spec
  return (
    <ComposedChart data={spec.data} margin={{ top: 10, right: 20, bottom: 8, left: 0 }}>
      <CartesianGrid strokeDasharray="3 3" />
      <XAxis dataKey={enc.x} tick={{ fontSize: 11 }} interval={0} />
      <YAxis
        yAxisId="left"
        tick={{ fontSize: 11 }}
        label={axes.y ? { value: axes.y, angle: -90, position: 'insideLeft', fontSize: 12 } : undefined}
      />
      <YAxis
        yAxisId="right"
        orientation="right"
        domain={opt.y2Range}
        tick={{ fontSize: 11 }}
        label={axes.y2 ? { value: axes.y2, angle: 90, position: 'insideRight', fontSize: 12 } : undefined}
      />
      <Tooltip />
      {opt.showLegend && <Legend verticalAlign="top" height={28} />}
      <Bar
        yAxisId="left"
        dataKey={enc.y ?? 'count'}
        name={axes.y ?? 'Count'}
        fill={opt.barColor ?? FALLBACK_FILL}
        fillOpacity={opt.barOpacity ?? 1}
        isAnimationActive={false}
      />
      <Line
        yAxisId="right"
        type="linear"
        dataKey={enc.y2 ?? 'cumulativePct'}
        name={axes.y2 ?? 'Cumulative %'}
        stroke={opt.lineColor ?? '#f38ba8'}
        strokeWidth={2.5}
        dot={{ r: 4 }}
        isAnimationActive={false}
      />
    </ComposedChart>
  )
}

export function renderChart(spec: ChartSpec): ReactElement {
  switch (spec.kind) {
    case 'bar':
      return verticalBar(spec)
    case 'horizontal-bar':
      return horizontalBar(spec)
    case 'pie':
    case 'donut':
      return pie(spec)
    case 'treemap':
      return treemap(spec)
    case 'bubble':
      return bubble(spec)
    case 'pareto':
      return pareto(spec)
  }
}

export default function ChartView({ spec }: { spec: ChartSpec }) {
  return (
    <Card title={spec.title}>
      {spec.data.length === 0 ? (
        <div className="flex items-center justify-center text-sm text-slate-500" style={{ height: spec.options.height }}>
          No rows to chart.
        </div>
      ) : (
        <div style={{ height: spec.options.height }} data-chart={spec.id}>
          <ResponsiveContainer width="100%" height="100%">
            {renderChart(spec)}
          </ResponsiveContainer>
        </div>
      )}
    </Card>
  )
}

/** The chart with `id` from a section view, if the view has one. */
export function ChartById({ charts, id }: { charts: ChartSpec[]; id: string }) {
  const spec = charts.find(c => c.id === id)
  return spec ? <ChartView spec={spec} /> : null
}
