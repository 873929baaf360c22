// src/utils/chartData.ts
// Shapes chart spec data into what recharts wants.

import type { ChartDatum } from '../services/chartSpecs'
import { scaleColors, type ColorScaleName } from '../services/palettes'

export type TreemapNode = {
  name: string
  size: number
  fill: string
  children?: TreemapNode[]
}

/** Numeric value of a datum field, 0 when missing or textual. */
export function numberOf(d: ChartDatum, field: string | undefined): number {
  if (!field) return 0
  const v = d[field]
  return typeof v === 'number' ? v : 0
}

export function textOf(d: ChartDatum, field: string | undefined): string {
  if (!field) return ''
  const v = d[field]
  return v === undefined ? '' : String(v)
}

/**
 * Group flat rows into a treemap hierarchy following `path`, outermost
 * level first. Groups keep first-appearance order; parents sum their
 * children. Leaves are colored along `scale` by their size.
 */
export function nestByPath(
  data: readonly ChartDatum[],
  path: readonly string[],
  sizeField: string,
  scale: ColorScaleName
): TreemapNode[] {
  const leafColors = scaleColors(scale, data.map(d => numberOf(d, sizeField)))
  const parentFill = '#dbe4f0'

  const build = (rows: Array<{ d: ChartDatum; fill: string }>, depth: number): TreemapNode[] => {
    const field = path[depth]
    if (depth === path.length - 1) {
      return rows.map(({ d, fill }) => ({ name: textOf(d, field), size: numberOf(d, sizeField), fill }))
    }
    const groups = new Map<string, Array<{ d: ChartDatum; fill: string }>>()
    for (const row of rows) {
      const key = textOf(row.d, field)
      const bucket = groups.get(key)
      if (bucket) bucket.push(row)
      else groups.set(key, [row])
    }
    return Array.from(groups, ([name, members]) => {
      const children = build(members, depth + 1)
      return { name, size: children.reduce((s, c) => s + c.size, 0), fill: parentFill, children }
    })
  }

  if (!path.length) return []
  return build(data.map((d, i) => ({ d, fill: leafColors[i] })), 0)
}

const RADIAN = Math.PI / 180

function tidy(v: number) {
  return Math.round(v * 1000) / 1000 || 0
}

/**
 * SVG translation for each slice of a pie drawn clockwise from 12 o'clock
 * (startAngle 90, endAngle -270). A slice moves outward along its
 * mid-angle by `pull[i] * radius`.
 */
export function pullOffsets(
  values: readonly number[],
  pull: readonly number[],
  radius: number
): Array<{ dx: number; dy: number }> {
  const total = values.reduce((s, v) => s + v, 0)
  let before = 0
  return values.map((v, i) => {
    const share = total === 0 ? 0 : (before + v / 2) / total
    before += v
    const distance = (pull[i] ?? 0) * radius
    if (!distance) return { dx: 0, dy: 0 }
    const mid = (90 - share * 360) * RADIAN
    return { dx: tidy(Math.cos(mid) * distance), dy: tidy(-Math.sin(mid) * distance) }
  })
}

/** ZAxis area range for bubbles whose largest diameter is `sizeMax` px. */
export function bubbleRange(sizeMax: number): [number, number] {
  const area = (d: number) => Math.round(Math.PI * (d / 2) ** 2)
  return [area(sizeMax / 5), area(sizeMax)]
}
