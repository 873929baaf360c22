// src/services/palettes.ts
// Named color sequences and continuous scales used by chart specs.

export type PaletteName = 'Pastel' | 'Set3' | 'Blues'
export type ColorScaleName = 'Blues' | 'Teal' | 'Purples'

export const PALETTES: Record<PaletteName, readonly string[]> = {
  Pastel: [
    '#66c5cc', '#f6cf71', '#f89c74', '#dcb0f2', '#87c55f', '#9eb9f3',
    '#fe88b1', '#c9db74', '#8be0a4', '#b497e7', '#b3b3b3',
  ],
  Set3: [
    '#8dd3c7', '#ffffb3', '#bebada', '#fb8072', '#80b1d3', '#fdb462',
    '#b3de69', '#fccde5', '#d9d9d9', '#bc80bd', '#ccebc5', '#ffed6f',
  ],
  // dark to light, so the largest slice gets the strongest color
  Blues: ['#08306b', '#08519c', '#2171b5', '#4292c6', '#6baed6', '#9ecae1', '#c6dbef', '#deebf7', '#f7fbff'],
}

export const COLOR_SCALES: Record<ColorScaleName, readonly string[]> = {
  Blues: ['#f7fbff', '#deebf7', '#c6dbef', '#9ecae1', '#6baed6', '#4292c6', '#2171b5', '#08519c', '#08306b'],
  Teal: ['#d1eeea', '#a8dbd9', '#85c4c9', '#68abb8', '#4f90a6', '#3b738f', '#2a5674'],
  Purples: ['#fcfbfd', '#efedf5', '#dadaeb', '#bcbddc', '#9e9ac8', '#807dba', '#6a51a3', '#54278f', '#3f007d'],
}

export function paletteColor(name: PaletteName, index: number): string {
  const colors = PALETTES[name]
  return colors[index % colors.length]
}

function hexToRgb(hex: string): [number, number, number] {
  const n = Number.parseInt(hex.slice(1), 16)
  return [(n >> 16) & 255, (n >> 8) & 255, n & 255]
}

function toHex(v: number) {
  return Math.round(v).toString(16).padStart(2, '0')
}

/** Color at position t (0..1, clamped) along a continuous scale. */
export function scaleColor(name: ColorScaleName, t: number): string {
  const stops = COLOR_SCALES[name]
  const clamped = Number.isFinite(t) ? Math.min(1, Math.max(0, t)) : 0
  const pos = clamped * (stops.length - 1)
  const lo = Math.floor(pos)
  const hi = Math.min(stops.length - 1, lo + 1)
  const f = pos - lo
  const a = hexToRgb(stops[lo])
  const b = hexToRgb(stops[hi])
  return `#${a.map((c, i) => toHex(c + (b[i] - c) * f)).join('')}`
}

/** Colors for each value, scaled between the smallest and largest. */
export function scaleColors(name: ColorScaleName, values: readonly number[]): string[] {
  if (!values.length) return []
  const min = Math.min(...values)
  const max = Math.max(...values)
  // a single distinct value sits at the top of the scale
  return values.map(v => scaleColor(name, max === min ? 1 : (v - min) / (max - min)))
}
