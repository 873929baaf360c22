import { describe, expect, it } from 'vitest'
import { paletteColor, scaleColor, scaleColors } from './palettes'

describe('paletteColor', () => {
  it('wraps around the palette', () => {
    expect(paletteColor('Set3', 0)).toBe('#8dd3c7')
    expect(paletteColor('Set3', 12)).toBe('#8dd3c7')
    expect(paletteColor('Blues', 0)).toBe('#08306b')
  })
})

describe('scaleColor', () => {
  it('returns the end stops', () => {
    expect(scaleColor('Blues', 0)).toBe('#f7fbff')
    expect(scaleColor('Blues', 1)).toBe('#08306b')
  })

  it('lands on an inner stop exactly', () => {
    expect(scaleColor('Teal', 0.5)).toBe('#68abb8')
  })

  it('interpolates between stops', () => {
    // halfway between #f7fbff and #deebf7
    expect(scaleColor('Blues', 1 / 16)).toBe('#ebf3fb')
  })

  it('clamps out-of-range positions', () => {
    expect(scaleColor('Purples', -2)).toBe('#fcfbfd')
    expect(scaleColor('Purples', 7)).toBe('#3f007d')
    expect(scaleColor('Purples', Number.NaN)).toBe('#fcfbfd')
  })
})

describe('scaleColors', () => {
  it('spreads values between the smallest and largest', () => {
    expect(scaleColors('Blues', [3, 10, 3])).toEqual(['#f7fbff', '#08306b', '#f7fbff'])
  })

  it('puts a single distinct value at the top', () => {
    expect(scaleColors('Teal', [5, 5])).toEqual(['#2a5674', '#2a5674'])
  })

  it('returns nothing for no values', () => {
    expect(scaleColors('Teal', [])).toEqual([])
  })
})
