import { describe, expect, it } from 'vitest'
import { fmtCell, fmtInt, fmtPct } from './format'

describe('format', () => {
  it('groups thousands', () => {
    expect(fmtInt(1234567)).toBe('1,234,567')
    expect(fmtInt(0)).toBe('0')
  })

  it('shows a dash for missing numbers', () => {
    expect(fmtInt(null)).toBe('—')
    expect(fmtInt(undefined)).toBe('—')
  })

  it('formats percentages to one decimal', () => {
    expect(fmtPct(80)).toBe('80.0%')
    expect(fmtPct(33.3333)).toBe('33.3%')
  })

  it('formats table cells by column format', () => {
    expect(fmtCell('Journal')).toBe('Journal')
    expect(fmtCell(1500, 'int')).toBe('1,500')
    expect(fmtCell(12.34, 'percent')).toBe('12.3%')
    expect(fmtCell(undefined, 'int')).toBe('')
  })
})
