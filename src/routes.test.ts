import { describe, expect, it } from 'vitest'
import { SECTION_PATHS, sectionForPath } from './routes'

describe('sectionForPath', () => {
  it('maps each section path back to its section', () => {
    expect(sectionForPath(SECTION_PATHS.institutions)).toBe('institutions')
    expect(sectionForPath(SECTION_PATHS.topics)).toBe('topics')
    expect(sectionForPath(SECTION_PATHS.types)).toBe('types')
  })

  it('ignores trailing slashes', () => {
    expect(sectionForPath('/topics/')).toBe('topics')
    expect(sectionForPath('/types//')).toBe('types')
  })

  it('falls back to institutions', () => {
    expect(sectionForPath('/')).toBe('institutions')
    expect(sectionForPath('')).toBe('institutions')
    expect(sectionForPath('/nowhere')).toBe('institutions')
  })
})
