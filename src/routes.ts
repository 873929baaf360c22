import type { SectionId } from './services/dashboard'

export const SECTION_PATHS: Record<SectionId, string> = {
  institutions: '/institutions',
  topics: '/topics',
  types: '/types',
}

/** Section shown for a path; `/` and unknown paths show institutions. */
export function sectionForPath(pathname: string): SectionId {
  const clean = pathname.replace(/\/+$/, '') || '/'
  if (clean === SECTION_PATHS.topics) return 'topics'
  if (clean === SECTION_PATHS.types) return 'types'
  return 'institutions'
}
