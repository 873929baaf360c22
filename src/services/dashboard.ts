// src/services/dashboard.ts
// Session state for one dashboard: active section, country filter, display
// limits, loaded records and memoized section views.

import {
  ALL_COUNTRIES,
  countryOptions,
  summarizeDataset,
  type CountryFilter,
  type DatasetSummary,
} from './aggregate'
import {
  DEFAULT_LIMITS,
  buildInstitutionView,
  buildTopicView,
  buildTypeView,
  type DisplayLimits,
  type SectionView,
} from './chartSpecs'
import { toDataFileError, type DataFileError } from './errors'
import { loadRecords, type DataSource } from './loader'
import {
  institutionSchema,
  topicSchema,
  typeSchema,
  type InstitutionRecord,
  type TopicRecord,
  type TypeRecord,
} from './records'

export type SectionId = 'institutions' | 'topics' | 'types'

export const SECTIONS: readonly SectionId[] = ['institutions', 'topics', 'types']

export const SECTION_FILES: Record<SectionId, string> = {
  institutions: institutionSchema.file,
  topics: topicSchema.file,
  types: typeSchema.file,
}

export type Slot<T> =
  | { status: 'idle' }
  | { status: 'loading' }
  | { status: 'loaded'; records: T[] }
  | { status: 'error'; error: DataFileError }

type PendingSlot = { status: 'idle' } | { status: 'loading' } | { status: 'error'; error: DataFileError }

export type SectionData = {
  institutions: Slot<InstitutionRecord>
  topics: Slot<TopicRecord>
  types: Slot<TypeRecord>
}

export type LoadedSection =
  | { section: 'institutions'; records: InstitutionRecord[] }
  | { section: 'topics'; records: TopicRecord[] }
  | { section: 'types'; records: TypeRecord[] }

export type DashboardState = {
  section: SectionId
  filter: CountryFilter
  limits: DisplayLimits
  data: SectionData
  /** Views computed so far this session, by viewKey. */
  views: ReadonlyMap<string, SectionView>
}

export type DashboardAction =
  | { type: 'sectionSelected'; section: SectionId }
  | { type: 'loadStarted'; section: SectionId }
  | ({ type: 'sectionLoaded' } & LoadedSection)
  | { type: 'sectionFailed'; section: SectionId; error: DataFileError }
  | { type: 'filterChanged'; filter: CountryFilter }
  | { type: 'limitChanged'; section: keyof DisplayLimits; limit: number }

export type SectionStatus =
  | { status: 'loading' }
  | { status: 'error'; error: DataFileError }
  | { status: 'ready'; view: SectionView }

export function createDashboardState(init: Partial<Pick<DashboardState, 'section' | 'filter' | 'limits'>> = {}): DashboardState {
  return {
    section: init.section ?? 'institutions',
    filter: init.filter ?? ALL_COUNTRIES,
    limits: init.limits ?? DEFAULT_LIMITS,
    data: { institutions: { status: 'idle' }, topics: { status: 'idle' }, types: { status: 'idle' } },
    views: new Map(),
  }
}

/**
 * Memo key for a section view. Only the inputs a section depends on are
 * part of it, so changing the country filter never invalidates topics or
 * publication types.
 */
export function viewKey(section: SectionId, filter: CountryFilter, limits: DisplayLimits): string {
  switch (section) {
    case 'institutions':
      return JSON.stringify([section, filter.kind === 'all' ? null : filter.country, limits.institutions])
    case 'topics':
      return JSON.stringify([section, limits.topics])
    case 'types':
      return JSON.stringify([section])
  }
}

/** View for a section given its data, or null until the data is loaded. */
export function computeSectionView(
  section: SectionId,
  data: SectionData,
  filter: CountryFilter,
  limits: DisplayLimits
): SectionView | null {
  switch (section) {
    case 'institutions':
      return data.institutions.status === 'loaded'
        ? buildInstitutionView(data.institutions.records, filter, limits.institutions)
        : null
    case 'topics':
      return data.topics.status === 'loaded' ? buildTopicView(data.topics.records, limits.topics) : null
    case 'types':
      return data.types.status === 'loaded' ? buildTypeView(data.types.records) : null
  }
}

function ensureView(state: DashboardState, section: SectionId): DashboardState {
  const key = viewKey(section, state.filter, state.limits)
  if (state.views.has(key)) return state
  const view = computeSectionView(section, state.data, state.filter, state.limits)
  if (!view) return state
  const views = new Map(state.views)
  views.set(key, view)
  return { ...state, views }
}

function withPending(data: SectionData, section: SectionId, slot: PendingSlot): SectionData {
  switch (section) {
    case 'institutions':
      return { ...data, institutions: slot }
    case 'topics':
      return { ...data, topics: slot }
    case 'types':
      return { ...data, types: slot }
  }
}

function withLoaded(data: SectionData, loaded: LoadedSection): SectionData {
  switch (loaded.section) {
    case 'institutions':
      return { ...data, institutions: { status: 'loaded', records: loaded.records } }
    case 'topics':
      return { ...data, topics: { status: 'loaded', records: loaded.records } }
    case 'types':
      return { ...data, types: { status: 'loaded', records: loaded.records } }
  }
}

export function dashboardReducer(state: DashboardState, action: DashboardAction): DashboardState {
  switch (action.type) {
    case 'sectionSelected':
      if (action.section === state.section) return state
      return ensureView({ ...state, section: action.section }, action.section)

    case 'loadStarted':
      if (state.data[action.section].status !== 'idle') return state
      return { ...state, data: withPending(state.data, action.section, { status: 'loading' }) }

    case 'sectionLoaded':
      return ensureView({ ...state, data: withLoaded(state.data, action) }, action.section)

    case 'sectionFailed':
      return { ...state, data: withPending(state.data, action.section, { status: 'error', error: action.error }) }

    case 'filterChanged':
      return ensureView({ ...state, filter: action.filter }, 'institutions')

    case 'limitChanged': {
      if (state.limits[action.section] === action.limit) return state
      const limits = { ...state.limits, [action.section]: action.limit }
      return ensureView({ ...state, limits }, action.section)
    }
  }
}

/** A file is read at most once per session. */
export function needsLoad(state: DashboardState, section: SectionId): boolean {
  return state.data[section].status === 'idle'
}

/** What the UI should show for a section right now. */
export function selectView(state: DashboardState, section: SectionId): SectionStatus {
  const slot = state.data[section]
  if (slot.status === 'error') return { status: 'error', error: slot.error }
  if (slot.status !== 'loaded') return { status: 'loading' }
  const view =
    state.views.get(viewKey(section, state.filter, state.limits)) ??
    computeSectionView(section, state.data, state.filter, state.limits)
  return view ? { status: 'ready', view } : { status: 'loading' }
}

function recordsOf<T>(slot: Slot<T>): T[] | null {
  return slot.status === 'loaded' ? slot.records : null
}

export function selectSummary(state: DashboardState): DatasetSummary {
  return summarizeDataset({
    institutions: recordsOf(state.data.institutions),
    topics: recordsOf(state.data.topics),
    types: recordsOf(state.data.types),
  })
}

export function selectCountries(state: DashboardState): string[] {
  const records = recordsOf(state.data.institutions)
  return records ? countryOptions(records) : []
}

/** Rows available to a top-N slider, 0 until loaded. */
export function selectRowCount(state: DashboardState, section: keyof DisplayLimits): number {
  const slot = section === 'institutions' ? state.data.institutions : state.data.topics
  return slot.status === 'loaded' ? slot.records.length : 0
}

/**
 * Load one section's file. Never rejects: a failure becomes a
 * `sectionFailed` action so the other sections keep working.
 */
export async function fetchSection(section: SectionId, source: DataSource): Promise<DashboardAction> {
  try {
    switch (section) {
      case 'institutions':
        return { type: 'sectionLoaded', section, records: await loadRecords(source, institutionSchema) }
      case 'topics':
        return { type: 'sectionLoaded', section, records: await loadRecords(source, topicSchema) }
      case 'types':
        return { type: 'sectionLoaded', section, records: await loadRecords(source, typeSchema) }
    }
  } catch (err) {
    const file = SECTION_FILES[section]
    const error = toDataFileError(err, file)
    console.error(`Failed to load ${source.describe(file)}:`, error)
    return { type: 'sectionFailed', section, error }
  }
}
