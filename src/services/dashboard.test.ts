import { afterEach, describe, expect, it, vi } from 'vitest'
import { ALL_COUNTRIES, countryFilter } from './aggregate'
import {
  createDashboardState,
  dashboardReducer,
  fetchSection,
  needsLoad,
  selectCountries,
  selectRowCount,
  selectSummary,
  selectView,
  viewKey,
  type DashboardAction,
  type DashboardState,
  type SectionId,
  type SectionStatus,
} from './dashboard'
import { DEFAULT_LIMITS, type SectionView } from './chartSpecs'
import { NotFoundError, SchemaError } from './errors'
import { INSTITUTIONS, INSTITUTION_TSV, TOPIC_TSV, TYPE_TSV, memorySource } from '../test/fixtures'

const TOPICS = [
  { name: 'AI', count: 120 },
  { name: 'Biology', count: 120 },
  { name: 'Physics', count: 80 },
]

function run(actions: DashboardAction[], state = createDashboardState()): DashboardState {
  return actions.reduce(dashboardReducer, state)
}

function readyView(status: SectionStatus): SectionView {
  if (status.status !== 'ready') throw new Error(`section is ${status.status}`)
  return status.view
}

const loaded = run([
  { type: 'loadStarted', section: 'institutions' },
  { type: 'sectionLoaded', section: 'institutions', records: INSTITUTIONS },
  { type: 'loadStarted', section: 'topics' },
  { type: 'sectionLoaded', section: 'topics', records: TOPICS },
])

afterEach(() => {
  vi.restoreAllMocks()
})

describe('createDashboardState', () => {
  it('starts on institutions with every country and default limits', () => {
    const state = createDashboardState()
    expect(state.section).toBe('institutions')
    expect(state.filter).toEqual(ALL_COUNTRIES)
    expect(state.limits).toEqual(DEFAULT_LIMITS)
    expect(state.views.size).toBe(0)
    expect((['institutions', 'topics', 'types'] as const).every(s => needsLoad(state, s))).toBe(true)
  })
})

describe('viewKey', () => {
  it('ignores the filter for sections that do not use it', () => {
    const limits = { institutions: 5, topics: 7 }
    expect(viewKey('topics', countryFilter('Spain'), limits)).toBe(viewKey('topics', ALL_COUNTRIES, limits))
    expect(viewKey('types', countryFilter('Spain'), limits)).toBe(viewKey('types', ALL_COUNTRIES, limits))
    expect(viewKey('institutions', countryFilter('Spain'), limits)).not.toBe(
      viewKey('institutions', ALL_COUNTRIES, limits)
    )
  })
})

describe('dashboardReducer', () => {
  it('shows loading until the records arrive', () => {
    const state = run([{ type: 'loadStarted', section: 'types' }])
    expect(selectView(state, 'types')).toEqual({ status: 'loading' })
    expect(needsLoad(state, 'types')).toBe(false)
  })

  it('ignores a second loadStarted for the same file', () => {
    const state = run([{ type: 'loadStarted', section: 'types' }])
    expect(dashboardReducer(state, { type: 'loadStarted', section: 'types' })).toBe(state)
    expect(dashboardReducer(loaded, { type: 'loadStarted', section: 'topics' })).toBe(loaded)
  })

  it('builds and memoizes the view once records load', () => {
    const view = readyView(selectView(loaded, 'institutions'))
    expect(view.charts.map(c => c.id)).toEqual(['institutions-top', 'institutions-countries', 'institutions-treemap'])
    expect(loaded.views.get(viewKey('institutions', ALL_COUNTRIES, DEFAULT_LIMITS))).toBe(view)
  })

  it('reuses the memoized view when switching back to a filter', () => {
    const before = readyView(selectView(loaded, 'institutions'))
    const state = run(
      [
        { type: 'filterChanged', filter: countryFilter('France') },
        { type: 'filterChanged', filter: ALL_COUNTRIES },
      ],
      loaded
    )
    expect(readyView(selectView(state, 'institutions'))).toBe(before)
    expect(state.views.size).toBe(loaded.views.size + 1)
  })

  it('narrows institutions on a filter change and leaves topics alone', () => {
    const topicsBefore = readyView(selectView(loaded, 'topics'))
    const state = dashboardReducer(loaded, { type: 'filterChanged', filter: countryFilter('Germany') })

    expect(readyView(selectView(state, 'institutions')).table.rows).toEqual([
      { name: 'Beta University', count: 5, country: 'Germany' },
    ])
    expect(readyView(selectView(state, 'topics'))).toBe(topicsBefore)
  })

  it('rebuilds only the section whose limit changed', () => {
    const topicsBefore = readyView(selectView(loaded, 'topics'))
    const state = dashboardReducer(loaded, { type: 'limitChanged', section: 'institutions', limit: 2 })

    const bar = readyView(selectView(state, 'institutions')).charts[0]
    expect(bar.data.map(d => d.name)).toEqual(['Alpha Institute', 'Gamma College'])
    expect(readyView(selectView(state, 'topics'))).toBe(topicsBefore)
  })

  it('returns the same state for no-op changes', () => {
    expect(dashboardReducer(loaded, { type: 'limitChanged', section: 'topics', limit: DEFAULT_LIMITS.topics })).toBe(
      loaded
    )
    expect(dashboardReducer(loaded, { type: 'sectionSelected', section: 'institutions' })).toBe(loaded)
  })

  it('switches sections', () => {
    const state = dashboardReducer(loaded, { type: 'sectionSelected', section: 'topics' })
    expect(state.section).toBe('topics')
    expect(state.views).toBe(loaded.views)
  })

  it('keeps a failed file from affecting the others', () => {
    const error = new SchemaError('type.txt', ['name', 'count'], ['kind', 'count'])
    const state = run(
      [
        { type: 'loadStarted', section: 'types' },
        { type: 'sectionFailed', section: 'types', error },
      ],
      loaded
    )

    expect(selectView(state, 'types')).toEqual({ status: 'error', error })
    expect(needsLoad(state, 'types')).toBe(false)
    expect(readyView(selectView(state, 'institutions'))).toBe(readyView(selectView(loaded, 'institutions')))
  })
})

describe('selectors', () => {
  it('summarizes what has loaded', () => {
    expect(selectSummary(loaded)).toMatchObject({
      institutionRows: 5,
      topicRows: 3,
      typeRows: null,
      totalCitations: 30,
      topTopic: 'AI',
    })
  })

  it('lists countries once institutions load', () => {
    expect(selectCountries(createDashboardState())).toEqual([])
    expect(selectCountries(loaded)).toEqual(['France', 'Germany', 'Spain', 'france'])
  })

  it('counts rows available to the sliders', () => {
    expect(selectRowCount(loaded, 'institutions')).toBe(5)
    expect(selectRowCount(loaded, 'topics')).toBe(3)
    expect(selectRowCount(createDashboardState(), 'topics')).toBe(0)
  })
})

describe('fetchSection', () => {
  const source = memorySource({
    'institution.txt': INSTITUTION_TSV,
    'topic.txt': TOPIC_TSV,
    'type.txt': TYPE_TSV,
  })

  it.each<[SectionId, number]>([
    ['institutions', 5],
    ['topics', 3],
    ['types', 3],
  ])('loads %s', async (section, rows) => {
    const action = await fetchSection(section, source)
    expect(action.type).toBe('sectionLoaded')
    expect(action.type === 'sectionLoaded' && action.records).toHaveLength(rows)
  })

  it('turns a parse failure into sectionFailed and logs it', async () => {
    const spy = vi.spyOn(console, 'error').mockImplementation(() => {})
    const broken = memorySource({ 'topic.txt': 'topic\tcount\nAI\t1\n' })

    const action = await fetchSection('topics', broken)
    expect(action).toMatchObject({ type: 'sectionFailed', section: 'topics' })
    expect(action.type === 'sectionFailed' && action.error).toBeInstanceOf(SchemaError)
    expect(spy).toHaveBeenCalledTimes(1)
    expect(spy.mock.calls[0][0]).toBe('Failed to load memory:topic.txt:')
  })

  it('reports a missing file', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => {})
    const action = await fetchSection('types', memorySource({}))
    expect(action.type === 'sectionFailed' && action.error).toBeInstanceOf(NotFoundError)
  })
})
