import { useCallback, useEffect, useMemo, useReducer } from 'react'
import type { CountryFilter } from '../services/aggregate'
import type { DisplayLimits } from '../services/chartSpecs'
import {
  SECTIONS,
  createDashboardState,
  dashboardReducer,
  fetchSection,
  needsLoad,
  selectCountries,
  selectRowCount,
  selectSummary,
  selectView,
  type SectionId,
} from '../services/dashboard'
import type { DataSource } from '../services/loader'

/**
 * One dashboard session bound to React. The active section comes from the
 * caller (the route); everything else lives in the reducer state.
 */
export function useDashboard(source: DataSource, section: SectionId) {
  const [state, dispatch] = useReducer(dashboardReducer, section, s => createDashboardState({ section: s }))

  useEffect(() => {
    dispatch({ type: 'sectionSelected', section })
  }, [section])

  // Active section first, then the others so the KPI cards fill in.
  // StrictMode's second run shares the first run's requests (fetchText de-dups).
  useEffect(() => {
    const order = [section, ...SECTIONS.filter(s => s !== section)]
    for (const s of order) {
      if (!needsLoad(state, s)) continue
      dispatch({ type: 'loadStarted', section: s })
      void fetchSection(s, source).then(dispatch)
    }
    // eslint-disable-next-line react-hooks/exhaustive-deps
  }, [source, section])

  const setFilter = useCallback((filter: CountryFilter) => dispatch({ type: 'filterChanged', filter }), [])
  const setLimit = useCallback(
    (which: keyof DisplayLimits, limit: number) => dispatch({ type: 'limitChanged', section: which, limit }),
    []
  )

  const summary = useMemo(() => selectSummary(state), [state.data])
  const countries = useMemo(() => selectCountries(state), [state.data.institutions])

  return {
    state,
    status: selectView(state, section),
    summary,
    countries,
    rowCounts: {
      institutions: selectRowCount(state, 'institutions'),
      topics: selectRowCount(state, 'topics'),
    },
    setFilter,
    setLimit,
  }
}
