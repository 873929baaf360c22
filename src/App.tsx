import { NavLink, Route, Routes, useLocation } from 'react-router-dom'
import { BookOpen, FileText, Globe, Landmark, Tag } from 'lucide-react'
import FiltersPanel from './components/FiltersPanel'
import StatCard from './components/StatCard'
import { dataSource } from './config'
import { useDashboard } from './hooks/useDashboard'
import InstitutionsPage from './pages/Institutions'
import PublicationTypesPage from './pages/PublicationTypes'
import TopicsPage from './pages/Topics'
import { SECTION_PATHS, sectionForPath } from './routes'
import { fmtInt } from './utils/format'

const NAV = [
  { to: SECTION_PATHS.institutions, label: 'Institutions', icon: Landmark },
  { to: SECTION_PATHS.topics, label: 'Topics', icon: Tag },
  { to: SECTION_PATHS.types, label: 'Publication Types', icon: FileText },
]

export default function App() {
  const { pathname } = useLocation()
  const section = sectionForPath(pathname)
  const { state, status, summary, countries, rowCounts, setFilter, setLimit } = useDashboard(dataSource, section)

  const institutions = <InstitutionsPage status={status} filter={state.filter} />

  return (
    <div className="min-h-screen bg-slate-50">
      <header className="sticky top-0 z-10 bg-white/70 backdrop-blur border-b">
        <div className="max-w-7xl mx-auto px-4 py-3 flex items-center justify-between">
          <NavLink
            to={SECTION_PATHS.institutions}
            className="flex items-center gap-2 text-xl md:text-2xl font-semibold rounded-lg px-2 py-1 hover:bg-slate-100 focus-visible:outline-none focus-visible:ring-2 focus-visible:ring-slate-400"
            aria-label="Go to Institutions"
          >
            <BookOpen className="h-6 w-6 text-indigo-500" />
            Citation Source Analytics
          </NavLink>
          <nav className="flex gap-4 text-sm md:text-base">
            {NAV.map(({ to, label, icon: Icon }) => (
              <NavLink
                key={to}
                to={to}
                className={({ isActive }) =>
                  `flex items-center gap-1.5 ${isActive || (to === SECTION_PATHS.institutions && section === 'institutions') ? 'font-semibold' : 'text-slate-600'}`
                }
              >
                <Icon className="h-4 w-4" />
                {label}
              </NavLink>
            ))}
          </nav>
        </div>
      </header>

      <main className="max-w-7xl mx-auto px-4 py-6 space-y-6">
        <p className="text-sm text-slate-600">
          Visualizing the distribution of academic citation sources across institutions, topics, and publication types.
        </p>

        <div className="grid grid-cols-2 gap-4 lg:grid-cols-4">
          <StatCard label="Total institution citations" value={fmtInt(summary.totalCitations)} icon={BookOpen} />
          <StatCard label="Countries represented" value={fmtInt(summary.countriesRepresented)} icon={Globe} />
          <StatCard label="Top institution" value={summary.topInstitution ?? '—'} icon={Landmark} />
          <StatCard label="Top topic" value={summary.topTopic ?? '—'} icon={Tag} />
        </div>

        <div className="grid gap-6 lg:grid-cols-[260px_1fr]">
          <FiltersPanel
            countries={countries}
            filter={state.filter}
            limits={state.limits}
            rowCounts={rowCounts}
            summary={summary}
            onSelectFilter={setFilter}
            onSelectLimit={setLimit}
          />
          <div className="min-w-0">
            <Routes>
              <Route path={SECTION_PATHS.institutions} element={institutions} />
              <Route path={SECTION_PATHS.topics} element={<TopicsPage status={status} />} />
              <Route path={SECTION_PATHS.types} element={<PublicationTypesPage status={status} />} />
              <Route path="*" element={institutions} />
            </Routes>
          </div>
        </div>
      </main>

      <footer className="border-t py-6 text-center text-sm text-slate-500">
        Citation Source Analytics · Built with React, Recharts &amp; Vite
      </footer>
    </div>
  )
}
