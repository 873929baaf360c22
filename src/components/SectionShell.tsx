import type { ReactNode } from 'react'
import DataTable from './DataTable'
import ErrorState from './ErrorState'
import Loading from './Loading'
import type { SectionView } from '../services/chartSpecs'
import type { SectionStatus } from '../services/dashboard'

/**
 * Loading and error states for one section. Children only render once the
 * section's view is ready; the raw-data table follows them.
 */
export default function SectionShell({
  status,
  children,
}: {
  status: SectionStatus
  children: (view: SectionView) => ReactNode
}) {
  if (status.status === 'loading') return <Loading height={240} />
  if (status.status === 'error') return <ErrorState error={status.error} />
  return (
    <div className="space-y-6">
      {children(status.view)}
      <DataTable table={status.view.table} />
    </div>
  )
}
