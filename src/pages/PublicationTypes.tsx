import { ChartById } from '../components/ChartView'
import SectionShell from '../components/SectionShell'
import type { SectionStatus } from '../services/dashboard'

export default function PublicationTypesPage({ status }: { status: SectionStatus }) {
  return (
    <SectionShell status={status}>
      {({ charts }) => (
        <>
          <div className="grid gap-6 lg:grid-cols-2">
            <ChartById charts={charts} id="types-breakdown" />
            <ChartById charts={charts} id="types-volume" />
          </div>
          <ChartById charts={charts} id="types-cumulative" />
        </>
      )}
    </SectionShell>
  )
}
