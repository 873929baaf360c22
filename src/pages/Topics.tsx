import { ChartById } from '../components/ChartView'
import SectionShell from '../components/SectionShell'
import type { SectionStatus } from '../services/dashboard'

export default function TopicsPage({ status }: { status: SectionStatus }) {
  return (
    <SectionShell status={status}>
      {({ charts }) => (
        <>
          <div className="grid gap-6 lg:grid-cols-5">
            <div className="lg:col-span-2">
              <ChartById charts={charts} id="topics-distribution" />
            </div>
            <div className="lg:col-span-3">
              <ChartById charts={charts} id="topics-ranking" />
            </div>
          </div>
          <ChartById charts={charts} id="topics-bubble" />
        </>
      )}
    </SectionShell>
  )
}
