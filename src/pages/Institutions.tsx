import { ChartById } from '../components/ChartView'
import SectionShell from '../components/SectionShell'
import type { CountryFilter } from '../services/aggregate'
import type { SectionStatus } from '../services/dashboard'

export default function InstitutionsPage({ status, filter }: { status: SectionStatus; filter: CountryFilter }) {
  return (
    <SectionShell status={status}>
      {({ charts }) => (
        <>
          {filter.kind === 'country' && (
            <div className="text-sm text-slate-600">
              Institution charts show <span className="font-medium">{filter.country}</span> only; the country
              breakdown always covers every country.
            </div>
          )}
          <div className="grid gap-6 lg:grid-cols-5">
            <div className="lg:col-span-3">
              <ChartById charts={charts} id="institutions-top" />
            </div>
            <div className="lg:col-span-2">
              <ChartById charts={charts} id="institutions-countries" />
            </div>
          </div>
          <ChartById charts={charts} id="institutions-treemap" />
        </>
      )}
    </SectionShell>
  )
}
