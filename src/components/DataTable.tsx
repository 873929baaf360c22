import { Table2 } from 'lucide-react'
import type { TableSpec } from '../services/chartSpecs'
import { fmtCell } from '../utils/format'

// Raw rows behind a section, collapsed by default
export default function DataTable({ table }: { table: TableSpec }) {
  return (
    <details className="group rounded-xl border bg-white shadow-sm">
      <summary className="flex cursor-pointer select-none items-center gap-2 rounded-xl px-4 py-2 font-semibold">
        <Table2 className="h-4 w-4 text-slate-500" />
        View raw data
        <span className="ml-auto text-xs font-normal text-slate-500">{table.rows.length} rows</span>
      </summary>
      <div className="max-h-80 overflow-y-auto px-4 pb-4">
        <table className="w-full text-sm">
          <thead className="sticky top-0 bg-white">
            <tr className="border-b text-left text-slate-500">
              {table.columns.map(c => (
                <th key={c.key} className={`py-2 pr-4 font-medium ${c.format ? 'text-right' : ''}`}>
                  {c.label}
                </th>
              ))}
            </tr>
          </thead>
          <tbody>
            {table.rows.map((row, i) => (
              <tr key={i} className="border-b last:border-0">
                {table.columns.map(c => (
                  <td key={c.key} className={`py-1.5 pr-4 ${c.format ? 'text-right tabular-nums' : ''}`}>
                    {fmtCell(row[c.key], c.format)}
                  </td>
                ))}
              </tr>
            ))}
          </tbody>
        </table>
      </div>
    </details>
  )
}
