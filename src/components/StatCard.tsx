import type { LucideIcon } from 'lucide-react'

export default function StatCard({ label, value, icon: Icon }: { label: string; value: string; icon: LucideIcon }) {
  return (
    <div className="rounded-2xl border bg-white px-5 py-4 text-center shadow-sm">
      <Icon className="mx-auto mb-1 h-5 w-5 text-indigo-400" />
      <p className="truncate text-2xl font-bold text-indigo-500" title={value}>
        {value}
      </p>
      <p className="mt-1 text-xs uppercase tracking-wide text-slate-500">{label}</p>
    </div>
  )
}
