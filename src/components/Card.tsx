import type { ReactNode } from 'react'

export default function Card({ title, children }: { title: string; children: ReactNode }) {
  return (
    <section className="bg-white rounded-2xl shadow-sm border overflow-hidden">
      <div className="px-4 py-3 border-b">
        <h2 className="font-semibold border-l-4 border-indigo-400 pl-2">{title}</h2>
      </div>
      <div className="p-4">{children}</div>
    </section>
  )
}
