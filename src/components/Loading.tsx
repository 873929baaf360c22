export default function Loading({ label = 'Loading data…', height }: { label?: string; height?: number }) {
  return (
    <div
      className="animate-pulse text-slate-500 text-sm flex items-center justify-center"
      style={height ? { height } : undefined}
      role="status"
    >
      {label}
    </div>
  )
}
