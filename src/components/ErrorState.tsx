import { AlertTriangle } from 'lucide-react'
import { describeError, type DataFileError } from '../services/errors'

export default function ErrorState({ error }: { error: DataFileError }) {
  const { heading, message } = describeError(error)
  return (
    <div role="alert" className="flex items-start gap-3 rounded-xl border border-red-200 bg-red-50 p-4 text-sm text-red-700">
      <AlertTriangle className="mt-0.5 h-4 w-4 shrink-0" />
      <div>
        <div className="font-semibold">{heading}</div>
        <div className="mt-1 break-words">{message}</div>
      </div>
    </div>
  )
}
