'use client'

import { useEffect } from 'react'
import * as Sentry from '@sentry/nextjs'
import { Button } from '@/components/ui/button'

export default function Error({
  error,
  reset,
}: {
  error: Error & { digest?: string }
  reset: () => void
}) {
  useEffect(() => {
    console.error('Unhandled render error:', error)
    Sentry.captureException(error, { tags: { digest: error.digest } })
  }, [error])

  return (
    <div className="flex h-dvh w-full items-center justify-center bg-background">
      <div className="space-y-3 text-center">
        <p className="text-sm text-muted-foreground">The dashboard hit an unexpected error.</p>
        <Button variant="outline" size="sm" onClick={reset}>
          Try again
        </Button>
      </div>
    </div>
  )
}
